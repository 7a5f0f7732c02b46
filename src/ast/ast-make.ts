import { getLoc } from "../utils";
import {
  AnyNode,
  ArrowFunctionExpression,
  BlockStatement,
  Comment,
  Expression,
  FunctionExpression,
  Identifier,
} from "./augmented-ast";

export function astMakeIdentifier(
  name: string,
  originNode: AnyNode
): Identifier {
  return {
    type: "Identifier",
    name,
    ...getLoc(originNode),
  };
}

export function astMakeBlockComment(
  value: string,
  originNode: AnyNode
): Comment {
  return {
    type: "Block",
    value,
    ...getLoc(originNode),
  };
}

/** `{ return expression; }` */
export function astMakeReturnBlock(expression: Expression): BlockStatement {
  return {
    type: "BlockStatement",
    body: [
      {
        type: "ReturnStatement",
        argument: expression,
        ...getLoc(expression),
      },
    ],
    ...getLoc(expression),
  };
}

/** The ordinary function expression an arrow function stands for */
export function astMakeFunctionFromArrow(
  arrow: ArrowFunctionExpression,
  id: Identifier
): FunctionExpression {
  return {
    type: "FunctionExpression",
    id,
    params: arrow.params,
    body:
      arrow.body.type === "BlockStatement"
        ? arrow.body
        : astMakeReturnBlock(arrow.body),
    generator: false,
    expression: false,
    async: arrow.async,
    ...getLoc(arrow),
  };
}
