import {
  AnyNode,
  Identifier,
  Pattern,
  isStatementListHaver,
} from "./augmented-ast";
import { defined } from "../utils";

function present<T>(items: Array<T | null | undefined>): T[] {
  const ret: T[] = [];
  for (const item of items) {
    if (item != null) ret.push(item);
  }
  return ret;
}

/**
 * The children of a node, in source order.
 *
 * Every variant declares its child slots here, so nothing else needs to look
 * at a node's keys. Nodes that acorn shares between two slots (`export { a }`
 * and `import { a }` use one Identifier for both names) are listed once.
 */
export function astChildren(ast: AnyNode): AnyNode[] {
  const type: string = ast.type;
  switch (ast.type) {
    case "Program":
    case "BlockStatement":
    case "StaticBlock":
    case "ClassBody": {
      return [...ast.body];
    }

    // Functions
    case "FunctionDeclaration":
    case "FunctionExpression":
    case "ArrowFunctionExpression": {
      return present<AnyNode>([ast.id, ...ast.params, ast.body]);
    }
    case "ClassDeclaration":
    case "ClassExpression": {
      return present<AnyNode>([ast.id, ast.superClass, ast.body]);
    }
    case "MethodDefinition":
    case "PropertyDefinition": {
      return present<AnyNode>([ast.key, ast.value]);
    }

    // Statements
    case "ExpressionStatement": {
      return [ast.expression];
    }
    case "WithStatement": {
      return [ast.object, ast.body];
    }
    case "ReturnStatement":
    case "YieldExpression": {
      return present<AnyNode>([ast.argument]);
    }
    case "LabeledStatement": {
      return [ast.label, ast.body];
    }
    case "BreakStatement":
    case "ContinueStatement": {
      return present<AnyNode>([ast.label]);
    }
    case "IfStatement": {
      return present<AnyNode>([ast.test, ast.consequent, ast.alternate]);
    }
    case "SwitchStatement": {
      return [ast.discriminant, ...ast.cases];
    }
    case "SwitchCase": {
      return present<AnyNode>([ast.test, ...ast.consequent]);
    }
    case "ThrowStatement":
    case "UnaryExpression":
    case "UpdateExpression":
    case "SpreadElement":
    case "RestElement":
    case "AwaitExpression": {
      return [ast.argument];
    }
    case "TryStatement": {
      return present<AnyNode>([ast.block, ast.handler, ast.finalizer]);
    }
    case "CatchClause": {
      return present<AnyNode>([ast.param, ast.body]);
    }
    case "WhileStatement": {
      return [ast.test, ast.body];
    }
    case "DoWhileStatement": {
      return [ast.body, ast.test];
    }
    case "ForStatement": {
      return present<AnyNode>([ast.init, ast.test, ast.update, ast.body]);
    }
    case "ForInStatement":
    case "ForOfStatement": {
      return [ast.left, ast.right, ast.body];
    }
    case "VariableDeclaration": {
      return [...ast.declarations];
    }
    case "VariableDeclarator": {
      return present<AnyNode>([ast.id, ast.init]);
    }

    // Expressions
    case "ArrayExpression":
    case "ArrayPattern": {
      return present<AnyNode>(ast.elements);
    }
    case "ObjectExpression":
    case "ObjectPattern": {
      return [...ast.properties];
    }
    case "Property": {
      return [ast.key, ast.value];
    }
    case "BinaryExpression":
    case "LogicalExpression":
    case "AssignmentExpression":
    case "AssignmentPattern": {
      return [ast.left, ast.right];
    }
    case "MemberExpression": {
      return [ast.object, ast.property];
    }
    case "ConditionalExpression": {
      return [ast.test, ast.consequent, ast.alternate];
    }
    case "CallExpression":
    case "NewExpression": {
      return [ast.callee, ...ast.arguments];
    }
    case "SequenceExpression": {
      return [...ast.expressions];
    }
    case "TemplateLiteral": {
      // quasis and expressions interleave, starting with a quasi
      const { quasis, expressions } = ast;
      const ret: AnyNode[] = [];
      quasis.forEach((quasi, i) => {
        ret.push(quasi);
        if (i < expressions.length) ret.push(expressions[i]);
      });
      return ret;
    }
    case "TaggedTemplateExpression": {
      return [ast.tag, ast.quasi];
    }
    case "ChainExpression":
    case "ParenthesizedExpression": {
      return [ast.expression];
    }
    case "ImportExpression": {
      return [ast.source];
    }
    case "MetaProperty": {
      return [ast.meta, ast.property];
    }

    // Modules
    case "ImportDeclaration": {
      return [...ast.specifiers, ast.source, ...(ast.attributes ?? [])];
    }
    case "ImportSpecifier": {
      return ast.imported === ast.local ? [ast.local] : [ast.imported, ast.local];
    }
    case "ImportDefaultSpecifier":
    case "ImportNamespaceSpecifier": {
      return [ast.local];
    }
    case "ImportAttribute": {
      return [ast.key, ast.value];
    }
    case "ExportNamedDeclaration": {
      return present<AnyNode>([ast.declaration, ...ast.specifiers, ast.source]);
    }
    case "ExportSpecifier": {
      return ast.exported === ast.local
        ? [ast.local]
        : [ast.local, ast.exported];
    }
    case "ExportDefaultDeclaration": {
      return [ast.declaration];
    }
    case "ExportAllDeclaration": {
      return present<AnyNode>([ast.exported, ast.source]);
    }

    case "EmptyStatement":
    case "DebuggerStatement":
    case "ThisExpression":
    case "Super":
    case "Literal":
    case "Identifier":
    case "PrivateIdentifier":
    case "TemplateElement": {
      return [];
    }

    default: {
      const exhaustive: never = ast;
      throw new Error(`Unknown node type ${type}`, { cause: exhaustive });
    }
  }
}

/**
 * Whether entering this node opens a scope: it owns a `body` that is a node
 * or a non-empty list.
 */
export function astHasBody(ast: AnyNode): boolean {
  switch (ast.type) {
    case "Program":
    case "BlockStatement":
    case "StaticBlock":
    case "ClassBody": {
      return ast.body.length > 0;
    }
    case "FunctionDeclaration":
    case "FunctionExpression":
    case "ArrowFunctionExpression":
    case "ClassDeclaration":
    case "ClassExpression":
    case "CatchClause":
    case "LabeledStatement":
    case "WithStatement":
    case "WhileStatement":
    case "DoWhileStatement":
    case "ForStatement":
    case "ForInStatement":
    case "ForOfStatement": {
      return true;
    }
    default: {
      return false;
    }
  }
}

/**
 * The children of `ast` that sit where a statement or block goes: list items,
 * function and loop bodies, branches. The printer writes each of them through
 * its own node printer, so comments placed on them are printed.
 */
export function astStatementPositions(ast: AnyNode): AnyNode[] {
  if (isStatementListHaver(ast)) return [...ast.body];

  switch (ast.type) {
    case "ClassBody": {
      return [...ast.body];
    }
    case "FunctionDeclaration":
    case "FunctionExpression":
    case "ArrowFunctionExpression": {
      return ast.body.type === "BlockStatement" ? [ast.body] : [];
    }
    case "MethodDefinition": {
      return [ast.value.body];
    }
    case "ClassDeclaration":
    case "ClassExpression":
    case "CatchClause":
    case "LabeledStatement":
    case "WithStatement":
    case "WhileStatement":
    case "DoWhileStatement":
    case "ForStatement":
    case "ForInStatement":
    case "ForOfStatement": {
      return [ast.body];
    }
    case "IfStatement": {
      return present<AnyNode>([ast.consequent, ast.alternate]);
    }
    case "TryStatement": {
      return present<AnyNode>([ast.block, ast.handler?.body, ast.finalizer]);
    }
    case "SwitchStatement": {
      return ast.cases.flatMap((c) => c.consequent);
    }
    case "ExportNamedDeclaration":
    case "ExportDefaultDeclaration": {
      const { declaration } = ast;
      return declaration &&
        (declaration.type === "FunctionDeclaration" ||
          declaration.type === "ClassDeclaration" ||
          declaration.type === "VariableDeclaration")
        ? [declaration]
        : [];
    }
    default: {
      return [];
    }
  }
}

/** Pre-order, source-order iteration of a whole tree */
export function* astNaiveTraversal(ast: AnyNode): Generator<AnyNode> {
  const stack = [ast];
  while (stack.length) {
    const item = defined(stack.pop());
    yield item;

    const children = astChildren(item);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/** The identifiers a pattern (re)binds */
export function astPatternAssignedBindings(
  pattern: Pattern,
  items: Identifier[] = []
): Identifier[] {
  switch (pattern.type) {
    case "Identifier": {
      items.push(pattern);
      break;
    }
    case "ArrayPattern": {
      for (const item of pattern.elements) {
        if (item) {
          astPatternAssignedBindings(item, items);
        }
      }
      break;
    }
    case "MemberExpression": {
      // Nothing to do: we might have been mutated, but no bindings changed.
      break;
    }
    case "AssignmentPattern": {
      astPatternAssignedBindings(pattern.left, items);
      break;
    }
    case "ObjectPattern": {
      for (const item of pattern.properties) {
        if (item.type === "RestElement") {
          astPatternAssignedBindings(item.argument, items);
        } else {
          astPatternAssignedBindings(item.value, items);
        }
      }
      break;
    }
    case "RestElement": {
      astPatternAssignedBindings(pattern.argument, items);
      break;
    }
  }

  return items;
}
