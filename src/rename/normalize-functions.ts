import { astMakeFunctionFromArrow, astMakeIdentifier } from "../ast/ast-make";
import { astNaiveTraversal } from "../ast/ast-traversal";
import { AnyNode } from "../ast/augmented-ast";
import { RenamingContext } from "./renaming-context";

/**
 * Make every selected function nameable: anonymous function expressions
 * (and `export default function () {}`) get a synthetic `f_e_N` name, and
 * arrow functions become named function expressions.
 *
 * Already normalized code is left as it is.
 */
export function normalizeFunctions(root: AnyNode, context: RenamingContext) {
  const mint = (origin: AnyNode) => {
    const name = context.inventory.mintSynthetic();
    context.selection.add(name);
    return astMakeIdentifier(name, origin);
  };

  for (const node of astNaiveTraversal(root)) {
    if (
      (node.type === "FunctionExpression" ||
        node.type === "FunctionDeclaration") &&
      !node.id &&
      context.selection.includes(node)
    ) {
      node.id = mint(node);
    } else if (
      node.type === "ArrowFunctionExpression" &&
      context.selection.includes(node)
    ) {
      // In place, so whatever holds the arrow now holds the function
      Object.assign(node, astMakeFunctionFromArrow(node, mint(node)));
    }
  }
}
