import { astNaiveTraversal } from "./ast/ast-traversal";
import { AnyNode, NameableFunction, isNameableFunction } from "./ast/augmented-ast";
import { parseJsFile } from "./parse";
import { attachComments } from "./rename/attach-comments";
import { RenamingContext } from "./rename/renaming-context";
import { FunctionSelection } from "./rename/selection";
import { defined } from "./utils";

/** Parse with comments attached, and a renaming context for it */
export function testParse(code: string, only: string[] = []) {
  const { program, comments } = parseJsFile(code);
  attachComments(program, comments);
  const context = RenamingContext.forProgram(
    program,
    FunctionSelection.fromItems(only)
  );
  return { program, comments, context };
}

export function testFindFunction(root: AnyNode, name: string): NameableFunction {
  for (const node of astNaiveTraversal(root)) {
    if (isNameableFunction(node) && node.id?.name === name) return node;
  }
  throw new Error(`no function called ${name}`);
}

/** The names of every Identifier, in source order */
export function testIdentifierNames(root: AnyNode) {
  const names: string[] = [];
  for (const node of astNaiveTraversal(root)) {
    if (node.type === "Identifier") names.push(node.name);
  }
  return names;
}

export function testFirstStatement(code: string) {
  return defined(parseJsFile(code).program.body[0]);
}
