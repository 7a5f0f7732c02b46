import { astMakeBlockComment } from "../ast/ast-make";
import { astChildren } from "../ast/ast-traversal";
import {
  AnyNode,
  Comment,
  NameableFunction,
  Program,
  isNameableFunction,
} from "../ast/augmented-ast";
import { FunctionAssistant } from "../assistant/function-assistant";
import { MalformedResponseError } from "../errors";
import { ParsedFile, parseJsFile, stringifyJsFile } from "../parse";
import { defined, formatLoc, pushOptional } from "../utils";
import { attachComments } from "./attach-comments";
import { FunctionTable } from "./call-graph";
import { RenamingContext } from "./renaming-context";

export interface AnnotateOptions {
  assistant?: FunctionAssistant;
  /** Ask the assistant to comment each function */
  comments?: boolean;
  /** Add a comment listing each function's callers */
  xrefs?: boolean;
}

/**
 * ```
 * *
 *  * xrefs {{{
 *  *   caller: 2
 *  * }}}
 * ```
 */
export function xrefCommentValue(callers: Map<string, number>) {
  let ret = "*\n * xrefs {{{\n";
  for (const [name, count] of callers) {
    ret += ` *   ${name}: ${count}\n`;
  }
  return ret + " * }}}\n ";
}

/** The first function in a parsed response, with the comments around it */
function firstFunction(program: Program) {
  for (const statement of program.body) {
    if (statement.type === "FunctionDeclaration") {
      return { fn: statement, holders: [statement] };
    }
    if (
      statement.type === "ExpressionStatement" &&
      isNameableFunction(statement.expression)
    ) {
      return {
        fn: statement.expression,
        holders: [statement, statement.expression],
      };
    }
  }
  return undefined;
}

function collectComments(
  holders: AnyNode[],
  key: "leadingComments" | "trailingComments"
) {
  const ret: Comment[] = [];
  for (const holder of holders) ret.push(...(holder[key] ?? []));
  return ret;
}

/** Replace the params, body and comments of `fn` with the commented version */
function spliceCommented(fn: NameableFunction, name: string, code: string) {
  let parsed: ParsedFile;
  try {
    parsed = parseJsFile(code);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new MalformedResponseError(
      name,
      code,
      `${reason}, commenting the function at ${formatLoc(fn)}`
    );
  }
  attachComments(parsed.program, parsed.comments);

  const found = firstFunction(parsed.program);
  if (!found) {
    throw new MalformedResponseError(
      name,
      code,
      `no function in the response, commenting the function at ${formatLoc(fn)}`
    );
  }

  fn.params = found.fn.params;
  fn.body = found.fn.body;

  const leading = collectComments(found.holders, "leadingComments");
  if (leading.length) fn.leadingComments = leading;
  const trailing = collectComments(found.holders, "trailingComments");
  if (trailing.length) fn.trailingComments = trailing;
}

/** Comment each selected function: what it does, and who calls it */
export async function annotateFunctions(
  root: AnyNode,
  functions: FunctionTable,
  context: RenamingContext,
  { assistant, comments = false, xrefs = true }: AnnotateOptions = {}
) {
  const stack: AnyNode[] = [root];

  while (stack.length) {
    const node = defined(stack.pop());

    if (isNameableFunction(node) && node.id && context.selection.includes(node)) {
      const name = node.id.name;

      if (comments && assistant) {
        const code = await assistant.addComments(name, stringifyJsFile(node));
        if (code !== undefined) spliceCommented(node, name, code);
      }

      const record = functions.get(name);
      if (xrefs && record?.xrefs.length) {
        node.leadingComments = pushOptional(
          node.leadingComments,
          astMakeBlockComment(
            xrefCommentValue(functions.callersOf(record)),
            node
          )
        );
      }
    }

    const children = astChildren(node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}
