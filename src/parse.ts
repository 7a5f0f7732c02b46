import * as acorn from "acorn";
import invariant from "tiny-invariant";
import type { AnyNode, Comment, Program } from "./ast/augmented-ast";
import { generateWithComments } from "./ast/comment-generator";
import { defined } from "./utils";

export interface Options {
  sourceFile?: string;
  sourceType?: Program["sourceType"];
}

export interface ParsedFile {
  program: Program;
  /** Every comment in the file, in source order, not attached to anything yet */
  comments: Comment[];
}

/** Code that mentions import or export is read as a module */
export function guessSourceType(source: string): Program["sourceType"] {
  return /\b(import|export)\b/.test(source) ? "module" : "script";
}

// acorn builds every node with `locations` and `ranges` on
function isProgram(node: { type: string }): node is Program {
  return node.type === "Program";
}

export function parseJsFile(
  source: string,
  { sourceFile, sourceType = guessSourceType(source) }: Options = {}
): ParsedFile {
  const comments: Comment[] = [];

  const program: { type: string } = acorn.parse(source, {
    sourceFile,
    sourceType,
    allowHashBang: true,
    ecmaVersion: "latest",
    locations: true,
    ranges: true,
    onComment(isBlock, value, start, end, startLoc, endLoc) {
      const { line: startLine, column: startColumn } = defined(startLoc);
      const { line: endLine, column: endColumn } = defined(endLoc);
      comments.push({
        type: isBlock ? "Block" : "Line",
        value,
        start,
        end,
        range: [start, end],
        loc: {
          source: sourceFile,
          start: { line: startLine, column: startColumn },
          end: { line: endLine, column: endColumn },
        },
      });
    },
  });
  invariant(isProgram(program), "expected a Program");

  return { program, comments };
}

export function stringifyJsFile(source: AnyNode) {
  return generateWithComments(source).trimEnd();
}
