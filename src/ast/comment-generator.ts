import * as astring from "astring";
import { astChildren, astNaiveTraversal } from "./ast-traversal";
import { AnyNode, Comment, isFunction } from "./augmented-ast";

type AstringState = Parameters<typeof astring.GENERATOR.Program>[1];

/** The part of astring's printer state that comment printing needs */
interface PrinterState {
  write(code: string): void;
  indent: string;
  lineEnd: string;
  indentLevel: number;
}

type NodePrinter = (this: unknown, node: AnyNode, state: AstringState) => void;

function currentIndent(state: PrinterState) {
  return state.indent.repeat(state.indentLevel);
}

function formatComment(comment: Comment) {
  return comment.type === "Line"
    ? "//" + comment.value
    : "/*" + comment.value + "*/";
}

/**
 * astring's own comment support only knows about statement lists. This
 * generator prints `leadingComments` and `trailingComments` of every node,
 * right where they are attached.
 *
 * `listed` holds the nodes printed as items of a statement or class body
 * list: astring puts a line break after those itself.
 */
function makeCommentGenerator(listed: WeakSet<AnyNode>) {
  const writeLeading = (comments: Comment[], state: PrinterState, ownLine: boolean) => {
    for (const comment of comments) {
      state.write(formatComment(comment));
      if (comment.type === "Line" || ownLine) {
        state.write(state.lineEnd + currentIndent(state));
      } else {
        state.write(" ");
      }
    }
  };

  const writeTrailing = (comments: Comment[], state: PrinterState, lineFollows: boolean) => {
    comments.forEach((comment, i) => {
      state.write(" " + formatComment(comment));
      const isLast = i === comments.length - 1;
      if (comment.type === "Line" && !(isLast && lineFollows)) {
        state.write(state.lineEnd + currentIndent(state));
      }
    });
  };

  const base: Record<string, NodePrinter> = astring.GENERATOR;
  const generator: Record<string, NodePrinter> = {};

  for (const [type, print] of Object.entries(base)) {
    generator[type] = function (node, state) {
      const isListed = listed.has(node);
      // Printers also call each other for other node types (a method
      // Property goes through MethodDefinition)
      if (node.type !== type) {
        // astring writes function and class names itself, so comments held by
      // the name go before the whole node
      if (
        (isFunction(node) ||
          node.type === "ClassDeclaration" ||
          node.type === "ClassExpression") &&
        node.id
      ) {
        const held = [
          ...(node.id.leadingComments ?? []),
          ...(node.id.trailingComments ?? []),
        ];
        if (held.length) writeLeading(held, state, isListed);
      }

      print.call(this, node, state);
        return;
      }

      if (node.leadingComments?.length) {
        writeLeading(node.leadingComments, state, isListed);
      }
      // Methods are printed from their key, their FunctionExpression never
      // reaches its own printer
      if (
        (node.type === "MethodDefinition" || node.type === "Property") &&
        node.value.type === "FunctionExpression" &&
        node.value.leadingComments?.length
      ) {
        writeLeading(node.value.leadingComments, state, isListed);
      }

      print.call(this, node, state);

      if (node.trailingComments?.length) {
        writeTrailing(node.trailingComments, state, isListed);
      }
    };
  }

  return generator;
}

export function generateWithComments(root: AnyNode): string {
  const listed = new WeakSet<AnyNode>();
  for (const node of astNaiveTraversal(root)) {
    if (
      node.type === "Program" ||
      node.type === "BlockStatement" ||
      node.type === "StaticBlock" ||
      node.type === "ClassBody" ||
      node.type === "SwitchCase"
    ) {
      for (const child of astChildren(node)) {
        if (node.type !== "SwitchCase" || child !== node.test) {
          listed.add(child);
        }
      }
    }
  }
  // The root itself starts on its own line
  listed.add(root);

  return astring.generate(root, { generator: makeCommentGenerator(listed) });
}
