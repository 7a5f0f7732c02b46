import { astNaiveTraversal, astStatementPositions } from "../ast/ast-traversal";
import { AnyNode, Comment, Program } from "../ast/augmented-ast";
import { currentScope, walkScoped } from "../ast/scoped-walker";
import { pushOptional } from "../utils";

/**
 * Place each comment on the nearest statement or block, as a leading or
 * trailing comment.
 *
 * A comment before a statement leads it. A comment after a statement trails
 * it when it sits on the statement's last line, or when nothing else follows
 * in that scope. A comment inside a statement that no inner statement takes
 * trails it. Expressions, patterns and names never own a comment.
 */
export function attachComments(program: Program, comments: Comment[]) {
  const candidates = new WeakSet<AnyNode>();
  for (const node of astNaiveTraversal(program)) {
    for (const child of astStatementPositions(node)) candidates.add(child);
  }

  for (const comment of comments) {
    attachComment(program, comment, candidates);
  }
}

function attachComment(
  program: Program,
  comment: Comment,
  candidates: WeakSet<AnyNode>
) {
  // The innermost statement around the comment. It takes the comment when
  // nothing inside it does.
  const state: { attached: boolean; container?: AnyNode } = {
    attached: false,
  };

  const attach = (
    node: AnyNode,
    key: "leadingComments" | "trailingComments"
  ) => {
    node[key] = pushOptional(node[key], comment);
    state.attached = true;
    return "stop" as const;
  };

  walkScoped(
    program,
    {},
    {
      enter(node, scopes) {
        if (node === program) return "continue";

        const inside = comment.start > node.start && comment.end < node.end;
        if (!candidates.has(node)) {
          return inside ? "continue" : "skip-children";
        }

        const { container } = state;
        if (container && node.start >= container.end) {
          return attach(container, "trailingComments");
        }

        if (comment.start < node.start) {
          return attach(node, "leadingComments");
        }

        if (
          comment.start >= node.end &&
          (currentScope(scopes).isExhausted ||
            comment.loc.start.line === node.loc.end.line)
        ) {
          return attach(node, "trailingComments");
        }

        if (inside) {
          state.container = node;
          return "continue";
        }
        return "skip-children";
      },
      enterScope(owner) {
        return comment.loc.start.line > owner.loc.end.line
          ? "skip-children"
          : "continue";
      },
    }
  );

  const { attached, container } = state;
  if (!attached && container) attach(container, "trailingComments");
}
