import { astChildren, astHasBody } from "./ast-traversal";
import { AnyNode } from "./augmented-ast";
import { defined } from "../utils";

/**
 * What a visitor wants the walker to do next.
 *
 * - "continue": open a scope if the node owns a body, then visit its children
 * - "stop": end the traversal right away
 * - "skip-children": move on without queueing the children (the visitor may
 *   have queued its own selection with `Scope.enqueue`)
 */
export type WalkAction = "continue" | "stop" | "skip-children";

export class Scope<Context extends object> {
  /** Nodes still to visit in this scope. The next one is at the end. */
  pending: AnyNode[] = [];

  constructor(
    /** The node whose body this scope covers, or undefined at the root */
    public owner: AnyNode | undefined,
    public context: Context
  ) {}

  /** Queue nodes so that they are visited in the order given */
  enqueue(...nodes: Array<AnyNode | null | undefined>) {
    for (let i = nodes.length - 1; i >= 0; i--) {
      const node = nodes[i];
      if (node) this.pending.push(node);
    }
  }

  get isExhausted() {
    return this.pending.length === 0;
  }
}

export interface ScopedVisitor<Context extends object> {
  /** Called before a node is descended into */
  enter?(node: AnyNode, scopes: Scope<Context>[]): WalkAction;
  /** Called right after `owner` opened a new scope (the last in `scopes`) */
  enterScope?(owner: AnyNode, scopes: Scope<Context>[]): WalkAction;
}

export function currentScope<Context extends object>(
  scopes: Scope<Context>[]
): Scope<Context> {
  return defined(scopes[scopes.length - 1]);
}

/**
 * Depth-first walk of `root` that keeps a stack of lexical scopes.
 *
 * A scope opens whenever a node owning a non-empty body is entered, and is
 * popped once nothing is pending in it. Popping is lazy: it happens at the
 * start of the next step and may pop several scopes at once. New scopes
 * start with a shallow copy of their parent's context.
 */
export function walkScoped<Context extends object>(
  root: AnyNode,
  context: Context,
  visitor: ScopedVisitor<Context>
): void {
  const rootScope = new Scope<Context>(undefined, context);
  rootScope.enqueue(root);
  const scopes = [rootScope];

  while (true) {
    while (scopes.length && currentScope(scopes).isExhausted) {
      scopes.pop();
    }
    if (!scopes.length) return;

    const scope = currentScope(scopes);
    const node = defined(scope.pending.pop());

    const action = visitor.enter?.(node, scopes) ?? "continue";
    if (action === "stop") return;
    if (action === "skip-children") continue;

    let target = scope;
    if (astHasBody(node)) {
      target = new Scope(node, { ...scope.context });
      scopes.push(target);

      const scopeAction = visitor.enterScope?.(node, scopes) ?? "continue";
      if (scopeAction === "stop") return;
      if (scopeAction === "skip-children") continue;
    }

    target.enqueue(...astChildren(node));
  }
}
