import { AnyNode, Comment } from "./ast/augmented-ast";

export function defined<T>(maybeUndef: T | void | undefined | null): T {
  if (maybeUndef === null || maybeUndef === undefined) {
    const e = new Error("Expected defined value, got " + maybeUndef);
    Error.captureStackTrace(e, defined);
    throw e;
  }
  return maybeUndef;
}

export function getLoc(inp: AnyNode | Comment): {
  start: AnyNode["start"];
  end: AnyNode["end"];
  loc: AnyNode["loc"];
  range: AnyNode["range"];
} {
  const { start, end, loc, range } = inp;
  return { start, end, loc, range };
}

/** "3:14", the way errors and warnings point at code */
export function formatLoc(node: AnyNode): string {
  const { line, column } = node.loc.start;
  return node.loc.source
    ? `${node.loc.source}:${line}:${column}`
    : `${line}:${column}`;
}

/** Put `item` at the end of an optional list property, creating the list */
export function pushOptional<T>(list: T[] | undefined, item: T): T[] {
  if (!list) return [item];
  list.push(item);
  return list;
}
