import { parseJsFile } from "../parse";
import { currentScope, walkScoped, WalkAction } from "./scoped-walker";

function visitedNames(
  code: string,
  onIdentifier: (name: string) => WalkAction = () => "continue"
) {
  const names: string[] = [];
  walkScoped(parseJsFile(code).program, {}, {
    enter(node) {
      if (node.type === "Identifier") {
        names.push(node.name);
        return onIdentifier(node.name);
      }
      return "continue";
    },
  });
  return names;
}

it("visits every node in source order", () => {
  expect(visitedNames("a; function b(c) { d } e")).toEqual([
    "a",
    "b",
    "c",
    "d",
    "e",
  ]);
});

it("can stop", () => {
  expect(
    visitedNames("a; function b(c) { d } e", (name) =>
      name === "b" ? "stop" : "continue"
    )
  ).toEqual(["a", "b"]);
});

it("lets visitors queue their own children", () => {
  const names: string[] = [];
  walkScoped(parseJsFile("f(x, y)").program, {}, {
    enter(node, scopes) {
      if (node.type === "CallExpression") {
        currentScope(scopes).enqueue(node.arguments[1], node.arguments[0]);
        return "skip-children";
      }
      if (node.type === "Identifier") names.push(node.name);
      return "continue";
    },
  });
  expect(names).toEqual(["y", "x"]);
});

it("gives each scope a copy of its parent's context", () => {
  const seen: Array<[string, number]> = [];
  const owners: Array<string | undefined> = [];
  const root = { depth: 0 };
  walkScoped(parseJsFile("var a; function f() { var b; }").program, root, {
    enter(node, scopes) {
      if (node.type === "Identifier") {
        seen.push([node.name, currentScope(scopes).context.depth]);
        owners.push(currentScope(scopes).owner?.type);
      }
      return "continue";
    },
    enterScope(owner, scopes) {
      currentScope(scopes).context.depth++;
      return "continue";
    },
  });
  expect(seen).toEqual([
    ["a", 1],
    ["f", 2],
    ["b", 3],
  ]);
  expect(owners).toEqual(["Program", "FunctionDeclaration", "BlockStatement"]);
  expect(root.depth).toBe(0);
});

it("leaves a scope empty when enterScope skips its children", () => {
  const names: string[] = [];
  const depths: number[] = [];
  walkScoped(parseJsFile("a; function f(b) { c } d").program, {}, {
    enter(node, scopes) {
      if (node.type === "Identifier") {
        names.push(node.name);
        depths.push(scopes.length);
      }
      return "continue";
    },
    enterScope(owner) {
      return owner.type === "FunctionDeclaration" ? "skip-children" : "continue";
    },
  });
  expect(names).toEqual(["a", "d"]);
  // The function's scope is gone by the time `d` is reached
  expect(depths).toEqual([2, 2]);
});
