import { parseJsFile } from "../parse";
import { defined } from "../utils";
import { ANONYMOUS_NAME, GLOBAL_SCOPE_NAME, buildCallGraph } from "./call-graph";

function graphOf(code: string) {
  return buildCallGraph(parseJsFile(code).program);
}

it("records calls made before the declaration", () => {
  const table = graphOf(
    "function a(){ return b(); }\nfunction b(){ return 1; }"
  );
  const a = defined(table.get("a"));
  const b = defined(table.get("b"));

  expect(b.xrefs).toEqual([{ callerId: a.id, line: 1 }]);
  expect(b.discoveredByCall).toBe(true);
  expect(b.declared).toBe(true);
  expect(a.discoveredByCall).toBe(false);
  expect(a.xrefs).toEqual([]);
});

it("attributes top-level calls to the global scope", () => {
  const table = graphOf("a();\na();\nfunction a() {}");
  expect(defined(table.get("a")).xrefs).toEqual([
    { callerId: table.global.id, line: 1 },
    { callerId: table.global.id, line: 2 },
  ]);
  expect(table.global.name).toBe(GLOBAL_SCOPE_NAME);
});

it("only records calls to bare names", () => {
  const table = graphOf("obj.a(); (0, a)(); a.call(null);");
  expect(table.get("a")).toBeUndefined();
});

it("counts callers in first-seen order", () => {
  const table = graphOf(
    "function a() { c(); c(); }\nfunction b() { c(); }\nc();\nfunction c() {}"
  );
  const c = defined(table.get("c"));
  expect([...table.callersOf(c)]).toEqual([
    ["a", 2],
    ["b", 1],
    [GLOBAL_SCOPE_NAME, 1],
  ]);
});

it("gives arrow functions an anonymous record", () => {
  const table = graphOf("var g = () => h();\nvar k = (x) => { return h(x); };");
  const h = defined(table.get("h"));
  expect(h.xrefs.map((xref) => table.byId(xref.callerId).name)).toEqual([
    ANONYMOUS_NAME,
    ANONYMOUS_NAME,
  ]);
  expect(h.xrefs[0].callerId).not.toBe(h.xrefs[1].callerId);
  expect(table.get(ANONYMOUS_NAME)).toBeUndefined();
});

it("keeps calls inside nested blocks with their function", () => {
  const table = graphOf("function a() { if (x) { for (;;) { b(); } } }");
  const b = defined(table.get("b"));
  expect(table.byId(b.xrefs[0].callerId).name).toBe("a");
});

it("keeps xrefs when a record is renamed", () => {
  const table = graphOf("function a() { b(); }\nfunction b() { c(); }");
  table.rename("b", "helper");

  expect(table.get("b")).toBeUndefined();
  const helper = defined(table.get("helper"));
  expect(helper.xrefs).toHaveLength(1);
  const c = defined(table.get("c"));
  expect([...table.callersOf(c)]).toEqual([["helper", 1]]);
});
