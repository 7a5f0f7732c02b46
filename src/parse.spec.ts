import { guessSourceType, parseJsFile, stringifyJsFile } from "./parse";
import { astMakeBlockComment } from "./ast/ast-make";
import { testFindFunction, testParse } from "./testutils";

it("parses with locations and collects comments", () => {
  const { program, comments } = parseJsFile("a();\n/* b */ c(); // d", {
    sourceFile: "input.js",
  });

  expect(program.body).toHaveLength(2);
  expect(program.body[1].loc.start).toEqual({ line: 2, column: 8 });
  expect(program.body[1].range).toEqual([13, 17]);
  expect(comments.map((c) => [c.type, c.value, c.loc.start.line])).toEqual([
    ["Block", " b ", 2],
    ["Line", " d", 2],
  ]);
  expect(comments[0].loc.source).toBe("input.js");
});

it("guesses the source type", () => {
  expect(guessSourceType("export default 1")).toBe("module");
  expect(guessSourceType("import('x')")).toBe("module");
  expect(guessSourceType("var exported = 1")).toBe("script");
});

it("prints code", () => {
  const { program } = parseJsFile("function a(){return 1}");
  expect(stringifyJsFile(program)).toBe("function a() {\n  return 1;\n}");
});

it("prints leading and trailing comments where they are attached", () => {
  const { program } = testParse("/* header */\nfoo(); // trailing\nbar();");
  expect(stringifyJsFile(program)).toBe(
    "/* header */\nfoo(); // trailing\nbar();"
  );
});

it("prints comments of nested statements at their indentation", () => {
  const { program } = testParse(
    "function f() {\n  // first\n  a();\n  b();\n}"
  );
  expect(stringifyJsFile(program)).toBe(
    "function f() {\n  // first\n  a();\n  b();\n}"
  );
});

it("prints comments held by a function's name before the function", () => {
  const { program } = parseJsFile("function a() {}");
  const { id } = testFindFunction(program, "a");
  if (!id) throw new Error("unreachable");
  id.trailingComments = [astMakeBlockComment(" name ", id)];
  expect(stringifyJsFile(program)).toBe("/* name */\nfunction a() {}");
});
