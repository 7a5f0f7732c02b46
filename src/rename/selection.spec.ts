import { parseJsFile } from "../parse";
import { testFindFunction } from "../testutils";
import { FunctionSelection } from "./selection";

const code = "function a() {}\nfunction b() {}\nfunction c() {}";

it("lets everything through when empty", () => {
  const selection = new FunctionSelection();
  const { program } = parseJsFile(code);
  expect(selection.isEmpty).toBe(true);
  expect(selection.includes(testFindFunction(program, "c"))).toBe(true);
});

it("selects by name and by line", () => {
  const selection = FunctionSelection.fromItems(["a", "3"]);
  const { program } = parseJsFile(code);
  expect(selection.includes(testFindFunction(program, "a"))).toBe(true);
  expect(selection.includes(testFindFunction(program, "b"))).toBe(false);
  expect(selection.includes(testFindFunction(program, "c"))).toBe(true);
});

it("follows added names", () => {
  const selection = FunctionSelection.fromItems(["a"]);
  const { program } = parseJsFile(code);
  const b = testFindFunction(program, "b");
  selection.add("b");
  expect(selection.includes(b)).toBe(true);
});
