import { stringifyJsFile } from "../parse";
import { testParse } from "../testutils";
import { normalizeFunctions } from "./normalize-functions";

function testNormalize(code: string, only: string[] = []) {
  const { program, context } = testParse(code, only);
  normalizeFunctions(program, context);
  return stringifyJsFile(program);
}

it("turns arrow functions into named function expressions", () => {
  expect(testNormalize("var g = (x) => x + 1;")).toBe(
    "var g = function f_e_0(x) {\n  return x + 1;\n};"
  );
  expect(testNormalize("var h = async () => { await x; };")).toBe(
    "var h = async function f_e_0() {\n  await x;\n};"
  );
});

it("names anonymous functions", () => {
  expect(testNormalize("setTimeout(function () { return 1; });")).toBe(
    "setTimeout(function f_e_0() {\n  return 1;\n});"
  );
  expect(testNormalize("export default function () {}")).toBe(
    "export default function f_e_0() {}"
  );
});

it("numbers synthetic names in traversal order, skipping taken ones", () => {
  expect(
    testNormalize("var f_e_0 = () => 1;\nvar b = function () { return () => 2; };")
  ).toBe(`var f_e_0 = function f_e_1() {
  return 1;
};
var b = function f_e_2() {
  return function f_e_3() {
    return 2;
  };
};`);
});

it("changes nothing the second time", () => {
  const { program, context } = testParse("var g = (x) => x + 1;\nvar k = function () {};");
  normalizeFunctions(program, context);
  const once = stringifyJsFile(program);
  normalizeFunctions(program, context);
  expect(stringifyJsFile(program)).toBe(once);
  expect(context.inventory.has("f_e_2")).toBe(false);
});

it("only touches selected functions", () => {
  expect(testNormalize("var a = () => 1;\nvar b = () => 2;", ["2"])).toBe(
    "var a = () => 1;\nvar b = function f_e_0() {\n  return 2;\n};"
  );
});

it("leaves named functions alone", () => {
  expect(testNormalize("function a() {}\nvar b = function c() {};")).toBe(
    "function a() {}\nvar b = function c() {};"
  );
});
