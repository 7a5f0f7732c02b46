import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { reportError, run } from "./cli";
import { resolveConfig } from "./config";
import { MalformedResponseError, UnmangleError } from "./errors";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "unmangle-"));
  jest.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  jest.restoreAllMocks();
  process.exitCode = undefined;
  await rm(dir, { recursive: true, force: true });
});

it("writes the unmangled file", async () => {
  const input = join(dir, "in.js");
  const output = join(dir, "out.js");
  await writeFile(input, "function a() {}\na();\n");

  await run(input, output, resolveConfig({ xrefs: false }, {}));

  expect(await readFile(output, "utf-8")).toBe("function f_a() {}\nf_a();\n");
});

it("writes nothing when the input does not parse", async () => {
  const input = join(dir, "in.js");
  const output = join(dir, "out.js");
  await writeFile(input, "function (");

  await expect(run(input, output, resolveConfig({}, {}))).rejects.toThrow(
    SyntaxError
  );
  await expect(readFile(output, "utf-8")).rejects.toThrow();
});

it("reports malformed responses with the raw response", () => {
  reportError(new MalformedResponseError("f_a", "raw text", "no marker"));

  expect(console.error).toHaveBeenNthCalledWith(
    1,
    "Unusable assistant response for f_a: no marker"
  );
  expect(console.error).toHaveBeenNthCalledWith(2, "raw text");
  expect(process.exitCode).toBe(1);
});

it("reports other errors on one line", () => {
  reportError(new UnmangleError("bad input"));
  expect(console.error).toHaveBeenCalledWith("UnmangleError: bad input");
  expect(process.exitCode).toBe(1);
});
