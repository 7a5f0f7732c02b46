import { FunctionAssistant } from "../assistant/function-assistant";
import { MalformedResponseError } from "../errors";
import { stringifyJsFile } from "../parse";
import { testParse } from "../testutils";
import { AnnotateOptions, annotateFunctions, xrefCommentValue } from "./annotate-functions";
import { buildCallGraph } from "./call-graph";
import { normalizeFunctions } from "./normalize-functions";
import { uniqueifyFunctionNames } from "./uniqueify-names";

async function testAnnotate(code: string, options: AnnotateOptions = {}) {
  const { program, context } = testParse(code);
  uniqueifyFunctionNames(program, context);
  normalizeFunctions(program, context);
  await annotateFunctions(program, buildCallGraph(program), context, options);
  return program;
}

function commentingAssistant(
  response: string | undefined
): FunctionAssistant & { addComments: jest.Mock } {
  return {
    suggestName: jest.fn(async () => undefined),
    addComments: jest.fn(async () => response),
  };
}

it("formats the xref comment", () => {
  expect(
    xrefCommentValue(
      new Map([
        ["f_a", 2],
        ["f_b", 1],
      ])
    )
  ).toBe("*\n * xrefs {{{\n *   f_a: 2\n *   f_b: 1\n * }}}\n ");
});

it("lists each function's callers", async () => {
  const program = await testAnnotate(
    "function a(){ return b(); }\n// helper\nfunction b(){ return 1; }"
  );
  expect(stringifyJsFile(program)).toBe(`function f_a() {
  return f_b();
}
// helper
/**
 * xrefs {{{
 *   f_a: 1
 * }}}
 */
function f_b() {
  return 1;
}`);
});

it("counts calls per caller", async () => {
  const program = await testAnnotate(
    "function c() {}\nfunction a() { c(); c(); }\nfunction b() { c(); }"
  );
  expect(program.body[0].leadingComments?.map((c) => c.value)).toEqual([
    "*\n * xrefs {{{\n *   f_a: 2\n *   f_b: 1\n * }}}\n ",
  ]);
  expect(program.body[1].leadingComments).toBeUndefined();
});

it("can leave xrefs out", async () => {
  const program = await testAnnotate("function a() { b(); }\nfunction b() {}", {
    xrefs: false,
  });
  expect(stringifyJsFile(program)).toBe(
    "function f_a() {\n  f_b();\n}\nfunction f_b() {}"
  );
});

it("splices in the commented version of a function", async () => {
  const assistant = commentingAssistant(
    "// adds one\nfunction f_a(x) {\n  // the answer\n  return x + 1;\n}\n"
  );
  const program = await testAnnotate("function a(x) { return x + 1; }", {
    assistant,
    comments: true,
  });

  expect(assistant.addComments).toHaveBeenCalledWith(
    "f_a",
    "function f_a(x) {\n  return x + 1;\n}"
  );
  expect(stringifyJsFile(program)).toBe(`// adds one
function f_a(x) {
  // the answer
  return x + 1;
}`);
});

it("skips functions the assistant does not comment", async () => {
  const program = await testAnnotate("function a() {}", {
    assistant: commentingAssistant(undefined),
    comments: true,
  });
  expect(stringifyJsFile(program)).toBe("function f_a() {}");
});

it("does not ask for comments unless told to", async () => {
  const assistant = commentingAssistant("function f_a() {}");
  await testAnnotate("function a() {}", { assistant });
  expect(assistant.addComments).not.toHaveBeenCalled();
});

it("fails when the response has no function", async () => {
  await expect(
    testAnnotate("function a() {}", {
      assistant: commentingAssistant("sorry, no"),
      comments: true,
    })
  ).rejects.toThrow(MalformedResponseError);
  await expect(
    testAnnotate("function a() {}", {
      assistant: commentingAssistant("function f_a( {"),
      comments: true,
    })
  ).rejects.toThrow(MalformedResponseError);
});
