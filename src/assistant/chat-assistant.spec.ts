import {
  ChatAssistant,
  commentPrompt,
  commentTokenBudget,
  namePrompt,
  nameTokenBudget,
} from "./chat-assistant";

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

const code = "function f_a() {}";

it("sizes requests from the code", () => {
  expect(nameTokenBudget(code)).toBe(43);
  expect(commentTokenBudget("0123456789")).toBe(26);
});

it("asks for a name", async () => {
  const complete = jest.fn(async () => "How about\n>> `doNothing`");
  const assistant = new ChatAssistant(complete);

  expect(await assistant.suggestName("f_a", code)).toBe("doNothing");
  expect(complete).toHaveBeenCalledWith(namePrompt(code), 43);
  expect(namePrompt(code)).toContain("'>> '");
  expect(console.log).toHaveBeenCalledWith("requesting a name for f_a...");
});

it("does not ask about functions that are too big", async () => {
  const complete = jest.fn(async () => ">> never");
  const assistant = new ChatAssistant(complete, { maxTokens: 40 });

  expect(await assistant.suggestName("f_a", code)).toBeUndefined();
  expect(await assistant.addComments("f_a", code)).toBeUndefined();
  expect(complete).not.toHaveBeenCalled();
  expect(console.warn).toHaveBeenCalledTimes(1);
});

it("asks for comments", async () => {
  const complete = jest.fn(
    async () => "```javascript\n// does nothing\nfunction f_a() {}\n```"
  );
  const assistant = new ChatAssistant(complete);

  expect(await assistant.addComments("f_a", code)).toBe(
    "// does nothing\nfunction f_a() {}\n"
  );
  expect(complete).toHaveBeenCalledWith(commentPrompt(code), 44);
  expect(console.log).toHaveBeenCalledWith("requesting comments for f_a...");
});
