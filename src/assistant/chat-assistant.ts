import { FunctionAssistant } from "./function-assistant";
import { NAME_MARKER, parseCodeResponse, parseNameResponse } from "./responses";

/** Send one user message, get the model's answer */
export type ChatCompletion = (
  prompt: string,
  maxTokens: number
) => Promise<string>;

export interface ChatAssistantOptions {
  /** Requests needing a longer response than this are not sent */
  maxTokens?: number;
}

export function nameTokenBudget(code: string) {
  return Math.floor(code.length * 1.4 + 20);
}

export function commentTokenBudget(code: string) {
  return Math.floor(code.length * 2.6);
}

export function namePrompt(code: string) {
  return (
    "Can you please suggest a better name for the following JavaScript function? " +
    `Please precede the suggested name with '${NAME_MARKER}'.\n${code}\n`
  );
}

export function commentPrompt(code: string) {
  return (
    "Can you please add comments to the following JavaScript function? " +
    "Include a few line comments and a header with a general description of the function, " +
    "arguments, and return value. Don't comment every line, and please ignore any nested functions.\n" +
    `${code}\n`
  );
}

/** A FunctionAssistant talking to a chat model */
export class ChatAssistant implements FunctionAssistant {
  maxTokens: number;

  constructor(
    private complete: ChatCompletion,
    { maxTokens = 8192 }: ChatAssistantOptions = {}
  ) {
    this.maxTokens = maxTokens;
  }

  async suggestName(name: string, code: string) {
    const budget = nameTokenBudget(code);
    if (budget > this.maxTokens) {
      console.warn(`Warning: ${name} is too big for a name suggestion`);
      return undefined;
    }
    console.log(`requesting a name for ${name}...`);
    const response = await this.complete(namePrompt(code), budget);
    return parseNameResponse(name, response);
  }

  async addComments(name: string, code: string) {
    const budget = commentTokenBudget(code);
    if (budget > this.maxTokens) return undefined;
    console.log(`requesting comments for ${name}...`);
    const response = await this.complete(commentPrompt(code), budget);
    return parseCodeResponse(name, response);
  }
}
