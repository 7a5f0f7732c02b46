#!/usr/bin/env node
import { Command } from "commander";
import { readFile, writeFile } from "fs/promises";
import { ChatAssistant } from "./assistant/chat-assistant";
import { createOpenAIChat } from "./assistant/openai-chat";
import { UnmangleConfig, resolveConfig, usesAssistant } from "./config";
import { MalformedResponseError } from "./errors";
import { unmangle } from "./unmangle";

interface CliOptions {
  aiNames?: boolean;
  aiComments?: boolean;
  xrefs: boolean;
  xrefSuffix?: boolean;
  manualPrefix?: string;
  only?: string[];
  model?: string;
  maxTokens?: number;
}

function parseTokens(value: string) {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : NaN;
}

export async function run(input: string, output: string, config: UnmangleConfig) {
  const source = await readFile(input, "utf-8");

  const assistant = usesAssistant(config)
    ? new ChatAssistant(createOpenAIChat(config), {
        maxTokens: config.maxTokens,
      })
    : undefined;

  const result = await unmangle(source, {
    sourceFile: input,
    only: config.only,
    assistant,
    aiNames: config.aiNames,
    aiComments: config.aiComments,
    xrefs: config.xrefs,
    xrefSuffix: config.xrefSuffix,
    manualPrefix: config.manualPrefix,
  });

  await writeFile(output, result + "\n");
}

export function reportError(error: unknown) {
  if (error instanceof MalformedResponseError) {
    console.error(error.message);
    console.error(error.response);
  } else if (error instanceof Error) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error(String(error));
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name("unmangle")
  .description("Give the functions of minified JavaScript unique, readable names")
  .argument("<input>", "JavaScript file to read")
  .argument("<output>", "where to write the result")
  .option("--ai-names", "ask the assistant for function names")
  .option("--ai-comments", "ask the assistant to comment each function")
  .option("--no-xrefs", "do not list each function's callers")
  .option("--xref-suffix", "append _xref_<calls> to function names")
  .option("--manual-prefix <prefix>", "leave functions starting with this alone")
  .option("--only <items...>", "function names or lines to restrict the run to")
  .option("--model <model>", "chat model to use")
  .option("--max-tokens <n>", "largest response to ask for", parseTokens)
  .action(async (input: string, output: string, options: CliOptions) => {
    try {
      await run(input, output, resolveConfig(options));
    } catch (e) {
      reportError(e);
    }
  });

if (require.main === module) {
  program.parseAsync().catch(reportError);
}
