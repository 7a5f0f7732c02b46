import { FunctionAssistant } from "./assistant/function-assistant";
import { Options as ParseOptions, parseJsFile, stringifyJsFile } from "./parse";
import { annotateFunctions } from "./rename/annotate-functions";
import { attachComments } from "./rename/attach-comments";
import { buildCallGraph } from "./rename/call-graph";
import { normalizeFunctions } from "./rename/normalize-functions";
import { renameFunctions } from "./rename/rename-functions";
import { RenamingContext } from "./rename/renaming-context";
import { FunctionSelection } from "./rename/selection";
import { uniqueifyFunctionNames } from "./rename/uniqueify-names";

export interface UnmangleOptions extends ParseOptions {
  /** Function names and 1-based lines to restrict renaming and annotation to */
  only?: string[];
  /** Used for names when `aiNames` is set, and comments when `aiComments` is */
  assistant?: FunctionAssistant;
  aiNames?: boolean;
  aiComments?: boolean;
  xrefs?: boolean;
  xrefSuffix?: boolean;
  manualPrefix?: string;
}

/** Rename and annotate the functions of a program, returning the new code */
export async function unmangle(
  source: string,
  {
    only = [],
    assistant,
    aiNames = false,
    aiComments = false,
    xrefs = true,
    xrefSuffix = false,
    manualPrefix = "F_",
    ...parseOptions
  }: UnmangleOptions = {}
): Promise<string> {
  const { program, comments } = parseJsFile(source, parseOptions);
  attachComments(program, comments);

  const context = RenamingContext.forProgram(
    program,
    FunctionSelection.fromItems(only)
  );
  uniqueifyFunctionNames(program, context, { manualPrefix });
  normalizeFunctions(program, context);

  const functions = buildCallGraph(program);
  await renameFunctions(program, functions, context, {
    assistant: aiNames ? assistant : undefined,
    xrefSuffix,
    manualPrefix,
  });
  await annotateFunctions(program, functions, context, {
    assistant,
    comments: aiComments,
    xrefs,
  });

  return stringifyJsFile(program);
}
