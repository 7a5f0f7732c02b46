export { unmangle, UnmangleOptions } from "./unmangle";
export { parseJsFile, stringifyJsFile } from "./parse";
export { attachComments } from "./rename/attach-comments";
export { NameInventory } from "./rename/name-inventory";
export { FunctionSelection } from "./rename/selection";
export { RenamingContext } from "./rename/renaming-context";
export {
  buildCallGraph,
  FunctionTable,
  FunctionRecord,
  Xref,
} from "./rename/call-graph";
export { uniqueifyFunctionNames } from "./rename/uniqueify-names";
export { normalizeFunctions } from "./rename/normalize-functions";
export { renameFunctions, RenameOptions } from "./rename/rename-functions";
export { annotateFunctions, AnnotateOptions } from "./rename/annotate-functions";
export { walkScoped, Scope, WalkAction } from "./ast/scoped-walker";
export { FunctionAssistant } from "./assistant/function-assistant";
export { ChatAssistant, ChatCompletion } from "./assistant/chat-assistant";
export { createOpenAIChat } from "./assistant/openai-chat";
export { UnmangleConfig, resolveConfig } from "./config";
export { UnmangleError, MalformedResponseError } from "./errors";
