import { astNaiveTraversal } from "../ast/ast-traversal";
import { AnyNode, NameableFunction, isNameableFunction } from "../ast/augmented-ast";
import { FunctionAssistant } from "../assistant/function-assistant";
import { stringifyJsFile } from "../parse";
import { FunctionTable } from "./call-graph";
import { RenamingContext } from "./renaming-context";

export interface RenameOptions {
  /** Ask for a better name for each function */
  assistant?: FunctionAssistant;
  /** Append `_xref_<number of calls>` to each name */
  xrefSuffix?: boolean;
  /** Functions whose name starts with this were named by hand */
  manualPrefix?: string;
}

export const SYNTHETIC_PREFIX = "f_e_";
export const FUNCTION_PREFIX = "f_";

function renameableFunctions(
  root: AnyNode,
  context: RenamingContext,
  manualPrefix: string
) {
  const ret: NameableFunction[] = [];
  for (const node of astNaiveTraversal(root)) {
    if (
      isNameableFunction(node) &&
      node.id &&
      !node.id.name.startsWith(manualPrefix) &&
      context.isRenameable(node)
    ) {
      ret.push(node);
    }
  }
  return ret;
}

/**
 * Give each function its final name, then make every reference follow.
 *
 * Returns the names that were replaced, old -> new.
 */
export async function renameFunctions(
  root: AnyNode,
  functions: FunctionTable,
  context: RenamingContext,
  { assistant, xrefSuffix = false, manualPrefix = "F_" }: RenameOptions = {}
): Promise<Map<string, string>> {
  const substitutions = new Map<string, string>();

  for (const fn of renameableFunctions(root, context, manualPrefix)) {
    if (!fn.id) continue;
    const name = fn.id.name;

    let candidate = name;
    if (assistant) {
      const suggestion = await assistant.suggestName(name, stringifyJsFile(fn));
      if (suggestion !== undefined) {
        const prefix = name.startsWith(SYNTHETIC_PREFIX)
          ? SYNTHETIC_PREFIX
          : FUNCTION_PREFIX;
        candidate = prefix + suggestion;
      }
    }
    if (xrefSuffix) {
      const calls = functions.get(name)?.xrefs.length ?? 0;
      candidate = `${candidate}_xref_${calls}`;
    }
    if (candidate === name) continue;

    const newName = context.inventory.claim(candidate);
    functions.rename(name, newName);
    substitutions.set(name, newName);
    fn.id.name = newName;
    context.selection.add(newName);
  }

  if (substitutions.size) {
    for (const node of astNaiveTraversal(root)) {
      if (node.type === "Identifier") {
        node.name = substitutions.get(node.name) ?? node.name;
      }
    }
  }

  return substitutions;
}
