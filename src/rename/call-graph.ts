import invariant from "tiny-invariant";
import { AnyNode, isFunction } from "../ast/augmented-ast";
import { currentScope, walkScoped } from "../ast/scoped-walker";
import { defined } from "../utils";

export const GLOBAL_SCOPE_NAME = "<global>";
export const ANONYMOUS_NAME = "<anonymous>";

/** One call site: `callerId` called the function on `line` */
export interface Xref {
  callerId: number;
  line: number;
}

export interface FunctionRecord {
  id: number;
  name: string;
  xrefs: Xref[];
  /** Created when a call to it was seen before its declaration */
  discoveredByCall: boolean;
  declared: boolean;
}

/**
 * Arena of function records. Records are addressed by id, which never
 * changes, and looked up by their current name.
 */
export class FunctionTable {
  #records: FunctionRecord[] = [];
  #byName = new Map<string, number>();

  readonly global: FunctionRecord;

  constructor() {
    this.global = this.#create(GLOBAL_SCOPE_NAME, { declared: true });
  }

  #create(
    name: string,
    { declared = false, discoveredByCall = false, keyed = true } = {}
  ) {
    const record: FunctionRecord = {
      id: this.#records.length,
      name,
      xrefs: [],
      discoveredByCall,
      declared,
    };
    this.#records.push(record);
    if (keyed) this.#byName.set(name, record.id);
    return record;
  }

  get(name: string): FunctionRecord | undefined {
    const id = this.#byName.get(name);
    return id === undefined ? undefined : this.#records[id];
  }

  byId(id: number): FunctionRecord {
    return defined(this.#records[id]);
  }

  /** The record a call to `name` lands on */
  callee(name: string) {
    return this.get(name) ?? this.#create(name, { discoveredByCall: true });
  }

  /** The record for a function whose declaration was just reached */
  declare(name: string | undefined) {
    if (name === undefined) {
      return this.#create(ANONYMOUS_NAME, { declared: true, keyed: false });
    }
    const existing = this.get(name);
    if (existing && !existing.declared) {
      existing.declared = true;
      return existing;
    }
    // A second function with the same name gets a record of its own.
    // Calls keep going to the name's first record.
    return existing
      ? this.#create(name, { declared: true, keyed: false })
      : this.#create(name, { declared: true });
  }

  /** Re-key a record under a new name. Its xrefs stay where they are. */
  rename(oldName: string, newName: string) {
    const record = this.get(oldName) ?? this.#create(oldName);
    invariant(
      !this.#byName.has(newName) || this.#byName.get(newName) === record.id,
      `function ${newName} already exists`
    );
    this.#byName.delete(oldName);
    record.name = newName;
    this.#byName.set(newName, record.id);
    return record;
  }

  /** Callers of `record` with their call counts, in first-seen order */
  callersOf(record: FunctionRecord): Map<string, number> {
    const ret = new Map<string, number>();
    for (const { callerId } of record.xrefs) {
      const { name } = this.byId(callerId);
      ret.set(name, (ret.get(name) ?? 0) + 1);
    }
    return ret;
  }
}

/** Record every direct call (`name(...)`) and the function it was made from */
export function buildCallGraph(program: AnyNode): FunctionTable {
  const table = new FunctionTable();

  walkScoped(
    program,
    { current: table.global },
    {
      enter(node, scopes) {
        if (
          node.type === "CallExpression" &&
          node.callee.type === "Identifier"
        ) {
          const { current } = currentScope(scopes).context;
          table.callee(node.callee.name).xrefs.push({
            callerId: current.id,
            line: node.loc.start.line,
          });
        }
        return "continue";
      },
      enterScope(owner, scopes) {
        if (isFunction(owner)) {
          currentScope(scopes).context.current = table.declare(
            owner.type === "ArrowFunctionExpression" ? undefined : owner.id?.name
          );
        }
        return "continue";
      },
    }
  );

  return table;
}
