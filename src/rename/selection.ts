import { FunctionNode } from "../ast/augmented-ast";

/**
 * The functions a run is restricted to, by name or by 1-based line of the
 * function's start. An empty selection lets every function through.
 */
export class FunctionSelection {
  #names: Set<string>;
  #lines: Set<number>;

  constructor(names: Iterable<string> = [], lines: Iterable<number> = []) {
    this.#names = new Set(names);
    this.#lines = new Set(lines);
  }

  /** Parse `--only` items: numbers are lines, anything else is a name */
  static fromItems(items: Iterable<string>) {
    const names: string[] = [];
    const lines: number[] = [];
    for (const item of items) {
      if (/^\d+$/.test(item)) lines.push(Number(item));
      else names.push(item);
    }
    return new FunctionSelection(names, lines);
  }

  get isEmpty() {
    return this.#names.size === 0 && this.#lines.size === 0;
  }

  includes(fn: FunctionNode): boolean {
    if (this.isEmpty) return true;
    if (this.#lines.has(fn.loc.start.line)) return true;
    return fn.id != null && this.#names.has(fn.id.name);
  }

  /** Keep a function selected after it got a new name */
  add(name: string) {
    if (!this.isEmpty) this.#names.add(name);
  }
}
