import { walkScoped } from "../ast/scoped-walker";
import { AnyNode } from "../ast/augmented-ast";

/**
 * Every identifier and label name a program uses.
 *
 * Names only get added: anything minted here is taken for the rest of the
 * run, so later passes can never reintroduce a collision.
 */
export class NameInventory {
  #names: Set<string>;
  /** Next number to try for synthetic function names */
  #syntheticCounter = 0;

  constructor(names: Iterable<string> = []) {
    this.#names = new Set(names);
  }

  static forProgram(program: AnyNode) {
    const ret = new NameInventory();

    walkScoped(
      program,
      {},
      {
        enter(node) {
          if (node.type === "Identifier") {
            ret.add(node.name);
          } else if (node.type === "LabeledStatement") {
            ret.add(node.label.name);
          }
          return "continue";
        },
      }
    );

    return ret;
  }

  has(name: string) {
    return this.#names.has(name);
  }

  add(name: string) {
    this.#names.add(name);
  }

  get size() {
    return this.#names.size;
  }

  /** `f_name`, then `f_name2`, `f_name3`... */
  mintFunctionName(name: string, prefix = "f_") {
    let ret = prefix + name;
    let num = 1;
    while (this.has(ret)) {
      num++;
      ret = prefix + name + num;
    }
    this.add(ret);
    return ret;
  }

  /** `f_e_0`, `f_e_1`... for functions that had no name at all */
  mintSynthetic(prefix = "f_e_") {
    let ret;
    do {
      ret = prefix + this.#syntheticCounter++;
    } while (this.has(ret));
    this.add(ret);
    return ret;
  }

  /** `candidate`, or `candidate_2`, `candidate_3`... if it is taken */
  claim(candidate: string) {
    let ret = candidate;
    let num = 1;
    while (this.has(ret)) {
      num++;
      ret = `${candidate}_${num}`;
    }
    this.add(ret);
    return ret;
  }
}
