import { FunctionNode, Program } from "../ast/augmented-ast";
import { NameInventory } from "./name-inventory";
import { FunctionSelection } from "./selection";

/** State shared by the renaming passes of one run */
export class RenamingContext {
  constructor(
    public inventory: NameInventory,
    public selection: FunctionSelection = new FunctionSelection(),
    /** Declarations whose name is part of a module's exports */
    public pinned: WeakSet<FunctionNode> = new WeakSet()
  ) {}

  static forProgram(
    program: Program,
    selection: FunctionSelection = new FunctionSelection()
  ) {
    const pinned = new WeakSet<FunctionNode>();
    for (const statement of program.body) {
      if (
        statement.type === "ExportNamedDeclaration" &&
        statement.declaration?.type === "FunctionDeclaration"
      ) {
        pinned.add(statement.declaration);
      }
    }

    return new RenamingContext(
      NameInventory.forProgram(program),
      selection,
      pinned
    );
  }

  /** Whether a pass may give this function a new name */
  isRenameable(fn: FunctionNode) {
    return !this.pinned.has(fn) && this.selection.includes(fn);
  }
}
