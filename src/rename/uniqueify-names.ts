import { astPatternAssignedBindings } from "../ast/ast-traversal";
import {
  AnyNode,
  ClassDeclaration,
  FunctionDeclaration,
  FunctionNode,
  Identifier,
  NameableFunction,
  Pattern,
  Program,
  isFunction,
} from "../ast/augmented-ast";
import { Scope, currentScope, walkScoped } from "../ast/scoped-walker";
import { RenamingContext } from "./renaming-context";

export interface UniqueifyOptions {
  /** Functions whose name starts with this were named by hand */
  manualPrefix?: string;
}

interface UniqueifyContext {
  /** old name -> new name, or null where the old name is shadowed */
  substitutions: Map<string, string | null>;
  /** Identifiers that rebind a substituted name once they are reached */
  resets: Set<Identifier>;
}

type Scopes = Scope<UniqueifyContext>[];

/** The innermost entry for `name`: a new name, a tombstone, or nothing */
function lookup(scopes: Scopes, name: string): string | null | undefined {
  for (let i = scopes.length - 1; i >= 0; i--) {
    const { substitutions } = scopes[i].context;
    if (substitutions.has(name)) return substitutions.get(name);
  }
  return undefined;
}

/** Functions and classes a statement list declares, in source order */
function scopeDeclarations(
  owner: AnyNode
): Array<FunctionDeclaration | ClassDeclaration> {
  if (
    owner.type !== "Program" &&
    owner.type !== "BlockStatement" &&
    owner.type !== "StaticBlock"
  ) {
    return [];
  }
  const ret: Array<FunctionDeclaration | ClassDeclaration> = [];
  for (const statement of owner.body) {
    const declaration =
      statement.type === "ExportNamedDeclaration" ||
      statement.type === "ExportDefaultDeclaration"
        ? statement.declaration
        : statement;
    if (
      declaration?.type === "FunctionDeclaration" ||
      declaration?.type === "ClassDeclaration"
    ) {
      ret.push(declaration);
    }
  }
  return ret;
}

function boundNames(owner: AnyNode): Identifier[] {
  if (isFunction(owner)) {
    const ret: Identifier[] = [];
    for (const param of owner.params) astPatternAssignedBindings(param, ret);
    return ret;
  }
  if (owner.type === "CatchClause" && owner.param) {
    return astPatternAssignedBindings(owner.param);
  }
  return [];
}

/**
 * Give every function declaration and named function expression a name
 * nothing else in the program uses (`f_name`, `f_name2`...), and rewrite the
 * references bound to it.
 *
 * Names rebound in an inner scope (parameters, assignments, declarators,
 * classes and functions left as they are) stop being rewritten from that
 * point on.
 */
export function uniqueifyFunctionNames(
  program: Program,
  context: RenamingContext,
  { manualPrefix = "F_" }: UniqueifyOptions = {}
) {
  const hoisted = new WeakSet<FunctionDeclaration | ClassDeclaration>();
  const shorthands = new WeakMap<Identifier, { shorthand: boolean }>();

  const renames = (fn: FunctionNode) =>
    context.isRenameable(fn) && !fn.id?.name.startsWith(manualPrefix);

  /** Tombstone `name` in the current scope if an outer one substitutes it */
  const shadow = (name: string, scopes: Scopes) => {
    if (typeof lookup(scopes, name) === "string") {
      currentScope(scopes).context.substitutions.set(name, null);
    }
  };

  const subname = (fn: NameableFunction, scopes: Scopes) => {
    if (!fn.id) return;
    const oldName = fn.id.name;
    const newName = context.inventory.mintFunctionName(oldName);
    currentScope(scopes).context.substitutions.set(oldName, newName);
    fn.id.name = newName;
    context.selection.add(newName);
  };

  const resetBindings = (left: Pattern, scopes: Scopes) => {
    const { resets } = currentScope(scopes).context;
    for (const binding of astPatternAssignedBindings(left)) {
      if (typeof lookup(scopes, binding.name) === "string") {
        resets.add(binding);
      }
    }
  };

  walkScoped<UniqueifyContext>(
    program,
    { substitutions: new Map(), resets: new Set() },
    {
      enter(node, scopes) {
        const scope = currentScope(scopes);

        switch (node.type) {
          case "AssignmentExpression":
          case "AssignmentPattern": {
            resetBindings(node.left, scopes);
            scope.enqueue(node.right, node.left);
            return "skip-children";
          }
          case "VariableDeclarator": {
            resetBindings(node.id, scopes);
            scope.enqueue(node.init, node.id);
            return "skip-children";
          }
          case "MemberExpression": {
            scope.enqueue(node.object, node.computed ? node.property : null);
            return "skip-children";
          }
          case "Property": {
            if (node.shorthand) {
              const value =
                node.value.type === "AssignmentPattern"
                  ? node.value.left
                  : node.value;
              if (value.type === "Identifier") shorthands.set(value, node);
            }
            scope.enqueue(node.computed ? node.key : null, node.value);
            return "skip-children";
          }
          case "MethodDefinition":
          case "PropertyDefinition": {
            scope.enqueue(node.computed ? node.key : null, node.value);
            return "skip-children";
          }
          case "LabeledStatement": {
            scope.enqueue(node.body);
            return "skip-children";
          }
          case "BreakStatement":
          case "ContinueStatement":
          case "ImportDeclaration":
          case "ExportAllDeclaration":
          case "MetaProperty": {
            return "skip-children";
          }
          case "ExportNamedDeclaration": {
            // Re-exports name another module's bindings
            return node.source ? "skip-children" : "continue";
          }
          case "ExportSpecifier": {
            if (node.exported === node.local) {
              node.exported = { ...node.local };
            }
            scope.enqueue(node.local);
            return "skip-children";
          }
          case "FunctionDeclaration": {
            if (hoisted.has(node)) return "continue";
            if (renames(node)) {
              subname(node, scopes);
            } else if (node.id) {
              shadow(node.id.name, scopes);
            }
            return "continue";
          }
          case "Identifier": {
            const { resets, substitutions } = scope.context;
            if (resets.has(node)) {
              resets.delete(node);
              substitutions.set(node.name, null);
              return "continue";
            }
            const newName = lookup(scopes, node.name);
            if (typeof newName === "string") {
              node.name = newName;
              const property = shorthands.get(node);
              if (property) property.shorthand = false;
            }
            return "continue";
          }
          default: {
            return "continue";
          }
        }
      },

      enterScope(owner, scopes) {
        const scope = currentScope(scopes);
        scope.context = { substitutions: new Map(), resets: new Set() };

        for (const declaration of scopeDeclarations(owner)) {
          if (declaration.type === "FunctionDeclaration" && renames(declaration)) {
            hoisted.add(declaration);
            subname(declaration, scopes);
          } else if (declaration.id) {
            hoisted.add(declaration);
            shadow(declaration.id.name, scopes);
          }
        }

        if (
          (owner.type === "FunctionExpression" ||
            owner.type === "ClassExpression") &&
          owner.id
        ) {
          if (owner.type === "FunctionExpression" && renames(owner)) {
            subname(owner, scopes);
          } else {
            shadow(owner.id.name, scopes);
          }
        }

        for (const param of boundNames(owner)) shadow(param.name, scopes);

        return "continue";
      },
    }
  );
}
