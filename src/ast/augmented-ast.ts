// Shaped after acorn's type defs
// Search for "AUGMENTED" to find changes

export interface Position {
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

export interface SourceLocation {
  source?: string | null;
  start: Position;
  end: Position;
}

// AUGMENTED: comments are first-class, they get attached to nodes
export interface Comment {
  type: "Line" | "Block";
  value: string;
  start: number;
  end: number;
  range: [number, number];
  loc: SourceLocation;
}

export interface Node {
  type: string;
  start: number;
  end: number;
  range: [number, number]; // AUGMENTED: we always parse with `ranges`
  loc: SourceLocation; // AUGMENTED: we always parse with `locations`
  leadingComments?: Comment[]; // AUGMENTED
  trailingComments?: Comment[]; // AUGMENTED
}

export interface Identifier extends Node {
  type: "Identifier";
  name: string;
}

export interface Literal extends Node {
  type: "Literal";
  value?: string | boolean | null | number | RegExp | bigint;
  raw?: string;
  regex?: {
    pattern: string;
    flags: string;
  };
  bigint?: string;
}

export interface Program extends Node {
  type: "Program";
  body: Array<Statement | ModuleDeclaration>;
  sourceType: "script" | "module";
}

interface IFunction extends Node {
  id?: Identifier | null;
  params: Array<Pattern>;
  generator: boolean;
  expression: boolean;
  async: boolean;
}

export interface FunctionDeclaration extends IFunction {
  type: "FunctionDeclaration";
  id: Identifier | null; // AUGMENTED: `export default function () {}` is folded in here
  body: BlockStatement;
}

export interface FunctionExpression extends IFunction {
  type: "FunctionExpression";
  body: BlockStatement;
}

export interface ArrowFunctionExpression extends IFunction {
  type: "ArrowFunctionExpression";
  body: BlockStatement | Expression;
}

// AUGMENTED: everything that opens a function scope
export type FunctionNode =
  | FunctionDeclaration
  | FunctionExpression
  | ArrowFunctionExpression;

// AUGMENTED: functions that can carry a name
export type NameableFunction = FunctionDeclaration | FunctionExpression;

export interface ExpressionStatement extends Node {
  type: "ExpressionStatement";
  expression: Expression;
  directive?: string;
}

export interface BlockStatement extends Node {
  type: "BlockStatement";
  body: Array<Statement>;
}

export interface EmptyStatement extends Node {
  type: "EmptyStatement";
}

export interface DebuggerStatement extends Node {
  type: "DebuggerStatement";
}

export interface WithStatement extends Node {
  type: "WithStatement";
  object: Expression;
  body: Statement;
}

export interface ReturnStatement extends Node {
  type: "ReturnStatement";
  argument?: Expression | null;
}

export interface LabeledStatement extends Node {
  type: "LabeledStatement";
  label: Identifier;
  body: Statement;
}

export interface BreakStatement extends Node {
  type: "BreakStatement";
  label?: Identifier | null;
}

export interface ContinueStatement extends Node {
  type: "ContinueStatement";
  label?: Identifier | null;
}

export interface IfStatement extends Node {
  type: "IfStatement";
  test: Expression;
  consequent: Statement;
  alternate?: Statement | null;
}

export interface SwitchStatement extends Node {
  type: "SwitchStatement";
  discriminant: Expression;
  cases: Array<SwitchCase>;
}

export interface SwitchCase extends Node {
  type: "SwitchCase";
  test?: Expression | null;
  consequent: Array<Statement>;
}

export interface ThrowStatement extends Node {
  type: "ThrowStatement";
  argument: Expression;
}

export interface TryStatement extends Node {
  type: "TryStatement";
  block: BlockStatement;
  handler?: CatchClause | null;
  finalizer?: BlockStatement | null;
}

export interface CatchClause extends Node {
  type: "CatchClause";
  param?: Pattern | null;
  body: BlockStatement;
}

export interface WhileStatement extends Node {
  type: "WhileStatement";
  test: Expression;
  body: Statement;
}

export interface DoWhileStatement extends Node {
  type: "DoWhileStatement";
  body: Statement;
  test: Expression;
}

export interface ForStatement extends Node {
  type: "ForStatement";
  init?: VariableDeclaration | Expression | null;
  test?: Expression | null;
  update?: Expression | null;
  body: Statement;
}

export interface ForInStatement extends Node {
  type: "ForInStatement";
  left: VariableDeclaration | Pattern;
  right: Expression;
  body: Statement;
}

export interface ForOfStatement extends Node {
  type: "ForOfStatement";
  left: VariableDeclaration | Pattern;
  right: Expression;
  body: Statement;
  await: boolean;
}

export interface VariableDeclaration extends Node {
  type: "VariableDeclaration";
  declarations: Array<VariableDeclarator>;
  kind: "var" | "let" | "const";
}

export interface VariableDeclarator extends Node {
  type: "VariableDeclarator";
  id: Pattern;
  init?: Expression | null;
}

export interface ThisExpression extends Node {
  type: "ThisExpression";
}

export interface ArrayExpression extends Node {
  type: "ArrayExpression";
  elements: Array<Expression | SpreadElement | null>;
}

export interface ObjectExpression extends Node {
  type: "ObjectExpression";
  properties: Array<Property | SpreadElement>;
}

export interface Property extends Node {
  type: "Property";
  key: Expression | PrivateIdentifier;
  value: Expression;
  kind: "init" | "get" | "set";
  method: boolean;
  shorthand: boolean;
  computed: boolean;
}

export interface UnaryExpression extends Node {
  type: "UnaryExpression";
  operator: UnaryOperator;
  prefix: boolean;
  argument: Expression;
}

export type UnaryOperator =
  | "-"
  | "+"
  | "!"
  | "~"
  | "typeof"
  | "void"
  | "delete";

export interface UpdateExpression extends Node {
  type: "UpdateExpression";
  operator: "++" | "--";
  argument: Expression;
  prefix: boolean;
}

export interface BinaryExpression extends Node {
  type: "BinaryExpression";
  operator: string;
  left: Expression | PrivateIdentifier;
  right: Expression;
}

export interface AssignmentExpression extends Node {
  type: "AssignmentExpression";
  operator: string;
  left: Pattern;
  right: Expression;
}

export interface LogicalExpression extends Node {
  type: "LogicalExpression";
  operator: "||" | "&&" | "??";
  left: Expression;
  right: Expression;
}

export interface MemberExpression extends Node {
  type: "MemberExpression";
  object: Expression | Super;
  property: Expression | PrivateIdentifier;
  computed: boolean;
  optional: boolean;
}

export interface ConditionalExpression extends Node {
  type: "ConditionalExpression";
  test: Expression;
  alternate: Expression;
  consequent: Expression;
}

export interface CallExpression extends Node {
  type: "CallExpression";
  callee: Expression | Super;
  arguments: Array<Expression | SpreadElement>;
  optional: boolean;
}

export interface NewExpression extends Node {
  type: "NewExpression";
  callee: Expression;
  arguments: Array<Expression | SpreadElement>;
}

export interface SequenceExpression extends Node {
  type: "SequenceExpression";
  expressions: Array<Expression>;
}

export interface Super extends Node {
  type: "Super";
}

export interface SpreadElement extends Node {
  type: "SpreadElement";
  argument: Expression;
}

export interface YieldExpression extends Node {
  type: "YieldExpression";
  argument?: Expression | null;
  delegate: boolean;
}

export interface TemplateLiteral extends Node {
  type: "TemplateLiteral";
  quasis: Array<TemplateElement>;
  expressions: Array<Expression>;
}

export interface TaggedTemplateExpression extends Node {
  type: "TaggedTemplateExpression";
  tag: Expression;
  quasi: TemplateLiteral;
}

export interface TemplateElement extends Node {
  type: "TemplateElement";
  tail: boolean;
  value: {
    cooked?: string | null;
    raw: string;
  };
}

export interface AssignmentProperty extends Node {
  type: "Property";
  key: Expression;
  value: Pattern;
  kind: "init";
  method: false;
  shorthand: boolean;
  computed: boolean;
}

export interface ObjectPattern extends Node {
  type: "ObjectPattern";
  properties: Array<AssignmentProperty | RestElement>;
}

export interface ArrayPattern extends Node {
  type: "ArrayPattern";
  elements: Array<Pattern | null>;
}

export interface RestElement extends Node {
  type: "RestElement";
  argument: Pattern;
}

export interface AssignmentPattern extends Node {
  type: "AssignmentPattern";
  left: Pattern;
  right: Expression;
}

interface IClass extends Node {
  id?: Identifier | null;
  superClass?: Expression | null;
  body: ClassBody;
}

export interface ClassDeclaration extends IClass {
  type: "ClassDeclaration";
}

export interface ClassExpression extends IClass {
  type: "ClassExpression";
}

export interface ClassBody extends Node {
  type: "ClassBody";
  body: Array<MethodDefinition | PropertyDefinition | StaticBlock>;
}

export interface MethodDefinition extends Node {
  type: "MethodDefinition";
  key: Expression | PrivateIdentifier;
  value: FunctionExpression;
  kind: "constructor" | "method" | "get" | "set";
  computed: boolean;
  static: boolean;
}

export interface PropertyDefinition extends Node {
  type: "PropertyDefinition";
  key: Expression | PrivateIdentifier;
  value?: Expression | null;
  computed: boolean;
  static: boolean;
}

export interface PrivateIdentifier extends Node {
  type: "PrivateIdentifier";
  name: string;
}

export interface StaticBlock extends Node {
  type: "StaticBlock";
  body: Array<Statement>;
}

export interface MetaProperty extends Node {
  type: "MetaProperty";
  meta: Identifier;
  property: Identifier;
}

export interface ImportDeclaration extends Node {
  type: "ImportDeclaration";
  specifiers: Array<
    ImportSpecifier | ImportDefaultSpecifier | ImportNamespaceSpecifier
  >;
  source: Literal;
  attributes?: Array<ImportAttribute>;
}

export interface ImportSpecifier extends Node {
  type: "ImportSpecifier";
  imported: Identifier | Literal;
  local: Identifier;
}

export interface ImportDefaultSpecifier extends Node {
  type: "ImportDefaultSpecifier";
  local: Identifier;
}

export interface ImportNamespaceSpecifier extends Node {
  type: "ImportNamespaceSpecifier";
  local: Identifier;
}

export interface ImportAttribute extends Node {
  type: "ImportAttribute";
  key: Identifier | Literal;
  value: Literal;
}

export interface ExportNamedDeclaration extends Node {
  type: "ExportNamedDeclaration";
  declaration?: Declaration | null;
  specifiers: Array<ExportSpecifier>;
  source?: Literal | null;
}

export interface ExportSpecifier extends Node {
  type: "ExportSpecifier";
  exported: Identifier | Literal;
  local: Identifier | Literal;
}

export interface ExportDefaultDeclaration extends Node {
  type: "ExportDefaultDeclaration";
  declaration: FunctionDeclaration | ClassDeclaration | Expression;
}

export interface ExportAllDeclaration extends Node {
  type: "ExportAllDeclaration";
  source: Literal;
  exported?: Identifier | Literal | null;
}

export interface AwaitExpression extends Node {
  type: "AwaitExpression";
  argument: Expression;
}

export interface ChainExpression extends Node {
  type: "ChainExpression";
  expression: MemberExpression | CallExpression;
}

export interface ImportExpression extends Node {
  type: "ImportExpression";
  source: Expression;
}

export interface ParenthesizedExpression extends Node {
  type: "ParenthesizedExpression";
  expression: Expression;
}

export type Statement =
  | ExpressionStatement
  | BlockStatement
  | EmptyStatement
  | DebuggerStatement
  | WithStatement
  | ReturnStatement
  | LabeledStatement
  | BreakStatement
  | ContinueStatement
  | IfStatement
  | SwitchStatement
  | ThrowStatement
  | TryStatement
  | WhileStatement
  | DoWhileStatement
  | ForStatement
  | ForInStatement
  | ForOfStatement
  | Declaration;

export type Declaration =
  | FunctionDeclaration
  | VariableDeclaration
  | ClassDeclaration;

export type Expression =
  | Identifier
  | Literal
  | ThisExpression
  | ArrayExpression
  | ObjectExpression
  | FunctionExpression
  | UnaryExpression
  | UpdateExpression
  | BinaryExpression
  | AssignmentExpression
  | LogicalExpression
  | MemberExpression
  | ConditionalExpression
  | CallExpression
  | NewExpression
  | SequenceExpression
  | ArrowFunctionExpression
  | YieldExpression
  | TemplateLiteral
  | TaggedTemplateExpression
  | ClassExpression
  | MetaProperty
  | AwaitExpression
  | ChainExpression
  | ImportExpression
  | ParenthesizedExpression;

export type Pattern =
  | Identifier
  | MemberExpression
  | ObjectPattern
  | ArrayPattern
  | RestElement
  | AssignmentPattern;

export type ModuleDeclaration =
  | ImportDeclaration
  | ExportNamedDeclaration
  | ExportDefaultDeclaration
  | ExportAllDeclaration;

export type AnyNode =
  | Statement
  | Expression
  | Declaration
  | ModuleDeclaration
  | Program
  | SwitchCase
  | CatchClause
  | Property
  | Super
  | SpreadElement
  | TemplateElement
  | AssignmentProperty
  | ObjectPattern
  | ArrayPattern
  | RestElement
  | AssignmentPattern
  | ClassBody
  | MethodDefinition
  | PropertyDefinition
  | PrivateIdentifier
  | StaticBlock
  | MetaProperty
  | ImportSpecifier
  | ImportDefaultSpecifier
  | ImportNamespaceSpecifier
  | ImportAttribute
  | ExportSpecifier
  | VariableDeclarator;

// AUGMENTED: nodes whose `body` is a list of statements
export type StatementListHaver = Program | BlockStatement | StaticBlock;

export const isFunction = (node: AnyNode): node is FunctionNode =>
  node.type === "FunctionDeclaration" ||
  node.type === "FunctionExpression" ||
  node.type === "ArrowFunctionExpression";

export const isNameableFunction = (node: AnyNode): node is NameableFunction =>
  node.type === "FunctionDeclaration" || node.type === "FunctionExpression";

export const isStatementListHaver = (
  node: AnyNode
): node is StatementListHaver =>
  node.type === "Program" ||
  node.type === "BlockStatement" ||
  node.type === "StaticBlock";
