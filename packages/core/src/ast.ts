/**
 * Lode syntax tree node definitions.
 *
 * The front end (parser and checker) produces these nodes; the interpreter
 * only consumes them and trusts that they were validated.
 */
import type { IntegerKind } from "./integers.js";
import type { CompositeKind, FunctionType, StaticType } from "./types.js";

export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  file?: string;
  start: Position;
  end: Position;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Literals ---
export interface BoolExpression extends BaseNode {
  kind: "BoolExpression";
  value: boolean;
}

export interface NilExpression extends BaseNode {
  kind: "NilExpression";
}

export interface IntegerExpression extends BaseNode {
  kind: "IntegerExpression";
  value: bigint;
  integerKind: IntegerKind;
}

export interface StringExpression extends BaseNode {
  kind: "StringExpression";
  value: string;
}

export type Literal = BoolExpression | NilExpression | IntegerExpression | StringExpression;

// --- Identifiers & access ---
export interface IdentifierExpression extends BaseNode {
  kind: "IdentifierExpression";
  identifier: string;
}

export interface MemberExpression extends BaseNode {
  kind: "MemberExpression";
  expression: Expr;
  identifier: string;
  optional: boolean; // `a?.b`
}

export interface IndexExpression extends BaseNode {
  kind: "IndexExpression";
  targetExpression: Expr;
  indexingExpression: Expr;
}

// --- Collections ---
export interface ArrayExpression extends BaseNode {
  kind: "ArrayExpression";
  values: Expr[];
}

export interface DictionaryEntry {
  key: Expr;
  value: Expr;
}

export interface DictionaryExpression extends BaseNode {
  kind: "DictionaryExpression";
  entries: DictionaryEntry[];
}

// --- Operators ---
export type BinaryOperation =
  | "+" | "-" | "*" | "/" | "%"
  | "==" | "!=" | "<" | "<=" | ">" | ">="
  | "&&" | "||" | "??" | "&";

export interface BinaryExpression extends BaseNode {
  kind: "BinaryExpression";
  operation: BinaryOperation;
  left: Expr;
  right: Expr;
}

// `<-` marks a move of the operand
export type UnaryOperation = "-" | "!" | "<-";

export interface UnaryExpression extends BaseNode {
  kind: "UnaryExpression";
  operation: UnaryOperation;
  expression: Expr;
}

export interface ForceExpression extends BaseNode {
  kind: "ForceExpression";
  expression: Expr;
}

export interface ConditionalExpression extends BaseNode {
  kind: "ConditionalExpression";
  test: Expr;
  then: Expr;
  else: Expr;
}

// --- Functions & calls ---
export interface Parameter {
  label?: string;
  identifier: string;
  type?: StaticType;
  span: Span;
}

export interface Argument {
  label?: string;
  expression: Expr;
}

export interface InvocationExpression extends BaseNode {
  kind: "InvocationExpression";
  invokedExpression: Expr;
  arguments: Argument[];
  /** Elaborated by the checker; derived from the argument values when absent. */
  argumentTypes?: StaticType[];
}

export interface Block extends BaseNode {
  kind: "Block";
  statements: Stmt[];
}

export interface FunctionExpression extends BaseNode {
  kind: "FunctionExpression";
  parameters: Parameter[];
  returnType?: StaticType;
  block: Block;
  type?: FunctionType;
}

// --- Resources ---
export interface CreateExpression extends BaseNode {
  kind: "CreateExpression";
  invocation: InvocationExpression;
}

export interface DestroyExpression extends BaseNode {
  kind: "DestroyExpression";
  expression: Expr;
}

export type Expr =
  | Literal
  | IdentifierExpression
  | MemberExpression
  | IndexExpression
  | ArrayExpression
  | DictionaryExpression
  | BinaryExpression
  | UnaryExpression
  | ForceExpression
  | ConditionalExpression
  | InvocationExpression
  | FunctionExpression
  | CreateExpression
  | DestroyExpression;

// --- Statements ---
export type Transfer = "=" | "<-";

export interface VariableDeclaration extends BaseNode {
  kind: "VariableDeclaration";
  isConstant: boolean;
  identifier: string;
  transfer: Transfer;
  value: Expr;
  typeAnnotation?: StaticType;
}

export type AssignmentTarget = IdentifierExpression | MemberExpression | IndexExpression;

export interface AssignmentStatement extends BaseNode {
  kind: "AssignmentStatement";
  target: AssignmentTarget;
  transfer: Transfer;
  value: Expr;
}

export interface SwapStatement extends BaseNode {
  kind: "SwapStatement";
  left: AssignmentTarget;
  right: AssignmentTarget;
}

export interface ExpressionStatement extends BaseNode {
  kind: "ExpressionStatement";
  expression: Expr;
}

export interface ReturnStatement extends BaseNode {
  kind: "ReturnStatement";
  expression?: Expr;
}

export interface BreakStatement extends BaseNode {
  kind: "BreakStatement";
}

export interface ContinueStatement extends BaseNode {
  kind: "ContinueStatement";
}

export interface IfStatement extends BaseNode {
  kind: "IfStatement";
  // a declaration here is an optional binding: `if let x = opt { ... }`
  test: Expr | VariableDeclaration;
  then: Block;
  else?: Block;
}

export interface WhileStatement extends BaseNode {
  kind: "WhileStatement";
  test: Expr;
  block: Block;
}

export interface ForStatement extends BaseNode {
  kind: "ForStatement";
  identifier: string;
  value: Expr;
  block: Block;
}

export interface FunctionDeclaration extends BaseNode {
  kind: "FunctionDeclaration";
  identifier: string;
  parameters: Parameter[];
  returnType?: StaticType;
  block: Block;
}

export type Stmt =
  | VariableDeclaration
  | AssignmentStatement
  | SwapStatement
  | ExpressionStatement
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | IfStatement
  | WhileStatement
  | ForStatement
  | FunctionDeclaration;

// --- Declarations ---
export interface FieldDeclaration {
  identifier: string;
  type?: StaticType;
  span: Span;
}

export interface SpecialFunctionDeclaration extends BaseNode {
  kind: "SpecialFunctionDeclaration";
  parameters: Parameter[];
  block: Block;
}

export interface CompositeDeclaration extends BaseNode {
  kind: "CompositeDeclaration";
  compositeKind: CompositeKind;
  identifier: string;
  fields: FieldDeclaration[];
  initializer?: SpecialFunctionDeclaration;
  destructor?: SpecialFunctionDeclaration;
  functions: FunctionDeclaration[];
}

export type Declaration = CompositeDeclaration | FunctionDeclaration | VariableDeclaration;

// --- Program ---
export interface Program extends BaseNode {
  kind: "Program";
  declarations: Declaration[];
}

export const EMPTY_POSITION: Position = { offset: 0, line: 0, column: 0 };

export const EMPTY_SPAN: Span = { start: EMPTY_POSITION, end: EMPTY_POSITION };
