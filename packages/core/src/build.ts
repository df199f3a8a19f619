/**
 * Syntax tree construction helpers for hosts and tests that assemble
 * programs without a front end. Every node gets an empty span.
 */
import * as AST from "./ast.js";
import type { IntegerKind } from "./integers.js";
import type { CompositeKind, StaticType } from "./types.js";

const span = (): AST.Span => AST.EMPTY_SPAN;

// --- Expressions ---
export function bool(value: boolean): AST.BoolExpression {
  return { kind: "BoolExpression", value, span: span() };
}

export function nil(): AST.NilExpression {
  return { kind: "NilExpression", span: span() };
}

export function int(value: bigint | number, integerKind: IntegerKind = "Int"): AST.IntegerExpression {
  return { kind: "IntegerExpression", value: BigInt(value), integerKind, span: span() };
}

export function str(value: string): AST.StringExpression {
  return { kind: "StringExpression", value, span: span() };
}

export function id(identifier: string): AST.IdentifierExpression {
  return { kind: "IdentifierExpression", identifier, span: span() };
}

export function member(expression: AST.Expr, identifier: string, optional = false): AST.MemberExpression {
  return { kind: "MemberExpression", expression, identifier, optional, span: span() };
}

export function index(targetExpression: AST.Expr, indexingExpression: AST.Expr): AST.IndexExpression {
  return { kind: "IndexExpression", targetExpression, indexingExpression, span: span() };
}

export function array(...values: AST.Expr[]): AST.ArrayExpression {
  return { kind: "ArrayExpression", values, span: span() };
}

export function dict(...entries: Array<[AST.Expr, AST.Expr]>): AST.DictionaryExpression {
  return {
    kind: "DictionaryExpression",
    entries: entries.map(([key, value]) => ({ key, value })),
    span: span(),
  };
}

export function binary(left: AST.Expr, operation: AST.BinaryOperation, right: AST.Expr): AST.BinaryExpression {
  return { kind: "BinaryExpression", operation, left, right, span: span() };
}

export function unary(operation: AST.UnaryOperation, expression: AST.Expr): AST.UnaryExpression {
  return { kind: "UnaryExpression", operation, expression, span: span() };
}

/** `<-expression` */
export function move(expression: AST.Expr): AST.UnaryExpression {
  return unary("<-", expression);
}

export function force(expression: AST.Expr): AST.ForceExpression {
  return { kind: "ForceExpression", expression, span: span() };
}

export function conditional(test: AST.Expr, then: AST.Expr, otherwise: AST.Expr): AST.ConditionalExpression {
  return { kind: "ConditionalExpression", test, then, else: otherwise, span: span() };
}

export function call(invokedExpression: AST.Expr, ...args: AST.Expr[]): AST.InvocationExpression {
  return {
    kind: "InvocationExpression",
    invokedExpression,
    arguments: args.map((expression) => ({ expression })),
    span: span(),
  };
}

export function param(identifier: string, type?: StaticType): AST.Parameter {
  return { identifier, type, span: span() };
}

export function block(...statements: AST.Stmt[]): AST.Block {
  return { kind: "Block", statements, span: span() };
}

export function fn(parameters: string[], ...statements: AST.Stmt[]): AST.FunctionExpression {
  return { kind: "FunctionExpression", parameters: parameters.map((p) => param(p)), block: block(...statements), span: span() };
}

export function create(invocation: AST.InvocationExpression): AST.CreateExpression {
  return { kind: "CreateExpression", invocation, span: span() };
}

export function destroy(expression: AST.Expr): AST.DestroyExpression {
  return { kind: "DestroyExpression", expression, span: span() };
}

// --- Statements ---
function declaration(isConstant: boolean, identifier: string, value: AST.Expr, transfer: AST.Transfer): AST.VariableDeclaration {
  return { kind: "VariableDeclaration", isConstant, identifier, transfer, value, span: span() };
}

export function let_(identifier: string, value: AST.Expr, transfer: AST.Transfer = "="): AST.VariableDeclaration {
  return declaration(true, identifier, value, transfer);
}

export function var_(identifier: string, value: AST.Expr, transfer: AST.Transfer = "="): AST.VariableDeclaration {
  return declaration(false, identifier, value, transfer);
}

export function assign(target: AST.AssignmentTarget, value: AST.Expr, transfer: AST.Transfer = "="): AST.AssignmentStatement {
  return { kind: "AssignmentStatement", target, transfer, value, span: span() };
}

export function swap(left: AST.AssignmentTarget, right: AST.AssignmentTarget): AST.SwapStatement {
  return { kind: "SwapStatement", left, right, span: span() };
}

export function expr(expression: AST.Expr): AST.ExpressionStatement {
  return { kind: "ExpressionStatement", expression, span: span() };
}

export function ret(expression?: AST.Expr): AST.ReturnStatement {
  return { kind: "ReturnStatement", expression, span: span() };
}

export function brk(): AST.BreakStatement {
  return { kind: "BreakStatement", span: span() };
}

export function cont(): AST.ContinueStatement {
  return { kind: "ContinueStatement", span: span() };
}

export function if_(test: AST.Expr | AST.VariableDeclaration, then: AST.Stmt[], otherwise?: AST.Stmt[]): AST.IfStatement {
  return {
    kind: "IfStatement",
    test,
    then: block(...then),
    else: otherwise ? block(...otherwise) : undefined,
    span: span(),
  };
}

export function while_(test: AST.Expr, ...statements: AST.Stmt[]): AST.WhileStatement {
  return { kind: "WhileStatement", test, block: block(...statements), span: span() };
}

export function for_(identifier: string, value: AST.Expr, ...statements: AST.Stmt[]): AST.ForStatement {
  return { kind: "ForStatement", identifier, value, block: block(...statements), span: span() };
}

export function func(identifier: string, parameters: string[], ...statements: AST.Stmt[]): AST.FunctionDeclaration {
  return {
    kind: "FunctionDeclaration",
    identifier,
    parameters: parameters.map((p) => param(p)),
    block: block(...statements),
    span: span(),
  };
}

// --- Declarations ---
export interface CompositeParts {
  fields: string[];
  init?: { parameters: string[]; statements: AST.Stmt[] };
  destroy?: AST.Stmt[];
  functions?: AST.FunctionDeclaration[];
}

export function composite(compositeKind: CompositeKind, identifier: string, parts: CompositeParts): AST.CompositeDeclaration {
  return {
    kind: "CompositeDeclaration",
    compositeKind,
    identifier,
    fields: parts.fields.map((field) => ({ identifier: field, span: span() })),
    initializer: parts.init
      ? {
          kind: "SpecialFunctionDeclaration",
          parameters: parts.init.parameters.map((p) => param(p)),
          block: block(...parts.init.statements),
          span: span(),
        }
      : undefined,
    destructor: parts.destroy
      ? { kind: "SpecialFunctionDeclaration", parameters: [], block: block(...parts.destroy), span: span() }
      : undefined,
    functions: parts.functions ?? [],
    span: span(),
  };
}

export function program(...declarations: AST.Declaration[]): AST.Program {
  return { kind: "Program", declarations, span: span() };
}
