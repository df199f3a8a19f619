/**
 * JSON to syntax tree, validated against the node schemas.
 */
import type { ZodError, ZodIssue } from "zod";
import { makeDiag } from "@lode/core";
import type * as AST from "@lode/core";
import type { Diagnostic, FunctionType, Position, Span, StaticType } from "@lode/core";
import { BINARY_OPERATIONS, COMPOSITE_KINDS, TRANSFERS, UNARY_OPERATIONS } from "./names.js";
import {
  programSchema,
  type JsonAssignmentTarget,
  type JsonBlock,
  type JsonCompositeDeclaration,
  type JsonDeclaration,
  type JsonExpression,
  type JsonFunctionDeclaration,
  type JsonFunctionType,
  type JsonInvocationExpression,
  type JsonParameter,
  type JsonPosition,
  type JsonRange,
  type JsonSpecialFunctionDeclaration,
  type JsonStatement,
  type JsonStaticType,
  type JsonVariableDeclaration,
} from "./schemas.js";

export interface DecodeResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
}

/** `$.Declarations[0].FunctionBlock.Statements[2]` */
export function formatJsonPath(path: ReadonlyArray<string | number>): string {
  return "$" + path.map((segment) => (typeof segment === "number" ? `[${segment}]` : `.${segment}`)).join("");
}

// A union failure is reported through the alternative that got furthest.
function leafIssues(issue: ZodIssue): ZodIssue[] {
  if (issue.code !== "invalid_union") return [issue];
  let best: ZodError | undefined;
  let bestDepth = -1;
  for (const error of issue.unionErrors) {
    const depth = Math.max(...error.issues.map((i) => i.path.length));
    if (depth > bestDepth) {
      best = error;
      bestDepth = depth;
    }
  }
  return best ? best.issues.flatMap(leafIssues) : [issue];
}

/** The accepted values, for issues that come from a closed set of names. */
function issueHint(issue: ZodIssue): string | undefined {
  switch (issue.code) {
    case "invalid_union_discriminator":
    case "invalid_enum_value":
      return `Use one of: ${issue.options.map(String).join(", ")}`;
    default:
      return undefined;
  }
}

function issueDiagnostics(error: ZodError, file?: string): Diagnostic[] {
  const seen = new Set<string>();
  const diags: Diagnostic[] = [];
  for (const issue of error.issues.flatMap(leafIssues)) {
    const message = `${formatJsonPath(issue.path)}: ${issue.message}`;
    if (seen.has(message)) continue;
    seen.add(message);
    diags.push(makeDiag("E_AST_JSON", message, fileSpan(file), issueHint(issue)));
  }
  return diags;
}

function fileSpan(file: string | undefined): Span | undefined {
  if (file === undefined) return undefined;
  const origin: Position = { offset: 0, line: 1, column: 0 };
  return { file, start: origin, end: origin };
}

/** Validate a parsed JSON document and build the program it describes. */
export function decodeProgram(json: unknown, file?: string): DecodeResult {
  const parsed = programSchema.safeParse(json);
  if (!parsed.success) {
    return { diagnostics: issueDiagnostics(parsed.error, file) };
  }
  const decoder = new Decoder(file);
  return { program: decoder.program(parsed.data.Declarations, parsed.data), diagnostics: [] };
}

/** Parse JSON text, then decode it. */
export function parseProgram(text: string, file?: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { diagnostics: [makeDiag("E_AST_JSON", `$: Invalid JSON: ${message}`, fileSpan(file))] };
  }
  return decodeProgram(json, file);
}

class Decoder {
  private readonly file?: string;

  constructor(file?: string) {
    this.file = file;
  }

  private position(p: JsonPosition): Position {
    return { offset: p.Offset, line: p.Line, column: p.Column };
  }

  private span(range: JsonRange): Span {
    const start = this.position(range.StartPos);
    const end = this.position(range.EndPos);
    return this.file === undefined ? { start, end } : { file: this.file, start, end };
  }

  program(declarations: JsonDeclaration[], range: JsonRange): AST.Program {
    return {
      kind: "Program",
      declarations: declarations.map((d) => this.declaration(d)),
      span: this.span(range),
    };
  }

  staticType(t: JsonStaticType): StaticType {
    switch (t.Kind) {
      case "Any":
        return { kind: "Any" };
      case "Never":
        return { kind: "Never" };
      case "Void":
        return { kind: "Void" };
      case "Bool":
        return { kind: "Bool" };
      case "String":
        return { kind: "String" };
      case "Integer":
        return { kind: "Integer", integerKind: t.IntegerType };
      case "Optional":
        return { kind: "Optional", type: this.staticType(t.InnerType) };
      case "Array":
        return { kind: "Array", elementType: this.staticType(t.ElementType) };
      case "Dictionary":
        return { kind: "Dictionary", keyType: this.staticType(t.KeyType), valueType: this.staticType(t.ValueType) };
      case "Composite":
        return { kind: "Composite", compositeKind: COMPOSITE_KINDS[t.CompositeKind], identifier: t.Identifier };
      case "Function":
        return this.functionType(t);
    }
  }

  private functionType(t: JsonFunctionType): FunctionType {
    return {
      kind: "Function",
      parameterTypes: t.ParameterTypes.map((p) => this.staticType(p)),
      returnType: this.staticType(t.ReturnType),
    };
  }

  private optionalType(t: JsonStaticType | undefined): StaticType | undefined {
    return t === undefined ? undefined : this.staticType(t);
  }

  private parameter(p: JsonParameter): AST.Parameter {
    const out: AST.Parameter = { identifier: p.Identifier, span: this.span(p) };
    if (p.Label !== undefined) out.label = p.Label;
    if (p.TypeAnnotation !== undefined) out.type = this.staticType(p.TypeAnnotation);
    return out;
  }

  private block(b: JsonBlock): AST.Block {
    return { kind: "Block", statements: b.Statements.map((s) => this.statement(s)), span: this.span(b) };
  }

  private invocation(e: JsonInvocationExpression): AST.InvocationExpression {
    const out: AST.InvocationExpression = {
      kind: "InvocationExpression",
      invokedExpression: this.expression(e.InvokedExpression),
      arguments: e.Arguments.map((a) =>
        a.Label === undefined
          ? { expression: this.expression(a.Expression) }
          : { label: a.Label, expression: this.expression(a.Expression) }
      ),
      span: this.span(e),
    };
    if (e.ArgumentTypes) out.argumentTypes = e.ArgumentTypes.map((t) => this.staticType(t));
    return out;
  }

  expression(e: JsonExpression): AST.Expr {
    const span = this.span(e);
    switch (e.Type) {
      case "BoolExpression":
        return { kind: "BoolExpression", value: e.Value, span };
      case "NilExpression":
        return { kind: "NilExpression", span };
      case "IntegerExpression":
        return { kind: "IntegerExpression", value: BigInt(e.Value), integerKind: e.IntegerType, span };
      case "StringExpression":
        return { kind: "StringExpression", value: e.Value, span };
      case "IdentifierExpression":
      case "MemberExpression":
      case "IndexExpression":
        return this.target(e);
      case "ArrayExpression":
        return { kind: "ArrayExpression", values: e.Values.map((v) => this.expression(v)), span };
      case "DictionaryExpression":
        return {
          kind: "DictionaryExpression",
          entries: e.Entries.map((entry) => ({ key: this.expression(entry.Key), value: this.expression(entry.Value) })),
          span,
        };
      case "BinaryExpression":
        return {
          kind: "BinaryExpression",
          operation: BINARY_OPERATIONS[e.Operation],
          left: this.expression(e.Left),
          right: this.expression(e.Right),
          span,
        };
      case "UnaryExpression":
        return {
          kind: "UnaryExpression",
          operation: UNARY_OPERATIONS[e.Operation],
          expression: this.expression(e.Expression),
          span,
        };
      case "ForceExpression":
        return { kind: "ForceExpression", expression: this.expression(e.Expression), span };
      case "ConditionalExpression":
        return {
          kind: "ConditionalExpression",
          test: this.expression(e.Test),
          then: this.expression(e.Then),
          else: this.expression(e.Else),
          span,
        };
      case "InvocationExpression":
        return this.invocation(e);
      case "FunctionExpression": {
        const out: AST.FunctionExpression = {
          kind: "FunctionExpression",
          parameters: e.Parameters.map((p) => this.parameter(p)),
          block: this.block(e.FunctionBlock),
          span,
        };
        if (e.ReturnType) out.returnType = this.staticType(e.ReturnType);
        if (e.FunctionType) out.type = this.functionType(e.FunctionType);
        return out;
      }
      case "CreateExpression":
        return { kind: "CreateExpression", invocation: this.invocation(e.InvocationExpression), span };
      case "DestroyExpression":
        return { kind: "DestroyExpression", expression: this.expression(e.Expression), span };
    }
  }

  private target(e: JsonAssignmentTarget): AST.AssignmentTarget {
    const span = this.span(e);
    switch (e.Type) {
      case "IdentifierExpression":
        return { kind: "IdentifierExpression", identifier: e.Identifier, span };
      case "MemberExpression":
        return {
          kind: "MemberExpression",
          expression: this.expression(e.Expression),
          identifier: e.Identifier,
          optional: e.Optional,
          span,
        };
      case "IndexExpression":
        return {
          kind: "IndexExpression",
          targetExpression: this.expression(e.TargetExpression),
          indexingExpression: this.expression(e.IndexingExpression),
          span,
        };
    }
  }

  private variableDeclaration(s: JsonVariableDeclaration): AST.VariableDeclaration {
    const out: AST.VariableDeclaration = {
      kind: "VariableDeclaration",
      isConstant: s.IsConstant,
      identifier: s.Identifier,
      transfer: TRANSFERS[s.Transfer],
      value: this.expression(s.Value),
      span: this.span(s),
    };
    const annotation = this.optionalType(s.TypeAnnotation);
    if (annotation) out.typeAnnotation = annotation;
    return out;
  }

  private functionDeclaration(s: JsonFunctionDeclaration): AST.FunctionDeclaration {
    const out: AST.FunctionDeclaration = {
      kind: "FunctionDeclaration",
      identifier: s.Identifier,
      parameters: s.Parameters.map((p) => this.parameter(p)),
      block: this.block(s.FunctionBlock),
      span: this.span(s),
    };
    const returnType = this.optionalType(s.ReturnType);
    if (returnType) out.returnType = returnType;
    return out;
  }

  statement(s: JsonStatement): AST.Stmt {
    const span = this.span(s);
    switch (s.Type) {
      case "VariableDeclaration":
        return this.variableDeclaration(s);
      case "AssignmentStatement":
        return {
          kind: "AssignmentStatement",
          target: this.target(s.Target),
          transfer: TRANSFERS[s.Transfer],
          value: this.expression(s.Value),
          span,
        };
      case "SwapStatement":
        return { kind: "SwapStatement", left: this.target(s.Left), right: this.target(s.Right), span };
      case "ExpressionStatement":
        return { kind: "ExpressionStatement", expression: this.expression(s.Expression), span };
      case "ReturnStatement":
        return s.Expression
          ? { kind: "ReturnStatement", expression: this.expression(s.Expression), span }
          : { kind: "ReturnStatement", span };
      case "BreakStatement":
        return { kind: "BreakStatement", span };
      case "ContinueStatement":
        return { kind: "ContinueStatement", span };
      case "IfStatement": {
        const out: AST.IfStatement = {
          kind: "IfStatement",
          test: s.Test.Type === "VariableDeclaration" ? this.variableDeclaration(s.Test) : this.expression(s.Test),
          then: this.block(s.Then),
          span,
        };
        if (s.Else) out.else = this.block(s.Else);
        return out;
      }
      case "WhileStatement":
        return { kind: "WhileStatement", test: this.expression(s.Test), block: this.block(s.Block), span };
      case "ForStatement":
        return {
          kind: "ForStatement",
          identifier: s.Identifier,
          value: this.expression(s.Value),
          block: this.block(s.Block),
          span,
        };
      case "FunctionDeclaration":
        return this.functionDeclaration(s);
    }
  }

  private specialFunction(d: JsonSpecialFunctionDeclaration): AST.SpecialFunctionDeclaration {
    return {
      kind: "SpecialFunctionDeclaration",
      parameters: d.Parameters.map((p) => this.parameter(p)),
      block: this.block(d.FunctionBlock),
      span: this.span(d),
    };
  }

  private composite(d: JsonCompositeDeclaration): AST.CompositeDeclaration {
    const out: AST.CompositeDeclaration = {
      kind: "CompositeDeclaration",
      compositeKind: COMPOSITE_KINDS[d.CompositeKind],
      identifier: d.Identifier,
      fields: d.Fields.map((f) => {
        const field: AST.FieldDeclaration = { identifier: f.Identifier, span: this.span(f) };
        if (f.TypeAnnotation) field.type = this.staticType(f.TypeAnnotation);
        return field;
      }),
      functions: d.Functions.map((f) => this.functionDeclaration(f)),
      span: this.span(d),
    };
    if (d.Initializer) out.initializer = this.specialFunction(d.Initializer);
    if (d.Destructor) out.destructor = this.specialFunction(d.Destructor);
    return out;
  }

  declaration(d: JsonDeclaration): AST.Declaration {
    switch (d.Type) {
      case "CompositeDeclaration":
        return this.composite(d);
      case "FunctionDeclaration":
        return this.functionDeclaration(d);
      case "VariableDeclaration":
        return this.variableDeclaration(d);
    }
  }
}
