/**
 * Syntax tree to JSON.
 */
import type * as AST from "@lode/core";
import type { FunctionType, Position, Span, StaticType } from "@lode/core";
import { BINARY_OPERATION_NAME, COMPOSITE_KIND_NAME, TRANSFER_NAME, UNARY_OPERATION_NAME } from "./names.js";
import type {
  JsonAssignmentTarget,
  JsonBlock,
  JsonCompositeDeclaration,
  JsonDeclaration,
  JsonExpression,
  JsonFunctionDeclaration,
  JsonFunctionType,
  JsonInvocationExpression,
  JsonParameter,
  JsonPosition,
  JsonProgram,
  JsonRange,
  JsonSpecialFunctionDeclaration,
  JsonStatement,
  JsonStaticType,
  JsonVariableDeclaration,
} from "./schemas.js";

function encodePosition(p: Position): JsonPosition {
  return { Offset: p.offset, Line: p.line, Column: p.column };
}

function encodeRange(span: Span): JsonRange {
  return { StartPos: encodePosition(span.start), EndPos: encodePosition(span.end) };
}

/** `nil` is three characters wide: the end is the start advanced by two. */
function nilRange(span: Span): JsonRange {
  const { offset, line, column } = span.start;
  return {
    StartPos: encodePosition(span.start),
    EndPos: { Offset: offset + 2, Line: line, Column: column + 2 },
  };
}

export function encodeStaticType(type: StaticType): JsonStaticType {
  switch (type.kind) {
    case "Any":
      return { Kind: "Any" };
    case "Never":
      return { Kind: "Never" };
    case "Void":
      return { Kind: "Void" };
    case "Bool":
      return { Kind: "Bool" };
    case "String":
      return { Kind: "String" };
    case "Integer":
      return { Kind: "Integer", IntegerType: type.integerKind };
    case "Optional":
      return { Kind: "Optional", InnerType: encodeStaticType(type.type) };
    case "Array":
      return { Kind: "Array", ElementType: encodeStaticType(type.elementType) };
    case "Dictionary":
      return {
        Kind: "Dictionary",
        KeyType: encodeStaticType(type.keyType),
        ValueType: encodeStaticType(type.valueType),
      };
    case "Composite":
      return { Kind: "Composite", CompositeKind: COMPOSITE_KIND_NAME[type.compositeKind], Identifier: type.identifier };
    case "Function":
      return encodeFunctionType(type);
  }
}

function encodeFunctionType(type: FunctionType): JsonFunctionType {
  return {
    Kind: "Function",
    ParameterTypes: type.parameterTypes.map(encodeStaticType),
    ReturnType: encodeStaticType(type.returnType),
  };
}

function optionalType(type: StaticType | undefined): JsonStaticType | undefined {
  return type === undefined ? undefined : encodeStaticType(type);
}

function encodeParameter(p: AST.Parameter): JsonParameter {
  const out: JsonParameter = { Identifier: p.identifier, ...encodeRange(p.span) };
  if (p.label !== undefined) out.Label = p.label;
  if (p.type !== undefined) out.TypeAnnotation = encodeStaticType(p.type);
  return out;
}

function encodeBlock(block: AST.Block): JsonBlock {
  return { Type: "Block", Statements: block.statements.map(encodeStatement), ...encodeRange(block.span) };
}

function encodeInvocation(e: AST.InvocationExpression): JsonInvocationExpression {
  const out: JsonInvocationExpression = {
    Type: "InvocationExpression",
    InvokedExpression: encodeExpression(e.invokedExpression),
    Arguments: e.arguments.map((a) =>
      a.label === undefined
        ? { Expression: encodeExpression(a.expression) }
        : { Label: a.label, Expression: encodeExpression(a.expression) }
    ),
    ...encodeRange(e.span),
  };
  if (e.argumentTypes) out.ArgumentTypes = e.argumentTypes.map(encodeStaticType);
  return out;
}

export function encodeExpression(e: AST.Expr): JsonExpression {
  switch (e.kind) {
    case "BoolExpression":
      return { Type: "BoolExpression", Value: e.value, ...encodeRange(e.span) };
    case "NilExpression":
      return { Type: "NilExpression", ...nilRange(e.span) };
    case "IntegerExpression":
      return {
        Type: "IntegerExpression",
        Value: e.value.toString(),
        IntegerType: e.integerKind,
        ...encodeRange(e.span),
      };
    case "StringExpression":
      return { Type: "StringExpression", Value: e.value, ...encodeRange(e.span) };
    case "IdentifierExpression":
    case "MemberExpression":
    case "IndexExpression":
      return encodeTarget(e);
    case "ArrayExpression":
      return { Type: "ArrayExpression", Values: e.values.map(encodeExpression), ...encodeRange(e.span) };
    case "DictionaryExpression":
      return {
        Type: "DictionaryExpression",
        Entries: e.entries.map((entry) => ({
          Key: encodeExpression(entry.key),
          Value: encodeExpression(entry.value),
        })),
        ...encodeRange(e.span),
      };
    case "BinaryExpression":
      return {
        Type: "BinaryExpression",
        Operation: BINARY_OPERATION_NAME[e.operation],
        Left: encodeExpression(e.left),
        Right: encodeExpression(e.right),
        ...encodeRange(e.span),
      };
    case "UnaryExpression":
      return {
        Type: "UnaryExpression",
        Operation: UNARY_OPERATION_NAME[e.operation],
        Expression: encodeExpression(e.expression),
        ...encodeRange(e.span),
      };
    case "ForceExpression":
      return { Type: "ForceExpression", Expression: encodeExpression(e.expression), ...encodeRange(e.span) };
    case "ConditionalExpression":
      return {
        Type: "ConditionalExpression",
        Test: encodeExpression(e.test),
        Then: encodeExpression(e.then),
        Else: encodeExpression(e.else),
        ...encodeRange(e.span),
      };
    case "InvocationExpression":
      return encodeInvocation(e);
    case "FunctionExpression": {
      const out: JsonExpression = {
        Type: "FunctionExpression",
        Parameters: e.parameters.map(encodeParameter),
        ReturnType: optionalType(e.returnType),
        FunctionType: e.type ? encodeFunctionType(e.type) : undefined,
        FunctionBlock: encodeBlock(e.block),
        ...encodeRange(e.span),
      };
      return dropUndefined(out);
    }
    case "CreateExpression":
      return { Type: "CreateExpression", InvocationExpression: encodeInvocation(e.invocation), ...encodeRange(e.span) };
    case "DestroyExpression":
      return { Type: "DestroyExpression", Expression: encodeExpression(e.expression), ...encodeRange(e.span) };
  }
}

function encodeTarget(e: AST.AssignmentTarget): JsonAssignmentTarget {
  switch (e.kind) {
    case "IdentifierExpression":
      return { Type: "IdentifierExpression", Identifier: e.identifier, ...encodeRange(e.span) };
    case "MemberExpression":
      return {
        Type: "MemberExpression",
        Expression: encodeExpression(e.expression),
        Identifier: e.identifier,
        Optional: e.optional,
        ...encodeRange(e.span),
      };
    case "IndexExpression":
      return {
        Type: "IndexExpression",
        TargetExpression: encodeExpression(e.targetExpression),
        IndexingExpression: encodeExpression(e.indexingExpression),
        ...encodeRange(e.span),
      };
  }
}

function encodeVariableDeclaration(s: AST.VariableDeclaration): JsonVariableDeclaration {
  return dropUndefined({
    Type: "VariableDeclaration",
    IsConstant: s.isConstant,
    Identifier: s.identifier,
    Transfer: TRANSFER_NAME[s.transfer],
    Value: encodeExpression(s.value),
    TypeAnnotation: optionalType(s.typeAnnotation),
    ...encodeRange(s.span),
  });
}

function encodeFunctionDeclaration(s: AST.FunctionDeclaration): JsonFunctionDeclaration {
  return dropUndefined({
    Type: "FunctionDeclaration",
    Identifier: s.identifier,
    Parameters: s.parameters.map(encodeParameter),
    ReturnType: optionalType(s.returnType),
    FunctionBlock: encodeBlock(s.block),
    ...encodeRange(s.span),
  });
}

export function encodeStatement(s: AST.Stmt): JsonStatement {
  switch (s.kind) {
    case "VariableDeclaration":
      return encodeVariableDeclaration(s);
    case "AssignmentStatement":
      return {
        Type: "AssignmentStatement",
        Target: encodeTarget(s.target),
        Transfer: TRANSFER_NAME[s.transfer],
        Value: encodeExpression(s.value),
        ...encodeRange(s.span),
      };
    case "SwapStatement":
      return {
        Type: "SwapStatement",
        Left: encodeTarget(s.left),
        Right: encodeTarget(s.right),
        ...encodeRange(s.span),
      };
    case "ExpressionStatement":
      return { Type: "ExpressionStatement", Expression: encodeExpression(s.expression), ...encodeRange(s.span) };
    case "ReturnStatement":
      return s.expression
        ? { Type: "ReturnStatement", Expression: encodeExpression(s.expression), ...encodeRange(s.span) }
        : { Type: "ReturnStatement", ...encodeRange(s.span) };
    case "BreakStatement":
      return { Type: "BreakStatement", ...encodeRange(s.span) };
    case "ContinueStatement":
      return { Type: "ContinueStatement", ...encodeRange(s.span) };
    case "IfStatement":
      return dropUndefined({
        Type: "IfStatement",
        Test: s.test.kind === "VariableDeclaration" ? encodeVariableDeclaration(s.test) : encodeExpression(s.test),
        Then: encodeBlock(s.then),
        Else: s.else ? encodeBlock(s.else) : undefined,
        ...encodeRange(s.span),
      });
    case "WhileStatement":
      return {
        Type: "WhileStatement",
        Test: encodeExpression(s.test),
        Block: encodeBlock(s.block),
        ...encodeRange(s.span),
      };
    case "ForStatement":
      return {
        Type: "ForStatement",
        Identifier: s.identifier,
        Value: encodeExpression(s.value),
        Block: encodeBlock(s.block),
        ...encodeRange(s.span),
      };
    case "FunctionDeclaration":
      return encodeFunctionDeclaration(s);
  }
}

function encodeSpecialFunction(d: AST.SpecialFunctionDeclaration): JsonSpecialFunctionDeclaration {
  return {
    Type: "SpecialFunctionDeclaration",
    Parameters: d.parameters.map(encodeParameter),
    FunctionBlock: encodeBlock(d.block),
    ...encodeRange(d.span),
  };
}

function encodeComposite(d: AST.CompositeDeclaration): JsonCompositeDeclaration {
  return dropUndefined({
    Type: "CompositeDeclaration",
    CompositeKind: COMPOSITE_KIND_NAME[d.compositeKind],
    Identifier: d.identifier,
    Fields: d.fields.map((f) =>
      dropUndefined({ Identifier: f.identifier, TypeAnnotation: optionalType(f.type), ...encodeRange(f.span) })
    ),
    Initializer: d.initializer ? encodeSpecialFunction(d.initializer) : undefined,
    Destructor: d.destructor ? encodeSpecialFunction(d.destructor) : undefined,
    Functions: d.functions.map(encodeFunctionDeclaration),
    ...encodeRange(d.span),
  });
}

export function encodeDeclaration(d: AST.Declaration): JsonDeclaration {
  switch (d.kind) {
    case "CompositeDeclaration":
      return encodeComposite(d);
    case "FunctionDeclaration":
      return encodeFunctionDeclaration(d);
    case "VariableDeclaration":
      return encodeVariableDeclaration(d);
  }
}

export function encodeProgram(program: AST.Program): JsonProgram {
  return {
    Type: "Program",
    Declarations: program.declarations.map(encodeDeclaration),
    ...encodeRange(program.span),
  };
}

// Absent optional fields are left out of the output rather than set to undefined.
function dropUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) Reflect.deleteProperty(value, key);
  }
  return value;
}
