/**
 * JSON shapes of syntax-tree nodes and the zod schemas that validate them.
 *
 * Every node is an object tagged by `Type` with PascalCase fields and a
 * `StartPos`/`EndPos` pair. Static types are tagged by `Kind`.
 */
import { z } from "zod";
import { INTEGER_KINDS, type IntegerKind } from "@lode/core";
import {
  BINARY_OPERATION_NAMES,
  COMPOSITE_KIND_NAMES,
  TRANSFER_NAMES,
  UNARY_OPERATION_NAMES,
  type BinaryOperationName,
  type CompositeKindName,
  type TransferName,
  type UnaryOperationName,
} from "./names.js";

// --- JSON shapes ---
export interface JsonPosition {
  Offset: number;
  Line: number;
  Column: number;
}

export interface JsonRange {
  StartPos: JsonPosition;
  EndPos: JsonPosition;
}

export interface JsonNode<T extends string> extends JsonRange {
  Type: T;
}

export interface JsonFunctionType {
  Kind: "Function";
  ParameterTypes: JsonStaticType[];
  ReturnType: JsonStaticType;
}

export type JsonStaticType =
  | { Kind: "Any" | "Never" | "Void" | "Bool" | "String" }
  | { Kind: "Integer"; IntegerType: IntegerKind }
  | { Kind: "Optional"; InnerType: JsonStaticType }
  | { Kind: "Array"; ElementType: JsonStaticType }
  | { Kind: "Dictionary"; KeyType: JsonStaticType; ValueType: JsonStaticType }
  | { Kind: "Composite"; CompositeKind: CompositeKindName; Identifier: string }
  | JsonFunctionType;

export interface JsonBoolExpression extends JsonNode<"BoolExpression"> {
  Value: boolean;
}

export type JsonNilExpression = JsonNode<"NilExpression">;

export interface JsonIntegerExpression extends JsonNode<"IntegerExpression"> {
  Value: string;
  IntegerType: IntegerKind;
}

export interface JsonStringExpression extends JsonNode<"StringExpression"> {
  Value: string;
}

export interface JsonIdentifierExpression extends JsonNode<"IdentifierExpression"> {
  Identifier: string;
}

export interface JsonMemberExpression extends JsonNode<"MemberExpression"> {
  Expression: JsonExpression;
  Identifier: string;
  Optional: boolean;
}

export interface JsonIndexExpression extends JsonNode<"IndexExpression"> {
  TargetExpression: JsonExpression;
  IndexingExpression: JsonExpression;
}

export interface JsonArrayExpression extends JsonNode<"ArrayExpression"> {
  Values: JsonExpression[];
}

export interface JsonDictionaryEntry {
  Key: JsonExpression;
  Value: JsonExpression;
}

export interface JsonDictionaryExpression extends JsonNode<"DictionaryExpression"> {
  Entries: JsonDictionaryEntry[];
}

export interface JsonBinaryExpression extends JsonNode<"BinaryExpression"> {
  Operation: BinaryOperationName;
  Left: JsonExpression;
  Right: JsonExpression;
}

export interface JsonUnaryExpression extends JsonNode<"UnaryExpression"> {
  Operation: UnaryOperationName;
  Expression: JsonExpression;
}

export interface JsonForceExpression extends JsonNode<"ForceExpression"> {
  Expression: JsonExpression;
}

export interface JsonConditionalExpression extends JsonNode<"ConditionalExpression"> {
  Test: JsonExpression;
  Then: JsonExpression;
  Else: JsonExpression;
}

export interface JsonArgument {
  Label?: string;
  Expression: JsonExpression;
}

export interface JsonInvocationExpression extends JsonNode<"InvocationExpression"> {
  InvokedExpression: JsonExpression;
  Arguments: JsonArgument[];
  ArgumentTypes?: JsonStaticType[];
}

export interface JsonParameter extends JsonRange {
  Label?: string;
  Identifier: string;
  TypeAnnotation?: JsonStaticType;
}

export interface JsonBlock extends JsonNode<"Block"> {
  Statements: JsonStatement[];
}

export interface JsonFunctionExpression extends JsonNode<"FunctionExpression"> {
  Parameters: JsonParameter[];
  ReturnType?: JsonStaticType;
  FunctionType?: JsonFunctionType;
  FunctionBlock: JsonBlock;
}

export interface JsonCreateExpression extends JsonNode<"CreateExpression"> {
  InvocationExpression: JsonInvocationExpression;
}

export interface JsonDestroyExpression extends JsonNode<"DestroyExpression"> {
  Expression: JsonExpression;
}

export type JsonExpression =
  | JsonBoolExpression
  | JsonNilExpression
  | JsonIntegerExpression
  | JsonStringExpression
  | JsonIdentifierExpression
  | JsonMemberExpression
  | JsonIndexExpression
  | JsonArrayExpression
  | JsonDictionaryExpression
  | JsonBinaryExpression
  | JsonUnaryExpression
  | JsonForceExpression
  | JsonConditionalExpression
  | JsonInvocationExpression
  | JsonFunctionExpression
  | JsonCreateExpression
  | JsonDestroyExpression;

export interface JsonVariableDeclaration extends JsonNode<"VariableDeclaration"> {
  IsConstant: boolean;
  Identifier: string;
  Transfer: TransferName;
  Value: JsonExpression;
  TypeAnnotation?: JsonStaticType;
}

export type JsonAssignmentTarget = JsonIdentifierExpression | JsonMemberExpression | JsonIndexExpression;

export interface JsonAssignmentStatement extends JsonNode<"AssignmentStatement"> {
  Target: JsonAssignmentTarget;
  Transfer: TransferName;
  Value: JsonExpression;
}

export interface JsonSwapStatement extends JsonNode<"SwapStatement"> {
  Left: JsonAssignmentTarget;
  Right: JsonAssignmentTarget;
}

export interface JsonExpressionStatement extends JsonNode<"ExpressionStatement"> {
  Expression: JsonExpression;
}

export interface JsonReturnStatement extends JsonNode<"ReturnStatement"> {
  Expression?: JsonExpression;
}

export type JsonBreakStatement = JsonNode<"BreakStatement">;

export type JsonContinueStatement = JsonNode<"ContinueStatement">;

export interface JsonIfStatement extends JsonNode<"IfStatement"> {
  Test: JsonExpression | JsonVariableDeclaration;
  Then: JsonBlock;
  Else?: JsonBlock;
}

export interface JsonWhileStatement extends JsonNode<"WhileStatement"> {
  Test: JsonExpression;
  Block: JsonBlock;
}

export interface JsonForStatement extends JsonNode<"ForStatement"> {
  Identifier: string;
  Value: JsonExpression;
  Block: JsonBlock;
}

export interface JsonFunctionDeclaration extends JsonNode<"FunctionDeclaration"> {
  Identifier: string;
  Parameters: JsonParameter[];
  ReturnType?: JsonStaticType;
  FunctionBlock: JsonBlock;
}

export type JsonStatement =
  | JsonVariableDeclaration
  | JsonAssignmentStatement
  | JsonSwapStatement
  | JsonExpressionStatement
  | JsonReturnStatement
  | JsonBreakStatement
  | JsonContinueStatement
  | JsonIfStatement
  | JsonWhileStatement
  | JsonForStatement
  | JsonFunctionDeclaration;

export interface JsonField extends JsonRange {
  Identifier: string;
  TypeAnnotation?: JsonStaticType;
}

export interface JsonSpecialFunctionDeclaration extends JsonNode<"SpecialFunctionDeclaration"> {
  Parameters: JsonParameter[];
  FunctionBlock: JsonBlock;
}

export interface JsonCompositeDeclaration extends JsonNode<"CompositeDeclaration"> {
  CompositeKind: CompositeKindName;
  Identifier: string;
  Fields: JsonField[];
  Initializer?: JsonSpecialFunctionDeclaration;
  Destructor?: JsonSpecialFunctionDeclaration;
  Functions: JsonFunctionDeclaration[];
}

export type JsonDeclaration = JsonCompositeDeclaration | JsonFunctionDeclaration | JsonVariableDeclaration;

export interface JsonProgram extends JsonNode<"Program"> {
  Declarations: JsonDeclaration[];
}

// --- Schemas ---
export const positionSchema = z.object({
  Offset: z.number().int().nonnegative(),
  Line: z.number().int().nonnegative(),
  Column: z.number().int().nonnegative(),
});

const rangeShape = { StartPos: positionSchema, EndPos: positionSchema };

function node<T extends string>(type: T) {
  return z.object({ Type: z.literal(type), ...rangeShape });
}

export const staticTypeSchema: z.ZodType<JsonStaticType> = z.lazy(() =>
  z.discriminatedUnion("Kind", [
    z.object({ Kind: z.enum(["Any", "Never", "Void", "Bool", "String"]) }),
    z.object({ Kind: z.literal("Integer"), IntegerType: z.enum(INTEGER_KINDS) }),
    z.object({ Kind: z.literal("Optional"), InnerType: staticTypeSchema }),
    z.object({ Kind: z.literal("Array"), ElementType: staticTypeSchema }),
    z.object({ Kind: z.literal("Dictionary"), KeyType: staticTypeSchema, ValueType: staticTypeSchema }),
    z.object({ Kind: z.literal("Composite"), CompositeKind: z.enum(COMPOSITE_KIND_NAMES), Identifier: z.string() }),
    functionTypeSchema,
  ])
);

const functionTypeSchema = z.object({
  Kind: z.literal("Function"),
  ParameterTypes: z.array(staticTypeSchema),
  ReturnType: staticTypeSchema,
});

export const expressionSchema: z.ZodType<JsonExpression> = z.lazy(() => expressionUnion);

export const statementSchema: z.ZodType<JsonStatement> = z.lazy(() => statementUnion);

const blockSchema = node("Block").extend({ Statements: z.array(statementSchema) });

const parameterSchema = z.object({
  Label: z.string().optional(),
  Identifier: z.string(),
  TypeAnnotation: staticTypeSchema.optional(),
  ...rangeShape,
});

const identifierExpression = node("IdentifierExpression").extend({ Identifier: z.string() });

const memberExpression = node("MemberExpression").extend({
  Expression: expressionSchema,
  Identifier: z.string(),
  Optional: z.boolean(),
});

const indexExpression = node("IndexExpression").extend({
  TargetExpression: expressionSchema,
  IndexingExpression: expressionSchema,
});

const invocationExpression = node("InvocationExpression").extend({
  InvokedExpression: expressionSchema,
  Arguments: z.array(z.object({ Label: z.string().optional(), Expression: expressionSchema })),
  ArgumentTypes: z.array(staticTypeSchema).optional(),
});

const expressionUnion = z.discriminatedUnion("Type", [
  node("BoolExpression").extend({ Value: z.boolean() }),
  node("NilExpression"),
  node("IntegerExpression").extend({
    Value: z.string().regex(/^-?\d+$/, "Expected a decimal integer string"),
    IntegerType: z.enum(INTEGER_KINDS),
  }),
  node("StringExpression").extend({ Value: z.string() }),
  identifierExpression,
  memberExpression,
  indexExpression,
  node("ArrayExpression").extend({ Values: z.array(expressionSchema) }),
  node("DictionaryExpression").extend({
    Entries: z.array(z.object({ Key: expressionSchema, Value: expressionSchema })),
  }),
  node("BinaryExpression").extend({
    Operation: z.enum(BINARY_OPERATION_NAMES),
    Left: expressionSchema,
    Right: expressionSchema,
  }),
  node("UnaryExpression").extend({
    Operation: z.enum(UNARY_OPERATION_NAMES),
    Expression: expressionSchema,
  }),
  node("ForceExpression").extend({ Expression: expressionSchema }),
  node("ConditionalExpression").extend({
    Test: expressionSchema,
    Then: expressionSchema,
    Else: expressionSchema,
  }),
  invocationExpression,
  node("FunctionExpression").extend({
    Parameters: z.array(parameterSchema),
    ReturnType: staticTypeSchema.optional(),
    FunctionType: functionTypeSchema.optional(),
    FunctionBlock: blockSchema,
  }),
  node("CreateExpression").extend({ InvocationExpression: invocationExpression }),
  node("DestroyExpression").extend({ Expression: expressionSchema }),
]);

const assignmentTargetSchema = z.discriminatedUnion("Type", [identifierExpression, memberExpression, indexExpression]);

const variableDeclaration = node("VariableDeclaration").extend({
  IsConstant: z.boolean(),
  Identifier: z.string(),
  Transfer: z.enum(TRANSFER_NAMES),
  Value: expressionSchema,
  TypeAnnotation: staticTypeSchema.optional(),
});

const functionDeclaration = node("FunctionDeclaration").extend({
  Identifier: z.string(),
  Parameters: z.array(parameterSchema),
  ReturnType: staticTypeSchema.optional(),
  FunctionBlock: blockSchema,
});

const statementUnion = z.discriminatedUnion("Type", [
  variableDeclaration,
  node("AssignmentStatement").extend({
    Target: assignmentTargetSchema,
    Transfer: z.enum(TRANSFER_NAMES),
    Value: expressionSchema,
  }),
  node("SwapStatement").extend({ Left: assignmentTargetSchema, Right: assignmentTargetSchema }),
  node("ExpressionStatement").extend({ Expression: expressionSchema }),
  node("ReturnStatement").extend({ Expression: expressionSchema.optional() }),
  node("BreakStatement"),
  node("ContinueStatement"),
  node("IfStatement").extend({
    Test: z.union([variableDeclaration, expressionSchema]),
    Then: blockSchema,
    Else: blockSchema.optional(),
  }),
  node("WhileStatement").extend({ Test: expressionSchema, Block: blockSchema }),
  node("ForStatement").extend({ Identifier: z.string(), Value: expressionSchema, Block: blockSchema }),
  functionDeclaration,
]);

const specialFunctionDeclaration = node("SpecialFunctionDeclaration").extend({
  Parameters: z.array(parameterSchema),
  FunctionBlock: blockSchema,
});

const compositeDeclaration = node("CompositeDeclaration").extend({
  CompositeKind: z.enum(COMPOSITE_KIND_NAMES),
  Identifier: z.string(),
  Fields: z.array(
    z.object({ Identifier: z.string(), TypeAnnotation: staticTypeSchema.optional(), ...rangeShape })
  ),
  Initializer: specialFunctionDeclaration.optional(),
  Destructor: specialFunctionDeclaration.optional(),
  Functions: z.array(functionDeclaration),
});

export const declarationSchema: z.ZodType<JsonDeclaration> = z.discriminatedUnion("Type", [
  compositeDeclaration,
  functionDeclaration,
  variableDeclaration,
]);

export const programSchema: z.ZodType<JsonProgram> = node("Program").extend({
  Declarations: z.array(declarationSchema),
});
