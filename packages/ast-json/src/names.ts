/**
 * Names used on the wire for operators, transfers and composite kinds.
 */
import type { BinaryOperation, CompositeKind, Transfer, UnaryOperation } from "@lode/core";

export const BINARY_OPERATION_NAMES = [
  "OperationPlus",
  "OperationMinus",
  "OperationMul",
  "OperationDiv",
  "OperationMod",
  "OperationEqual",
  "OperationNotEqual",
  "OperationLess",
  "OperationLessEqual",
  "OperationGreater",
  "OperationGreaterEqual",
  "OperationAnd",
  "OperationOr",
  "OperationNilCoalesce",
  "OperationConcat",
] as const;

export type BinaryOperationName = (typeof BINARY_OPERATION_NAMES)[number];

export const BINARY_OPERATIONS: Record<BinaryOperationName, BinaryOperation> = {
  OperationPlus: "+",
  OperationMinus: "-",
  OperationMul: "*",
  OperationDiv: "/",
  OperationMod: "%",
  OperationEqual: "==",
  OperationNotEqual: "!=",
  OperationLess: "<",
  OperationLessEqual: "<=",
  OperationGreater: ">",
  OperationGreaterEqual: ">=",
  OperationAnd: "&&",
  OperationOr: "||",
  OperationNilCoalesce: "??",
  OperationConcat: "&",
};

export const BINARY_OPERATION_NAME: Record<BinaryOperation, BinaryOperationName> = {
  "+": "OperationPlus",
  "-": "OperationMinus",
  "*": "OperationMul",
  "/": "OperationDiv",
  "%": "OperationMod",
  "==": "OperationEqual",
  "!=": "OperationNotEqual",
  "<": "OperationLess",
  "<=": "OperationLessEqual",
  ">": "OperationGreater",
  ">=": "OperationGreaterEqual",
  "&&": "OperationAnd",
  "||": "OperationOr",
  "??": "OperationNilCoalesce",
  "&": "OperationConcat",
};

export const UNARY_OPERATION_NAMES = ["OperationMinus", "OperationNegate", "OperationMove"] as const;

export type UnaryOperationName = (typeof UNARY_OPERATION_NAMES)[number];

export const UNARY_OPERATIONS: Record<UnaryOperationName, UnaryOperation> = {
  OperationMinus: "-",
  OperationNegate: "!",
  OperationMove: "<-",
};

export const UNARY_OPERATION_NAME: Record<UnaryOperation, UnaryOperationName> = {
  "-": "OperationMinus",
  "!": "OperationNegate",
  "<-": "OperationMove",
};

export const TRANSFER_NAMES = ["TransferOperationCopy", "TransferOperationMove"] as const;

export type TransferName = (typeof TRANSFER_NAMES)[number];

export const TRANSFERS: Record<TransferName, Transfer> = {
  TransferOperationCopy: "=",
  TransferOperationMove: "<-",
};

export const TRANSFER_NAME: Record<Transfer, TransferName> = {
  "=": "TransferOperationCopy",
  "<-": "TransferOperationMove",
};

export const COMPOSITE_KIND_NAMES = ["CompositeKindStructure", "CompositeKindResource"] as const;

export type CompositeKindName = (typeof COMPOSITE_KIND_NAMES)[number];

export const COMPOSITE_KINDS: Record<CompositeKindName, CompositeKind> = {
  CompositeKindStructure: "structure",
  CompositeKindResource: "resource",
};

export const COMPOSITE_KIND_NAME: Record<CompositeKind, CompositeKindName> = {
  structure: "CompositeKindStructure",
  resource: "CompositeKindResource",
};
