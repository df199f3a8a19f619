/**
 * Runtime error classes.
 *
 * InterpretationError is a language-level failure of a valid program and is
 * reported through the driver's result. UnreachableError marks a broken
 * invariant (the checker or the engine let something through) and is never
 * turned into a result.
 */
import type { Span } from "./ast.js";
import type { JsonRecord } from "./trace.js";

export type InterpretationErrorCode =
  | "E_OVERFLOW"
  | "E_UNDERFLOW"
  | "E_DIVISION_BY_ZERO"
  | "E_INDEX_OUT_OF_BOUNDS"
  | "E_FORCE_NIL"
  | "E_USE_AFTER_MOVE"
  | "E_RESOURCE_DESTROYED"
  | "E_BUDGET"
  | "E_CANCELLED"
  | "E_HOST"
  | "E_PANIC"
  | "E_ASSERT"
  | "E_CONVERSION";

export class InterpretationError extends Error {
  code: InterpretationErrorCode;
  span?: Span;
  details?: JsonRecord;

  constructor(code: InterpretationErrorCode, message: string, span?: Span, details?: JsonRecord) {
    super(message);
    this.name = "InterpretationError";
    this.code = code;
    this.span = span;
    this.details = details;
  }
}

export class UnreachableError extends Error {
  readonly code = "E_UNREACHABLE";
  span?: Span;

  constructor(message: string, span?: Span) {
    super(`unreachable: ${message}`);
    this.name = "UnreachableError";
    this.span = span;
  }
}
