/**
 * Integer kinds and checked arithmetic.
 */
import type { Span } from "./ast.js";
import { InterpretationError } from "./errors.js";

export const INTEGER_KINDS = [
  "Int", "Int8", "Int16", "Int32", "Int64", "Int128", "Int256",
  "UInt", "UInt8", "UInt16", "UInt32", "UInt64", "UInt128", "UInt256",
] as const;

export type IntegerKind = (typeof INTEGER_KINDS)[number];

export interface IntegerBounds {
  min?: bigint;
  max?: bigint;
}

export type ArithmeticOperation = "+" | "-" | "*" | "/" | "%";

export function isIntegerKind(name: string): name is IntegerKind {
  return INTEGER_KINDS.some((kind) => kind === name);
}

export function isSignedKind(kind: IntegerKind): boolean {
  return kind.startsWith("Int");
}

/** Bit width of a sized kind, undefined for `Int` and `UInt`. */
export function integerBitWidth(kind: IntegerKind): number | undefined {
  const digits = kind.slice(isSignedKind(kind) ? 3 : 4);
  return digits === "" ? undefined : Number(digits);
}

export function integerBounds(kind: IntegerKind): IntegerBounds {
  const bits = integerBitWidth(kind);
  const signed = isSignedKind(kind);
  if (bits === undefined) {
    return signed ? {} : { min: 0n };
  }
  const width = BigInt(bits);
  if (signed) {
    return { min: -(1n << (width - 1n)), max: (1n << (width - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << width) - 1n };
}

export function isInRange(kind: IntegerKind, value: bigint): boolean {
  const { min, max } = integerBounds(kind);
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

export function checkIntegerRange(
  kind: IntegerKind,
  value: bigint,
  operation: string,
  span?: Span
): bigint {
  const { min, max } = integerBounds(kind);
  if (max !== undefined && value > max) {
    throw new InterpretationError(
      "E_OVERFLOW",
      `Arithmetic overflow: ${operation} on ${kind} exceeds ${max}.`,
      span,
      { operation, type: kind, result: value.toString() }
    );
  }
  if (min !== undefined && value < min) {
    throw new InterpretationError(
      "E_UNDERFLOW",
      `Arithmetic underflow: ${operation} on ${kind} is below ${min}.`,
      span,
      { operation, type: kind, result: value.toString() }
    );
  }
  return value;
}

export function integerArithmetic(
  operation: ArithmeticOperation,
  kind: IntegerKind,
  left: bigint,
  right: bigint,
  span?: Span
): bigint {
  switch (operation) {
    case "+":
      return checkIntegerRange(kind, left + right, operation, span);
    case "-":
      return checkIntegerRange(kind, left - right, operation, span);
    case "*":
      return checkIntegerRange(kind, left * right, operation, span);
    case "/":
    case "%": {
      if (right === 0n) {
        throw new InterpretationError(
          "E_DIVISION_BY_ZERO",
          operation === "/" ? "Division by zero." : "Remainder by zero.",
          span,
          { operation, type: kind, left: left.toString() }
        );
      }
      // bigint division truncates toward zero
      return checkIntegerRange(kind, operation === "/" ? left / right : left % right, operation, span);
    }
  }
}

export function integerNegate(kind: IntegerKind, value: bigint, span?: Span): bigint {
  return checkIntegerRange(kind, -value, "-", span);
}
