/**
 * Strict (non short-circuiting) operators on evaluated operands.
 */
import type { BinaryOperation, Span } from "./ast.js";
import { UnreachableError } from "./errors.js";
import { integerArithmetic, integerNegate } from "./integers.js";
import { type Value, boolValue, describeValue, stringValue, valueEquals } from "./values.js";

export type StrictBinaryOperation = Exclude<BinaryOperation, "&&" | "||" | "??">;

function mismatch(op: string, left: Value, right: Value, span: Span): UnreachableError {
  return new UnreachableError(
    `operator '${op}' is not defined for ${describeValue(left)} and ${describeValue(right)}`,
    span
  );
}

export function evaluateBinaryOperation(
  op: StrictBinaryOperation,
  left: Value,
  right: Value,
  span: Span
): Value {
  switch (op) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "%": {
      if (left.kind !== "Integer" || right.kind !== "Integer" || left.integerKind !== right.integerKind) {
        throw mismatch(op, left, right, span);
      }
      return {
        kind: "Integer",
        integerKind: left.integerKind,
        value: integerArithmetic(op, left.integerKind, left.value, right.value, span),
      };
    }

    case "&":
      if (left.kind !== "String" || right.kind !== "String") {
        throw mismatch(op, left, right, span);
      }
      return stringValue(left.value + right.value);

    case "==":
      return boolValue(valueEquals(left, right));
    case "!=":
      return boolValue(!valueEquals(left, right));

    case "<":
    case "<=":
    case ">":
    case ">=": {
      if (left.kind === "Integer" && right.kind === "Integer") {
        return boolValue(compare(op, left.value, right.value));
      }
      if (left.kind === "String" && right.kind === "String") {
        return boolValue(compare(op, left.value, right.value));
      }
      throw mismatch(op, left, right, span);
    }
  }
}

function compare<T extends bigint | string>(op: "<" | "<=" | ">" | ">=", left: T, right: T): boolean {
  switch (op) {
    case "<": return left < right;
    case "<=": return left <= right;
    case ">": return left > right;
    case ">=": return left >= right;
  }
}

export function evaluateNegation(operand: Value, span: Span): Value {
  if (operand.kind !== "Integer") {
    throw new UnreachableError(`unary '-' is not defined for ${describeValue(operand)}`, span);
  }
  return {
    kind: "Integer",
    integerKind: operand.integerKind,
    value: integerNegate(operand.integerKind, operand.value, span),
  };
}

export function evaluateNot(operand: Value, span: Span): Value {
  if (operand.kind !== "Bool") {
    throw new UnreachableError(`unary '!' is not defined for ${describeValue(operand)}`, span);
  }
  return boolValue(!operand.value);
}

/** Narrow to a boolean, for conditions. */
export function expectBool(value: Value, span: Span): boolean {
  if (value.kind !== "Bool") {
    throw new UnreachableError(`expected Bool, got ${describeValue(value)}`, span);
  }
  return value.value;
}
