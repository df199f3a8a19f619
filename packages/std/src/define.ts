/**
 * Helpers for defining standard library host functions.
 */
import {
  type FunctionType,
  type HostFunction,
  type HostFunctionValue,
  type Invocation,
  type Value,
  UnreachableError,
  argumentAt,
  describeValue,
  newHostFunction,
} from "@lode/core";

export type NamedHostFunction = HostFunctionValue & { name: string };

export function defineHostFunction(
  name: string,
  fn: HostFunction,
  options: { members?: Iterable<[string, Value]>; type?: FunctionType } = {}
): NamedHostFunction {
  return { ...newHostFunction(fn, { name, ...options }), name };
}

// --- Argument narrowing ---
// Mismatches mean the checker let an ill-typed call through.

function mismatch(fnName: string, index: number, expected: string, actual: Value, inv: Invocation): UnreachableError {
  return new UnreachableError(
    `${fnName}: argument ${index} must be ${expected}, got ${describeValue(actual)}`,
    inv.location
  );
}

export function arrayArg(fnName: string, inv: Invocation, index: number): Extract<Value, { kind: "Array" }> {
  const arg = argumentAt(inv, index);
  if (arg.kind !== "Array") throw mismatch(fnName, index, "an array", arg, inv);
  return arg;
}

export function functionArg(fnName: string, inv: Invocation, index: number): Value {
  const arg = argumentAt(inv, index);
  if (arg.kind !== "InterpretedFunction" && arg.kind !== "HostFunction") {
    throw mismatch(fnName, index, "a function", arg, inv);
  }
  return arg;
}

export function integerArg(fnName: string, inv: Invocation, index: number): Extract<Value, { kind: "Integer" }> {
  const arg = argumentAt(inv, index);
  if (arg.kind !== "Integer") throw mismatch(fnName, index, "an integer", arg, inv);
  return arg;
}

export function stringArg(fnName: string, inv: Invocation, index: number): string {
  const arg = argumentAt(inv, index);
  if (arg.kind !== "String") throw mismatch(fnName, index, "a String", arg, inv);
  return arg.value;
}

export function boolArg(fnName: string, inv: Invocation, index: number): boolean {
  const arg = argumentAt(inv, index);
  if (arg.kind !== "Bool") throw mismatch(fnName, index, "a Bool", arg, inv);
  return arg.value;
}
