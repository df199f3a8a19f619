/**
 * @lode/std - Lode standard library
 */
import type { Value } from "@lode/core";
export { defineHostFunction } from "./define.js";
export type { NamedHostFunction } from "./define.js";
export { logFn, panicFn, assertFn } from "./logging.js";
export { mapFn, filterFn, reduceFn, rangeFn } from "./collections.js";
export { integerConverter, integerConverters } from "./integers.js";

import { logFn, panicFn, assertFn } from "./logging.js";
import { mapFn, filterFn, reduceFn, rangeFn } from "./collections.js";
import { integerConverters } from "./integers.js";

/**
 * Get all standard library functions as predeclared values.
 */
export function getStandardLibrary(): Map<string, Value> {
  const fns = new Map<string, Value>();
  for (const fn of [logFn, panicFn, assertFn, mapFn, filterFn, reduceFn, rangeFn, ...integerConverters()]) {
    fns.set(fn.name, fn);
  }
  return fns;
}
