/**
 * Lode std: higher-order collection functions and range.
 *
 * Callbacks re-enter the interpreter through `invokeFunctionValue`, so a
 * callback runs in the same stepped execution as its caller.
 */
import {
  type Invocation,
  type Trampoline,
  type Value,
  UnreachableError,
  argumentAt,
  arrayValue,
  copyValue,
  done,
  dynamicTypeOf,
  intValue,
  invokeFunctionValue,
  sequence,
} from "@lode/core";
import { arrayArg, defineHostFunction, functionArg, integerArg } from "./define.js";

function callBack(fn: Value, args: Value[], inv: Invocation): Trampoline<Value> {
  return invokeFunctionValue(fn, {
    arguments: args,
    argumentTypes: args.map(dynamicTypeOf),
    location: inv.location,
    interpreter: inv.interpreter,
  });
}

/**
 * map(array, fn) -> array
 */
export const mapFn = defineHostFunction("map", (inv) => {
  const array = arrayArg("map", inv, 0);
  const fn = functionArg("map", inv, 1);
  return sequence(array.elements, (element) => callBack(fn, [copyValue(element, inv.location)], inv)).map(
    (results) => arrayValue(results)
  );
});

/**
 * filter(array, predicate) -> array
 * Keeps the elements for which the predicate returns true.
 */
export const filterFn = defineHostFunction("filter", (inv) => {
  const array = arrayArg("filter", inv, 0);
  const predicate = functionArg("filter", inv, 1);
  const kept: Value[] = [];
  return sequence(array.elements, (element) =>
    callBack(predicate, [copyValue(element, inv.location)], inv).map((keep) => {
      if (keep.kind !== "Bool") {
        throw new UnreachableError("filter: predicate must return a Bool", inv.location);
      }
      if (keep.value) kept.push(copyValue(element, inv.location));
      return keep;
    })
  ).map(() => arrayValue(kept));
});

/**
 * reduce(array, initial, fn) -> value
 * Folds left: fn(accumulator, element).
 */
export const reduceFn = defineHostFunction("reduce", (inv) => {
  const array = arrayArg("reduce", inv, 0);
  const fn = functionArg("reduce", inv, 2);
  const step = (index: number, accumulator: Value): Trampoline<Value> => {
    if (index >= array.elements.length) return done(accumulator);
    const element = copyValue(array.elements[index], inv.location);
    return callBack(fn, [accumulator, element], inv).flatMap((next) => step(index + 1, next));
  };
  return step(0, argumentAt(inv, 1));
});

/**
 * range(from, to) -> [Int]
 * From inclusive to exclusive; empty when to <= from.
 */
export const rangeFn = defineHostFunction("range", (inv) => {
  const from = integerArg("range", inv, 0).value;
  const to = integerArg("range", inv, 1).value;
  const elements: Value[] = [];
  for (let i = from; i < to; i++) {
    elements.push(intValue("Int", i));
  }
  return done(arrayValue(elements));
});
