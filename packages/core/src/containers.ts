/**
 * Container operations. Every value placed into a container takes the
 * container's owner.
 */
import type { Span } from "./ast.js";
import { InterpretationError, UnreachableError } from "./errors.js";
import {
  type ArrayValue,
  type CompositeValue,
  type DictionaryValue,
  type OptionalValue,
  type OwnedValue,
  type Value,
  NIL,
  describeValue,
  hashKeyOf,
  setOwner,
  someValue,
} from "./values.js";

function adopt(container: OwnedValue, value: Value): void {
  setOwner(value, container.owner);
}

function indexOutOfBounds(index: bigint, size: number, span?: Span): InterpretationError {
  return new InterpretationError(
    "E_INDEX_OUT_OF_BOUNDS",
    `Index ${index} out of bounds for array of size ${size}.`,
    span,
    { index: index.toString(), size }
  );
}

export function toIndex(index: Value, span?: Span): bigint {
  if (index.kind !== "Integer") {
    throw new UnreachableError(`array index must be an integer, got ${describeValue(index)}`, span);
  }
  return index.value;
}

function checkedIndex(array: ArrayValue, index: Value, span: Span | undefined, allowEnd = false): number {
  const i = toIndex(index, span);
  const limit = BigInt(array.elements.length) + (allowEnd ? 1n : 0n);
  if (i < 0n || i >= limit) {
    throw indexOutOfBounds(i, array.elements.length, span);
  }
  return Number(i);
}

// --- Arrays ---
export function arrayGet(array: ArrayValue, index: Value, span?: Span): Value {
  const i = checkedIndex(array, index, span);
  const element = array.elements[i];
  if (element === undefined) throw indexOutOfBounds(BigInt(i), array.elements.length, span);
  return element;
}

export function arraySet(array: ArrayValue, index: Value, value: Value, span?: Span): void {
  const i = checkedIndex(array, index, span);
  adopt(array, value);
  array.elements[i] = value;
}

export function arrayAppend(array: ArrayValue, value: Value): void {
  adopt(array, value);
  array.elements.push(value);
}

export function arrayInsert(array: ArrayValue, index: Value, value: Value, span?: Span): void {
  const i = checkedIndex(array, index, span, true);
  adopt(array, value);
  array.elements.splice(i, 0, value);
}

export function arrayRemove(array: ArrayValue, index: Value, span?: Span): Value {
  const i = checkedIndex(array, index, span);
  const [removed] = array.elements.splice(i, 1);
  if (removed === undefined) throw indexOutOfBounds(BigInt(i), array.elements.length, span);
  return removed;
}

export function arrayRemoveFirst(array: ArrayValue, span?: Span): Value {
  const removed = array.elements.shift();
  if (removed === undefined) throw indexOutOfBounds(0n, 0, span);
  return removed;
}

export function arrayRemoveLast(array: ArrayValue, span?: Span): Value {
  const removed = array.elements.pop();
  if (removed === undefined) throw indexOutOfBounds(-1n, 0, span);
  return removed;
}

// --- Dictionaries ---
export function dictionaryGet(dictionary: DictionaryValue, key: Value, span?: Span): OptionalValue {
  const entry = dictionary.entries.get(hashKeyOf(key, span));
  return entry ? someValue(entry.value) : NIL;
}

/** Insert or replace; returns the previous value as an optional. */
export function dictionaryInsert(
  dictionary: DictionaryValue,
  key: Value,
  value: Value,
  span?: Span
): OptionalValue {
  const hash = hashKeyOf(key, span);
  const previous = dictionary.entries.get(hash);
  adopt(dictionary, value);
  dictionary.entries.set(hash, { key, value });
  return previous ? someValue(previous.value) : NIL;
}

export function dictionaryRemove(dictionary: DictionaryValue, key: Value, span?: Span): OptionalValue {
  const hash = hashKeyOf(key, span);
  const previous = dictionary.entries.get(hash);
  if (!previous) return NIL;
  dictionary.entries.delete(hash);
  return someValue(previous.value);
}

/**
 * Index assignment `d[k] = v`: `Some` inserts the wrapped value, `Nil`
 * removes the entry.
 */
export function dictionarySet(dictionary: DictionaryValue, key: Value, value: Value, span?: Span): void {
  switch (value.kind) {
    case "Some":
      dictionaryInsert(dictionary, key, value.value, span);
      return;
    case "Nil":
      dictionaryRemove(dictionary, key, span);
      return;
    default:
      throw new UnreachableError(`dictionary assignment requires an optional, got ${describeValue(value)}`, span);
  }
}

// --- Composites ---
export function checkNotDestroyed(composite: CompositeValue, span?: Span): void {
  if (composite.destroyed) {
    throw new InterpretationError(
      "E_RESOURCE_DESTROYED",
      `Resource ${composite.identifier} was already destroyed.`,
      span,
      { type: composite.identifier }
    );
  }
}

export function compositeGetField(composite: CompositeValue, name: string, span?: Span): Value | undefined {
  checkNotDestroyed(composite, span);
  return composite.fields.get(name);
}

export function compositeSetField(composite: CompositeValue, name: string, value: Value, span?: Span): void {
  checkNotDestroyed(composite, span);
  adopt(composite, value);
  composite.fields.set(name, value);
}
