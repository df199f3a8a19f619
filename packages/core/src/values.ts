/**
 * Runtime value model: the closed set of value kinds, ownership metadata and
 * copy semantics.
 */
import type { Span } from "./ast.js";
import { UnreachableError } from "./errors.js";
import type { HostFunctionValue, InterpretedFunctionValue } from "./function.js";
import { type IntegerKind, isInRange } from "./integers.js";
import { type CompositeKind, dynamicTypeOf, typeToString } from "./types.js";

// --- Value types ---
export interface VoidValue {
  kind: "Void";
}

export interface BoolValue {
  kind: "Bool";
  value: boolean;
}

export interface IntegerValue {
  kind: "Integer";
  integerKind: IntegerKind;
  value: bigint;
}

export interface StringValue {
  kind: "String";
  value: string;
}

export interface NilValue {
  kind: "Nil";
}

export interface SomeValue {
  kind: "Some";
  value: Value;
  owner: string | null;
}

export interface ArrayValue {
  kind: "Array";
  elements: Value[];
  owner: string | null;
}

export interface DictionaryEntryValue {
  key: Value;
  value: Value;
}

export interface DictionaryValue {
  kind: "Dictionary";
  /** Keyed by the hash key of `entry.key`; Map order is insertion order. */
  entries: Map<string, DictionaryEntryValue>;
  owner: string | null;
}

export interface CompositeValue {
  kind: "Composite";
  compositeKind: CompositeKind;
  identifier: string;
  fields: Map<string, Value>;
  owner: string | null;
  destroyed: boolean;
}

export type Value =
  | VoidValue
  | BoolValue
  | IntegerValue
  | StringValue
  | NilValue
  | SomeValue
  | ArrayValue
  | DictionaryValue
  | CompositeValue
  | InterpretedFunctionValue
  | HostFunctionValue;

export type OwnedValue = SomeValue | ArrayValue | DictionaryValue | CompositeValue;

export type OptionalValue = SomeValue | NilValue;

// --- Constructors ---
export const VOID: VoidValue = Object.freeze({ kind: "Void" });

export const NIL: NilValue = Object.freeze({ kind: "Nil" });

export function boolValue(value: boolean): BoolValue {
  return { kind: "Bool", value };
}

export function intValue(integerKind: IntegerKind, value: bigint | number): IntegerValue {
  const big = BigInt(value);
  if (!isInRange(integerKind, big)) {
    throw new UnreachableError(`integer ${big} does not fit ${integerKind}`);
  }
  return { kind: "Integer", integerKind, value: big };
}

export function stringValue(value: string): StringValue {
  return { kind: "String", value };
}

export function someValue(value: Value, owner: string | null = null): SomeValue {
  const some: SomeValue = { kind: "Some", value, owner: null };
  if (owner !== null) setOwner(some, owner);
  return some;
}

export function optionalValue(value: Value | undefined): OptionalValue {
  return value === undefined ? NIL : someValue(value);
}

export function arrayValue(elements: Value[] = [], owner: string | null = null): ArrayValue {
  const array: ArrayValue = { kind: "Array", elements, owner: null };
  if (owner !== null) setOwner(array, owner);
  return array;
}

export function dictionaryValue(
  entries: Array<[Value, Value]> = [],
  owner: string | null = null
): DictionaryValue {
  const dictionary: DictionaryValue = { kind: "Dictionary", entries: new Map(), owner: null };
  for (const [key, value] of entries) {
    dictionary.entries.set(hashKeyOf(key), { key, value });
  }
  if (owner !== null) setOwner(dictionary, owner);
  return dictionary;
}

export function compositeValue(
  compositeKind: CompositeKind,
  identifier: string,
  fields: Iterable<[string, Value]> = [],
  owner: string | null = null
): CompositeValue {
  const composite: CompositeValue = {
    kind: "Composite",
    compositeKind,
    identifier,
    fields: new Map(fields),
    owner: null,
    destroyed: false,
  };
  if (owner !== null) setOwner(composite, owner);
  return composite;
}

// --- Dictionary keys ---

/**
 * Hash key for a dictionary key value. Only primitives are hashable.
 */
export function hashKeyOf(key: Value, span?: Span): string {
  switch (key.kind) {
    case "Bool":
      return `Bool:${key.value}`;
    case "Integer":
      return `${key.integerKind}:${key.value}`;
    case "String":
      return `String:${key.value}`;
    default:
      throw new UnreachableError(`${describeValue(key)} is not a valid dictionary key`, span);
  }
}

// --- Ownership ---
export function isOwned(value: Value): value is OwnedValue {
  return (
    value.kind === "Some" ||
    value.kind === "Array" ||
    value.kind === "Dictionary" ||
    value.kind === "Composite"
  );
}

/** The owning account, or null when the value has none (or cannot have one). */
export function getOwner(value: Value): string | null {
  return isOwned(value) ? value.owner : null;
}

/** The values directly held by a container; dictionary keys are primitives and left out. */
function nestedValues(value: OwnedValue): Iterable<Value> {
  switch (value.kind) {
    case "Some":
      return [value.value];
    case "Array":
      return value.elements;
    case "Dictionary":
      return [...value.entries.values()].map((entry) => entry.value);
    case "Composite":
      return value.fields.values();
  }
}

/**
 * Set the owner of a container and of every container nested in it.
 * Primitives and functions have no owner and are left untouched.
 */
export function setOwner(value: Value, owner: string | null): void {
  const stack: Value[] = [value];
  for (;;) {
    const next = stack.pop();
    if (next === undefined) return;
    if (!isOwned(next)) continue;
    next.owner = owner;
    for (const nested of nestedValues(next)) stack.push(nested);
  }
}

/** Whether a value is, or transitively holds, a resource. */
export function isResourceKinded(value: Value): boolean {
  const stack: Value[] = [value];
  for (;;) {
    const next = stack.pop();
    if (next === undefined) return false;
    switch (next.kind) {
      case "Composite":
        // structures never hold resources
        if (next.compositeKind === "resource") return true;
        break;
      case "Some":
      case "Array":
      case "Dictionary":
        for (const nested of nestedValues(next)) stack.push(nested);
        break;
      default:
        break;
    }
  }
}

// --- Copy ---

/** An unowned copy of a container with its children still shared; primitives come back as is. */
function shallowCopy(value: Value, span?: Span): Value {
  switch (value.kind) {
    case "Some":
      return someValue(value.value);
    case "Array":
      return arrayValue([...value.elements]);
    case "Dictionary": {
      const copy = dictionaryValue();
      for (const [hash, entry] of value.entries) {
        copy.entries.set(hash, { key: entry.key, value: entry.value });
      }
      return copy;
    }
    case "Composite":
      if (value.compositeKind === "resource") {
        throw new UnreachableError(`implicit copy of resource ${value.identifier}`, span);
      }
      return compositeValue("structure", value.identifier, value.fields);
    default:
      // primitives and functions are immutable
      return value;
  }
}

/**
 * Duplicate a value for a copy transfer. Copies are unowned.
 * Resources are never copied implicitly.
 *
 * Each container is copied shallowly and its shared children are then
 * replaced from a work stack, so nesting depth costs heap, not native stack.
 */
export function copyValue(value: Value, span?: Span): Value {
  const root = shallowCopy(value, span);
  const stack: Value[] = [root];
  for (;;) {
    const copy = stack.pop();
    if (copy === undefined) return root;
    switch (copy.kind) {
      case "Some":
        copy.value = shallowCopy(copy.value, span);
        stack.push(copy.value);
        break;
      case "Array":
        for (let i = 0; i < copy.elements.length; i++) {
          const child = shallowCopy(copy.elements[i], span);
          copy.elements[i] = child;
          stack.push(child);
        }
        break;
      case "Dictionary":
        for (const entry of copy.entries.values()) {
          entry.value = shallowCopy(entry.value, span);
          stack.push(entry.value);
        }
        break;
      case "Composite":
        for (const [name, field] of copy.fields) {
          const child = shallowCopy(field, span);
          copy.fields.set(name, child);
          stack.push(child);
        }
        break;
      default:
        break;
    }
  }
}

// --- Equality ---

/** Compare the value kinds and scalar parts of two values, leaving nested values to the caller. */
function shallowEquals(a: Value, b: Value, pending: Array<[Value, Value]>): boolean {
  switch (a.kind) {
    case "Void":
    case "Nil":
      return b.kind === a.kind;
    case "Bool":
      return b.kind === "Bool" && a.value === b.value;
    case "String":
      return b.kind === "String" && a.value === b.value;
    case "Integer":
      return b.kind === "Integer" && a.integerKind === b.integerKind && a.value === b.value;
    case "Some":
      if (b.kind !== "Some") return false;
      pending.push([a.value, b.value]);
      return true;
    case "Array":
      if (b.kind !== "Array" || a.elements.length !== b.elements.length) return false;
      for (let i = 0; i < a.elements.length; i++) {
        pending.push([a.elements[i], b.elements[i]]);
      }
      return true;
    case "Dictionary": {
      if (b.kind !== "Dictionary" || a.entries.size !== b.entries.size) return false;
      for (const [hash, entry] of a.entries) {
        const other = b.entries.get(hash);
        if (!other) return false;
        pending.push([entry.value, other.value]);
      }
      return true;
    }
    case "Composite": {
      if (
        b.kind !== "Composite" ||
        a.identifier !== b.identifier ||
        a.compositeKind !== b.compositeKind ||
        a.fields.size !== b.fields.size
      ) {
        return false;
      }
      for (const [name, field] of a.fields) {
        const other = b.fields.get(name);
        if (!other) return false;
        pending.push([field, other]);
      }
      return true;
    }
    case "InterpretedFunction":
    case "HostFunction":
      // functions compare by identity
      return false;
  }
}

/** Structural equality. Integers are equal only when both kind and value match. */
export function valueEquals(a: Value, b: Value): boolean {
  const pending: Array<[Value, Value]> = [[a, b]];
  for (;;) {
    const pair = pending.pop();
    if (pair === undefined) return true;
    const [left, right] = pair;
    if (left === right) continue;
    if (!shallowEquals(left, right, pending)) return false;
  }
}

/** Type name of a value, for diagnostics. */
export function describeValue(value: Value): string {
  return typeToString(dynamicTypeOf(value));
}
