/**
 * Built-in members of arrays, dictionaries and strings.
 */
import type { Span } from "./ast.js";
import {
  arrayAppend,
  arrayInsert,
  arrayRemove,
  arrayRemoveFirst,
  arrayRemoveLast,
  dictionaryInsert,
  dictionaryRemove,
  toIndex,
} from "./containers.js";
import { InterpretationError, UnreachableError } from "./errors.js";
import { type Invocation, newSimpleHostFunction } from "./function.js";
import {
  type ArrayValue,
  type DictionaryValue,
  type StringValue,
  type Value,
  VOID,
  arrayValue,
  boolValue,
  copyValue,
  describeValue,
  hashKeyOf,
  intValue,
  stringValue,
  valueEquals,
} from "./values.js";

export function argumentAt(invocation: Invocation, index: number): Value {
  const arg = invocation.arguments[index];
  if (arg === undefined) {
    throw new UnreachableError(`missing argument ${index}`, invocation.location);
  }
  return arg;
}

function arrayMember(array: ArrayValue, name: string, span: Span): Value | undefined {
  switch (name) {
    case "length":
      return intValue("Int", array.elements.length);
    case "append":
      return newSimpleHostFunction("append", (inv) => {
        arrayAppend(array, argumentAt(inv, 0));
        return VOID;
      });
    case "insert":
      return newSimpleHostFunction("insert", (inv) => {
        arrayInsert(array, argumentAt(inv, 0), argumentAt(inv, 1), inv.location);
        return VOID;
      });
    case "remove":
      return newSimpleHostFunction("remove", (inv) => arrayRemove(array, argumentAt(inv, 0), inv.location));
    case "removeFirst":
      return newSimpleHostFunction("removeFirst", (inv) => arrayRemoveFirst(array, inv.location));
    case "removeLast":
      return newSimpleHostFunction("removeLast", (inv) => arrayRemoveLast(array, inv.location));
    case "contains":
      return newSimpleHostFunction("contains", (inv) => {
        const needle = argumentAt(inv, 0);
        return boolValue(array.elements.some((element) => valueEquals(element, needle)));
      });
    case "concat":
      return newSimpleHostFunction("concat", (inv) => {
        const other = argumentAt(inv, 0);
        if (other.kind !== "Array") {
          throw new UnreachableError(`concat expects an array, got ${describeValue(other)}`, span);
        }
        return arrayValue([...array.elements, ...other.elements].map((element) => copyValue(element, span)));
      });
    default:
      return undefined;
  }
}

function dictionaryMember(dictionary: DictionaryValue, name: string, span: Span): Value | undefined {
  switch (name) {
    case "length":
      return intValue("Int", dictionary.entries.size);
    case "keys":
      return arrayValue([...dictionary.entries.values()].map((entry) => entry.key));
    case "values":
      return arrayValue([...dictionary.entries.values()].map((entry) => copyValue(entry.value, span)));
    case "insert":
      return newSimpleHostFunction("insert", (inv) =>
        dictionaryInsert(dictionary, argumentAt(inv, 0), argumentAt(inv, 1), inv.location)
      );
    case "remove":
      return newSimpleHostFunction("remove", (inv) => dictionaryRemove(dictionary, argumentAt(inv, 0), inv.location));
    case "containsKey":
      return newSimpleHostFunction("containsKey", (inv) =>
        boolValue(dictionary.entries.has(hashKeyOf(argumentAt(inv, 0), inv.location)))
      );
    default:
      return undefined;
  }
}

function stringMember(str: StringValue, name: string): Value | undefined {
  const chars = [...str.value];
  switch (name) {
    case "length":
      return intValue("Int", chars.length);
    case "concat":
      return newSimpleHostFunction("concat", (inv) => {
        const other = argumentAt(inv, 0);
        if (other.kind !== "String") {
          throw new UnreachableError(`concat expects a String, got ${describeValue(other)}`, inv.location);
        }
        return stringValue(str.value + other.value);
      });
    case "slice":
      return newSimpleHostFunction("slice", (inv) => {
        const from = toIndex(argumentAt(inv, 0), inv.location);
        const upTo = toIndex(argumentAt(inv, 1), inv.location);
        if (from < 0n || upTo > BigInt(chars.length) || from > upTo) {
          throw new InterpretationError(
            "E_INDEX_OUT_OF_BOUNDS",
            `Slice ${from}..${upTo} out of bounds for string of length ${chars.length}.`,
            inv.location,
            { from: from.toString(), upTo: upTo.toString(), size: chars.length }
          );
        }
        return stringValue(chars.slice(Number(from), Number(upTo)).join(""));
      });
    default:
      return undefined;
  }
}

export function builtinMember(receiver: Value, name: string, span: Span): Value | undefined {
  switch (receiver.kind) {
    case "Array":
      return arrayMember(receiver, name, span);
    case "Dictionary":
      return dictionaryMember(receiver, name, span);
    case "String":
      return stringMember(receiver, name);
    default:
      return undefined;
  }
}
