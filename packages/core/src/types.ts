/**
 * Static types, as resolved by the checker.
 */
import type { IntegerKind } from "./integers.js";
import type { Value } from "./values.js";

export type CompositeKind = "structure" | "resource";

export interface FunctionType {
  kind: "Function";
  parameterTypes: StaticType[];
  returnType: StaticType;
}

export type StaticType =
  | { kind: "Any" }
  | { kind: "Never" }
  | { kind: "Void" }
  | { kind: "Bool" }
  | { kind: "String" }
  | { kind: "Integer"; integerKind: IntegerKind }
  | { kind: "Optional"; type: StaticType }
  | { kind: "Array"; elementType: StaticType }
  | { kind: "Dictionary"; keyType: StaticType; valueType: StaticType }
  | { kind: "Composite"; compositeKind: CompositeKind; identifier: string }
  | FunctionType;

export const ANY_TYPE: StaticType = { kind: "Any" };
export const NEVER_TYPE: StaticType = { kind: "Never" };
export const VOID_TYPE: StaticType = { kind: "Void" };

/** Display form of a type. Pieces are emitted from a work stack, so nesting depth costs no native stack. */
export function typeToString(type: StaticType): string {
  let out = "";
  const stack: Array<StaticType | string> = [type];
  for (;;) {
    const next = stack.pop();
    if (next === undefined) return out;
    if (typeof next === "string") {
      out += next;
      continue;
    }
    switch (next.kind) {
      case "Any":
      case "Never":
      case "Void":
      case "Bool":
      case "String":
        out += next.kind;
        break;
      case "Integer":
        out += next.integerKind;
        break;
      case "Optional":
        if (next.type.kind === "Function") stack.push(")?", next.type, "(");
        else stack.push("?", next.type);
        break;
      case "Array":
        stack.push("]", next.elementType, "[");
        break;
      case "Dictionary":
        stack.push("}", next.valueType, ": ", next.keyType, "{");
        break;
      case "Composite":
        out += next.identifier;
        break;
      case "Function":
        stack.push(")", next.returnType, "): ");
        for (let i = next.parameterTypes.length - 1; i >= 0; i--) {
          stack.push(next.parameterTypes[i]);
          if (i > 0) stack.push(", ");
        }
        stack.push("((");
        break;
    }
  }
}

/** Two types are equal when they display the same. */
export function typeEquals(a: StaticType, b: StaticType): boolean {
  const pending: Array<[StaticType, StaticType]> = [[a, b]];
  for (;;) {
    const pair = pending.pop();
    if (pair === undefined) return true;
    const [x, y] = pair;
    if (x === y) continue;
    switch (x.kind) {
      case "Any":
      case "Never":
      case "Void":
      case "Bool":
      case "String":
        if (y.kind !== x.kind) return false;
        break;
      case "Integer":
        if (y.kind !== "Integer" || y.integerKind !== x.integerKind) return false;
        break;
      case "Optional":
        if (y.kind !== "Optional") return false;
        pending.push([x.type, y.type]);
        break;
      case "Array":
        if (y.kind !== "Array") return false;
        pending.push([x.elementType, y.elementType]);
        break;
      case "Dictionary":
        if (y.kind !== "Dictionary") return false;
        pending.push([x.keyType, y.keyType], [x.valueType, y.valueType]);
        break;
      case "Composite":
        if (y.kind !== "Composite" || y.identifier !== x.identifier) return false;
        break;
      case "Function":
        if (y.kind !== "Function" || y.parameterTypes.length !== x.parameterTypes.length) return false;
        for (let i = 0; i < x.parameterTypes.length; i++) {
          pending.push([x.parameterTypes[i], y.parameterTypes[i]]);
        }
        pending.push([x.returnType, y.returnType]);
        break;
    }
  }
}

function commonType(types: StaticType[]): StaticType {
  const first = types[0];
  if (first === undefined) return NEVER_TYPE;
  return types.every((t) => typeEquals(t, first)) ? first : ANY_TYPE;
}

/** Type of a value that holds no other values. */
function scalarTypeOf(value: Value): StaticType {
  switch (value.kind) {
    case "Void":
      return VOID_TYPE;
    case "Bool":
      return { kind: "Bool" };
    case "String":
      return { kind: "String" };
    case "Integer":
      return { kind: "Integer", integerKind: value.integerKind };
    case "Nil":
      return { kind: "Optional", type: NEVER_TYPE };
    case "Composite":
      return { kind: "Composite", compositeKind: value.compositeKind, identifier: value.identifier };
    case "InterpretedFunction":
      return value.type;
    case "HostFunction":
      return value.type ?? ANY_TYPE;
    case "Some":
    case "Array":
    case "Dictionary":
      // resolved by dynamicTypeOf once their contents are typed
      return ANY_TYPE;
  }
}

type TypingWork = { enter: Value } | { exit: Value };

/**
 * The most specific static type describing a runtime value.
 * Used when the front end did not elaborate argument types.
 *
 * Containers are typed in post-order from a work stack: each one after all
 * of the values it holds.
 */
export function dynamicTypeOf(value: Value): StaticType {
  const types = new Map<Value, StaticType>();
  const typeOf = (v: Value): StaticType => types.get(v) ?? scalarTypeOf(v);
  const stack: TypingWork[] = [{ enter: value }];
  for (;;) {
    const work = stack.pop();
    if (work === undefined) return typeOf(value);
    if ("enter" in work) {
      const next = work.enter;
      if (types.has(next)) continue;
      switch (next.kind) {
        case "Some":
          stack.push({ exit: next }, { enter: next.value });
          break;
        case "Array":
          stack.push({ exit: next });
          for (const element of next.elements) stack.push({ enter: element });
          break;
        case "Dictionary":
          stack.push({ exit: next });
          for (const entry of next.entries.values()) stack.push({ enter: entry.key }, { enter: entry.value });
          break;
        default:
          break;
      }
      continue;
    }
    const container = work.exit;
    switch (container.kind) {
      case "Some":
        types.set(container, { kind: "Optional", type: typeOf(container.value) });
        break;
      case "Array":
        types.set(container, { kind: "Array", elementType: commonType(container.elements.map(typeOf)) });
        break;
      case "Dictionary": {
        const entries = [...container.entries.values()];
        types.set(container, {
          kind: "Dictionary",
          keyType: commonType(entries.map((e) => typeOf(e.key))),
          valueType: commonType(entries.map((e) => typeOf(e.value))),
        });
        break;
      }
      default:
        break;
    }
  }
}
