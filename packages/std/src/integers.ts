/**
 * Lode std: integer conversion functions.
 *
 * `UInt8(x)` converts any integer to UInt8. Sized kinds expose `min` and
 * `max` as members, e.g. `Int16.max`.
 */
import {
  INTEGER_KINDS,
  type IntegerKind,
  InterpretationError,
  type Value,
  done,
  integerBitWidth,
  integerBounds,
  intValue,
  isInRange,
} from "@lode/core";
import { type NamedHostFunction, defineHostFunction, integerArg } from "./define.js";

function boundMembers(kind: IntegerKind): Array<[string, Value]> {
  if (integerBitWidth(kind) === undefined) return [];
  const { min, max } = integerBounds(kind);
  const members: Array<[string, Value]> = [];
  if (min !== undefined) members.push(["min", intValue(kind, min)]);
  if (max !== undefined) members.push(["max", intValue(kind, max)]);
  return members;
}

export function integerConverter(kind: IntegerKind): NamedHostFunction {
  return defineHostFunction(
    kind,
    (inv) => {
      const arg = integerArg(kind, inv, 0);
      if (!isInRange(kind, arg.value)) {
        throw new InterpretationError(
          "E_CONVERSION",
          `Cannot convert ${arg.value} (${arg.integerKind}) to ${kind}.`,
          inv.location,
          { from: arg.integerKind, to: kind, value: arg.value.toString() }
        );
      }
      return done(intValue(kind, arg.value));
    },
    {
      members: boundMembers(kind),
      type: {
        kind: "Function",
        parameterTypes: [{ kind: "Any" }],
        returnType: { kind: "Integer", integerKind: kind },
      },
    }
  );
}

export function integerConverters(): NamedHostFunction[] {
  return INTEGER_KINDS.map(integerConverter);
}
