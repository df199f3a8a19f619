/**
 * JSON rendering of a value graph, rebuilt from the inspector's event stream.
 */
import { UnreachableError } from "./errors.js";
import { inspectValue, isEndMarker } from "./inspect.js";
import type { JsonRecord, JsonValue } from "./trace.js";
import type { CompositeValue, Value } from "./values.js";

type Frame =
  | { of: "Some"; value: JsonValue }
  | { of: "Array"; values: JsonValue[] }
  | { of: "Dictionary"; entries: JsonRecord[]; key?: JsonValue }
  | { of: "Composite"; composite: CompositeValue; values: JsonValue[] };

function exportLeaf(value: Value): JsonValue {
  switch (value.kind) {
    case "Void":
      return { type: "Void" };
    case "Bool":
      return { type: "Bool", value: value.value };
    case "Integer":
      return { type: value.integerKind, value: value.value.toString() };
    case "String":
      return { type: "String", value: value.value };
    case "Nil":
      return { type: "Optional", value: null };
    case "InterpretedFunction":
    case "HostFunction":
      return { type: "Function", value: value.name ?? null };
    default:
      throw new UnreachableError(`${value.kind} is not a leaf value`);
  }
}

function closeFrame(frame: Frame): JsonValue {
  switch (frame.of) {
    case "Some":
      return { type: "Optional", value: frame.value };
    case "Array":
      return { type: "Array", value: frame.values };
    case "Dictionary":
      return { type: "Dictionary", value: frame.entries };
    case "Composite": {
      const names = [...frame.composite.fields.keys()];
      return {
        type: frame.composite.compositeKind === "resource" ? "Resource" : "Struct",
        value: {
          id: frame.composite.identifier,
          fields: names.map((name, i) => ({ name, value: frame.values[i] ?? null })),
        },
      };
    }
  }
}

export function exportValue(root: Value): JsonValue {
  const frames: Frame[] = [];
  let result: JsonValue = null;

  const emit = (json: JsonValue): void => {
    const top = frames[frames.length - 1];
    if (top === undefined) {
      result = json;
      return;
    }
    switch (top.of) {
      case "Some":
        top.value = json;
        return;
      case "Array":
      case "Composite":
        top.values.push(json);
        return;
      case "Dictionary":
        if (top.key === undefined) {
          top.key = json;
        } else {
          top.entries.push({ key: top.key, value: json });
          top.key = undefined;
        }
        return;
    }
  };

  inspectValue(root, (node) => {
    if (isEndMarker(node)) {
      if (node.of === "DictionaryKey" || node.of === "DictionaryValue") return true;
      const frame = frames.pop();
      if (frame === undefined) throw new UnreachableError("unbalanced end marker");
      emit(closeFrame(frame));
      return true;
    }
    switch (node.kind) {
      case "Some":
        frames.push({ of: "Some", value: null });
        return true;
      case "Array":
        frames.push({ of: "Array", values: [] });
        return true;
      case "Dictionary":
        frames.push({ of: "Dictionary", entries: [] });
        return true;
      case "Composite":
        frames.push({ of: "Composite", composite: node, values: [] });
        return true;
      default:
        emit(exportLeaf(node));
        return false;
    }
  });

  return result;
}
