/**
 * Depth-first traversal of a value graph.
 *
 * `visit` sees every value once, in pre-order, and returns whether to
 * descend into it. After the children of a container the traversal emits an
 * end marker naming the container, so consumers can track nesting without a
 * stack of their own. End markers are never Values; `Nil` is a Value.
 */
import type { Value } from "./values.js";

export type ContainerBoundary =
  | "Some"
  | "Array"
  | "Dictionary"
  | "DictionaryKey"
  | "DictionaryValue"
  | "Composite";

export interface EndMarker {
  readonly kind: "End";
  readonly of: ContainerBoundary;
}

function endMarker(of: ContainerBoundary): EndMarker {
  return Object.freeze({ kind: "End", of });
}

export const END_OF_OPTIONAL = endMarker("Some");
export const END_OF_ARRAY = endMarker("Array");
export const END_OF_DICTIONARY = endMarker("Dictionary");
export const END_OF_DICTIONARY_KEY = endMarker("DictionaryKey");
export const END_OF_DICTIONARY_VALUE = endMarker("DictionaryValue");
export const END_OF_COMPOSITE = endMarker("Composite");

export type InspectedNode = Value | EndMarker;

export type ValueVisitor = (node: InspectedNode) => boolean;

export function isEndMarker(node: InspectedNode): node is EndMarker {
  return node.kind === "End";
}

/** Work items in the reverse of the order they are emitted. */
function childrenOf(value: Value): InspectedNode[] | undefined {
  switch (value.kind) {
    case "Some":
      return [END_OF_OPTIONAL, value.value];
    case "Array": {
      const work: InspectedNode[] = [END_OF_ARRAY];
      for (let i = value.elements.length - 1; i >= 0; i--) {
        work.push(value.elements[i]);
      }
      return work;
    }
    case "Dictionary": {
      const work: InspectedNode[] = [END_OF_DICTIONARY];
      const entries = [...value.entries.values()];
      for (let i = entries.length - 1; i >= 0; i--) {
        const entry = entries[i];
        work.push(END_OF_DICTIONARY_VALUE, entry.value, END_OF_DICTIONARY_KEY, entry.key);
      }
      return work;
    }
    case "Composite": {
      const work: InspectedNode[] = [END_OF_COMPOSITE];
      const fields = [...value.fields.values()];
      for (let i = fields.length - 1; i >= 0; i--) {
        work.push(fields[i]);
      }
      return work;
    }
    default:
      return undefined;
  }
}

export function inspectValue(root: Value, visit: ValueVisitor): void {
  const stack: InspectedNode[] = [root];
  for (;;) {
    const node = stack.pop();
    if (node === undefined) return;
    if (isEndMarker(node)) {
      visit(node);
      continue;
    }
    if (!visit(node)) continue;
    const children = childrenOf(node);
    if (children) {
      for (const child of children) stack.push(child);
    }
  }
}
