/**
 * Tests for the value inspector and JSON export.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { exportValue } from "./export.js";
import { newSimpleHostFunction } from "./function.js";
import {
  END_OF_ARRAY,
  END_OF_COMPOSITE,
  END_OF_DICTIONARY,
  END_OF_DICTIONARY_KEY,
  END_OF_DICTIONARY_VALUE,
  END_OF_OPTIONAL,
  type InspectedNode,
  inspectValue,
  isEndMarker,
} from "./inspect.js";
import {
  NIL,
  VOID,
  type Value,
  arrayValue,
  boolValue,
  compositeValue,
  dictionaryValue,
  intValue,
  someValue,
  stringValue,
} from "./values.js";

function collect(root: Value, descend: (node: InspectedNode) => boolean = () => true): InspectedNode[] {
  const seen: InspectedNode[] = [];
  inspectValue(root, (node) => {
    seen.push(node);
    return descend(node);
  });
  return seen;
}

describe("inspectValue", () => {
  it("walks nested containers in pre-order with end markers", () => {
    const key = stringValue("hello world");
    const one = intValue("Int256", 1);
    const dictionary = dictionaryValue([[key, one]]);
    const array = arrayValue([dictionary]);
    const optional = someValue(array);
    const composite = compositeValue("structure", "C", [["value", optional]], null);

    const seen = collect(composite);

    assert.equal(seen.length, 12);
    assert.equal(seen[0], composite);
    assert.equal(seen[1], optional);
    assert.equal(seen[2], array);
    assert.equal(seen[3], dictionary);
    assert.equal(seen[4], key);
    assert.equal(seen[5], END_OF_DICTIONARY_KEY);
    assert.equal(seen[6], one);
    assert.equal(seen[7], END_OF_DICTIONARY_VALUE);
    assert.equal(seen[8], END_OF_DICTIONARY);
    assert.equal(seen[9], END_OF_ARRAY);
    assert.equal(seen[10], END_OF_OPTIONAL);
    assert.equal(seen[11], END_OF_COMPOSITE);
  });

  it("keeps nil values distinct from end markers", () => {
    const seen = collect(arrayValue([NIL, NIL]));
    assert.equal(seen.length, 4);
    assert.equal(seen[1], NIL);
    assert.equal(seen[2], NIL);
    assert.equal(seen[3], END_OF_ARRAY);
    assert.equal(isEndMarker(NIL), false);
    assert.equal(isEndMarker(END_OF_ARRAY), true);
  });

  it("prunes a subtree without its end marker", () => {
    const inner = arrayValue([intValue("Int", 1), intValue("Int", 2)]);
    const outer = arrayValue([inner, stringValue("after")]);
    const seen = collect(outer, (node) => node !== inner);
    assert.deepEqual(seen, [outer, inner, stringValue("after"), END_OF_ARRAY]);
  });

  it("visits dictionary entries in insertion order", () => {
    const dict = dictionaryValue([
      [stringValue("z"), intValue("Int", 1)],
      [stringValue("a"), intValue("Int", 2)],
    ]);
    const keys = collect(dict)
      .filter((node): node is Value => !isEndMarker(node) && node.kind === "String")
      .map((node) => (node.kind === "String" ? node.value : ""));
    assert.deepEqual(keys, ["z", "a"]);
  });

  it("walks very deep nesting without recursion", () => {
    let value: Value = intValue("Int", 0);
    for (let i = 0; i < 50_000; i++) {
      value = someValue(value);
    }
    assert.equal(collect(value).length, 100_001);
  });

  it("freezes end markers", () => {
    assert.equal(Object.isFrozen(END_OF_COMPOSITE), true);
  });
});

describe("exportValue", () => {
  it("exports leaves", () => {
    assert.deepEqual(exportValue(intValue("Int256", 1)), { type: "Int256", value: "1" });
    assert.deepEqual(exportValue(boolValue(true)), { type: "Bool", value: true });
    assert.deepEqual(exportValue(VOID), { type: "Void" });
    assert.deepEqual(exportValue(NIL), { type: "Optional", value: null });
  });

  it("exports a composite graph", () => {
    const composite = compositeValue("resource", "Vault", [
      ["balance", intValue("UInt64", 5)],
      ["tags", dictionaryValue([[stringValue("k"), someValue(stringValue("v"))]])],
      ["history", arrayValue([boolValue(false)])],
    ]);
    assert.deepEqual(exportValue(composite), {
      type: "Resource",
      value: {
        id: "Vault",
        fields: [
          { name: "balance", value: { type: "UInt64", value: "5" } },
          {
            name: "tags",
            value: {
              type: "Dictionary",
              value: [
                {
                  key: { type: "String", value: "k" },
                  value: { type: "Optional", value: { type: "String", value: "v" } },
                },
              ],
            },
          },
          { name: "history", value: { type: "Array", value: [{ type: "Bool", value: false }] } },
        ],
      },
    });
  });

  it("exports functions by name", () => {
    const fn = newSimpleHostFunction("noop", () => VOID);
    assert.deepEqual(exportValue(arrayValue([fn])), {
      type: "Array",
      value: [{ type: "Function", value: "noop" }],
    });
  });
});
