/**
 * Tests for the value model: ownership, copies, equality and containers.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  arrayAppend,
  arrayGet,
  arrayInsert,
  arrayRemove,
  arrayRemoveLast,
  compositeGetField,
  compositeSetField,
  dictionaryGet,
  dictionaryInsert,
  dictionarySet,
} from "./containers.js";
import { InterpretationError, UnreachableError } from "./errors.js";
import {
  NIL,
  arrayValue,
  compositeValue,
  copyValue,
  describeValue,
  dictionaryValue,
  getOwner,
  intValue,
  isResourceKinded,
  setOwner,
  someValue,
  stringValue,
  type ArrayValue,
  type Value,
  valueEquals,
} from "./values.js";

function expectCode(code: string) {
  return (err: unknown): boolean => {
    assert.ok(err instanceof InterpretationError);
    assert.equal(err.code, code);
    return true;
  };
}

describe("Ownership", () => {
  it("reports no owner for primitives", () => {
    assert.equal(getOwner(intValue("Int", 1)), null);
    assert.equal(getOwner(stringValue("s")), null);
    const s = stringValue("s");
    setOwner(s, "0x01");
    assert.equal(getOwner(s), null);
  });

  it("propagates the owner to every nested container", () => {
    const vault = compositeValue("resource", "Vault", [["balance", intValue("UInt64", 10)]]);
    const inner = arrayValue([vault]);
    const outer = someValue(inner);
    setOwner(outer, "0x01");
    assert.equal(getOwner(outer), "0x01");
    assert.equal(getOwner(inner), "0x01");
    assert.equal(getOwner(vault), "0x01");

    setOwner(outer, null);
    assert.equal(getOwner(vault), null);
  });

  it("makes inserted values adopt the container's owner", () => {
    const storage = arrayValue([], "0x02");
    const vault = compositeValue("resource", "Vault", []);
    arrayAppend(storage, vault);
    assert.equal(getOwner(vault), "0x02");

    const dict = dictionaryValue([], "0x03");
    const token = compositeValue("resource", "Token", []);
    dictionaryInsert(dict, stringValue("t"), token);
    assert.equal(getOwner(token), "0x03");
  });

  it("detects resources nested in containers", () => {
    const r = compositeValue("resource", "R", []);
    assert.equal(isResourceKinded(arrayValue([someValue(r)])), true);
    assert.equal(isResourceKinded(arrayValue([intValue("Int", 1)])), false);
  });
});

describe("copyValue", () => {
  it("copies structures so later writes do not leak back", () => {
    const s = compositeValue("structure", "S", [["f", intValue("Int", 1)]]);
    const t = copyValue(s);
    assert.ok(t.kind === "Composite");
    compositeSetField(t, "f", intValue("Int", 2));
    assert.deepEqual(compositeGetField(s, "f"), intValue("Int", 1));
    assert.deepEqual(compositeGetField(t, "f"), intValue("Int", 2));
  });

  it("deep-copies arrays and dictionaries", () => {
    const nested = arrayValue([intValue("Int", 1)]);
    const original = dictionaryValue([[stringValue("k"), nested]]);
    const copy = copyValue(original);
    assert.ok(copy.kind === "Dictionary");
    const copied = dictionaryGet(copy, stringValue("k"));
    assert.ok(copied.kind === "Some" && copied.value.kind === "Array");
    arrayAppend(copied.value, intValue("Int", 2));
    assert.equal(nested.elements.length, 1);
  });

  it("returns primitives as they are", () => {
    const s = stringValue("same");
    assert.equal(copyValue(s), s);
  });

  it("refuses to copy a resource", () => {
    const r = compositeValue("resource", "R", []);
    assert.throws(() => copyValue(arrayValue([r])), UnreachableError);
  });

  it("drops the owner on copies", () => {
    const owned = arrayValue([intValue("Int", 1)], "0x01");
    assert.equal(getOwner(copyValue(owned)), null);
  });
});

describe("valueEquals", () => {
  it("compares containers structurally", () => {
    const a = arrayValue([someValue(stringValue("x")), NIL]);
    const b = arrayValue([someValue(stringValue("x")), NIL]);
    assert.equal(valueEquals(a, b), true);
    assert.equal(valueEquals(a, arrayValue([NIL])), false);
  });

  it("distinguishes nil from a present value", () => {
    assert.equal(valueEquals(NIL, someValue(NIL)), false);
  });

  it("treats integers of different kinds as different values", () => {
    assert.equal(valueEquals(intValue("Int8", 1), intValue("Int", 1)), false);
    assert.equal(valueEquals(intValue("Int8", 1), intValue("Int8", 1)), true);
    const keyed = dictionaryValue([[intValue("Int8", 1), stringValue("a")]]);
    assert.deepEqual(dictionaryGet(keyed, intValue("Int", 1)), NIL);
  });
});

describe("Deeply nested values", () => {
  const depth = 100_000;

  function nest(leaf: Value): { outer: ArrayValue; inner: ArrayValue } {
    const inner = arrayValue([leaf]);
    let outer = inner;
    for (let i = 1; i < depth; i++) {
      outer = arrayValue([outer]);
    }
    return { outer, inner };
  }

  it("copies and compares without exhausting the stack", () => {
    const { outer, inner } = nest(intValue("Int", 1));
    const copy = copyValue(outer);
    assert.notEqual(copy, outer);
    assert.equal(valueEquals(outer, copy), true);
    inner.elements[0] = intValue("Int", 2);
    assert.equal(valueEquals(outer, copy), false);
  });

  it("sets the owner of every nested container", () => {
    const { outer, inner } = nest(intValue("Int", 1));
    setOwner(outer, "0x01");
    assert.equal(getOwner(outer), "0x01");
    assert.equal(getOwner(inner), "0x01");
    assert.equal(getOwner(copyValue(outer)), null);
  });

  it("finds a resource at the bottom", () => {
    assert.equal(isResourceKinded(nest(intValue("Int", 1)).outer), false);
    assert.equal(isResourceKinded(nest(compositeValue("resource", "Vault")).outer), true);
    assert.throws(() => copyValue(nest(compositeValue("resource", "Vault")).outer), UnreachableError);
  });

  it("describes its type", () => {
    const text = describeValue(nest(intValue("UInt8", 1)).outer);
    assert.equal(text, "[".repeat(depth) + "UInt8" + "]".repeat(depth));
  });
});

describe("Containers", () => {
  it("raises E_INDEX_OUT_OF_BOUNDS with index and size", () => {
    const array = arrayValue([intValue("Int", 1)]);
    assert.throws(() => arrayGet(array, intValue("Int", 1)), (err: unknown) => {
      assert.ok(err instanceof InterpretationError);
      assert.equal(err.code, "E_INDEX_OUT_OF_BOUNDS");
      assert.deepEqual(err.details, { index: "1", size: 1 });
      return true;
    });
    assert.throws(() => arrayGet(array, intValue("Int", -1)), expectCode("E_INDEX_OUT_OF_BOUNDS"));
  });

  it("inserts at the end index and removes by position", () => {
    const array = arrayValue([intValue("Int", 1)]);
    arrayInsert(array, intValue("Int", 1), intValue("Int", 3));
    arrayInsert(array, intValue("Int", 1), intValue("Int", 2));
    assert.deepEqual(
      array.elements.map((e) => (e.kind === "Integer" ? e.value : -1n)),
      [1n, 2n, 3n]
    );
    assert.deepEqual(arrayRemove(array, intValue("Int", 0)), intValue("Int", 1));
    assert.deepEqual(arrayRemoveLast(array), intValue("Int", 3));
    assert.equal(array.elements.length, 1);
  });

  it("removes the last element of an empty array with an error", () => {
    assert.throws(() => arrayRemoveLast(arrayValue()), expectCode("E_INDEX_OUT_OF_BOUNDS"));
  });

  it("keeps dictionary insertion order and returns the previous value", () => {
    const dict = dictionaryValue();
    assert.equal(dictionaryInsert(dict, stringValue("b"), intValue("Int", 1)), NIL);
    dictionaryInsert(dict, stringValue("a"), intValue("Int", 2));
    const previous = dictionaryInsert(dict, stringValue("b"), intValue("Int", 3));
    assert.deepEqual(previous, someValue(intValue("Int", 1)));
    assert.deepEqual(
      [...dict.entries.values()].map((e) => (e.key.kind === "String" ? e.key.value : "")),
      ["b", "a"]
    );
  });

  it("assigns through an optional: Some inserts, nil removes", () => {
    const dict = dictionaryValue();
    dictionarySet(dict, stringValue("k"), someValue(intValue("Int", 1)));
    assert.deepEqual(dictionaryGet(dict, stringValue("k")), someValue(intValue("Int", 1)));
    dictionarySet(dict, stringValue("k"), NIL);
    assert.equal(dictionaryGet(dict, stringValue("k")), NIL);
    assert.equal(dict.entries.size, 0);
  });

  it("rejects non-primitive dictionary keys", () => {
    assert.throws(() => dictionaryValue([[arrayValue(), intValue("Int", 1)]]), UnreachableError);
  });

  it("refuses field access on a destroyed resource", () => {
    const r = compositeValue("resource", "R", [["id", intValue("Int", 1)]]);
    r.destroyed = true;
    assert.throws(() => compositeGetField(r, "id"), expectCode("E_RESOURCE_DESTROYED"));
  });
});

describe("describeValue", () => {
  it("names runtime types", () => {
    assert.equal(describeValue(arrayValue([intValue("UInt8", 1)])), "[UInt8]");
    assert.equal(describeValue(NIL), "Never?");
    assert.equal(
      describeValue(dictionaryValue([[stringValue("a"), someValue(intValue("Int", 1))]])),
      "{String: Int?}"
    );
    assert.equal(describeValue(arrayValue([intValue("Int", 1), stringValue("x")])), "[Any]");
  });
});
