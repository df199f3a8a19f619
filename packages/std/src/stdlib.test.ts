/**
 * Tests for Lode standard library functions.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  Interpreter,
  type Program,
  type RunResult,
  type Stmt,
  type TraceEvent,
  type Value,
  build as b,
  exportValue,
  intValue,
} from "@lode/core";
import { getStandardLibrary } from "./index.js";

function runMain(program: Program, trace?: (ev: TraceEvent) => void): RunResult<Value> {
  const interpreter = new Interpreter(program, {
    runId: "test-run",
    predeclaredValues: getStandardLibrary(),
    trace,
  });
  assert.ok(interpreter.interpret().ok);
  return interpreter.invoke("main");
}

function mainReturning(...statements: Stmt[]): Program {
  return b.program(b.func("main", [], ...statements));
}

function expectExport(result: RunResult<Value>): unknown {
  if (!result.ok) {
    assert.fail(`${result.error.code}: ${result.error.message}`);
  }
  return exportValue(result.value);
}

function expectCode(result: RunResult<Value>, code: string): string {
  if (result.ok) {
    assert.fail(`expected ${code}`);
  }
  assert.equal(result.error.code, code);
  return result.error.message;
}

const ints = (...values: number[]) => ({
  type: "Array",
  value: values.map((v) => ({ type: "Int", value: String(v) })),
});

describe("getStandardLibrary", () => {
  it("registers every function by name", () => {
    const lib = getStandardLibrary();
    for (const name of ["log", "panic", "assert", "map", "filter", "reduce", "range", "Int8", "UInt256", "Int"]) {
      assert.ok(lib.has(name), name);
    }
  });
});

describe("range", () => {
  it("counts from inclusive to exclusive", () => {
    const result = runMain(mainReturning(b.ret(b.call(b.id("range"), b.int(2), b.int(5)))));
    assert.deepEqual(expectExport(result), ints(2, 3, 4));
  });

  it("is empty when to <= from", () => {
    const result = runMain(mainReturning(b.ret(b.call(b.id("range"), b.int(5), b.int(5)))));
    assert.deepEqual(expectExport(result), ints());
  });
});

describe("map, filter, reduce", () => {
  it("maps with an interpreted closure", () => {
    const program = mainReturning(
      b.let_("k", b.int(10)),
      b.ret(
        b.call(
          b.id("map"),
          b.array(b.int(1), b.int(2), b.int(3)),
          b.fn(["x"], b.ret(b.binary(b.id("x"), "*", b.id("k"))))
        )
      )
    );
    assert.deepEqual(expectExport(runMain(program)), ints(10, 20, 30));
  });

  it("filters with a predicate", () => {
    const program = mainReturning(
      b.ret(
        b.call(
          b.id("filter"),
          b.call(b.id("range"), b.int(0), b.int(7)),
          b.fn(["x"], b.ret(b.binary(b.binary(b.id("x"), "%", b.int(3)), "==", b.int(0))))
        )
      )
    );
    assert.deepEqual(expectExport(runMain(program)), ints(0, 3, 6));
  });

  it("folds left", () => {
    const program = mainReturning(
      b.ret(
        b.call(
          b.id("reduce"),
          b.array(b.str("a"), b.str("b"), b.str("c")),
          b.str(">"),
          b.fn(["acc", "s"], b.ret(b.binary(b.id("acc"), "&", b.id("s"))))
        )
      )
    );
    assert.deepEqual(expectExport(runMain(program)), { type: "String", value: ">abc" });
  });

  it("does not mutate the source array", () => {
    const program = mainReturning(
      b.let_("xs", b.array(b.int(1), b.int(2))),
      b.let_("ys", b.call(b.id("map"), b.id("xs"), b.fn(["x"], b.ret(b.binary(b.id("x"), "+", b.int(1)))))),
      b.ret(b.array(b.id("xs"), b.id("ys")))
    );
    assert.deepEqual(expectExport(runMain(program)), {
      type: "Array",
      value: [ints(1, 2), ints(2, 3)],
    });
  });

  it("sums a long range through a callback", () => {
    const program = mainReturning(
      b.ret(
        b.call(
          b.id("reduce"),
          b.call(b.id("range"), b.int(0), b.int(20_000)),
          b.int(0),
          b.fn(["acc", "x"], b.ret(b.binary(b.id("acc"), "+", b.id("x"))))
        )
      )
    );
    assert.deepEqual(expectExport(runMain(program)), { type: "Int", value: "199990000" });
  });
});

describe("log, panic, assert", () => {
  it("log emits a trace event with the exported value", () => {
    const events: TraceEvent[] = [];
    const program = mainReturning(b.expr(b.call(b.id("log"), b.array(b.int(1), b.bool(true)))));
    expectExport(runMain(program, (ev) => events.push(ev)));
    const logs = events.filter((ev) => ev.event === "log");
    assert.deepEqual(
      logs.map((ev) => ev.data),
      [
        {
          value: {
            type: "Array",
            value: [
              { type: "Int", value: "1" },
              { type: "Bool", value: true },
            ],
          },
        },
      ]
    );
  });

  it("panic raises E_PANIC", () => {
    const result = runMain(mainReturning(b.expr(b.call(b.id("panic"), b.str("out of cheese")))));
    assert.equal(expectCode(result, "E_PANIC"), "panic: out of cheese");
  });

  it("assert raises E_ASSERT with the given message", () => {
    const failing = runMain(mainReturning(b.expr(b.call(b.id("assert"), b.bool(false), b.str("x must be set")))));
    assert.equal(expectCode(failing, "E_ASSERT"), "x must be set");

    const defaulted = runMain(mainReturning(b.expr(b.call(b.id("assert"), b.binary(b.int(1), "==", b.int(2))))));
    assert.equal(expectCode(defaulted, "E_ASSERT"), "Assertion failed.");
  });

  it("assert passes silently when true", () => {
    const result = runMain(mainReturning(b.expr(b.call(b.id("assert"), b.bool(true))), b.ret(b.int(1))));
    assert.deepEqual(expectExport(result), { type: "Int", value: "1" });
  });
});

describe("integer converters", () => {
  it("converts between kinds", () => {
    const result = runMain(mainReturning(b.ret(b.call(b.id("UInt8"), b.int(200)))));
    assert.deepEqual(expectExport(result), { type: "UInt8", value: "200" });
  });

  it("raises E_CONVERSION when out of range", () => {
    const result = runMain(mainReturning(b.ret(b.call(b.id("Int8"), b.int(200, "UInt16")))));
    assert.equal(expectCode(result, "E_CONVERSION"), "Cannot convert 200 (UInt16) to Int8.");
  });

  it("exposes min and max members on sized kinds", () => {
    const result = runMain(
      mainReturning(b.ret(b.array(b.member(b.id("Int8"), "min"), b.member(b.id("Int8"), "max"))))
    );
    assert.deepEqual(expectExport(result), {
      type: "Array",
      value: [
        { type: "Int8", value: "-128" },
        { type: "Int8", value: "127" },
      ],
    });
  });

  it("gives the converted value the target kind", () => {
    const lib = getStandardLibrary();
    const interpreter = new Interpreter(b.program(b.func("widen", ["x"], b.ret(b.call(b.id("UInt256"), b.id("x"))))), {
      predeclaredValues: lib,
    });
    assert.ok(interpreter.interpret().ok);
    const result = interpreter.invoke("widen", intValue("UInt8", 7));
    assert.ok(result.ok);
    if (result.ok) assert.deepEqual(result.value, intValue("UInt256", 7));
  });
});
