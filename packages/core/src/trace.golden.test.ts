/**
 * Golden trace tests: verify the interpreter emits the expected trace event
 * sequence with the expected data shapes.
 *
 * Non-deterministic fields (timestamps, durationMs, step counts) are checked
 * for type rather than exact value.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as b from "./build.js";
import type { Program } from "./ast.js";
import { Interpreter, type InterpreterOptions } from "./interpreter.js";
import type { TraceEvent } from "./trace.js";

function traceMain(program: Program, options?: InterpreterOptions): TraceEvent[] {
  const events: TraceEvent[] = [];
  const interpreter = new Interpreter(program, { runId: "test-run", trace: (ev) => events.push(ev), ...options });
  assert.ok(interpreter.interpret().ok);
  events.length = 0;
  interpreter.invoke("main");
  return events;
}

function sanitizeEvents(events: TraceEvent[]): unknown[] {
  return events.map((ev) => {
    const sanitized: Record<string, unknown> = { event: ev.event };
    if (ev.data) {
      const data = { ...ev.data };
      delete data["durationMs"];
      delete data["steps"];
      if (Object.keys(data).length > 0) sanitized["data"] = data;
    }
    return sanitized;
  });
}

describe("Trace Golden Tests", () => {
  it("function calls nest between run_start and run_end", () => {
    const program = b.program(
      b.func("helper", ["x"], b.ret(b.binary(b.id("x"), "+", b.int(1)))),
      b.func("main", [], b.ret(b.call(b.id("helper"), b.int(1))))
    );
    const events = traceMain(program);

    assert.deepEqual(sanitizeEvents(events), [
      { event: "run_start" },
      { event: "fn_call_start", data: { fn: "main" } },
      { event: "fn_call_start", data: { fn: "helper" } },
      { event: "fn_call_end", data: { fn: "helper" } },
      { event: "fn_call_end", data: { fn: "main" } },
      { event: "run_end" },
    ]);

    const runEnd = events[events.length - 1];
    assert.equal(typeof runEnd?.data?.["durationMs"], "number");
    assert.equal(typeof runEnd?.data?.["steps"], "number");
    for (const ev of events) {
      assert.equal(ev.runId, "test-run");
      assert.ok(ev.ts);
    }
  });

  it("run_start carries the configured limits", () => {
    const program = b.program(b.func("main", []));
    const events = traceMain(program, { limits: { maxSteps: 1000, timeMs: 50 } });
    assert.deepEqual(events[0]?.data, { maxSteps: 1000, timeMs: 50 });
  });

  it("resource moves and destruction are traced in order", () => {
    const program = b.program(
      b.composite("resource", "Vault", { fields: ["balance"] }),
      b.func(
        "main",
        [],
        b.let_("v", b.create(b.call(b.id("Vault"), b.int(1, "UInt64"))), "<-"),
        b.let_("w", b.id("v"), "<-"),
        b.expr(b.destroy(b.id("w")))
      )
    );
    assert.deepEqual(sanitizeEvents(traceMain(program)), [
      { event: "run_start" },
      { event: "fn_call_start", data: { fn: "main" } },
      { event: "fn_call_start", data: { fn: "Vault" } },
      { event: "fn_call_end", data: { fn: "Vault" } },
      { event: "resource_moved", data: { variable: "v", type: "Vault" } },
      { event: "resource_moved", data: { variable: "w", type: "Vault" } },
      { event: "resource_destroyed", data: { type: "Vault" } },
      { event: "fn_call_end", data: { fn: "main" } },
      { event: "run_end" },
    ]);
  });

  it("a failed run reports its error on run_end", () => {
    const program = b.program(b.func("main", [], b.ret(b.binary(b.int(1), "/", b.int(0)))));
    const events = sanitizeEvents(traceMain(program));
    assert.deepEqual(events[events.length - 1], {
      event: "run_end",
      data: { error: "E_DIVISION_BY_ZERO", message: "Division by zero." },
    });
  });
});
