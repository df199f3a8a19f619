/**
 * Tests for metering, cancellation and stepwise execution.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as b from "./build.js";
import type { Stmt } from "./ast.js";
import { InterpretationError } from "./errors.js";
import { Execution, Meter, type RunResult } from "./execution.js";
import { newSimpleHostFunction } from "./function.js";
import { Interpreter, type InterpreterOptions } from "./interpreter.js";
import type { TraceEvent } from "./trace.js";
import { done, more } from "./trampoline.js";
import { VOID, type Value, compositeValue, getOwner, intValue, setOwner } from "./values.js";

const spin = b.program(b.func("main", [], b.while_(b.bool(true))));

const countProgram = b.program(
  b.func(
    "count",
    ["n"],
    b.if_(b.binary(b.id("n"), "==", b.int(0)), [b.ret(b.int(0))]),
    b.ret(b.binary(b.call(b.id("count"), b.binary(b.id("n"), "-", b.int(1))), "+", b.int(1)))
  )
);

function makeInterpreter(program = spin, options?: InterpreterOptions): Interpreter {
  const interpreter = new Interpreter(program, { runId: "test-run", ...options });
  assert.ok(interpreter.interpret().ok);
  return interpreter;
}

describe("Meter", () => {
  it("stops an endless loop at maxSteps", () => {
    const events: TraceEvent[] = [];
    const interpreter = makeInterpreter(spin, { limits: { maxSteps: 50 }, trace: (ev) => events.push(ev) });
    const result = interpreter.invoke("main");
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "E_BUDGET");
    assert.equal(result.steps, 50);
    assert.deepEqual(result.error.details, { budget: "maxSteps", limit: 50, actual: 51 });

    const exceeded = events.filter((ev) => ev.event === "budget_exceeded");
    assert.equal(exceeded.length, 1);
    const end = events[events.length - 1];
    assert.equal(end?.event, "run_end");
    assert.equal(end?.data?.["error"], "E_BUDGET");
    assert.equal(end?.data?.["steps"], 50);
  });

  it("cancels at the next step boundary once the signal aborts", () => {
    const controller = new AbortController();
    const interpreter = makeInterpreter(spin, {
      signal: controller.signal,
      onStep: (steps) => {
        if (steps === 10) controller.abort();
      },
    });
    const result = interpreter.invoke("main");
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "E_CANCELLED");
    assert.equal(result.steps, 10);
  });

  it("limits call depth", () => {
    const interpreter = makeInterpreter(countProgram, { limits: { maxCallDepth: 100 } });
    const result = interpreter.invoke("count", intValue("Int", 1000));
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "E_BUDGET");
    assert.equal(result.error.details?.["budget"], "maxCallDepth");

    const shallow = interpreter.invoke("count", intValue("Int", 50));
    assert.equal(shallow.ok, true);
    if (shallow.ok) assert.deepEqual(shallow.value, intValue("Int", 50));
  });

  it("stops on a wall-clock budget", () => {
    const interpreter = makeInterpreter(spin, { limits: { timeMs: 20 } });
    const result = interpreter.invoke("main");
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, "E_BUDGET");
    assert.equal(result.error.details?.["budget"], "timeMs");
  });

  it("counts steps without limits", () => {
    const meter = new Meter({}, () => {});
    meter.onStep();
    meter.onStep();
    assert.equal(meter.steps, 2);
  });
});

describe("Execution", () => {
  it("suspends after every step", () => {
    const interpreter = makeInterpreter(countProgram);
    const execution = interpreter.createExecution(interpreter.callGlobal("count", intValue("Int", 3)));
    let previous = 0;
    let suspensions = 0;
    for (;;) {
      const result = execution.step();
      if (result.status === "done") {
        assert.deepEqual(result.value, intValue("Int", 3));
        assert.equal(result.steps, execution.steps);
        break;
      }
      assert.equal(result.steps, previous + 1);
      previous = result.steps;
      suspensions++;
    }
    assert.ok(suspensions > 0);
  });

  it("rethrows the same failure on later steps", () => {
    const failing = more(() => {
      throw new InterpretationError("E_PANIC", "boom");
    });
    const execution = new Execution(failing, new Meter({}, () => {}));
    assert.throws(() => execution.step(), InterpretationError);
    assert.throws(() => execution.step(), InterpretationError);
  });

  it("finishes a Done computation without steps", () => {
    const execution = new Execution(done("ready"), new Meter({}, () => {}));
    assert.deepEqual(execution.runToResult(), { ok: true, value: "ready", steps: 0 });
  });
});

describe("Moves under a budget", () => {
  // several steps run between the moved argument and the call
  const slow = b.func("slow", [], b.ret(b.binary(b.binary(b.int(1), "+", b.int(2)), "+", b.int(3))));

  interface MoveRun {
    result: RunResult<Value>;
    vault: Value;
    received: Value[];
    sourceBound: boolean;
  }

  function runMove(statement: Stmt, maxSteps: number): MoveRun {
    const vault = compositeValue("resource", "Vault", [["balance", intValue("UInt64", 5)]], "0x1");
    const received: Value[] = [];
    const take = newSimpleHostFunction("take", (inv) => {
      for (const arg of inv.arguments) {
        setOwner(arg, "0x2");
        received.push(arg);
      }
      return VOID;
    });
    const interpreter = makeInterpreter(b.program(slow, b.func("main", [], statement)), {
      predeclaredValues: new Map<string, Value>([
        ["v", vault],
        ["take", take],
      ]),
      limits: { maxSteps },
    });
    const result = interpreter.invoke("main");
    return { result, vault, received, sourceBound: interpreter.globalActivation.find("v")?.isBound === true };
  }

  const statements: Array<[string, Stmt]> = [
    ["an argument", b.expr(b.call(b.id("take"), b.move(b.id("v")), b.call(b.id("slow"))))],
    ["an array element", b.expr(b.call(b.id("take"), b.move(b.array(b.move(b.id("v")), b.call(b.id("slow"))))))],
    [
      "a dictionary value",
      b.expr(b.call(b.id("take"), b.move(b.dict([b.str("a"), b.move(b.id("v"))], [b.str("b"), b.call(b.id("slow"))])))),
    ],
  ];

  for (const [name, statement] of statements) {
    it(`keeps a single holder when stopped at any step, moving ${name}`, () => {
      let stopped = 0;
      for (let maxSteps = 0; maxSteps < 100; maxSteps++) {
        const { result, vault, received, sourceBound } = runMove(statement, maxSteps);
        if (sourceBound) {
          assert.equal(received.length, 0, `maxSteps ${maxSteps}`);
          assert.equal(getOwner(vault), "0x1", `maxSteps ${maxSteps}`);
        } else {
          assert.equal(received.length, 1, `maxSteps ${maxSteps}`);
          assert.equal(getOwner(vault), "0x2", `maxSteps ${maxSteps}`);
        }
        if (result.ok) {
          assert.equal(sourceBound, false);
          assert.ok(stopped > 0);
          return;
        }
        assert.equal(result.error.code, "E_BUDGET");
        stopped++;
      }
      assert.fail("the move never completed");
    });
  }

  it("keeps a single holder when cancelled at any step", () => {
    const statement = b.expr(b.call(b.id("take"), b.move(b.id("v")), b.call(b.id("slow"))));
    for (let cancelAt = 1; cancelAt < 100; cancelAt++) {
      const vault = compositeValue("resource", "Vault", [], "0x1");
      const received: Value[] = [];
      const take = newSimpleHostFunction("take", (inv) => {
        received.push(...inv.arguments);
        return VOID;
      });
      const controller = new AbortController();
      const interpreter = makeInterpreter(b.program(slow, b.func("main", [], statement)), {
        predeclaredValues: new Map<string, Value>([
          ["v", vault],
          ["take", take],
        ]),
        signal: controller.signal,
        onStep: (steps) => {
          if (steps === cancelAt) controller.abort();
        },
      });
      const result = interpreter.invoke("main");
      const sourceBound = interpreter.globalActivation.find("v")?.isBound === true;
      assert.equal(sourceBound, received.length === 0, `cancelled at ${cancelAt}`);
      if (result.ok) return;
      assert.equal(result.error.code, "E_CANCELLED");
    }
    assert.fail("the move never completed");
  });
});
