/**
 * Tests for trampolines and the stepping driver.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { type Trampoline, done, more, runTrampoline, sequence } from "./trampoline.js";

function countDown(n: number): Trampoline<number> {
  if (n === 0) return done(0);
  return more(() => countDown(n - 1)).map((x) => x + 1);
}

describe("Trampoline", () => {
  it("returns a Done value immediately", () => {
    assert.equal(runTrampoline(done(7)), 7);
  });

  it("runs deep non-tail recursion without growing the native stack", () => {
    assert.equal(runTrampoline(countDown(200_000)), 200_000);
  });

  it("re-associates long left-nested chains", () => {
    let t: Trampoline<number> = done(0);
    for (let i = 0; i < 100_000; i++) {
      t = t.flatMap((x) => done(x + 1));
    }
    assert.equal(runTrampoline(t), 100_000);
  });

  it("calls the step observer once per More", () => {
    let steps = 0;
    const t = more(() => more(() => done("x"))).map((s) => s + "y");
    assert.equal(runTrampoline(t, () => steps++), "xy");
    assert.equal(steps, 2);
  });

  it("sequences items strictly in order", () => {
    const log: string[] = [];
    const t = sequence(["a", "b", "c"], (item, i) =>
      more(() => {
        log.push(item);
        return done(`${item}:${i}`);
      })
    );
    assert.deepEqual(runTrampoline(t), ["a:0", "b:1", "c:2"]);
    assert.deepEqual(log, ["a", "b", "c"]);
  });

  it("defers the work of a More until it is driven", () => {
    let ran = false;
    const t = more(() => {
      ran = true;
      return done(1);
    });
    assert.equal(ran, false);
    runTrampoline(t);
    assert.equal(ran, true);
  });

  it("then discards the previous value", () => {
    assert.equal(runTrampoline(done(1).then(() => done("next"))), "next");
  });
});
