/**
 * The trampoline driver, with metering and cancellation checked at every
 * step boundary.
 */
import type { Span } from "./ast.js";
import { InterpretationError } from "./errors.js";
import type { EmitTrace } from "./trace.js";
import type { StepObserver, Trampoline } from "./trampoline.js";

// --- Budget ---
export interface ExecutionLimits {
  maxSteps?: number;
  timeMs?: number;
  maxCallDepth?: number;
}

export class Meter {
  steps = 0;
  callDepth = 0;
  private readonly limits: ExecutionLimits;
  private readonly emitTrace: EmitTrace;
  private readonly signal?: AbortSignal;
  private readonly startMs: number;

  constructor(limits: ExecutionLimits, emitTrace: EmitTrace, signal?: AbortSignal) {
    this.limits = limits;
    this.emitTrace = emitTrace;
    this.signal = signal;
    this.startMs = Date.now();
  }

  /** Account for one step about to run. Throws instead when it may not. */
  onStep(): void {
    if (this.signal?.aborted) {
      throw new InterpretationError("E_CANCELLED", "Execution was cancelled.", undefined, {
        steps: this.steps,
      });
    }
    const { maxSteps, timeMs } = this.limits;
    if (maxSteps !== undefined && this.steps >= maxSteps) {
      this.exceeded("maxSteps", maxSteps, this.steps + 1);
    }
    if (timeMs !== undefined) {
      const elapsed = Date.now() - this.startMs;
      if (elapsed > timeMs) {
        this.exceeded("timeMs", timeMs, elapsed);
      }
    }
    this.steps++;
  }

  /** Throws when one more call would exceed the call-depth budget. */
  checkCallDepth(span?: Span): void {
    const { maxCallDepth } = this.limits;
    if (maxCallDepth !== undefined && this.callDepth + 1 > maxCallDepth) {
      this.exceeded("maxCallDepth", maxCallDepth, this.callDepth + 1, span);
    }
  }

  enterCall(span?: Span): void {
    this.checkCallDepth(span);
    this.callDepth++;
  }

  exitCall(): void {
    this.callDepth--;
  }

  private exceeded(budget: string, limit: number, actual: number, span?: Span): never {
    this.emitTrace("budget_exceeded", span, { budget, limit, actual });
    throw new InterpretationError(
      "E_BUDGET",
      `Budget exceeded: ${budget} limit of ${limit} reached.`,
      span,
      { budget, limit, actual }
    );
  }
}

// --- Driver ---
export type StepResult<T> =
  | { status: "suspended"; steps: number }
  | { status: "done"; value: T; steps: number };

export type RunResult<T> =
  | { ok: true; value: T; steps: number }
  | { ok: false; error: InterpretationError; steps: number };

export class Execution<T> {
  private current: Trampoline<T>;
  private readonly meter: Meter;
  private readonly beforeStep: StepObserver;
  private failure: unknown = undefined;

  constructor(trampoline: Trampoline<T>, meter: Meter, onStep?: (steps: number) => void) {
    this.current = trampoline;
    this.meter = meter;
    this.beforeStep = () => {
      meter.onStep();
      onStep?.(meter.steps);
    };
  }

  get steps(): number {
    return this.meter.steps;
  }

  /** Reduce until one step has run or the computation finished. */
  step(): StepResult<T> {
    if (this.failure !== undefined) throw this.failure;
    const before = this.meter.steps;
    try {
      for (;;) {
        const finished = this.current.asDone();
        if (finished) return { status: "done", value: finished.value, steps: this.meter.steps };
        if (this.meter.steps !== before) return { status: "suspended", steps: this.meter.steps };
        this.current = this.current.resume(this.beforeStep);
      }
    } catch (e) {
      this.failure = e;
      throw e;
    }
  }

  run(): T {
    for (;;) {
      const result = this.step();
      if (result.status === "done") return result.value;
    }
  }

  /** Run to completion; language-level errors become a failed result. */
  runToResult(): RunResult<T> {
    try {
      const value = this.run();
      return { ok: true, value, steps: this.meter.steps };
    } catch (e) {
      if (e instanceof InterpretationError) {
        return { ok: false, error: e, steps: this.meter.steps };
      }
      throw e;
    }
  }
}
