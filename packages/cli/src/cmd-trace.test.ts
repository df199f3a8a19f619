/**
 * Tests for lode trace command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runTrace, summarizeTrace } from "./cmd-trace.js";

async function captureTrace(
  file: string,
  opts: { json?: boolean }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runTrace(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

const events = [
  { ts: "2026-01-01T00:00:00.000Z", runId: "r1", event: "run_start", data: {} },
  { ts: "2026-01-01T00:00:00.001Z", runId: "r1", event: "run_end", data: { steps: 4, durationMs: 1 } },
  { ts: "2026-01-01T00:00:00.002Z", runId: "r1", event: "run_start", data: { maxSteps: 100 } },
  { ts: "2026-01-01T00:00:00.003Z", runId: "r1", event: "fn_call_start", data: { fn: "main" } },
  { ts: "2026-01-01T00:00:00.004Z", runId: "r1", event: "fn_call_start", data: { fn: "Vault" } },
  { ts: "2026-01-01T00:00:00.005Z", runId: "r1", event: "fn_call_end", data: { fn: "Vault" } },
  { ts: "2026-01-01T00:00:00.006Z", runId: "r1", event: "resource_moved", data: { variable: "v", type: "Vault" } },
  { ts: "2026-01-01T00:00:00.007Z", runId: "r1", event: "fn_call_start", data: { fn: "log" } },
  { ts: "2026-01-01T00:00:00.008Z", runId: "r1", event: "log", data: { value: null } },
  { ts: "2026-01-01T00:00:00.009Z", runId: "r1", event: "fn_call_start", data: { fn: "log" } },
  { ts: "2026-01-01T00:00:00.010Z", runId: "r1", event: "resource_destroyed", data: { type: "Vault" } },
  { ts: "2026-01-01T00:00:00.011Z", runId: "r1", event: "budget_exceeded", data: { budget: "maxSteps", limit: 100, actual: 101 } },
  {
    ts: "2026-01-01T00:00:00.050Z",
    runId: "r1",
    event: "run_end",
    data: { steps: 100, durationMs: 48, error: "E_BUDGET", message: "Budget exceeded: maxSteps limit of 100 reached." },
  },
];

const lines = events.map((e) => JSON.stringify(e));

describe("summarizeTrace", () => {
  it("aggregates runs, calls, resources and failures", () => {
    assert.deepEqual(summarizeTrace(lines), {
      runId: "r1",
      totalEvents: 13,
      skippedLines: 0,
      runs: 2,
      steps: 104,
      functionCalls: 4,
      functionsByName: { main: 1, Vault: 1, log: 2 },
      resourcesMoved: 1,
      resourcesDestroyed: 1,
      logs: 1,
      budgetExceeded: 1,
      failures: 1,
      errors: { E_BUDGET: 1 },
      startTime: "2026-01-01T00:00:00.000Z",
      endTime: "2026-01-01T00:00:00.050Z",
      durationMs: 50,
    });
  });

  it("skips lines that are not trace events", () => {
    const summary = summarizeTrace(["not json", JSON.stringify({ event: "run_start" }), ...lines.slice(0, 2)]);
    assert.equal(summary?.skippedLines, 2);
    assert.equal(summary?.totalEvents, 2);
  });

  it("returns null without any valid event", () => {
    assert.equal(summarizeTrace(["{", "[]"]), null);
  });
});

describe("lode trace", () => {
  it("prints the summary as JSON with --json", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "lode-cli-trace-test-"));
    const tracePath = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(tracePath, lines.join("\n") + "\n", "utf-8");

    try {
      const result = await captureTrace(tracePath, { json: true });
      assert.equal(result.code, 0);
      const summary = JSON.parse(result.stdout) as { failures: number; functionCalls: number };
      assert.equal(summary.functionCalls, 4);
      assert.equal(summary.failures, 1);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("prints a human-readable summary", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "lode-cli-trace-test-"));
    const tracePath = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(tracePath, lines.slice(2, 6).join("\n") + "\n", "utf-8");

    try {
      const result = await captureTrace(tracePath, {});
      assert.equal(result.code, 0);
      assert.deepEqual(result.stdout.split("\n"), [
        "Trace Summary",
        "  Run ID:              r1",
        "  Total events:        4",
        "  Runs:                1",
        "  Steps:               0",
        "  Function calls:      2",
        "  Functions called:",
        "    main: 1",
        "    Vault: 1",
        "  Resources moved:     0",
        "  Resources destroyed: 0",
        "  Log events:          0",
        "  Budget exceeded:     0",
        "  Failures:            0",
      ]);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("exits 4 when the file holds no trace events", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "lode-cli-trace-test-"));
    const tracePath = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(tracePath, "garbage\n", "utf-8");

    try {
      const result = await captureTrace(tracePath, {});
      assert.equal(result.code, 4);
      assert.equal(result.stderr, "No valid trace events found.");
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
