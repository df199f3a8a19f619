/**
 * lode trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.unknown()).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  runs: number;
  steps: number;
  functionCalls: number;
  functionsByName: Record<string, number>;
  resourcesMoved: number;
  resourcesDestroyed: number;
  logs: number;
  budgetExceeded: number;
  failures: number;
  errors: Record<string, number>;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (e) {
    if (e instanceof SyntaxError) return null;
    throw e;
  }
  const parsed = traceLineSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function summarizeTrace(lines: string[]): TraceSummary | null {
  const events: TraceLine[] = [];
  let skippedLines = 0;
  for (const line of lines) {
    const event = parseLine(line);
    if (event) events.push(event);
    else skippedLines++;
  }

  const first = events[0];
  if (!first) return null;

  const summary: TraceSummary = {
    runId: first.runId,
    totalEvents: events.length,
    skippedLines,
    runs: 0,
    steps: 0,
    functionCalls: 0,
    functionsByName: {},
    resourcesMoved: 0,
    resourcesDestroyed: 0,
    logs: 0,
    budgetExceeded: 0,
    failures: 0,
    errors: {},
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.runs++;
        summary.startTime ??= ev.ts;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        const steps = ev.data?.["steps"];
        if (typeof steps === "number") summary.steps += steps;
        const error = ev.data?.["error"];
        if (typeof error === "string") {
          summary.failures++;
          summary.errors[error] = (summary.errors[error] ?? 0) + 1;
        }
        break;
      }
      case "fn_call_start": {
        summary.functionCalls++;
        const fn = ev.data?.["fn"];
        const name = typeof fn === "string" ? fn : "<anonymous>";
        summary.functionsByName[name] = (summary.functionsByName[name] ?? 0) + 1;
        break;
      }
      case "resource_moved":
        summary.resourcesMoved++;
        break;
      case "resource_destroyed":
        summary.resourcesDestroyed++;
        break;
      case "log":
        summary.logs++;
        break;
      case "budget_exceeded":
        summary.budgetExceeded++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const summary = summarizeTrace(content.split("\n").filter((l) => l.trim()));
  if (!summary) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:              ${summary.runId}`);
  console.log(`  Total events:        ${summary.totalEvents}`);
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines:       ${summary.skippedLines}`);
  }
  console.log(`  Runs:                ${summary.runs}`);
  console.log(`  Steps:               ${summary.steps}`);
  console.log(`  Function calls:      ${summary.functionCalls}`);
  const names = Object.entries(summary.functionsByName).sort(([a], [b]) => a.localeCompare(b));
  if (names.length > 0) {
    console.log(`  Functions called:`);
    for (const [name, count] of names) {
      console.log(`    ${name}: ${count}`);
    }
  }
  console.log(`  Resources moved:     ${summary.resourcesMoved}`);
  console.log(`  Resources destroyed: ${summary.resourcesDestroyed}`);
  console.log(`  Log events:          ${summary.logs}`);
  console.log(`  Budget exceeded:     ${summary.budgetExceeded}`);
  console.log(`  Failures:            ${summary.failures}`);
  for (const [code, count] of Object.entries(summary.errors)) {
    console.log(`    ${code}: ${count}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:            ${summary.durationMs}ms`);
  }
  return 0;
}
