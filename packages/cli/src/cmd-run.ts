/**
 * lode run - execute a JSON-encoded program
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  Interpreter,
  UnreachableError,
  exportValue,
  formatDiagnostic,
  formatDiagnostics,
  loadConfig,
  mergeLimits,
} from "@lode/core";
import type { ExecutionLimits, InterpretationError, TraceEvent } from "@lode/core";
import { parseProgram } from "@lode/ast-json";
import { getStandardLibrary } from "@lode/std";

export interface RunOptions {
  entry?: string;
  trace?: string;
  maxSteps?: number;
  timeMs?: number;
  pretty?: boolean;
  /** Directory searched for `.lodeconfig.json`; defaults to the process cwd. */
  cwd?: string;
  homeDir?: string;
}

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export function readSource(file: string): string {
  return file === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
}

function exitCodeFor(error: InterpretationError): number {
  return error.code === "E_BUDGET" || error.code === "E_CANCELLED" ? 5 : 4;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };
  const reportRuntimeError = (e: InterpretationError | UnreachableError): void => {
    if (pretty) {
      console.error(formatDiagnostic({ code: e.code, message: e.message, span: e.span }, true));
    } else {
      const details = "details" in e ? e.details : undefined;
      console.error(JSON.stringify({ code: e.code, message: e.message, span: e.span, details }));
    }
  };

  let source: string;
  try {
    source = readSource(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`);
    return 4;
  }

  const decoded = parseProgram(source, file === "-" ? "<stdin>" : file);
  if (decoded.diagnostics.length > 0 || !decoded.program) {
    console.error(formatDiagnostics(decoded.diagnostics, pretty));
    return 2;
  }

  const flagLimits: ExecutionLimits = { maxSteps: opts.maxSteps, timeMs: opts.timeMs };
  const limits = mergeLimits(loadConfig(opts.cwd, opts.homeDir).limits, flagLimits);
  const runId = crypto.randomUUID();

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }

  const fd = traceFd;
  const traceHandler =
    fd !== null
      ? (event: TraceEvent) => {
          try {
            fs.writeSync(fd, JSON.stringify(event) + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing trace file: ${msg}`);
          }
        }
      : undefined;

  try {
    const interpreter = new Interpreter(decoded.program, {
      predeclaredValues: getStandardLibrary(),
      trace: traceHandler,
      runId,
      limits,
    });

    const declared = interpreter.interpret();
    if (!declared.ok) {
      reportRuntimeError(declared.error);
      return exitCodeFor(declared.error);
    }

    const entry = opts.entry ?? "main";
    if (!interpreter.globalActivation.has(entry)) {
      console.log(JSON.stringify(null));
      return 0;
    }

    const result = interpreter.invoke(entry);
    if (!result.ok) {
      reportRuntimeError(result.error);
      return exitCodeFor(result.error);
    }

    console.log(JSON.stringify(exportValue(result.value), null, 2));
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }
    if (e instanceof UnreachableError) {
      reportRuntimeError(e);
      return 70;
    }
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_RUNTIME", msg);
    return 4;
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        emitCliError("E_IO", `Error closing trace file: ${msg}`);
      }
    }
  }
}
