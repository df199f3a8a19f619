/**
 * Trace events emitted by the interpreter.
 */
import type { Span } from "./ast.js";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | JsonRecord;

export type JsonRecord = { [key: string]: JsonValue };

export type TraceEventType =
  | "run_start"
  | "run_end"
  | "fn_call_start"
  | "fn_call_end"
  | "resource_moved"
  | "resource_destroyed"
  | "budget_exceeded"
  | "log";

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: JsonRecord;
}

export type TraceSink = (event: TraceEvent) => void;

export type EmitTrace = (event: TraceEventType, span?: Span, data?: JsonRecord) => void;

export function makeEmitTrace(runId: string, trace?: TraceSink): EmitTrace {
  return (event, span, data) => {
    if (trace) {
      trace({
        ts: new Date().toISOString(),
        runId,
        event,
        span,
        data,
      });
    }
  };
}
