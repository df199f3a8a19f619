/**
 * Lode diagnostic types for program loading and runtime errors.
 */
import type { Span } from "./ast.js";

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

export function formatLocation(span: Span | undefined): string {
  if (!span) return "<unknown>";
  return `${span.file ?? "<program>"}:${span.start.line}:${span.start.column}`;
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `error[${d.code}]: ${d.message}\n  --> ${formatLocation(d.span)}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
