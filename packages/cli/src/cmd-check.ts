/**
 * lode check - validate a JSON-encoded program without running it
 */
import { formatDiagnostic, formatDiagnostics } from "@lode/core";
import { parseProgram } from "@lode/ast-json";
import { readSource } from "./cmd-run.js";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  let source: string;
  try {
    source = readSource(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, !!opts.pretty));
    return 4;
  }

  const decoded = parseProgram(source, file === "-" ? "<stdin>" : file);
  if (decoded.diagnostics.length > 0 || !decoded.program) {
    console.error(formatDiagnostics(decoded.diagnostics, !!opts.pretty));
    return 2;
  }

  if (opts.pretty) {
    console.log(`No errors found (${decoded.program.declarations.length} declarations).`);
  } else {
    console.log("[]");
  }
  return 0;
}
