/**
 * Lode std: log, panic, assert
 */
import { InterpretationError, VOID, argumentAt, done, exportValue } from "@lode/core";
import { boolArg, defineHostFunction, stringArg } from "./define.js";

/**
 * log(value) -> Void
 * Emits a `log` trace event carrying the exported value.
 */
export const logFn = defineHostFunction("log", (inv) => {
  inv.interpreter.emitTrace("log", inv.location, { value: exportValue(argumentAt(inv, 0)) });
  return done(VOID);
});

/**
 * panic(message: String) -> Never
 */
export const panicFn = defineHostFunction("panic", (inv) => {
  const message = stringArg("panic", inv, 0);
  throw new InterpretationError("E_PANIC", `panic: ${message}`, inv.location, { message });
});

/**
 * assert(condition: Bool, message?: String) -> Void
 */
export const assertFn = defineHostFunction("assert", (inv) => {
  if (boolArg("assert", inv, 0)) return done(VOID);
  const message = inv.arguments.length > 1 ? stringArg("assert", inv, 1) : "Assertion failed.";
  throw new InterpretationError("E_ASSERT", message, inv.location);
});
