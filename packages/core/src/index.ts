/**
 * @lode/core - Lode interpreter core
 */
export * from "./ast.js";
export * as build from "./build.js";
export * from "./diagnostics.js";
export * from "./errors.js";
export * from "./integers.js";
export * from "./types.js";
export * from "./values.js";
export * from "./containers.js";
export { Activation, Variable } from "./activation.js";
export { Trampoline, Done, More, done, more, sequence, runTrampoline } from "./trampoline.js";
export type { StepObserver } from "./trampoline.js";
export { Execution, Meter } from "./execution.js";
export type { ExecutionLimits, RunResult, StepResult } from "./execution.js";
export {
  functionTypeOf,
  getFunctionMember,
  invokeFunctionValue,
  isFunctionValue,
  newHostFunction,
  newInterpretedFunction,
  newSimpleHostFunction,
  setFunctionMember,
} from "./function.js";
export type {
  FunctionValue,
  HostFunction,
  HostFunctionValue,
  InterpretedFunctionValue,
  Invocation,
} from "./function.js";
export { argumentAt, builtinMember } from "./members.js";
export { evaluateBinaryOperation, evaluateNegation, evaluateNot } from "./operators.js";
export {
  END_OF_ARRAY,
  END_OF_COMPOSITE,
  END_OF_DICTIONARY,
  END_OF_DICTIONARY_KEY,
  END_OF_DICTIONARY_VALUE,
  END_OF_OPTIONAL,
  inspectValue,
  isEndMarker,
} from "./inspect.js";
export type { ContainerBoundary, EndMarker, InspectedNode, ValueVisitor } from "./inspect.js";
export { exportValue } from "./export.js";
export { makeEmitTrace } from "./trace.js";
export type { EmitTrace, JsonRecord, JsonValue, TraceEvent, TraceEventType, TraceSink } from "./trace.js";
export { Interpreter } from "./interpreter.js";
export type { InterpreterOptions } from "./interpreter.js";
export { ConfigShapeError, loadConfig, mergeLimits, resolveConfig, validateConfigShape } from "./config.js";
export type { LodeConfig, ResolvedConfig } from "./config.js";
