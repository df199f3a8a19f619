/**
 * Function values and the calling convention shared by interpreted and host
 * functions: `invoke(Invocation) -> Trampoline`.
 */
import type { Activation } from "./activation.js";
import type { FunctionExpression, Span } from "./ast.js";
import { InterpretationError, UnreachableError } from "./errors.js";
import type { Interpreter } from "./interpreter.js";
import { done, type Trampoline } from "./trampoline.js";
import { ANY_TYPE, type FunctionType, type StaticType, VOID_TYPE } from "./types.js";
import { type Value, describeValue } from "./values.js";

export interface Invocation {
  arguments: Value[];
  argumentTypes: StaticType[];
  location: Span;
  interpreter: Interpreter;
}

export interface InterpretedFunctionValue {
  kind: "InterpretedFunction";
  name?: string;
  interpreter: Interpreter;
  expression: FunctionExpression;
  type: FunctionType;
  activation: Activation;
}

export type HostFunction = (invocation: Invocation) => Trampoline<Value>;

export interface HostFunctionValue {
  kind: "HostFunction";
  name?: string;
  function: HostFunction;
  members?: ReadonlyMap<string, Value>;
  type?: FunctionType;
}

export type FunctionValue = InterpretedFunctionValue | HostFunctionValue;

export function isFunctionValue(value: Value): value is FunctionValue {
  return value.kind === "InterpretedFunction" || value.kind === "HostFunction";
}

/** Static type of a function expression from its annotations. */
export function functionTypeOf(expression: FunctionExpression): FunctionType {
  if (expression.type) return expression.type;
  return {
    kind: "Function",
    parameterTypes: expression.parameters.map((p) => p.type ?? ANY_TYPE),
    returnType: expression.returnType ?? VOID_TYPE,
  };
}

export function newInterpretedFunction(
  interpreter: Interpreter,
  expression: FunctionExpression,
  activation: Activation,
  name?: string
): InterpretedFunctionValue {
  return {
    kind: "InterpretedFunction",
    name,
    interpreter,
    expression,
    type: functionTypeOf(expression),
    activation,
  };
}

export function newHostFunction(
  fn: HostFunction,
  options: { name?: string; members?: Iterable<[string, Value]>; type?: FunctionType } = {}
): HostFunctionValue {
  return {
    kind: "HostFunction",
    name: options.name,
    function: fn,
    members: options.members ? new Map(options.members) : undefined,
    type: options.type,
  };
}

/** A host function computing its result without re-entering the interpreter. */
export function newSimpleHostFunction(
  name: string,
  fn: (invocation: Invocation) => Value,
  type?: FunctionType
): HostFunctionValue {
  return newHostFunction((invocation) => done(fn(invocation)), { name, type });
}

export function invokeFunctionValue(fn: Value, invocation: Invocation): Trampoline<Value> {
  switch (fn.kind) {
    case "InterpretedFunction":
      return fn.interpreter.invokeInterpretedFunction(fn, invocation);
    case "HostFunction":
      try {
        return fn.function(invocation);
      } catch (e) {
        if (e instanceof InterpretationError || e instanceof UnreachableError) {
          throw e;
        }
        const name = fn.name ?? "<host>";
        const msg = e instanceof Error ? e.message : String(e);
        throw new InterpretationError(
          "E_HOST",
          `Host function '${name}' failed: ${msg}`,
          invocation.location,
          { fn: name }
        );
      }
    default:
      throw new UnreachableError(`cannot invoke ${describeValue(fn)}`, invocation.location);
  }
}

export function getFunctionMember(fn: FunctionValue, name: string, span?: Span): Value {
  const member = fn.kind === "HostFunction" ? fn.members?.get(name) : undefined;
  if (member === undefined) {
    throw new UnreachableError(`function has no member '${name}'`, span);
  }
  return member;
}

export function setFunctionMember(_fn: FunctionValue, name: string, span?: Span): never {
  throw new UnreachableError(`cannot set member '${name}' on a function`, span);
}
