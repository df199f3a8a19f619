/**
 * Lode interpreter: evaluates checked syntax trees one trampoline step at a
 * time.
 *
 * Every compound expression, every statement of a block, every loop
 * iteration and every function entry is a separate step, so native stack
 * depth stays constant no matter how deeply the program recurses.
 */
import { Activation, Variable } from "./activation.js";
import type * as AST from "./ast.js";
import { EMPTY_SPAN, type Span } from "./ast.js";
import {
  arrayGet,
  arraySet,
  checkNotDestroyed,
  compositeGetField,
  compositeSetField,
  dictionaryGet,
  dictionarySet,
} from "./containers.js";
import { InterpretationError, UnreachableError } from "./errors.js";
import { Execution, type ExecutionLimits, Meter, type RunResult } from "./execution.js";
import {
  type HostFunctionValue,
  type InterpretedFunctionValue,
  type Invocation,
  getFunctionMember,
  invokeFunctionValue,
  newHostFunction,
  newInterpretedFunction,
  setFunctionMember,
} from "./function.js";
import { builtinMember } from "./members.js";
import { evaluateBinaryOperation, evaluateNegation, evaluateNot, expectBool } from "./operators.js";
import { type EmitTrace, type JsonRecord, type TraceSink, makeEmitTrace } from "./trace.js";
import { type Trampoline, done, more, sequence } from "./trampoline.js";
import { ANY_TYPE, type FunctionType, dynamicTypeOf } from "./types.js";
import {
  type CompositeValue,
  type Value,
  NIL,
  VOID,
  arrayValue,
  boolValue,
  compositeValue,
  copyValue,
  describeValue,
  dictionaryValue,
  intValue,
  isResourceKinded,
  someValue,
  stringValue,
} from "./values.js";

// --- Options ---
export interface InterpreterOptions {
  /** Host values visible to the program as globals (standard library). */
  predeclaredValues?: Map<string, Value>;
  trace?: TraceSink;
  runId?: string;
  limits?: ExecutionLimits;
  signal?: AbortSignal;
  /** Called after each step is admitted by the meter. */
  onStep?: (steps: number) => void;
}

type Completion =
  | { kind: "normal"; activation: Activation }
  | { kind: "return"; value: Value }
  | { kind: "break" }
  | { kind: "continue" };

function normal(activation: Activation): Completion {
  return { kind: "normal", activation };
}

/** A readable and writable location: a variable, field or element. */
interface Place {
  read(): Value;
  write(value: Value): void;
}

/** A transferred argument or element, with any move from its variable not yet made. */
type PendingTransfer =
  | { kind: "value"; value: Value }
  | { kind: "move"; variable: Variable; source: AST.IdentifierExpression };

function unwrapMoves(expr: AST.Expr): AST.Expr {
  let inner = expr;
  while (inner.kind === "UnaryExpression" && inner.operation === "<-") {
    inner = inner.expression;
  }
  return inner;
}

/** The variable reference a move empties, when the moved expression is one. */
function movedIdentifier(expr: AST.Expr): AST.IdentifierExpression | undefined {
  const inner = unwrapMoves(expr);
  return inner.kind === "IdentifierExpression" ? inner : undefined;
}

/**
 * Whether an expression can evaluate to a value still held by a variable,
 * field or element. Calls, literals and operators build fresh values, which
 * a transfer takes without a copy.
 */
function mayAlias(expr: AST.Expr): boolean {
  switch (expr.kind) {
    case "IdentifierExpression":
    case "MemberExpression":
    case "IndexExpression":
      return true;
    case "ForceExpression":
      return mayAlias(expr.expression);
    case "ConditionalExpression":
      return mayAlias(expr.then) || mayAlias(expr.else);
    case "BinaryExpression":
      return expr.operation === "??" && (mayAlias(expr.left) || mayAlias(expr.right));
    default:
      return false;
  }
}

interface CompositeType {
  declaration: AST.CompositeDeclaration;
  functions: Map<string, AST.FunctionDeclaration>;
}

const functionExpressions = new WeakMap<AST.FunctionDeclaration | AST.SpecialFunctionDeclaration, AST.FunctionExpression>();

function functionExpressionOf(
  declaration: AST.FunctionDeclaration | AST.SpecialFunctionDeclaration
): AST.FunctionExpression {
  let expression = functionExpressions.get(declaration);
  if (!expression) {
    expression = {
      kind: "FunctionExpression",
      parameters: declaration.parameters,
      returnType: declaration.kind === "FunctionDeclaration" ? declaration.returnType : undefined,
      block: declaration.block,
      span: declaration.span,
    };
    functionExpressions.set(declaration, expression);
  }
  return expression;
}

function functionName(fn: Value): string {
  return (fn.kind === "InterpretedFunction" || fn.kind === "HostFunction") && fn.name
    ? fn.name
    : "<anonymous>";
}

function limitsRecord(limits: ExecutionLimits): JsonRecord {
  const record: JsonRecord = {};
  if (limits.maxSteps !== undefined) record["maxSteps"] = limits.maxSteps;
  if (limits.timeMs !== undefined) record["timeMs"] = limits.timeMs;
  if (limits.maxCallDepth !== undefined) record["maxCallDepth"] = limits.maxCallDepth;
  return record;
}

export class Interpreter {
  readonly program: AST.Program;
  readonly emitTrace: EmitTrace;
  private readonly options: InterpreterOptions;
  private globals: Activation;
  private readonly compositeTypes = new Map<string, CompositeType>();
  private meter?: Meter;
  private declared = false;

  constructor(program: AST.Program, options: InterpreterOptions = {}) {
    this.program = program;
    this.options = options;
    this.emitTrace = makeEmitTrace(options.runId ?? "lode-run", options.trace);
    let globals = Activation.empty;
    for (const [name, value] of options.predeclaredValues ?? []) {
      globals = globals.extend(name, new Variable(name, value, true));
    }
    this.globals = globals;
  }

  get globalActivation(): Activation {
    return this.globals;
  }

  // --- Entry points ---

  /** Declare the program's globals and evaluate global variables in order. */
  interpret(): RunResult<void> {
    return this.execute(this.declareGlobals());
  }

  /** Call a global function through the driver. */
  invoke(name: string, ...args: Value[]): RunResult<Value> {
    return this.execute(this.callGlobal(name, ...args));
  }

  /**
   * The deferred call of a global function. The call starts in the first
   * step, so it is accounted to the meter of whichever execution drives it.
   */
  callGlobal(name: string, ...args: Value[]): Trampoline<Value> {
    const variable = this.globals.find(name);
    if (!variable) {
      throw new UnreachableError(`no global named '${name}'`);
    }
    const fn = variable.read();
    return more(() =>
      this.invokeFunction(fn, {
        arguments: args,
        argumentTypes: args.map(dynamicTypeOf),
        location: EMPTY_SPAN,
        interpreter: this,
      })
    );
  }

  /** Evaluate a single expression against the global scope. */
  evaluate(expression: AST.Expr): RunResult<Value> {
    return this.execute(more(() => this.evaluateExpression(expression, this.globals)));
  }

  /** A stepwise driver for hosts that interleave their own work between steps. */
  createExecution<T>(trampoline: Trampoline<T>): Execution<T> {
    const meter = new Meter(this.options.limits ?? {}, this.emitTrace, this.options.signal);
    this.meter = meter;
    return new Execution(trampoline, meter, this.options.onStep);
  }

  execute<T>(trampoline: Trampoline<T>): RunResult<T> {
    const execution = this.createExecution(trampoline);
    const startMs = Date.now();
    this.emitTrace("run_start", this.program.span, limitsRecord(this.options.limits ?? {}));
    try {
      const result = execution.runToResult();
      const data: JsonRecord = { steps: result.steps, durationMs: Date.now() - startMs };
      if (!result.ok) {
        data["error"] = result.error.code;
        data["message"] = result.error.message;
      }
      this.emitTrace("run_end", this.program.span, data);
      return result;
    } catch (e) {
      this.emitTrace("run_end", this.program.span, {
        steps: execution.steps,
        durationMs: Date.now() - startMs,
        error: e instanceof UnreachableError ? e.code : "E_RUNTIME",
        message: e instanceof Error ? e.message : String(e),
      });
      throw e;
    }
  }

  // --- Invocation ---

  invokeFunction(fn: Value, invocation: Invocation): Trampoline<Value> {
    const name = functionName(fn);
    this.emitTrace("fn_call_start", invocation.location, { fn: name });
    this.meter?.enterCall(invocation.location);
    return invokeFunctionValue(fn, invocation).map((result) => {
      this.meter?.exitCall();
      this.emitTrace("fn_call_end", invocation.location, { fn: name });
      return result;
    });
  }

  invokeInterpretedFunction(fn: InterpretedFunctionValue, invocation: Invocation): Trampoline<Value> {
    const { parameters } = fn.expression;
    if (invocation.arguments.length !== parameters.length) {
      throw new UnreachableError(
        `${functionName(fn)} expects ${parameters.length} arguments, got ${invocation.arguments.length}`,
        invocation.location
      );
    }
    // parameters are bound before the first step of the body, so moved arguments always have a holder
    let activation = fn.activation;
    parameters.forEach((parameter, i) => {
      activation = activation.extend(
        parameter.identifier,
        new Variable(parameter.identifier, invocation.arguments[i], true)
      );
    });
    return more(() => this.executeFunctionBlock(fn.expression.block, activation));
  }

  private executeFunctionBlock(block: AST.Block, activation: Activation): Trampoline<Value> {
    return this.executeBlock(block.statements, activation).map((completion) => {
      switch (completion.kind) {
        case "return":
          return completion.value;
        case "normal":
          return VOID;
        default:
          throw new UnreachableError(`${completion.kind} outside of a loop`, block.span);
      }
    });
  }

  // --- Globals ---

  private declareGlobals(): Trampoline<void> {
    if (this.declared) {
      throw new UnreachableError("program declarations were already interpreted");
    }
    this.declared = true;

    // every global is visible to every other one before any is initialized
    const cells = new Map<AST.Declaration, Variable>();
    let globals = this.globals;
    for (const declaration of this.program.declarations) {
      const isConstant = declaration.kind !== "VariableDeclaration" || declaration.isConstant;
      const variable = new Variable(declaration.identifier, undefined, isConstant);
      cells.set(declaration, variable);
      globals = globals.extend(declaration.identifier, variable);
    }
    this.globals = globals;

    const variables: AST.VariableDeclaration[] = [];
    for (const [declaration, variable] of cells) {
      switch (declaration.kind) {
        case "CompositeDeclaration":
          variable.write(this.declareComposite(declaration));
          break;
        case "FunctionDeclaration":
          variable.write(
            newInterpretedFunction(this, functionExpressionOf(declaration), globals, declaration.identifier)
          );
          break;
        case "VariableDeclaration":
          variables.push(declaration);
          break;
      }
    }

    return sequence(variables, (declaration) =>
      more(() => this.evaluateDeclarationValue(declaration, globals)).map((value) => {
        cells.get(declaration)?.write(value);
      })
    ).map(() => undefined);
  }

  // --- Composites ---

  private declareComposite(declaration: AST.CompositeDeclaration): HostFunctionValue {
    const functions = new Map<string, AST.FunctionDeclaration>();
    for (const fn of declaration.functions) {
      functions.set(fn.identifier, fn);
    }
    this.compositeTypes.set(declaration.identifier, { declaration, functions });

    const parameters = declaration.initializer
      ? declaration.initializer.parameters.map((p) => p.type ?? ANY_TYPE)
      : declaration.fields.map((f) => f.type ?? ANY_TYPE);
    const type: FunctionType = {
      kind: "Function",
      parameterTypes: parameters,
      returnType: { kind: "Composite", compositeKind: declaration.compositeKind, identifier: declaration.identifier },
    };

    return newHostFunction(
      (invocation) => {
        const composite = compositeValue(declaration.compositeKind, declaration.identifier);
        const { initializer } = declaration;
        if (!initializer) {
          declaration.fields.forEach((field, i) => {
            const arg = invocation.arguments[i];
            if (arg === undefined) {
              throw new UnreachableError(`missing value for field '${field.identifier}'`, invocation.location);
            }
            compositeSetField(composite, field.identifier, arg);
          });
          return done(composite);
        }
        const init = this.boundMethod(composite, initializer, "init");
        return this.invokeFunction(init, invocation).map(() => {
          this.orderFields(composite, declaration);
          return composite;
        });
      },
      { name: declaration.identifier, type }
    );
  }

  private orderFields(composite: CompositeValue, declaration: AST.CompositeDeclaration): void {
    const ordered = new Map<string, Value>();
    for (const field of declaration.fields) {
      const value = composite.fields.get(field.identifier);
      if (value === undefined) {
        throw new UnreachableError(
          `${declaration.identifier}.${field.identifier} not initialized`,
          declaration.initializer?.span
        );
      }
      ordered.set(field.identifier, value);
    }
    composite.fields = ordered;
  }

  private boundMethod(
    composite: CompositeValue,
    declaration: AST.FunctionDeclaration | AST.SpecialFunctionDeclaration,
    name: string
  ): InterpretedFunctionValue {
    const activation = this.globals.extend("self", new Variable("self", composite, true));
    return newInterpretedFunction(this, functionExpressionOf(declaration), activation, `${composite.identifier}.${name}`);
  }

  private destroyValue(value: Value, span: Span, nested: boolean): Trampoline<void> {
    switch (value.kind) {
      case "Composite": {
        if (value.compositeKind !== "resource") return done(undefined);
        if (value.destroyed && nested) return done(undefined);
        checkNotDestroyed(value, span);
        const destructor = this.compositeTypes.get(value.identifier)?.declaration.destructor;
        const beforeFields: Trampoline<unknown> = destructor
          ? this.invokeFunction(this.boundMethod(value, destructor, "destroy"), {
              arguments: [],
              argumentTypes: [],
              location: span,
              interpreter: this,
            })
          : done(undefined);
        return beforeFields
          .then(() => sequence([...value.fields.values()], (field) => this.destroyValue(field, span, true)))
          .map(() => {
            value.destroyed = true;
            this.emitTrace("resource_destroyed", span, { type: value.identifier });
          });
      }
      case "Some":
        return more(() => this.destroyValue(value.value, span, true));
      case "Array":
        return more(() => sequence(value.elements, (element) => this.destroyValue(element, span, true))).map(
          () => undefined
        );
      case "Dictionary":
        return more(() =>
          sequence([...value.entries.values()], (entry) => this.destroyValue(entry.value, span, true))
        ).map(() => undefined);
      default:
        return done(undefined);
    }
  }

  // --- Expressions ---

  evaluateExpression(expr: AST.Expr, activation: Activation): Trampoline<Value> {
    switch (expr.kind) {
      case "BoolExpression":
        return done(boolValue(expr.value));
      case "NilExpression":
        return done(NIL);
      case "IntegerExpression":
        return done(intValue(expr.integerKind, expr.value));
      case "StringExpression":
        return done(stringValue(expr.value));
      case "IdentifierExpression":
        return done(this.lookup(expr.identifier, activation, expr.span).read(expr.span));
      case "FunctionExpression":
        return done(newInterpretedFunction(this, expr, activation));
      default:
        return more(() => this.evaluateCompound(expr, activation));
    }
  }

  private evaluateCompound(expr: AST.Expr, activation: Activation): Trampoline<Value> {
    switch (expr.kind) {
      case "ArrayExpression":
        return sequence(expr.values, (element) => this.evaluatePendingTransfer(element, activation)).map((pending) =>
          arrayValue(this.commitTransfers(pending))
        );

      case "DictionaryExpression":
        return sequence(expr.entries, (entry) =>
          this.evaluateExpression(entry.key, activation).flatMap((key) =>
            this.evaluatePendingTransfer(entry.value, activation).map(
              (value): [Value, PendingTransfer] => [key, value]
            )
          )
        ).map((entries) => {
          const values = this.commitTransfers(entries.map(([, value]) => value));
          return dictionaryValue(entries.map(([key], i): [Value, Value] => [key, values[i]]));
        });

      case "MemberExpression":
        return this.evaluateExpression(expr.expression, activation).map((target) => {
          if (!expr.optional) return this.getMember(target, expr.identifier, expr.span);
          switch (target.kind) {
            case "Nil":
              return NIL;
            case "Some": {
              const member = this.getMember(target.value, expr.identifier, expr.span);
              return member.kind === "Some" || member.kind === "Nil" ? member : someValue(member);
            }
            default:
              throw new UnreachableError(`optional chaining on ${describeValue(target)}`, expr.span);
          }
        });

      case "IndexExpression":
        return this.evaluateExpression(expr.targetExpression, activation).flatMap((target) =>
          this.evaluateExpression(expr.indexingExpression, activation).map((index) => {
            switch (target.kind) {
              case "Array":
                return arrayGet(target, index, expr.span);
              case "Dictionary":
                return dictionaryGet(target, index, expr.span);
              default:
                throw new UnreachableError(`cannot index into ${describeValue(target)}`, expr.span);
            }
          })
        );

      case "BinaryExpression":
        return this.evaluateBinary(expr, activation);

      case "UnaryExpression":
        switch (expr.operation) {
          case "<-":
            return this.evaluateMove(expr.expression, activation);
          case "-":
            return this.evaluateExpression(expr.expression, activation).map((v) => evaluateNegation(v, expr.span));
          case "!":
            return this.evaluateExpression(expr.expression, activation).map((v) => evaluateNot(v, expr.span));
        }

      case "ForceExpression":
        return this.evaluateExpression(expr.expression, activation).map((value) => {
          switch (value.kind) {
            case "Some":
              return value.value;
            case "Nil":
              throw new InterpretationError("E_FORCE_NIL", "Force-unwrapped an empty optional.", expr.span);
            default:
              throw new UnreachableError(`force-unwrap of ${describeValue(value)}`, expr.span);
          }
        });

      case "ConditionalExpression":
        return this.evaluateExpression(expr.test, activation).flatMap((test) =>
          this.evaluateExpression(expectBool(test, expr.test.span) ? expr.then : expr.else, activation)
        );

      case "InvocationExpression":
        return this.evaluateInvocation(expr, activation);

      case "CreateExpression":
        return this.evaluateInvocation(expr.invocation, activation);

      case "DestroyExpression":
        return this.evaluateMove(expr.expression, activation).flatMap((value) =>
          this.destroyValue(value, expr.span, false).map((): Value => VOID)
        );

      default:
        throw new UnreachableError(`cannot evaluate ${expr.kind}`, expr.span);
    }
  }

  private evaluateBinary(expr: AST.BinaryExpression, activation: Activation): Trampoline<Value> {
    const { operation, span } = expr;
    switch (operation) {
      case "&&":
      case "||":
        return this.evaluateExpression(expr.left, activation).flatMap((left) => {
          const l = expectBool(left, expr.left.span);
          if (operation === "&&" ? !l : l) return done(boolValue(l));
          return this.evaluateExpression(expr.right, activation).map((right) => boolValue(expectBool(right, expr.right.span)));
        });
      case "??":
        return this.evaluateExpression(expr.left, activation).flatMap((left) => {
          switch (left.kind) {
            case "Some":
              return done(left.value);
            case "Nil":
              return this.evaluateExpression(expr.right, activation);
            default:
              throw new UnreachableError(`'??' on ${describeValue(left)}`, span);
          }
        });
      default:
        return this.evaluateExpression(expr.left, activation).flatMap((left) =>
          this.evaluateExpression(expr.right, activation).map((right) =>
            evaluateBinaryOperation(operation, left, right, span)
          )
        );
    }
  }

  /**
   * Arguments moved with `<-` leave their variables only once every argument
   * is evaluated, in the same reduction that binds them to the callee.
   */
  private evaluateInvocation(expr: AST.InvocationExpression, activation: Activation): Trampoline<Value> {
    return this.evaluateExpression(expr.invokedExpression, activation).flatMap((fn) =>
      sequence(expr.arguments, (arg) => this.evaluatePendingTransfer(arg.expression, activation)).flatMap(
        (pending) => {
          this.meter?.checkCallDepth(expr.span);
          const args = this.commitTransfers(pending);
          return this.invokeFunction(fn, {
            arguments: args,
            argumentTypes: expr.argumentTypes ?? args.map(dynamicTypeOf),
            location: expr.span,
            interpreter: this,
          });
        }
      )
    );
  }

  private getMember(target: Value, name: string, span: Span): Value {
    switch (target.kind) {
      case "Composite": {
        const field = compositeGetField(target, name, span);
        if (field !== undefined) return field;
        const method = this.compositeTypes.get(target.identifier)?.functions.get(name);
        if (method) return this.boundMethod(target, method, name);
        throw new UnreachableError(`${target.identifier} has no member '${name}'`, span);
      }
      case "InterpretedFunction":
      case "HostFunction":
        return getFunctionMember(target, name, span);
      default: {
        const member = builtinMember(target, name, span);
        if (member === undefined) {
          throw new UnreachableError(`${describeValue(target)} has no member '${name}'`, span);
        }
        return member;
      }
    }
  }

  // --- Transfers ---

  /**
   * Evaluate a value at a transfer point: `<-` moves it, anything else is
   * copied.
   */
  private evaluateTransfer(expr: AST.Expr, activation: Activation): Trampoline<Value> {
    if (expr.kind === "UnaryExpression" && expr.operation === "<-") {
      return this.evaluateMove(expr.expression, activation);
    }
    const value = this.evaluateExpression(expr, activation);
    return mayAlias(expr) ? value.map((v) => copyValue(v, expr.span)) : value;
  }

  /**
   * Moving an identifier empties its variable in the same reduction that
   * hands the value on, so no step boundary separates the two.
   */
  private evaluateMove(expr: AST.Expr, activation: Activation): Trampoline<Value> {
    const source = movedIdentifier(expr);
    if (!source) {
      return this.evaluateExpression(unwrapMoves(expr), activation);
    }
    return done(this.moveOut(this.lookup(source.identifier, activation, source.span), source));
  }

  private moveOut(variable: Variable, source: AST.IdentifierExpression): Value {
    const value = variable.moveOut(source.span);
    if (isResourceKinded(value)) {
      this.emitTrace("resource_moved", source.span, { variable: source.identifier, type: describeValue(value) });
    }
    return value;
  }

  /**
   * Evaluate a transfer whose receiver is bound later. A moved identifier is
   * only checked here; its variable is emptied by `commitTransfers`.
   */
  private evaluatePendingTransfer(expr: AST.Expr, activation: Activation): Trampoline<PendingTransfer> {
    const source = expr.kind === "UnaryExpression" && expr.operation === "<-" ? movedIdentifier(expr) : undefined;
    if (source) {
      const variable = this.lookup(source.identifier, activation, source.span);
      variable.read(source.span);
      return done({ kind: "move", variable, source });
    }
    return this.evaluateTransfer(expr, activation).map((value): PendingTransfer => ({ kind: "value", value }));
  }

  /** Empty the sources of pending moves. Every source is checked before the first is emptied. */
  private commitTransfers(pending: PendingTransfer[]): Value[] {
    const moving = new Set<Variable>();
    for (const transfer of pending) {
      if (transfer.kind !== "move") continue;
      const { variable, source } = transfer;
      if (moving.has(variable)) {
        throw new InterpretationError(
          "E_USE_AFTER_MOVE",
          `'${variable.name}' was moved and can no longer be used.`,
          source.span,
          { variable: variable.name }
        );
      }
      variable.read(source.span);
      moving.add(variable);
    }
    return pending.map((transfer) =>
      transfer.kind === "move" ? this.moveOut(transfer.variable, transfer.source) : transfer.value
    );
  }

  private evaluateDeclarationValue(declaration: AST.VariableDeclaration, activation: Activation): Trampoline<Value> {
    return declaration.transfer === "<-"
      ? this.evaluateMove(declaration.value, activation)
      : this.evaluateTransfer(declaration.value, activation);
  }

  private lookup(name: string, activation: Activation, span: Span): Variable {
    const variable = activation.find(name);
    if (!variable) {
      throw new UnreachableError(`unbound identifier '${name}'`, span);
    }
    return variable;
  }

  // --- Places ---

  private evaluatePlace(target: AST.AssignmentTarget, activation: Activation): Trampoline<Place> {
    switch (target.kind) {
      case "IdentifierExpression": {
        const variable = this.lookup(target.identifier, activation, target.span);
        return done({
          read: () => variable.read(target.span),
          write: (value) => variable.write(value),
        });
      }
      case "MemberExpression":
        return this.evaluateExpression(target.expression, activation).map((object): Place => {
          switch (object.kind) {
            case "Composite":
              return {
                read: () => this.getMember(object, target.identifier, target.span),
                write: (value) => compositeSetField(object, target.identifier, value, target.span),
              };
            case "InterpretedFunction":
            case "HostFunction":
              return setFunctionMember(object, target.identifier, target.span);
            default:
              throw new UnreachableError(`cannot assign to member of ${describeValue(object)}`, target.span);
          }
        });
      case "IndexExpression":
        return this.evaluateExpression(target.targetExpression, activation).flatMap((object) =>
          this.evaluateExpression(target.indexingExpression, activation).map((index): Place => {
            switch (object.kind) {
              case "Array":
                return {
                  read: () => arrayGet(object, index, target.span),
                  write: (value) => arraySet(object, index, value, target.span),
                };
              case "Dictionary":
                return {
                  read: () => dictionaryGet(object, index, target.span),
                  write: (value) =>
                    dictionarySet(
                      object,
                      index,
                      value.kind === "Some" || value.kind === "Nil" ? value : someValue(value),
                      target.span
                    ),
                };
              default:
                throw new UnreachableError(`cannot index into ${describeValue(object)}`, target.span);
            }
          })
        );
    }
  }

  // --- Statements ---

  private executeBlock(statements: AST.Stmt[], activation: Activation): Trampoline<Completion> {
    const next = (index: number, current: Activation): Trampoline<Completion> => {
      if (index >= statements.length) return done(normal(current));
      const statement = statements[index];
      return more(() => this.executeStatement(statement, current)).flatMap((completion) =>
        completion.kind === "normal" ? next(index + 1, completion.activation) : done(completion)
      );
    };
    return next(0, activation);
  }

  /** Run a nested block; a normal completion resumes the enclosing scope. */
  private executeNestedBlock(block: AST.Block, activation: Activation): Trampoline<Completion> {
    return this.executeBlock(block.statements, activation).map((completion) =>
      completion.kind === "normal" ? normal(activation) : completion
    );
  }

  private executeStatement(statement: AST.Stmt, activation: Activation): Trampoline<Completion> {
    switch (statement.kind) {
      case "VariableDeclaration":
        return this.evaluateDeclarationValue(statement, activation).map((value) =>
          normal(
            activation.extend(statement.identifier, new Variable(statement.identifier, value, statement.isConstant))
          )
        );

      case "AssignmentStatement":
        return this.evaluatePlace(statement.target, activation).flatMap((place) => {
          const value =
            statement.transfer === "<-"
              ? this.evaluateMove(statement.value, activation)
              : this.evaluateTransfer(statement.value, activation);
          return value.map((v) => {
            place.write(v);
            return normal(activation);
          });
        });

      case "SwapStatement":
        return this.evaluatePlace(statement.left, activation).flatMap((left) =>
          this.evaluatePlace(statement.right, activation).map((right) => {
            const leftValue = left.read();
            const rightValue = right.read();
            left.write(rightValue);
            right.write(leftValue);
            return normal(activation);
          })
        );

      case "ExpressionStatement":
        return this.evaluateExpression(statement.expression, activation).map(() => normal(activation));

      case "ReturnStatement":
        if (!statement.expression) return done({ kind: "return", value: VOID });
        return this.evaluateTransfer(statement.expression, activation).map(
          (value): Completion => ({ kind: "return", value })
        );

      case "BreakStatement":
        return done({ kind: "break" });

      case "ContinueStatement":
        return done({ kind: "continue" });

      case "IfStatement":
        return this.executeIf(statement, activation);

      case "WhileStatement":
        return this.executeWhile(statement, activation);

      case "ForStatement":
        return this.executeFor(statement, activation);

      case "FunctionDeclaration": {
        // declared before it is created, so the body can call itself
        const variable = new Variable(statement.identifier, undefined, true);
        const extended = activation.extend(statement.identifier, variable);
        variable.write(newInterpretedFunction(this, functionExpressionOf(statement), extended, statement.identifier));
        return done(normal(extended));
      }
    }
  }

  private executeIf(statement: AST.IfStatement, activation: Activation): Trampoline<Completion> {
    const orElse = (): Trampoline<Completion> =>
      statement.else ? this.executeNestedBlock(statement.else, activation) : done(normal(activation));

    const { test } = statement;
    if (test.kind === "VariableDeclaration") {
      return this.evaluateDeclarationValue(test, activation).flatMap((value) => {
        switch (value.kind) {
          case "Nil":
            return orElse();
          case "Some": {
            const bound = activation.extend(test.identifier, new Variable(test.identifier, value.value, test.isConstant));
            return this.executeBlock(statement.then.statements, bound).map((completion) =>
              completion.kind === "normal" ? normal(activation) : completion
            );
          }
          default:
            throw new UnreachableError(`optional binding of ${describeValue(value)}`, test.span);
        }
      });
    }

    return this.evaluateExpression(test, activation).flatMap((value) =>
      expectBool(value, test.span) ? this.executeNestedBlock(statement.then, activation) : orElse()
    );
  }

  private executeWhile(statement: AST.WhileStatement, activation: Activation): Trampoline<Completion> {
    const iterate = (): Trampoline<Completion> =>
      more(() => this.evaluateExpression(statement.test, activation)).flatMap((test) => {
        if (!expectBool(test, statement.test.span)) return done(normal(activation));
        return this.executeNestedBlock(statement.block, activation).flatMap((completion) => {
          switch (completion.kind) {
            case "break":
              return done(normal(activation));
            case "return":
              return done(completion);
            default:
              return iterate();
          }
        });
      });
    return iterate();
  }

  private executeFor(statement: AST.ForStatement, activation: Activation): Trampoline<Completion> {
    return this.evaluateExpression(statement.value, activation).flatMap((iterable) => {
      if (iterable.kind !== "Array") {
        throw new UnreachableError(`cannot iterate over ${describeValue(iterable)}`, statement.value.span);
      }
      const iterate = (index: number): Trampoline<Completion> => {
        if (index >= iterable.elements.length) return done(normal(activation));
        return more(() => {
          const element = copyValue(iterable.elements[index], statement.value.span);
          const scope = activation.extend(statement.identifier, new Variable(statement.identifier, element, true));
          return this.executeBlock(statement.block.statements, scope);
        }).flatMap((completion) => {
          switch (completion.kind) {
            case "break":
              return done(normal(activation));
            case "return":
              return done(completion);
            default:
              return iterate(index + 1);
          }
        });
      };
      return iterate(0);
    });
  }
}
