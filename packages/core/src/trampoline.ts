/**
 * Trampolines: deferred computations that let deep recursion in the
 * evaluated program run in constant native stack depth.
 *
 * A computation is Done (a final value), More (a step that yields the next
 * computation when run), or a FlatMap chaining a continuation onto another
 * computation. Drivers call `resume` in a loop; every call does a bounded
 * amount of native work. Left-nested chains are re-associated one node at a
 * time, so chaining never nests native calls.
 */

/** Called by the driver right before a More step runs. */
export type StepObserver = () => void;

export abstract class Trampoline<T> {
  /** Advance by one reduction. */
  abstract resume(beforeStep: StepObserver): Trampoline<T>;

  /** Advance `this` with `continuation` waiting on its result. */
  abstract continueWith<U>(
    continuation: (value: T) => Trampoline<U>,
    beforeStep: StepObserver
  ): Trampoline<U>;

  /** This computation as a Done, when it has finished. */
  abstract asDone(): Done<T> | undefined;

  flatMap<U>(continuation: (value: T) => Trampoline<U>): Trampoline<U> {
    return new FlatMap(this, continuation);
  }

  map<U>(f: (value: T) => U): Trampoline<U> {
    return this.flatMap((value) => done(f(value)));
  }

  /** Run `next` after this computation, discarding its value. */
  then<U>(next: () => Trampoline<U>): Trampoline<U> {
    return this.flatMap(() => next());
  }
}

export class Done<T> extends Trampoline<T> {
  readonly value: T;

  constructor(value: T) {
    super();
    this.value = value;
  }

  resume(): Trampoline<T> {
    return this;
  }

  continueWith<U>(continuation: (value: T) => Trampoline<U>): Trampoline<U> {
    return continuation(this.value);
  }

  asDone(): Done<T> {
    return this;
  }
}

export class More<T> extends Trampoline<T> {
  private readonly step: () => Trampoline<T>;

  constructor(step: () => Trampoline<T>) {
    super();
    this.step = step;
  }

  resume(beforeStep: StepObserver): Trampoline<T> {
    beforeStep();
    return this.step();
  }

  continueWith<U>(
    continuation: (value: T) => Trampoline<U>,
    beforeStep: StepObserver
  ): Trampoline<U> {
    beforeStep();
    return new FlatMap(this.step(), continuation);
  }

  asDone(): undefined {
    return undefined;
  }
}

class FlatMap<A, B> extends Trampoline<B> {
  private readonly source: Trampoline<A>;
  private readonly continuation: (value: A) => Trampoline<B>;

  constructor(source: Trampoline<A>, continuation: (value: A) => Trampoline<B>) {
    super();
    this.source = source;
    this.continuation = continuation;
  }

  resume(beforeStep: StepObserver): Trampoline<B> {
    return this.source.continueWith(this.continuation, beforeStep);
  }

  // (source >>= f) >>= g  becomes  source >>= (a => f(a) >>= g)
  continueWith<C>(continuation: (value: B) => Trampoline<C>): Trampoline<C> {
    const inner = this.continuation;
    return new FlatMap(this.source, (value: A) => inner(value).flatMap(continuation));
  }

  asDone(): undefined {
    return undefined;
  }
}

export function done<T>(value: T): Trampoline<T> {
  return new Done(value);
}

export function more<T>(step: () => Trampoline<T>): Trampoline<T> {
  return new More(step);
}

/**
 * Apply `f` to each item in order, each application starting only after the
 * previous one finished.
 */
export function sequence<I, T>(items: readonly I[], f: (item: I, index: number) => Trampoline<T>): Trampoline<T[]> {
  const results: T[] = [];
  const next = (index: number): Trampoline<T[]> => {
    if (index >= items.length) return done(results);
    return f(items[index], index).flatMap((value) => {
      results.push(value);
      return next(index + 1);
    });
  };
  return next(0);
}

const ignoreStep: StepObserver = () => {};

/** Drive a computation to completion. */
export function runTrampoline<T>(trampoline: Trampoline<T>, beforeStep: StepObserver = ignoreStep): T {
  let current = trampoline;
  for (;;) {
    const finished = current.asDone();
    if (finished) return finished.value;
    current = current.resume(beforeStep);
  }
}
