/**
 * Do-Block Syntax
 *
 * Chains monadic operations as a flat, imperative-looking sequence of steps,
 * similar to Haskell's do-notation or Scala's for-comprehensions.
 *
 * A program is a generator function. Every `yield* $(fa)` is a suspension
 * point: the interpreter feeds `fa` to the monad's `flatMap` and resumes the
 * generator with the unwrapped value. When `fa` is in its short-circuit state
 * (`None`, `Left`) `flatMap` never calls the continuation, so the remaining
 * steps are never reached and that state is the result of the whole run.
 *
 * ```typescript
 * const greet = doOption(function* ($, msg: Option<string>, name: Option<string>) {
 *   const a = yield* $(msg);
 *   const b = yield* $(name);
 *   return yield* $.ret(`${a}, ${b}!`);
 * });
 *
 * greet(Some("Hello"), Some("World")); // Some("Hello, World!")
 * greet(None, Some("World"));          // None
 * ```
 *
 * `$.ret(v)` ends the run early with `pure(v)`. A program that finishes
 * with a plain `return fa` produces `fa` unchanged.
 *
 * Continuations are single-shot: each step is resumed at most once, which is
 * all `Option` and `Either` ever do.
 */

import type { $, EitherF, OptionF, TypeFunction } from "../hkt.js";
import type { Monad } from "../typeclasses/monad.js";
import type { Option } from "../data/option.js";
import type { Either } from "../data/either.js";
import { eitherMonad, optionMonad } from "../instances.js";

// ============================================================================
// Steps
// ============================================================================

/**
 * Suspension on a container value.
 *
 * `chain` hides the payload type: it binds the container and runs `next`
 * once the payload has been handed back to the suspended generator.
 */
export interface BindStep<F extends TypeFunction> {
  readonly _tag: "Bind";
  readonly chain: <T>(next: () => $<F, T>) => $<F, T>;
}

/**
 * Explicit early return with a final value.
 */
export interface ReturnStep<R> {
  readonly _tag: "Return";
  readonly value: R;
}

export type Step<F extends TypeFunction, R> = BindStep<F> | ReturnStep<R>;

/**
 * A running do-block program.
 */
export type Program<F extends TypeFunction, R> = Generator<Step<F, R>, $<F, R>, unknown>;

/**
 * The context handed to a program. Calling it is the same as `bind`.
 */
export interface DoContext<F extends TypeFunction, R> {
  <A>(fa: $<F, A>): Generator<BindStep<F>, A, unknown>;
  /** Suspend on `fa` and resume with its payload */
  readonly bind: <A>(fa: $<F, A>) => Generator<BindStep<F>, A, unknown>;
  /** Stop the run and return `pure(value)` */
  readonly ret: (value: R) => Generator<ReturnStep<R>, never, unknown>;
  readonly pure: (value: R) => $<F, R>;
}

// ============================================================================
// Errors
// ============================================================================

/** Reason codes for a misused do-block program. */
export type DoBlockErrorReason =
  | "resumed_without_value"
  | "continuation_reused"
  | "resumed_after_return";

/**
 * Thrown only when a program is driven outside the interpreter or by a
 * `flatMap` that calls its continuation more than once. Container failures
 * never raise it.
 */
export class DoBlockError extends Error {
  constructor(
    readonly reason: DoBlockErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "DoBlockError";
  }
}

// ============================================================================
// Interpreter
// ============================================================================

function makeContext<F extends TypeFunction, R>(M: Monad<F>): DoContext<F, R> {
  function* bind<A>(fa: $<F, A>): Generator<BindStep<F>, A, unknown> {
    const cell: { received?: { readonly value: A } } = {};

    yield {
      _tag: "Bind",
      chain: <T>(next: () => $<F, T>): $<F, T> =>
        M.flatMap<A, T>(fa, (a) => {
          if (cell.received !== undefined) {
            throw new DoBlockError(
              "continuation_reused",
              "A do-block step was resumed twice; only single-shot monads are supported",
            );
          }
          cell.received = { value: a };
          return next();
        }),
    };

    if (cell.received === undefined) {
      throw new DoBlockError(
        "resumed_without_value",
        "A do-block step was resumed without a value; drive programs with doBlock()",
      );
    }
    return cell.received.value;
  }

  function* ret(value: R): Generator<ReturnStep<R>, never, unknown> {
    yield { _tag: "Return", value };
    throw new DoBlockError(
      "resumed_after_return",
      "A do-block program was resumed after an early return",
    );
  }

  return Object.assign(<A>(fa: $<F, A>) => bind(fa), {
    bind,
    ret,
    pure: (value: R): $<F, R> => M.pure<R>(value),
  });
}

function drive<F extends TypeFunction, R>(M: Monad<F>, program: Program<F, R>): $<F, R> {
  const result = program.next();
  if (result.done) {
    return result.value;
  }

  const step = result.value;
  switch (step._tag) {
    case "Bind": {
      let resumed = false;
      const value = step.chain<R>(() => {
        resumed = true;
        return drive(M, program);
      });
      // short-circuited: close the generator so its finally blocks run
      if (!resumed) {
        program.return(value);
      }
      return value;
    }
    case "Return": {
      const value = M.pure<R>(step.value);
      program.return(value);
      return value;
    }
  }
}

/**
 * Build a do-block runner for any monad.
 *
 * Each call of the returned function starts a fresh generator, so runs never
 * share state.
 *
 * @example
 * ```typescript
 * const safeDiv = doBlock(eitherMonad<string>())(function* ($, a: number, b: number) {
 *   const d = yield* $(b === 0 ? Left("division by zero") : Right(b));
 *   return Right(a / d);
 * });
 * ```
 */
export function doBlock<F extends TypeFunction>(M: Monad<F>) {
  return <Args extends unknown[], R>(
      program: (ctx: DoContext<F, R>, ...args: Args) => Program<F, R>,
    ) =>
    (...args: Args): $<F, R> =>
      drive(M, program(makeContext<F, R>(M), ...args));
}

// ============================================================================
// Option / Either entry points
// ============================================================================

/**
 * Do-block over Option
 */
export function doOption<Args extends unknown[], R>(
  program: (ctx: DoContext<OptionF, R>, ...args: Args) => Program<OptionF, R>,
): (...args: Args) => Option<R> {
  return doBlock(optionMonad)(program);
}

/**
 * Do-block over Either with a fixed Left type
 */
export function doEither<L>() {
  return <Args extends unknown[], R>(
    program: (ctx: DoContext<EitherF<L>, R>, ...args: Args) => Program<EitherF<L>, R>,
  ): ((...args: Args) => Either<L, R>) => doBlock(eitherMonad<L>())(program);
}
