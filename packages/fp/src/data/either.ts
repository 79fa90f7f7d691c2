/**
 * Either Data Type
 *
 * `Either<E, A>` holds exactly one of two payloads: `Left<E>` for a failure,
 * `Right<A>` for a success. Every combinator continues on Right; a Left is
 * handed back as the very same object, so its payload survives any chain of
 * `map`/`flatMap` calls untouched.
 *
 * ```typescript
 * const port = flatMap(Right("8080"), (raw) =>
 *   /^\d+$/.test(raw) ? Right(Number(raw)) : Left(`bad port: ${raw}`),
 * ); // Right(8080)
 * ```
 */

import type { Option } from "./option.js";
import { Some, None, isSome } from "./option.js";

// ============================================================================
// Either Type Definition
// ============================================================================

export type Either<E, A> = Left<E> | Right<A>;

/** Failure branch */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/** Success branch */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

/**
 * `Left(onNull())` for `null`/`undefined`, `Right(value)` otherwise
 */
export function fromNullable<E, A>(value: A | null | undefined, onNull: () => E): Either<E, A> {
  if (value === null || value === undefined) return Left(onNull());
  return Right(value);
}

export function fromPredicate<E, A>(
  value: A,
  predicate: (a: A) => boolean,
  onFalse: (a: A) => E,
): Either<E, A> {
  if (!predicate(value)) return Left(onFalse(value));
  return Right(value);
}

/**
 * Run `f`, capturing a thrown error as a Left.
 *
 * @example
 * ```typescript
 * tryCatch(() => JSON.parse(text), (e) => `invalid JSON: ${String(e)}`);
 * ```
 */
export function tryCatch<E, A>(f: () => A, onError: (error: unknown) => E): Either<E, A> {
  try {
    return Right(f());
  } catch (error) {
    return Left(onError(error));
  }
}

/**
 * Promote an Option, describing absence with `onNone`
 */
export function fromOption<E, A>(opt: Option<A>, onNone: () => E): Either<E, A> {
  if (isSome(opt)) return Right(opt.value);
  return Left(onNone());
}

// ============================================================================
// Type Guards
// ============================================================================

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Transforming
// ============================================================================

/**
 * Transform the Right payload. `f` is never called for a Left, which is
 * returned as is.
 */
export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  if (isLeft(either)) return either;
  return Right(f(either.right));
}

export function mapLeft<E, A, E2>(either: Either<E, A>, f: (e: E) => E2): Either<E2, A> {
  if (isRight(either)) return either;
  return Left(f(either.left));
}

/**
 * Transform whichever payload is present
 */
export function bimap<E, A, E2, B>(
  either: Either<E, A>,
  onLeft: (e: E) => E2,
  onRight: (a: A) => B,
): Either<E2, B> {
  if (isLeft(either)) return Left(onLeft(either.left));
  return Right(onRight(either.right));
}

/**
 * Chain a computation that may fail. A Left short-circuits: `f` is not
 * called and the Left is returned as is.
 */
export function flatMap<E, A, B>(
  either: Either<E, A>,
  f: (a: A) => Either<E, B>,
): Either<E, B> {
  if (isLeft(either)) return either;
  return f(either.right);
}

export function flatten<E, A>(either: Either<E, Either<E, A>>): Either<E, A> {
  return flatMap(either, (inner) => inner);
}

/**
 * Run a side effect on the Right payload; the input is returned
 */
export function tap<E, A>(either: Either<E, A>, f: (a: A) => void): Either<E, A> {
  if (isRight(either)) f(either.right);
  return either;
}

/**
 * Recover from a Left with another Either
 */
export function orElse<E, A, E2>(
  either: Either<E, A>,
  fallback: (e: E) => Either<E2, A>,
): Either<E2, A> {
  if (isLeft(either)) return fallback(either.left);
  return either;
}

export function swap<E, A>(either: Either<E, A>): Either<A, E> {
  if (isLeft(either)) return Right(either.left);
  return Left(either.right);
}

// ============================================================================
// Eliminating
// ============================================================================

/**
 * Collapse both branches to one value.
 *
 * @example
 * ```typescript
 * fold(result, (error) => `failed: ${error}`, (n) => `got ${n}`);
 * ```
 */
export function fold<E, A, B>(
  either: Either<E, A>,
  onLeft: (e: E) => B,
  onRight: (a: A) => B,
): B {
  return isLeft(either) ? onLeft(either.left) : onRight(either.right);
}

/** `fold` with named handlers */
export function match<E, A, B>(
  either: Either<E, A>,
  cases: { Left: (e: E) => B; Right: (a: A) => B },
): B {
  return fold(either, cases.Left, cases.Right);
}

/**
 * The Right payload, or a value computed from the Left
 */
export function getOrElse<E, A>(either: Either<E, A>, onLeft: (e: E) => A): A {
  return fold(either, onLeft, (a) => a);
}

export function getOrElseStrict<E, A>(either: Either<E, A>, fallback: A): A {
  return isLeft(either) ? fallback : either.right;
}

/** Drop the Left payload */
export function toOption<E, A>(either: Either<E, A>): Option<A> {
  return isLeft(either) ? None : Some(either.right);
}

// ============================================================================
// Sequencing
// ============================================================================

/**
 * Apply `f` to each item in iteration order, collecting the Right payloads.
 *
 * The first Left is returned as is and no further item is pulled from
 * `items`, so a lazy iterable is only consumed up to the failure.
 */
export function traverse<E, A, B>(items: Iterable<A>, f: (a: A) => Either<E, B>): Either<E, B[]> {
  const results: B[] = [];
  for (const a of items) {
    const either = f(a);
    if (isLeft(either)) return either;
    results.push(either.right);
  }
  return Right(results);
}

/**
 * Turn a collection of Eithers into an Either of a collection.
 *
 * @example
 * ```typescript
 * sequence([Right(1), Right(2)])            // Right([1, 2])
 * sequence([Right(1), Left("x"), Right(2)]) // Left("x")
 * sequence([])                              // Right([])
 * ```
 */
export function sequence<E, A>(eithers: Iterable<Either<E, A>>): Either<E, A[]> {
  return traverse(eithers, (e) => e);
}

/**
 * Run `f` over every item and split the outcomes by branch
 */
export function partition<A, E, B>(
  items: Iterable<A>,
  f: (a: A) => Either<E, B>,
): { lefts: E[]; rights: B[] } {
  const lefts: E[] = [];
  const rights: B[] = [];
  for (const a of items) {
    fold(
      f(a),
      (e) => lefts.push(e),
      (b) => rights.push(b),
    );
  }
  return { lefts, rights };
}
