/**
 * FlatMap and Monad Typeclasses
 *
 * FlatMap adds flatMap (bind) to Functor - sequencing dependent computations.
 * Monad combines FlatMap with pure.
 *
 * Laws:
 *   - Left identity: pure(a).flatMap(f) === f(a)
 *   - Right identity: m.flatMap(pure) === m
 *   - Associativity: m.flatMap(f).flatMap(g) === m.flatMap(a => f(a).flatMap(g))
 */

import type { Functor } from "./functor.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// FlatMap
// ============================================================================

/**
 * FlatMap typeclass - adds flatMap to Functor
 */
export interface FlatMap<F extends TypeFunction> extends Functor<F> {
  readonly flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>;
}

// ============================================================================
// Monad
// ============================================================================

/**
 * Monad typeclass - combines FlatMap with pure
 */
export interface Monad<F extends TypeFunction> extends FlatMap<F> {
  readonly pure: <A>(a: A) => $<F, A>;
}

// ============================================================================
// Derived Operations from FlatMap
// ============================================================================

/**
 * Flatten a nested structure
 */
export function flatten<F extends TypeFunction>(F: FlatMap<F>): <A>(ffa: $<F, $<F, A>>) => $<F, A> {
  return <A>(ffa: $<F, $<F, A>>): $<F, A> => F.flatMap<$<F, A>, A>(ffa, (x) => x);
}

/**
 * Run a dependent effect and keep the original value
 */
export function flatTap<F extends TypeFunction>(
  F: FlatMap<F>,
): <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, A> {
  return <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>): $<F, A> =>
    F.flatMap<A, A>(fa, (a) => F.map<B, A>(f(a), () => a));
}

/**
 * Kleisli composition (>=>) - compose two monadic functions
 */
export function andThen<F extends TypeFunction>(
  F: FlatMap<F>,
): <A, B, C>(f: (a: A) => $<F, B>, g: (b: B) => $<F, C>) => (a: A) => $<F, C> {
  return <A, B, C>(f: (a: A) => $<F, B>, g: (b: B) => $<F, C>) =>
    (a: A): $<F, C> =>
      F.flatMap<B, C>(f(a), g);
}

// ============================================================================
// Instance Creator
// ============================================================================

/**
 * Create a Monad instance
 */
export function makeMonad<F extends TypeFunction>(
  flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>,
  pure: <A>(a: A) => $<F, A>,
): Monad<F> {
  return {
    flatMap,
    pure,
    map: <A, B>(fa: $<F, A>, f: (a: A) => B): $<F, B> => flatMap<A, B>(fa, (a) => pure<B>(f(a))),
  };
}
