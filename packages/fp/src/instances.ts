/**
 * Typeclass instances for the built-in data types.
 *
 * The do-block interpreter and the derived operations in `typeclasses/`
 * take one of these dictionaries as their first argument.
 */

import type { EitherF, OptionF } from "./hkt.js";
import { type Functor, makeFunctor } from "./typeclasses/functor.js";
import type { Monad } from "./typeclasses/monad.js";
import * as O from "./data/option.js";
import * as E from "./data/either.js";

// ============================================================================
// Option Instances
// ============================================================================

/**
 * Functor instance for Option
 */
export const optionFunctor: Functor<OptionF> = makeFunctor<OptionF>(
  <A, B>(fa: O.Option<A>, f: (a: A) => B): O.Option<B> => O.map(fa, f),
);

/**
 * Monad instance for Option
 */
export const optionMonad: Monad<OptionF> = {
  ...optionFunctor,
  pure: <A>(a: A): O.Option<A> => O.Some(a),
  flatMap: <A, B>(fa: O.Option<A>, f: (a: A) => O.Option<B>): O.Option<B> => O.flatMap(fa, f),
};

// ============================================================================
// Either Instances
// ============================================================================

/**
 * Functor instance for Either with a fixed Left type
 */
export const eitherFunctor = <L>(): Functor<EitherF<L>> =>
  makeFunctor<EitherF<L>>(
    <A, B>(fa: E.Either<L, A>, f: (a: A) => B): E.Either<L, B> => E.map(fa, f),
  );

/**
 * Monad instance for Either with a fixed Left type
 */
export const eitherMonad = <L>(): Monad<EitherF<L>> => ({
  ...eitherFunctor<L>(),
  pure: <A>(a: A): E.Either<L, A> => E.Right(a),
  flatMap: <A, B>(fa: E.Either<L, A>, f: (a: A) => E.Either<L, B>): E.Either<L, B> =>
    E.flatMap(fa, f),
});
