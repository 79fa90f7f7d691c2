/**
 * Higher-Kinded Types for @nwa-stdlib/fp
 *
 * TypeScript has no native higher-kinded types, so a type constructor is
 * modelled as a *type-level function*: an interface whose `_` member is
 * computed from `this["__kind__"]`. Applying it to an argument means
 * intersecting it with `{ __kind__: A }` and reading `_` back out.
 *
 * ```typescript
 * interface OptionF extends TypeFunction {
 *   readonly _: Option<this["__kind__"]>;
 * }
 *
 * type MaybeNumber = $<OptionF, number>; // → Option<number>
 * ```
 *
 * ## Multi-arity type constructors
 *
 * For types with multiple parameters (`Either<E, A>`) all but the rightmost
 * parameter are fixed:
 *
 * ```typescript
 * type StringResult<A> = $<EitherF<string>, A>; // → Either<string, A>
 * ```
 *
 * The encoding exists only at the type level and is erased at runtime.
 */

import type { Option } from "./data/option.js";
import type { Either } from "./data/either.js";

export type { Option, Either };

// ============================================================================
// Core Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply a type-level function to an argument and resolve the concrete type.
 */
export type $<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

// ============================================================================
// Type-Level Functions for @nwa-stdlib/fp Data Types
// ============================================================================

/**
 * Type-level function for `Option<A>`.
 *
 * @example
 * ```typescript
 * type MaybeNumber = $<OptionF, number>; // → Option<number>
 * ```
 */
export interface OptionF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Option<this["__kind__"]>;
}

/**
 * Type-level function for `Either<E, A>` with E fixed.
 *
 * @example
 * ```typescript
 * type StringResult<A> = $<EitherF<string>, A>; // → Either<string, A>
 * ```
 */
export interface EitherF<E> extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Either<E, this["__kind__"]>;
}
