/**
 * @nwa-stdlib/fp: a small functional core
 *
 * - `Option` and `Either` containers with map/flatMap/fold
 * - `sequence`/`traverse` with short-circuiting on the first failure
 * - Functor/Monad typeclasses over a type-level HKT encoding
 * - Generator-driven do-blocks, generic over any Monad instance
 * - Record combinators (key filtering, validated lookup, deep merge, unflatten)
 *
 * @example
 * ```typescript
 * import { doEither, Left, Right, EitherOps } from "@nwa-stdlib/fp";
 *
 * const parsePort = (raw: string) =>
 *   Number.isInteger(Number(raw)) ? Right(Number(raw)) : Left(`not a port: ${raw}`);
 *
 * const endpoint = doEither<string>()(function* ($, host: string, port: string) {
 *   const p = yield* $(parsePort(port));
 *   return yield* $.ret(`${host}:${p}`);
 * });
 *
 * endpoint("localhost", "8080"); // Right("localhost:8080")
 * EitherOps.sequence([Right(1), Left("x")]); // Left("x")
 * ```
 */

// ============================================================================
// HKT Foundation
// ============================================================================

export type { $, TypeFunction, OptionF, EitherF } from "./hkt.js";

// ============================================================================
// Typeclasses
// ============================================================================

export * as TC from "./typeclasses/index.js";
export type { Functor, FlatMap, Monad } from "./typeclasses/index.js";
export { optionFunctor, optionMonad, eitherFunctor, eitherMonad } from "./instances.js";

// ============================================================================
// Data Types
// ============================================================================

export {
  OptionOps,
  Some,
  None,
  isSome,
  isNone,
  EitherOps,
  Left,
  Right,
  isLeft,
  isRight,
  RecordOps,
  isRecord,
} from "./data/index.js";
export type { Option, Either, RecordTree } from "./data/index.js";

// ============================================================================
// Syntax
// ============================================================================

export { doBlock, doOption, doEither, DoBlockError } from "./syntax/do.js";
export type {
  BindStep,
  ReturnStep,
  Step,
  Program,
  DoContext,
  DoBlockErrorReason,
} from "./syntax/do.js";
