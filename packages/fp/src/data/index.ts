/**
 * Data Types Index
 *
 * API layout:
 * - Types: `Option<A>`, `Either<E, A>`, `RecordTree`
 * - Operations: `OptionOps.map(...)`, `EitherOps.flatMap(...)`, `RecordOps.deepMerge(...)`
 * - Constructors: `Some(...)`, `None`, `Left(...)`, `Right(...)`
 */

// ============================================================================
// Option - optional values
// ============================================================================

export * as OptionOps from "./option.js";
export { Some, None, isSome, isNone } from "./option.js";
export type { Option } from "./option.js";

// ============================================================================
// Either - typed error handling
// ============================================================================

export * as EitherOps from "./either.js";
export { Left, Right, isLeft, isRight } from "./either.js";
export type { Either } from "./either.js";

// ============================================================================
// Record - combinators over string-keyed records
// ============================================================================

export * as RecordOps from "./record.js";
export { isRecord } from "./record.js";
export type { RecordTree } from "./record.js";
