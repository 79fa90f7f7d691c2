/**
 * Typeclasses
 *
 * Each typeclass module is exported as a namespace to avoid name collisions,
 * with the type interfaces also exported directly for convenience.
 */

export * as FunctorOps from "./functor.js";
export type { Functor } from "./functor.js";

export * as MonadOps from "./monad.js";
export type { FlatMap, Monad } from "./monad.js";
