/**
 * @nwa-stdlib/config: configuration lookup at the edge of the functional core
 *
 * Every lookup returns `Either<ConfigError, T>`, so callers combine results
 * with the `EitherOps` helpers or a `doEither` block instead of try/catch.
 *
 * @example
 * ```typescript
 * import { doEither } from "@nwa-stdlib/fp";
 * import { type ConfigError, getConfig, parsers } from "@nwa-stdlib/config";
 *
 * const database = doEither<ConfigError>()(function* ($) {
 *   const host = yield* $(getConfig("DB_HOST", { default: "localhost" }));
 *   const port = yield* $(getConfig("DB_PORT", { parse: parsers.integer, default: 5432 }));
 *   const password = yield* $(getConfig("DB_PASSWORD", { secret: "db_password" }));
 *   return yield* $.ret({ host, port, password });
 * });
 * ```
 */

export { ConfigError } from "./errors.js";
export type { ConfigErrorReason } from "./errors.js";

export {
  getConfig,
  getConfigs,
  DEFAULT_SECRET_BASE_LOCATION,
} from "./get-config.js";
export type { SourceOptions, ParsedOptions, DefaultedOptions } from "./get-config.js";

export { loadConfig, loadEnvLayer, defaultEnvPrefix } from "./load-config.js";
export type { LoadConfigOptions } from "./load-config.js";

export * as parsers from "./parsers.js";
export type { Env } from "./parsers.js";

export { VERBOSE_ENV } from "./log.js";
