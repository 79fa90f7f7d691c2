/**
 * Single-value configuration lookup.
 *
 * A value is resolved from, in priority order:
 *
 * 1. The environment variable named `key`
 * 2. The secret file `<secretBaseLocation>/<secret>` (Docker/Kubernetes style)
 * 3. The `default` option
 *
 * @example
 * ```typescript
 * import { getConfig, parsers } from "@nwa-stdlib/config";
 *
 * const port = getConfig("PORT", { parse: parsers.integer, default: 8080 });
 * const dbPassword = getConfig("DB_PASSWORD", { secret: "db_password" });
 * ```
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  type Either,
  type Option,
  EitherOps,
  OptionOps,
  RecordOps,
  Left,
  Right,
  Some,
  None,
  isSome,
} from "@nwa-stdlib/fp";
import { ConfigError } from "./errors.js";
import { isVerbose, trace } from "./log.js";
import type { Env } from "./parsers.js";

/** Where container runtimes mount secrets by default. */
export const DEFAULT_SECRET_BASE_LOCATION = "/run/secrets";

// ============================================================================
// Options
// ============================================================================

export interface SourceOptions {
  /** File name of a secret to read when the environment has no value */
  secret?: string;
  /** Directory holding secret files (default `/run/secrets`) */
  secretBaseLocation?: string;
  /** Environment to read from (default `process.env`) */
  env?: Env;
  /** Trace where the value came from (default: `NWA_CONFIG_VERBOSE=1`) */
  verbose?: boolean;
}

export interface ParsedOptions<T> extends SourceOptions {
  /** Applied to environment and secret values; a throw becomes `parse_failed` */
  parse: (raw: string) => T;
  /** Used as is when no source has a value */
  default?: T;
}

export interface DefaultedOptions<D> extends SourceOptions {
  default: D;
}

// ============================================================================
// getConfig
// ============================================================================

/**
 * Look up a configuration value.
 *
 * Returns `Left(ConfigError)` with reason `missing` when no source has a value
 * and no default is given.
 */
export function getConfig<T>(key: string, options: ParsedOptions<T>): Either<ConfigError, T>;
export function getConfig<D>(key: string, options: DefaultedOptions<D>): Either<ConfigError, string | D>;
export function getConfig(key: string, options?: SourceOptions): Either<ConfigError, string>;
export function getConfig<T>(
  key: string,
  options: SourceOptions & { parse?: (raw: string) => T; default?: T } = {},
): Either<ConfigError, T | string> {
  const env = options.env ?? process.env;
  const verbose = isVerbose(env, options.verbose);
  const decode = (raw: string): Either<ConfigError, T | string> =>
    options.parse === undefined ? Right(raw) : parseWith(key, raw, options.parse);

  const fromEnv = RecordOps.lookup(key, env);
  if (isSome(fromEnv)) {
    trace(verbose, `${key}: using environment variable`);
    return decode(fromEnv.value);
  }

  const baseLocation = options.secretBaseLocation ?? DEFAULT_SECRET_BASE_LOCATION;
  const fromSecret =
    options.secret === undefined
      ? Right<ConfigError, Option<string>>(None)
      : readSecret(key, path.join(baseLocation, options.secret));

  return EitherOps.flatMap(fromSecret, (secret) =>
    OptionOps.fold<string, Either<ConfigError, T | string>>(
      secret,
      () => {
        if (options.default !== undefined) {
          trace(verbose, `${key}: using default value`);
          return Right(options.default);
        }
        return Left(new ConfigError(key, "missing", `No value configured for ${key}`));
      },
      (raw) => {
        trace(verbose, `${key}: using secret ${options.secret ?? ""}`);
        return decode(raw);
      },
    ),
  );
}

function parseWith<T>(key: string, raw: string, parse: (raw: string) => T): Either<ConfigError, T> {
  return EitherOps.tryCatch(
    () => parse(raw),
    (cause) => new ConfigError(key, "parse_failed", `Could not parse the value of ${key}`, { cause }),
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read a secret file without its trailing newline. A missing file is None.
 */
function readSecret(key: string, file: string): Either<ConfigError, Option<string>> {
  try {
    return Right(Some(fs.readFileSync(file, "utf8").replace(/\r?\n$/, "")));
  } catch (error) {
    if (isNotFound(error)) {
      return Right(None);
    }
    return Left(
      new ConfigError(key, "secret_unreadable", `Could not read secret file ${file}`, {
        cause: error,
      }),
    );
  }
}

// ============================================================================
// getConfigs
// ============================================================================

/**
 * Look up several required environment variables at once.
 *
 * @example
 * ```typescript
 * getConfigs(["DB_HOST", "DB_NAME"], { DB_HOST: "db", DB_NAME: "app" });
 * // Right({ DB_HOST: "db", DB_NAME: "app" })
 * getConfigs(["DB_HOST", "DB_USER"], { DB_HOST: "db" });
 * // Left(ConfigError { key: "DB_USER", reason: "missing" })
 * ```
 */
export function getConfigs(
  keys: Iterable<string>,
  env: Env = process.env,
): Either<ConfigError, Record<string, string>> {
  return EitherOps.mapLeft(
    RecordOps.getByKeys(keys, env),
    (key) => new ConfigError(key, "missing", `No value configured for ${key}`),
  );
}
