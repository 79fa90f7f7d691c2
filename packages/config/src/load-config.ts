/**
 * Layered Configuration
 *
 * Builds one nested configuration record from (lowest to highest priority):
 *
 * 1. Programmatic defaults
 * 2. A config file found by cosmiconfig: `package.json` ("<moduleName>" key),
 *    `.<moduleName>rc`, `.<moduleName>rc.json`, `.<moduleName>rc.yaml`,
 *    `<moduleName>.config.js`, ...
 * 3. Environment variables carrying the prefix (`MYAPP_` for "myapp")
 *
 * Environment names are nested on double underscores and camel-cased on
 * single ones:
 *
 *   MYAPP_DB__HOST=db       → { db: { host: "db" } }
 *   MYAPP_LOG_LEVEL=debug   → { logLevel: "debug" }
 *   MYAPP_DB__PORT=5432     → { db: { port: 5432 } }
 *
 * @example
 * ```typescript
 * const config = loadConfig({
 *   moduleName: "myapp",
 *   defaults: { db: { host: "localhost", port: 5432 } },
 * });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { type Either, EitherOps, RecordOps, type RecordTree, isRecord, Left, Right } from "@nwa-stdlib/fp";
import { ConfigError } from "./errors.js";
import { isVerbose, trace } from "./log.js";
import { type Env, coerceEnvValue } from "./parsers.js";

// ============================================================================
// Types
// ============================================================================

export interface LoadConfigOptions {
  /** cosmiconfig module name; also the default environment prefix */
  moduleName: string;
  /** Lowest-priority values */
  defaults?: RecordTree;
  /** Prefix of environment overrides (default: upper-cased module name + "_") */
  envPrefix?: string;
  /** Environment to read from (default `process.env`) */
  env?: Env;
  /** Directory to search for a config file (default `process.cwd()`) */
  searchFrom?: string;
  verbose?: boolean;
}

// ============================================================================
// Layers
// ============================================================================

// The sync explorer has no loader for .mjs or .ts files
function searchPlaces(moduleName: string): string[] {
  return [
    "package.json",
    `.${moduleName}rc`,
    `.${moduleName}rc.json`,
    `.${moduleName}rc.yaml`,
    `.${moduleName}rc.yml`,
    `.${moduleName}rc.js`,
    `.${moduleName}rc.cjs`,
    `${moduleName}.config.js`,
    `${moduleName}.config.cjs`,
  ];
}

/**
 * Load the first config file cosmiconfig finds. No file is an empty layer.
 */
function loadFileLayer(
  moduleName: string,
  searchFrom: string,
  verbose: boolean,
): Either<ConfigError, RecordTree> {
  const found = EitherOps.tryCatch(
    () => cosmiconfigSync(moduleName, { searchPlaces: searchPlaces(moduleName) }).search(searchFrom),
    (cause) =>
      new ConfigError(moduleName, "file_invalid", `Could not load the ${moduleName} config file`, {
        cause,
      }),
  );

  return EitherOps.flatMap(found, (result): Either<ConfigError, RecordTree> => {
    if (result === null || result.isEmpty === true) {
      trace(verbose, `no config file found for ${moduleName}`);
      return Right({});
    }
    const config: unknown = result.config;
    if (!isRecord(config)) {
      return Left(
        new ConfigError(moduleName, "file_invalid", `${result.filepath} must contain an object`),
      );
    }
    trace(verbose, `loaded ${result.filepath}`);
    return Right(config);
  });
}

function toConfigPath(name: string): string {
  return name
    .toLowerCase()
    .split("__")
    .map((segment) => segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()))
    .join("__");
}

/**
 * Collect prefixed environment variables into a nested record
 */
export function loadEnvLayer(env: Env, prefix: string): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(prefix) || value === undefined || name.length === prefix.length) continue;
    flat[toConfigPath(name.slice(prefix.length))] = coerceEnvValue(value);
  }
  return RecordOps.unflatten(flat, "__");
}

export function defaultEnvPrefix(moduleName: string): string {
  return `${moduleName.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_`;
}

// ============================================================================
// loadConfig
// ============================================================================

/**
 * Merge defaults, the config file and environment overrides.
 *
 * A config file that cannot be parsed, or does not hold an object, gives
 * `Left(ConfigError("file_invalid"))`.
 */
export function loadConfig(options: LoadConfigOptions): Either<ConfigError, Record<string, unknown>> {
  const env = options.env ?? process.env;
  const verbose = isVerbose(env, options.verbose);
  const prefix = options.envPrefix ?? defaultEnvPrefix(options.moduleName);

  return EitherOps.map(
    loadFileLayer(options.moduleName, options.searchFrom ?? process.cwd(), verbose),
    (fileConfig) => {
      const envConfig = loadEnvLayer(env, prefix);
      trace(verbose, `${Object.keys(envConfig).length} top-level override(s) from ${prefix}*`);
      return RecordOps.deepMerge(RecordOps.deepMerge(options.defaults ?? {}, fileConfig), envConfig);
    },
  );
}
