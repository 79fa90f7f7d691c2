/** Reason codes for a configuration lookup that produced no value. */
export type ConfigErrorReason = "missing" | "parse_failed" | "secret_unreadable" | "file_invalid";

/**
 * Failure payload of every lookup in this package.
 *
 * Returned inside `Left`, never thrown. `key` names the environment variable,
 * or the module name for a config file that could not be loaded.
 */
export class ConfigError extends Error {
  constructor(
    readonly key: string,
    readonly reason: ConfigErrorReason,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}
