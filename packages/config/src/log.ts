import type { Env } from "./parsers.js";

/** Environment variable that turns on lookup tracing. */
export const VERBOSE_ENV = "NWA_CONFIG_VERBOSE";

export function isVerbose(env: Env, verbose?: boolean): boolean {
  return verbose ?? env[VERBOSE_ENV] === "1";
}

/**
 * Print a trace line when `enabled`. Values are never logged, only where
 * they came from.
 */
export function trace(enabled: boolean, message: string): void {
  if (enabled) {
    console.log(`[config] ${message}`);
  }
}
