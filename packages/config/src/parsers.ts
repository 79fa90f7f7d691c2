/**
 * Parsers for raw configuration strings.
 *
 * Each parser throws on malformed input; `getConfig` turns the throw into
 * `Left(ConfigError("parse_failed"))`.
 */

/** A process-environment-like mapping. */
export type Env = Readonly<Record<string, string | undefined>>;

export function integer(raw: string): number {
  const trimmed = raw.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    throw new TypeError(`Not an integer: "${raw}"`);
  }
  return Number(trimmed);
}

export function boolean(raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new TypeError(`Not a boolean: "${raw}"`);
  }
}

export function json(raw: string): unknown {
  return JSON.parse(raw);
}

/**
 * Split a delimited value into its trimmed, non-empty parts
 */
export function list(separator = ","): (raw: string) => string[] {
  return (raw) =>
    raw
      .split(separator)
      .map((part) => part.trim())
      .filter((part) => part !== "");
}

/**
 * Best-effort typing of an environment override.
 *
 *   "true" / "false" → boolean
 *   "8080"           → 8080
 *   anything else    → the string itself
 *
 * Integers are only converted when the number prints back as `raw`, so
 * "01234" and integers beyond 2^53 stay strings.
 */
export function coerceEnvValue(raw: string): string | number | boolean {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (/^-?\d+$/.test(raw)) {
    const n = Number(raw);
    if (Number.isSafeInteger(n) && String(n) === raw) return n;
  }
  return raw;
}
