/**
 * Utilities for reading and parsing environment variables.
 *
 * @example
 * ```ts
 * import { parsePort, parseBoolean } from "@agentwire/utils";
 *
 * const port = parsePort(process.env.PORT, 9000);
 * const serialize = parseBoolean(process.env.AGENTWIRE_SERIALIZE_TOOL_CALLS, false);
 * ```
 *
 * @module
 */

/**
 * Parses a port string into a valid port number.
 *
 * @param port - The port string to parse (e.g., from environment variable)
 * @param defaultPort - The fallback port if parsing fails or port is invalid
 * @returns A valid port number between 1 and 65535, or the default port
 *
 * @example
 * ```ts
 * parsePort("3000", 8080)     // Returns 3000
 * parsePort("invalid", 8080)  // Returns 8080
 * parsePort(undefined, 8080)  // Returns 8080
 * ```
 */
export function parsePort(
  port: string | undefined,
  defaultPort: number,
): number {
  if (!port) return defaultPort;

  const parsedPort = parseInt(port, 10);
  if (isNaN(parsedPort)) return defaultPort;

  // Valid port numbers are between 1 and 65535
  if (parsedPort < 1 || parsedPort > 65535) return defaultPort;

  return parsedPort;
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/**
 * Parses a boolean flag. Unrecognized or missing values yield the default.
 */
export function parseBoolean(
  value: string | undefined,
  defaultValue: boolean,
): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return defaultValue;
}

/**
 * Splits a comma-separated list, dropping blank entries.
 *
 * @example
 * ```ts
 * parseList("http://a.test, http://b.test,") // ["http://a.test", "http://b.test"]
 * ```
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value.split(",").map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}
