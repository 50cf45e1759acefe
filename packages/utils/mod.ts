/**
 * Common utilities shared across agentwire packages.
 *
 * Provides helpers for async handoff, environment variables, frame merging,
 * and error handling.
 *
 * @example
 * ```ts
 * import { Channel, parsePort, createAbortError } from "@agentwire/utils";
 * ```
 *
 * @module
 */

// Error utilities
export {
  createAbortError,
  errorCode,
  formatError,
  isAbortError,
} from "./error.ts";

// Async utilities
export { Channel, Completer, nextTurn } from "./async.ts";

// Environment utilities
export { parseBoolean, parseList, parsePort } from "./env.ts";

// Merge utilities
export { deepMerge, isRecord } from "./merge.ts";
export type { MergeOptions } from "./merge.ts";
