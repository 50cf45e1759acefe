/**
 * Utilities for creating, detecting, and formatting errors.
 *
 * @example
 * ```ts
 * import { createAbortError, isAbortError, formatError } from "@agentwire/utils";
 *
 * throw createAbortError("Client disconnected");
 * ```
 *
 * @module
 */

/**
 * Create a standard AbortError using DOMException.
 */
export function createAbortError(
  message = "The operation was aborted",
): DOMException {
  return new DOMException(message, "AbortError");
}

/**
 * Check if an error is an abort error.
 */
export function isAbortError(error: unknown): boolean {
  return (
    (error instanceof DOMException && error.name === "AbortError") ||
    (error instanceof Error && error.name === "AbortError")
  );
}

/**
 * Formats an error into a consistent string message.
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Machine-readable code for a thrown value: the error's `name`
 * (`"TypeError"`, `"RangeError"`, a custom class name), or `"Error"` for
 * values that are not errors.
 */
export function errorCode(error: unknown): string {
  return error instanceof Error ? error.name : "Error";
}
