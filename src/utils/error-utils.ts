/**
 * Helpers for turning unknown thrown values into messages and contextual errors.
 */

/**
 * Extracts a string message from any error value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Prefix an error with context. An `Error` is kept as the new error's `cause`.
 *
 * @example
 * ```typescript
 * throw wrapError(err, `Failed to write ${outputPath}`);
 * ```
 */
export function wrapError(error: unknown, context: string): Error {
  const message = `${context}: ${getErrorMessage(error)}`;
  return error instanceof Error ? new Error(message, { cause: error }) : new Error(message);
}
