/**
 * JSON Utilities
 */

/**
 * Parse a JSON string, returning `fallback` instead of throwing.
 *
 * The result is `unknown`: validate it (e.g. with a Zod schema) before use.
 *
 * @example
 * ```ts
 * const parsed = ErrorBodySchema.safeParse(safeJsonParse(body));
 * ```
 */
export function safeJsonParse(
  json: string | null | undefined,
  fallback: unknown = undefined,
  onError?: (error: Error, rawValue: string) => void
): unknown {
  if (json === null || json === undefined) {
    return fallback;
  }

  try {
    const value: unknown = JSON.parse(json);
    return value;
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }
}
