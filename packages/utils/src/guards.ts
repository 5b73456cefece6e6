/**
 * Type Guards
 */

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown throw value to an errno-style error
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}

/**
 * Message of an unknown throw value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
