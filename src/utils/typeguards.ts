/**
 * Type guards and predicates for type safety
 */

/**
 * Type guard to check if a value is a plain object (not null, not an array)
 * 
 * @param value - The value to check
 * @returns True if the value is a plain object
 */
export function isValidObject(value: unknown): value is Record<string, unknown> {
  return value !== null && 
         value !== undefined && 
         typeof value === 'object' &&
         !Array.isArray(value);
}

/**
 * Type guard for Node.js system errors that carry an error code
 * 
 * @param value - The value to check
 * @returns True if the value is an Error with a string `code`
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && typeof value.code === 'string';
}
