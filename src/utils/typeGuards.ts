/**
 * Type guard utilities for safe type narrowing
 * Used wherever JSON files or storage client responses are read
 */

/**
 * Safe BigInt to number conversion
 * Handles BigInt, number and numeric string inputs
 *
 * @param fallback - Returned when the value is not numeric (default: 0)
 */
export function bigIntToNumber(value: unknown, fallback: number = 0): number {
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? fallback : parsed;
  }
  return fallback;
}

/**
 * Type guard for numeric values (including BigInt)
 */
export function isNumeric(value: unknown): value is number | bigint {
  return typeof value === "number" || typeof value === "bigint";
}

/**
 * Type guard for string values
 *
 * @returns True if value is a non-empty string
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

/**
 * Type guard for arrays of strings
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Type guard for objects
 *
 * @returns True if value is a non-null, non-array object
 */
export function isObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Safe property access with type guard
 * Checks if an object has a property and the property value matches the type guard
 */
export function hasPropertyOfType<K extends string, T>(
  obj: unknown,
  key: K,
  typeGuard: (value: unknown) => value is T,
): obj is Record<string, unknown> & Record<K, T> {
  return isObject(obj) && key in obj && typeGuard(obj[key]);
}

/**
 * Node.js system error carrying an errno code (ENOENT, EEXIST, ...)
 */
export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && hasPropertyOfType(error, "code", isNonEmptyString);
}
