/**
 * `Array.isArray` as a type guard. Element types are not checked.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * True for object literals and `Object.create(null)` dictionaries.
 *
 * Arrays, dates, buffers and class instances are not plain; row values of
 * those kinds have their own JSON mapping in `serializeJsonValue`.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<PropertyKey, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Non-null object, safe to read properties from.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks whether a value is a non-blank string.
 */
export function isNonBlankString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Checks whether a value can serve as a write chunk bound.
 *
 * A bound below 2 could not hold a surrogate pair, which must never be split
 * across writes.
 */
export function isValidChunkSize(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 2;
}
