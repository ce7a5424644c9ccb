/**
 * This is a generic type guard for checking if an object has a property.
 *
 * @param obj The object to check
 * @param key The property to check for
 * @returns True if the object has the property, false otherwise
 */
export function hasProperty<T extends object, K extends PropertyKey>(
  obj: T,
  key: K
): obj is T & Record<K, unknown> {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Type guard for errors raised by Node's fs and friends, which carry
 * `code` (e.g. 'ENOENT', 'EEXIST') and usually `syscall`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && hasProperty(error, 'code') && typeof error.code === 'string';
}

/** Message of an Error, or the value itself as a string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
