/**
 * Recursively freeze a configuration object so instances built from it can
 * share it without copying.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
    Object.freeze(value);
  }
  return value;
}
