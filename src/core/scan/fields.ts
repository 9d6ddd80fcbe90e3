/**
 * Read an own property of a value reported by a collector
 *
 * Returns undefined for anything that is not an object carrying the key.
 */
export function ownField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  if (!Object.prototype.hasOwnProperty.call(value, key)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Own keys of a map-like value, or none
 */
export function ownKeys(value: unknown): string[] {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return [];
  }
  return Object.keys(value);
}
