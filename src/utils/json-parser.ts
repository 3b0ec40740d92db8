/**
 * JSON helpers shared by the catalog, report and translations readers
 */

/**
 * Check that a parsed JSON value is a plain object (not null, not an array)
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON, returning null instead of throwing on malformed input
 */
export function parseJsonSafe(content: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(content);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Set `key` as an own enumerable property, including "__proto__",
 * which plain assignment would treat as the object's prototype.
 */
export function setOwnProperty<T>(
  target: { [key: string]: T },
  key: string,
  value: NoInfer<T>
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
