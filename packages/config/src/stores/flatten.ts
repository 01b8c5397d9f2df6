export const KEY_DELIMITER = ":";

export function normalizeKey(key: string): string {
  return key.toLowerCase();
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

/**
 * Flattens a nested object into `:`-joined keys. Arrays of scalars become a
 * comma-separated value; `null` and `undefined` leaves are dropped.
 */
export function flattenObject(
  value: object,
  prefix = "",
  into = new Map<string, string>(),
): Map<string, string> {
  const entries: [string, unknown][] = Object.entries(value);
  for (const [key, child] of entries) {
    const path = prefix ? `${prefix}${KEY_DELIMITER}${key}` : key;
    if (isScalar(child)) {
      into.set(normalizeKey(path), String(child));
    } else if (Array.isArray(child)) {
      const scalars = child.filter(isScalar);
      into.set(normalizeKey(path), scalars.map(String).join(","));
    } else if (typeof child === "object" && child !== null) {
      flattenObject(child, path, into);
    }
  }
  return into;
}
