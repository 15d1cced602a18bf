/**
 * Canonical JSON serialization.
 *
 * Guarantees:
 *   1. Keys sorted lexicographically at every nesting level.
 *   2. No `undefined` values (omitted, never serialized as null).
 *   3. Dates serialized as ISO 8601 UTC strings.
 *   4. Arrays preserve element order.
 *   5. Identical logical input → byte-identical output.
 *
 * Evidence hashes and export files both go through here, so any change to
 * this module invalidates every stored entryHash.
 */

export function canonicalJson(value: unknown): string {
  return JSON.stringify(toSortedValue(value));
}

/** Key-sorted, two-space indented JSON for human-facing export files. */
export function prettyCanonicalJson(value: unknown): string {
  return JSON.stringify(toSortedValue(value), null, 2);
}

function toSortedValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map(toSortedValue);
  }

  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0,
    )) {
      if (v !== undefined) {
        sorted[key] = toSortedValue(v);
      }
    }
    return sorted;
  }

  if (typeof value === "bigint") {
    throw new TypeError("canonicalJson: bigint values are not serializable");
  }

  return value;
}
