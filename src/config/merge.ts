export type Table = Record<string, unknown>;

/**
 * A nested key/value table as produced by the TOML parser
 * (dates and arrays are values, not tables)
 */
export function isTable(value: unknown): value is Table {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Merge `override` over `base` without mutating either.
 * Keys present in both as tables merge recursively; anything else is replaced.
 */
export function mergeTables(base: Table, override: Table): Table {
  const merged: Table = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    if (isTable(current) && isTable(value)) {
      merged[key] = mergeTables(current, value);
    } else {
      merged[key] = value;
    }
  }

  return merged;
}
