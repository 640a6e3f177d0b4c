export type FlatValue = string | number | boolean | null;
export type FlatRecord = Record<string, FlatValue>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Nested objects become dot-joined keys; arrays and anything else non-scalar become JSON text. */
export function flattenRecord(record: Record<string, unknown>, prefix = ''): FlatRecord {
  const flat: FlatRecord = {};

  for (const [key, value] of Object.entries(record)) {
    const path = `${prefix}${key}`;

    if (isPlainObject(value)) {
      Object.assign(flat, flattenRecord(value, `${path}.`));
    } else if (value === null || value === undefined) {
      flat[path] = null;
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[path] = value;
    } else if (value instanceof Date) {
      flat[path] = value.toISOString();
    } else {
      flat[path] = JSON.stringify(value);
    }
  }

  return flat;
}

/** Union of keys in first-seen order. */
export function collectColumns(records: readonly FlatRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      columns.add(key);
    }
  }
  return Array.from(columns);
}
