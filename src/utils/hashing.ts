import { createHash } from 'node:crypto';

/**
 * Deterministic JSON-like serialisation: object keys are sorted so that two
 * structurally equal values always produce the same string, and two values
 * that differ never do.
 *
 * Values JSON has no literal for (`undefined`, `NaN`, `Infinity`, bigints,
 * dates, maps, sets, cycles) get bare tags that no quoted string can equal.
 */
export function stableStringify(value: unknown, ancestors = new WeakSet<object>()): string {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') return 'undefined';
  if (typeof value === 'bigint') return `${value.toString()}n`;
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (value instanceof Date) return `Date(${JSON.stringify(value.toISOString())})`;
  // Only the objects on the current path count as cycles; shared siblings do not.
  if (ancestors.has(value)) return '<circular>';
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item) => stableStringify(item, ancestors)).join(',')}]`;
    }
    if (value instanceof Map) {
      return `Map${stableStringify(Array.from(value.entries()), ancestors)}`;
    }
    if (value instanceof Set) {
      return `Set${stableStringify(Array.from(value.values()), ancestors)}`;
    }
    const keys = Object.keys(value).sort();
    const entries = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(Reflect.get(value, key), ancestors)}`);
    return `{${entries.join(',')}}`;
  } finally {
    ancestors.delete(value);
  }
}

export function computeContentHash(value: unknown): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex');
}
