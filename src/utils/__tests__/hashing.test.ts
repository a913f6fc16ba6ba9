import { describe, expect, it } from 'vitest';
import { computeContentHash, stableStringify } from '../hashing.js';

describe('stableStringify', () => {
  it('sorts object keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: [2, 'x'], c: true } })).toBe('{"a":{"c":true,"d":[2,"x"]},"b":1}');
  });

  it('serialises an object shared by siblings in full each time', () => {
    const shared = { id: 1 };
    expect(stableStringify([shared, shared])).toBe('[{"id":1},{"id":1}]');
    expect(stableStringify({ left: shared, right: { inner: shared } })).toBe(
      '{"left":{"id":1},"right":{"inner":{"id":1}}}',
    );
  });

  it('tags a real cycle without colliding with the same text as a string', () => {
    const node: Record<string, unknown> = { id: 1 };
    node['self'] = node;
    expect(stableStringify(node)).toBe('{"id":1,"self":<circular>}');
    expect(stableStringify({ id: 1, self: '<circular>' })).toBe('{"id":1,"self":"<circular>"}');
  });

  it.each([
    [null, 'null'],
    [undefined, 'undefined'],
    [Number.NaN, 'NaN'],
    [Number.POSITIVE_INFINITY, 'Infinity'],
    [Number.NEGATIVE_INFINITY, '-Infinity'],
    [12n, '12n'],
    ['12n', '"12n"'],
    [new Date(0), 'Date("1970-01-01T00:00:00.000Z")'],
    [new Map([['k', 1]]), 'Map[["k",1]]'],
    [new Set([1]), 'Set[1]'],
    [[1], '[1]'],
  ])('encodes %s distinctly', (value, encoded) => {
    expect(stableStringify(value)).toBe(encoded);
  });
});

describe('computeContentHash', () => {
  it('agrees for structurally equal values and differs otherwise', () => {
    const shared = { id: 1 };
    expect(computeContentHash([shared, shared])).toBe(computeContentHash([{ id: 1 }, { id: 1 }]));
    expect(computeContentHash([shared, shared])).not.toBe(computeContentHash([shared, '[Circular]']));
    expect(computeContentHash({ x: null })).not.toBe(computeContentHash({ x: Number.NaN }));
    expect(computeContentHash({ x: null })).not.toBe(computeContentHash({ x: undefined }));
    expect(computeContentHash('a')).toMatch(/^[0-9a-f]{64}$/);
  });
});
