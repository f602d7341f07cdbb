import { describe, expect, it } from 'vitest';

import { buildCacheKey, fingerprintParams, globToRegExp, normalizeParams } from '../../src/cache/keys';

describe('cache keys', () => {
  it('normalizes strings, string lists and key order', () => {
    expect(
      normalizeParams({
        market: ' UK ',
        keywords: ['b', 'A', 'a'],
        nested: { z: 1, a: 'X  Y', skip: undefined },
        flag: false,
        limit: null
      })
    ).toEqual({
      flag: false,
      keywords: ['a', 'b'],
      limit: null,
      market: 'uk',
      nested: { a: 'x y', z: 1 }
    });
  });

  it('keeps mixed arrays in order', () => {
    expect(normalizeParams({ values: [3, 'B', 1] })).toEqual({ values: [3, 'b', 1] });
  });

  it('fingerprints to sixteen hex characters', () => {
    const fingerprint = fingerprintParams({ domain: 'example.co.uk' });

    expect(fingerprint).toMatch(/^[0-9a-f]{16}$/);
    expect(fingerprintParams({ domain: 'EXAMPLE.co.uk ' })).toBe(fingerprint);
    expect(fingerprintParams({ domain: 'example.com' })).not.toBe(fingerprint);
    expect(buildCacheKey('seo', 'v1', 'backlinks', { domain: 'example.co.uk' })).toBe(`seo:v1:backlinks:${fingerprint}`);
  });

  it('translates globs into anchored expressions', () => {
    const matcher = globToRegExp('seo:v1:rank?ngs:*');

    expect(matcher.test('seo:v1:rankings:0123')).toBe(true);
    expect(matcher.test('xseo:v1:rankings:0123')).toBe(false);
    expect(globToRegExp('a.b').test('axb')).toBe(false);
  });

  it('reads bracket classes the way SQLite GLOB and Redis MATCH do', () => {
    expect(globToRegExp('seo:v1:[bk]*').test('seo:v1:backlinks:01')).toBe(true);
    expect(globToRegExp('seo:v1:[bk]*').test('seo:v1:rankings:01')).toBe(false);
    expect(globToRegExp('seo:v1:[^r]*').test('seo:v1:rankings:01')).toBe(false);
    expect(globToRegExp('seo:v1:[a-c]*').test('seo:v1:competitor_summary:01')).toBe(true);
    expect(globToRegExp('[]]').test(']')).toBe(true);
    expect(globToRegExp('a[b').test('a[b')).toBe(true);
  });
});
