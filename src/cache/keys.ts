import { createHash } from 'node:crypto';

import { normalizeWhitespace } from '../utils/text';
import type { CacheParamValue, CacheParams } from './types';

type NormalizedValue = string | number | boolean | null | NormalizedValue[] | { [key: string]: NormalizedValue };

function normalizeValue(value: CacheParamValue): NormalizedValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return normalizeWhitespace(value).toLowerCase();
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    const items = value
      .map(normalizeValue)
      .filter((item): item is NormalizedValue => item !== undefined);
    if (items.every((item): item is string => typeof item === 'string')) {
      return Array.from(new Set(items)).sort();
    }
    return items;
  }
  return normalizeObject(value);
}

function normalizeObject(value: { [key: string]: CacheParamValue }): { [key: string]: NormalizedValue } {
  const normalized: { [key: string]: NormalizedValue } = {};
  for (const key of Object.keys(value).sort()) {
    const entry = normalizeValue(value[key]);
    if (entry !== undefined) {
      normalized[key] = entry;
    }
  }
  return normalized;
}

export function normalizeParams(params: CacheParams): { [key: string]: NormalizedValue } {
  return normalizeObject(params);
}

export function fingerprintParams(params: CacheParams): string {
  const canonical = JSON.stringify(normalizeParams(params));
  return createHash('sha1').update(canonical).digest('hex').slice(0, 16);
}

export function buildCacheKey(prefix: string, version: string, queryType: string, params: CacheParams): string {
  return `${prefix}:${version}:${queryType}:${fingerprintParams(params)}`;
}

export function namespaceOf(prefix: string, version: string): string {
  return `${prefix}:${version}:`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// SQLite GLOB / Redis MATCH syntax. An unclosed `[` is literal.
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let index = 0;
  while (index < pattern.length) {
    const char = pattern.charAt(index);
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const negated = pattern.charAt(index + 1) === '^';
      const bodyStart = negated ? index + 2 : index + 1;
      // A `]` right after the opening bracket belongs to the class.
      const close = pattern.indexOf(']', bodyStart + 1);
      if (close === -1) {
        source += '\\[';
      } else {
        const body = pattern
          .slice(bodyStart, close)
          .replace(/[\\\]^[]/g, '\\$&');
        source += `[${negated ? '^' : ''}${body}]`;
        index = close;
      }
    } else {
      source += escapeRegExp(char);
    }
    index += 1;
  }
  return new RegExp(`^${source}$`);
}
