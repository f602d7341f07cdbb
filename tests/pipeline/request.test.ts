import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseRunRequest, RequestValidationError } from '../../src/pipeline/request';

describe('parseRunRequest', () => {
  it('accepts a complete request', () => {
    const request = parseRunRequest({
      domain: ' example.co.uk ',
      keywords: ['running shoes'],
      competitors: ['rival.com'],
      market: 'UK',
      history: [
        { keyword: 'running shoes', position: 4, observedAt: '2026-03-01' },
        { keyword: 'running shoes', position: null, observedAt: '2026-03-02' },
        { keyword: 'running shoes', position: 'unranked' }
      ],
      keywordPriorities: { 'running shoes': 'high' },
      checkFrequency: 'weekly',
      include: ['rankings', 'metrics'],
      topN: 3,
      deadlineMs: 60000
    });

    expect(request).toEqual({
      domain: 'example.co.uk',
      keywords: ['running shoes'],
      competitors: ['rival.com'],
      market: 'uk',
      history: [
        { keyword: 'running shoes', position: 4, observedAt: '2026-03-01' },
        { keyword: 'running shoes', position: 'unranked', observedAt: '2026-03-02' },
        { keyword: 'running shoes', position: 'unranked', observedAt: '' }
      ],
      keywordPriorities: { 'running shoes': 'high' },
      checkFrequency: 'weekly',
      include: ['rankings', 'metrics'],
      topN: 3,
      deadlineMs: 60000
    });
  });

  it('lists every problem at once', () => {
    expect(() => parseRunRequest({})).toThrow(
      'Invalid run request: domain is required; keywords must list at least one keyword'
    );
  });

  it('rejects unknown options', () => {
    try {
      parseRunRequest({
        domain: 'example.co.uk',
        keywords: ['running shoes'],
        checkFrequency: 'hourly',
        include: ['rankings', 'serp_features'],
        topN: 0,
        history: [{ keyword: 'running shoes', position: 0 }],
        keywordPriorities: { 'running shoes': 'urgent' }
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RequestValidationError);
      expect(error instanceof RequestValidationError ? error.issues : []).toEqual([
        'checkFrequency must be daily, weekly or monthly',
        'include may only contain rankings, competitorRankings, metrics, competitorSummary, backlinks',
        'history[0].position must be a positive integer, "unranked" or null',
        'keywordPriorities["running shoes"] must be high, medium or low',
        'topN must be a positive number'
      ]);
    }
  });

  it('rejects a payload that is not an object', () => {
    expect(() => parseRunRequest(['running shoes'])).toThrow('Invalid run request: request must be a JSON object');
  });

  it('parses the bundled sample request', () => {
    const sample: unknown = JSON.parse(readFileSync(resolve(process.cwd(), 'configs', 'request.json'), 'utf-8'));
    const request = parseRunRequest(sample);

    expect(request.domain).toBe('example.co.uk');
    expect(request.keywords).toHaveLength(4);
    expect(request.checkFrequency).toBe('daily');
  });
});
