import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { ExporterConfig } from '../../src/config';
import { buildRankingsCsv, ReportExporter } from '../../src/export/report-exporter';
import type { RankingRecord } from '../../src/provider/types';
import { assemble } from '../../src/report/aggregator';
import type { EnrichedReport } from '../../src/report/types';
import { createTestLogger } from '../helpers/context';

const records: RankingRecord[] = [
  {
    keyword: 'running shoes',
    domain: 'example.co.uk',
    position: 3,
    searchVolume: 1000,
    costPerClick: 1.5,
    difficulty: 40,
    url: 'https://example.co.uk/running',
    title: 'Running shoes, mens',
    observedAt: '2026-03-08T06:00:00.000Z'
  },
  {
    keyword: 'sandals',
    domain: 'example.co.uk',
    position: 'unranked',
    searchVolume: null,
    costPerClick: null,
    difficulty: null,
    url: null,
    title: null,
    observedAt: '2026-03-08T06:00:00.000Z'
  }
];

function buildReport(): EnrichedReport {
  return assemble({
    domain: 'example.co.uk',
    market: 'uk',
    keywords: { selected: ['running shoes', 'sandals'], skipped: [], fellBack: false },
    rankings: { status: 'ok', data: { records, failures: [] } },
    anomalies: [
      {
        keyword: 'running shoes',
        currentPosition: 3,
        expectedPosition: 21.3,
        zScore: -17.75,
        deviation: -18.3,
        severity: 'high',
        changeType: 'improvement',
        previousPosition: 22,
        change: 19
      }
    ],
    generatedAt: '2026-03-08T06:00:00.000Z'
  });
}

describe('ReportExporter', () => {
  let outputDir = '';
  const config: ExporterConfig = { enabled: true, output_basename: 'ranking_report', write_csv: true };

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), 'rank-sentinel-'));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it('writes the report JSON and a rankings CSV', () => {
    const exporter = new ReportExporter({ logger: createTestLogger(), config, outputDir });
    const report = buildReport();

    const result = exporter.export(report);

    expect(result).toEqual({
      jsonPath: join(outputDir, 'ranking_report_2026-03-08.json'),
      csvPath: join(outputDir, 'ranking_report_2026-03-08.csv')
    });
    expect(JSON.parse(readFileSync(join(outputDir, 'ranking_report_2026-03-08.json'), 'utf-8'))).toEqual(report);
    expect(readFileSync(join(outputDir, 'ranking_report_2026-03-08.csv'), 'utf-8').split('\n')).toEqual([
      'keyword,domain,position,in_top10,search_volume,cpc,difficulty,url,title,anomaly_severity,z_score',
      'running shoes,example.co.uk,3,yes,1000,1.50,40,https://example.co.uk/running,"Running shoes, mens",high,-17.75',
      'sandals,example.co.uk,unranked,no,,,,,,,',
      ''
    ]);
  });

  it('skips the CSV when disabled in settings', () => {
    const exporter = new ReportExporter({ logger: createTestLogger(), config: { ...config, write_csv: false }, outputDir });

    expect(exporter.export(buildReport())?.csvPath).toBeNull();
    expect(existsSync(join(outputDir, 'ranking_report_2026-03-08.csv'))).toBe(false);
  });

  it('writes nothing when the exporter is disabled', () => {
    const exporter = new ReportExporter({ logger: createTestLogger(), config: { ...config, enabled: false }, outputDir });

    expect(exporter.export(buildReport())).toBeNull();
    expect(existsSync(join(outputDir, 'ranking_report_2026-03-08.json'))).toBe(false);
  });

  it('has no CSV rows to write when rankings failed', () => {
    const report = assemble({
      domain: 'example.co.uk',
      market: 'uk',
      keywords: { selected: [], skipped: [], fellBack: false },
      rankings: { status: 'failed', failure: { code: 'timeout', message: 'late' } },
      generatedAt: '2026-03-08T06:00:00.000Z'
    });

    expect(buildRankingsCsv(report)).toBeNull();
  });
});
