import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { keywordKey } from '../analysis/history';
import type { Anomaly } from '../analysis/types';
import type { ExporterConfig } from '../config';
import { isRanked } from '../provider/types';
import type { EnrichedReport } from '../report/types';
import { Logger } from '../utils/logger';

interface ReportExporterDependencies {
  logger: Logger;
  config: ExporterConfig;
  outputDir: string;
}

export interface ExportResult {
  jsonPath: string;
  csvPath: string | null;
}

const CSV_HEADER = [
  'keyword',
  'domain',
  'position',
  'in_top10',
  'search_volume',
  'cpc',
  'difficulty',
  'url',
  'title',
  'anomaly_severity',
  'z_score'
];

function formatNumber(value: number | null | undefined, digits = 2): string {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return '';
  }
  return value.toFixed(digits);
}

function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function buildRankingsCsv(report: EnrichedReport): string | null {
  if (report.rankings.status !== 'ok') {
    return null;
  }

  const anomalies = new Map<string, Anomaly>(
    report.anomalies.map((anomaly): [string, Anomaly] => [keywordKey(anomaly.keyword), anomaly])
  );
  const rows = [CSV_HEADER.join(',')];

  report.rankings.data.records.forEach((record) => {
    const anomaly = anomalies.get(keywordKey(record.keyword));
    const row = [
      escapeCsv(record.keyword),
      escapeCsv(record.domain),
      String(record.position),
      isRanked(record.position) && record.position <= 10 ? 'yes' : 'no',
      formatNumber(record.searchVolume, 0),
      formatNumber(record.costPerClick),
      formatNumber(record.difficulty, 0),
      escapeCsv(record.url ?? ''),
      escapeCsv(record.title ?? ''),
      anomaly?.severity ?? '',
      formatNumber(anomaly?.zScore)
    ];
    rows.push(row.join(','));
  });

  return `${rows.join('\n')}\n`;
}

export class ReportExporter {
  constructor(private readonly deps: ReportExporterDependencies) {}

  export(report: EnrichedReport): ExportResult | null {
    if (!this.deps.config.enabled) {
      return null;
    }

    mkdirSync(this.deps.outputDir, { recursive: true });
    const stamp = report.generatedAt.slice(0, 10);
    const baseName = `${this.deps.config.output_basename}_${stamp}`;

    const jsonPath = resolve(this.deps.outputDir, `${baseName}.json`);
    writeFileSync(jsonPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');

    let csvPath: string | null = null;
    const csv = this.deps.config.write_csv ? buildRankingsCsv(report) : null;
    if (csv) {
      csvPath = resolve(this.deps.outputDir, `${baseName}.csv`);
      writeFileSync(csvPath, csv, 'utf-8');
    }

    this.deps.logger.info('Exported ranking report', {
      jsonPath,
      csvPath,
      rows: report.rankings.status === 'ok' ? report.rankings.data.records.length : 0
    });

    return { jsonPath, csvPath };
  }
}
