export { buildRankingsCsv, ReportExporter, type ExportResult } from './report-exporter';
