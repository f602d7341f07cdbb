export { assemble, positionScore, visibilityScore } from './aggregator';
export { SECTION_NAMES } from './types';
export type {
  EnrichedReport,
  KeywordSelection,
  ReportInput,
  ReportSection,
  ReportSections,
  ReportSummary,
  SectionName
} from './types';
