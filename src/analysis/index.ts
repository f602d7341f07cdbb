export {
  AnomalyDetector,
  classifySeverity,
  DEFAULT_ANOMALY_THRESHOLDS,
  thresholdsFromConfig,
  type AnomalyThresholds
} from './anomaly-detector';
export { classifyTopNChanges, DEFAULT_TOP_N, isInTopN, track, trackAll } from './transition-tracker';
export type {
  Anomaly,
  AnomalySeverity,
  ChangeType,
  HistoryPoint,
  KeywordTransitionEvent,
  Observation,
  PositionMove,
  TopNChanges,
  TransitionDirection,
  TransitionEvent
} from './types';
