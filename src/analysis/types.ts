import type { Position, RankingRecord } from '../provider/types';

export interface HistoryPoint {
  keyword: string;
  position: Position;
  observedAt: string;
}

export type AnomalySeverity = 'high' | 'medium' | 'none';
export type ChangeType = 'improvement' | 'decline';

export interface Anomaly {
  keyword: string;
  currentPosition: number;
  expectedPosition: number;
  // Positive means the keyword dropped below its usual position.
  zScore: number;
  deviation: number;
  severity: Exclude<AnomalySeverity, 'none'>;
  changeType: ChangeType;
  previousPosition: Position | null;
  change: number | null;
}

export type Observation = Pick<RankingRecord, 'keyword' | 'position'>;

export type TransitionDirection = 'entered_top_n' | 'exited_top_n';

export interface TransitionEvent {
  direction: TransitionDirection;
  previousPosition: Position;
  currentPosition: Position;
  threshold: number;
}

export interface KeywordTransitionEvent extends TransitionEvent {
  keyword: string;
}

export interface PositionMove {
  keyword: string;
  previousPosition: Position | null;
  currentPosition: Position;
}

export interface TopNChanges {
  threshold: number;
  entered: PositionMove[];
  exited: PositionMove[];
  improved: PositionMove[];
  declined: PositionMove[];
}
