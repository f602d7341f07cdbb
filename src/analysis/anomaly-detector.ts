import type { AnalysisConfig } from '../config';
import { isRanked } from '../provider/types';
import { mean, populationStandardDeviation, roundTo, zScore } from '../utils/stats';
import { groupHistory, keywordKey, latestPosition } from './history';
import type { Anomaly, AnomalySeverity, HistoryPoint, Observation } from './types';

export interface AnomalyThresholds {
  minHistory: number;
  mediumZ: number;
  highZ: number;
}

export const DEFAULT_ANOMALY_THRESHOLDS: AnomalyThresholds = {
  minHistory: 7,
  mediumZ: 2.0,
  highZ: 3.0
};

export function thresholdsFromConfig(config: AnalysisConfig): AnomalyThresholds {
  return { minHistory: config.min_history, mediumZ: config.medium_z, highZ: config.high_z };
}

export function classifySeverity(z: number, thresholds: AnomalyThresholds = DEFAULT_ANOMALY_THRESHOLDS): AnomalySeverity {
  const magnitude = Math.abs(z);
  if (magnitude >= thresholds.highZ) {
    return 'high';
  }
  if (magnitude >= thresholds.mediumZ) {
    return 'medium';
  }
  return 'none';
}

export class AnomalyDetector {
  private readonly thresholds: AnomalyThresholds;

  constructor(thresholds: Partial<AnomalyThresholds> = {}) {
    this.thresholds = { ...DEFAULT_ANOMALY_THRESHOLDS, ...thresholds };
  }

  detect(history: readonly HistoryPoint[], current: Observation): Anomaly | null {
    const position = current.position;
    if (!isRanked(position)) {
      return null;
    }

    const key = keywordKey(current.keyword);
    const points = history.filter((point) => keywordKey(point.keyword) === key);
    return this.evaluate(points, current.keyword, position);
  }

  detectAll(history: readonly HistoryPoint[], observations: readonly Observation[]): Anomaly[] {
    const grouped = groupHistory(history);
    const anomalies: Anomaly[] = [];

    for (const observation of observations) {
      const position = observation.position;
      if (!isRanked(position)) {
        continue;
      }
      const points = grouped.get(keywordKey(observation.keyword)) ?? [];
      const anomaly = this.evaluate(points, observation.keyword, position);
      if (anomaly) {
        anomalies.push(anomaly);
      }
    }

    return anomalies.sort((a, b) => Math.abs(b.zScore) - Math.abs(a.zScore));
  }

  private evaluate(points: readonly HistoryPoint[], keyword: string, current: number): Anomaly | null {
    const positions = points.map((point) => point.position).filter(isRanked);
    if (positions.length < this.thresholds.minHistory) {
      return null;
    }

    const avg = mean(positions);
    const deviation = populationStandardDeviation(positions);
    if (avg === null || deviation === null) {
      return null;
    }

    const z = zScore(current, avg, deviation);
    if (z === null) {
      return null;
    }

    const severity = classifySeverity(z, this.thresholds);
    if (severity === 'none') {
      return null;
    }

    const previousPosition = latestPosition(points);
    return {
      keyword,
      currentPosition: current,
      expectedPosition: roundTo(avg, 1),
      zScore: roundTo(z, 2),
      deviation: roundTo(current - avg, 1),
      severity,
      changeType: current > avg ? 'decline' : 'improvement',
      previousPosition,
      change: previousPosition !== null && isRanked(previousPosition) ? previousPosition - current : null
    };
  }
}
