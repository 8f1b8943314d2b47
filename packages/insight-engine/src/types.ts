import type {
  Anomaly,
  Correlation,
  DailyPatternPoint,
  MemoryLeakSuspect,
  ProcessResourceSample,
  Snapshot,
  TrendAnomaly,
  WeeklyPatternPoint,
} from '@vantage/shared';

/**
 * Everything a rule may look at during one analysis pass.
 */
export interface RuleContext {
  snapshot: Snapshot;
  processes: readonly ProcessResourceSample[];
  correlations: readonly Correlation[];
  anomalies: readonly Anomaly[];
}

export interface AnomalyDetectorOptions {
  windowSize?: number;
  minSamples?: number;
  threshold?: number;
  epsilon?: number;
}

/** Named scalar streams fed from every snapshot. */
export type MetricStream = 'cpu' | 'memory' | 'disk-read' | 'disk-write';

export interface WeeklyAnalysis {
  dailyPatterns: DailyPatternPoint[];
  weeklyPatterns: WeeklyPatternPoint[];
  peakHours: DailyPatternPoint[];
  analyzedAt: Date;
}

export interface MonthlyAnalysis {
  anomalies: TrendAnomaly[];
  leakSuspects: MemoryLeakSuspect[];
  analyzedAt: Date;
}

