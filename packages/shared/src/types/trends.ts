/**
 * Rollup of persisted snapshots for one UTC time bucket.
 * Derived on demand from the snapshot table, never stored.
 */
export interface AggregatedMetrics {
  bucket: Date;
  avgCpu: number;
  /** Bytes. */
  avgMemory: number;
  avgMemoryPercent: number;
  avgGpu: number;
  avgTemperature: number;
  maxCpu: number;
  maxMemory: number;
  maxTemperature: number;
  sampleCount: number;
}

export type HourlyAggregate = AggregatedMetrics;
export type DailyAggregate = AggregatedMetrics;

export interface AggregateSource {
  hourlyAverages(start: Date, end: Date): Promise<HourlyAggregate[]>;
  dailyAverages(start: Date, end: Date): Promise<DailyAggregate[]>;
}

export type TrendAnomalyType = 'cpu-spike' | 'temperature-spike' | 'sudden-change';

export type TrendSeverity = 'low' | 'medium' | 'high';

export interface TrendAnomaly {
  type: TrendAnomalyType;
  date: Date;
  value: number;
  expectedRange: { min: number; max: number };
  severity: TrendSeverity;
}

export interface MemoryLeakSuspect {
  type: 'gradual-growth';
  description: string;
  growthRatePerDay: number;
  /** 0..0.9 */
  confidence: number;
  detectedAt: Date;
}

export interface DailyPatternPoint {
  /** Hour of day, 0-23 (UTC). */
  hour: number;
  avgCpu: number;
  avgMemory: number;
  avgGpu: number;
  sampleCount: number;
}

export interface WeeklyPatternPoint {
  /** Day of week, 0 = Sunday (UTC). */
  weekday: number;
  avgCpu: number;
  avgMemory: number;
  avgGpu: number;
  sampleCount: number;
}

export interface PredictedMetrics {
  timestamp: Date;
  predictedCpu: number;
  predictedMemory: number;
  predictedGpu: number;
  confidence: number;
}

export type AnalysisPeriod = 'day' | 'week' | 'month';

export interface UsageSummary {
  period: AnalysisPeriod;
  startDate: Date;
  endDate: Date;
  avgCpu: number;
  maxCpu: number;
  minCpu: number;
  avgMemory: number;
  maxMemory: number;
  avgGpu: number;
  maxGpu: number;
  avgTemperature: number;
  maxTemperature: number;
  sampleCount: number;
}
