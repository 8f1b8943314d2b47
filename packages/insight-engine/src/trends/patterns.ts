import { addHours } from 'date-fns';
import { mean, sampleStandardDeviation } from 'simple-statistics';
import { DEFAULT_GROWTH_FLOOR, DEFAULT_SUDDEN_CHANGE_THRESHOLD } from '@vantage/shared';
import type {
  DailyAggregate,
  DailyPatternPoint,
  HourlyAggregate,
  MemoryLeakSuspect,
  PredictedMetrics,
  TrendAnomaly,
  WeeklyPatternPoint,
} from '@vantage/shared';

const MIN_LEAK_POINTS = 7;
const MIN_GROWTH_POINTS = 5;
const GROWING_RATIO = 0.6;
const MIN_ANOMALY_POINTS = 5;
const HOT_TEMPERATURE = 75;
const FORECAST_FULL_CONFIDENCE_SAMPLES = 30;
const FORECAST_MAX_CONFIDENCE = 0.95;

interface Accumulator {
  cpu: number;
  memory: number;
  gpu: number;
  count: number;
}

function groupBy(
  hourly: readonly HourlyAggregate[],
  keyOf: (bucket: Date) => number,
): [number, Accumulator][] {
  const groups = new Map<number, Accumulator>();
  for (const aggregate of hourly) {
    const key = keyOf(aggregate.bucket);
    const acc = groups.get(key) ?? { cpu: 0, memory: 0, gpu: 0, count: 0 };
    acc.cpu += aggregate.avgCpu;
    acc.memory += aggregate.avgMemory;
    acc.gpu += aggregate.avgGpu;
    acc.count += 1;
    groups.set(key, acc);
  }
  return Array.from(groups.entries()).sort(([a], [b]) => a - b);
}

/**
 * Average the hourly buckets by UTC hour of day. Hours without data are
 * left out.
 */
export function computeDailyPattern(hourly: readonly HourlyAggregate[]): DailyPatternPoint[] {
  return groupBy(hourly, (bucket) => bucket.getUTCHours()).map(([hour, acc]) => ({
    hour,
    avgCpu: acc.cpu / acc.count,
    avgMemory: acc.memory / acc.count,
    avgGpu: acc.gpu / acc.count,
    sampleCount: acc.count,
  }));
}

/**
 * Average the hourly buckets by UTC day of week, 0 = Sunday.
 */
export function computeWeeklyPattern(hourly: readonly HourlyAggregate[]): WeeklyPatternPoint[] {
  return groupBy(hourly, (bucket) => bucket.getUTCDay()).map(([weekday, acc]) => ({
    weekday,
    avgCpu: acc.cpu / acc.count,
    avgMemory: acc.memory / acc.count,
    avgGpu: acc.gpu / acc.count,
    sampleCount: acc.count,
  }));
}

/** Hours of day with the highest average CPU, busiest first. */
export function findPeakHours(hourly: readonly HourlyAggregate[], count: number = 3): DailyPatternPoint[] {
  return computeDailyPattern(hourly)
    .sort((a, b) => b.avgCpu - a.avgCpu)
    .slice(0, count);
}

/**
 * True when more than 60% of consecutive deltas are positive.
 */
export function isGrowingTrend(values: readonly number[]): boolean {
  if (values.length < MIN_GROWTH_POINTS) return false;

  let increases = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[i - 1]) increases++;
  }
  return increases / (values.length - 1) > GROWING_RATIO;
}

/**
 * Relative growth per point: (last - first) / first / n. Zero when the
 * first value is not positive.
 */
export function growthRate(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const first = values[0];
  const last = values[values.length - 1];
  if (first <= 0) return 0;
  return (last - first) / first / values.length;
}

export function detectMemoryLeak(
  daily: readonly DailyAggregate[],
  options: { growthFloor?: number; now?: Date } = {},
): MemoryLeakSuspect | null {
  if (daily.length < MIN_LEAK_POINTS) return null;

  const memory = daily.map((d) => d.avgMemory);
  if (!isGrowingTrend(memory)) return null;

  const rate = growthRate(memory);
  if (rate <= (options.growthFloor ?? DEFAULT_GROWTH_FLOOR)) return null;

  return {
    type: 'gradual-growth',
    description: `Memory usage has been steadily increasing by ${(rate * 100).toFixed(1)}% per day`,
    growthRatePerDay: rate,
    confidence: Math.min(0.9, rate * 10),
    detectedAt: options.now ?? new Date(),
  };
}

/**
 * Flag days whose CPU or temperature average sits more than two standard
 * deviations from the period mean, plus day-over-day CPU jumps above the
 * sudden-change threshold.
 */
export function detectTrendAnomalies(
  daily: readonly DailyAggregate[],
  options: { suddenChangeThreshold?: number } = {},
): TrendAnomaly[] {
  if (daily.length < MIN_ANOMALY_POINTS) return [];

  const threshold = options.suddenChangeThreshold ?? DEFAULT_SUDDEN_CHANGE_THRESHOLD;
  const cpuValues = daily.map((d) => d.avgCpu);
  const tempValues = daily.map((d) => d.avgTemperature);

  const cpuMean = mean(cpuValues);
  const cpuStdDev = sampleStandardDeviation(cpuValues);
  const tempMean = mean(tempValues);
  const tempStdDev = sampleStandardDeviation(tempValues);

  const anomalies: TrendAnomaly[] = [];

  daily.forEach((day, index) => {
    if (Math.abs(day.avgCpu - cpuMean) > 2 * cpuStdDev) {
      anomalies.push({
        type: 'cpu-spike',
        date: day.bucket,
        value: day.avgCpu,
        expectedRange: { min: cpuMean - cpuStdDev, max: cpuMean + cpuStdDev },
        severity: day.avgCpu > cpuMean ? 'high' : 'medium',
      });
    }

    if (day.avgTemperature > 0 && Math.abs(day.avgTemperature - tempMean) > 2 * tempStdDev) {
      anomalies.push({
        type: 'temperature-spike',
        date: day.bucket,
        value: day.avgTemperature,
        expectedRange: { min: tempMean - tempStdDev, max: tempMean + tempStdDev },
        severity: day.avgTemperature > HOT_TEMPERATURE ? 'high' : 'medium',
      });
    }

    if (index > 0) {
      const change = Math.abs(day.avgCpu - daily[index - 1].avgCpu);
      if (change > threshold) {
        anomalies.push({
          type: 'sudden-change',
          date: day.bucket,
          value: change,
          expectedRange: { min: 0, max: 10 },
          severity: change > 30 ? 'high' : 'medium',
        });
      }
    }
  });

  return anomalies;
}

export function forecastConfidence(sampleCount: number): number {
  return Math.min(FORECAST_MAX_CONFIDENCE, sampleCount / FORECAST_FULL_CONFIDENCE_SAMPLES);
}

/**
 * One-hour-ahead forecast: the daily-pattern bucket for the next UTC hour.
 */
export function forecastNextHour(
  dailyPattern: readonly DailyPatternPoint[],
  now: Date = new Date(),
): PredictedMetrics | null {
  const nextHour = (now.getUTCHours() + 1) % 24;
  const pattern = dailyPattern.find((p) => p.hour === nextHour);
  if (!pattern) return null;

  return {
    timestamp: addHours(now, 1),
    predictedCpu: pattern.avgCpu,
    predictedMemory: pattern.avgMemory,
    predictedGpu: pattern.avgGpu,
    confidence: forecastConfidence(pattern.sampleCount),
  };
}
