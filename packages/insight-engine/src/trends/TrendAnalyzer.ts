import { subDays } from 'date-fns';
import { max, mean, min } from 'simple-statistics';
import {
  DEFAULT_GROWTH_FLOOR,
  DEFAULT_MONTHLY_WINDOW_DAYS,
  DEFAULT_SUDDEN_CHANGE_THRESHOLD,
  DEFAULT_WEEKLY_WINDOW_DAYS,
  getLogger,
} from '@vantage/shared';
import type {
  AggregateSource,
  AnalysisPeriod,
  Logger,
  PredictedMetrics,
  UsageSummary,
} from '@vantage/shared';
import type { MonthlyAnalysis, WeeklyAnalysis } from '../types.js';
import {
  computeDailyPattern,
  computeWeeklyPattern,
  detectMemoryLeak,
  detectTrendAnomalies,
  findPeakHours,
  forecastNextHour,
} from './patterns.js';

export interface TrendAnalyzerOptions {
  weeklyWindowDays?: number;
  monthlyWindowDays?: number;
  growthFloor?: number;
  suddenChangeThreshold?: number;
  logger?: Logger;
}

const PERIOD_DAYS: Record<AnalysisPeriod, number> = {
  day: 1,
  week: 7,
  month: 30,
};

/**
 * Read-only analysis over stored aggregates. One analysis runs at a time;
 * a call made while another is in progress returns null.
 */
export class TrendAnalyzer {
  private readonly source: AggregateSource;
  private readonly weeklyWindowDays: number;
  private readonly monthlyWindowDays: number;
  private readonly growthFloor: number;
  private readonly suddenChangeThreshold: number;
  private readonly logger: Logger;

  private analyzing = false;
  private lastWeekly: WeeklyAnalysis | null = null;
  private lastMonthly: MonthlyAnalysis | null = null;

  constructor(source: AggregateSource, options: TrendAnalyzerOptions = {}) {
    this.source = source;
    this.weeklyWindowDays = options.weeklyWindowDays ?? DEFAULT_WEEKLY_WINDOW_DAYS;
    this.monthlyWindowDays = options.monthlyWindowDays ?? DEFAULT_MONTHLY_WINDOW_DAYS;
    this.growthFloor = options.growthFloor ?? DEFAULT_GROWTH_FLOOR;
    this.suddenChangeThreshold = options.suddenChangeThreshold ?? DEFAULT_SUDDEN_CHANGE_THRESHOLD;
    this.logger = options.logger ?? getLogger();
  }

  isAnalyzing(): boolean {
    return this.analyzing;
  }

  async analyzeWeeklyPatterns(now: Date = new Date()): Promise<WeeklyAnalysis | null> {
    return this.exclusive(async () => {
      const hourly = await this.source.hourlyAverages(subDays(now, this.weeklyWindowDays), now);
      const analysis: WeeklyAnalysis = {
        dailyPatterns: computeDailyPattern(hourly),
        weeklyPatterns: computeWeeklyPattern(hourly),
        peakHours: findPeakHours(hourly, 3),
        analyzedAt: now,
      };
      this.lastWeekly = analysis;
      this.logger.debug({ buckets: hourly.length }, 'Weekly pattern analysis complete');
      return analysis;
    });
  }

  async analyzeMonthlyPatterns(now: Date = new Date()): Promise<MonthlyAnalysis | null> {
    return this.exclusive(async () => {
      const daily = await this.source.dailyAverages(subDays(now, this.monthlyWindowDays), now);
      const leak = detectMemoryLeak(daily, { growthFloor: this.growthFloor, now });
      const analysis: MonthlyAnalysis = {
        anomalies: detectTrendAnomalies(daily, { suddenChangeThreshold: this.suddenChangeThreshold }),
        leakSuspects: leak ? [leak] : [],
        analyzedAt: now,
      };
      this.lastMonthly = analysis;
      this.logger.debug(
        { days: daily.length, anomalies: analysis.anomalies.length, leaks: analysis.leakSuspects.length },
        'Monthly trend analysis complete',
      );
      return analysis;
    });
  }

  /**
   * Forecast from the most recent weekly analysis. Null until one has run
   * or when the next hour has no history.
   */
  predictNextHour(now: Date = new Date()): PredictedMetrics | null {
    if (!this.lastWeekly) return null;
    return forecastNextHour(this.lastWeekly.dailyPatterns, now);
  }

  getLastWeeklyAnalysis(): WeeklyAnalysis | null {
    return this.lastWeekly;
  }

  getLastMonthlyAnalysis(): MonthlyAnalysis | null {
    return this.lastMonthly;
  }

  async getUsageSummary(period: AnalysisPeriod, now: Date = new Date()): Promise<UsageSummary | null> {
    const startDate = subDays(now, PERIOD_DAYS[period]);
    const hourly = await this.source.hourlyAverages(startDate, now);
    if (hourly.length === 0) return null;

    const cpu = hourly.map((h) => h.avgCpu);
    const memory = hourly.map((h) => h.avgMemory);
    const gpu = hourly.map((h) => h.avgGpu);
    const temperature = hourly.map((h) => h.avgTemperature);

    return {
      period,
      startDate,
      endDate: now,
      avgCpu: mean(cpu),
      maxCpu: max(cpu),
      minCpu: min(cpu),
      avgMemory: mean(memory),
      maxMemory: max(memory),
      avgGpu: mean(gpu),
      maxGpu: max(gpu),
      avgTemperature: mean(temperature),
      maxTemperature: max(temperature),
      sampleCount: hourly.reduce((sum, h) => sum + h.sampleCount, 0),
    };
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T | null> {
    if (this.analyzing) return null;
    this.analyzing = true;
    try {
      return await task();
    } finally {
      this.analyzing = false;
    }
  }
}
