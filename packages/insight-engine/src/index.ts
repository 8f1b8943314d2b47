// Types
export type {
  RuleContext,
  AnomalyDetectorOptions,
  MetricStream,
  WeeklyAnalysis,
  MonthlyAnalysis,
} from './types.js';

// Anomaly detection
export { RollingWindow } from './anomaly/RollingWindow.js';
export { AnomalyDetector } from './anomaly/AnomalyDetector.js';

// Correlation
export {
  CorrelationEngine,
  describeCpuUsage,
  describeMemoryUsage,
  describeDiskUsage,
} from './correlation/CorrelationEngine.js';

// Insights
export type { InsightRule } from './insights/rules/InsightRule.js';
export { createInsight, createAction } from './insights/rules/InsightRule.js';
export { CpuSaturationRule } from './insights/rules/CpuSaturationRule.js';
export { MemoryPressureRule } from './insights/rules/MemoryPressureRule.js';
export { IoBottleneckRule } from './insights/rules/IoBottleneckRule.js';
export { ThermalThrottlingRule } from './insights/rules/ThermalThrottlingRule.js';
export { InsightEngine, defaultRules, dedupeByType } from './insights/InsightEngine.js';
export type { InsightEngineOptions } from './insights/InsightEngine.js';

// Trends
export {
  computeDailyPattern,
  computeWeeklyPattern,
  findPeakHours,
  isGrowingTrend,
  growthRate,
  detectMemoryLeak,
  detectTrendAnomalies,
  forecastNextHour,
  forecastConfidence,
} from './trends/patterns.js';
export { TrendAnalyzer } from './trends/TrendAnalyzer.js';
export type { TrendAnalyzerOptions } from './trends/TrendAnalyzer.js';
