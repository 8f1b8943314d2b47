export type {
  Snapshot,
  MemoryPressure,
  ThermalState,
  ProbeGroup,
  CpuReading,
  MemoryReading,
  GpuReading,
  DiskReading,
  ThermalReading,
  NetworkReading,
  TrendDirection,
} from './metrics.js';

export type { ProcessCategory, ProcessResourceSample } from './process.js';

export type {
  Severity,
  SystemStatus,
  InsightType,
  CorrelationMetric,
  Anomaly,
  Correlation,
  InsightActionKind,
  InsightAction,
  InsightMetrics,
  Insight,
  InsightReport,
} from './insight.js';

export type {
  AggregatedMetrics,
  HourlyAggregate,
  DailyAggregate,
  AggregateSource,
  TrendAnomalyType,
  TrendSeverity,
  TrendAnomaly,
  MemoryLeakSuspect,
  DailyPatternPoint,
  WeeklyPatternPoint,
  PredictedMetrics,
  AnalysisPeriod,
  UsageSummary,
} from './trends.js';

export type { EventBusMessage } from './events.js';
