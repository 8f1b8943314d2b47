// Types
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
  ProcessCategory,
  ProcessResourceSample,
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
  EventBusMessage,
} from './types/index.js';

// Constants
export {
  VANTAGE_HOME,
  VANTAGE_DB_FILE,
  VANTAGE_CONFIG_FILES,
  DEFAULT_COLLECT_INTERVAL,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_PERSIST_INTERVAL,
  DEFAULT_RETENTION_DAYS,
  DEFAULT_MAINTENANCE_INTERVAL,
  DEFAULT_MAX_PENDING_WRITES,
  DEFAULT_ROLLING_WINDOW,
  DEFAULT_MIN_SAMPLES,
  DEFAULT_ZSCORE_THRESHOLD,
  DEFAULT_STDDEV_EPSILON,
  DEFAULT_INSIGHT_HISTORY_LIMIT,
  DEFAULT_INSIGHT_RECENCY_WINDOW,
  DEFAULT_WEEKLY_WINDOW_DAYS,
  DEFAULT_MONTHLY_WINDOW_DAYS,
  DEFAULT_GROWTH_FLOOR,
  DEFAULT_SUDDEN_CHANGE_THRESHOLD,
  BYTES_PER_GB,
  BYTES_PER_MB,
  VANTAGE_VERSION,
} from './constants.js';

// Schemas
export {
  vantageConfigSchema,
  collectorConfigSchema,
  storageConfigSchema,
  anomalyConfigSchema,
  insightConfigSchema,
  trendConfigSchema,
  loggingConfigSchema,
} from './schemas/config.schema.js';

export type { VantageConfig, VantageConfigInput, DedupPolicy, LoggingConfig } from './schemas/config.schema.js';

export {
  memoryPressureSchema,
  thermalStateSchema,
  probeGroupSchema,
  unavailableGroupsSchema,
} from './schemas/snapshot.schema.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  formatBytes,
  formatGigabytes,
  formatMegabytes,
  formatCpu,
  formatRate,
} from './utils/parser.js';

export { resolveConfig, findConfigFile, loadConfig } from './utils/config.js';

export { categorizeProcess, displayName, totalDiskBytes } from './utils/process.js';

export {
  SEVERITY_RANK,
  compareSeverityDesc,
  isMoreSevere,
  statusFromSeverities,
  memoryUsagePercent,
  totalDiskRate,
  createEmptySnapshot,
} from './utils/snapshot.js';

export { createLogger, createLoggerFromConfig, getLogger, setDefaultLogger } from './utils/logger.js';
export type { Logger, LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  VantageError,
  ProbeUnavailableError,
  PersistenceWriteError,
  PersistenceReadError,
  StoreInitializationError,
  ConfigValidationError,
  errorMessage,
} from './utils/errors.js';
