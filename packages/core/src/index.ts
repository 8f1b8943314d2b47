// Database
export { openDatabase, closeDatabase } from './db/Database.js';
export type { Database } from './db/Database.js';
export { runMigrations } from './db/migrations/index.js';
export type { Migration } from './db/migrations/index.js';
export { SnapshotRepository, fromRow } from './db/repositories/SnapshotRepository.js';
export type {
  SnapshotContext,
  SnapshotRow,
  StoreStats,
  SnapshotRepositoryOptions,
} from './db/repositories/SnapshotRepository.js';

// Events
export { EventBus } from './events/EventBus.js';
export type { EventMap, EventName, SnapshotEvent } from './events/EventBus.js';

// Metrics
export { MetricsCollector } from './metrics/MetricsCollector.js';
export type {
  ProbeSet,
  SnapshotSink,
  CollectorMetric,
  MetricsCollectorOptions,
} from './metrics/MetricsCollector.js';
export { NodeProbeSet, memoryPressureFor } from './metrics/NodeProbeSet.js';
export type { OsReader, NodeProbeSetOptions } from './metrics/NodeProbeSet.js';

// Monitor
export { VantageMonitor } from './daemon/VantageMonitor.js';
export type { MonitorStatus, StorageState, VantageMonitorOptions } from './daemon/VantageMonitor.js';
