import {
  VANTAGE_VERSION,
  createLoggerFromConfig,
  errorMessage,
  getLogger,
  parseDuration,
  resolveConfig,
} from '@vantage/shared';
import type {
  Anomaly,
  Correlation,
  Insight,
  Logger,
  ProcessResourceSample,
  Snapshot,
  SystemStatus,
  VantageConfig,
} from '@vantage/shared';
import { AnomalyDetector, InsightEngine, TrendAnalyzer } from '@vantage/insight-engine';
import { closeDatabase, openDatabase } from '../db/Database.js';
import type { Database } from '../db/Database.js';
import { SnapshotRepository } from '../db/repositories/SnapshotRepository.js';
import type { StoreStats } from '../db/repositories/SnapshotRepository.js';
import { EventBus } from '../events/EventBus.js';
import type { SnapshotEvent } from '../events/EventBus.js';
import { MetricsCollector } from '../metrics/MetricsCollector.js';
import type { ProbeSet } from '../metrics/MetricsCollector.js';
import { NodeProbeSet } from '../metrics/NodeProbeSet.js';

export type StorageState = 'ready' | 'degraded' | 'disabled';

export interface MonitorStatus {
  running: boolean;
  storage: StorageState;
  storageError?: string;
  systemStatus: SystemStatus;
}

export interface VantageMonitorOptions {
  config?: VantageConfig;
  probes?: ProbeSet;
  logger?: Logger;
  eventBus?: EventBus;
  openDatabase?: (path: string) => Database;
}

/**
 * Owns one of everything: event bus, snapshot store, collector, insight
 * engine and trend analyzer. Nothing here is reachable through a global.
 */
export class VantageMonitor {
  private readonly config: VantageConfig;
  private readonly probes: ProbeSet;
  private readonly logger: Logger;
  private readonly eventBus: EventBus;
  private readonly insightEngine: InsightEngine;
  private readonly open: (path: string) => Database;

  private db: Database | null = null;
  private store: SnapshotRepository | null = null;
  private collector: MetricsCollector | null = null;
  private trendAnalyzer: TrendAnalyzer | null = null;
  private maintenanceTimer: NodeJS.Timeout | null = null;
  private storage: StorageState;
  private storageError: string | undefined;
  private running = false;

  constructor(options: VantageMonitorOptions = {}) {
    this.config = options.config ?? resolveConfig({});
    this.logger = options.logger ?? (options.config ? createLoggerFromConfig(this.config.logging) : getLogger());
    this.probes = options.probes ?? new NodeProbeSet();
    this.eventBus = options.eventBus ?? new EventBus();
    this.open = options.openDatabase ?? openDatabase;
    this.storage = this.config.storage.enabled ? 'ready' : 'disabled';

    const { anomaly, insights } = this.config;
    this.insightEngine = new InsightEngine({
      historyLimit: insights.history_limit,
      recencyWindowMs: parseDuration(insights.recency_window),
      dedupPolicy: insights.dedup_policy,
      anomalyDetector: new AnomalyDetector({
        windowSize: anomaly.window_size,
        minSamples: anomaly.min_samples,
        threshold: anomaly.threshold,
        epsilon: anomaly.epsilon,
      }),
      logger: this.logger,
    });
  }

  async start(): Promise<void> {
    if (this.running) return;

    this.logger.info('Vantage monitor starting...');

    // 1. Snapshot store
    if (this.config.storage.enabled) {
      this.openStore();
    }

    // 2. Insight analysis on every published snapshot
    this.eventBus.on('metric:snapshot', this.handleSnapshot);

    // 3. Collection
    const { collector } = this.config;
    this.collector = new MetricsCollector(this.probes, this.eventBus, {
      interval: parseDuration(collector.interval),
      historyLimit: collector.history_limit,
      persistInterval: parseDuration(collector.persist_interval),
      sink: this.store,
      logger: this.logger,
    });
    this.collector.start();

    // 4. Periodic maintenance
    this.startMaintenance();

    this.running = true;
    this.logger.info({ version: VANTAGE_VERSION, storage: this.storage }, 'Vantage monitor started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    this.logger.info('Vantage monitor stopping...');
    this.running = false;

    // Stop in reverse order
    this.collector?.stop();
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }

    if (this.store) {
      await this.store.flush();
      this.store.close();
      this.store = null;
    }
    if (this.db) {
      closeDatabase(this.db);
      this.db = null;
    }
    this.trendAnalyzer = null;

    this.eventBus.emit('system:shutdown', undefined);
    this.eventBus.off('metric:snapshot', this.handleSnapshot);

    this.logger.info('Vantage monitor stopped');
  }

  getStatus(): MonitorStatus {
    return {
      running: this.running,
      storage: this.storage,
      ...(this.storageError !== undefined ? { storageError: this.storageError } : {}),
      systemStatus: this.insightEngine.getStatus(),
    };
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  getLatestSnapshot(): Snapshot | null {
    return this.collector?.getLatest() ?? null;
  }

  getProcesses(): ProcessResourceSample[] {
    return this.collector?.getProcesses() ?? [];
  }

  getHistory(): Snapshot[] {
    return this.collector?.history() ?? [];
  }

  getInsights(): Insight[] {
    return this.insightEngine.getCurrentInsights();
  }

  getAnomalies(): Anomaly[] {
    return this.insightEngine.getAnomalies();
  }

  getCorrelations(): Correlation[] {
    return this.insightEngine.getCorrelations();
  }

  getInsightEngine(): InsightEngine {
    return this.insightEngine;
  }

  /** Null while the store is not open. */
  getTrendAnalyzer(): TrendAnalyzer | null {
    return this.trendAnalyzer;
  }

  getStoreStats(): StoreStats | null {
    return this.store?.stats() ?? null;
  }

  /** Run one sample now. */
  async refresh(): Promise<Snapshot | null> {
    return this.collector ? this.collector.refresh() : null;
  }

  /** Run the retention sweep now. Returns rows removed, or 0 without a store. */
  runMaintenance(): number {
    if (!this.store) return 0;
    return this.store.cleanup(this.config.storage.retention_days);
  }

  private readonly handleSnapshot = ({ snapshot, processes }: SnapshotEvent): void => {
    const report = this.insightEngine.analyze(snapshot, processes);
    this.eventBus.emit('insight:update', report);
  };

  private openStore(): void {
    const { storage, trends } = this.config;
    try {
      this.db = this.open(storage.path);
    } catch (err) {
      this.storage = 'degraded';
      this.storageError = errorMessage(err);
      this.logger.error({ err: this.storageError, path: storage.path }, 'Snapshot store unavailable, running without history');
      this.eventBus.emit('store:degraded', { error: this.storageError });
      return;
    }

    this.storage = 'ready';
    this.storageError = undefined;
    this.store = new SnapshotRepository(this.db, {
      maxPending: storage.max_pending_writes,
      logger: this.logger,
    });
    this.trendAnalyzer = new TrendAnalyzer(this.store, {
      weeklyWindowDays: trends.weekly_window_days,
      monthlyWindowDays: trends.monthly_window_days,
      growthFloor: trends.growth_floor,
      suddenChangeThreshold: trends.sudden_change_threshold,
      logger: this.logger,
    });
  }

  private startMaintenance(): void {
    if (!this.store) return;
    this.maintenanceTimer = setInterval(
      () => this.runMaintenance(),
      parseDuration(this.config.storage.maintenance_interval),
    );
    this.maintenanceTimer.unref();
  }
}
