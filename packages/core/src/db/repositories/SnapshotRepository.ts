import type BetterSqlite3 from 'better-sqlite3';
import {
  DEFAULT_MAX_PENDING_WRITES,
  DEFAULT_RETENTION_DAYS,
  PersistenceReadError,
  PersistenceWriteError,
  errorMessage,
  getLogger,
  memoryPressureSchema,
  thermalStateSchema,
  unavailableGroupsSchema,
} from '@vantage/shared';
import type { AggregateSource, AggregatedMetrics, Logger, ProbeGroup, Snapshot } from '@vantage/shared';

const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_DAY = 86400;

export interface SnapshotContext {
  activeProcessCount?: number;
  /** Names of the busiest processes at the time of the snapshot. */
  topProcesses?: string[];
}

export interface SnapshotRow {
  id: number;
  timestamp: number;
  cpu_usage: number;
  cpu_performance_cores: number;
  cpu_efficiency_cores: number;
  cpu_core_count: number;
  memory_used: number;
  memory_total: number;
  memory_pressure: string;
  swap_used: number;
  memory_wired: number;
  memory_compressed: number;
  gpu_usage: number;
  gpu_memory_used: number;
  gpu_temperature: number;
  disk_read_rate: number;
  disk_write_rate: number;
  disk_read_ops: number;
  disk_write_ops: number;
  cpu_temperature: number;
  fan_speed: number;
  thermal_state: string;
  network_bytes_in: number;
  network_bytes_out: number;
  unavailable: string;
  active_process_count: number;
  top_processes: string;
}

type InsertParams = Omit<SnapshotRow, 'id'>;

interface AggregateRow {
  bucket: number;
  avg_cpu: number;
  avg_memory: number;
  avg_memory_percent: number;
  avg_gpu: number;
  avg_temperature: number;
  max_cpu: number;
  max_memory: number;
  max_temperature: number;
  sample_count: number;
}

interface AggregateParams {
  bucketSeconds: number;
  start: number;
  end: number;
}

interface StatsRow {
  total: number;
  oldest: number | null;
  newest: number | null;
}

export interface StoreStats {
  totalSnapshots: number;
  oldest: Date | null;
  newest: Date | null;
}

export interface SnapshotRepositoryOptions {
  maxPending?: number;
  logger?: Logger;
}

/**
 * Append-only snapshot log. Writes go through a single queue drained on
 * the next turn of the event loop, one transaction per batch; callers
 * never wait on disk. Reads resolve to an empty result on failure.
 */
export class SnapshotRepository implements AggregateSource {
  private readonly db: BetterSqlite3.Database;
  private readonly logger: Logger;
  private readonly maxPending: number;

  private readonly insertStmt: BetterSqlite3.Statement<[InsertParams]>;
  private readonly rangeStmt: BetterSqlite3.Statement<[number, number], SnapshotRow>;
  private readonly aggregateStmt: BetterSqlite3.Statement<[AggregateParams], AggregateRow>;
  private readonly deleteBeforeStmt: BetterSqlite3.Statement<[number]>;
  private readonly statsStmt: BetterSqlite3.Statement<[], StatsRow>;
  private readonly insertBatch: (rows: InsertParams[]) => void;

  private pending: InsertParams[] = [];
  private drainHandle: NodeJS.Immediate | null = null;
  private idleWaiters: (() => void)[] = [];
  private closed = false;
  private droppedWrites = 0;

  constructor(db: BetterSqlite3.Database, options: SnapshotRepositoryOptions = {}) {
    this.db = db;
    this.logger = options.logger ?? getLogger();
    this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING_WRITES;

    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO snapshots (
        timestamp,
        cpu_usage, cpu_performance_cores, cpu_efficiency_cores, cpu_core_count,
        memory_used, memory_total, memory_pressure, swap_used, memory_wired, memory_compressed,
        gpu_usage, gpu_memory_used, gpu_temperature,
        disk_read_rate, disk_write_rate, disk_read_ops, disk_write_ops,
        cpu_temperature, fan_speed, thermal_state,
        network_bytes_in, network_bytes_out,
        unavailable, active_process_count, top_processes
      ) VALUES (
        @timestamp,
        @cpu_usage, @cpu_performance_cores, @cpu_efficiency_cores, @cpu_core_count,
        @memory_used, @memory_total, @memory_pressure, @swap_used, @memory_wired, @memory_compressed,
        @gpu_usage, @gpu_memory_used, @gpu_temperature,
        @disk_read_rate, @disk_write_rate, @disk_read_ops, @disk_write_ops,
        @cpu_temperature, @fan_speed, @thermal_state,
        @network_bytes_in, @network_bytes_out,
        @unavailable, @active_process_count, @top_processes
      )
    `);

    this.rangeStmt = db.prepare<[number, number], SnapshotRow>(
      'SELECT * FROM snapshots WHERE timestamp BETWEEN ? AND ? ORDER BY timestamp, id',
    );

    this.aggregateStmt = db.prepare<AggregateParams, AggregateRow>(`
      SELECT
        CAST(timestamp / @bucketSeconds AS INTEGER) AS bucket,
        AVG(cpu_usage) AS avg_cpu,
        AVG(memory_used) AS avg_memory,
        AVG(CASE WHEN memory_total > 0 THEN memory_used * 100.0 / memory_total ELSE 0 END) AS avg_memory_percent,
        AVG(gpu_usage) AS avg_gpu,
        AVG(cpu_temperature) AS avg_temperature,
        MAX(cpu_usage) AS max_cpu,
        MAX(memory_used) AS max_memory,
        MAX(cpu_temperature) AS max_temperature,
        COUNT(*) AS sample_count
      FROM snapshots
      WHERE timestamp BETWEEN @start AND @end
      GROUP BY bucket
      ORDER BY bucket
    `);

    this.deleteBeforeStmt = db.prepare<[number]>('DELETE FROM snapshots WHERE timestamp < ?');

    this.statsStmt = db.prepare<[], StatsRow>(
      'SELECT COUNT(*) AS total, MIN(timestamp) AS oldest, MAX(timestamp) AS newest FROM snapshots',
    );

    this.insertBatch = db.transaction((rows: InsertParams[]) => {
      for (const row of rows) {
        this.insertStmt.run(row);
      }
    });
  }

  /**
   * Queue a snapshot for writing. Returns immediately. When the queue is
   * full the oldest pending row is dropped.
   */
  save(snapshot: Snapshot, context: SnapshotContext = {}): void {
    if (this.closed) {
      this.logger.debug('Snapshot store is closed, ignoring write');
      return;
    }

    if (this.pending.length >= this.maxPending) {
      this.pending.shift();
      this.droppedWrites++;
      this.logger.warn({ maxPending: this.maxPending }, 'Snapshot write queue full, dropping oldest pending row');
    }

    this.pending.push(toRow(snapshot, context));
    this.scheduleDrain();
  }

  /** Resolves once every queued write has been attempted. */
  flush(): Promise<void> {
    if (this.pending.length === 0 && this.drainHandle === null) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  pendingWrites(): number {
    return this.pending.length;
  }

  /** Rows lost to queue overflow or failed batches since creation. */
  getDroppedWrites(): number {
    return this.droppedWrites;
  }

  async queryRange(start: Date, end: Date): Promise<Snapshot[]> {
    try {
      return this.rangeStmt.all(toEpochSeconds(start), toEpochSeconds(end)).map(fromRow);
    } catch (err) {
      this.logReadFailure('queryRange', err);
      return [];
    }
  }

  async hourlyAverages(start: Date, end: Date): Promise<AggregatedMetrics[]> {
    return this.aggregate(SECONDS_PER_HOUR, start, end);
  }

  async dailyAverages(start: Date, end: Date): Promise<AggregatedMetrics[]> {
    return this.aggregate(SECONDS_PER_DAY, start, end);
  }

  /**
   * Delete rows older than the retention horizon and reclaim the space.
   * Returns the number of rows removed.
   */
  cleanup(retentionDays: number = DEFAULT_RETENTION_DAYS, now: Date = new Date()): number {
    const cutoff = toEpochSeconds(now) - retentionDays * SECONDS_PER_DAY;
    try {
      const { changes } = this.deleteBeforeStmt.run(cutoff);
      this.db.exec('VACUUM');
      this.logger.info({ deleted: changes, retentionDays }, 'Snapshot retention sweep complete');
      return changes;
    } catch (err) {
      this.logger.warn({ err: errorMessage(err), retentionDays }, 'Snapshot retention sweep failed');
      return 0;
    }
  }

  stats(): StoreStats {
    try {
      const row = this.statsStmt.get();
      return {
        totalSnapshots: row?.total ?? 0,
        oldest: row?.oldest != null ? fromEpochSeconds(row.oldest) : null,
        newest: row?.newest != null ? fromEpochSeconds(row.newest) : null,
      };
    } catch (err) {
      this.logReadFailure('stats', err);
      return { totalSnapshots: 0, oldest: null, newest: null };
    }
  }

  /** Stop accepting writes and discard anything still queued. */
  close(): void {
    this.closed = true;
    if (this.drainHandle) {
      clearImmediate(this.drainHandle);
      this.drainHandle = null;
    }
    this.pending = [];
    this.notifyIdle();
  }

  isClosed(): boolean {
    return this.closed;
  }

  private async aggregate(bucketSeconds: number, start: Date, end: Date): Promise<AggregatedMetrics[]> {
    try {
      return this.aggregateStmt
        .all({ bucketSeconds, start: toEpochSeconds(start), end: toEpochSeconds(end) })
        .map((row) => ({
          bucket: fromEpochSeconds(row.bucket * bucketSeconds),
          avgCpu: row.avg_cpu,
          avgMemory: row.avg_memory,
          avgMemoryPercent: row.avg_memory_percent,
          avgGpu: row.avg_gpu,
          avgTemperature: row.avg_temperature,
          maxCpu: row.max_cpu,
          maxMemory: row.max_memory,
          maxTemperature: row.max_temperature,
          sampleCount: row.sample_count,
        }));
    } catch (err) {
      this.logReadFailure(bucketSeconds === SECONDS_PER_HOUR ? 'hourlyAverages' : 'dailyAverages', err);
      return [];
    }
  }

  private scheduleDrain(): void {
    if (this.drainHandle) return;
    this.drainHandle = setImmediate(() => this.drain());
  }

  private drain(): void {
    this.drainHandle = null;
    const batch = this.pending;
    this.pending = [];

    if (batch.length > 0 && !this.closed) {
      try {
        this.insertBatch(batch);
      } catch (err) {
        this.droppedWrites += batch.length;
        const error = new PersistenceWriteError(errorMessage(err));
        this.logger.warn({ err: error, dropped: batch.length }, 'Snapshot write failed, dropping batch');
      }
    }

    if (this.pending.length > 0) {
      this.scheduleDrain();
    } else {
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private logReadFailure(operation: string, err: unknown): void {
    const error = new PersistenceReadError(`${operation} failed: ${errorMessage(err)}`);
    this.logger.warn({ err: error }, 'Snapshot read failed, returning empty result');
  }
}

function toEpochSeconds(date: Date): number {
  return date.getTime() / 1000;
}

function fromEpochSeconds(seconds: number): Date {
  return new Date(Math.round(seconds * 1000));
}

function toRow(snapshot: Snapshot, context: SnapshotContext): InsertParams {
  return {
    timestamp: toEpochSeconds(snapshot.timestamp),
    cpu_usage: snapshot.cpuUsage,
    cpu_performance_cores: snapshot.cpuPerformanceCores,
    cpu_efficiency_cores: snapshot.cpuEfficiencyCores,
    cpu_core_count: snapshot.cpuCoreCount,
    memory_used: snapshot.memoryUsed,
    memory_total: snapshot.memoryTotal,
    memory_pressure: snapshot.memoryPressure,
    swap_used: snapshot.swapUsed,
    memory_wired: snapshot.memoryWired,
    memory_compressed: snapshot.memoryCompressed,
    gpu_usage: snapshot.gpuUsage,
    gpu_memory_used: snapshot.gpuMemoryUsed,
    gpu_temperature: snapshot.gpuTemperature,
    disk_read_rate: snapshot.diskReadRate,
    disk_write_rate: snapshot.diskWriteRate,
    disk_read_ops: snapshot.diskReadOps,
    disk_write_ops: snapshot.diskWriteOps,
    cpu_temperature: snapshot.cpuTemperature,
    fan_speed: snapshot.fanSpeed,
    thermal_state: snapshot.thermalState,
    network_bytes_in: snapshot.networkBytesIn,
    network_bytes_out: snapshot.networkBytesOut,
    unavailable: JSON.stringify(snapshot.unavailable),
    active_process_count: context.activeProcessCount ?? 0,
    top_processes: JSON.stringify(context.topProcesses ?? []),
  };
}

function parseUnavailable(raw: string): ProbeGroup[] {
  try {
    const parsed = unavailableGroupsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

export function fromRow(row: SnapshotRow): Snapshot {
  return {
    timestamp: fromEpochSeconds(row.timestamp),
    cpuUsage: row.cpu_usage,
    cpuPerformanceCores: row.cpu_performance_cores,
    cpuEfficiencyCores: row.cpu_efficiency_cores,
    cpuCoreCount: row.cpu_core_count,
    memoryUsed: row.memory_used,
    memoryTotal: row.memory_total,
    memoryPressure: memoryPressureSchema.catch('normal').parse(row.memory_pressure),
    swapUsed: row.swap_used,
    memoryWired: row.memory_wired,
    memoryCompressed: row.memory_compressed,
    gpuUsage: row.gpu_usage,
    gpuMemoryUsed: row.gpu_memory_used,
    gpuTemperature: row.gpu_temperature,
    diskReadRate: row.disk_read_rate,
    diskWriteRate: row.disk_write_rate,
    diskReadOps: row.disk_read_ops,
    diskWriteOps: row.disk_write_ops,
    cpuTemperature: row.cpu_temperature,
    fanSpeed: row.fan_speed,
    thermalState: thermalStateSchema.catch('nominal').parse(row.thermal_state),
    networkBytesIn: row.network_bytes_in,
    networkBytesOut: row.network_bytes_out,
    unavailable: parseUnavailable(row.unavailable),
  };
}
