import {
  DEFAULT_COLLECT_INTERVAL,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_PERSIST_INTERVAL,
  displayName,
  errorMessage,
  getLogger,
  memoryUsagePercent,
  parseDuration,
  totalDiskRate,
} from '@vantage/shared';
import type {
  CpuReading,
  DiskReading,
  GpuReading,
  Logger,
  MemoryReading,
  NetworkReading,
  ProbeGroup,
  ProcessResourceSample,
  Snapshot,
  ThermalReading,
  TrendDirection,
} from '@vantage/shared';
import type { EventBus } from '../events/EventBus.js';
import type { SnapshotContext } from '../db/repositories/SnapshotRepository.js';

type MaybePromise<T> = T | Promise<T>;

/**
 * Source of raw readings. Any method may throw; the collector substitutes
 * a default for that group and records it in `Snapshot.unavailable`.
 */
export interface ProbeSet {
  readCpu(signal: AbortSignal): MaybePromise<CpuReading>;
  readMemory(signal: AbortSignal): MaybePromise<MemoryReading>;
  readGpu(signal: AbortSignal): MaybePromise<GpuReading>;
  readDisk(signal: AbortSignal): MaybePromise<DiskReading>;
  readThermal(signal: AbortSignal): MaybePromise<ThermalReading>;
  readNetwork(signal: AbortSignal): MaybePromise<NetworkReading>;
  listProcesses(signal: AbortSignal): MaybePromise<ProcessResourceSample[]>;
}

export interface SnapshotSink {
  save(snapshot: Snapshot, context?: SnapshotContext): void;
}

export type CollectorMetric = 'cpu' | 'memory' | 'gpu' | 'temperature' | 'disk';

export interface MetricsCollectorOptions {
  /** Milliseconds between ticks. */
  interval?: number;
  historyLimit?: number;
  /** Milliseconds between hand-offs to the sink. */
  persistInterval?: number;
  sink?: SnapshotSink | null;
  logger?: Logger;
}

const PROBE_ORDER: readonly ProbeGroup[] = ['cpu', 'memory', 'gpu', 'disk', 'thermal', 'network', 'processes'];
const TREND_SAMPLES = 10;
const TREND_MIN_SAMPLES = 5;
const TREND_THRESHOLD = 5;
const PERSISTED_TOP_PROCESSES = 5;

interface Sample {
  snapshot: Snapshot;
  processes: ProcessResourceSample[];
}

export class MetricsCollector {
  private readonly probes: ProbeSet;
  private readonly eventBus: EventBus;
  private readonly interval: number;
  private readonly historyLimit: number;
  private readonly persistInterval: number;
  private readonly sink: SnapshotSink | null;
  private readonly logger: Logger;

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;
  private controller: AbortController | null = null;

  private latest: Snapshot | null = null;
  private processes: ProcessResourceSample[] = [];
  private buffer: Snapshot[] = [];
  private lastMemoryTotal = 0;
  private lastPersistedAt: number | null = null;
  private skipped = 0;

  constructor(probes: ProbeSet, eventBus: EventBus, options: MetricsCollectorOptions = {}) {
    this.probes = probes;
    this.eventBus = eventBus;
    this.interval = options.interval ?? parseDuration(DEFAULT_COLLECT_INTERVAL);
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.persistInterval = options.persistInterval ?? parseDuration(DEFAULT_PERSIST_INTERVAL);
    this.sink = options.sink ?? null;
    this.logger = options.logger ?? getLogger();
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.tick();
    this.timer = setInterval(() => this.tick(), this.interval);
    this.timer.unref();
    this.logger.info({ interval: this.interval }, 'Metrics collector started');
  }

  /** No snapshot is published, stored or persisted after this returns. */
  stop(): void {
    const wasRunning = this.running;
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    this.controller = null;
    this.inFlight = null;
    if (wasRunning) {
      this.logger.info({ skippedTicks: this.skipped }, 'Metrics collector stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Take one sample now, outside the schedule. Joins the in-flight sample
   * when there is one.
   */
  async refresh(): Promise<Snapshot | null> {
    await (this.inFlight ?? this.runSample());
    return this.latest;
  }

  getLatest(): Snapshot | null {
    return this.latest;
  }

  getProcesses(): ProcessResourceSample[] {
    return [...this.processes];
  }

  /** Buffered snapshots, oldest first. */
  history(): Snapshot[] {
    return [...this.buffer];
  }

  get skippedTicks(): number {
    return this.skipped;
  }

  averageOf(metric: CollectorMetric, window: number = 15): number {
    const recent = this.buffer.slice(-window);
    if (recent.length === 0) return 0;
    return recent.reduce((sum, s) => sum + metricValue(s, metric), 0) / recent.length;
  }

  trendOf(metric: CollectorMetric): TrendDirection {
    const recent = this.buffer.slice(-TREND_SAMPLES).map((s) => metricValue(s, metric));
    if (recent.length < TREND_MIN_SAMPLES) return 'stable';

    const half = Math.floor(recent.length / 2);
    const first = average(recent.slice(0, half));
    const second = average(recent.slice(half));
    const diff = second - first;

    if (diff > TREND_THRESHOLD) return 'increasing';
    if (diff < -TREND_THRESHOLD) return 'decreasing';
    return 'stable';
  }

  private tick(): void {
    if (!this.running) return;
    if (this.inFlight) {
      this.skipped++;
      this.logger.debug({ skippedTicks: this.skipped }, 'Previous sample still running, skipping tick');
      return;
    }
    this.runSample().catch((err) => {
      this.logger.error({ err: errorMessage(err) }, 'Metrics sample failed');
    });
  }

  private runSample(): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;

    const run = this.collect(controller.signal)
      .then((sample) => {
        if (controller.signal.aborted) return;
        this.publish(sample);
      })
      .finally(() => {
        if (this.inFlight === run) this.inFlight = null;
        if (this.controller === controller) this.controller = null;
      });

    this.inFlight = run;
    return run;
  }

  private async collect(signal: AbortSignal): Promise<Sample> {
    const timestamp = new Date();
    const failed = new Set<ProbeGroup>();

    const read = async <T>(group: ProbeGroup, probe: () => MaybePromise<T>, fallback: T): Promise<T> => {
      try {
        return await probe();
      } catch (err) {
        failed.add(group);
        this.logger.debug({ probe: group, err: errorMessage(err) }, 'Probe failed, using default');
        return fallback;
      }
    };

    const [cpu, memory, gpu, disk, thermal, network, processes] = await Promise.all([
      read<CpuReading>('cpu', () => this.probes.readCpu(signal), {
        usage: 0,
        performanceCores: 0,
        efficiencyCores: 0,
        coreCount: 0,
      }),
      read<MemoryReading>('memory', () => this.probes.readMemory(signal), {
        used: 0,
        total: this.lastMemoryTotal,
        pressure: 'normal',
        swapUsed: 0,
        wired: 0,
        compressed: 0,
      }),
      read<GpuReading>('gpu', () => this.probes.readGpu(signal), { usage: 0, memoryUsed: 0, temperature: 0 }),
      read<DiskReading>('disk', () => this.probes.readDisk(signal), { readRate: 0, writeRate: 0, readOps: 0, writeOps: 0 }),
      read<ThermalReading>('thermal', () => this.probes.readThermal(signal), {
        cpuTemperature: 0,
        gpuTemperature: 0,
        fanSpeed: 0,
        state: 'nominal',
      }),
      read<NetworkReading>('network', () => this.probes.readNetwork(signal), { bytesIn: 0, bytesOut: 0 }),
      read<ProcessResourceSample[]>('processes', () => this.probes.listProcesses(signal), []),
    ]);

    const snapshot: Snapshot = {
      timestamp,
      cpuUsage: cpu.usage,
      cpuPerformanceCores: cpu.performanceCores,
      cpuEfficiencyCores: cpu.efficiencyCores,
      cpuCoreCount: cpu.coreCount,
      memoryUsed: memory.used,
      memoryTotal: memory.total,
      memoryPressure: memory.pressure,
      swapUsed: memory.swapUsed,
      memoryWired: memory.wired,
      memoryCompressed: memory.compressed,
      gpuUsage: gpu.usage,
      gpuMemoryUsed: gpu.memoryUsed,
      // The GPU probe owns its temperature; fall back to the thermal sensor
      gpuTemperature: failed.has('gpu') ? thermal.gpuTemperature : gpu.temperature,
      diskReadRate: disk.readRate,
      diskWriteRate: disk.writeRate,
      diskReadOps: disk.readOps,
      diskWriteOps: disk.writeOps,
      cpuTemperature: thermal.cpuTemperature,
      fanSpeed: thermal.fanSpeed,
      thermalState: thermal.state,
      networkBytesIn: network.bytesIn,
      networkBytesOut: network.bytesOut,
      unavailable: PROBE_ORDER.filter((group) => failed.has(group)),
    };

    return { snapshot, processes };
  }

  private publish({ snapshot, processes }: Sample): void {
    if (!snapshot.unavailable.includes('memory')) {
      this.lastMemoryTotal = snapshot.memoryTotal;
    }

    this.latest = snapshot;
    this.processes = processes;
    this.buffer.push(snapshot);
    if (this.buffer.length > this.historyLimit) {
      this.buffer.splice(0, this.buffer.length - this.historyLimit);
    }

    this.persist(snapshot, processes);
    this.eventBus.emit('metric:snapshot', { snapshot, processes: [...processes] });
  }

  private persist(snapshot: Snapshot, processes: readonly ProcessResourceSample[]): void {
    if (!this.sink) return;

    const now = snapshot.timestamp.getTime();
    if (this.lastPersistedAt !== null && now - this.lastPersistedAt < this.persistInterval) return;
    this.lastPersistedAt = now;

    const topProcesses = [...processes]
      .sort((a, b) => b.cpuUsage - a.cpuUsage)
      .slice(0, PERSISTED_TOP_PROCESSES)
      .map(displayName);

    this.sink.save(snapshot, { activeProcessCount: processes.length, topProcesses });
  }
}

function metricValue(snapshot: Snapshot, metric: CollectorMetric): number {
  switch (metric) {
    case 'cpu':
      return snapshot.cpuUsage;
    case 'memory':
      return memoryUsagePercent(snapshot);
    case 'gpu':
      return snapshot.gpuUsage;
    case 'temperature':
      return snapshot.cpuTemperature;
    case 'disk':
      return totalDiskRate(snapshot);
  }
}

function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}
