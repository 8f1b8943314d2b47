export type MemoryPressure = 'normal' | 'warning' | 'critical';

export type ThermalState = 'nominal' | 'fair' | 'serious' | 'critical';

/** Probe groups that can fail independently during a collection tick. */
export type ProbeGroup = 'cpu' | 'memory' | 'gpu' | 'disk' | 'thermal' | 'network' | 'processes';

export interface Snapshot {
  readonly timestamp: Date;

  // CPU
  readonly cpuUsage: number;
  readonly cpuPerformanceCores: number;
  readonly cpuEfficiencyCores: number;
  readonly cpuCoreCount: number;

  // Memory (bytes)
  readonly memoryUsed: number;
  readonly memoryTotal: number;
  readonly memoryPressure: MemoryPressure;
  readonly swapUsed: number;
  readonly memoryWired: number;
  readonly memoryCompressed: number;

  // GPU
  readonly gpuUsage: number;
  readonly gpuMemoryUsed: number;
  readonly gpuTemperature: number;

  // Disk (rates in MB/s)
  readonly diskReadRate: number;
  readonly diskWriteRate: number;
  readonly diskReadOps: number;
  readonly diskWriteOps: number;

  // Thermal
  readonly cpuTemperature: number;
  readonly fanSpeed: number;
  readonly thermalState: ThermalState;

  // Network (bytes/sec)
  readonly networkBytesIn: number;
  readonly networkBytesOut: number;

  /**
   * Probe groups whose reading failed and were replaced by defaults.
   * A zero in a group listed here is a placeholder, not a measurement.
   */
  readonly unavailable: readonly ProbeGroup[];
}

export interface CpuReading {
  usage: number;
  performanceCores: number;
  efficiencyCores: number;
  coreCount: number;
}

export interface MemoryReading {
  used: number;
  total: number;
  pressure: MemoryPressure;
  swapUsed: number;
  wired: number;
  compressed: number;
}

export interface GpuReading {
  usage: number;
  memoryUsed: number;
  temperature: number;
}

export interface DiskReading {
  readRate: number;
  writeRate: number;
  readOps: number;
  writeOps: number;
}

export interface ThermalReading {
  cpuTemperature: number;
  gpuTemperature: number;
  fanSpeed: number;
  state: ThermalState;
}

export interface NetworkReading {
  bytesIn: number;
  bytesOut: number;
}

export type TrendDirection = 'increasing' | 'stable' | 'decreasing';
