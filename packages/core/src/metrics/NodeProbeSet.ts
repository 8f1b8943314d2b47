import { cpus, freemem, totalmem } from 'node:os';
import type { CpuInfo } from 'node:os';
import { ProbeUnavailableError } from '@vantage/shared';
import type {
  CpuReading,
  DiskReading,
  GpuReading,
  MemoryPressure,
  MemoryReading,
  NetworkReading,
  ProcessResourceSample,
  ThermalReading,
} from '@vantage/shared';
import type { ProbeSet } from './MetricsCollector.js';

export interface OsReader {
  cpus(): CpuInfo[];
  totalmem(): number;
  freemem(): number;
}

export interface NodeProbeSetOptions {
  os?: OsReader;
  /** Supplies per-process samples. Without one the processes group is unavailable. */
  processSource?: () => ProcessResourceSample[] | Promise<ProcessResourceSample[]>;
}

const MEMORY_WARNING_PERCENT = 75;
const MEMORY_CRITICAL_PERCENT = 90;

export function memoryPressureFor(usedPercent: number): MemoryPressure {
  if (usedPercent >= MEMORY_CRITICAL_PERCENT) return 'critical';
  if (usedPercent >= MEMORY_WARNING_PERCENT) return 'warning';
  return 'normal';
}

/**
 * Portable probes backed by `node:os`. CPU and memory are real readings;
 * GPU, disk, thermal and network have no portable source and report
 * themselves unavailable.
 */
export class NodeProbeSet implements ProbeSet {
  private readonly os: OsReader;
  private readonly processSource: NodeProbeSetOptions['processSource'];
  private lastCpuTimes: { idle: number; total: number }[] = [];

  constructor(options: NodeProbeSetOptions = {}) {
    this.os = options.os ?? { cpus, totalmem, freemem };
    this.processSource = options.processSource;
    this.lastCpuTimes = this.os.cpus().map(cpuTimes);
  }

  readCpu(): CpuReading {
    const cpuInfo = this.os.cpus();
    if (cpuInfo.length === 0) {
      throw new ProbeUnavailableError('cpu', 'no CPU information reported');
    }

    const perCore = this.calculateCpuUsage(cpuInfo);
    const usage = Math.round((perCore.reduce((a, b) => a + b, 0) / perCore.length) * 100) / 100;

    // Node cannot tell core classes apart, so every core counts as a performance core
    return {
      usage,
      performanceCores: usage,
      efficiencyCores: 0,
      coreCount: cpuInfo.length,
    };
  }

  readMemory(): MemoryReading {
    const total = this.os.totalmem();
    if (total <= 0) {
      throw new ProbeUnavailableError('memory', 'total memory reported as zero');
    }
    const used = total - this.os.freemem();

    return {
      used,
      total,
      pressure: memoryPressureFor((used / total) * 100),
      swapUsed: 0,
      wired: 0,
      compressed: 0,
    };
  }

  readGpu(): GpuReading {
    throw new ProbeUnavailableError('gpu', 'no portable source');
  }

  readDisk(): DiskReading {
    throw new ProbeUnavailableError('disk', 'no portable source');
  }

  readThermal(): ThermalReading {
    throw new ProbeUnavailableError('thermal', 'no portable source');
  }

  readNetwork(): NetworkReading {
    throw new ProbeUnavailableError('network', 'no portable source');
  }

  async listProcesses(): Promise<ProcessResourceSample[]> {
    if (!this.processSource) {
      throw new ProbeUnavailableError('processes', 'no process source configured');
    }
    return this.processSource();
  }

  private calculateCpuUsage(cpuInfo: readonly CpuInfo[]): number[] {
    const usage: number[] = [];

    for (let i = 0; i < cpuInfo.length; i++) {
      const current = cpuTimes(cpuInfo[i]);
      const last = this.lastCpuTimes[i];
      if (last) {
        const totalDiff = current.total - last.total;
        const idleDiff = current.idle - last.idle;
        usage.push(totalDiff > 0 ? ((totalDiff - idleDiff) / totalDiff) * 100 : 0);
      } else {
        usage.push(0);
      }
      this.lastCpuTimes[i] = current;
    }

    return usage;
  }
}

function cpuTimes(cpu: CpuInfo): { idle: number; total: number } {
  const { user, nice, sys, idle, irq } = cpu.times;
  return { idle, total: user + nice + sys + idle + irq };
}
