import type { Severity, SystemStatus } from '../types/insight.js';
import type { Snapshot } from '../types/metrics.js';

export const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

/**
 * Comparator that orders the more severe item first.
 */
export function compareSeverityDesc(a: { severity: Severity }, b: { severity: Severity }): number {
  return SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
}

export function isMoreSevere(a: Severity, b: Severity): boolean {
  return SEVERITY_RANK[a] > SEVERITY_RANK[b];
}

export function statusFromSeverities(severities: Iterable<Severity>): SystemStatus {
  let status: SystemStatus = 'normal';
  for (const severity of severities) {
    if (severity === 'critical') return 'critical';
    if (severity === 'warning') status = 'warning';
  }
  return status;
}

/**
 * Used memory as a percentage of total, 0 when the total is unknown.
 */
export function memoryUsagePercent(snapshot: Pick<Snapshot, 'memoryUsed' | 'memoryTotal'>): number {
  if (snapshot.memoryTotal <= 0) return 0;
  const percent = (snapshot.memoryUsed / snapshot.memoryTotal) * 100;
  return Math.min(100, Math.max(0, percent));
}

export function totalDiskRate(snapshot: Pick<Snapshot, 'diskReadRate' | 'diskWriteRate'>): number {
  return snapshot.diskReadRate + snapshot.diskWriteRate;
}

/** A snapshot with every field at its default value. */
export function createEmptySnapshot(timestamp: Date = new Date()): Snapshot {
  return {
    timestamp,
    cpuUsage: 0,
    cpuPerformanceCores: 0,
    cpuEfficiencyCores: 0,
    cpuCoreCount: 0,
    memoryUsed: 0,
    memoryTotal: 0,
    memoryPressure: 'normal',
    swapUsed: 0,
    memoryWired: 0,
    memoryCompressed: 0,
    gpuUsage: 0,
    gpuMemoryUsed: 0,
    gpuTemperature: 0,
    diskReadRate: 0,
    diskWriteRate: 0,
    diskReadOps: 0,
    diskWriteOps: 0,
    cpuTemperature: 0,
    fanSpeed: 0,
    thermalState: 'nominal',
    networkBytesIn: 0,
    networkBytesOut: 0,
    unavailable: [],
  };
}
