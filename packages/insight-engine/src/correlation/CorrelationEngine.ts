import { nanoid } from 'nanoid';
import { displayName, formatGigabytes, totalDiskBytes, totalDiskRate, BYTES_PER_GB, BYTES_PER_MB } from '@vantage/shared';
import type { Correlation, ProcessResourceSample, Snapshot } from '@vantage/shared';

const CPU_TRIGGER = 50;
const DISK_TRIGGER = 50;

const CPU_TOP_K = 5;
const MEMORY_TOP_K = 5;
const DISK_TOP_K = 3;

const CPU_FLOOR = 10;
const MEMORY_FLOOR_RATIO = 0.05;
const DISK_FLOOR_BYTES = 10_000_000;

/**
 * Attributes an elevated aggregate metric to the processes most likely
 * responsible for it.
 */
export class CorrelationEngine {
  correlate(snapshot: Snapshot, processes: readonly ProcessResourceSample[]): Correlation[] {
    const correlations: Correlation[] = [];

    if (snapshot.cpuUsage > CPU_TRIGGER) {
      correlations.push(...this.correlateCpu(snapshot, processes));
    }

    if (snapshot.memoryPressure !== 'normal') {
      correlations.push(...this.correlateMemory(snapshot, processes));
    }

    if (totalDiskRate(snapshot) > DISK_TRIGGER) {
      correlations.push(...this.correlateDisk(snapshot, processes));
    }

    return correlations;
  }

  private correlateCpu(snapshot: Snapshot, processes: readonly ProcessResourceSample[]): Correlation[] {
    return topBy(processes, (p) => p.cpuUsage, CPU_TOP_K)
      .filter((p) => p.cpuUsage >= CPU_FLOOR)
      .map((process) => ({
        id: nanoid(),
        sourceMetric: 'cpu' as const,
        targetProcess: process,
        strength: clampStrength(process.cpuUsage / snapshot.cpuUsage),
        description: describeCpuUsage(process),
        timestamp: snapshot.timestamp,
      }));
  }

  private correlateMemory(snapshot: Snapshot, processes: readonly ProcessResourceSample[]): Correlation[] {
    if (snapshot.memoryTotal <= 0) return [];

    return topBy(processes, (p) => p.memoryUsage, MEMORY_TOP_K)
      .filter((p) => p.memoryUsage / snapshot.memoryTotal >= MEMORY_FLOOR_RATIO)
      .map((process) => ({
        id: nanoid(),
        sourceMetric: 'memory' as const,
        targetProcess: process,
        strength: snapshot.memoryUsed > 0 ? clampStrength(process.memoryUsage / snapshot.memoryUsed) : 0,
        description: describeMemoryUsage(process, process.memoryUsage / snapshot.memoryTotal),
        timestamp: snapshot.timestamp,
      }));
  }

  private correlateDisk(snapshot: Snapshot, processes: readonly ProcessResourceSample[]): Correlation[] {
    const totalBytes = processes.reduce((sum, p) => sum + totalDiskBytes(p), 0);
    if (totalBytes <= 0) return [];

    return topBy(processes, totalDiskBytes, DISK_TOP_K)
      .filter((p) => totalDiskBytes(p) >= DISK_FLOOR_BYTES)
      .map((process) => ({
        id: nanoid(),
        sourceMetric: 'disk' as const,
        targetProcess: process,
        strength: clampStrength(totalDiskBytes(process) / totalBytes),
        description: describeDiskUsage(process),
        timestamp: snapshot.timestamp,
      }));
  }
}

function topBy(
  processes: readonly ProcessResourceSample[],
  key: (process: ProcessResourceSample) => number,
  limit: number,
): ProcessResourceSample[] {
  return [...processes].sort((a, b) => key(b) - key(a)).slice(0, limit);
}

function clampStrength(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(value, 1);
}

function isSpotlight(name: string): boolean {
  return name.includes('mds') || name.includes('Spotlight');
}

export function describeCpuUsage(process: ProcessResourceSample): string {
  const name = displayName(process);
  const usage = Math.trunc(process.cpuUsage);
  const lower = name.toLowerCase();

  switch (process.category) {
    case 'browser':
      return `${name} is using ${usage}% CPU, likely from many open tabs or extensions`;
    case 'developer':
      if (lower.includes('xcode')) {
        return `${name} is using ${usage}% CPU, probably building or indexing`;
      }
      if (lower.includes('docker')) {
        return `Docker is using ${usage}% CPU with active containers`;
      }
      break;
    case 'system':
      if (name === 'kernel_task') {
        return `kernel_task is using ${usage}% CPU, the system may be thermal throttling`;
      }
      if (isSpotlight(name)) {
        return `Spotlight is indexing, using ${usage}% CPU`;
      }
      break;
    default:
      break;
  }

  return `${name} is using ${usage}% CPU`;
}

export function describeMemoryUsage(process: ProcessResourceSample, ratio: number): string {
  const name = displayName(process);
  if (process.memoryUsage >= BYTES_PER_GB) {
    return `${name} is holding ${formatGigabytes(process.memoryUsage)} RAM (${Math.trunc(ratio * 100)}% of total memory)`;
  }
  return `${name} is using ${Math.trunc(process.memoryUsage / BYTES_PER_MB)}MB RAM`;
}

export function describeDiskUsage(process: ProcessResourceSample): string {
  const name = displayName(process);

  if (isSpotlight(name)) {
    return 'Spotlight is indexing files, causing heavy disk I/O';
  }
  if (name.includes('backupd') || name.includes('Time Machine')) {
    return 'Time Machine is backing up, disk I/O will stay high for a short while';
  }
  if (name.includes('bird') || name.includes('cloudd')) {
    return 'iCloud is syncing files, which can cause disk I/O';
  }

  return `${name} is reading and writing heavily to disk`;
}
