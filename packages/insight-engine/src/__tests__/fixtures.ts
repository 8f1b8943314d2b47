import { createEmptySnapshot, BYTES_PER_GB } from '@vantage/shared';
import type { HourlyAggregate, ProcessResourceSample, Snapshot } from '@vantage/shared';

export const GB = BYTES_PER_GB;

export function makeSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    ...createEmptySnapshot(new Date('2026-03-02T10:00:00Z')),
    cpuCoreCount: 8,
    memoryTotal: 16 * GB,
    memoryUsed: 8 * GB,
    ...overrides,
  };
}

export function makeProcess(overrides: Partial<ProcessResourceSample> = {}): ProcessResourceSample {
  return {
    pid: 100,
    name: 'Worker',
    category: 'other',
    cpuUsage: 0,
    memoryUsage: 0,
    diskReadBytes: 0,
    diskWriteBytes: 0,
    networkBytesIn: 0,
    networkBytesOut: 0,
    ...overrides,
  };
}

export function makeAggregate(bucket: Date, overrides: Partial<HourlyAggregate> = {}): HourlyAggregate {
  return {
    bucket,
    avgCpu: 0,
    avgMemory: 0,
    avgMemoryPercent: 0,
    avgGpu: 0,
    avgTemperature: 0,
    maxCpu: 0,
    maxMemory: 0,
    maxTemperature: 0,
    sampleCount: 1,
    ...overrides,
  };
}
