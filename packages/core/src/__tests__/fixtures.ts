import { vi } from 'vitest';
import { BYTES_PER_GB, createEmptySnapshot } from '@vantage/shared';
import type {
  CpuReading,
  DiskReading,
  GpuReading,
  MemoryReading,
  NetworkReading,
  ProcessResourceSample,
  Snapshot,
  ThermalReading,
} from '@vantage/shared';
import type { ProbeSet } from '../metrics/MetricsCollector.js';

export const GB = BYTES_PER_GB;

export const cpuReading: CpuReading = { usage: 42, performanceCores: 50, efficiencyCores: 10, coreCount: 8 };
export const memoryReading: MemoryReading = {
  used: 8 * GB,
  total: 16 * GB,
  pressure: 'normal',
  swapUsed: 0,
  wired: 2 * GB,
  compressed: GB,
};
export const gpuReading: GpuReading = { usage: 12, memoryUsed: GB, temperature: 48 };
export const diskReading: DiskReading = { readRate: 3, writeRate: 1.5, readOps: 120, writeOps: 40 };
export const thermalReading: ThermalReading = {
  cpuTemperature: 61,
  gpuTemperature: 55,
  fanSpeed: 1800,
  state: 'nominal',
};
export const networkReading: NetworkReading = { bytesIn: 2048, bytesOut: 1024 };

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

export function createProbes(overrides: Partial<ProbeSet> = {}): ProbeSet {
  return {
    readCpu: vi.fn(() => cpuReading),
    readMemory: vi.fn(() => memoryReading),
    readGpu: vi.fn(() => gpuReading),
    readDisk: vi.fn(() => diskReading),
    readThermal: vi.fn(() => thermalReading),
    readNetwork: vi.fn(() => networkReading),
    listProcesses: vi.fn(() => [makeProcess()]),
    ...overrides,
  };
}

export function makeSnapshot(timestamp: Date, overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    ...createEmptySnapshot(timestamp),
    cpuCoreCount: 8,
    memoryTotal: 16 * GB,
    memoryUsed: 8 * GB,
    ...overrides,
  };
}
