import { describe, it, expect, vi } from 'vitest';
import type { CpuInfo } from 'node:os';
import { ProbeUnavailableError } from '@vantage/shared';
import { NodeProbeSet, memoryPressureFor } from '../metrics/NodeProbeSet.js';
import type { OsReader } from '../metrics/NodeProbeSet.js';
import { GB, makeProcess } from './fixtures.js';

function core(user: number, sys: number, idle: number): CpuInfo {
  return { model: 'Test CPU', speed: 3200, times: { user, nice: 0, sys, idle, irq: 0 } };
}

function createOs(overrides: Partial<OsReader> = {}): OsReader {
  return {
    cpus: vi.fn(() => [core(100, 100, 800), core(0, 0, 1000)]),
    totalmem: vi.fn(() => 16 * GB),
    freemem: vi.fn(() => 8 * GB),
    ...overrides,
  };
}

describe('memoryPressureFor', () => {
  it('should classify usage against the warning and critical thresholds', () => {
    expect(memoryPressureFor(74.9)).toBe('normal');
    expect(memoryPressureFor(75)).toBe('warning');
    expect(memoryPressureFor(89.9)).toBe('warning');
    expect(memoryPressureFor(90)).toBe('critical');
  });
});

describe('NodeProbeSet', () => {
  describe('readCpu', () => {
    it('should compute usage from time deltas since the previous reading', () => {
      const cpus = vi
        .fn<() => CpuInfo[]>()
        .mockReturnValueOnce([core(100, 100, 800), core(0, 0, 1000)])
        .mockReturnValueOnce([core(200, 200, 1000), core(100, 0, 1300)]);
      const probes = new NodeProbeSet({ os: createOs({ cpus }) });

      expect(probes.readCpu()).toEqual({
        usage: 37.5,
        performanceCores: 37.5,
        efficiencyCores: 0,
        coreCount: 2,
      });
    });

    it('should report zero for a core with no elapsed time', () => {
      const probes = new NodeProbeSet({ os: createOs() });
      expect(probes.readCpu().usage).toBe(0);
    });

    it('should be unavailable when no cores are reported', () => {
      const probes = new NodeProbeSet({ os: createOs({ cpus: vi.fn(() => []) }) });
      expect(() => probes.readCpu()).toThrow(ProbeUnavailableError);
    });
  });

  describe('readMemory', () => {
    it('should derive used bytes and pressure', () => {
      const probes = new NodeProbeSet({ os: createOs({ freemem: vi.fn(() => 2 * GB) }) });

      expect(probes.readMemory()).toEqual({
        used: 14 * GB,
        total: 16 * GB,
        pressure: 'warning',
        swapUsed: 0,
        wired: 0,
        compressed: 0,
      });
    });

    it('should report critical pressure above 90%', () => {
      const probes = new NodeProbeSet({ os: createOs({ freemem: vi.fn(() => GB) }) });
      expect(probes.readMemory().pressure).toBe('critical');
    });

    it('should be unavailable when total memory is zero', () => {
      const probes = new NodeProbeSet({ os: createOs({ totalmem: vi.fn(() => 0) }) });
      expect(() => probes.readMemory()).toThrow(ProbeUnavailableError);
    });
  });

  describe('groups without a portable source', () => {
    const cases: [string, (p: NodeProbeSet) => unknown][] = [
      ['gpu', (p) => p.readGpu()],
      ['disk', (p) => p.readDisk()],
      ['thermal', (p) => p.readThermal()],
      ['network', (p) => p.readNetwork()],
    ];

    it.each(cases)('should report %s as unavailable', (group, read) => {
      const probes = new NodeProbeSet({ os: createOs() });
      try {
        read(probes);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ProbeUnavailableError);
        if (err instanceof ProbeUnavailableError) {
          expect(err.probe).toBe(group);
        }
      }
    });
  });

  describe('listProcesses', () => {
    it('should reject without a process source', async () => {
      const probes = new NodeProbeSet({ os: createOs() });
      await expect(probes.listProcesses()).rejects.toThrow('Probe unavailable: processes (no process source configured)');
    });

    it('should delegate to the injected process source', async () => {
      const processes = [makeProcess({ name: 'Safari' })];
      const probes = new NodeProbeSet({ os: createOs(), processSource: () => processes });

      await expect(probes.listProcesses()).resolves.toEqual(processes);
    });
  });
});
