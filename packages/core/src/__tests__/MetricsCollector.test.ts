import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, ProbeUnavailableError } from '@vantage/shared';
import type { CpuReading } from '@vantage/shared';
import { EventBus } from '../events/EventBus.js';
import { MetricsCollector } from '../metrics/MetricsCollector.js';
import type { ProbeSet, SnapshotSink } from '../metrics/MetricsCollector.js';
import { GB, cpuReading, createProbes, makeProcess, memoryReading } from './fixtures.js';

const logger = createLogger({ level: 'silent' });

function cpuAt(usage: number): CpuReading {
  return { ...cpuReading, usage };
}

describe('MetricsCollector', () => {
  let eventBus: EventBus;
  let probes: ProbeSet;
  let collector: MetricsCollector;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-02T10:00:00Z'));
    eventBus = new EventBus();
    probes = createProbes();
  });

  afterEach(() => {
    collector?.stop();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('should sample immediately', async () => {
      collector = new MetricsCollector(probes, eventBus, { interval: 1000, logger });
      collector.start();
      await collector.refresh();

      const latest = collector.getLatest();
      expect(latest?.cpuUsage).toBe(42);
      expect(latest?.memoryTotal).toBe(16 * GB);
      expect(latest?.gpuTemperature).toBe(48);
      expect(latest?.unavailable).toEqual([]);
      expect(collector.isRunning()).toBe(true);
      expect(probes.readCpu).toHaveBeenCalledOnce();
    });

    it('should be idempotent', async () => {
      collector = new MetricsCollector(probes, eventBus, { interval: 1000, logger });
      collector.start();
      collector.start();
      await collector.refresh();

      expect(probes.readCpu).toHaveBeenCalledOnce();
    });

    it('should sample on every interval', async () => {
      collector = new MetricsCollector(probes, eventBus, { interval: 1000, logger });
      collector.start();
      await collector.refresh();

      await vi.advanceTimersByTimeAsync(1000);
      await vi.advanceTimersByTimeAsync(1000);

      expect(collector.history()).toHaveLength(3);
    });

    it('should keep the interval schedule across an out-of-band refresh', async () => {
      collector = new MetricsCollector(probes, eventBus, { interval: 1000, logger });
      collector.start();
      await collector.refresh();

      await vi.advanceTimersByTimeAsync(500);
      await collector.refresh();
      await vi.advanceTimersByTimeAsync(500);

      expect(collector.history().map((s) => s.timestamp.toISOString())).toEqual([
        '2026-03-02T10:00:00.000Z',
        '2026-03-02T10:00:00.500Z',
        '2026-03-02T10:00:01.000Z',
      ]);
    });

    it('should pass an abort signal to every probe', async () => {
      collector = new MetricsCollector(probes, eventBus, { logger });
      await collector.refresh();

      expect(probes.readCpu).toHaveBeenCalledWith(expect.any(AbortSignal));
      expect(probes.listProcesses).toHaveBeenCalledWith(expect.any(AbortSignal));
    });
  });

  describe('overlapping ticks', () => {
    it('should skip a tick while the previous sample is still running', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      probes = createProbes({
        readCpu: vi.fn(async () => {
          await gate;
          return cpuReading;
        }),
      });
      collector = new MetricsCollector(probes, eventBus, { interval: 1000, logger });

      collector.start();
      await vi.advanceTimersByTimeAsync(1000);
      await vi.advanceTimersByTimeAsync(1000);

      expect(collector.skippedTicks).toBe(2);
      expect(collector.history()).toHaveLength(0);

      release();
      await collector.refresh();

      expect(collector.history()).toHaveLength(1);
      expect(probes.readCpu).toHaveBeenCalledOnce();
    });
  });

  describe('stop', () => {
    it('should discard a sample that completes after stop', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const sink: SnapshotSink = { save: vi.fn() };
      const handler = vi.fn();
      const signals: AbortSignal[] = [];
      eventBus.on('metric:snapshot', handler);
      probes = createProbes({
        readCpu: vi.fn(async (signal: AbortSignal) => {
          signals.push(signal);
          await gate;
          return cpuReading;
        }),
      });
      collector = new MetricsCollector(probes, eventBus, { interval: 1000, sink, logger });

      collector.start();
      collector.stop();
      release();
      await vi.advanceTimersByTimeAsync(0);

      expect(signals).toHaveLength(1);
      expect(signals[0].aborted).toBe(true);
      expect(collector.getLatest()).toBeNull();
      expect(collector.history()).toEqual([]);
      expect(handler).not.toHaveBeenCalled();
      expect(sink.save).not.toHaveBeenCalled();
      expect(collector.isRunning()).toBe(false);
    });

    it('should sample at once when restarted before the aborted sample settles', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      let calls = 0;
      probes = createProbes({
        readCpu: vi.fn(async () => {
          calls++;
          if (calls === 1) await gate;
          return cpuReading;
        }),
      });
      collector = new MetricsCollector(probes, eventBus, { interval: 60_000, logger });

      collector.start();
      collector.stop();
      collector.start();

      expect(collector.skippedTicks).toBe(0);
      expect(probes.readCpu).toHaveBeenCalledTimes(2);

      await collector.refresh();
      expect(collector.history()).toHaveLength(1);

      release();
      await vi.advanceTimersByTimeAsync(0);

      expect(collector.history()).toHaveLength(1);
      expect(collector.skippedTicks).toBe(0);
    });

    it('should not sample after stop', async () => {
      collector = new MetricsCollector(probes, eventBus, { interval: 1000, logger });
      collector.start();
      await collector.refresh();
      collector.stop();

      await vi.advanceTimersByTimeAsync(5000);

      expect(collector.history()).toHaveLength(1);
    });
  });

  describe('probe failures', () => {
    it('should default failed groups and list them as unavailable', async () => {
      probes = createProbes({
        readGpu: vi.fn(() => {
          throw new ProbeUnavailableError('gpu');
        }),
        readDisk: vi.fn(async () => {
          throw new Error('iostat exited');
        }),
      });
      collector = new MetricsCollector(probes, eventBus, { logger });

      const snapshot = await collector.refresh();

      expect(snapshot?.unavailable).toEqual(['gpu', 'disk']);
      expect(snapshot?.gpuUsage).toBe(0);
      expect(snapshot?.diskReadRate).toBe(0);
      expect(snapshot?.diskWriteOps).toBe(0);
      // GPU temperature falls back to the thermal sensor
      expect(snapshot?.gpuTemperature).toBe(55);
      expect(snapshot?.cpuUsage).toBe(42);
    });

    it('should keep the previous memory total when the memory probe fails', async () => {
      const readMemory = vi.fn(() => memoryReading);
      probes = createProbes({ readMemory });
      collector = new MetricsCollector(probes, eventBus, { logger });
      await collector.refresh();

      readMemory.mockImplementation(() => {
        throw new ProbeUnavailableError('memory');
      });
      const snapshot = await collector.refresh();

      expect(snapshot?.memoryTotal).toBe(16 * GB);
      expect(snapshot?.memoryUsed).toBe(0);
      expect(snapshot?.memoryPressure).toBe('normal');
      expect(snapshot?.unavailable).toEqual(['memory']);
    });

    it('should report a zero memory total when no reading ever succeeded', async () => {
      probes = createProbes({
        readMemory: vi.fn(() => {
          throw new ProbeUnavailableError('memory');
        }),
        readThermal: vi.fn(() => {
          throw new ProbeUnavailableError('thermal');
        }),
        listProcesses: vi.fn(() => {
          throw new ProbeUnavailableError('processes');
        }),
      });
      collector = new MetricsCollector(probes, eventBus, { logger });

      const snapshot = await collector.refresh();

      expect(snapshot?.memoryTotal).toBe(0);
      expect(snapshot?.thermalState).toBe('nominal');
      expect(snapshot?.unavailable).toEqual(['memory', 'thermal', 'processes']);
      expect(collector.getProcesses()).toEqual([]);
    });
  });

  describe('history', () => {
    it('should keep the most recent snapshots in ascending order', async () => {
      collector = new MetricsCollector(probes, eventBus, { historyLimit: 3, logger });

      for (let i = 0; i < 5; i++) {
        await collector.refresh();
        vi.advanceTimersByTime(1000);
      }

      expect(collector.history().map((s) => s.timestamp.toISOString())).toEqual([
        '2026-03-02T10:00:02.000Z',
        '2026-03-02T10:00:03.000Z',
        '2026-03-02T10:00:04.000Z',
      ]);
    });

    it('should return a copy', async () => {
      collector = new MetricsCollector(probes, eventBus, { logger });
      await collector.refresh();

      collector.history().pop();

      expect(collector.history()).toHaveLength(1);
    });
  });

  describe('publishing', () => {
    it('should emit each snapshot with its processes', async () => {
      const processes = [makeProcess({ name: 'Safari', cpuUsage: 12 })];
      probes = createProbes({ listProcesses: vi.fn(() => processes) });
      const handler = vi.fn();
      eventBus.on('metric:snapshot', handler);
      collector = new MetricsCollector(probes, eventBus, { logger });

      const snapshot = await collector.refresh();

      expect(handler).toHaveBeenCalledWith({ snapshot, processes });
      expect(collector.getProcesses()).toEqual(processes);
    });

    it('should hand snapshots to the sink once per persist interval', async () => {
      const sink: SnapshotSink = { save: vi.fn() };
      probes = createProbes({
        listProcesses: vi.fn(() => [
          makeProcess({ pid: 1, name: 'Safari', cpuUsage: 10 }),
          makeProcess({ pid: 2, name: 'Code Helper', cpuUsage: 50 }),
          makeProcess({ pid: 3, name: 'Xcode', cpuUsage: 30 }),
        ]),
      });
      collector = new MetricsCollector(probes, eventBus, { persistInterval: 5000, sink, logger });

      const first = await collector.refresh();
      vi.advanceTimersByTime(2000);
      await collector.refresh();
      vi.advanceTimersByTime(3000);
      await collector.refresh();

      expect(sink.save).toHaveBeenCalledTimes(2);
      expect(sink.save).toHaveBeenNthCalledWith(1, first, {
        activeProcessCount: 3,
        topProcesses: ['Code', 'Xcode', 'Safari'],
      });
    });
  });

  describe('averageOf and trendOf', () => {
    function collectorWithCpu(values: number[]): MetricsCollector {
      const readCpu = vi.fn(() => cpuReading);
      for (const value of values) readCpu.mockReturnValueOnce(cpuAt(value));
      probes = createProbes({ readCpu });
      return new MetricsCollector(probes, eventBus, { logger });
    }

    it('should average the most recent window', async () => {
      collector = collectorWithCpu([10, 10, 10, 30, 30, 30]);
      for (let i = 0; i < 6; i++) await collector.refresh();

      expect(collector.averageOf('cpu')).toBe(20);
      expect(collector.averageOf('cpu', 3)).toBe(30);
      expect(collector.averageOf('memory')).toBe(50);
    });

    it('should return 0 with no history', () => {
      collector = new MetricsCollector(probes, eventBus, { logger });
      expect(collector.averageOf('gpu')).toBe(0);
    });

    it('should detect a rising metric', async () => {
      collector = collectorWithCpu([10, 10, 10, 30, 30, 30]);
      for (let i = 0; i < 6; i++) await collector.refresh();

      expect(collector.trendOf('cpu')).toBe('increasing');
    });

    it('should detect a falling metric', async () => {
      collector = collectorWithCpu([80, 80, 80, 40, 40, 40]);
      for (let i = 0; i < 6; i++) await collector.refresh();

      expect(collector.trendOf('cpu')).toBe('decreasing');
    });

    it('should call small movements stable', async () => {
      collector = collectorWithCpu([40, 42, 41, 43, 42, 44]);
      for (let i = 0; i < 6; i++) await collector.refresh();

      expect(collector.trendOf('cpu')).toBe('stable');
    });

    it('should call fewer than five samples stable', async () => {
      collector = collectorWithCpu([10, 90, 90, 90]);
      for (let i = 0; i < 4; i++) await collector.refresh();

      expect(collector.trendOf('cpu')).toBe('stable');
    });
  });
});
