import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, resolveConfig, StoreInitializationError } from '@vantage/shared';
import type { InsightReport } from '@vantage/shared';
import { openDatabase } from '../db/Database.js';
import type { Database } from '../db/Database.js';
import { VantageMonitor } from '../daemon/VantageMonitor.js';
import type { VantageMonitorOptions } from '../daemon/VantageMonitor.js';
import { cpuReading, createProbes, makeProcess } from './fixtures.js';

const logger = createLogger({ level: 'silent' });

const config = resolveConfig({
  collector: { interval: '1h' },
  storage: { path: ':memory:', maintenance_interval: '1h' },
});

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('VantageMonitor', () => {
  let monitor: VantageMonitor | null = null;

  function createMonitor(options: VantageMonitorOptions = {}): VantageMonitor {
    monitor = new VantageMonitor({ config, probes: createProbes(), logger, ...options });
    return monitor;
  }

  afterEach(async () => {
    await monitor?.stop();
    monitor = null;
  });

  describe('start', () => {
    it('should open the store and begin sampling', async () => {
      const db = openDatabase(':memory:');
      const m = createMonitor({ openDatabase: () => db });

      await m.start();
      await m.refresh();
      await nextTurn();

      expect(m.getStatus()).toEqual({ running: true, storage: 'ready', systemStatus: 'normal' });
      expect(m.getLatestSnapshot()?.cpuUsage).toBe(42);
      expect(m.getHistory()).toHaveLength(1);
      expect(m.getTrendAnalyzer()).not.toBeNull();
      expect(m.getStoreStats()?.totalSnapshots).toBe(1);
    });

    it('should analyze every snapshot and publish the report', async () => {
      const probes = createProbes({
        readCpu: vi.fn(() => ({ ...cpuReading, usage: 97 })),
        listProcesses: vi.fn(() => [makeProcess({ pid: 321, name: 'Renderer', cpuUsage: 65 })]),
      });
      const m = createMonitor({ probes });
      const reports: InsightReport[] = [];
      m.getEventBus().on('insight:update', (report) => reports.push(report));

      await m.start();
      await m.refresh();

      expect(reports).toHaveLength(1);
      expect(reports[0].status).toBe('critical');
      expect(m.getStatus().systemStatus).toBe('critical');
      expect(m.getInsights().map((i) => i.type)).toEqual(['cpu-saturation']);
      expect(m.getCorrelations()[0]?.targetProcess.pid).toBe(321);
      expect(m.getAnomalies()).toEqual([]);
    });

    it('should run in degraded mode when the store cannot be opened', async () => {
      const degraded = vi.fn();
      const m = createMonitor({
        openDatabase: (path: string): Database => {
          throw new StoreInitializationError(path, 'disk full');
        },
      });
      m.getEventBus().on('store:degraded', degraded);

      await m.start();
      await m.refresh();

      const message = 'Failed to open snapshot store at :memory:: disk full';
      expect(m.getStatus()).toEqual({
        running: true,
        storage: 'degraded',
        storageError: message,
        systemStatus: 'normal',
      });
      expect(degraded).toHaveBeenCalledWith({ error: message });
      expect(m.getTrendAnalyzer()).toBeNull();
      expect(m.getStoreStats()).toBeNull();
      expect(m.getLatestSnapshot()).not.toBeNull();
      expect(m.runMaintenance()).toBe(0);
    });

    it('should not open a store when storage is disabled', async () => {
      const open = vi.fn(openDatabase);
      const m = createMonitor({
        config: resolveConfig({ collector: { interval: '1h' }, storage: { enabled: false } }),
        openDatabase: open,
      });

      await m.start();

      expect(open).not.toHaveBeenCalled();
      expect(m.getStatus().storage).toBe('disabled');
    });

    it('should be idempotent', async () => {
      const probes = createProbes();
      const m = createMonitor({ probes });

      await m.start();
      await m.start();
      await m.refresh();

      expect(probes.readCpu).toHaveBeenCalledOnce();
    });
  });

  describe('logging', () => {
    it('should write to the configured log file', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'vantage-log-'));
      try {
        const destination = join(dir, 'logs', 'vantage.log');
        const m = new VantageMonitor({
          config: resolveConfig({
            collector: { interval: '1h' },
            storage: { enabled: false },
            logging: { destination },
          }),
          probes: createProbes(),
        });
        monitor = m;

        await m.start();
        await m.stop();

        const lines = readFileSync(destination, 'utf-8')
          .trim()
          .split('\n')
          .map((line) => JSON.parse(line));
        const started = lines.find((line) => line.msg === 'Vantage monitor started');
        expect(started).toMatchObject({ level: 'info', name: 'vantage', storage: 'disabled' });
        expect(lines.some((line) => line.msg === 'Vantage monitor stopped')).toBe(true);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('stop', () => {
    it('should flush and close the store and detach from the event bus', async () => {
      const db = openDatabase(':memory:');
      const m = createMonitor({ openDatabase: () => db });
      const shutdown = vi.fn();
      m.getEventBus().on('system:shutdown', shutdown);

      await m.start();
      await m.refresh();
      await m.stop();

      expect(m.getStatus().running).toBe(false);
      expect(db.open).toBe(false);
      expect(shutdown).toHaveBeenCalledOnce();
      expect(m.getEventBus().listenerCount('metric:snapshot')).toBe(0);
      expect(m.getTrendAnalyzer()).toBeNull();
    });

    it('should do nothing when not running', async () => {
      const m = createMonitor();
      const shutdown = vi.fn();
      m.getEventBus().on('system:shutdown', shutdown);

      await m.stop();

      expect(shutdown).not.toHaveBeenCalled();
    });
  });

  describe('runMaintenance', () => {
    it('should sweep the store with the configured retention', async () => {
      const db = openDatabase(':memory:');
      const m = createMonitor({ openDatabase: () => db });
      await m.start();
      await m.refresh();
      await nextTurn();

      expect(m.runMaintenance()).toBe(0);
      expect(m.getStoreStats()?.totalSnapshots).toBe(1);
    });
  });
});
