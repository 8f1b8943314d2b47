import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventBus } from '../events/EventBus.js';
import type { InsightReport } from '@vantage/shared';
import { makeProcess, makeSnapshot } from './fixtures.js';

// Mock nanoid to return deterministic IDs
vi.mock('nanoid', () => ({
  nanoid: () => 'test-id-123',
}));

const emptyReport: InsightReport = {
  insights: [],
  status: 'normal',
  correlations: [],
  anomalies: [],
  summary: 'System is running normally',
};

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  describe('emit and on', () => {
    it('should call the listener with the event payload', () => {
      const handler = vi.fn();
      const payload = {
        snapshot: makeSnapshot(new Date('2026-03-02T10:00:00Z')),
        processes: [makeProcess({ name: 'Safari' })],
      };

      eventBus.on('metric:snapshot', handler);
      eventBus.emit('metric:snapshot', payload);

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith(payload);
    });

    it('should support multiple listeners on the same event', () => {
      const first = vi.fn();
      const second = vi.fn();

      eventBus.on('insight:update', first);
      eventBus.on('insight:update', second);
      eventBus.emit('insight:update', emptyReport);

      expect(first).toHaveBeenCalledWith(emptyReport);
      expect(second).toHaveBeenCalledWith(emptyReport);
    });

    it('should not call listeners of other events', () => {
      const handler = vi.fn();
      eventBus.on('store:degraded', handler);

      eventBus.emit('insight:update', emptyReport);

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('once', () => {
    it('should fire only on the first emit', () => {
      const handler = vi.fn();
      eventBus.once('store:degraded', handler);

      eventBus.emit('store:degraded', { error: 'disk full' });
      eventBus.emit('store:degraded', { error: 'disk full' });

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith({ error: 'disk full' });
    });
  });

  describe('off', () => {
    it('should remove a specific listener', () => {
      const kept = vi.fn();
      const removed = vi.fn();
      eventBus.on('system:shutdown', kept);
      eventBus.on('system:shutdown', removed);

      eventBus.off('system:shutdown', removed);
      eventBus.emit('system:shutdown', undefined);

      expect(kept).toHaveBeenCalledOnce();
      expect(removed).not.toHaveBeenCalled();
      expect(eventBus.listenerCount('system:shutdown')).toBe(1);
    });
  });

  describe('onAny', () => {
    it('should receive a wrapped message for every event', () => {
      const handler = vi.fn();
      eventBus.onAny(handler);

      eventBus.emit('store:degraded', { error: 'locked' });

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith({
        id: 'test-id-123',
        type: 'store:degraded',
        source: 'core',
        timestamp: expect.any(Date),
        data: { error: 'locked' },
      });
    });

    it('should stop receiving after offAny', () => {
      const handler = vi.fn();
      eventBus.onAny(handler);
      eventBus.offAny(handler);

      eventBus.emit('system:shutdown', undefined);

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('removeAllListeners', () => {
    it('should drop every listener', () => {
      const handler = vi.fn();
      eventBus.on('insight:update', handler);
      eventBus.onAny(handler);

      eventBus.removeAllListeners();
      eventBus.emit('insight:update', emptyReport);

      expect(handler).not.toHaveBeenCalled();
      expect(eventBus.listenerCount('*')).toBe(0);
    });
  });
});
