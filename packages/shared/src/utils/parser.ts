import msLib from 'ms';
import bytesLib from 'bytes';
import { BYTES_PER_GB, BYTES_PER_MB } from '../constants.js';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '2d', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  if (ms < 86_400_000) return `${Math.round(ms / 3_600_000)}h`;
  return `${Math.round(ms / 86_400_000)}d`;
}

/**
 * Format bytes to a human-readable string.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

/**
 * Format bytes as gigabytes with a fixed number of decimals, e.g. `3.0GB`.
 */
export function formatGigabytes(value: number, decimals: number = 1): string {
  return `${(value / BYTES_PER_GB).toFixed(decimals)}GB`;
}

/**
 * Format bytes as whole megabytes, e.g. `512MB`.
 */
export function formatMegabytes(value: number): string {
  return `${Math.floor(value / BYTES_PER_MB)}MB`;
}

/**
 * Format a CPU percentage for display.
 */
export function formatCpu(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Format a disk transfer rate in MB/s.
 */
export function formatRate(value: number): string {
  return `${value.toFixed(1)} MB/s`;
}
