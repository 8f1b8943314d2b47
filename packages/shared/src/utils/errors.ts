import type { ProbeGroup } from '../types/metrics.js';

export class VantageError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'VantageError';
    this.code = code;
  }
}

export class ProbeUnavailableError extends VantageError {
  public readonly probe: ProbeGroup;

  constructor(probe: ProbeGroup, reason?: string) {
    super(
      reason ? `Probe unavailable: ${probe} (${reason})` : `Probe unavailable: ${probe}`,
      'PROBE_UNAVAILABLE',
    );
    this.name = 'ProbeUnavailableError';
    this.probe = probe;
  }
}

export class PersistenceWriteError extends VantageError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_WRITE_FAILED');
    this.name = 'PersistenceWriteError';
  }
}

export class PersistenceReadError extends VantageError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_READ_FAILED');
    this.name = 'PersistenceReadError';
  }
}

export class StoreInitializationError extends VantageError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to open snapshot store at ${path}: ${reason}`, 'STORE_INIT_FAILED');
    this.name = 'StoreInitializationError';
    this.path = path;
  }
}

export class ConfigValidationError extends VantageError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Normalise an unknown thrown value into a message for logs and errors.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
