import { max, mean, min, sampleVariance } from 'simple-statistics';

/**
 * Fixed-capacity FIFO of recent values for one metric stream.
 * Pushing into a full window evicts the oldest value.
 */
export class RollingWindow {
  readonly capacity: number;
  private readonly buffer: number[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RollingWindow capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get count(): number {
    return this.buffer.length;
  }

  push(value: number): void {
    this.buffer.push(value);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
    }
  }

  /** Oldest first. */
  values(): number[] {
    return [...this.buffer];
  }

  mean(): number | null {
    return this.buffer.length > 0 ? mean(this.buffer) : null;
  }

  /** Sample variance (n - 1). */
  variance(): number | null {
    return this.buffer.length >= 2 ? sampleVariance(this.buffer) : null;
  }

  standardDeviation(): number | null {
    const variance = this.variance();
    return variance === null ? null : Math.sqrt(variance);
  }

  min(): number | null {
    return this.buffer.length > 0 ? min(this.buffer) : null;
  }

  max(): number | null {
    return this.buffer.length > 0 ? max(this.buffer) : null;
  }

  clear(): void {
    this.buffer.length = 0;
  }
}
