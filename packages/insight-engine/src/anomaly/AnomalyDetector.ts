import { nanoid } from 'nanoid';
import {
  DEFAULT_MIN_SAMPLES,
  DEFAULT_ROLLING_WINDOW,
  DEFAULT_STDDEV_EPSILON,
  DEFAULT_ZSCORE_THRESHOLD,
  memoryUsagePercent,
} from '@vantage/shared';
import type { Anomaly, Snapshot } from '@vantage/shared';
import type { AnomalyDetectorOptions, MetricStream } from '../types.js';
import { RollingWindow } from './RollingWindow.js';

const STREAM_LABELS: Record<MetricStream, string> = {
  cpu: 'CPU usage',
  memory: 'Memory usage',
  'disk-read': 'Disk read rate',
  'disk-write': 'Disk write rate',
};

/**
 * Rolling z-score detector. Keeps one window per metric stream and flags
 * values that sit more than `threshold` standard deviations above the
 * window mean. Low values are never reported.
 */
export class AnomalyDetector {
  private readonly windowSize: number;
  private readonly minSamples: number;
  private readonly threshold: number;
  private readonly epsilon: number;

  private readonly windows: Map<string, RollingWindow> = new Map();

  constructor(options?: AnomalyDetectorOptions) {
    this.windowSize = options?.windowSize ?? DEFAULT_ROLLING_WINDOW;
    this.minSamples = options?.minSamples ?? DEFAULT_MIN_SAMPLES;
    this.threshold = options?.threshold ?? DEFAULT_ZSCORE_THRESHOLD;
    this.epsilon = options?.epsilon ?? DEFAULT_STDDEV_EPSILON;
  }

  /**
   * Push one value into the metric's window and return an anomaly when the
   * value is a significant positive spike. Returns null while the window is
   * still warming up or the signal is near-constant.
   */
  observe(metric: string, value: number, timestamp: Date = new Date()): Anomaly | null {
    const window = this.windowFor(metric);
    window.push(value);

    if (window.count < this.minSamples) {
      return null;
    }

    const windowMean = window.mean();
    const windowStdDev = window.standardDeviation();
    if (windowMean === null || windowStdDev === null || windowStdDev < this.epsilon) {
      return null;
    }

    const zScore = (value - windowMean) / windowStdDev;
    if (zScore <= this.threshold) {
      return null;
    }

    return {
      id: nanoid(),
      metric,
      currentValue: value,
      expectedValue: windowMean,
      deviation: zScore,
      description: `${labelFor(metric)} spiked to ${value.toFixed(1)} (expected ~${windowMean.toFixed(1)}, z-score ${zScore.toFixed(2)})`,
      timestamp,
    };
  }

  /**
   * Feed the standard streams of a snapshot through the detector.
   */
  detect(snapshot: Snapshot): Anomaly[] {
    const readings: [MetricStream, number][] = [
      ['cpu', snapshot.cpuUsage],
      ['memory', memoryUsagePercent(snapshot)],
      ['disk-read', snapshot.diskReadRate],
      ['disk-write', snapshot.diskWriteRate],
    ];

    const anomalies: Anomaly[] = [];
    for (const [metric, value] of readings) {
      const anomaly = this.observe(metric, value, snapshot.timestamp);
      if (anomaly) anomalies.push(anomaly);
    }
    return anomalies;
  }

  sampleCount(metric: string): number {
    return this.windows.get(metric)?.count ?? 0;
  }

  reset(): void {
    this.windows.clear();
  }

  private windowFor(metric: string): RollingWindow {
    let window = this.windows.get(metric);
    if (!window) {
      window = new RollingWindow(this.windowSize);
      this.windows.set(metric, window);
    }
    return window;
  }
}

function isMetricStream(metric: string): metric is MetricStream {
  return Object.prototype.hasOwnProperty.call(STREAM_LABELS, metric);
}

function labelFor(metric: string): string {
  return isMetricStream(metric) ? STREAM_LABELS[metric] : metric;
}
