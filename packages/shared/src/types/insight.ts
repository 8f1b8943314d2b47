import type { ProcessResourceSample } from './process.js';
import type { TrendDirection } from './metrics.js';

export type Severity = 'info' | 'warning' | 'critical';

export type SystemStatus = 'normal' | 'warning' | 'critical';

export type InsightType =
  | 'cpu-saturation'
  | 'memory-pressure'
  | 'io-bottleneck'
  | 'thermal-throttling';

export type CorrelationMetric = 'cpu' | 'memory' | 'disk';

export interface Anomaly {
  id: string;
  metric: string;
  currentValue: number;
  /** Rolling mean at the time of detection. */
  expectedValue: number;
  /** Z-score of the current value. */
  deviation: number;
  description: string;
  timestamp: Date;
}

export interface Correlation {
  id: string;
  sourceMetric: CorrelationMetric;
  targetProcess: ProcessResourceSample;
  /** 0..1 */
  strength: number;
  description: string;
  timestamp: Date;
}

export type InsightActionKind =
  | { kind: 'quit-app'; pid: number }
  | { kind: 'force-quit-app'; pid: number }
  | { kind: 'reduce-load'; suggestions: string[] }
  | { kind: 'system-setting'; path: string }
  | { kind: 'open-activity-monitor' }
  | { kind: 'restart-app'; bundleId: string }
  | { kind: 'clear-cache'; path: string };

export interface InsightAction {
  id: string;
  title: string;
  description: string;
  action: InsightActionKind;
  impact: string;
  /** Expected reduction in the triggering metric, in that metric's unit. */
  estimatedImpact?: number;
}

export interface InsightMetrics {
  currentValue: number;
  thresholdValue: number;
  unit: string;
  trend: TrendDirection;
}

export interface Insight {
  readonly id: string;
  readonly timestamp: Date;
  readonly type: InsightType;
  readonly severity: Severity;
  readonly title: string;
  readonly description: string;
  readonly cause: string;
  readonly affectedProcesses: readonly ProcessResourceSample[];
  readonly suggestedActions: readonly InsightAction[];
  readonly metrics?: InsightMetrics;
}

export interface InsightReport {
  insights: Insight[];
  status: SystemStatus;
  correlations: Correlation[];
  anomalies: Anomaly[];
  summary: string;
}
