import {
  DEFAULT_INSIGHT_HISTORY_LIMIT,
  errorMessage,
  getLogger,
  isMoreSevere,
  parseDuration,
  compareSeverityDesc,
  statusFromSeverities,
  DEFAULT_INSIGHT_RECENCY_WINDOW,
} from '@vantage/shared';
import type {
  Anomaly,
  Correlation,
  DedupPolicy,
  Insight,
  InsightReport,
  InsightType,
  Logger,
  ProcessResourceSample,
  Severity,
  Snapshot,
  SystemStatus,
} from '@vantage/shared';
import { AnomalyDetector } from '../anomaly/AnomalyDetector.js';
import { CorrelationEngine } from '../correlation/CorrelationEngine.js';
import type { RuleContext } from '../types.js';
import { CpuSaturationRule } from './rules/CpuSaturationRule.js';
import { IoBottleneckRule } from './rules/IoBottleneckRule.js';
import { MemoryPressureRule } from './rules/MemoryPressureRule.js';
import { ThermalThrottlingRule } from './rules/ThermalThrottlingRule.js';
import type { InsightRule } from './rules/InsightRule.js';

export interface InsightEngineOptions {
  rules?: InsightRule[];
  historyLimit?: number;
  recencyWindowMs?: number;
  dedupPolicy?: DedupPolicy;
  correlationEngine?: CorrelationEngine;
  anomalyDetector?: AnomalyDetector;
  logger?: Logger;
}

export function defaultRules(): InsightRule[] {
  return [
    new CpuSaturationRule(),
    new MemoryPressureRule(),
    new IoBottleneckRule(),
    new ThermalThrottlingRule(),
  ];
}

/**
 * Keep one insight per type. With 'first-seen' the earliest insight of a
 * type wins; with 'highest-severity' a later one replaces it only when
 * strictly more severe. Output keeps first-appearance order of types.
 */
export function dedupeByType(insights: readonly Insight[], policy: DedupPolicy = 'first-seen'): Insight[] {
  const byType = new Map<InsightType, Insight>();
  for (const insight of insights) {
    const existing = byType.get(insight.type);
    if (!existing) {
      byType.set(insight.type, insight);
    } else if (policy === 'highest-severity' && isMoreSevere(insight.severity, existing.severity)) {
      byType.set(insight.type, insight);
    }
  }
  return Array.from(byType.values());
}

/**
 * Runs every rule against each new snapshot and keeps the ranked result
 * plus a bounded history of past insights.
 */
export class InsightEngine {
  private readonly rules: InsightRule[];
  private readonly historyLimit: number;
  private readonly recencyWindowMs: number;
  private readonly dedupPolicy: DedupPolicy;
  private readonly correlationEngine: CorrelationEngine;
  private readonly anomalyDetector: AnomalyDetector;
  private readonly logger: Logger;

  private currentInsights: Insight[] = [];
  private currentStatus: SystemStatus = 'normal';
  private correlations: Correlation[] = [];
  private anomalies: Anomaly[] = [];
  private history: Insight[] = [];
  private summary = 'System is running normally';

  constructor(options: InsightEngineOptions = {}) {
    this.rules = options.rules ?? defaultRules();
    this.historyLimit = options.historyLimit ?? DEFAULT_INSIGHT_HISTORY_LIMIT;
    this.recencyWindowMs = options.recencyWindowMs ?? parseDuration(DEFAULT_INSIGHT_RECENCY_WINDOW);
    this.dedupPolicy = options.dedupPolicy ?? 'first-seen';
    this.correlationEngine = options.correlationEngine ?? new CorrelationEngine();
    this.anomalyDetector = options.anomalyDetector ?? new AnomalyDetector();
    this.logger = options.logger ?? getLogger();
  }

  analyze(snapshot: Snapshot, processes: readonly ProcessResourceSample[]): InsightReport {
    const correlations = this.correlationEngine.correlate(snapshot, processes);
    const anomalies = this.anomalyDetector.detect(snapshot);

    const context: RuleContext = { snapshot, processes, correlations, anomalies };
    const produced: Insight[] = [];
    for (const rule of this.rules) {
      const insight = this.evaluateRule(rule, context);
      if (insight) produced.push(insight);
    }

    const insights = dedupeByType(produced, this.dedupPolicy).sort(compareSeverityDesc);
    const status = statusFromSeverities(insights.map((i) => i.severity));

    this.currentInsights = insights;
    this.currentStatus = status;
    this.correlations = correlations;
    this.anomalies = anomalies;
    this.summary = insights[0]?.description ?? 'System is running normally';
    this.addToHistory(insights);

    return {
      insights: [...insights],
      status,
      correlations: [...correlations],
      anomalies: [...anomalies],
      summary: this.summary,
    };
  }

  getCurrentInsights(): Insight[] {
    return [...this.currentInsights];
  }

  getStatus(): SystemStatus {
    return this.currentStatus;
  }

  getHistory(): Insight[] {
    return [...this.history];
  }

  getCorrelations(): Correlation[] {
    return [...this.correlations];
  }

  getAnomalies(): Anomaly[] {
    return [...this.anomalies];
  }

  getSummary(): string {
    return this.summary;
  }

  insightsOfType(type: InsightType): Insight[] {
    return this.currentInsights.filter((i) => i.type === type);
  }

  insightsWithSeverity(severity: Severity): Insight[] {
    return this.currentInsights.filter((i) => i.severity === severity);
  }

  mostCriticalInsight(): Insight | null {
    return this.currentInsights[0] ?? null;
  }

  statusSummary(): string {
    if (this.currentInsights.length === 0) return 'System is running normally';

    const critical = this.insightsWithSeverity('critical').length;
    if (critical > 0) return `${critical} critical ${critical === 1 ? 'issue' : 'issues'}`;

    const warnings = this.insightsWithSeverity('warning').length;
    if (warnings > 0) return `${warnings} ${warnings === 1 ? 'warning' : 'warnings'}`;

    const count = this.currentInsights.length;
    return `${count} ${count === 1 ? 'notice' : 'notices'}`;
  }

  /** Clear current state, history and the detector's windows. */
  reset(): void {
    this.currentInsights = [];
    this.currentStatus = 'normal';
    this.correlations = [];
    this.anomalies = [];
    this.history = [];
    this.summary = 'System is running normally';
    this.anomalyDetector.reset();
  }

  private evaluateRule(rule: InsightRule, context: RuleContext): Insight | null {
    try {
      return rule.evaluate(context);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err), rule: rule.type }, 'Insight rule failed, skipping');
      return null;
    }
  }

  private addToHistory(insights: readonly Insight[]): void {
    for (const insight of insights) {
      const seenRecently = this.history.some(
        (existing) =>
          existing.type === insight.type &&
          Math.abs(insight.timestamp.getTime() - existing.timestamp.getTime()) < this.recencyWindowMs,
      );
      if (!seenRecently) {
        this.history.push(insight);
      }
    }

    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}
