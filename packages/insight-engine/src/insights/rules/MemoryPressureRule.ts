import {
  BYTES_PER_GB,
  BYTES_PER_MB,
  displayName,
  formatBytes,
  formatGigabytes,
  memoryUsagePercent,
} from '@vantage/shared';
import type { Insight, InsightAction, ProcessResourceSample, Snapshot } from '@vantage/shared';
import type { RuleContext } from '../../types.js';
import { createAction, createInsight, topProcessesBy } from './InsightRule.js';
import type { InsightRule } from './InsightRule.js';

const MEMORY_THRESHOLD_PERCENT = 75;
const SWAP_MENTION_BYTES = 100 * BYTES_PER_MB;
const TOP_PROCESS_MENTION_BYTES = 2 * BYTES_PER_GB;
const QUIT_SUGGESTION_BYTES = BYTES_PER_GB;

export class MemoryPressureRule implements InsightRule {
  readonly type = 'memory-pressure' as const;

  evaluate({ snapshot, processes }: RuleContext): Insight | null {
    if (snapshot.memoryPressure === 'normal') return null;

    const topProcesses = topProcessesBy(processes, (p) => p.memoryUsage);
    const top = topProcesses[0];
    if (!top) return null;

    const name = displayName(top);
    const actions: InsightAction[] = [];

    if (top.memoryUsage > QUIT_SUGGESTION_BYTES) {
      actions.push(
        createAction({
          title: `Quit ${name}`,
          description: 'This app is holding the most RAM',
          action: { kind: 'quit-app', pid: top.pid },
          impact: `Frees ~${formatGigabytes(top.memoryUsage)} RAM`,
          ...(snapshot.memoryTotal > 0
            ? { estimatedImpact: (top.memoryUsage / snapshot.memoryTotal) * 100 }
            : {}),
        }),
      );
    }

    return createInsight(
      {
        type: this.type,
        severity: snapshot.memoryPressure === 'critical' ? 'critical' : 'warning',
        title: `Memory pressure is ${snapshot.memoryPressure}`,
        description: describe(top, snapshot),
        cause: `${name} is holding ${formatBytes(top.memoryUsage)}`,
        affectedProcesses: topProcesses,
        suggestedActions: actions,
        metrics: {
          currentValue: memoryUsagePercent(snapshot),
          thresholdValue: MEMORY_THRESHOLD_PERCENT,
          unit: '%',
          trend: 'stable',
        },
      },
      snapshot.timestamp,
    );
  }
}

function describe(top: ProcessResourceSample, snapshot: Snapshot): string {
  const parts = [
    `Using ${formatGigabytes(snapshot.memoryUsed)} / ${formatGigabytes(snapshot.memoryTotal, 0)} RAM.`,
  ];

  if (snapshot.swapUsed > SWAP_MENTION_BYTES) {
    parts.push(`The system is using ${Math.round(snapshot.swapUsed / BYTES_PER_MB)}MB of swap, which can slow it down.`);
  }
  if (top.memoryUsage > TOP_PROCESS_MENTION_BYTES) {
    parts.push(`${displayName(top)} is holding ${formatGigabytes(top.memoryUsage)}.`);
  }

  return parts.join(' ');
}
