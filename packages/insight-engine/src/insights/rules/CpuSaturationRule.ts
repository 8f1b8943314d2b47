import { displayName } from '@vantage/shared';
import type { Insight, InsightAction, ProcessResourceSample } from '@vantage/shared';
import type { RuleContext } from '../../types.js';
import { createAction, createInsight, topProcessesBy } from './InsightRule.js';
import type { InsightRule } from './InsightRule.js';

const CPU_THRESHOLD = 80;
const CPU_CRITICAL = 95;
const QUIT_SUGGESTION_FLOOR = 50;

export class CpuSaturationRule implements InsightRule {
  readonly type = 'cpu-saturation' as const;

  evaluate({ snapshot, processes }: RuleContext): Insight | null {
    if (snapshot.cpuUsage <= CPU_THRESHOLD) return null;

    const topProcesses = topProcessesBy(processes, (p) => p.cpuUsage);
    const top = topProcesses[0];
    if (!top) return null;

    const name = displayName(top);
    const topCpu = Math.trunc(top.cpuUsage);
    const actions: InsightAction[] = [];

    if (top.cpuUsage > QUIT_SUGGESTION_FLOOR) {
      actions.push(
        createAction({
          title: `Quit ${name}`,
          description: 'This app is using the most CPU',
          action: { kind: 'quit-app', pid: top.pid },
          impact: `Frees ~${topCpu}% CPU`,
          estimatedImpact: topCpu,
        }),
      );
    }

    actions.push(
      createAction({
        title: 'Open Activity Monitor',
        description: 'Inspect every running process',
        action: { kind: 'open-activity-monitor' },
        impact: '',
      }),
    );

    return createInsight(
      {
        type: this.type,
        severity: snapshot.cpuUsage > CPU_CRITICAL ? 'critical' : 'warning',
        title: `CPU is saturated (${Math.trunc(snapshot.cpuUsage)}%)`,
        description: describe(top),
        cause: `${name} is using ${topCpu}% CPU`,
        affectedProcesses: topProcesses,
        suggestedActions: actions,
        metrics: {
          currentValue: snapshot.cpuUsage,
          thresholdValue: CPU_THRESHOLD,
          unit: '%',
          trend: 'stable',
        },
      },
      snapshot.timestamp,
    );
  }
}

function describe(top: ProcessResourceSample): string {
  const name = displayName(top);
  const cpu = Math.trunc(top.cpuUsage);
  const lower = name.toLowerCase();

  if (name === 'kernel_task' && cpu > 30) {
    return 'The system is thermal throttling to cool down. Reduce CPU load to avoid overheating.';
  }
  if (top.category === 'browser') {
    return `${name} is consuming ${cpu}% CPU. Many open tabs or a heavy extension may be the cause.`;
  }
  if (lower.includes('xcode') || name.includes('clang') || name.includes('swift')) {
    return `A build is compiling code, using ${cpu}% CPU. It should finish shortly.`;
  }
  if (lower.includes('docker')) {
    return `Docker containers are busy, using ${cpu}% CPU.`;
  }
  return `${name} is using ${cpu}% CPU, most of the available processing capacity.`;
}
