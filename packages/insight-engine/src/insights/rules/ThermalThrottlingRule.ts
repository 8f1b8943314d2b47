import type { Insight, Snapshot } from '@vantage/shared';
import type { RuleContext } from '../../types.js';
import { createAction, createInsight } from './InsightRule.js';
import type { InsightRule } from './InsightRule.js';

const TEMPERATURE_THRESHOLD = 80;

export class ThermalThrottlingRule implements InsightRule {
  readonly type = 'thermal-throttling' as const;

  evaluate({ snapshot }: RuleContext): Insight | null {
    if (snapshot.thermalState !== 'serious' && snapshot.thermalState !== 'critical') return null;

    return createInsight(
      {
        type: this.type,
        severity: snapshot.thermalState === 'critical' ? 'critical' : 'warning',
        title: 'The machine is overheating and throttling the CPU',
        description: describe(snapshot),
        cause: `CPU temperature: ${Math.round(snapshot.cpuTemperature)}°C`,
        affectedProcesses: [],
        suggestedActions: [
          createAction({
            title: 'Reduce CPU load',
            description: 'Close apps you do not need',
            action: {
              kind: 'reduce-load',
              suggestions: ['Close unused browser tabs', 'Pause downloads and uploads', 'Quit heavy apps'],
            },
            impact: 'Helps the CPU cool down',
          }),
          createAction({
            title: 'Improve ventilation',
            description: 'Give the machine room to breathe',
            action: {
              kind: 'reduce-load',
              suggestions: ['Keep it off soft surfaces', 'Use a laptop stand', 'Avoid direct sunlight'],
            },
            impact: 'Improves heat dissipation',
          }),
        ],
        metrics: {
          currentValue: snapshot.cpuTemperature,
          thresholdValue: TEMPERATURE_THRESHOLD,
          unit: '°C',
          trend: 'increasing',
        },
      },
      snapshot.timestamp,
    );
  }
}

function describe(snapshot: Snapshot): string {
  let description =
    snapshot.thermalState === 'critical'
      ? 'Thermal state is critical. The CPU is being slowed down hard to cool off and performance will drop noticeably.'
      : 'Thermal state is serious. The CPU may be slowed down to avoid overheating.';

  if (snapshot.fanSpeed > 0) {
    description += ` Fans are running at ${Math.round(snapshot.fanSpeed)} RPM.`;
  }
  return description;
}
