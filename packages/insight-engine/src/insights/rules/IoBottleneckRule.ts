import { formatRate, totalDiskRate } from '@vantage/shared';
import type { Correlation, Insight, Snapshot } from '@vantage/shared';
import type { RuleContext } from '../../types.js';
import { createAction, createInsight } from './InsightRule.js';
import type { InsightRule } from './InsightRule.js';

const IO_THRESHOLD = 100;
const IO_CRITICAL = 200;

export class IoBottleneckRule implements InsightRule {
  readonly type = 'io-bottleneck' as const;

  evaluate({ snapshot, correlations }: RuleContext): Insight | null {
    const totalIo = totalDiskRate(snapshot);
    if (totalIo <= IO_THRESHOLD) return null;

    return createInsight(
      {
        type: this.type,
        severity: totalIo > IO_CRITICAL ? 'critical' : 'warning',
        title: `Heavy disk I/O (${Math.round(totalIo)} MB/s)`,
        description: describe(snapshot, correlations),
        cause: `Read: ${formatRate(snapshot.diskReadRate)}, Write: ${formatRate(snapshot.diskWriteRate)}`,
        affectedProcesses: [],
        suggestedActions: [
          createAction({
            title: 'Wait for it to finish',
            description: 'Disk activity usually settles after a few minutes',
            action: {
              kind: 'reduce-load',
              suggestions: ['Avoid copying other large files', 'Let Spotlight finish indexing'],
            },
            impact: '',
          }),
        ],
        metrics: {
          currentValue: totalIo,
          thresholdValue: IO_THRESHOLD,
          unit: 'MB/s',
          trend: 'stable',
        },
      },
      snapshot.timestamp,
    );
  }
}

function describe(snapshot: Snapshot, correlations: readonly Correlation[]): string {
  const diskCorrelation = correlations.find((c) => c.sourceMetric === 'disk');
  if (diskCorrelation) return diskCorrelation.description;

  if (snapshot.diskWriteRate > snapshot.diskReadRate * 2) {
    return 'Lots of data is being written. A backup, a download or an app saving large files may be the cause.';
  }
  if (snapshot.diskReadRate > snapshot.diskWriteRate * 2) {
    return 'Lots of data is being read. An app may be loading files or Spotlight may be indexing.';
  }
  return 'The disk is busy with both reads and writes. The system may slow down.';
}
