import { nanoid } from 'nanoid';
import type { Insight, InsightAction, InsightType, ProcessResourceSample } from '@vantage/shared';
import type { RuleContext } from '../../types.js';

/**
 * A stateless condition-to-insight check. Returning null means the rule
 * did not trigger or found nothing to blame.
 */
export interface InsightRule {
  readonly type: InsightType;
  evaluate(context: RuleContext): Insight | null;
}

export function createInsight(params: Omit<Insight, 'id' | 'timestamp'>, timestamp: Date): Insight {
  return { id: nanoid(), timestamp, ...params };
}

export function createAction(params: Omit<InsightAction, 'id'>): InsightAction {
  return { id: nanoid(), ...params };
}

export function topProcessesBy(
  processes: readonly ProcessResourceSample[],
  key: (process: ProcessResourceSample) => number,
  limit: number = 5,
): ProcessResourceSample[] {
  return [...processes].sort((a, b) => key(b) - key(a)).slice(0, limit);
}
