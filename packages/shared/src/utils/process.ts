import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ProcessCategory, ProcessResourceSample } from '../types/process.js';

const categoryRuleSchema = z.object({
  category: z.enum([
    'browser',
    'developer',
    'productivity',
    'media',
    'communication',
    'system',
    'background',
    'other',
  ]),
  nameContains: z.array(z.string()).default([]),
  namePrefix: z.array(z.string()).default([]),
  nameSuffix: z.array(z.string()).default([]),
  bundleContains: z.array(z.string()).default([]),
  bundlePrefix: z.array(z.string()).default([]),
});

const categoryRulesSchema = z.object({ rules: z.array(categoryRuleSchema) });

type CategoryRule = z.infer<typeof categoryRuleSchema>;

let cachedRules: CategoryRule[] | null = null;

function loadRules(): CategoryRule[] {
  if (!cachedRules) {
    const file = new URL('../data/process-categories.json', import.meta.url);
    cachedRules = categoryRulesSchema.parse(JSON.parse(readFileSync(file, 'utf-8'))).rules;
  }
  return cachedRules;
}

function matches(rule: CategoryRule, name: string, bundle: string): boolean {
  return (
    rule.nameContains.some((kw) => name.includes(kw)) ||
    rule.namePrefix.some((kw) => name.startsWith(kw)) ||
    rule.nameSuffix.some((kw) => name.endsWith(kw)) ||
    (bundle.length > 0 &&
      (rule.bundleContains.some((kw) => bundle.includes(kw)) ||
        rule.bundlePrefix.some((kw) => bundle.startsWith(kw))))
  );
}

/**
 * Classify a process by name and bundle identifier. Rules are tried in
 * order, so a browser helper is a browser rather than a background daemon.
 */
export function categorizeProcess(name: string, bundleId?: string): ProcessCategory {
  const lowerName = name.toLowerCase();
  const lowerBundle = bundleId?.toLowerCase() ?? '';

  for (const rule of loadRules()) {
    if (matches(rule, lowerName, lowerBundle)) return rule.category;
  }
  return 'other';
}

/**
 * Process name with helper suffixes removed, for display in insight text.
 */
export function displayName(process: Pick<ProcessResourceSample, 'name'>): string {
  let name = process.name;
  if (name.endsWith(' (GPU)')) name = name.slice(0, -' (GPU)'.length);
  if (name.endsWith(' Helper')) name = name.slice(0, -' Helper'.length);
  return name;
}

export function totalDiskBytes(process: ProcessResourceSample): number {
  return process.diskReadBytes + process.diskWriteBytes;
}
