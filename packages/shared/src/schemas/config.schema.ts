import { z } from 'zod';
import {
  DEFAULT_COLLECT_INTERVAL,
  DEFAULT_GROWTH_FLOOR,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_INSIGHT_HISTORY_LIMIT,
  DEFAULT_INSIGHT_RECENCY_WINDOW,
  DEFAULT_MAINTENANCE_INTERVAL,
  DEFAULT_MAX_PENDING_WRITES,
  DEFAULT_MIN_SAMPLES,
  DEFAULT_MONTHLY_WINDOW_DAYS,
  DEFAULT_PERSIST_INTERVAL,
  DEFAULT_RETENTION_DAYS,
  DEFAULT_ROLLING_WINDOW,
  DEFAULT_STDDEV_EPSILON,
  DEFAULT_SUDDEN_CHANGE_THRESHOLD,
  DEFAULT_WEEKLY_WINDOW_DAYS,
  DEFAULT_ZSCORE_THRESHOLD,
  VANTAGE_DB_FILE,
} from '../constants.js';

export const collectorConfigSchema = z.object({
  interval: z.string().default(DEFAULT_COLLECT_INTERVAL),
  history_limit: z.number().int().positive().default(DEFAULT_HISTORY_LIMIT),
  persist_interval: z.string().default(DEFAULT_PERSIST_INTERVAL),
});

export const storageConfigSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1).default(VANTAGE_DB_FILE),
  retention_days: z.number().int().positive().default(DEFAULT_RETENTION_DAYS),
  maintenance_interval: z.string().default(DEFAULT_MAINTENANCE_INTERVAL),
  max_pending_writes: z.number().int().positive().default(DEFAULT_MAX_PENDING_WRITES),
});

export const anomalyConfigSchema = z.object({
  window_size: z.number().int().min(2).default(DEFAULT_ROLLING_WINDOW),
  min_samples: z.number().int().min(2).default(DEFAULT_MIN_SAMPLES),
  threshold: z.number().positive().default(DEFAULT_ZSCORE_THRESHOLD),
  epsilon: z.number().min(0).default(DEFAULT_STDDEV_EPSILON),
});

export const insightConfigSchema = z.object({
  history_limit: z.number().int().positive().default(DEFAULT_INSIGHT_HISTORY_LIMIT),
  recency_window: z.string().default(DEFAULT_INSIGHT_RECENCY_WINDOW),
  dedup_policy: z.enum(['first-seen', 'highest-severity']).default('first-seen'),
});

export const trendConfigSchema = z.object({
  weekly_window_days: z.number().int().positive().default(DEFAULT_WEEKLY_WINDOW_DAYS),
  monthly_window_days: z.number().int().positive().default(DEFAULT_MONTHLY_WINDOW_DAYS),
  growth_floor: z.number().min(0).default(DEFAULT_GROWTH_FLOOR),
  sudden_change_threshold: z.number().positive().default(DEFAULT_SUDDEN_CHANGE_THRESHOLD),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(() => process.env.NODE_ENV !== 'production'),
  destination: z.string().optional(),
});

export const vantageConfigSchema = z
  .object({
    collector: collectorConfigSchema.default({}),
    storage: storageConfigSchema.default({}),
    anomaly: anomalyConfigSchema.default({}),
    insights: insightConfigSchema.default({}),
    trends: trendConfigSchema.default({}),
    logging: loggingConfigSchema.default({}),
  })
  .refine((config) => config.anomaly.min_samples <= config.anomaly.window_size, {
    message: 'anomaly.min_samples must not exceed anomaly.window_size',
    path: ['anomaly', 'min_samples'],
  });

export type VantageConfig = z.infer<typeof vantageConfigSchema>;
export type VantageConfigInput = z.input<typeof vantageConfigSchema>;
export type LoggingConfig = VantageConfig['logging'];
export type DedupPolicy = VantageConfig['insights']['dedup_policy'];
