import { homedir } from 'node:os';
import { join } from 'node:path';

export const VANTAGE_HOME = process.env.VANTAGE_HOME || join(homedir(), '.vantage');
export const VANTAGE_DB_FILE = join(VANTAGE_HOME, 'vantage.db');

export const VANTAGE_CONFIG_FILES = ['vantage.config.json', '.vantagerc.json'];

export const DEFAULT_COLLECT_INTERVAL = '2s';
export const DEFAULT_HISTORY_LIMIT = 300;
export const DEFAULT_PERSIST_INTERVAL = '5m';
export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_MAINTENANCE_INTERVAL = '1h';
export const DEFAULT_MAX_PENDING_WRITES = 1000;

export const DEFAULT_ROLLING_WINDOW = 60;
export const DEFAULT_MIN_SAMPLES = 10;
export const DEFAULT_ZSCORE_THRESHOLD = 2.0;
export const DEFAULT_STDDEV_EPSILON = 0.1;

export const DEFAULT_INSIGHT_HISTORY_LIMIT = 100;
export const DEFAULT_INSIGHT_RECENCY_WINDOW = '60s';

export const DEFAULT_WEEKLY_WINDOW_DAYS = 7;
export const DEFAULT_MONTHLY_WINDOW_DAYS = 30;
export const DEFAULT_GROWTH_FLOOR = 0.01;
export const DEFAULT_SUDDEN_CHANGE_THRESHOLD = 20;

export const BYTES_PER_GB = 1_073_741_824;
export const BYTES_PER_MB = 1_048_576;

export const VANTAGE_VERSION = '0.1.0';
