import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { VANTAGE_CONFIG_FILES } from '../constants.js';
import { vantageConfigSchema } from '../schemas/config.schema.js';
import type { VantageConfig } from '../schemas/config.schema.js';
import { ConfigValidationError, errorMessage } from './errors.js';

/**
 * Validate a raw config object and fill in defaults.
 */
export function resolveConfig(input: unknown = {}): VantageConfig {
  const result = vantageConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Locate the config file to load. An explicit path wins; otherwise the
 * well-known file names are tried in `cwd`.
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const name of VANTAGE_CONFIG_FILES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Load and validate configuration from a JSON file.
 * Returns the defaults when no config file exists.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): VantageConfig {
  const file = configPath ? resolve(cwd, configPath) : findConfigFile(cwd);
  if (!file) return resolveConfig({});

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError([`${file}: ${errorMessage(err)}`]);
  }

  return resolveConfig(raw);
}
