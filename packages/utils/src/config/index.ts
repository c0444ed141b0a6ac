/**
 * Configuration loading
 *
 * Precedence: environment variables > seedhash.yaml > built-in defaults.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { clearYamlCache, loadConfigFromYaml } from './yaml-config.js';

export { loadConfigFromYaml, clearYamlCache } from './yaml-config.js';
export type { YamlConfig } from './yaml-config.js';

export const SeedhashConfigSchema = z.object({
  /** Lower bound used by generators when no range is given */
  defaultMinValue: z.number().int().default(-1_000_000_000),
  /** Upper bound used by generators when no range is given */
  defaultMaxValue: z.number().int().default(1_000_000_000),
  /** Cluster neighbourhood radius as a fraction of the range width */
  clusterRadiusFraction: z.number().min(0).max(0.5).default(0.02),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('warn'),
});

export type SeedhashConfig = z.infer<typeof SeedhashConfigSchema>;

let cachedConfig: SeedhashConfig | null = null;

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got '${raw}'`, name);
  }
  return value;
}

/**
 * Load and validate the seedhash configuration.
 */
export function getSeedhashConfig(configPath?: string): SeedhashConfig {
  if (cachedConfig !== null && configPath === undefined) {
    return cachedConfig;
  }

  const yaml = loadConfigFromYaml(configPath);
  const fromEnv = {
    defaultMinValue: envNumber('SEEDHASH_MIN_VALUE'),
    defaultMaxValue: envNumber('SEEDHASH_MAX_VALUE'),
    clusterRadiusFraction: envNumber('SEEDHASH_CLUSTER_RADIUS_FRACTION'),
    logLevel: process.env.LOG_LEVEL || undefined,
  };

  const merged: Record<string, unknown> = { ...yaml };
  for (const [key, value] of Object.entries(fromEnv)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = SeedhashConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid seedhash configuration${key ? ` at '${key}'` : ''}: ${issue?.message ?? 'unknown issue'}`,
      key,
      { issues: result.error.issues }
    );
  }

  const config = result.data;
  if (config.defaultMinValue >= config.defaultMaxValue) {
    throw new ConfigurationError(
      `defaultMinValue (${config.defaultMinValue}) must be less than defaultMaxValue (${config.defaultMaxValue})`,
      'defaultMinValue'
    );
  }

  if (configPath === undefined) {
    cachedConfig = config;
  }
  return config;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  clearYamlCache();
}
