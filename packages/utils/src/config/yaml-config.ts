/**
 * YAML Configuration Loader
 * ==========================
 * Loads settings from seedhash.yaml; environment variables are layered on top
 * by `getSeedhashConfig()`.
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';

export type YamlConfig = Record<string, unknown>;

const yamlCache = new Map<string, YamlConfig>();

/**
 * Load configuration from a YAML file (default: ./seedhash.yaml).
 *
 * A missing file yields an empty object. A file that exists but does not parse
 * to a mapping is a ConfigurationError.
 */
export function loadConfigFromYaml(configPath?: string): YamlConfig {
  const resolvedPath = configPath || join(process.cwd(), 'seedhash.yaml');
  const cached = yamlCache.get(resolvedPath);
  if (cached) {
    return cached;
  }

  if (!existsSync(resolvedPath)) {
    logger.debug('seedhash.yaml not found, using environment variables only', {
      path: resolvedPath,
    });
    yamlCache.set(resolvedPath, {});
    return {};
  }

  let parsed: unknown;
  try {
    parsed = load(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`,
      resolvedPath
    );
  }

  if (parsed === null || parsed === undefined) {
    yamlCache.set(resolvedPath, {});
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`${resolvedPath} must contain a YAML mapping`, resolvedPath);
  }

  const config: YamlConfig = { ...parsed };
  logger.info('Loaded configuration from seedhash.yaml', { path: resolvedPath });
  yamlCache.set(resolvedPath, config);
  return config;
}

export function clearYamlCache(): void {
  yamlCache.clear();
}
