/**
 * Root test setup file
 *
 * Runs before every test file: keeps configuration isolated between tests and
 * silences console output.
 */

import { afterEach, beforeEach, vi } from 'vitest';
import { clearConfigCache } from '@seedhash/utils';

const CONFIG_ENV_KEYS = [
  'SEEDHASH_MIN_VALUE',
  'SEEDHASH_MAX_VALUE',
  'SEEDHASH_CLUSTER_RADIUS_FRACTION',
  'LOG_LEVEL',
] as const;

const savedEnv = new Map<string, string | undefined>();

beforeEach(() => {
  for (const key of CONFIG_ENV_KEYS) {
    savedEnv.set(key, process.env[key]);
    delete process.env[key];
  }
  clearConfigCache();
});

afterEach(() => {
  for (const [key, value] of savedEnv) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  clearConfigCache();
});

// Suppress console output in tests unless needed
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
