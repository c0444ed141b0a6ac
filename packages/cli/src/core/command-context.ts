/**
 * Command Context - what handlers and the command wrapper are given
 *
 * Output goes through `write` / `writeErr` so tests can capture it.
 */

import { createLogger, getSeedhashConfig, type Logger, type SeedhashConfig } from '@seedhash/utils';

export interface CommandContext {
  config: SeedhashConfig;
  logger: Logger;
  write(text: string): void;
  writeErr(text: string): void;
}

export interface CommandContextOptions {
  config?: SeedhashConfig;
  write?: (text: string) => void;
  writeErr?: (text: string) => void;
}

export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  return {
    config: options.config ?? getSeedhashConfig(),
    logger: createLogger('@seedhash/cli'),
    write: options.write ?? ((text) => process.stdout.write(text + '\n')),
    writeErr: options.writeErr ?? ((text) => process.stderr.write(text + '\n')),
  };
}
