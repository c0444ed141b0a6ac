#!/usr/bin/env node

/**
 * seedhash CLI Entry Point
 */

import { setLogLevel } from '@seedhash/utils';
import { createCommandContext } from '../core/command-context.js';
import { formatError } from '../core/error-handler.js';
import { buildProgram } from '../program.js';

async function main(): Promise<void> {
  const ctx = createCommandContext();
  setLogLevel(ctx.config.logLevel);
  await buildProgram(ctx).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Error: ${formatError(error)}`);
  process.exitCode = 1;
});
