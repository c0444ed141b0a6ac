/**
 * Builds the seedhash commander program around a command context
 */

import { Command } from 'commander';
import type { CommandContext } from './core/command-context.js';
import { registerSeedCommands } from './commands/seeds.js';

export function buildProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name('seedhash')
    .description('Deterministic seeds from strings, with sampling strategies and seed hierarchies')
    .version('1.0.0');

  registerSeedCommands(program, ctx);

  program.configureOutput({
    writeOut: (str) => ctx.write(str.trimEnd()),
    writeErr: (str) => ctx.writeErr(str.trimEnd()),
  });

  return program;
}
