/**
 * Seed Commands
 */

import type { Command } from 'commander';
import { SAMPLING_METHODS } from '@seedhash/core';
import { defineCommand } from '../core/defineCommand.js';
import { coerceNumbers } from '../core/coerce.js';
import type { CommandContext } from '../core/command-context.js';
import {
  generateSchema,
  hashSchema,
  hierarchySchema,
  sampleSchema,
} from '../command-defs/seeds.js';
import { hashInputHandler } from '../handlers/seeds/hash-input.js';
import { generateSeedsHandler } from '../handlers/seeds/generate-seeds.js';
import { sampleSeedsHandler } from '../handlers/seeds/sample-seeds.js';
import { buildHierarchyHandler } from '../handlers/seeds/build-hierarchy.js';

const methods = SAMPLING_METHODS.join('|');

/**
 * Register seed commands
 */
export function registerSeedCommands(program: Command, ctx: CommandContext): void {
  // Hash
  const hashCmd = program
    .command('hash <input>')
    .description('Show the MD5 digest and derived seed of a string')
    .option('--format <format>', 'Output format (json|table|csv)', 'json');

  defineCommand(hashCmd, ctx, {
    schema: hashSchema,
    handler: hashInputHandler,
    argsToOpts: (args, rawOpts) => ({ ...rawOpts, input: args[0] }),
  });

  // Generate
  const generateCmd = program
    .command('generate <input>')
    .description('Generate a reproducible integer sequence from a string')
    .option('--count <number>', 'How many integers to draw', '5')
    .option('--min <number>', 'Inclusive lower bound')
    .option('--max <number>', 'Inclusive upper bound')
    .option('--format <format>', 'Output format (json|table|csv)', 'json');

  defineCommand(generateCmd, ctx, {
    schema: generateSchema,
    handler: generateSeedsHandler,
    argsToOpts: (args, rawOpts) => ({ ...rawOpts, input: args[0] }),
    coerce: (raw) => coerceNumbers(raw, ['count', 'min', 'max']),
  });

  // Sample
  const sampleCmd = program
    .command('sample')
    .description('Sample seeds from a master seed with one of the sampling strategies')
    .option('--method <method>', `Sampling method (${methods})`, 'simple')
    .option('--n-samples <number>', 'Number of seeds to return', '10')
    .option('--master-seed <number>', 'Master seed (any integer)')
    .option('--input <string>', 'Derive the master seed from this string instead')
    .option('--min <number>', 'Inclusive lower bound (default 0)')
    .option('--max <number>', 'Inclusive upper bound (default 2147483647)')
    .option('--n-strata <number>', 'stratified: number of strata')
    .option('--n-clusters <number>', 'cluster: number of clusters')
    .option('--samples-per-cluster <number>', 'cluster: members per cluster')
    .option('--format <format>', 'Output format (json|table|csv)', 'json');

  defineCommand(sampleCmd, ctx, {
    schema: sampleSchema,
    handler: sampleSeedsHandler,
    coerce: (raw) =>
      coerceNumbers(raw, [
        'nSamples',
        'masterSeed',
        'min',
        'max',
        'nStrata',
        'nClusters',
        'samplesPerCluster',
      ]),
  });

  // Hierarchy
  const hierarchyCmd = program
    .command('hierarchy <experimentName>')
    .description('Build a master → seed → sub-seed hierarchy for an experiment')
    .option('--method <method>', `Sampling method (${methods})`, 'simple')
    .option('--n-seeds <number>', 'Seeds under the master seed', '10')
    .option('--n-sub-seeds <number>', 'Children under every seed', '5')
    .option('--max-depth <number>', 'Levels below the master seed', '2')
    .option('--master-seed <number>', 'Master seed (default: derived from the name)')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(hierarchyCmd, ctx, {
    schema: hierarchySchema,
    handler: buildHierarchyHandler,
    argsToOpts: (args, rawOpts) => ({ ...rawOpts, experimentName: args[0] }),
    coerce: (raw) => coerceNumbers(raw, ['nSeeds', 'nSubSeeds', 'maxDepth', 'masterSeed']),
  });
}
