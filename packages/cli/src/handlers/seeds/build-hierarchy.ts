/**
 * Build Hierarchy Handler
 */

import type { z } from 'zod';
import { strategyFor } from '@seedhash/core';
import { SeedExperimentManager } from '@seedhash/experiments';
import type { CommandContext } from '../../core/command-context.js';
import type { hierarchySchema } from '../../command-defs/seeds.js';

export type BuildHierarchyArgs = z.infer<typeof hierarchySchema>;

export interface HierarchyRow {
  level: number;
  index: number;
  seed: number;
  parent: number | null;
}

export function buildHierarchyHandler(args: BuildHierarchyArgs, ctx: CommandContext): HierarchyRow[] {
  const manager = new SeedExperimentManager(args.experimentName, {
    masterSeed: args.masterSeed,
    clusterRadiusFraction: ctx.config.clusterRadiusFraction,
    logger: ctx.logger,
  });
  const hierarchy = manager.generateSeedHierarchy({
    nSeeds: args.nSeeds,
    nSubSeeds: args.nSubSeeds,
    maxDepth: args.maxDepth,
    strategy: strategyFor(args.method),
  });

  // Every parent yields the same number of children, in order, so a child's
  // parent is found by position rather than by value
  const rows: HierarchyRow[] = [];
  for (const [level, seeds] of hierarchy) {
    const perParent = level === 1 ? args.nSeeds : args.nSubSeeds;
    const parents = hierarchy.get(level - 1) ?? [];
    seeds.forEach((seed, index) => {
      rows.push({
        level,
        index,
        seed,
        parent: level === 0 ? null : parents[Math.floor(index / perParent)] ?? null,
      });
    });
  }
  return rows;
}
