import { describe, it, expect } from 'vitest';
import { hashInputHandler } from '../../../src/handlers/seeds/hash-input.js';
import { generateSeedsHandler } from '../../../src/handlers/seeds/generate-seeds.js';
import { sampleSeedsHandler } from '../../../src/handlers/seeds/sample-seeds.js';
import { buildHierarchyHandler } from '../../../src/handlers/seeds/build-hierarchy.js';
import { hierarchySchema, sampleSchema } from '../../../src/command-defs/seeds.js';
import { createTestContext } from '../../helpers.js';

describe('hashInputHandler', () => {
  it('should return the digest and seed of the input', () => {
    const { ctx } = createTestContext();
    expect(hashInputHandler({ input: 'abc', format: 'json' }, ctx)).toEqual({
      input: 'abc',
      hash: '900150983cd24fb0d6963f7d28e17f72',
      seed: 2416005272,
    });
  });
});

describe('generateSeedsHandler', () => {
  it('should draw from the given range', () => {
    const { ctx } = createTestContext();
    expect(generateSeedsHandler({ input: 'abc', count: 5, min: 0, max: 100, format: 'json' }, ctx)).toEqual(
      [99, 46, 15, 8, 41]
    );
  });

  it('should fall back to the configured range', () => {
    const { ctx } = createTestContext({ defaultMinValue: 1, defaultMaxValue: 6 });
    expect(generateSeedsHandler({ input: 'abc', count: 4, format: 'json' }, ctx)).toEqual([1, 3, 5, 3]);
  });
});

describe('sampleSeedsHandler', () => {
  it('should sample from an explicit master seed', () => {
    const { ctx } = createTestContext();
    const args = sampleSchema.parse({ masterSeed: 42, nSamples: 5, min: 0, max: 1000 });
    expect(sampleSeedsHandler(args, ctx)).toEqual([815, 821, 49, 193, 909]);
  });

  it('should derive the master seed from --input', () => {
    const { ctx } = createTestContext();
    const args = sampleSchema.parse({ input: 'abc', nSamples: 3 });
    expect(sampleSeedsHandler(args, ctx)).toEqual([459453610, 271654898, 1339560490]);
  });

  it('should pass method options through', () => {
    const { ctx } = createTestContext();
    const args = sampleSchema.parse({
      masterSeed: 42,
      method: 'stratified',
      nSamples: 25,
      nStrata: 5,
      min: 0,
      max: 1000,
    });
    const seeds = sampleSeedsHandler(args, ctx);
    expect(seeds.slice(0, 5)).toEqual([156, 90, 104, 5, 178]);
    expect(seeds.slice(20)).toEqual([860, 924, 968, 888, 833]);
  });

  it('should use the configured cluster radius', () => {
    const { ctx } = createTestContext({ clusterRadiusFraction: 0 });
    const args = sampleSchema.parse({
      masterSeed: 42,
      method: 'cluster',
      nSamples: 6,
      nClusters: 2,
      min: 0,
      max: 1000,
    });
    const seeds = sampleSeedsHandler(args, ctx);
    expect(new Set(seeds.slice(0, 3)).size).toBe(1);
    expect(new Set(seeds.slice(3)).size).toBe(1);
  });
});

describe('buildHierarchyHandler', () => {
  it('should list every seed with its level and parent', () => {
    const { ctx } = createTestContext();
    const args = hierarchySchema.parse({
      experimentName: 'demo',
      masterSeed: 42,
      nSeeds: 2,
      nSubSeeds: 1,
      maxDepth: 1,
    });
    expect(buildHierarchyHandler(args, ctx)).toEqual([
      { level: 0, index: 0, seed: 42, parent: null },
      { level: 1, index: 0, seed: 434237308, parent: 42 },
      { level: 1, index: 1, seed: 1925393290, parent: 42 },
    ]);
  });

  it('should attach sub-seeds to their parents by position', () => {
    const { ctx } = createTestContext();
    const args = hierarchySchema.parse({
      experimentName: 'demo',
      masterSeed: 42,
      nSeeds: 2,
      nSubSeeds: 3,
      maxDepth: 2,
    });
    const rows = buildHierarchyHandler(args, ctx);
    const level2 = rows.filter((row) => row.level === 2);
    expect(level2).toHaveLength(6);
    expect(level2.slice(0, 3).every((row) => row.parent === 434237308)).toBe(true);
    expect(level2.slice(3).every((row) => row.parent === 1925393290)).toBe(true);
  });
});
