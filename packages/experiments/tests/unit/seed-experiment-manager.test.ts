import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DateTime } from 'luxon';
import { ValidationError } from '@seedhash/utils';
import { PRIORITY_COLUMNS, SeedExperimentManager } from '../../src/seed-experiment-manager.js';

const RANGE = { min: 0, max: 1000 };
const FIXED_TIME = DateTime.utc(2026, 1, 2, 3, 4, 5);

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ValidationError ? error.kind : 'not-a-validation-error';
  }
  return undefined;
}

function createManager(): SeedExperimentManager {
  return new SeedExperimentManager('demo', {
    masterSeed: 42,
    clusterRadiusFraction: 0.02,
    now: () => FIXED_TIME,
  });
}

describe('SeedExperimentManager', () => {
  describe('construction', () => {
    it('should derive the master seed from the experiment name', () => {
      expect(new SeedExperimentManager('demo').masterSeed).toBe(4261531178);
    });

    it('should reject a non-integer master seed', () => {
      expect(errorKind(() => new SeedExperimentManager('demo', { masterSeed: 2.5 }))).toBe(
        'TypeMismatch'
      );
    });

    it('should keep a negative master seed as the hierarchy root', () => {
      const manager = new SeedExperimentManager('demo', {
        masterSeed: -5,
        clusterRadiusFraction: 0.02,
      });
      const hierarchy = manager.generateSeedHierarchy({ nSeeds: 2, maxDepth: 1, seedRange: RANGE });
      expect(hierarchy.get(0)).toEqual([-5]);
      expect(hierarchy.get(1)).toHaveLength(2);
    });
  });

  describe('generateSeedHierarchy', () => {
    it('should build every level from its parents', () => {
      const manager = createManager();
      const hierarchy = manager.generateSeedHierarchy({
        nSeeds: 3,
        nSubSeeds: 2,
        maxDepth: 2,
        seedRange: RANGE,
      });

      expect(Array.from(hierarchy.entries())).toEqual([
        [0, [42]],
        [1, [815, 821, 49]],
        [2, [395, 545, 668, 655, 261, 103]],
      ]);
      expect(manager.getChildren(42)).toEqual([815, 821, 49]);
      expect(manager.getChildren(821)).toEqual([668, 655]);
      expect(manager.getChildren(655)).toEqual([]);
    });

    it('should size levels as nSeeds * nSubSeeds^(depth - 1)', () => {
      const hierarchy = createManager().generateSeedHierarchy({
        nSeeds: 4,
        nSubSeeds: 3,
        maxDepth: 3,
        strategy: { method: 'stratified', nStrata: 2 },
      });
      expect(hierarchy.get(0)).toHaveLength(1);
      expect(hierarchy.get(1)).toHaveLength(4);
      expect(hierarchy.get(2)).toHaveLength(12);
      expect(hierarchy.get(3)).toHaveLength(36);
    });

    it('should use the same seeds for the same options', () => {
      const options = { nSeeds: 5, nSubSeeds: 2, strategy: { method: 'cluster' as const } };
      expect(createManager().generateSeedHierarchy(options)).toEqual(
        createManager().generateSeedHierarchy(options)
      );
    });

    it('should reject non-positive counts', () => {
      const manager = createManager();
      expect(errorKind(() => manager.generateSeedHierarchy({ nSeeds: 0 }))).toBe('InvalidCount');
      expect(errorKind(() => manager.generateSeedHierarchy({ maxDepth: 0 }))).toBe('InvalidCount');
    });

    it('should accept negative seed ranges', () => {
      const hierarchy = createManager().generateSeedHierarchy({
        nSeeds: 4,
        nSubSeeds: 2,
        seedRange: { min: -10, max: 10 },
      });
      const level2 = hierarchy.get(2) ?? [];
      expect(level2).toHaveLength(8);
      expect(level2.every((seed) => seed >= -10 && seed <= 10)).toBe(true);
    });

    it('should reject an inverted seed range', () => {
      expect(
        errorKind(() => createManager().generateSeedHierarchy({ seedRange: { min: 10, max: -10 } }))
      ).toBe('InvalidRange');
    });
  });

  describe('getLineage', () => {
    it('should walk from the master seed down to a sub-seed', () => {
      const manager = createManager();
      manager.generateSeedHierarchy({ nSeeds: 3, nSubSeeds: 2, seedRange: RANGE });
      expect(manager.getLineage(655)).toEqual([42, 821, 655]);
      expect(manager.getLineage(815)).toEqual([42, 815]);
      expect(manager.getLineage(42)).toEqual([42]);
    });

    it('should attach unknown seeds directly below the master', () => {
      expect(createManager().getLineage(7)).toEqual([42, 7]);
    });
  });

  describe('results', () => {
    let manager: SeedExperimentManager;

    beforeEach(() => {
      manager = createManager();
      manager.generateSeedHierarchy({ nSeeds: 3, nSubSeeds: 2, seedRange: RANGE });
    });

    it('should record a result with its lineage', () => {
      const result = manager.addExperimentResult({
        seed: 655,
        mlTask: 'regression',
        metrics: { rmse: 0.5, r2: 0.9 },
        samplingMethod: 'simple',
        metadata: { model: 'ridge' },
      });

      expect(result).toEqual({
        experimentId: 'demo_regression_seed655',
        seedHierarchy: [42, 821, 655],
        seedLevel: 2,
        samplingMethod: 'simple',
        mlTask: 'regression',
        metrics: { rmse: 0.5, r2: 0.9 },
        metadata: { model: 'ridge' },
        timestamp: '2026-01-02T03:04:05.000Z',
      });
      expect(manager.getResults()).toHaveLength(1);
    });

    it('should reject malformed results', () => {
      expect(
        errorKind(() =>
          manager.addExperimentResult({
            seed: 1.5,
            mlTask: 'regression',
            metrics: {},
            samplingMethod: 'simple',
          })
        )
      ).toBe('InvalidOption');
    });

    it('should flatten results into rows with a stable column order', () => {
      manager.addExperimentResult({
        seed: 655,
        mlTask: 'regression',
        metrics: { rmse: 0.5, r2: 0.9 },
        samplingMethod: 'simple',
        metadata: { model: 'ridge' },
      });
      manager.addExperimentResult({
        seed: 815,
        mlTask: 'classification',
        metrics: { accuracy: 0.8 },
        samplingMethod: 'simple',
      });

      expect(manager.getResultColumns()).toEqual([
        ...PRIORITY_COLUMNS,
        'metric_accuracy',
        'metric_r2',
        'metric_rmse',
        'meta_model',
        'timestamp',
      ]);

      const rows = manager.getResultRows();
      expect(rows[0]).toEqual({
        experiment_id: 'demo_regression_seed655',
        seed_level: 2,
        master_seed: 42,
        seed: 821,
        sub_seed: 655,
        current_seed: 655,
        sampling_method: 'simple',
        ml_task: 'regression',
        metric_accuracy: null,
        metric_r2: 0.9,
        metric_rmse: 0.5,
        meta_model: 'ridge',
        timestamp: '2026-01-02T03:04:05.000Z',
      });
      expect(rows[1]).toMatchObject({
        experiment_id: 'demo_classification_seed815',
        seed_level: 1,
        seed: 815,
        sub_seed: null,
        current_seed: 815,
        metric_accuracy: 0.8,
        metric_rmse: null,
        meta_model: null,
      });
    });

    it('should summarize counts and metric statistics', () => {
      manager.addExperimentResult({
        seed: 655,
        mlTask: 'regression',
        metrics: { rmse: 0.5 },
        samplingMethod: 'simple',
      });
      manager.addExperimentResult({
        seed: 395,
        mlTask: 'regression',
        metrics: { rmse: 1.5 },
        samplingMethod: 'cluster',
      });
      manager.addExperimentResult({
        seed: 815,
        mlTask: 'classification',
        metrics: { accuracy: 0.8 },
        samplingMethod: 'simple',
      });

      const summary = manager.getSummaryStatistics();
      expect(summary.totalExperiments).toBe(3);
      expect(summary.mlTasks).toEqual({ regression: 2, classification: 1 });
      expect(summary.samplingMethods).toEqual({ simple: 2, cluster: 1 });
      expect(summary.seedLevels).toEqual({ '2': 2, '1': 1 });
      expect(summary.metricStatistics.accuracy).toEqual({ mean: 0.8, std: null, min: 0.8, max: 0.8 });

      const rmse = summary.metricStatistics.rmse;
      expect(rmse?.mean).toBe(1);
      expect(rmse?.std).toBeCloseTo(Math.SQRT1_2, 10);
      expect(rmse?.min).toBe(0.5);
      expect(rmse?.max).toBe(1.5);
    });

    it('should report an empty summary before any result', () => {
      expect(manager.getSummaryStatistics()).toEqual({
        totalExperiments: 0,
        mlTasks: {},
        samplingMethods: {},
        seedLevels: {},
        metricStatistics: {},
      });
    });
  });

  describe('exportResults', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'seedhash-export-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write CSV with a header row', async () => {
      const manager = createManager();
      manager.generateSeedHierarchy({ nSeeds: 3, nSubSeeds: 2, seedRange: RANGE });
      manager.addExperimentResult({
        seed: 815,
        mlTask: 'classification',
        metrics: { accuracy: 0.8 },
        samplingMethod: 'simple',
        metadata: { note: 'a,b' },
      });

      const file = join(dir, 'nested', 'results.csv');
      await manager.exportResults(file, 'csv');

      expect(await readFile(file, 'utf-8')).toBe(
        [
          'experiment_id,seed_level,master_seed,seed,sub_seed,current_seed,sampling_method,ml_task,metric_accuracy,meta_note,timestamp',
          'demo_classification_seed815,1,42,815,,815,simple,classification,0.8,"a,b",2026-01-02T03:04:05.000Z',
          '',
        ].join('\n')
      );
    });

    it('should write JSON rows', async () => {
      const manager = createManager();
      manager.addExperimentResult({
        seed: 7,
        mlTask: 'unsupervised',
        metrics: { silhouette: 0.4 },
        samplingMethod: 'systematic',
      });

      const file = join(dir, 'results.json');
      await manager.exportResults(file, 'json');

      const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));
      expect(parsed).toEqual(manager.getResultRows());
    });
  });
});
