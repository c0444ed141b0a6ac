/**
 * Seed Experiment Manager
 *
 * Builds master → seed → sub-seed hierarchies with any sampling strategy and
 * records per-seed metrics for later comparison.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { DateTime } from 'luxon';
import {
  DEFAULT_SEED_RANGE,
  SeedSampler,
  deriveSeed,
  runSampling,
  validateRange,
  type SamplingStrategy,
  type SeedRange,
} from '@seedhash/core';
import {
  ValidationError,
  createLogger,
  formatCSV,
  type Logger,
} from '@seedhash/utils';
import {
  ExperimentResultInputSchema,
  type ExperimentResult,
  type ExperimentResultInput,
  type ExperimentSummary,
  type ExportFormat,
  type MetricStatistics,
  type ResultRow,
  type SeedHierarchy,
  type SeedNode,
} from './types.js';

export interface SeedExperimentManagerOptions {
  /** Root seed; derived from the experiment name when omitted */
  masterSeed?: number;
  /** Passed to every SeedSampler the manager creates */
  clusterRadiusFraction?: number;
  /** Clock for result timestamps */
  now?: () => DateTime;
  logger?: Logger;
}

export interface SeedHierarchyOptions {
  /** Children of the master seed (default 10) */
  nSeeds?: number;
  /** Children of every seed below level 1 (default 5) */
  nSubSeeds?: number;
  /** Deepest level to generate, 1 = seeds only (default 2) */
  maxDepth?: number;
  strategy?: SamplingStrategy;
  /** Range every level draws from (default [0, 2^31 - 1]) */
  seedRange?: SeedRange;
}

/** Columns that lead every result row, in order */
export const PRIORITY_COLUMNS = [
  'experiment_id',
  'seed_level',
  'master_seed',
  'seed',
  'sub_seed',
  'current_seed',
  'sampling_method',
  'ml_task',
] as const;

function positive(value: number, name: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, 'InvalidCount', {
      name,
      value,
    });
  }
  return value;
}

function countBy<T>(items: T[], key: (item: T) => string | number): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = String(key(item));
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

function describeValues(values: number[]): MetricStatistics {
  const n = values.length;
  const mean = values.reduce((sum, v) => sum + v, 0) / n;
  const std =
    n < 2 ? null : Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1));
  return { mean, std, min: Math.min(...values), max: Math.max(...values) };
}

export class SeedExperimentManager {
  readonly experimentName: string;
  readonly masterSeed: number;
  private readonly sampler: SeedSampler;
  private readonly clusterRadiusFraction?: number;
  private readonly now: () => DateTime;
  private readonly logger: Logger;
  private readonly nodes = new Map<number, SeedNode>();
  private readonly results: ExperimentResult[] = [];

  constructor(experimentName: string, options: SeedExperimentManagerOptions = {}) {
    this.experimentName = experimentName;
    this.masterSeed = options.masterSeed ?? deriveSeed(experimentName);
    this.clusterRadiusFraction = options.clusterRadiusFraction;
    this.now = options.now ?? (() => DateTime.utc());
    this.logger = (options.logger ?? createLogger('@seedhash/experiments')).child({
      experiment: experimentName,
    });

    // Validates the master seed and the radius fraction eagerly
    this.sampler = this.samplerFor(this.masterSeed);
  }

  /**
   * Generate seeds level by level: the master seed's children at depth 1, then
   * `nSubSeeds` children for every seed of the previous level.
   *
   * Each parent gets its own SeedSampler, so a subtree depends only on its
   * parent seed and the options.
   */
  generateSeedHierarchy(options: SeedHierarchyOptions = {}): SeedHierarchy {
    const nSeeds = positive(options.nSeeds ?? 10, 'nSeeds');
    const nSubSeeds = positive(options.nSubSeeds ?? 5, 'nSubSeeds');
    const maxDepth = positive(options.maxDepth ?? 2, 'maxDepth');
    const strategy: SamplingStrategy = options.strategy ?? { method: 'simple' };
    const requested = options.seedRange ?? DEFAULT_SEED_RANGE;
    const seedRange = validateRange(requested.min, requested.max);

    const hierarchy: SeedHierarchy = new Map([[0, [this.masterSeed]]]);
    this.nodeFor(this.masterSeed, 0);

    for (let depth = 1; depth <= maxDepth; depth++) {
      const nSamples = depth === 1 ? nSeeds : nSubSeeds;
      const level: number[] = [];

      for (const parent of hierarchy.get(depth - 1) ?? []) {
        const sampler = parent === this.masterSeed ? this.sampler : this.samplerFor(parent);
        const children = runSampling(sampler, strategy, nSamples, seedRange);
        level.push(...children);

        this.nodeFor(parent, depth - 1).children.push(...children);
        for (const child of children) {
          // The master keeps its root position even if a child collides with it
          if (child === this.masterSeed) continue;
          const node = this.nodeFor(child, depth);
          node.parent = parent;
          node.level = depth;
        }
      }

      hierarchy.set(depth, level);
    }

    this.logger.info('Generated seed hierarchy', {
      method: strategy.method,
      maxDepth,
      levels: Array.from(hierarchy, ([lvl, seeds]) => `${lvl}:${seeds.length}`).join(','),
    });
    return hierarchy;
  }

  /**
   * Seeds from the master down to `seed`, following recorded parent links.
   * A seed the manager never generated is attached directly below the master.
   */
  getLineage(seed: number): number[] {
    const lineage = [seed];
    const visited = new Set<number>([seed]);
    let parent = this.nodes.get(seed)?.parent;
    while (parent !== undefined && !visited.has(parent)) {
      lineage.unshift(parent);
      visited.add(parent);
      parent = this.nodes.get(parent)?.parent;
    }
    if (lineage[0] !== this.masterSeed) {
      lineage.unshift(this.masterSeed);
    }
    return lineage;
  }

  /**
   * Children recorded for a seed (empty for leaves and unknown seeds)
   */
  getChildren(seed: number): number[] {
    return [...(this.nodes.get(seed)?.children ?? [])];
  }

  addExperimentResult(input: ExperimentResultInput): ExperimentResult {
    const parsed = ExperimentResultInputSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `Invalid experiment result${issue ? ` at '${issue.path.join('.')}'` : ''}: ${issue?.message ?? 'unknown issue'}`,
        'InvalidOption',
        { issues: parsed.error.issues }
      );
    }

    const { seed, mlTask, metrics, samplingMethod, metadata } = parsed.data;
    const seedHierarchy = this.getLineage(seed);
    const result: ExperimentResult = {
      experimentId: `${this.experimentName}_${mlTask}_seed${seed}`,
      seedHierarchy,
      seedLevel: seedHierarchy.length - 1,
      samplingMethod,
      mlTask,
      metrics: { ...metrics },
      metadata: { ...metadata },
      timestamp: this.now().toISO() ?? '',
    };

    this.results.push(result);
    this.logger.debug('Recorded experiment result', { seed, mlTask });
    return result;
  }

  getResults(): ExperimentResult[] {
    return [...this.results];
  }

  /**
   * Column order: priority columns, sorted metric_*, sorted meta_*, then the rest
   */
  getResultColumns(): string[] {
    const metricCols = new Set<string>();
    const metaCols = new Set<string>();
    for (const result of this.results) {
      Object.keys(result.metrics).forEach((name) => metricCols.add(`metric_${name}`));
      Object.keys(result.metadata).forEach((key) => metaCols.add(`meta_${key}`));
    }
    return [
      ...PRIORITY_COLUMNS,
      ...Array.from(metricCols).sort(),
      ...Array.from(metaCols).sort(),
      'timestamp',
    ];
  }

  /**
   * One flat row per result; every row carries every column (null when absent)
   */
  getResultRows(): ResultRow[] {
    const columns = this.getResultColumns();
    return this.results.map((result) => {
      const flat: ResultRow = {
        experiment_id: result.experimentId,
        seed_level: result.seedLevel,
        master_seed: result.seedHierarchy[0] ?? null,
        seed: result.seedHierarchy[1] ?? null,
        sub_seed: result.seedHierarchy[2] ?? null,
        current_seed: result.seedHierarchy[result.seedHierarchy.length - 1] ?? null,
        sampling_method: result.samplingMethod,
        ml_task: result.mlTask,
        timestamp: result.timestamp,
      };
      for (const [name, value] of Object.entries(result.metrics)) {
        flat[`metric_${name}`] = value;
      }
      for (const [key, value] of Object.entries(result.metadata)) {
        flat[`meta_${key}`] = value;
      }

      const row: ResultRow = {};
      for (const column of columns) {
        row[column] = flat[column] ?? null;
      }
      return row;
    });
  }

  getSummaryStatistics(): ExperimentSummary {
    const metricValues = new Map<string, number[]>();
    for (const result of this.results) {
      for (const [name, value] of Object.entries(result.metrics)) {
        const values = metricValues.get(name) ?? [];
        values.push(value);
        metricValues.set(name, values);
      }
    }

    const metricStatistics: Record<string, MetricStatistics> = {};
    for (const name of Array.from(metricValues.keys()).sort()) {
      metricStatistics[name] = describeValues(metricValues.get(name) ?? []);
    }

    return {
      totalExperiments: this.results.length,
      mlTasks: countBy(this.results, (r) => r.mlTask),
      samplingMethods: countBy(this.results, (r) => r.samplingMethod),
      seedLevels: countBy(this.results, (r) => r.seedLevel),
      metricStatistics,
    };
  }

  /**
   * Write all result rows to `filePath` as CSV or a JSON array
   */
  async exportResults(filePath: string, format: ExportFormat = 'csv'): Promise<void> {
    const rows = this.getResultRows();
    let content: string;
    switch (format) {
      case 'csv':
        content = formatCSV(rows, this.getResultColumns());
        break;
      case 'json':
        content = JSON.stringify(rows, null, 2);
        break;
      default:
        throw new ValidationError(`Unsupported export format: ${String(format)}`, 'InvalidOption', {
          format,
        });
    }

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content + '\n', 'utf-8');
    this.logger.info('Exported experiment results', { path: filePath, format, rows: rows.length });
  }

  private samplerFor(seed: number): SeedSampler {
    return new SeedSampler(seed, {
      clusterRadiusFraction: this.clusterRadiusFraction,
      logger: this.logger,
    });
  }

  private nodeFor(seed: number, level: number): SeedNode {
    const existing = this.nodes.get(seed);
    if (existing) {
      return existing;
    }
    const node: SeedNode = { level, children: [] };
    this.nodes.set(seed, node);
    return node;
  }
}
