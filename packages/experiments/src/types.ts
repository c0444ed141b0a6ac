/**
 * Experiment tracking types
 */

import { z } from 'zod';
import { SamplingMethodSchema } from '@seedhash/core';

export const ML_TASKS = ['regression', 'classification', 'unsupervised', 'supervised'] as const;

export const MLTaskSchema = z.enum(ML_TASKS);

export type MLTask = z.infer<typeof MLTaskSchema>;

/**
 * Input accepted by `SeedExperimentManager.addExperimentResult`
 */
export const ExperimentResultInputSchema = z.object({
  seed: z.number().int(),
  mlTask: MLTaskSchema,
  metrics: z.record(z.number()),
  samplingMethod: SamplingMethodSchema,
  metadata: z.record(z.unknown()).optional(),
});

export type ExperimentResultInput = z.infer<typeof ExperimentResultInputSchema>;

/**
 * One recorded experiment run
 */
export interface ExperimentResult {
  experimentId: string;
  /** Seeds from the master down to the seed used: [master, seed, subSeed, ...] */
  seedHierarchy: number[];
  /** Depth in the hierarchy (0 = master, 1 = seed, 2 = sub-seed, ...) */
  seedLevel: number;
  samplingMethod: z.infer<typeof SamplingMethodSchema>;
  mlTask: MLTask;
  metrics: Record<string, number>;
  metadata: Record<string, unknown>;
  /** ISO 8601 */
  timestamp: string;
}

/**
 * Seeds per hierarchy level; level 0 holds only the master seed
 */
export type SeedHierarchy = Map<number, number[]>;

/**
 * Parent/child bookkeeping for one seed value
 */
export interface SeedNode {
  level: number;
  parent?: number;
  children: number[];
}

export type ResultRow = Record<string, unknown>;

export interface MetricStatistics {
  mean: number;
  /** Sample standard deviation (n - 1); null with fewer than two values */
  std: number | null;
  min: number;
  max: number;
}

export interface ExperimentSummary {
  totalExperiments: number;
  mlTasks: Record<string, number>;
  samplingMethods: Record<string, number>;
  seedLevels: Record<string, number>;
  metricStatistics: Record<string, MetricStatistics>;
}

export type ExportFormat = 'csv' | 'json';
