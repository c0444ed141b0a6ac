/**
 * Seed Command Definitions
 *
 * Schemas for the seedhash CLI. Options arrive from commander as camelCase keys
 * and are coerced to numbers before these schemas run.
 */

import { z } from 'zod';
import { SamplingMethodSchema } from '@seedhash/core';

const formatSchema = z.enum(['json', 'table', 'csv']);

/**
 * Hash schema
 */
export const hashSchema = z.object({
  input: z.string(),
  format: formatSchema.default('json'),
});

/**
 * Generate schema
 */
export const generateSchema = z.object({
  input: z.string(),
  count: z.number().int().positive().default(5),
  min: z.number().int().optional(),
  max: z.number().int().optional(),
  format: formatSchema.default('json'),
});

/**
 * Sample schema
 */
export const sampleSchema = z
  .object({
    method: SamplingMethodSchema.default('simple'),
    nSamples: z.number().int().positive().default(10),
    masterSeed: z.number().int().optional(),
    input: z.string().optional(),
    min: z.number().int().optional(),
    max: z.number().int().optional(),
    nStrata: z.number().int().positive().optional(),
    nClusters: z.number().int().positive().optional(),
    samplesPerCluster: z.number().int().positive().optional(),
    format: formatSchema.default('json'),
  })
  .refine((opts) => (opts.masterSeed === undefined) !== (opts.input === undefined), {
    message: 'Provide exactly one of --master-seed or --input',
    path: ['masterSeed'],
  });

/**
 * Hierarchy schema
 */
export const hierarchySchema = z.object({
  experimentName: z.string().min(1),
  method: SamplingMethodSchema.default('simple'),
  nSeeds: z.number().int().positive().default(10),
  nSubSeeds: z.number().int().positive().default(5),
  maxDepth: z.number().int().positive().default(2),
  masterSeed: z.number().int().optional(),
  format: formatSchema.default('table'),
});
