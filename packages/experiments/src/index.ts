/**
 * @seedhash/experiments
 *
 * Hierarchical seed experiments and metric tracking built on @seedhash/core.
 */

export { SeedExperimentManager, PRIORITY_COLUMNS } from './seed-experiment-manager.js';
export type {
  SeedExperimentManagerOptions,
  SeedHierarchyOptions,
} from './seed-experiment-manager.js';

export { MLMetrics } from './metrics.js';
export type { RegressionMetrics, ClassificationMetrics, ClusteringMetrics } from './metrics.js';

export { ML_TASKS, MLTaskSchema, ExperimentResultInputSchema } from './types.js';
export type {
  MLTask,
  ExperimentResult,
  ExperimentResultInput,
  SeedHierarchy,
  SeedNode,
  ResultRow,
  MetricStatistics,
  ExperimentSummary,
  ExportFormat,
} from './types.js';
