/**
 * Common evaluation metrics for recording alongside experiment seeds
 */

import { ValidationError } from '@seedhash/utils';

export type RegressionMetrics = {
  rmse: number;
  mae: number;
  r2: number;
  /** Percent, computed over non-zero targets only; 0 when every target is 0 */
  mape: number;
};

export type ClassificationMetrics = {
  accuracy: number;
  precision: number;
  recall: number;
  f1: number;
};

export type ClusteringMetrics = {
  silhouette: number;
  nClusters: number;
  nSamples: number;
};

type Label = string | number;

function assertPaired(a: readonly unknown[], b: readonly unknown[], names: [string, string]): void {
  if (a.length === 0) {
    throw new ValidationError(`${names[0]} must not be empty`, 'InvalidCount', { name: names[0] });
  }
  if (a.length !== b.length) {
    throw new ValidationError(
      `${names[0]} and ${names[1]} must have the same length, got ${a.length} and ${b.length}`,
      'InvalidCount',
      { [names[0]]: a.length, [names[1]]: b.length }
    );
  }
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function f1Score(precision: number, recall: number): number {
  return ratio(2 * precision * recall, precision + recall);
}

function euclidean(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

export class MLMetrics {
  static regression(yTrue: readonly number[], yPred: readonly number[]): RegressionMetrics {
    assertPaired(yTrue, yPred, ['yTrue', 'yPred']);

    const residuals = yTrue.map((t, i) => t - (yPred[i] ?? 0));
    const mse = mean(residuals.map((r) => r * r));
    const mae = mean(residuals.map((r) => Math.abs(r)));

    const trueMean = mean([...yTrue]);
    const ssRes = residuals.reduce((sum, r) => sum + r * r, 0);
    const ssTot = yTrue.reduce((sum, t) => sum + (t - trueMean) ** 2, 0);
    const r2 = ssTot !== 0 ? 1 - ssRes / ssTot : 0;

    const percentErrors: number[] = [];
    yTrue.forEach((t, i) => {
      if (t !== 0) percentErrors.push(Math.abs((residuals[i] ?? 0) / t));
    });
    const mape = percentErrors.length > 0 ? mean(percentErrors) * 100 : 0;

    return { rmse: Math.sqrt(mse), mae, r2, mape };
  }

  /**
   * Accuracy plus precision/recall/F1. With exactly two classes in `yTrue` the
   * scores are for `positiveLabel`; otherwise they are macro averages over the
   * classes of `yTrue`, and F1 is taken from the averaged precision and recall.
   */
  static classification(
    yTrue: readonly Label[],
    yPred: readonly Label[],
    positiveLabel: Label = 1
  ): ClassificationMetrics {
    assertPaired(yTrue, yPred, ['yTrue', 'yPred']);

    const accuracy = mean(yTrue.map((t, i) => (t === yPred[i] ? 1 : 0)));

    const scoresFor = (cls: Label): { precision: number; recall: number } => {
      let tp = 0;
      let fp = 0;
      let fn = 0;
      yTrue.forEach((t, i) => {
        const p = yPred[i];
        if (t === cls && p === cls) tp++;
        else if (t !== cls && p === cls) fp++;
        else if (t === cls && p !== cls) fn++;
      });
      return { precision: ratio(tp, tp + fp), recall: ratio(tp, tp + fn) };
    };

    const classes = Array.from(new Set(yTrue));
    if (classes.length === 2) {
      const { precision, recall } = scoresFor(positiveLabel);
      return { accuracy, precision, recall, f1: f1Score(precision, recall) };
    }

    const perClass = classes.map(scoresFor);
    const precision = mean(perClass.map((s) => s.precision));
    const recall = mean(perClass.map((s) => s.recall));
    return { accuracy, precision, recall, f1: f1Score(precision, recall) };
  }

  /**
   * Mean silhouette coefficient with Euclidean distance. Returns a silhouette of
   * 0 when there are fewer than two clusters or every point is its own cluster.
   */
  static clustering(points: readonly (readonly number[])[], labels: readonly Label[]): ClusteringMetrics {
    assertPaired(points, labels, ['points', 'labels']);
    const dims = points[0]?.length ?? 0;
    if (points.some((p) => p.length !== dims)) {
      throw new ValidationError('All points must have the same dimension', 'InvalidOption', {
        dimension: dims,
      });
    }

    const clusters = Array.from(new Set(labels));
    const nSamples = points.length;
    if (clusters.length < 2 || clusters.length >= nSamples) {
      return { silhouette: 0, nClusters: clusters.length, nSamples };
    }

    const members = new Map<Label, number[]>();
    labels.forEach((label, i) => {
      const list = members.get(label) ?? [];
      list.push(i);
      members.set(label, list);
    });

    const meanDistance = (i: number, indices: number[]): number => {
      const point = points[i] ?? [];
      return mean(indices.filter((j) => j !== i).map((j) => euclidean(point, points[j] ?? [])));
    };

    const scores = points.map((_, i) => {
      const own = labels[i];
      const a = meanDistance(i, own === undefined ? [] : members.get(own) ?? []);
      let b = Infinity;
      for (const [label, indices] of members) {
        if (label !== own) b = Math.min(b, meanDistance(i, indices));
      }
      const denom = Math.max(a, b);
      return denom > 0 ? (b - a) / denom : 0;
    });

    return { silhouette: mean(scores), nClusters: clusters.length, nSamples };
  }
}
