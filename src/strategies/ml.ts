/**
 * ML Strategy
 *
 * Anomaly detection and unsupervised grouping over the numeric columns:
 * 1. rows missing any numeric value are excluded
 * 2. features are standardized
 * 3. an isolation forest flags `contamination` of the analyzed rows
 * 4. k-means runs for each k in the cluster range; best silhouette wins
 *
 * Outlier percentages are relative to the original row count so runs with
 * different missing-data loss stay comparable.
 */

import type { Dataset, DatasetProfile, MlSummary } from '../core/types.js';
import type { AnalysisConfig } from '../config/analysis.js';
import type { AnalysisStrategy } from './types.js';
import { InsufficientDataError } from '../core/errors.js';
import { asNumber, isMissing } from '../dataset/values.js';
import { standardize, type Matrix } from '../ml/scaler.js';
import { detectOutliers } from '../ml/isolation-forest.js';
import { kmeans, type KMeansResult } from '../ml/kmeans.js';
import { silhouetteScore } from '../ml/silhouette.js';
import { createRandom, sampleIndices } from '../ml/random.js';
import { round } from '../stats/descriptive.js';

export type MlStrategyConfig = Pick<
  AnalysisConfig,
  | 'contamination'
  | 'clusterMin'
  | 'clusterMax'
  | 'randomSeed'
  | 'nEstimators'
  | 'maxSamples'
  | 'kmeansInit'
  | 'kmeansMaxIterations'
  | 'silhouetteSampleSize'
>;

export interface NumericTable {
  columns: string[];
  data: Matrix;
  excludedRowCount: number;
}

export interface ClusterSelection {
  result: KMeansResult;
  silhouette: number;
}

export function extractNumericTable(dataset: Dataset, columns: readonly string[]): NumericTable {
  const data: Matrix = [];
  let excludedRowCount = 0;

  for (const row of dataset.rows) {
    const values: number[] = [];
    for (const column of columns) {
      const value = row[column];
      const parsed = value && !isMissing(value) ? asNumber(value) : undefined;
      if (parsed === undefined) break;
      values.push(parsed);
    }

    if (values.length === columns.length) {
      data.push(values);
    } else {
      excludedRowCount++;
    }
  }

  return { columns: [...columns], data, excludedRowCount };
}

/**
 * Fit k-means for every candidate k and keep the highest silhouette
 * (ties keep the smaller k). k never exceeds n - 1, except that two rows
 * still form two groups.
 */
export function selectClusters(data: Matrix, config: MlStrategyConfig): ClusterSelection {
  const n = data.length;
  const upper = Math.max(config.clusterMin, Math.min(config.clusterMax, n - 1));
  const sample = sampleIndices(createRandom(config.randomSeed), n, config.silhouetteSampleSize)
    .sort((a, b) => a - b);

  let best: ClusterSelection | undefined;
  for (let k = config.clusterMin; k <= upper; k++) {
    const result = kmeans(data, k, {
      nInit: config.kmeansInit,
      maxIterations: config.kmeansMaxIterations,
      random: createRandom(config.randomSeed + k),
    });
    const silhouette = n > k ? silhouetteScore(data, result.labels, sample) : 0;

    if (!best || silhouette > best.silhouette) {
      best = { result, silhouette };
    }
  }

  if (!best) {
    throw new InsufficientDataError(n, config.clusterMin);
  }
  return best;
}

export class MlStrategy implements AnalysisStrategy<MlSummary> {
  readonly route = 'ml' as const;

  constructor(private readonly config: MlStrategyConfig) {}

  analyze(dataset: Dataset, profile: DatasetProfile): MlSummary {
    const originalRowCount = dataset.rows.length;
    const table = extractNumericTable(dataset, profile.numericColumns);
    const analyzedRowCount = table.data.length;

    if (table.columns.length === 0 || analyzedRowCount < this.config.clusterMin) {
      throw new InsufficientDataError(
        table.columns.length === 0 ? 0 : analyzedRowCount,
        this.config.clusterMin
      );
    }

    const { data } = standardize(table.data);

    const outliers = detectOutliers(data, {
      nEstimators: this.config.nEstimators,
      maxSamples: this.config.maxSamples,
      contamination: this.config.contamination,
      random: createRandom(this.config.randomSeed),
    });

    const { result, silhouette } = selectClusters(data, this.config);

    const clusterDistribution: Record<string, number> = {};
    for (let c = 0; c < result.k; c++) {
      clusterDistribution[`C${c}`] = 0;
    }
    for (const label of result.labels) {
      clusterDistribution[`C${label}`]++;
    }

    return {
      route: 'ml',
      outlierCount: outliers.outlierCount,
      outlierPercent: (outliers.outlierCount / originalRowCount) * 100,
      clusterCount: result.k,
      clusterDistribution,
      silhouetteScore: round(silhouette),
      analyzedRowCount,
      excludedRowCount: table.excludedRowCount,
      numericColumns: table.columns,
    };
  }
}
