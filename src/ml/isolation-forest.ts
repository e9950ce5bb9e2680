/**
 * Isolation Forest
 *
 * Anomaly scoring by random axis-aligned partitioning (Liu et al., 2008).
 * Points that isolate in fewer splits score closer to 1. The forest flags
 * a fixed share of the population: floor(contamination * n) highest scores,
 * ties resolved by row order.
 */

import type { Matrix } from './scaler.js';
import { randomInt, sampleIndices, type Random } from './random.js';

const EULER_GAMMA = 0.5772156649015329;

interface LeafNode {
  type: 'leaf';
  size: number;
}

interface SplitNode {
  type: 'split';
  feature: number;
  threshold: number;
  left: TreeNode;
  right: TreeNode;
}

type TreeNode = LeafNode | SplitNode;

export interface IsolationForestOptions {
  nEstimators: number;
  maxSamples: number;
  contamination: number;
  random: Random;
}

export interface OutlierResult {
  scores: number[];
  flagged: boolean[];
  outlierCount: number;
}

/** Average path length of an unsuccessful BST search over n points. */
export function averagePathLength(n: number): number {
  if (n <= 1) return 0;
  if (n === 2) return 1;
  return 2 * (Math.log(n - 1) + EULER_GAMMA) - (2 * (n - 1)) / n;
}

function buildTree(
  data: Matrix,
  indices: number[],
  depth: number,
  depthLimit: number,
  random: Random
): TreeNode {
  if (depth >= depthLimit || indices.length <= 1) {
    return { type: 'leaf', size: indices.length };
  }

  const featureCount = data[indices[0]].length;
  const splittable: { feature: number; min: number; max: number }[] = [];

  for (let feature = 0; feature < featureCount; feature++) {
    let min = Infinity;
    let max = -Infinity;
    for (const index of indices) {
      const value = data[index][feature];
      if (value < min) min = value;
      if (value > max) max = value;
    }
    if (max > min) splittable.push({ feature, min, max });
  }

  // All remaining points are identical
  if (splittable.length === 0) {
    return { type: 'leaf', size: indices.length };
  }

  const { feature, min, max } = splittable[randomInt(random, splittable.length)];
  const threshold = min + random() * (max - min);

  const left: number[] = [];
  const right: number[] = [];
  for (const index of indices) {
    (data[index][feature] < threshold ? left : right).push(index);
  }

  return {
    type: 'split',
    feature,
    threshold,
    left: buildTree(data, left, depth + 1, depthLimit, random),
    right: buildTree(data, right, depth + 1, depthLimit, random),
  };
}

function pathLength(point: readonly number[], node: TreeNode, depth: number): number {
  if (node.type === 'leaf') {
    return depth + averagePathLength(node.size);
  }
  const next = point[node.feature] < node.threshold ? node.left : node.right;
  return pathLength(point, next, depth + 1);
}

export class IsolationForest {
  private trees: TreeNode[] = [];
  private sampleSize = 0;

  constructor(private readonly options: Omit<IsolationForestOptions, 'contamination'>) {}

  fit(data: Matrix): this {
    this.sampleSize = Math.min(this.options.maxSamples, data.length);
    const depthLimit = Math.ceil(Math.log2(Math.max(this.sampleSize, 2)));

    this.trees = [];
    for (let t = 0; t < this.options.nEstimators; t++) {
      const sample = sampleIndices(this.options.random, data.length, this.sampleSize);
      this.trees.push(buildTree(data, sample, 0, depthLimit, this.options.random));
    }
    return this;
  }

  /** Anomaly score in (0, 1]; higher is more anomalous. */
  score(point: readonly number[]): number {
    if (this.trees.length === 0) {
      throw new Error('IsolationForest.score called before fit');
    }
    const total = this.trees.reduce((sum, tree) => sum + pathLength(point, tree, 0), 0);
    const normalizer = averagePathLength(this.sampleSize);
    if (normalizer === 0) return 0.5;
    return Math.pow(2, -(total / this.trees.length) / normalizer);
  }
}

export function detectOutliers(data: Matrix, options: IsolationForestOptions): OutlierResult {
  const n = data.length;
  if (n === 0) {
    return { scores: [], flagged: [], outlierCount: 0 };
  }

  const forest = new IsolationForest(options).fit(data);
  const scores = data.map(point => forest.score(point));

  const outlierCount = Math.min(n, Math.floor(options.contamination * n + 1e-9));
  const ranked = scores
    .map((score, index) => ({ score, index }))
    .sort((a, b) => b.score - a.score || a.index - b.index);

  const flagged = new Array<boolean>(n).fill(false);
  for (let i = 0; i < outlierCount; i++) {
    flagged[ranked[i].index] = true;
  }

  return { scores, flagged, outlierCount };
}
