/**
 * K-Means clustering with k-means++ seeding.
 *
 * Runs `nInit` seeded restarts and keeps the lowest-inertia result.
 * An emptied cluster keeps its previous centroid.
 */

import type { Matrix } from './scaler.js';
import { squaredDistance } from './scaler.js';
import { randomInt, type Random } from './random.js';

export interface KMeansOptions {
  nInit: number;
  maxIterations: number;
  random: Random;
  tolerance?: number;
}

export interface KMeansResult {
  k: number;
  labels: number[];
  centroids: Matrix;
  inertia: number;
  iterations: number;
}

function nearestCentroid(point: readonly number[], centroids: Matrix): { index: number; distance: number } {
  let index = 0;
  let distance = Infinity;
  for (let c = 0; c < centroids.length; c++) {
    const d = squaredDistance(point, centroids[c]);
    if (d < distance) {
      distance = d;
      index = c;
    }
  }
  return { index, distance };
}

export function kmeansPlusPlus(data: Matrix, k: number, random: Random): Matrix {
  const centroids: Matrix = [[...data[randomInt(random, data.length)]]];
  const distances = data.map(point => squaredDistance(point, centroids[0]));

  while (centroids.length < k) {
    const total = distances.reduce((sum, d) => sum + d, 0);
    let chosen = randomInt(random, data.length);

    if (total > 0) {
      let target = random() * total;
      for (let i = 0; i < distances.length; i++) {
        target -= distances[i];
        if (target < 0) {
          chosen = i;
          break;
        }
      }
    }

    const centroid = [...data[chosen]];
    centroids.push(centroid);
    for (let i = 0; i < data.length; i++) {
      const d = squaredDistance(data[i], centroid);
      if (d < distances[i]) distances[i] = d;
    }
  }

  return centroids;
}

function runOnce(data: Matrix, k: number, options: KMeansOptions): KMeansResult {
  const tolerance = options.tolerance ?? 1e-8;
  const dims = data[0].length;
  let centroids = kmeansPlusPlus(data, k, options.random);
  let labels = new Array<number>(data.length).fill(-1);
  let iterations = 0;

  for (; iterations < options.maxIterations; iterations++) {
    let changed = false;
    for (let i = 0; i < data.length; i++) {
      const { index } = nearestCentroid(data[i], centroids);
      if (index !== labels[i]) {
        labels[i] = index;
        changed = true;
      }
    }

    const sums: Matrix = Array.from({ length: k }, () => new Array<number>(dims).fill(0));
    const counts = new Array<number>(k).fill(0);
    data.forEach((point, i) => {
      const label = labels[i];
      counts[label]++;
      for (let d = 0; d < dims; d++) sums[label][d] += point[d];
    });

    let shift = 0;
    const nextCentroids = centroids.map((centroid, c) => {
      if (counts[c] === 0) return centroid;
      const updated = sums[c].map(sum => sum / counts[c]);
      shift += squaredDistance(centroid, updated);
      return updated;
    });
    centroids = nextCentroids;

    if (!changed || shift <= tolerance) {
      iterations++;
      break;
    }
  }

  // Final assignment against the converged centroids
  let inertia = 0;
  labels = data.map(point => {
    const { index, distance } = nearestCentroid(point, centroids);
    inertia += distance;
    return index;
  });

  return { k, labels, centroids, inertia, iterations };
}

export function kmeans(data: Matrix, k: number, options: KMeansOptions): KMeansResult {
  if (k < 1 || k > data.length) {
    throw new RangeError(`k must be in [1, ${data.length}], got ${k}`);
  }

  let best: KMeansResult | undefined;
  for (let run = 0; run < options.nInit; run++) {
    const result = runOnce(data, k, options);
    if (!best || result.inertia < best.inertia) {
      best = result;
    }
  }

  if (!best) {
    throw new RangeError('nInit must be at least 1');
  }
  return best;
}
