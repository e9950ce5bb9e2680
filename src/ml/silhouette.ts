/**
 * Mean silhouette coefficient.
 *
 * s(i) = (b - a) / max(a, b), where a is the mean distance to the point's own
 * cluster and b the smallest mean distance to another cluster. Points alone in
 * their cluster score 0. When `indices` is given, only those points take part.
 */

import type { Matrix } from './scaler.js';
import { squaredDistance } from './scaler.js';

export function silhouetteScore(
  data: Matrix,
  labels: readonly number[],
  indices?: readonly number[]
): number {
  const members = indices ?? data.map((_, i) => i);
  const clusterIds = [...new Set(members.map(i => labels[i]))];
  if (clusterIds.length < 2 || members.length < 2) return 0;

  const slot = new Map(clusterIds.map((id, position) => [id, position]));
  const counts = new Array<number>(clusterIds.length).fill(0);
  for (const i of members) {
    const position = slot.get(labels[i]);
    if (position !== undefined) counts[position]++;
  }

  let total = 0;
  for (const i of members) {
    const own = slot.get(labels[i]);
    if (own === undefined || counts[own] <= 1) continue;

    const sums = new Array<number>(clusterIds.length).fill(0);
    for (const j of members) {
      if (i === j) continue;
      const position = slot.get(labels[j]);
      if (position === undefined) continue;
      sums[position] += Math.sqrt(squaredDistance(data[i], data[j]));
    }

    const a = sums[own] / (counts[own] - 1);
    let b = Infinity;
    for (let c = 0; c < clusterIds.length; c++) {
      if (c === own || counts[c] === 0) continue;
      b = Math.min(b, sums[c] / counts[c]);
    }

    const denominator = Math.max(a, b);
    total += denominator > 0 ? (b - a) / denominator : 0;
  }

  return total / members.length;
}
