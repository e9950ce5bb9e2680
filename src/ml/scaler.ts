/**
 * Standard scaler: zero mean, unit (population) variance per column.
 * Constant columns are centred and left unscaled.
 */

export type Matrix = number[][];

export interface ScaledMatrix {
  data: Matrix;
  means: number[];
  scales: number[];
}

export function standardize(data: Matrix): ScaledMatrix {
  const rows = data.length;
  const cols = rows > 0 ? data[0].length : 0;
  const means = new Array<number>(cols).fill(0);
  const scales = new Array<number>(cols).fill(1);

  if (rows === 0) {
    return { data: [], means, scales };
  }

  for (const row of data) {
    for (let j = 0; j < cols; j++) means[j] += row[j];
  }
  for (let j = 0; j < cols; j++) means[j] /= rows;

  const variances = new Array<number>(cols).fill(0);
  for (const row of data) {
    for (let j = 0; j < cols; j++) {
      const diff = row[j] - means[j];
      variances[j] += diff * diff;
    }
  }
  for (let j = 0; j < cols; j++) {
    const std = Math.sqrt(variances[j] / rows);
    scales[j] = std > 0 ? std : 1;
  }

  return {
    data: data.map(row => row.map((value, j) => (value - means[j]) / scales[j])),
    means,
    scales,
  };
}

export function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
}
