/**
 * Profiler and Routing Agent Tests
 */

import { describe, it, expect } from 'vitest';
import type { Dataset, DatasetProfile } from '../src/core/types.js';
import { buildDataset } from '../src/dataset/dataset.js';
import { isNumericColumn, profileDataset } from '../src/agents/profiler/index.js';
import { routeDataset } from '../src/agents/router/index.js';
import { EmptyDatasetError } from '../src/core/errors.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../src/config/analysis.js';

function profile(rowCount: number, numericColumnRatio: number): DatasetProfile {
  return { rowCount, columnCount: 10, numericColumnRatio, numericColumns: [] };
}

describe('Dataset Profiler', () => {
  const dataset = buildDataset(
    'mixed',
    [
      { price: 10, qty: '3', code: '1', empty: null, flag: true },
      { price: '12.5', qty: 4, code: 'x', empty: '', flag: false },
      { price: null, qty: '5', code: '2', empty: null, flag: true },
    ],
    { schemaPolicy: 'drop' }
  );

  it('should count rows and columns', () => {
    const result = profileDataset(dataset);
    expect(result.rowCount).toBe(3);
    expect(result.columnCount).toBe(5);
  });

  it('should treat numeric text as numeric and skip missing values', () => {
    expect(isNumericColumn(dataset, 'price')).toBe(true);
    expect(isNumericColumn(dataset, 'qty')).toBe(true);
  });

  it('should disqualify a column on a single non-numeric value', () => {
    expect(isNumericColumn(dataset, 'code')).toBe(false);
  });

  it('should not count all-missing or boolean columns as numeric', () => {
    expect(isNumericColumn(dataset, 'empty')).toBe(false);
    expect(isNumericColumn(dataset, 'flag')).toBe(false);
  });

  it('should compute the numeric column ratio', () => {
    const result = profileDataset(dataset);
    expect(result.numericColumns).toEqual(['price', 'qty']);
    expect(result.numericColumnRatio).toBe(0.4);
  });

  it('should reject a dataset without rows', () => {
    const empty: Dataset = { name: 'e', columns: ['a'], rows: [], droppedRowCount: 0 };
    expect(() => profileDataset(empty)).toThrow(EmptyDatasetError);
  });
});

describe('Routing Agent', () => {
  it('should route large, mostly numeric datasets to ML', () => {
    const decision = routeDataset(profile(1000, 0.89), DEFAULT_ANALYSIS_CONFIG);
    expect(decision.route).toBe('ml');
    expect(decision.profile.rowCount).toBe(1000);
  });

  it('should route exactly 500 rows to EDA', () => {
    expect(routeDataset(profile(500, 0.9), DEFAULT_ANALYSIS_CONFIG).route).toBe('eda');
    expect(routeDataset(profile(501, 0.9), DEFAULT_ANALYSIS_CONFIG).route).toBe('ml');
  });

  it('should route a ratio of exactly 0.5 to EDA', () => {
    expect(routeDataset(profile(1000, 0.5), DEFAULT_ANALYSIS_CONFIG).route).toBe('eda');
    expect(routeDataset(profile(1000, 0.51), DEFAULT_ANALYSIS_CONFIG).route).toBe('ml');
  });

  it('should route small datasets to EDA and explain why', () => {
    const decision = routeDataset(profile(10, 0.4), DEFAULT_ANALYSIS_CONFIG);
    expect(decision.route).toBe('eda');
    expect(decision.reason).toBe('10 rows <= 500 and numeric ratio 0.40 <= 0.5');
  });

  it('should honour overridden thresholds', () => {
    const decision = routeDataset(profile(20, 0.6), { minRowsForMl: 10, minNumericRatioForMl: 0.5 });
    expect(decision.route).toBe('ml');
  });
});
