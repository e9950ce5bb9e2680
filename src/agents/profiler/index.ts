/**
 * Dataset Profiler Agent
 *
 * Lightweight structural metrics consumed by the routing agent.
 * A column counts as numeric only when every present value parses as a
 * finite number; one non-numeric value anywhere disqualifies it.
 */

import type { Dataset, DatasetProfile } from '../../core/types.js';
import { EmptyDatasetError } from '../../core/errors.js';
import { asNumber, isMissing } from '../../dataset/values.js';

export function isNumericColumn(dataset: Dataset, column: string): boolean {
  let present = 0;

  for (const row of dataset.rows) {
    const value = row[column];
    if (!value || isMissing(value)) continue;
    if (asNumber(value) === undefined) return false;
    present++;
  }

  return present > 0;
}

export function profileDataset(dataset: Dataset): DatasetProfile {
  const rowCount = dataset.rows.length;
  const columnCount = dataset.columns.length;

  if (rowCount === 0 || columnCount === 0) {
    throw new EmptyDatasetError(rowCount, columnCount);
  }

  const numericColumns = dataset.columns.filter(column => isNumericColumn(dataset, column));

  return {
    rowCount,
    columnCount,
    numericColumnRatio: numericColumns.length / columnCount,
    numericColumns,
  };
}
