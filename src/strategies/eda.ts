/**
 * EDA Strategy
 *
 * Exploratory audit of the full dataset: missing values, inferred column
 * types, descriptive statistics for numeric columns and duplicate rows.
 */

import type {
  ColumnType,
  Dataset,
  DatasetProfile,
  EdaSummary,
  NumericStats,
  Row,
} from '../core/types.js';
import type { AnalysisStrategy } from './types.js';
import { asBoolean, asNumber, isMissing, valueKey } from '../dataset/values.js';
import { describe } from '../stats/descriptive.js';

export function inferColumnType(dataset: Dataset, column: string, numeric: boolean): ColumnType {
  if (numeric) return 'numeric';

  let present = 0;
  for (const row of dataset.rows) {
    const value = row[column];
    if (!value || isMissing(value)) continue;
    if (asBoolean(value) === undefined) return 'text';
    present++;
  }

  return present > 0 ? 'boolean' : 'text';
}

/** Column order independent: keys are built over sorted column names. */
export function rowKey(row: Row, sortedColumns: readonly string[]): string {
  return sortedColumns.map(column => {
    const value = row[column];
    return `${JSON.stringify(column)}=${value ? valueKey(value) : 'n:'}`;
  }).join('|');
}

export function countDuplicateRows(dataset: Dataset): number {
  const sortedColumns = [...dataset.columns].sort();
  const seen = new Set<string>();
  for (const row of dataset.rows) {
    seen.add(rowKey(row, sortedColumns));
  }
  return dataset.rows.length - seen.size;
}

export class EdaStrategy implements AnalysisStrategy<EdaSummary> {
  readonly route = 'eda' as const;

  analyze(dataset: Dataset, profile: DatasetProfile): EdaSummary {
    const numeric = new Set(profile.numericColumns);
    const missingValueCounts: Record<string, number> = {};
    const columnTypeBreakdown: Record<string, ColumnType> = {};
    const numericStats: Record<string, NumericStats> = {};
    let totalMissingValues = 0;

    for (const column of dataset.columns) {
      let missing = 0;
      const values: number[] = [];

      for (const row of dataset.rows) {
        const value = row[column];
        if (!value || isMissing(value)) {
          missing++;
          continue;
        }
        const parsed = asNumber(value);
        if (parsed !== undefined) values.push(parsed);
      }

      missingValueCounts[column] = missing;
      totalMissingValues += missing;

      const isNumeric = numeric.has(column);
      columnTypeBreakdown[column] = inferColumnType(dataset, column, isNumeric);
      if (isNumeric) {
        numericStats[column] = describe(values);
      }
    }

    return {
      route: 'eda',
      rowCount: dataset.rows.length,
      columnCount: dataset.columns.length,
      missingValueCounts,
      totalMissingValues,
      duplicateRowCount: countDuplicateRows(dataset),
      columnTypeBreakdown,
      numericStats,
    };
  }
}
