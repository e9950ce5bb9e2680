/**
 * Dataset construction
 *
 * Builds the immutable Dataset for one run from the request rows. The
 * schema is the most common non-empty column set (ties go to the set seen
 * first). Rows with a different column set are dropped or rejected
 * depending on the configured schema policy.
 */

import type { Dataset, RawScalar, Row, ScalarValue } from '../core/types.js';
import type { AnalysisConfig } from '../config/analysis.js';
import { EmptyDatasetError, MalformedRowError } from '../core/errors.js';
import { toScalar } from './values.js';

export type RawRow = Record<string, RawScalar>;

interface SchemaCandidate {
  columns: string[];
  count: number;
  firstSeen: number;
}

function schemaKey(columns: string[]): string {
  return JSON.stringify([...columns].sort());
}

function majoritySchema(rows: readonly RawRow[]): string[] {
  const candidates = new Map<string, SchemaCandidate>();

  rows.forEach((row, index) => {
    const columns = Object.keys(row);
    if (columns.length === 0) return;
    const key = schemaKey(columns);
    const existing = candidates.get(key);
    if (existing) {
      existing.count++;
    } else {
      candidates.set(key, { columns, count: 1, firstSeen: index });
    }
  });

  let best: SchemaCandidate | undefined;
  for (const candidate of candidates.values()) {
    if (
      !best ||
      candidate.count > best.count ||
      (candidate.count === best.count && candidate.firstSeen < best.firstSeen)
    ) {
      best = candidate;
    }
  }
  return best ? best.columns : [];
}

export function buildDataset(
  name: string,
  rawRows: readonly RawRow[],
  config: Pick<AnalysisConfig, 'schemaPolicy'>
): Dataset {
  const columns = majoritySchema(rawRows);
  if (rawRows.length === 0 || columns.length === 0) {
    throw new EmptyDatasetError(rawRows.length, columns.length);
  }

  const expected = schemaKey(columns);
  const rows: Row[] = [];
  let droppedRowCount = 0;

  rawRows.forEach((raw, index) => {
    const actual = Object.keys(raw);
    if (schemaKey(actual) !== expected) {
      if (config.schemaPolicy === 'reject') {
        throw new MalformedRowError(index, columns, actual);
      }
      droppedRowCount++;
      return;
    }

    const row: Record<string, ScalarValue> = {};
    for (const column of columns) {
      row[column] = toScalar(raw[column]);
    }
    rows.push(Object.freeze(row));
  });

  return Object.freeze({
    name,
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows),
    droppedRowCount,
  });
}
