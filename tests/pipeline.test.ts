/**
 * Analysis Pipeline Tests
 *
 * End-to-end runs through profiling, routing, strategy and insights
 */

import { describe, it, expect } from 'vitest';
import type { RawScalar } from '../src/core/types.js';
import { AnalysisPipeline, analyze } from '../src/execution/pipeline.js';
import {
  AnalysisCancelledError,
  EmptyDatasetError,
  InvalidInputError,
  MalformedRowError,
} from '../src/core/errors.js';
import { toAnalyzeResponse } from '../src/core/serialize.js';
import type { TextGenerator } from '../src/providers/base.js';
import {
  GENERATED_TEXT,
  createNumericRows,
  createTestRequest,
  failingGenerator,
  silentLogger,
  stubGenerator,
} from './setup.js';

function smallMixedRows(): Record<string, RawScalar>[] {
  const rows: Record<string, RawScalar>[] = [];
  for (let i = 0; i < 10; i++) {
    rows.push({
      id: i + 1,
      amount: i % 4 === 0 ? null : i * 2.5,
      region: i % 2 === 0 ? 'north' : 'south',
      status: 'open',
      comment: i === 3 ? null : `row ${i}`,
    });
  }
  return rows;
}

describe('AnalysisPipeline', () => {
  const logger = silentLogger();

  it('should run ML analysis on a large numeric dataset', async () => {
    const rows = createNumericRows(1000, 8, { textColumn: 'category' });
    const pipeline = new AnalysisPipeline({ logger });
    const run = await pipeline.analyze(createTestRequest(rows));

    expect(run.profile.rowCount).toBe(1000);
    expect(run.profile.columnCount).toBe(9);
    expect(run.profile.numericColumnRatio).toBeCloseTo(0.89, 2);
    expect(run.route).toBe('ml');
    expect(run.fallback).toBeUndefined();

    if (run.summary.route !== 'ml') throw new Error('expected an ML summary');
    expect(run.summary.outlierCount).toBe(100);
    expect(run.summary.outlierPercent).toBe(10);
    expect(run.summary.clusterCount).toBeGreaterThanOrEqual(2);
    expect(run.summary.clusterCount).toBeLessThanOrEqual(4);
    const total = Object.values(run.summary.clusterDistribution).reduce((s, c) => s + c, 0);
    expect(total).toBe(1000);

    expect(run.report.source).toBe('template');
    expect(run.report.insights.length).toBeGreaterThan(0);
    expect(run.report.recommendation).not.toBe('');
  });

  it('should run EDA on a small mixed dataset', async () => {
    const pipeline = new AnalysisPipeline({ logger });
    const run = await pipeline.analyze(createTestRequest(smallMixedRows()));

    expect(run.profile.numericColumnRatio).toBe(0.4);
    expect(run.route).toBe('eda');
    if (run.summary.route !== 'eda') throw new Error('expected an EDA summary');
    expect(Object.keys(run.summary.missingValueCounts)).toHaveLength(5);
    expect(run.summary.missingValueCounts.amount).toBe(3);
    expect(run.summary.missingValueCounts.comment).toBe(1);
    expect(run.summary.totalMissingValues).toBe(4);
    expect(run.summary.duplicateRowCount).toBe(0);
    expect(run.decision.reason).toBe('10 rows <= 500 and numeric ratio 0.40 <= 0.5');
  });

  it('should produce identical results for identical input', async () => {
    const rows = createNumericRows(600, 3);
    const pipeline = new AnalysisPipeline({ logger, config: { nEstimators: 40, kmeansInit: 3 } });

    const first = await pipeline.analyze(createTestRequest(rows));
    const second = await pipeline.analyze(createTestRequest(rows));

    expect(second.id).not.toBe(first.id);
    expect(second.summary).toEqual(first.summary);
    expect(second.report).toEqual(first.report);
  });

  it('should fall back from ML to EDA when too few complete rows remain', async () => {
    const rows: Record<string, RawScalar>[] = [];
    for (let i = 0; i < 600; i++) {
      rows.push({ a: i, b: i === 0 ? 1 : null });
    }

    const run = await new AnalysisPipeline({ logger }).analyze(createTestRequest(rows));

    expect(run.decision.route).toBe('ml');
    expect(run.route).toBe('eda');
    expect(run.fallback?.from).toBe('ml');
    expect(run.fallback?.to).toBe('eda');
    expect(run.report.notes.some(note => note.startsWith('ML analysis was not possible ('))).toBe(true);
  });

  it('should note rows dropped for a schema mismatch', async () => {
    const rows = smallMixedRows();
    rows.push({ id: 99 });

    const run = await new AnalysisPipeline({ logger }).analyze(createTestRequest(rows));
    expect(run.profile.rowCount).toBe(10);
    expect(run.report.notes).toContain(
      '1 rows were dropped because their columns did not match the dataset schema.'
    );
  });

  it('should reject a schema mismatch under the reject policy', async () => {
    const rows = smallMixedRows();
    rows.push({ id: 99 });

    const pipeline = new AnalysisPipeline({ logger, config: { schemaPolicy: 'reject' } });
    await expect(pipeline.analyze(createTestRequest(rows))).rejects.toBeInstanceOf(MalformedRowError);
  });

  it('should reject an empty dataset', async () => {
    const pipeline = new AnalysisPipeline({ logger });
    await expect(pipeline.analyze(createTestRequest([]))).rejects.toBeInstanceOf(EmptyDatasetError);
  });

  it('should reject an invalid configuration', () => {
    expect(() => new AnalysisPipeline({ logger, config: { maxInsights: 0 } })).toThrow(InvalidInputError);
  });

  it('should use generated insights from the generator', async () => {
    const pipeline = new AnalysisPipeline({ logger, generator: stubGenerator(GENERATED_TEXT) });
    const run = await pipeline.analyze(createTestRequest(smallMixedRows()));

    expect(run.report.source).toBe('generated');
    expect(run.report.recommendation).toBe('Investigate the flagged rows before training any model.');
  });

  it('should still return insights when the generator fails', async () => {
    const pipeline = new AnalysisPipeline({ logger, generator: failingGenerator() });
    const run = await pipeline.analyze(createTestRequest(smallMixedRows()));

    expect(run.report.source).toBe('template');
    expect(run.report.insights.length).toBeGreaterThan(0);
  });

  it('should cancel before any work when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const pipeline = new AnalysisPipeline({ logger });
    await expect(pipeline.analyze(createTestRequest(smallMixedRows()), { signal: controller.signal }))
      .rejects.toThrow('Analysis cancelled before dataset');
  });

  it('should cancel when aborted during insight generation', async () => {
    const controller = new AbortController();
    const generator: TextGenerator = {
      name: 'aborting',
      generate: () => {
        controller.abort();
        return new Promise<string>(() => undefined);
      },
    };

    const pipeline = new AnalysisPipeline({ logger, generator });
    const pending = pipeline.analyze(createTestRequest(smallMixedRows()), { signal: controller.signal });

    await expect(pending).rejects.toBeInstanceOf(AnalysisCancelledError);
    await expect(pending).rejects.toThrow('Analysis cancelled before response');
  });

  it('should echo the requester identity and serialize the response', async () => {
    const run = await analyze(createTestRequest(smallMixedRows()), { logger });
    expect(run.requesterIdentity).toBe('tester@example.com');
    expect(run.datasetName).toBe('test-dataset.csv');

    const response = toAnalyzeResponse(run);
    expect(response.run_id).toBe(run.id);
    expect(response.route).toBe('eda');
    expect(response.insight_source).toBe('template');
    expect(response.fallback).toBeNull();
  });
});
