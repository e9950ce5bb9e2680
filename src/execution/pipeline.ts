/**
 * Analysis Pipeline
 *
 * Runs one analysis end to end:
 * - Builds the dataset and profiles it
 * - Routes to the ML or EDA strategy
 * - Falls back from ML to EDA when too little numeric data remains
 * - Generates insights, degrading to templates without a generator
 * - Checks for cancellation between stages; nothing partial is returned
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AnalysisRun,
  AnalysisSummary,
  AnalyzeRequest,
  Dataset,
  RawScalar,
  RouteFallback,
} from '../core/types.js';
import { mergeAnalysisConfig, type AnalysisConfig } from '../config/analysis.js';
import {
  AnalysisCancelledError,
  InsufficientDataError,
  wrapError,
} from '../core/errors.js';
import { buildDataset } from '../dataset/dataset.js';
import { toRaw } from '../dataset/values.js';
import { profileDataset } from '../agents/profiler/index.js';
import { routeDataset } from '../agents/router/index.js';
import { InsightAgent } from '../agents/insight/index.js';
import { createStrategy } from '../strategies/index.js';
import type { TextGenerator } from '../providers/base.js';
import { getLogger, type StructuredLogger } from '../logging/logger.js';

export interface PipelineOptions {
  config?: Partial<AnalysisConfig>;
  generator?: TextGenerator;
  logger?: StructuredLogger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

function checkpoint(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new AnalysisCancelledError(stage);
  }
}

function previewRows(dataset: Dataset, count: number): Record<string, RawScalar>[] {
  return dataset.rows.slice(0, count).map(row => {
    const raw: Record<string, RawScalar> = {};
    for (const column of dataset.columns) {
      raw[column] = toRaw(row[column]);
    }
    return raw;
  });
}

export class AnalysisPipeline {
  readonly config: AnalysisConfig;
  private readonly generator?: TextGenerator;
  private readonly logger: StructuredLogger;

  constructor(options: PipelineOptions = {}) {
    this.config = mergeAnalysisConfig(options.config);
    this.generator = options.generator;
    this.logger = options.logger ?? getLogger();
  }

  async analyze(request: AnalyzeRequest, options: RunOptions = {}): Promise<AnalysisRun> {
    const { signal } = options;
    const runId = uuidv4();
    const startedAt = new Date();
    const startTime = Date.now();
    const logger = this.logger.child({ run_id: runId, dataset: request.dataset_name });

    logger.runStarted(runId, request.dataset_name, request.rows.length);

    try {
      checkpoint(signal, 'dataset');
      let stageStart = Date.now();
      const dataset = buildDataset(request.dataset_name, request.rows, this.config);
      if (request.row_count_hint !== undefined && request.row_count_hint !== request.rows.length) {
        logger.warn('row_count_hint_mismatch', {
          hint: request.row_count_hint,
          actual: request.rows.length,
        });
      }
      logger.stageCompleted('dataset', Date.now() - stageStart, {
        rows: dataset.rows.length,
        dropped_rows: dataset.droppedRowCount,
      });

      checkpoint(signal, 'profile');
      stageStart = Date.now();
      const profile = profileDataset(dataset);
      logger.stageCompleted('profile', Date.now() - stageStart, {
        numeric_column_ratio: profile.numericColumnRatio,
      });

      checkpoint(signal, 'route');
      const decision = routeDataset(profile, this.config);
      logger.info('route_selected', { route: decision.route, reason: decision.reason });

      checkpoint(signal, 'strategy');
      stageStart = Date.now();
      let summary: AnalysisSummary;
      let fallback: RouteFallback | undefined;
      try {
        summary = createStrategy(decision.route, this.config).analyze(dataset, profile);
      } catch (error) {
        if (!(error instanceof InsufficientDataError) || decision.route !== 'ml') {
          throw error;
        }
        fallback = { from: 'ml', to: 'eda', reason: error.message };
        logger.strategyFallback('ml', 'eda', error.message);
        summary = createStrategy('eda', this.config).analyze(dataset, profile);
      }
      logger.stageCompleted('strategy', Date.now() - stageStart, { route: summary.route });

      checkpoint(signal, 'insights');
      stageStart = Date.now();
      const notes: string[] = [];
      if (dataset.droppedRowCount > 0) {
        notes.push(
          `${dataset.droppedRowCount} rows were dropped because their columns did not match the dataset schema.`
        );
      }
      if (summary.route === 'ml' && summary.excludedRowCount > 0) {
        notes.push(
          `${summary.excludedRowCount} rows with missing numeric values were excluded from outlier detection and clustering.`
        );
      }
      if (fallback) {
        notes.push(`ML analysis was not possible (${fallback.reason}); exploratory analysis was used instead.`);
      }

      const insightAgent = new InsightAgent(this.generator, this.config, logger);
      const report = await insightAgent.generateReport(summary, {
        profile,
        preview: previewRows(dataset, this.config.previewRows),
        notes,
        signal,
      });
      logger.stageCompleted('insights', Date.now() - stageStart, { source: report.source });

      checkpoint(signal, 'response');
      const durationMs = Date.now() - startTime;
      logger.runCompleted(runId, summary.route, durationMs, report.source);

      return {
        id: runId,
        datasetName: request.dataset_name,
        requesterIdentity: request.requester_identity ?? undefined,
        profile,
        decision,
        route: summary.route,
        fallback,
        summary,
        report,
        startedAt: startedAt.toISOString(),
        durationMs,
      };
    } catch (error) {
      const wrapped = wrapError(error, 'analysis');
      logger.runFailed(runId, wrapped, Date.now() - startTime);
      throw wrapped;
    }
  }
}

/**
 * Run one analysis with a fresh pipeline. Configuration is explicit per
 * call so concurrent runs never share mutable state.
 */
export async function analyze(
  request: AnalyzeRequest,
  options: PipelineOptions & RunOptions = {}
): Promise<AnalysisRun> {
  const { signal, ...pipelineOptions } = options;
  return new AnalysisPipeline(pipelineOptions).analyze(request, { signal });
}
