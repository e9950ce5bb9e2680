/**
 * Core Types for the Dataset Analyzer
 *
 * Tagged scalar values, datasets, profiles, routing decisions,
 * analysis summaries, insight reports and the run aggregate.
 */

import { z } from 'zod';

// =============================================================================
// VALUE TYPES
// =============================================================================

export interface NumberValue {
  kind: 'number';
  value: number;
}

export interface TextValue {
  kind: 'text';
  value: string;
}

export interface BoolValue {
  kind: 'bool';
  value: boolean;
}

export interface NullValue {
  kind: 'null';
}

export type ScalarValue = NumberValue | TextValue | BoolValue | NullValue;

export type RawScalar = string | number | boolean | null;

export type Row = Readonly<Record<string, ScalarValue>>;

// =============================================================================
// DATASET TYPES
// =============================================================================

export interface Dataset {
  readonly name: string;
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
  /** Rows removed because their column set disagreed with the schema */
  readonly droppedRowCount: number;
}

export interface DatasetProfile {
  rowCount: number;
  columnCount: number;
  /** Fraction of columns in [0, 1] whose every present value is numeric */
  numericColumnRatio: number;
  numericColumns: string[];
}

export type Route = 'ml' | 'eda';

export interface RoutingDecision {
  route: Route;
  profile: DatasetProfile;
  reason: string;
}

// =============================================================================
// ANALYSIS TYPES
// =============================================================================

export interface MlSummary {
  route: 'ml';
  outlierCount: number;
  /** Percentage of the original row count, 0-100 */
  outlierPercent: number;
  clusterCount: number;
  clusterDistribution: Record<string, number>;
  silhouetteScore: number;
  analyzedRowCount: number;
  excludedRowCount: number;
  numericColumns: string[];
}

export type ColumnType = 'numeric' | 'text' | 'boolean';

export interface NumericStats {
  count: number;
  mean: number;
  std: number;
  min: number;
  /** Quartiles use linear interpolation between closest ranks */
  p25: number;
  median: number;
  p75: number;
  max: number;
}

export interface EdaSummary {
  route: 'eda';
  rowCount: number;
  columnCount: number;
  missingValueCounts: Record<string, number>;
  totalMissingValues: number;
  duplicateRowCount: number;
  columnTypeBreakdown: Record<string, ColumnType>;
  numericStats: Record<string, NumericStats>;
}

export type AnalysisSummary = MlSummary | EdaSummary;

export interface InsightReport {
  route: Route;
  insights: string[];
  recommendation: string;
  source: 'generated' | 'template';
  notes: string[];
}

export interface RouteFallback {
  from: Route;
  to: Route;
  reason: string;
}

export interface AnalysisRun {
  id: string;
  datasetName: string;
  requesterIdentity?: string;
  profile: DatasetProfile;
  decision: RoutingDecision;
  /** Route that actually produced the summary */
  route: Route;
  fallback?: RouteFallback;
  summary: AnalysisSummary;
  report: InsightReport;
  startedAt: string;
  durationMs: number;
}

// =============================================================================
// LOGGER
// =============================================================================

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export const RawScalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const AnalyzeRequestSchema = z.object({
  dataset_name: z.string().min(1).max(256),
  row_count_hint: z.number().int().nonnegative().optional(),
  rows: z.array(z.record(z.string(), RawScalarSchema)),
  requester_identity: z.string().max(256).nullish(),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

export interface AnalyzeResponse {
  run_id: string;
  route: Route;
  summary: Record<string, unknown>;
  insights: string[];
  recommendation: string;
  insight_source: InsightReport['source'];
  notes: string[];
  fallback: { from: Route; to: Route; reason: string } | null;
}
