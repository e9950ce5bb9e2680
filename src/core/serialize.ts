/**
 * Wire format (snake_case) for summaries, profiles and runs.
 */

import type {
  AnalysisRun,
  AnalysisSummary,
  AnalyzeResponse,
  DatasetProfile,
} from './types.js';

export function serializeSummary(summary: AnalysisSummary): Record<string, unknown> {
  if (summary.route === 'ml') {
    return {
      route: 'ml',
      outlier_count: summary.outlierCount,
      outlier_percent: summary.outlierPercent,
      cluster_count: summary.clusterCount,
      cluster_distribution: summary.clusterDistribution,
      silhouette_score: summary.silhouetteScore,
      analyzed_row_count: summary.analyzedRowCount,
      excluded_row_count: summary.excludedRowCount,
      numeric_columns: summary.numericColumns,
    };
  }

  return {
    route: 'eda',
    row_count: summary.rowCount,
    column_count: summary.columnCount,
    missing_value_counts: summary.missingValueCounts,
    total_missing_values: summary.totalMissingValues,
    duplicate_row_count: summary.duplicateRowCount,
    column_type_breakdown: summary.columnTypeBreakdown,
    numeric_stats: summary.numericStats,
  };
}

export function serializeProfile(profile: DatasetProfile): Record<string, unknown> {
  return {
    row_count: profile.rowCount,
    column_count: profile.columnCount,
    numeric_column_ratio: Math.round(profile.numericColumnRatio * 100) / 100,
    numeric_columns: profile.numericColumns,
  };
}

export function toAnalyzeResponse(run: AnalysisRun): AnalyzeResponse {
  return {
    run_id: run.id,
    route: run.route,
    summary: serializeSummary(run.summary),
    insights: run.report.insights,
    recommendation: run.report.recommendation,
    insight_source: run.report.source,
    notes: run.report.notes,
    fallback: run.fallback ?? null,
  };
}
