import type { AnalysisSummary, Dataset, DatasetProfile, Route } from '../core/types.js';

/**
 * One analysis strategy per route. Implementations are synchronous and
 * pure: the same dataset and configuration always give the same summary.
 */
export interface AnalysisStrategy<S extends AnalysisSummary = AnalysisSummary> {
  readonly route: Route;
  analyze(dataset: Dataset, profile: DatasetProfile): S;
}
