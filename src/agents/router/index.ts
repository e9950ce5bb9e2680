/**
 * Routing Agent
 *
 * Picks the analysis strategy for a profile. Both comparisons are strict:
 * exactly `minRowsForMl` rows or exactly `minNumericRatioForMl` resolves to EDA.
 */

import type { DatasetProfile, RoutingDecision } from '../../core/types.js';
import type { AnalysisConfig } from '../../config/analysis.js';

export type RoutingThresholds = Pick<AnalysisConfig, 'minRowsForMl' | 'minNumericRatioForMl'>;

export function routeDataset(
  profile: DatasetProfile,
  thresholds: RoutingThresholds
): RoutingDecision {
  const enoughRows = profile.rowCount > thresholds.minRowsForMl;
  const numericEnough = profile.numericColumnRatio > thresholds.minNumericRatioForMl;
  const ratio = profile.numericColumnRatio.toFixed(2);

  if (enoughRows && numericEnough) {
    return {
      route: 'ml',
      profile,
      reason: `${profile.rowCount} rows > ${thresholds.minRowsForMl} and numeric ratio ${ratio} > ${thresholds.minNumericRatioForMl}`,
    };
  }

  const failed: string[] = [];
  if (!enoughRows) {
    failed.push(`${profile.rowCount} rows <= ${thresholds.minRowsForMl}`);
  }
  if (!numericEnough) {
    failed.push(`numeric ratio ${ratio} <= ${thresholds.minNumericRatioForMl}`);
  }

  return {
    route: 'eda',
    profile,
    reason: failed.join(' and '),
  };
}
