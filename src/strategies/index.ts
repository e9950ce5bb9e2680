import type { Route } from '../core/types.js';
import type { AnalysisConfig } from '../config/analysis.js';
import type { AnalysisStrategy } from './types.js';
import { EdaStrategy } from './eda.js';
import { MlStrategy } from './ml.js';

export type { AnalysisStrategy } from './types.js';
export { EdaStrategy, countDuplicateRows, inferColumnType } from './eda.js';
export { MlStrategy, extractNumericTable, selectClusters } from './ml.js';

export function createStrategy(route: Route, config: AnalysisConfig): AnalysisStrategy {
  switch (route) {
    case 'ml':
      return new MlStrategy(config);
    case 'eda':
      return new EdaStrategy();
  }
}
