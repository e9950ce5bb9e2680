/**
 * Dataset Analyzer
 *
 * Main exports for the dataset analysis library.
 */

// Core types
export * from './core/types.js';
export * from './core/errors.js';
export { serializeSummary, serializeProfile, toAnalyzeResponse } from './core/serialize.js';

// Configuration
export {
  DEFAULT_ANALYSIS_CONFIG,
  AnalysisConfigSchema,
  mergeAnalysisConfig,
  loadAnalysisConfigFromEnv,
  type AnalysisConfig,
} from './config/analysis.js';
export { loadProviderConfigFromEnv, PROVIDERS, type ProviderSettings } from './config/providers.js';

// Dataset
export { buildDataset, type RawRow } from './dataset/dataset.js';

// Agents
export { profileDataset, isNumericColumn } from './agents/profiler/index.js';
export { routeDataset, type RoutingThresholds } from './agents/router/index.js';
export {
  InsightAgent,
  buildInsightPrompt,
  parseInsightResponse,
  templateInsights,
} from './agents/insight/index.js';

// Strategies
export { createStrategy, EdaStrategy, MlStrategy, type AnalysisStrategy } from './strategies/index.js';

// Providers
export {
  createTextGenerator,
  generateWithTimeout,
  OpenAITextGenerator,
  AnthropicTextGenerator,
  type TextGenerator,
} from './providers/index.js';

// Execution
export { analyze, AnalysisPipeline, type PipelineOptions, type RunOptions } from './execution/pipeline.js';

// Logging
export { getLogger, createLogger, StructuredLogger } from './logging/logger.js';
