/**
 * Analysis Configuration
 *
 * Every tunable of the pipeline lives here and is passed explicitly into
 * `analyze()`, so concurrent runs never read shared state.
 */

import { z } from 'zod';
import { InvalidInputError } from '../core/errors.js';

/** Largest delay a Node.js timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const AnalysisConfigSchema = z
  .object({
    // Routing
    minRowsForMl: z.number().int().nonnegative(),
    minNumericRatioForMl: z.number().min(0).max(1),

    // ML strategy
    contamination: z.number().gt(0).max(0.5),
    clusterMin: z.number().int().min(2),
    clusterMax: z.number().int().min(2),
    randomSeed: z.number().int(),
    nEstimators: z.number().int().positive(),
    maxSamples: z.number().int().min(2),
    kmeansInit: z.number().int().positive(),
    kmeansMaxIterations: z.number().int().positive(),
    silhouetteSampleSize: z.number().int().min(2),

    // Insight agent
    generationTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS),
    maxInsights: z.number().int().positive(),
    previewRows: z.number().int().nonnegative(),

    // Dataset
    schemaPolicy: z.enum(['drop', 'reject']),
  })
  .refine(c => c.clusterMin <= c.clusterMax, {
    message: 'clusterMin must not exceed clusterMax',
    path: ['clusterMin'],
  });

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  minRowsForMl: 500,
  minNumericRatioForMl: 0.5,
  contamination: 0.1,
  clusterMin: 2,
  clusterMax: 4,
  randomSeed: 42,
  nEstimators: 100,
  maxSamples: 256,
  kmeansInit: 10,
  kmeansMaxIterations: 300,
  silhouetteSampleSize: 1000,
  generationTimeoutMs: 15000,
  maxInsights: 5,
  previewRows: 3,
  schemaPolicy: 'drop',
};

export function mergeAnalysisConfig(
  partial: Partial<AnalysisConfig> | undefined
): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse({
    ...DEFAULT_ANALYSIS_CONFIG,
    ...partial,
  });
  if (!result.success) {
    throw new InvalidInputError('Invalid analysis configuration', result.error.errors);
  }
  return result.data;
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

const ENV_KEYS: Record<string, keyof AnalysisConfig> = {
  ANALYZER_MIN_ROWS_FOR_ML: 'minRowsForMl',
  ANALYZER_MIN_NUMERIC_RATIO_FOR_ML: 'minNumericRatioForMl',
  ANALYZER_CONTAMINATION: 'contamination',
  ANALYZER_CLUSTER_MIN: 'clusterMin',
  ANALYZER_CLUSTER_MAX: 'clusterMax',
  ANALYZER_RANDOM_SEED: 'randomSeed',
  ANALYZER_GENERATION_TIMEOUT_MS: 'generationTimeoutMs',
  ANALYZER_MAX_INSIGHTS: 'maxInsights',
};

/**
 * Read numeric tunables (ANALYZER_*) and the schema policy from the environment.
 * Unset variables keep their defaults.
 */
export function loadAnalysisConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): AnalysisConfig {
  const overrides: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;
    overrides[configKey] = Number(raw);
  }

  const policy = env.ANALYZER_SCHEMA_POLICY;
  if (policy !== undefined && policy.trim() !== '') {
    overrides.schemaPolicy = policy.trim();
  }

  const result = AnalysisConfigSchema.safeParse({ ...DEFAULT_ANALYSIS_CONFIG, ...overrides });
  if (!result.success) {
    throw new InvalidInputError('Invalid analysis configuration in environment', result.error.errors);
  }
  return result.data;
}
