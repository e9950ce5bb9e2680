/**
 * Provider Configuration
 *
 * Text-generation providers the insight agent can use. The OpenAI-compatible
 * provider also covers Groq and other compatible endpoints through `baseUrl`.
 */

import { z } from 'zod';
import { getLogger } from '../logging/logger.js';
import { InvalidInputError } from '../core/errors.js';

const logger = getLogger();

// =============================================================================
// PROVIDER TYPES
// =============================================================================

export type ProviderId = 'openai' | 'anthropic' | 'none';

export interface ProviderDefinition {
  id: Exclude<ProviderId, 'none'>;
  name: string;
  envKeys: string[];
  defaultModel: string;
}

export interface ProviderSettings {
  provider: ProviderId;
  model?: string;
  baseUrl?: string;
  apiKey?: string;
}

// =============================================================================
// PROVIDER DEFINITIONS
// =============================================================================

export const PROVIDERS: Record<Exclude<ProviderId, 'none'>, ProviderDefinition> = {
  openai: {
    id: 'openai',
    name: 'OpenAI-compatible',
    envKeys: ['OPENAI_API_KEY', 'GROQ_API_KEY'],
    defaultModel: 'gpt-4o-mini',
  },
  anthropic: {
    id: 'anthropic',
    name: 'Anthropic',
    envKeys: ['ANTHROPIC_API_KEY'],
    defaultModel: 'claude-3-5-haiku-latest',
  },
};

const ProviderEnvSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'anthropic', 'none']).optional(),
  LLM_MODEL: z.string().min(1).optional(),
  LLM_BASE_URL: z.string().url().optional(),
});

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function getProviderApiKey(
  provider: Exclude<ProviderId, 'none'>,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  for (const key of PROVIDERS[provider].envKeys) {
    const value = env[key];
    if (value && value.trim() !== '') return value;
  }
  return undefined;
}

/**
 * Resolve provider settings from the environment. Without an explicit
 * LLM_PROVIDER the first provider with a configured key wins; with none
 * configured, generation is disabled and insights come from templates.
 */
export function loadProviderConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ProviderSettings {
  const parsed = ProviderEnvSchema.safeParse({
    LLM_PROVIDER: env.LLM_PROVIDER || undefined,
    LLM_MODEL: env.LLM_MODEL || undefined,
    LLM_BASE_URL: env.LLM_BASE_URL || undefined,
  });
  if (!parsed.success) {
    throw new InvalidInputError('Invalid provider configuration in environment', parsed.error.errors);
  }

  const { LLM_PROVIDER, LLM_MODEL, LLM_BASE_URL } = parsed.data;

  if (LLM_PROVIDER === 'none') {
    return { provider: 'none' };
  }

  const candidates: Exclude<ProviderId, 'none'>[] = LLM_PROVIDER
    ? [LLM_PROVIDER]
    : ['openai', 'anthropic'];

  for (const provider of candidates) {
    const apiKey = getProviderApiKey(provider, env);
    if (apiKey) {
      return { provider, model: LLM_MODEL, baseUrl: LLM_BASE_URL, apiKey };
    }
  }

  if (LLM_PROVIDER) {
    logger.warn('provider_key_missing', {
      provider: LLM_PROVIDER,
      env_keys: PROVIDERS[LLM_PROVIDER].envKeys,
    });
  }
  return { provider: 'none' };
}
