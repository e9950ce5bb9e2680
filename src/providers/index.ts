import { PROVIDERS, type ProviderSettings } from '../config/providers.js';
import { ProviderConfigError } from '../core/errors.js';
import { AnthropicTextGenerator } from './anthropic.js';
import { OpenAITextGenerator } from './openai.js';
import type { TextGenerator } from './base.js';

export type { TextGenerator, GenerateOptions, ProviderConfig } from './base.js';
export { BaseTextProvider, generateWithTimeout, DEFAULT_SYSTEM_PROMPT } from './base.js';
export { OpenAITextGenerator } from './openai.js';
export { AnthropicTextGenerator } from './anthropic.js';

/**
 * Build the configured generator, or undefined when generation is disabled
 * (insights then always come from templates).
 */
export function createTextGenerator(settings: ProviderSettings): TextGenerator | undefined {
  if (settings.provider === 'none') return undefined;

  const definition = PROVIDERS[settings.provider];
  if (!settings.apiKey) {
    throw new ProviderConfigError(definition.name, definition.envKeys.join(' or '));
  }

  const config = {
    apiKey: settings.apiKey,
    model: settings.model ?? definition.defaultModel,
    baseUrl: settings.baseUrl,
  };

  switch (settings.provider) {
    case 'openai':
      return new OpenAITextGenerator(config);
    case 'anthropic':
      return new AnthropicTextGenerator(config);
  }
}
