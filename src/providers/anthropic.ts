/**
 * Anthropic Messages API text generation.
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseTextProvider, type ProviderConfig } from './base.js';
import { getLogger } from '../logging/logger.js';

const logger = getLogger();

export class AnthropicTextGenerator extends BaseTextProvider {
  private client: Anthropic;

  constructor(config: ProviderConfig) {
    super('anthropic', config);
    this.client = new Anthropic({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: this.config.maxRetries,
    });
  }

  protected async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const startTime = Date.now();

    const response = await this.client.messages.create(
      {
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: this.config.systemPrompt,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );

    logger.debug('anthropic_completion', {
      model: this.config.model,
      duration_ms: Date.now() - startTime,
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
    });

    return response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}
