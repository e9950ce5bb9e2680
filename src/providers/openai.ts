/**
 * OpenAI-compatible chat completions.
 *
 * Works against OpenAI itself and compatible endpoints such as Groq
 * (set `baseUrl` to the endpoint's `/openai/v1` root).
 */

import OpenAI from 'openai';
import { BaseTextProvider, type ProviderConfig } from './base.js';
import { getLogger } from '../logging/logger.js';

const logger = getLogger();

export class OpenAITextGenerator extends BaseTextProvider {
  private client: OpenAI;

  constructor(config: ProviderConfig) {
    super('openai', config);
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: this.config.maxRetries,
    });
  }

  protected async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const startTime = Date.now();

    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        messages: [
          { role: 'system', content: this.config.systemPrompt },
          { role: 'user', content: prompt },
        ],
      },
      { signal }
    );

    logger.debug('openai_completion', {
      model: this.config.model,
      duration_ms: Date.now() - startTime,
      total_tokens: response.usage?.total_tokens,
    });

    return response.choices[0]?.message?.content ?? '';
  }
}
