/**
 * Text Generation Providers
 *
 * The insight agent depends only on `TextGenerator`. Concrete providers
 * extend `BaseTextProvider`; tests pass plain objects.
 */

import {
  GenerationFailureError,
  GenerationTimeoutError,
  errorMessage,
} from '../core/errors.js';

export interface GenerateOptions {
  signal: AbortSignal;
}

export interface TextGenerator {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface ProviderConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
  maxRetries?: number;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
}

export const DEFAULT_SYSTEM_PROMPT = 'You are a data analyst. Be objective and concise.';

export abstract class BaseTextProvider implements TextGenerator {
  protected config: Required<Omit<ProviderConfig, 'baseUrl'>> & Pick<ProviderConfig, 'baseUrl'>;

  constructor(public readonly name: string, config: ProviderConfig) {
    this.config = {
      maxRetries: 1,
      temperature: 0.7,
      maxTokens: 1024,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      ...config,
    };

    if (!this.config.apiKey) {
      throw new Error(`${name}: API key is required`);
    }
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const text = await this.complete(prompt, options.signal);
    if (text.trim() === '') {
      throw new GenerationFailureError(this.name, 'empty completion');
    }
    return text;
  }

  protected abstract complete(prompt: string, signal: AbortSignal): Promise<string>;

  getModel(): string {
    return this.config.model;
  }
}

/**
 * Call a generator with a hard deadline. The generator receives an
 * AbortSignal; the deadline holds even when the generator ignores it.
 * Always rejects with GenerationTimeoutError or GenerationFailureError.
 */
export async function generateWithTimeout(
  generator: TextGenerator,
  prompt: string,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GenerationTimeoutError(generator.name, timeoutMs));
    }, timeoutMs);

    onParentAbort = () => {
      controller.abort();
      reject(new GenerationFailureError(generator.name, 'aborted by caller'));
    };
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    if (parentSignal?.aborted) {
      throw new GenerationFailureError(generator.name, 'aborted by caller');
    }
    return await Promise.race([generator.generate(prompt, { signal: controller.signal }), deadline]);
  } catch (error) {
    if (error instanceof GenerationTimeoutError || error instanceof GenerationFailureError) {
      throw error;
    }
    throw new GenerationFailureError(generator.name, errorMessage(error));
  } finally {
    clearTimeout(timer);
    if (onParentAbort) parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
