/**
 * LLM Service
 *
 * Binds one provider to fixed sampling settings and exposes it as a
 * GenerationBackend: one call per prompt, no retry, failures returned as a
 * typed result instead of thrown.
 */

import type { LLMProvider } from './LLMProvider.js';
import type { GenerationBackend, GenerationResult } from '../qa/types.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../../types/errors.js';

export interface LLMServiceConfig {
  model?: string;
  temperature: number;
  maxTokens: number;
  /** Optional system message sent ahead of every prompt */
  systemPrompt?: string;
}

export class LLMService implements GenerationBackend {
  constructor(
    private readonly provider: LLMProvider,
    private readonly config: LLMServiceConfig
  ) {}

  getProviderName(): string {
    return this.provider.getName();
  }

  async generateText(prompt: string): Promise<GenerationResult> {
    const log = createChildLogger({ service: 'LLMService', provider: this.provider.getName() });
    const startTime = Date.now();

    try {
      const response = await this.provider.generate(
        [
          ...(this.config.systemPrompt ? [{ role: 'system' as const, content: this.config.systemPrompt }] : []),
          { role: 'user' as const, content: prompt },
        ],
        {
          model: this.config.model,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        }
      );

      log.debug(
        {
          model: response.model,
          duration: Date.now() - startTime,
          totalTokens: response.usage?.totalTokens,
        },
        'Text generation completed'
      );
      return { ok: true, text: response.content };
    } catch (error) {
      const message = describeError(error);
      log.warn({ error: message, duration: Date.now() - startTime }, 'Text generation failed');
      return { ok: false, error: message };
    }
  }
}
