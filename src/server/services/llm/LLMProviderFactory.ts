/**
 * LLM provider selection
 *
 * Maps a resolved TextGenerationSettings entry onto a concrete provider.
 * This is the only place provider names are dispatched on.
 */

import type { TextGenerationSettings } from '../../config/qaConfig.js';
import { TEXT_GENERATION_PROVIDERS } from '../../config/env.js';
import { UnsupportedProviderError } from '../../utils/serviceErrors.js';
import type { LLMProvider } from './LLMProvider.js';
import { GeminiProvider } from './GeminiProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';

export function createLLMProvider(settings: TextGenerationSettings): LLMProvider {
  switch (settings.provider) {
    case 'gemini':
      return new GeminiProvider({
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta',
        defaultModel: settings.model,
        timeout: settings.timeoutMs,
      });
    case 'groq':
    case 'openai':
      return new OpenAIProvider({
        name: settings.provider,
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl,
        defaultModel: settings.model,
        timeout: settings.timeoutMs,
      });
    default: {
      const unknownProvider: never = settings.provider;
      throw new UnsupportedProviderError('text generation', String(unknownProvider), TEXT_GENERATION_PROVIDERS);
    }
  }
}
