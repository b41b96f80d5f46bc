import type { EmbeddingSettings } from '../config/qaConfig.js';
import { EMBEDDING_PROVIDERS } from '../config/env.js';
import { UnsupportedProviderError } from '../utils/serviceErrors.js';
import type { EmbeddingProvider } from './EmbeddingProvider.js';
import { GeminiEmbeddingProvider } from './providers/GeminiEmbeddingProvider.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';

export function createEmbeddingProvider(settings: EmbeddingSettings): EmbeddingProvider {
  switch (settings.provider) {
    case 'gemini':
      return new GeminiEmbeddingProvider({
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta',
        model: settings.model,
        dimensions: settings.dimensions,
        timeoutMs: settings.timeoutMs,
      });
    case 'openai':
      return new OpenAIEmbeddingProvider({
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl,
        model: settings.model,
        dimensions: settings.dimensions,
        timeoutMs: settings.timeoutMs,
      });
    default: {
      const unknownProvider: never = settings.provider;
      throw new UnsupportedProviderError('embedding', String(unknownProvider), EMBEDDING_PROVIDERS);
    }
  }
}
