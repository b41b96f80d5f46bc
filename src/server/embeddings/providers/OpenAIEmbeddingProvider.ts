/**
 * OpenAI embeddings provider
 */

import OpenAI from 'openai';
import { ExternalServiceError } from '../../types/errors.js';
import type { EmbeddingProvider } from '../EmbeddingProvider.js';

/**
 * The slice of the SDK client this provider uses
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create: (params: { model: string; input: string }) => Promise<{
      data: Array<{ embedding: number[] }>;
    }>;
  };
}

export interface OpenAIEmbeddingProviderConfig {
  apiKey: string;
  baseUrl?: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: OpenAIEmbeddingsClient;

  constructor(private readonly config: OpenAIEmbeddingProviderConfig) {
    const sdk = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl && { baseURL: config.baseUrl }),
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
    this.client = {
      embeddings: {
        create: (params) => sdk.embeddings.create(params),
      },
    };
  }

  getName(): string {
    return 'openai';
  }

  getDims(): number {
    return this.config.dimensions;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.config.model,
      input: text,
    });

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new ExternalServiceError('OpenAI', 'Empty embedding in response', {
        reason: 'empty_response',
        model: this.config.model,
      });
    }
    return embedding;
  }

  /**
   * Set embeddings client (for testing)
   */
  setClient(client: OpenAIEmbeddingsClient): void {
    this.client = client;
  }
}
