/**
 * Gemini embedContent provider
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient } from '../../config/httpClient.js';
import { ExternalServiceError } from '../../types/errors.js';
import type { EmbeddingProvider } from '../EmbeddingProvider.js';

export interface GeminiEmbeddingProviderConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

const embedContentResponseSchema = z.object({
  embedding: z.object({
    values: z.array(z.number()),
  }),
});

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  private client: AxiosInstance;

  constructor(private readonly config: GeminiEmbeddingProviderConfig) {
    this.client = createHttpClient({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  getName(): string {
    return 'gemini';
  }

  getDims(): number {
    return this.config.dimensions;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const response = await this.client.post(
      `/models/${this.config.model}:embedContent`,
      {
        model: `models/${this.config.model}`,
        content: { parts: [{ text }] },
        outputDimensionality: this.config.dimensions,
      },
      { params: { key: this.config.apiKey } }
    );

    const parsed = embedContentResponseSchema.safeParse(response.data);
    if (!parsed.success || parsed.data.embedding.values.length === 0) {
      throw new ExternalServiceError('Gemini', 'Empty embedding in response', {
        reason: 'empty_response',
        model: this.config.model,
      });
    }
    return parsed.data.embedding.values;
  }

  /**
   * Set HTTP client (for testing)
   */
  setClient(client: AxiosInstance): void {
    this.client = client;
  }
}
