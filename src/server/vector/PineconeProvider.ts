/**
 * PineconeProvider - Pinecone REST implementation of SimilarityIndex
 *
 * Vectors are stored per document with metadata { userId, documentType };
 * full text lives in the document store, not in the index.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient } from '../config/httpClient.js';
import type { SimilarityMatch } from '../services/qa/types.js';
import { ExternalServiceError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { clampScore } from './SimilarityIndex.js';
import type { SimilarityIndex } from './SimilarityIndex.js';

export interface PineconeProviderConfig {
  apiKey: string;
  /** Index host, e.g. https://<index>-<project>.svc.<region>.pinecone.io */
  baseUrl: string;
  timeoutMs: number;
}

const queryResponseSchema = z.object({
  matches: z
    .array(
      z.object({
        id: z.string(),
        score: z.number().optional(),
        metadata: z
          .object({
            documentType: z.string().nullish(),
          })
          .passthrough()
          .nullish(),
      })
    )
    .default([]),
});

export class PineconeProvider implements SimilarityIndex {
  private client: AxiosInstance;

  constructor(private readonly config: PineconeProviderConfig) {
    this.client = createHttpClient({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'Api-Key': config.apiKey,
      },
    });
  }

  getName(): string {
    return 'pinecone';
  }

  async search(vector: number[], userId: string, topK: number): Promise<SimilarityMatch[]> {
    const response = await this.client.post('/query', {
      vector,
      topK,
      includeMetadata: true,
      includeValues: false,
      filter: { userId: { $eq: userId } },
    });

    const parsed = queryResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ExternalServiceError('Pinecone', 'Unexpected query response shape', {
        reason: 'invalid_response',
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const matches = parsed.data.matches.map((match): SimilarityMatch => ({
      documentId: match.id,
      score: clampScore(match.score ?? 0),
      documentType: match.metadata?.documentType ?? null,
    }));

    logger.debug({ userId, topK, resultCount: matches.length }, 'Pinecone similarity search completed');
    return matches;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.post('/describe_index_stats', {});
      return true;
    } catch (error) {
      logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Pinecone not available');
      return false;
    }
  }

  /**
   * Set HTTP client (for testing)
   */
  setClient(client: AxiosInstance): void {
    this.client = client;
  }
}
