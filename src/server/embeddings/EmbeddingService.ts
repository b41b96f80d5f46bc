/**
 * EmbeddingService - query embedding boundary
 *
 * Wraps an EmbeddingProvider as an EmbeddingBackend: provider failures and
 * dimension mismatches come back as a typed failure rather than a throw.
 */

import type { EmbeddingProvider } from './EmbeddingProvider.js';
import type { EmbeddingBackend, EmbeddingResult } from '../services/qa/types.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../types/errors.js';

export class EmbeddingService implements EmbeddingBackend {
  constructor(private readonly provider: EmbeddingProvider) {}

  async embed(text: string): Promise<EmbeddingResult> {
    if (!text.trim()) {
      return { ok: false, error: 'Cannot embed empty text' };
    }

    try {
      const vector = await this.provider.generateEmbedding(text);
      const expectedDims = this.provider.getDims();
      if (vector.length !== expectedDims) {
        logger.warn(
          { provider: this.provider.getName(), expectedDims, actualDims: vector.length },
          'Embedding dimension mismatch'
        );
        return {
          ok: false,
          error: `Expected ${expectedDims} dimensions, got ${vector.length}`,
        };
      }
      return { ok: true, vector };
    } catch (error) {
      const message = describeError(error);
      logger.warn({ provider: this.provider.getName(), error: message }, 'Embedding generation failed');
      return { ok: false, error: message };
    }
  }
}
