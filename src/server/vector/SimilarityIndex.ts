/**
 * SimilarityIndex - nearest-neighbour search over document embeddings
 *
 * Implementations are selected once at startup from QaConfig.
 */

import type { SimilarityMatch } from '../services/qa/types.js';

export interface SimilarityIndex {
  /**
   * Return up to topK matches for the vector, restricted to one user's documents,
   * ordered by descending score. Matches carry no text.
   */
  search(vector: number[], userId: string, topK: number): Promise<SimilarityMatch[]>;

  /**
   * Check whether the index backend is reachable
   */
  isAvailable(): Promise<boolean>;

  getName(): string;
}

/**
 * Clamp a raw similarity score into [0, 1]
 */
export function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}
