/**
 * EmbeddingProvider - Interface for embedding generation providers
 *
 * Providers throw on failure; EmbeddingService turns that into a typed result.
 */

export interface EmbeddingProvider {
  /**
   * Generate embedding for text
   *
   * @param text - Text to embed
   * @returns Embedding vector
   */
  generateEmbedding(text: string): Promise<number[]>;

  /**
   * Get provider name
   */
  getName(): string;

  /**
   * Get model dimensions
   */
  getDims(): number;
}
