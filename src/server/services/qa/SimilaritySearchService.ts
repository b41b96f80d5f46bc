/**
 * Similarity search glue: question embedding, index search, and text attachment
 */

import type { CorpusAccessor, EmbeddingBackend, SimilarityMatch } from './types.js';
import type { SimilarityIndex } from '../../vector/SimilarityIndex.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../../types/errors.js';

export class SimilaritySearchService {
  constructor(
    private readonly embeddings: EmbeddingBackend,
    private readonly index: SimilarityIndex,
    private readonly corpus: CorpusAccessor
  ) {}

  /**
   * Nearest documents for the question, scoped to the user.
   * Embedding or index failures yield an empty list.
   */
  async search(question: string, userId: string, topK: number): Promise<SimilarityMatch[]> {
    const log = createChildLogger({ service: 'SimilaritySearchService', index: this.index.getName() });

    const embedding = await this.embeddings.embed(question);
    if (!embedding.ok) {
      log.warn({ error: embedding.error }, 'Query embedding failed, no similarity matches');
      return [];
    }

    try {
      const matches = await this.index.search(embedding.vector, userId, topK);
      log.info(
        { matchCount: matches.length, scores: matches.map((match) => match.score) },
        'Similarity search completed'
      );
      return matches;
    } catch (error) {
      log.error({ error: describeError(error) }, 'Similarity index search failed');
      return [];
    }
  }

  /**
   * Attach each match's full document text. Lookups run concurrently; a
   * failed lookup leaves that match without text. Output order is input order.
   */
  async attachText(matches: SimilarityMatch[], userId: string): Promise<SimilarityMatch[]> {
    const log = createChildLogger({ service: 'SimilaritySearchService' });

    return Promise.all(
      matches.map(async (match): Promise<SimilarityMatch> => {
        try {
          const document = await this.corpus.findById(match.documentId);
          if (!document || document.userId !== userId) {
            log.warn({ documentId: match.documentId }, 'Matched document not found for user');
            return match;
          }
          if (document.extractedText == null) {
            return match;
          }
          return { ...match, text: document.extractedText };
        } catch (error) {
          log.warn({ documentId: match.documentId, error: describeError(error) }, 'Failed to fetch matched document');
          return match;
        }
      })
    );
  }
}
