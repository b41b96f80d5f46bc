/**
 * PgVectorProvider - pgvector implementation of SimilarityIndex
 *
 * Reads document-level embeddings written by the ingestion pipeline.
 * Expected table: <schema>.document_embeddings
 *   (document_id TEXT, user_id TEXT, document_type TEXT, embedding vector)
 */

import type { QueryResultRow } from 'pg';
import { queryPostgres } from '../config/postgres.js';
import type { SimilarityMatch } from '../services/qa/types.js';
import { logger } from '../utils/logger.js';
import { clampScore } from './SimilarityIndex.js';
import type { SimilarityIndex } from './SimilarityIndex.js';

export type PgQueryRunner = (text: string, params: unknown[]) => Promise<QueryResultRow[]>;

export interface PgVectorProviderConfig {
  schema: string;
  /** Query runner, defaults to the shared pool */
  runQuery?: PgQueryRunner;
}

export class PgVectorProvider implements SimilarityIndex {
  private readonly schema: string;
  private readonly runQuery: PgQueryRunner;

  constructor(config: PgVectorProviderConfig) {
    if (!/^[a-z0-9_]+$/i.test(config.schema)) {
      throw new Error(`Invalid schema name: ${config.schema}. Only alphanumeric characters and underscores are allowed.`);
    }
    this.schema = config.schema;
    this.runQuery = config.runQuery ?? ((text, params) => queryPostgres(text, params));
  }

  getName(): string {
    return 'pgvector';
  }

  /**
   * Escape identifier (schema/table name) to prevent SQL injection
   *
   * Doubles double quotes and wraps in double quotes.
   */
  private escapeIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  buildSearchQuery(): string {
    const table = `${this.escapeIdentifier(this.schema)}.document_embeddings`;
    // pgvector expects '[1,2,3]' text, so the vector travels as JSON and is cast server-side
    return `
        SELECT
          document_id,
          document_type,
          1 - (embedding <=> CAST($1::text AS vector)) AS score
        FROM ${table}
        WHERE user_id = $2
        ORDER BY embedding <=> CAST($1::text AS vector)
        LIMIT $3;
      `;
  }

  async search(vector: number[], userId: string, topK: number): Promise<SimilarityMatch[]> {
    const rows = await this.runQuery(this.buildSearchQuery(), [JSON.stringify(vector), userId, topK]);

    const matches = rows.map((row): SimilarityMatch => ({
      documentId: String(row.document_id),
      score: clampScore(Number(row.score)),
      documentType: row.document_type == null ? null : String(row.document_type),
    }));

    logger.debug({ userId, topK, resultCount: matches.length }, 'pgvector similarity search completed');
    return matches;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.runQuery('SELECT 1', []);
      return true;
    } catch (error) {
      logger.debug({ error }, 'pgvector not available');
      return false;
    }
  }
}
