/**
 * In-memory collaborators shared by the question-answering tests
 */

import type {
  CorpusAccessor,
  CorpusDocument,
  EmbeddingBackend,
  EmbeddingResult,
  FieldRecord,
  FieldStoreAccessor,
  GenerationBackend,
  GenerationResult,
  SimilarityMatch,
} from '../types.js';
import type { SimilarityIndex } from '../../../vector/SimilarityIndex.js';

export const USER = 'asha@example.com';
export const OTHER_USER = 'ravi@example.com';

export function fieldRecord(overrides: Partial<FieldRecord> = {}): FieldRecord {
  return {
    documentId: 'doc-id',
    userId: USER,
    documentType: 'IDENTITY_DOCUMENT',
    fieldName: 'id_number',
    fieldValue: 'ABCDE1234F',
    valueKind: 'STRING',
    confidence: 0.98,
    ...overrides,
  };
}

export function corpusDocument(overrides: Partial<CorpusDocument> = {}): CorpusDocument {
  return {
    id: 'doc-1',
    userId: USER,
    originalFilename: 'file.pdf',
    documentType: 'OTHER',
    processingStatus: 'COMPLETED',
    extractedText: 'Some text',
    ...overrides,
  };
}

/**
 * Field store with the production matching rules: case-insensitive exact or
 * substring match on the field name, substring match on the value.
 */
export class InMemoryFieldStore implements FieldStoreAccessor {
  readonly calls: string[] = [];

  constructor(private readonly records: FieldRecord[] = []) {}

  async findByUserAndFieldNameExact(userId: string, fieldName: string): Promise<FieldRecord[]> {
    this.calls.push(`exact:${fieldName}`);
    return this.records.filter(
      (record) => record.userId === userId && record.fieldName.toLowerCase() === fieldName.toLowerCase()
    );
  }

  async findByUserAndFieldNameFuzzy(userId: string, fieldName: string): Promise<FieldRecord[]> {
    this.calls.push(`fuzzy:${fieldName}`);
    return this.records.filter(
      (record) => record.userId === userId && record.fieldName.toLowerCase().includes(fieldName.toLowerCase())
    );
  }

  async searchByValue(userId: string, term: string): Promise<FieldRecord[]> {
    this.calls.push(`value:${term}`);
    return this.records.filter(
      (record) => record.userId === userId && record.fieldValue.toLowerCase().includes(term.toLowerCase())
    );
  }
}

export class InMemoryCorpus implements CorpusAccessor {
  constructor(private readonly documents: CorpusDocument[] = []) {}

  async findById(id: string): Promise<CorpusDocument | null> {
    return this.documents.find((document) => document.id === id) ?? null;
  }

  async findCompletedByUser(userId: string): Promise<CorpusDocument[]> {
    return this.documents.filter(
      (document) => document.userId === userId && document.processingStatus === 'COMPLETED'
    );
  }

  async findCompletedByUserAndTypes(userId: string, documentTypes: string[]): Promise<CorpusDocument[]> {
    const completed = await this.findCompletedByUser(userId);
    return completed.filter(
      (document) => document.documentType !== null && documentTypes.includes(document.documentType)
    );
  }
}

/**
 * Generation backend that records prompts and replies with a fixed result
 */
export class RecordingGenerationBackend implements GenerationBackend {
  readonly prompts: string[] = [];

  constructor(private readonly result: GenerationResult = { ok: true, text: 'Generated answer' }) {}

  async generateText(prompt: string): Promise<GenerationResult> {
    this.prompts.push(prompt);
    return this.result;
  }
}

export class FixedEmbeddingBackend implements EmbeddingBackend {
  constructor(private readonly result: EmbeddingResult = { ok: true, vector: [0.1, 0.2, 0.3] }) {}

  async embed(_text: string): Promise<EmbeddingResult> {
    return this.result;
  }
}

export class FixedSimilarityIndex implements SimilarityIndex {
  readonly searches: Array<{ vector: number[]; userId: string; topK: number }> = [];

  constructor(private readonly matches: SimilarityMatch[] = []) {}

  async search(vector: number[], userId: string, topK: number): Promise<SimilarityMatch[]> {
    this.searches.push({ vector, userId, topK });
    return this.matches.slice(0, topK);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  getName(): string {
    return 'in-memory';
  }
}
