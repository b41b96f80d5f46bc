/**
 * Question-answering type definitions
 *
 * Route decisions, evidence records, the answer outcome union, and the
 * collaborator contracts the orchestrator depends on.
 */

export const ROUTES = ['FIELD_LOOKUP', 'SIMILARITY', 'AGGREGATE'] as const;

export type Route = (typeof ROUTES)[number];

export function isRoute(value: string): value is Route {
  return ROUTES.some((route) => route === value);
}

export interface RouteDecision {
  route: Route;
  /** Field-name hints, only read on the FIELD_LOOKUP route */
  fieldHints: string[];
  /** Document-type hints, only read on the AGGREGATE route. null means no type filter */
  documentTypes: string[] | null;
}

export const FALLBACK_DECISION: Readonly<RouteDecision> = Object.freeze({
  route: 'SIMILARITY',
  fieldHints: [],
  documentTypes: null,
});

/**
 * One extracted field of one document (entity-attribute-value layout)
 */
export interface FieldRecord {
  documentId: string;
  userId: string;
  documentType: string | null;
  fieldName: string;
  fieldValue: string;
  /** Value kind as extracted: STRING, NUMBER, DATE, ... */
  valueKind: string | null;
  confidence: number | null;
}

export type ProcessingStatus = 'PENDING' | 'PROCESSING' | 'COMPLETED' | 'FAILED';

export interface CorpusDocument {
  id: string;
  userId: string;
  originalFilename: string;
  documentType: string | null;
  processingStatus: ProcessingStatus;
  extractedText: string | null;
}

export interface SimilarityMatch {
  documentId: string;
  /** Similarity in [0, 1], higher is closer */
  score: number;
  documentType: string | null;
  /** Full document text, attached after the index search */
  text?: string;
}

export interface EvidenceSection {
  label: string;
  text: string | null | undefined;
}

export interface EvidenceContext {
  text: string;
  /** Number of sections that made it into the context */
  sectionCount: number;
  /** True when a section was dropped because the budget was reached */
  truncated: boolean;
}

export type AnswerOutcome =
  | { status: 'SUCCESS'; answer: string; route: Route; sources: SimilarityMatch[] }
  | { status: 'NOT_FOUND'; message: string }
  | { status: 'NO_ANSWER'; message: string }
  | { status: 'ERROR'; message: string };

export type AnswerStatus = AnswerOutcome['status'];

export type GenerationResult = { ok: true; text: string } | { ok: false; error: string };

export type EmbeddingResult = { ok: true; vector: number[] } | { ok: false; error: string };

/**
 * Read-only access to structured field records, always scoped to one user
 */
export interface FieldStoreAccessor {
  findByUserAndFieldNameExact(userId: string, fieldName: string): Promise<FieldRecord[]>;
  findByUserAndFieldNameFuzzy(userId: string, fieldName: string): Promise<FieldRecord[]>;
  searchByValue(userId: string, term: string): Promise<FieldRecord[]>;
}

/**
 * Read-only access to whole documents
 */
export interface CorpusAccessor {
  findById(id: string): Promise<CorpusDocument | null>;
  findCompletedByUser(userId: string): Promise<CorpusDocument[]>;
  findCompletedByUserAndTypes(userId: string, documentTypes: string[]): Promise<CorpusDocument[]>;
}

/**
 * Turns a prompt into generated text or a typed failure. Never throws.
 */
export interface GenerationBackend {
  generateText(prompt: string): Promise<GenerationResult>;
}

/**
 * Turns text into a fixed-length vector or a typed failure. Never throws.
 */
export interface EmbeddingBackend {
  embed(text: string): Promise<EmbeddingResult>;
}
