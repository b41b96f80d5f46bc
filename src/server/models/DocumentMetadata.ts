import type { Filter, ObjectId, WithId } from 'mongodb';
import { getDB } from '../config/database.js';
import { handleDatabaseOperation } from '../utils/databaseErrorHandler.js';
import { escapeRegex } from '../utils/regexUtils.js';
import type { FieldRecord } from '../services/qa/types.js';

const COLLECTION_NAME = 'document_metadata';

/**
 * One extracted field of one document, as written by the ingestion pipeline
 */
export interface DocumentMetadataDocument {
  _id?: ObjectId;
  documentId: string;
  userId: string;
  documentType?: string | null;
  fieldName: string;
  fieldValue: string;
  fieldType?: string | null;
  confidence?: number | null;
  createdAt: Date;
}

export function buildExactFieldNameFilter(userId: string, fieldName: string): Filter<DocumentMetadataDocument> {
  return { userId, fieldName: { $regex: `^${escapeRegex(fieldName)}$`, $options: 'i' } };
}

export function buildFuzzyFieldNameFilter(userId: string, fieldName: string): Filter<DocumentMetadataDocument> {
  return { userId, fieldName: { $regex: escapeRegex(fieldName), $options: 'i' } };
}

export function buildFieldValueFilter(userId: string, term: string): Filter<DocumentMetadataDocument> {
  return { userId, fieldValue: { $regex: escapeRegex(term), $options: 'i' } };
}

export function toFieldRecord(doc: WithId<DocumentMetadataDocument> | DocumentMetadataDocument): FieldRecord {
  return {
    documentId: doc.documentId,
    userId: doc.userId,
    documentType: doc.documentType ?? null,
    fieldName: doc.fieldName,
    fieldValue: doc.fieldValue,
    valueKind: doc.fieldType ?? null,
    confidence: doc.confidence ?? null,
  };
}

/**
 * Read-only access to extracted field records. Every query is scoped to one user.
 */
export class DocumentMetadata {
  private static async findMany(
    filter: Filter<DocumentMetadataDocument>,
    context: string
  ): Promise<FieldRecord[]> {
    return handleDatabaseOperation(async () => {
      const db = getDB();
      const docs = await db
        .collection<DocumentMetadataDocument>(COLLECTION_NAME)
        .find(filter)
        .sort({ createdAt: 1 })
        .toArray();
      return docs.map(toFieldRecord);
    }, context);
  }

  /**
   * Field records whose name equals fieldName, ignoring case
   */
  static async findByUserAndFieldNameExact(userId: string, fieldName: string): Promise<FieldRecord[]> {
    return this.findMany(buildExactFieldNameFilter(userId, fieldName), 'DocumentMetadata.findByUserAndFieldNameExact');
  }

  /**
   * Field records whose name contains fieldName, ignoring case ("name" matches "mother_name")
   */
  static async findByUserAndFieldNameFuzzy(userId: string, fieldName: string): Promise<FieldRecord[]> {
    return this.findMany(buildFuzzyFieldNameFilter(userId, fieldName), 'DocumentMetadata.findByUserAndFieldNameFuzzy');
  }

  /**
   * Field records whose value contains term, ignoring case
   */
  static async searchByValue(userId: string, term: string): Promise<FieldRecord[]> {
    return this.findMany(buildFieldValueFilter(userId, term), 'DocumentMetadata.searchByValue');
  }
}
