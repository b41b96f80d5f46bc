import { ObjectId } from 'mongodb';
import type { Filter, WithId } from 'mongodb';
import { getDB } from '../config/database.js';
import { handleDatabaseOperation } from '../utils/databaseErrorHandler.js';
import type { CorpusDocument, ProcessingStatus } from '../services/qa/types.js';

const COLLECTION_NAME = 'documents';

/**
 * An uploaded document and its extraction result
 */
export interface UserDocumentDocument {
  _id: ObjectId;
  originalFilename: string;
  userId: string;
  processingStatus: ProcessingStatus;
  extractedText?: string | null;
  documentType?: string | null;
  confidenceScore?: number | null;
  createdAt: Date;
  updatedAt: Date;
  processedAt?: Date | null;
}

export function buildCompletedFilter(userId: string, documentTypes?: string[]): Filter<UserDocumentDocument> {
  const filter: Filter<UserDocumentDocument> = { userId, processingStatus: 'COMPLETED' };
  if (documentTypes && documentTypes.length > 0) {
    filter.documentType = { $in: documentTypes };
  }
  return filter;
}

export function toCorpusDocument(doc: WithId<UserDocumentDocument>): CorpusDocument {
  return {
    id: doc._id.toHexString(),
    userId: doc.userId,
    originalFilename: doc.originalFilename,
    documentType: doc.documentType ?? null,
    processingStatus: doc.processingStatus,
    extractedText: doc.extractedText ?? null,
  };
}

/**
 * Read-only access to users' documents
 */
export class UserDocument {
  /**
   * Find a document by ID. Malformed IDs resolve to null.
   */
  static async findById(id: string): Promise<CorpusDocument | null> {
    if (!ObjectId.isValid(id)) {
      return null;
    }
    return handleDatabaseOperation(async () => {
      const db = getDB();
      const doc = await db.collection<UserDocumentDocument>(COLLECTION_NAME).findOne({ _id: new ObjectId(id) });
      return doc ? toCorpusDocument(doc) : null;
    }, 'UserDocument.findById');
  }

  /**
   * Completed documents of the user, oldest first
   */
  static async findCompletedByUser(userId: string): Promise<CorpusDocument[]> {
    return handleDatabaseOperation(async () => {
      const db = getDB();
      const docs = await db
        .collection<UserDocumentDocument>(COLLECTION_NAME)
        .find(buildCompletedFilter(userId))
        .sort({ createdAt: 1 })
        .toArray();
      return docs.map(toCorpusDocument);
    }, 'UserDocument.findCompletedByUser');
  }

  /**
   * Completed documents of the user with one of the given types, oldest first
   */
  static async findCompletedByUserAndTypes(userId: string, documentTypes: string[]): Promise<CorpusDocument[]> {
    return handleDatabaseOperation(async () => {
      const db = getDB();
      const docs = await db
        .collection<UserDocumentDocument>(COLLECTION_NAME)
        .find(buildCompletedFilter(userId, documentTypes))
        .sort({ createdAt: 1 })
        .toArray();
      return docs.map(toCorpusDocument);
    }, 'UserDocument.findCompletedByUserAndTypes');
  }
}
