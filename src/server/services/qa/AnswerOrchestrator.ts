/**
 * Answer Orchestrator
 *
 * Classifies a question, runs exactly one retrieval route (field lookup may
 * fall through to similarity), builds the evidence context and produces an
 * AnswerOutcome. answerQuestion never rejects.
 *
 * Routes:
 * - FIELD_LOOKUP: structured field records rendered directly, no generation
 * - SIMILARITY: vector search, full text of the top matches, generation
 * - AGGREGATE: all completed documents (optionally type-filtered), generation
 */

import type {
  AnswerOutcome,
  CorpusAccessor,
  CorpusDocument,
  EvidenceSection,
  RouteDecision,
  SimilarityMatch,
} from './types.js';
import type { ContextAssembler } from './ContextAssembler.js';
import type { AnswerGenerator } from './AnswerGenerator.js';
import type { FieldLookupService } from './FieldLookupService.js';
import { formatFieldAnswer } from './FieldLookupService.js';
import type { SimilaritySearchService } from './SimilaritySearchService.js';
import { MESSAGES, buildAggregatePrompt, buildSimilarityPrompt } from './prompts.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../../types/errors.js';
import type { Logger } from 'pino';

export interface RouteClassifier {
  classify(question: string): Promise<RouteDecision>;
}

export interface AnswerOrchestratorDeps {
  classifier: RouteClassifier;
  fieldLookup: FieldLookupService;
  similaritySearch: SimilaritySearchService;
  corpus: CorpusAccessor;
  assembler: ContextAssembler;
  generator: AnswerGenerator;
  /** Matches requested from the similarity index per question */
  similarityTopK: number;
}

export function similaritySectionLabel(rank: number, documentType: string | null): string {
  return `=== Document ${rank} (${documentType ?? 'Unknown'}) ===`;
}

export function aggregateSectionLabel(document: CorpusDocument): string {
  return `=== ${document.documentType ?? 'Unknown'} (file: ${document.originalFilename}) ===`;
}

export class AnswerOrchestrator {
  constructor(private readonly deps: AnswerOrchestratorDeps) {}

  async answerQuestion(question: string, userId: string): Promise<AnswerOutcome> {
    const log = createChildLogger({ service: 'AnswerOrchestrator', userId });
    log.info({ question }, 'Answering question');

    try {
      const decision = await this.deps.classifier.classify(question);

      switch (decision.route) {
        case 'FIELD_LOOKUP':
          return await this.answerFromFields(decision.fieldHints, question, userId, log);
        case 'AGGREGATE':
          return await this.answerFromAggregate(decision.documentTypes, question, userId, log);
        case 'SIMILARITY':
          return await this.answerFromSimilarity(question, userId, log);
        default: {
          const unknownRoute: never = decision.route;
          throw new Error(`Unhandled route: ${String(unknownRoute)}`);
        }
      }
    } catch (error) {
      log.error({ error: describeError(error) }, 'Question answering failed');
      return { status: 'ERROR', message: MESSAGES.unexpectedError };
    }
  }

  private async answerFromFields(
    fieldHints: string[],
    question: string,
    userId: string,
    log: Logger
  ): Promise<AnswerOutcome> {
    const records = await this.deps.fieldLookup.lookup(fieldHints, question, userId);

    if (records.length === 0) {
      log.info({ fieldHints }, 'No field records matched, falling back to similarity search');
      return this.answerFromSimilarity(question, userId, log);
    }

    log.info({ recordCount: records.length }, 'Answered from field records');
    return { status: 'SUCCESS', answer: formatFieldAnswer(records), route: 'FIELD_LOOKUP', sources: [] };
  }

  private async answerFromSimilarity(question: string, userId: string, log: Logger): Promise<AnswerOutcome> {
    const { similaritySearch, assembler, generator, similarityTopK } = this.deps;

    const matches = await similaritySearch.search(question, userId, similarityTopK);
    if (matches.length === 0) {
      return { status: 'NOT_FOUND', message: MESSAGES.similarityNotFound };
    }

    const withText = await similaritySearch.attachText(matches, userId);
    const context = assembler.build(
      withText.map(
        (match: SimilarityMatch, index): EvidenceSection => ({
          label: similaritySectionLabel(index + 1, match.documentType),
          text: match.text,
        })
      )
    );
    if (context.text.length === 0) {
      log.warn({ matchCount: matches.length }, 'Similarity matches had no retrievable text');
      return { status: 'NO_ANSWER', message: MESSAGES.similarityNoAnswer };
    }

    log.info({ sections: context.sectionCount, chars: context.text.length }, 'Built similarity context');
    const answer = await generator.invoke(buildSimilarityPrompt(question, context.text));
    return { status: 'SUCCESS', answer, route: 'SIMILARITY', sources: withText };
  }

  private async answerFromAggregate(
    documentTypes: string[] | null,
    question: string,
    userId: string,
    log: Logger
  ): Promise<AnswerOutcome> {
    const { corpus, assembler, generator } = this.deps;

    let documents: CorpusDocument[];
    if (documentTypes && documentTypes.length > 0) {
      documents = await corpus.findCompletedByUserAndTypes(userId, documentTypes);
      if (documents.length === 0) {
        log.warn({ documentTypes }, 'No documents matched the type filter, using all completed documents');
        documents = await corpus.findCompletedByUser(userId);
      }
    } else {
      documents = await corpus.findCompletedByUser(userId);
    }

    if (documents.length === 0) {
      return { status: 'NOT_FOUND', message: MESSAGES.aggregateNotFound };
    }

    const context = assembler.build(
      documents.map((document): EvidenceSection => ({
        label: aggregateSectionLabel(document),
        text: document.extractedText,
      }))
    );
    if (context.text.length === 0) {
      log.warn({ documentCount: documents.length }, 'Candidate documents had no extracted text');
      return { status: 'NO_ANSWER', message: MESSAGES.aggregateNoAnswer };
    }

    log.info(
      { candidates: documents.length, sections: context.sectionCount, chars: context.text.length },
      'Built aggregate context'
    );
    const answer = await generator.invoke(buildAggregatePrompt(question, context.text));
    return { status: 'SUCCESS', answer, route: 'AGGREGATE', sources: [] };
  }
}
