import express from 'express';
import type { Request } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { validate } from '../middleware/validation.js';
import { authenticate } from '../middleware/authMiddleware.js';
import { AuthenticationError } from '../types/errors.js';
import { answersQuerySchema, qaSchemas, searchQuerySchema } from '../validation/qaSchemas.js';
import type { AnswerOrchestrator } from '../services/qa/AnswerOrchestrator.js';
import type { SimilaritySearchService } from '../services/qa/SimilaritySearchService.js';
import type { AnswerOutcome } from '../services/qa/types.js';

export interface QaRouterDeps {
  orchestrator: Pick<AnswerOrchestrator, 'answerQuestion'>;
  similaritySearch: Pick<SimilaritySearchService, 'search'>;
  jwtSecret: string;
}

interface ApiEnvelope<T> {
  success: boolean;
  message: string;
  data: T;
  status: number;
  timestamp: string;
}

function envelope<T>(success: boolean, message: string, data: T, status = 200): ApiEnvelope<T> {
  return { success, message, data, status, timestamp: new Date().toISOString() };
}

function requireUserId(req: Request): string {
  if (!req.user) {
    throw new AuthenticationError('Authentication required');
  }
  return req.user.userId;
}

/**
 * Map an answer outcome onto the response envelope.
 * Outcomes without an answer are still a 200: the client renders the message.
 */
export function toAnswerEnvelope(query: string, outcome: AnswerOutcome) {
  if (outcome.status === 'SUCCESS') {
    return envelope(true, 'Answer generated successfully', {
      query,
      answer: outcome.answer,
      route_type: outcome.route,
      sources_count: outcome.sources.length,
      type: 'precise_answer' as const,
    });
  }
  return envelope(false, outcome.message, {
    query,
    message: outcome.message,
    status: outcome.status,
    type: 'no_answer' as const,
  });
}

export function createQaRouter(deps: QaRouterDeps): express.Router {
  const router = express.Router();
  router.use(authenticate(deps.jwtSecret));

  /**
   * GET /api/ai/answers?query=...
   * Answer a question from the authenticated user's documents
   */
  router.get(
    '/answers',
    validate(qaSchemas.answers),
    asyncHandler(async (req, res) => {
      const userId = requireUserId(req);
      const { query } = answersQuerySchema.parse(req.query);

      const outcome = await deps.orchestrator.answerQuestion(query, userId);
      res.json(toAnswerEnvelope(query, outcome));
    })
  );

  /**
   * GET /api/ai/search?query=...&maxResults=5
   * Semantic search over the user's documents without generation
   */
  router.get(
    '/search',
    validate(qaSchemas.search),
    asyncHandler(async (req, res) => {
      const userId = requireUserId(req);
      const { query, maxResults } = searchQuerySchema.parse(req.query);

      const matches = await deps.similaritySearch.search(query, userId, maxResults);
      res.json(
        envelope(true, 'Search completed successfully', {
          query,
          results: matches,
          count: matches.length,
        })
      );
    })
  );

  return router;
}
