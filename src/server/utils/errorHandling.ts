/**
 * Error handling utilities for route handlers
 */

import type { Request, Response, NextFunction } from 'express';

/**
 * Wraps an async route handler to automatically catch errors and pass them to Express error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/answers', asyncHandler(async (req, res) => {
 *   const outcome = await orchestrator.answerQuestion(query, userId);
 *   res.json(outcome);
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
