import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { isTest } from '../config/env.js';

const WINDOW_MS = 15 * 60 * 1000; // 15 minutes

/**
 * Rate limit info added by express-rate-limit middleware
 */
interface RequestWithRateLimit extends Request {
    rateLimit?: { resetTime?: Date };
}

/**
 * Add Retry-After header according to RFC 6585 when rate limited
 */
function addRetryAfterHeader(req: RequestWithRateLimit, res: Response, windowMs: number): void {
    const resetTime = req.rateLimit?.resetTime;
    if (resetTime) {
        const retryAfterSeconds = Math.ceil((resetTime.getTime() - Date.now()) / 1000);
        if (retryAfterSeconds > 0) {
            res.setHeader('Retry-After', retryAfterSeconds.toString());
            return;
        }
    }
    // Fallback: the full window, a conservative estimate
    res.setHeader('Retry-After', Math.ceil(windowMs / 1000).toString());
}

/**
 * General API rate limiter: 300 requests per 15 minutes per client IP.
 * Question answering fans out to several paid provider calls, so the
 * limit sits in front of every /api route.
 */
export const apiLimiter = rateLimit({
    windowMs: WINDOW_MS,
    limit: 300,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    handler: (req: Request, res: Response) => {
        addRetryAfterHeader(req, res, WINDOW_MS);
        res.status(429).json({
            error: 'Too many requests, please try again later.',
            message: 'Too many requests, please try again later.',
        });
    },
    skip: (req) => {
        // Skip rate limiting in test/CI environment
        if (isTest() || process.env.CI === 'true') {
            return true;
        }
        // Health probes are never limited
        return req.path === '/health';
    },
});
