import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { getRequestContext, logger } from '../utils/logger.js';

/**
 * Extract the owner identity from a verified token payload.
 * Tokens carry it as `userId`; tokens issued with only a subject use `sub`.
 */
export function extractUserId(payload: string | jwt.JwtPayload): string | null {
    if (typeof payload === 'string') {
        return null;
    }
    const userId: unknown = payload.userId ?? payload.sub;
    return typeof userId === 'string' && userId.length > 0 ? userId : null;
}

/**
 * Middleware to authenticate requests using a Bearer JWT (HS256)
 */
export function authenticate(jwtSecret: string) {
    return (req: Request, res: Response, next: NextFunction) => {
        const authHeader = req.headers.authorization;
        if (!authHeader || !authHeader.startsWith('Bearer ')) {
            res.status(401).json({ error: 'No token provided' });
            return;
        }
        const token = authHeader.substring(7); // Remove 'Bearer ' prefix

        let payload: string | jwt.JwtPayload;
        try {
            payload = jwt.verify(token, jwtSecret, { algorithms: ['HS256'] });
        } catch (error) {
            logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Token verification failed');
            res.status(401).json({ error: 'Invalid or expired token' });
            return;
        }

        const userId = extractUserId(payload);
        if (!userId) {
            res.status(401).json({ error: 'Token does not identify a user' });
            return;
        }

        req.user = { userId };
        // Later log lines of this request carry the user
        getRequestContext().userId = userId;
        next();
    };
}
