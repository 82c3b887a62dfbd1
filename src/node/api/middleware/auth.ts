import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../../protocol/utils/logger.js';
import type { Principal } from '../../../runtime/staking/types.js';

const log = logger.child('Auth');

/**
 * API Key Authentication Middleware
 * Resolves the X-API-Key header to the caller principal.
 */
export function principalAuth(keys: Record<string, Principal>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const apiKey = req.header('x-api-key');

        if (!apiKey) {
            res.status(401).json({
                success: false,
                error: 'API key required. Add X-API-Key header.',
                code: 'Unauthenticated',
            });
            return;
        }

        const principal = Object.prototype.hasOwnProperty.call(keys, apiKey) ? keys[apiKey] : undefined;
        if (!principal) {
            log.warn(`🔒 Invalid API key attempt from ${req.ip}`);
            res.status(403).json({
                success: false,
                error: 'Invalid API key',
                code: 'Unauthorized',
            });
            return;
        }

        res.locals.principal = principal;
        next();
    };
}

/** The principal resolved by principalAuth for this request. */
export function callerOf(res: Response): Principal {
    const principal: unknown = res.locals.principal;
    if (typeof principal !== 'string') {
        throw new Error('principalAuth must run before this handler');
    }
    return principal;
}
