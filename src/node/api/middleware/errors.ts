import { Request, Response, NextFunction } from 'express';
import { logger } from '../../../protocol/utils/logger.js';
import { StakingError, describeError, type StakingErrorKind } from '../../../protocol/errors.js';

const log = logger.child('API');

const statusByKind: Record<StakingErrorKind, number> = {
    InvalidParameter: 400,
    Unauthorized: 403,
    InvalidPoolId: 404,
    InsufficientBalance: 409,
    Reentrant: 409,
    Overflow: 422,
    Paused: 423,
    TransferFailed: 502,
};

export function statusFor(kind: StakingErrorKind): number {
    return statusByKind[kind];
}

function isBodyParseError(error: unknown): boolean {
    return error instanceof SyntaxError && 'body' in error;
}

export function notFound(req: Request, res: Response): void {
    res.status(404).json({ success: false, error: `No route for ${req.method} ${req.path}`, code: 'NotFound' });
}

// Express recognises error handlers by arity, so `next` stays in the signature
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (StakingError.is(error)) {
        res.status(statusFor(error.kind)).json({ success: false, error: error.message, code: error.kind });
        return;
    }
    if (isBodyParseError(error)) {
        res.status(400).json({ success: false, error: 'Malformed JSON body', code: 'InvalidParameter' });
        return;
    }
    log.error(`Unhandled error on ${req.method} ${req.path}: ${describeError(error)}`);
    res.status(500).json({ success: false, error: 'Internal server error', code: 'Internal' });
}
