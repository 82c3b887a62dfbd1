/**
 * Ledger error kinds.
 *
 * Every public operation either commits fully or throws one of these,
 * leaving the pre-call state untouched.
 */
export type StakingErrorKind =
    | 'InvalidPoolId'
    | 'InvalidParameter'
    | 'InsufficientBalance'
    | 'Overflow'
    | 'Paused'
    | 'Unauthorized'
    | 'TransferFailed'
    | 'Reentrant';

export class StakingError extends Error {
    readonly kind: StakingErrorKind;

    constructor(kind: StakingErrorKind, message: string) {
        super(message);
        this.name = 'StakingError';
        this.kind = kind;
    }

    static is(error: unknown, kind?: StakingErrorKind): error is StakingError {
        return error instanceof StakingError && (kind === undefined || error.kind === kind);
    }
}

export const invalidParameter = (message: string): StakingError =>
    new StakingError('InvalidParameter', message);

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
