import { StakingError } from '../../src/protocol/errors.js';

/** Kind of the StakingError `fn` throws; 'none' if it returns, 'other' for foreign errors. */
export function errorKind(fn: () => unknown): string {
    try {
        fn();
    } catch (error) {
        return StakingError.is(error) ? error.kind : 'other';
    }
    return 'none';
}
