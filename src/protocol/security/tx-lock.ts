import { logger } from '../utils/logger.js';
import { StakingError } from '../errors.js';

/**
 * Re-entrancy guard for ledger writes.
 *
 * Operations are synchronous, so a key can only be held twice when a
 * collaborator calls back into the node mid-operation. That call fails.
 */
const activeLocks = new Set<string>();

export function acquireTxLock(key: string): boolean {
    if (activeLocks.has(key)) {
        logger.warn(`🔒 Reentrancy blocked for ${key}`);
        return false;
    }
    activeLocks.add(key);
    return true;
}

export function releaseTxLock(key: string): void {
    activeLocks.delete(key);
}

export function withTxLock<T>(key: string, fn: () => T): T {
    if (!acquireTxLock(key)) throw new StakingError('Reentrant', `Operation already in progress on ${key}`);
    try {
        return fn();
    } finally {
        releaseTxLock(key);
    }
}

/** Acquire keys in the given order (pool lock before weight lock). */
export function withTxLocks<T>(keys: readonly string[], fn: () => T): T {
    const [first, ...rest] = keys;
    if (first === undefined) return fn();
    return withTxLock(first, () => withTxLocks(rest, fn));
}

export const poolLockKey = (poolId: number): string => `pool:${poolId}`;
export const WEIGHT_LOCK_KEY = 'weights';
