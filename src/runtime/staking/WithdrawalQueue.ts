import { SafeMath } from '../../protocol/security/safe-math.js';
import type { UnstakeRequest, WithdrawalStatus } from './types.js';

/**
 * Locked withdrawal queue helpers.
 *
 * Entries are appended in request order. With a constant lock duration that
 * is also non-decreasing maturity order, so withdraw only scans the prefix.
 * If the pool's lock is shortened, a newer entry can mature before an older
 * one; it is then released together with the older entry, not before it.
 */

export interface MaturedPrefix {
    amount: bigint;
    count: number;
}

export function enqueue(queue: readonly UnstakeRequest[], request: UnstakeRequest): UnstakeRequest[] {
    return [...queue, { ...request }];
}

/** Sum of the leading entries with maturityHeight <= height. */
export function maturedPrefix(queue: readonly UnstakeRequest[], height: number): MaturedPrefix {
    let amount = 0n;
    let count = 0;
    for (const request of queue) {
        if (request.maturityHeight > height) break;
        amount = SafeMath.add(amount, request.amount);
        count++;
    }
    return { amount, count };
}

/** Drop the first `count` entries, keeping the rest in order. */
export function compact(queue: readonly UnstakeRequest[], count: number): UnstakeRequest[] {
    return queue.slice(count).map(request => ({ ...request }));
}

/**
 * Totals over the whole queue: everything requested, and everything matured
 * regardless of position.
 */
export function withdrawalStatus(queue: readonly UnstakeRequest[], height: number): WithdrawalStatus {
    let requestAmount = 0n;
    let withdrawableAmount = 0n;
    for (const request of queue) {
        requestAmount = SafeMath.add(requestAmount, request.amount);
        if (request.maturityHeight <= height) {
            withdrawableAmount = SafeMath.add(withdrawableAmount, request.amount);
        }
    }
    return { requestAmount, withdrawableAmount };
}
