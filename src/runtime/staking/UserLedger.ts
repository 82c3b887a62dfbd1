import { SCALE } from '../../protocol/params/staking.js';
import { SafeMath } from '../../protocol/security/safe-math.js';
import type { PoolId, Principal, UserRecord } from './types.js';

export function emptyUser(): UserRecord {
    return { stakeAmount: 0n, settledBaseline: 0n, pendingReward: 0n, withdrawalQueue: [] };
}

export function cloneUser(user: UserRecord): UserRecord {
    return { ...user, withdrawalQueue: user.withdrawalQueue.map(request => ({ ...request })) };
}

/** stake * acc / SCALE */
export function accruedReward(stakeAmount: bigint, accRewardPerShare: bigint): bigint {
    return SafeMath.mulDiv(stakeAmount, accRewardPerShare, SCALE);
}

/** Reward earned since the user's last touch, not yet folded into pendingReward. */
export function freshAccrual(user: UserRecord, accRewardPerShare: bigint): bigint {
    return SafeMath.sub(accruedReward(user.stakeAmount, accRewardPerShare), user.settledBaseline);
}

/** Everything claimable right now: fresh accrual plus carried pending reward. */
export function owedReward(user: UserRecord, accRewardPerShare: bigint): bigint {
    return SafeMath.add(freshAccrual(user, accRewardPerShare), user.pendingReward);
}

/**
 * Per (pool, user) stake records. Records appear on first deposit and are
 * never deleted.
 */
export class UserLedger {
    private records = new Map<string, UserRecord>();

    private key(poolId: PoolId, user: Principal): string {
        return `${poolId}:${user}`;
    }

    get(poolId: PoolId, user: Principal): UserRecord | undefined {
        return this.records.get(this.key(poolId, user));
    }

    view(poolId: PoolId, user: Principal): UserRecord {
        const record = this.get(poolId, user);
        return record ? cloneUser(record) : emptyUser();
    }

    set(poolId: PoolId, user: Principal, record: UserRecord): void {
        this.records.set(this.key(poolId, user), record);
    }

    *entries(): IterableIterator<{ poolId: PoolId; user: Principal; record: UserRecord }> {
        for (const [key, record] of this.records) {
            const separator = key.indexOf(':');
            yield { poolId: Number(key.slice(0, separator)), user: key.slice(separator + 1), record };
        }
    }

    usersOf(poolId: PoolId): Principal[] {
        const users: Principal[] = [];
        for (const entry of this.entries()) {
            if (entry.poolId === poolId) users.push(entry.user);
        }
        return users;
    }
}
