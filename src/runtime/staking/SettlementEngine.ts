import { SCALE } from '../../protocol/params/staking.js';
import { SafeMath } from '../../protocol/security/safe-math.js';
import { EmissionSchedule } from './EmissionSchedule.js';
import { PoolRegistry } from './PoolRegistry.js';
import type { EventSink, Pool, PoolId } from './types.js';

/** The next accumulator state of one pool, computed but not yet written. */
export interface Settlement {
    poolId: PoolId;
    changed: boolean;
    height: number;
    poolReward: bigint;
    accRewardPerShare: bigint;
}

/**
 * Brings pool accumulators current. Every reward-affecting operation goes
 * through preview() first and commits with apply() once nothing else can fail.
 */
export class SettlementEngine {
    constructor(
        private registry: PoolRegistry,
        private schedule: EmissionSchedule,
        private events?: EventSink,
    ) { }

    preview(pool: Pool, height: number): Settlement {
        if (height <= pool.lastSettledHeight) {
            return {
                poolId: pool.id,
                changed: false,
                height: pool.lastSettledHeight,
                poolReward: 0n,
                accRewardPerShare: pool.accRewardPerShare,
            };
        }

        const emitted = this.schedule.multiplier(pool.lastSettledHeight, height);
        const poolReward = SafeMath.div(SafeMath.mul(emitted, pool.weight), this.registry.totalWeight);

        let accRewardPerShare = pool.accRewardPerShare;
        if (pool.totalStaked > 0n) {
            const perShare = SafeMath.div(SafeMath.mul(poolReward, SCALE), pool.totalStaked);
            accRewardPerShare = SafeMath.add(accRewardPerShare, perShare);
        }

        return { poolId: pool.id, changed: true, height, poolReward, accRewardPerShare };
    }

    previewAll(height: number): Settlement[] {
        return this.registry.entries().map(pool => this.preview(pool, height));
    }

    apply(settlement: Settlement): void {
        if (!settlement.changed) return;
        const pool = this.registry.get(settlement.poolId);
        pool.accRewardPerShare = settlement.accRewardPerShare;
        pool.lastSettledHeight = settlement.height;
        this.events?.emit({
            type: 'PoolSettled',
            poolId: pool.id,
            height: settlement.height,
            poolReward: settlement.poolReward,
        });
    }

    settle(poolId: PoolId, height: number): Settlement {
        const settlement = this.preview(this.registry.get(poolId), height);
        this.apply(settlement);
        return settlement;
    }

    /** All-or-nothing: every preview is computed before any pool is written. */
    settleAll(height: number): Settlement[] {
        const settlements = this.previewAll(height);
        settlements.forEach(settlement => this.apply(settlement));
        return settlements;
    }
}
