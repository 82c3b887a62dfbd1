import { SafeMath } from '../../protocol/security/safe-math.js';
import { StakingError } from '../../protocol/errors.js';
import type { Pool, PoolId } from './types.js';

/**
 * Append-only pool arena. Ids are array indexes and stay valid forever.
 */
export class PoolRegistry {
    private pools: Pool[] = [];
    private weightSum = 0n;

    get length(): number {
        return this.pools.length;
    }

    get totalWeight(): bigint {
        return this.weightSum;
    }

    nextId(): PoolId {
        return this.pools.length;
    }

    has(poolId: PoolId): boolean {
        return Number.isInteger(poolId) && poolId >= 0 && poolId < this.pools.length;
    }

    /** Live record; callers outside the runtime get copies via view(). */
    get(poolId: PoolId): Pool {
        const pool = this.has(poolId) ? this.pools[poolId] : undefined;
        if (!pool) throw new StakingError('InvalidPoolId', `invalid pool id ${poolId}`);
        return pool;
    }

    view(poolId: PoolId): Pool {
        return { ...this.get(poolId) };
    }

    list(): Pool[] {
        return this.pools.map(pool => ({ ...pool }));
    }

    entries(): readonly Pool[] {
        return this.pools;
    }

    /** Weight sum after swapping `poolId`'s weight (or adding a pool when undefined). */
    projectTotalWeight(weight: bigint, poolId?: PoolId): bigint {
        const without = poolId === undefined ? this.weightSum : SafeMath.sub(this.weightSum, this.get(poolId).weight);
        return SafeMath.add(without, weight);
    }

    append(pool: Pool, totalWeight: bigint): void {
        if (pool.id !== this.pools.length) {
            throw new StakingError('InvalidPoolId', `pool id ${pool.id} is not next in sequence`);
        }
        this.pools.push(pool);
        this.weightSum = totalWeight;
    }

    setWeight(poolId: PoolId, weight: bigint, totalWeight: bigint): void {
        this.get(poolId).weight = weight;
        this.weightSum = totalWeight;
    }

    /** Rebuild from persisted pools; the weight sum is recomputed. */
    load(pools: Pool[]): void {
        this.pools = pools.map((pool, index) => {
            if (pool.id !== index) throw new StakingError('InvalidPoolId', `pool ${pool.id} stored at index ${index}`);
            return { ...pool };
        });
        this.weightSum = this.pools.reduce((sum, pool) => SafeMath.add(sum, pool.weight), 0n);
    }
}
