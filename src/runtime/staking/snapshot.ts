import { isShortfallMode } from '../../protocol/params/staking.js';
import { invalidParameter } from '../../protocol/errors.js';
import {
    readAmount,
    readArray,
    readInteger,
    readRecord,
    readString,
    toJsonValue,
} from '../../protocol/utils/json.js';
import type { LedgerState } from './MultiPoolStaking.js';
import type { Pool, UnstakeRequest, UserRecord } from './types.js';

export const SNAPSHOT_VERSION = 1;

/** Serialize ledger state to plain JSON (bigints become strings). */
export function encodeLedgerState(state: LedgerState): unknown {
    return toJsonValue({ version: SNAPSHOT_VERSION, ...state });
}

export function decodeLedgerState(data: unknown): LedgerState {
    const root = readRecord(data, 'snapshot');
    const version = readInteger(root.version, 'snapshot.version');
    if (version !== SNAPSHOT_VERSION) {
        throw invalidParameter(`unsupported snapshot version ${version}`);
    }

    const emission = readRecord(root.emission, 'snapshot.emission');
    const shortfallMode = readString(root.shortfallMode, 'snapshot.shortfallMode');
    if (!isShortfallMode(shortfallMode)) {
        throw invalidParameter(`unknown shortfall mode ${shortfallMode}`);
    }

    return {
        emission: {
            rewardAssetId: readString(emission.rewardAssetId, 'emission.rewardAssetId'),
            startHeight: readInteger(emission.startHeight, 'emission.startHeight'),
            endHeight: readInteger(emission.endHeight, 'emission.endHeight'),
            rewardPerBlock: readAmount(emission.rewardPerBlock, 'emission.rewardPerBlock'),
        },
        shortfallMode,
        observedHeight: readInteger(root.observedHeight, 'snapshot.observedHeight'),
        pools: readArray(root.pools, 'snapshot.pools').map((value, i) => decodePool(value, `pools[${i}]`)),
        users: readArray(root.users, 'snapshot.users').map((value, i) => {
            const entry = readRecord(value, `users[${i}]`);
            return {
                poolId: readInteger(entry.poolId, `users[${i}].poolId`),
                user: readString(entry.user, `users[${i}].user`),
                record: decodeUser(entry.record, `users[${i}].record`),
            };
        }),
    };
}

function decodePool(value: unknown, path: string): Pool {
    const pool = readRecord(value, path);
    return {
        id: readInteger(pool.id, `${path}.id`),
        stakeAssetId: readString(pool.stakeAssetId, `${path}.stakeAssetId`),
        weight: readAmount(pool.weight, `${path}.weight`),
        lastSettledHeight: readInteger(pool.lastSettledHeight, `${path}.lastSettledHeight`),
        accRewardPerShare: readAmount(pool.accRewardPerShare, `${path}.accRewardPerShare`),
        totalStaked: readAmount(pool.totalStaked, `${path}.totalStaked`),
        minDeposit: readAmount(pool.minDeposit, `${path}.minDeposit`),
        unstakeLockBlocks: readInteger(pool.unstakeLockBlocks, `${path}.unstakeLockBlocks`),
    };
}

function decodeUser(value: unknown, path: string): UserRecord {
    const user = readRecord(value, path);
    return {
        stakeAmount: readAmount(user.stakeAmount, `${path}.stakeAmount`),
        settledBaseline: readAmount(user.settledBaseline, `${path}.settledBaseline`),
        pendingReward: readAmount(user.pendingReward, `${path}.pendingReward`),
        withdrawalQueue: readArray(user.withdrawalQueue, `${path}.withdrawalQueue`).map((entry, i) => decodeRequest(entry, `${path}.withdrawalQueue[${i}]`)),
    };
}

function decodeRequest(value: unknown, path: string): UnstakeRequest {
    const request = readRecord(value, path);
    return {
        amount: readAmount(request.amount, `${path}.amount`),
        maturityHeight: readInteger(request.maturityHeight, `${path}.maturityHeight`),
    };
}
