import type { ShortfallMode } from '../../protocol/params/staking.js';

export type PoolId = number;
export type Principal = string;
export type AssetId = string;

export interface Pool {
    id: PoolId;
    stakeAssetId: AssetId;
    weight: bigint;
    lastSettledHeight: number;
    accRewardPerShare: bigint;   // scaled by SCALE
    totalStaked: bigint;
    minDeposit: bigint;
    unstakeLockBlocks: number;
}

export interface UnstakeRequest {
    amount: bigint;
    maturityHeight: number;
}

export interface UserRecord {
    stakeAmount: bigint;
    settledBaseline: bigint;
    pendingReward: bigint;
    withdrawalQueue: UnstakeRequest[];
}

/** Who is calling and at which block height. */
export interface CallContext {
    caller: Principal;
    height: number;
}

export interface EmissionConfig {
    rewardAssetId: AssetId;
    startHeight: number;
    endHeight: number;
    rewardPerBlock: bigint;
}

export interface AddPoolParams {
    stakeAssetId: AssetId;
    weight: bigint;
    minDeposit: bigint;
    unstakeLockBlocks: number;
    withSettle?: boolean;
}

export interface PoolParams {
    minDeposit: bigint;
    unstakeLockBlocks: number;
}

export interface WithdrawReceipt {
    poolId: PoolId;
    amount: bigint;
    released: number;     // queue entries removed
    remaining: number;    // queue entries still locked
}

export interface ClaimReceipt {
    poolId: PoolId;
    owed: bigint;
    paid: bigint;
    shortfall: bigint;
}

export interface WithdrawalStatus {
    requestAmount: bigint;
    withdrawableAmount: bigint;
}

export interface StakingOptions {
    emission: EmissionConfig;
    shortfallMode?: ShortfallMode;
}

// ========== COLLABORATORS ==========

export interface PauseFlags {
    isWithdrawPaused(): boolean;
    isClaimPaused(): boolean;
}

/** Result of pushing staking assets out of custody. */
export interface TransferOutcome {
    success: boolean;
    returnData: Uint8Array;
}

export interface StakeAssetGateway {
    /** Move a pre-approved amount from `from` into custody. Throws on failure. */
    pull(asset: AssetId, from: Principal, amount: bigint): void;
    push(asset: AssetId, to: Principal, amount: bigint): TransferOutcome;
}

export interface RewardVault {
    rewardBalance(asset: AssetId): bigint;
    rewardTransfer(asset: AssetId, to: Principal, amount: bigint): void;
}

// ========== EVENTS ==========

export type StakingEvent =
    | { type: 'PoolAdded'; poolId: PoolId; stakeAssetId: AssetId; weight: bigint; minDeposit: bigint; unstakeLockBlocks: number; lastSettledHeight: number }
    | { type: 'PoolUpdated'; poolId: PoolId; minDeposit: bigint; unstakeLockBlocks: number }
    | { type: 'PoolWeightSet'; poolId: PoolId; weight: bigint; totalWeight: bigint }
    | { type: 'PoolSettled'; poolId: PoolId; height: number; poolReward: bigint }
    | { type: 'Deposit'; poolId: PoolId; user: Principal; amount: bigint; height: number }
    | { type: 'UnstakeRequested'; poolId: PoolId; user: Principal; amount: bigint; maturityHeight: number; height: number }
    | { type: 'Withdraw'; poolId: PoolId; user: Principal; amount: bigint; height: number }
    | { type: 'Claim'; poolId: PoolId; user: Principal; owed: bigint; paid: bigint; height: number }
    | { type: 'RewardAssetSet'; asset: AssetId }
    | { type: 'StartHeightSet'; startHeight: number }
    | { type: 'EndHeightSet'; endHeight: number }
    | { type: 'RewardPerBlockSet'; rewardPerBlock: bigint };

export type StakingEventType = StakingEvent['type'];

export interface EventSink {
    emit(event: StakingEvent): void;
}
