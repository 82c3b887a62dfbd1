import { logger, short } from '../../protocol/utils/logger.js';
import { NATIVE_ASSET, NATIVE_POOL_ID, type ShortfallMode } from '../../protocol/params/staking.js';
import { SafeMath, addHeight, isHeight, isUint } from '../../protocol/security/safe-math.js';
import { requireAuthorized, type Authorizer } from '../../protocol/security/access-control.js';
import { StakingError, describeError, invalidParameter } from '../../protocol/errors.js';
import { decodeTransferFlag } from '../assets/transfer-flag.js';
import { EmissionSchedule } from './EmissionSchedule.js';
import { PoolRegistry } from './PoolRegistry.js';
import { SettlementEngine, type Settlement } from './SettlementEngine.js';
import { UserLedger, accruedReward, cloneUser, emptyUser, freshAccrual, owedReward } from './UserLedger.js';
import { compact, enqueue, maturedPrefix, withdrawalStatus } from './WithdrawalQueue.js';
import type {
    AddPoolParams,
    AssetId,
    CallContext,
    ClaimReceipt,
    EmissionConfig,
    EventSink,
    PauseFlags,
    Pool,
    PoolId,
    PoolParams,
    Principal,
    RewardVault,
    StakeAssetGateway,
    StakingEvent,
    StakingOptions,
    UserRecord,
    WithdrawalStatus,
    WithdrawReceipt,
} from './types.js';

export interface StakingCollaborators {
    authorizer: Authorizer;
    pauses: PauseFlags;
    assets: StakeAssetGateway;
    rewards: RewardVault;
    events?: EventSink;
}

/** Everything needed to rebuild a ledger, in typed form. */
export interface LedgerState {
    emission: EmissionConfig;
    shortfallMode: ShortfallMode;
    observedHeight: number;
    pools: Pool[];
    users: { poolId: PoolId; user: Principal; record: UserRecord }[];
}

/**
 * Multi-pool staking ledger.
 *
 * Rewards accrue lazily through a per-pool accumulator (accRewardPerShare),
 * so every operation is O(1) in the number of stakers. Each operation builds
 * the complete next state first, calls its asset collaborator, and only then
 * writes; a throw anywhere leaves the ledger as it was.
 */
export class MultiPoolStaking {
    private registry = new PoolRegistry();
    private ledger = new UserLedger();
    private schedule: EmissionSchedule;
    private settlement: SettlementEngine;
    private shortfallMode: ShortfallMode;
    private observedHeight = 0;
    private log = logger.child('Staking');

    constructor(options: StakingOptions, private deps: StakingCollaborators) {
        this.schedule = new EmissionSchedule(options.emission);
        this.settlement = new SettlementEngine(this.registry, this.schedule, deps.events);
        this.shortfallMode = options.shortfallMode ?? 'lenient';
    }

    static fromState(state: LedgerState, deps: StakingCollaborators): MultiPoolStaking {
        const staking = new MultiPoolStaking({ emission: state.emission, shortfallMode: state.shortfallMode }, deps);
        staking.registry.load(state.pools);

        const staked = new Map<PoolId, bigint>();
        for (const { poolId, user, record } of state.users) {
            if (!staking.registry.has(poolId)) {
                throw new StakingError('InvalidPoolId', `user ${user} references unknown pool ${poolId}`);
            }
            staking.ledger.set(poolId, user, cloneUser(record));
            staked.set(poolId, SafeMath.add(staked.get(poolId) ?? 0n, record.stakeAmount));
        }
        for (const pool of staking.registry.entries()) {
            if ((staked.get(pool.id) ?? 0n) !== pool.totalStaked) {
                throw invalidParameter(`pool ${pool.id} total stake does not match its users`);
            }
        }

        if (!isHeight(state.observedHeight)) throw invalidParameter('observed height must be a non-negative integer');
        staking.observedHeight = state.observedHeight;
        return staking;
    }

    exportState(): LedgerState {
        return {
            emission: this.schedule.snapshot(),
            shortfallMode: this.shortfallMode,
            observedHeight: this.observedHeight,
            pools: this.registry.list(),
            users: Array.from(this.ledger.entries(), ({ poolId, user, record }) => ({ poolId, user, record: cloneUser(record) })),
        };
    }

    // ========== POOL ADMINISTRATION ==========

    addPool(ctx: CallContext, params: AddPoolParams): Pool {
        this.begin(ctx);
        requireAuthorized(this.deps.authorizer, ctx.caller, 'pool:add');

        const poolId = this.registry.nextId();
        if (poolId === NATIVE_POOL_ID) {
            if (params.stakeAssetId !== NATIVE_ASSET) {
                throw invalidParameter('invalid staking token address: pool 0 must stake the native asset');
            }
        } else {
            if (params.stakeAssetId === NATIVE_ASSET || params.stakeAssetId.trim().length === 0) {
                throw invalidParameter('invalid staking token address');
            }
            if (this.registry.entries().some(pool => pool.stakeAssetId === params.stakeAssetId)) {
                throw invalidParameter(`asset ${params.stakeAssetId} already has a pool`);
            }
        }
        requirePositiveWeight(params.weight);
        requireAmount(params.minDeposit, 'min deposit');
        requireLockBlocks(params.unstakeLockBlocks);
        if (ctx.height >= this.schedule.endHeight) {
            throw invalidParameter('emission window has already ended');
        }

        const settlements = params.withSettle ? this.settlement.previewAll(ctx.height) : [];
        const totalWeight = this.registry.projectTotalWeight(params.weight);
        const pool: Pool = {
            id: poolId,
            stakeAssetId: params.stakeAssetId,
            weight: params.weight,
            lastSettledHeight: Math.max(ctx.height, this.schedule.startHeight),
            accRewardPerShare: 0n,
            totalStaked: 0n,
            minDeposit: params.minDeposit,
            unstakeLockBlocks: params.unstakeLockBlocks,
        };

        this.applySettlements(settlements);
        this.registry.append(pool, totalWeight);
        this.commit(ctx, {
            type: 'PoolAdded',
            poolId,
            stakeAssetId: pool.stakeAssetId,
            weight: pool.weight,
            minDeposit: pool.minDeposit,
            unstakeLockBlocks: pool.unstakeLockBlocks,
            lastSettledHeight: pool.lastSettledHeight,
        });
        this.log.info(`🏊 Pool ${poolId} added: ${pool.stakeAssetId} weight ${pool.weight} (total ${totalWeight})`);
        return { ...pool };
    }

    updatePool(ctx: CallContext, poolId: PoolId, params: PoolParams): Pool {
        this.begin(ctx);
        requireAuthorized(this.deps.authorizer, ctx.caller, 'pool:update');
        const pool = this.registry.get(poolId);
        requireAmount(params.minDeposit, 'min deposit');
        requireLockBlocks(params.unstakeLockBlocks);

        pool.minDeposit = params.minDeposit;
        pool.unstakeLockBlocks = params.unstakeLockBlocks;
        this.commit(ctx, { type: 'PoolUpdated', poolId, minDeposit: params.minDeposit, unstakeLockBlocks: params.unstakeLockBlocks });
        this.log.info(`🔧 Pool ${poolId} updated: min deposit ${params.minDeposit}, lock ${params.unstakeLockBlocks} blocks`);
        return { ...pool };
    }

    setPoolWeight(ctx: CallContext, poolId: PoolId, weight: bigint, withSettle: boolean = false): Pool {
        this.begin(ctx);
        requireAuthorized(this.deps.authorizer, ctx.caller, 'pool:weight');
        this.registry.get(poolId);
        requirePositiveWeight(weight);

        const settlements = withSettle ? this.settlement.previewAll(ctx.height) : [];
        const totalWeight = this.registry.projectTotalWeight(weight, poolId);

        this.applySettlements(settlements);
        this.registry.setWeight(poolId, weight, totalWeight);
        this.commit(ctx, { type: 'PoolWeightSet', poolId, weight, totalWeight });
        this.log.info(`⚖️ Pool ${poolId} weight → ${weight} (total ${totalWeight})`);
        return this.registry.view(poolId);
    }

    // ========== EMISSION ADMINISTRATION ==========

    setRewardAsset(ctx: CallContext, asset: AssetId): void {
        this.begin(ctx);
        requireAuthorized(this.deps.authorizer, ctx.caller, 'emission:update');
        this.schedule.setRewardAsset(asset);
        this.commit(ctx, { type: 'RewardAssetSet', asset });
        this.log.info(`🎁 Reward asset → ${asset}`);
    }

    setStartHeight(ctx: CallContext, startHeight: number): void {
        this.begin(ctx);
        requireAuthorized(this.deps.authorizer, ctx.caller, 'emission:update');
        this.schedule.setStartHeight(startHeight);
        this.commit(ctx, { type: 'StartHeightSet', startHeight });
        this.log.info(`⏱️ Emission start height → ${startHeight}`);
    }

    setEndHeight(ctx: CallContext, endHeight: number): void {
        this.begin(ctx);
        requireAuthorized(this.deps.authorizer, ctx.caller, 'emission:update');
        this.schedule.setEndHeight(endHeight);
        this.commit(ctx, { type: 'EndHeightSet', endHeight });
        this.log.info(`⏱️ Emission end height → ${endHeight}`);
    }

    setRewardPerBlock(ctx: CallContext, rewardPerBlock: bigint): void {
        this.begin(ctx);
        requireAuthorized(this.deps.authorizer, ctx.caller, 'emission:update');
        this.schedule.setRewardPerBlock(rewardPerBlock);
        this.commit(ctx, { type: 'RewardPerBlockSet', rewardPerBlock });
        this.log.info(`💧 Reward per block → ${rewardPerBlock}`);
    }

    // ========== SETTLEMENT ==========

    settlePool(ctx: CallContext, poolId: PoolId): Pool {
        this.begin(ctx);
        this.settlement.settle(poolId, ctx.height);
        this.commit(ctx);
        return this.registry.view(poolId);
    }

    /** Settles every pool; cost grows with the number of pools. */
    settleAllPools(ctx: CallContext): Pool[] {
        this.begin(ctx);
        this.settlement.settleAll(ctx.height);
        this.commit(ctx);
        return this.registry.list();
    }

    // ========== STAKING ==========

    /** Stake into the native pool; `value` is the amount attached to the call. */
    depositNative(ctx: CallContext, value: bigint): UserRecord {
        this.begin(ctx);
        const pool = this.registry.get(NATIVE_POOL_ID);
        if (pool.stakeAssetId !== NATIVE_ASSET) {
            throw invalidParameter('invalid staking token address');
        }
        requireAmount(value, 'deposit amount');
        if (value < pool.minDeposit) {
            throw invalidParameter(`deposit amount is too small: ${value} < ${pool.minDeposit}`);
        }
        return this.applyDeposit(ctx, pool, value, false);
    }

    /** Stake a token the caller has already approved for pulling. */
    deposit(ctx: CallContext, poolId: PoolId, amount: bigint): UserRecord {
        this.begin(ctx);
        if (poolId === NATIVE_POOL_ID) {
            throw invalidParameter('pool 0 takes native value; use depositNative');
        }
        const pool = this.registry.get(poolId);
        requireAmount(amount, 'deposit amount');
        if (amount < pool.minDeposit) {
            throw invalidParameter(`deposit amount is too small: ${amount} < ${pool.minDeposit}`);
        }
        return this.applyDeposit(ctx, pool, amount, true);
    }

    private applyDeposit(ctx: CallContext, pool: Pool, amount: bigint, pull: boolean): UserRecord {
        const settlement = this.settlement.preview(pool, ctx.height);
        const acc = settlement.accRewardPerShare;
        const user = this.ledger.view(pool.id, ctx.caller);

        if (user.stakeAmount > 0n) {
            user.pendingReward = SafeMath.add(user.pendingReward, freshAccrual(user, acc));
        }
        user.stakeAmount = SafeMath.add(user.stakeAmount, amount);
        const totalStaked = SafeMath.add(pool.totalStaked, amount);
        user.settledBaseline = accruedReward(user.stakeAmount, acc);

        if (pull && amount > 0n) {
            this.transfer(() => this.deps.assets.pull(pool.stakeAssetId, ctx.caller, amount));
        }

        this.settlement.apply(settlement);
        pool.totalStaked = totalStaked;
        this.ledger.set(pool.id, ctx.caller, user);
        this.commit(ctx, { type: 'Deposit', poolId: pool.id, user: ctx.caller, amount, height: ctx.height });
        this.log.info(`📥 Deposit: ${amount} ${pool.stakeAssetId} from ${short(ctx.caller)} into pool ${pool.id}`);
        return cloneUser(user);
    }

    /** Move stake into the withdrawal queue; it unlocks after the pool's lock period. */
    unstake(ctx: CallContext, poolId: PoolId, amount: bigint): UserRecord {
        this.begin(ctx);
        const pool = this.registry.get(poolId);
        if (this.deps.pauses.isWithdrawPaused()) {
            throw new StakingError('Paused', 'withdraw is paused');
        }
        requireAmount(amount, 'unstake amount');

        const existing = this.ledger.get(poolId, ctx.caller);
        const user = existing ? cloneUser(existing) : emptyUser();
        if (user.stakeAmount < amount) {
            throw new StakingError('InsufficientBalance', `not enough staked: ${user.stakeAmount} < ${amount}`);
        }

        const settlement = this.settlement.preview(pool, ctx.height);
        const acc = settlement.accRewardPerShare;
        user.pendingReward = SafeMath.add(user.pendingReward, freshAccrual(user, acc));

        const maturityHeight = addHeight(ctx.height, pool.unstakeLockBlocks);
        if (amount > 0n) {
            user.stakeAmount = SafeMath.sub(user.stakeAmount, amount);
            user.withdrawalQueue = enqueue(user.withdrawalQueue, { amount, maturityHeight });
        }
        const totalStaked = SafeMath.sub(pool.totalStaked, amount);
        user.settledBaseline = accruedReward(user.stakeAmount, acc);

        this.settlement.apply(settlement);
        pool.totalStaked = totalStaked;
        if (existing) this.ledger.set(poolId, ctx.caller, user);
        this.commit(ctx, { type: 'UnstakeRequested', poolId, user: ctx.caller, amount, maturityHeight, height: ctx.height });
        this.log.info(`🔓 Unstake queued: ${amount} from ${short(ctx.caller)} in pool ${poolId} (unlocks at ${maturityHeight})`);
        return cloneUser(user);
    }

    /** Release every matured request at the front of the caller's queue. */
    withdraw(ctx: CallContext, poolId: PoolId): WithdrawReceipt {
        this.begin(ctx);
        const pool = this.registry.get(poolId);
        if (this.deps.pauses.isWithdrawPaused()) {
            throw new StakingError('Paused', 'withdraw is paused');
        }

        const existing = this.ledger.get(poolId, ctx.caller);
        const queue = existing?.withdrawalQueue ?? [];
        const matured = maturedPrefix(queue, ctx.height);
        const remaining = compact(queue, matured.count);

        if (matured.amount > 0n) {
            this.pushStake(pool.stakeAssetId, ctx.caller, matured.amount);
        }

        if (existing) this.ledger.set(poolId, ctx.caller, { ...cloneUser(existing), withdrawalQueue: remaining });
        this.commit(ctx, { type: 'Withdraw', poolId, user: ctx.caller, amount: matured.amount, height: ctx.height });
        if (matured.amount > 0n) {
            this.log.info(`✅ Withdrawn: ${matured.amount} ${pool.stakeAssetId} to ${short(ctx.caller)} from pool ${poolId}`);
        }
        return { poolId, amount: matured.amount, released: matured.count, remaining: remaining.length };
    }

    /** Pay out everything owed in the pool's reward share. */
    claim(ctx: CallContext, poolId: PoolId): ClaimReceipt {
        this.begin(ctx);
        const pool = this.registry.get(poolId);
        if (this.deps.pauses.isClaimPaused()) {
            throw new StakingError('Paused', 'claim is paused');
        }

        const existing = this.ledger.get(poolId, ctx.caller);
        const user = existing ? cloneUser(existing) : emptyUser();
        const settlement = this.settlement.preview(pool, ctx.height);
        const acc = settlement.accRewardPerShare;
        const owed = owedReward(user, acc);
        const asset = this.schedule.rewardAssetId;

        let paid = 0n;
        if (owed > 0n) {
            const balance = this.deps.rewards.rewardBalance(asset);
            if (this.shortfallMode === 'strict' && balance < owed) {
                throw new StakingError('InsufficientBalance', `reward balance ${balance} is below owed ${owed}`);
            }
            paid = SafeMath.min(owed, balance);
            user.pendingReward = 0n;
        }
        user.settledBaseline = accruedReward(user.stakeAmount, acc);

        if (paid > 0n) {
            this.transfer(() => this.deps.rewards.rewardTransfer(asset, ctx.caller, paid));
        }

        this.settlement.apply(settlement);
        if (existing) this.ledger.set(poolId, ctx.caller, user);
        this.commit(ctx, { type: 'Claim', poolId, user: ctx.caller, owed, paid, height: ctx.height });

        const shortfall = owed - paid;
        if (shortfall > 0n) {
            this.log.warn(`⚠️ Reward shortfall: ${short(ctx.caller)} owed ${owed}, paid ${paid}; ${shortfall} forfeited`);
        } else if (paid > 0n) {
            this.log.info(`💰 Claimed: ${paid} ${asset} by ${short(ctx.caller)} from pool ${poolId}`);
        }
        return { poolId, owed, paid, shortfall };
    }

    // ========== QUERIES ==========

    poolCount(): number {
        return this.registry.length;
    }

    getPool(poolId: PoolId): Pool {
        return this.registry.view(poolId);
    }

    listPools(): Pool[] {
        return this.registry.list();
    }

    totalWeight(): bigint {
        return this.registry.totalWeight;
    }

    emission(): EmissionConfig {
        return this.schedule.snapshot();
    }

    getShortfallMode(): ShortfallMode {
        return this.shortfallMode;
    }

    lastObservedHeight(): number {
        return this.observedHeight;
    }

    multiplier(from: number, to: number): bigint {
        return this.schedule.multiplier(from, to);
    }

    getUser(poolId: PoolId, user: Principal): UserRecord {
        this.registry.get(poolId);
        return this.ledger.view(poolId, user);
    }

    usersOf(poolId: PoolId): Principal[] {
        this.registry.get(poolId);
        return this.ledger.usersOf(poolId);
    }

    stakingBalance(poolId: PoolId, user: Principal): bigint {
        return this.getUser(poolId, user).stakeAmount;
    }

    /** Claimable reward as of `height`, without touching pool state. */
    pendingReward(poolId: PoolId, user: Principal, height: number): bigint {
        const pool = this.registry.get(poolId);
        const record = this.ledger.view(poolId, user);
        let acc = pool.accRewardPerShare;
        if (height > pool.lastSettledHeight && pool.totalStaked !== 0n) {
            acc = this.settlement.preview(pool, height).accRewardPerShare;
        }
        return owedReward(record, acc);
    }

    withdrawalStatus(poolId: PoolId, user: Principal, height: number): WithdrawalStatus {
        return withdrawalStatus(this.getUser(poolId, user).withdrawalQueue, height);
    }

    // ========== INTERNALS ==========

    private begin(ctx: CallContext): void {
        if (ctx.caller.trim().length === 0) {
            throw invalidParameter('caller must not be empty');
        }
        if (!isHeight(ctx.height)) {
            throw invalidParameter(`height must be a non-negative integer, got ${ctx.height}`);
        }
        if (ctx.height < this.observedHeight) {
            throw invalidParameter(`height ${ctx.height} is behind last committed height ${this.observedHeight}`);
        }
    }

    private commit(ctx: CallContext, event?: StakingEvent): void {
        this.observedHeight = ctx.height;
        if (event) this.deps.events?.emit(event);
    }

    private applySettlements(settlements: Settlement[]): void {
        settlements.forEach(settlement => this.settlement.apply(settlement));
    }

    private pushStake(asset: AssetId, to: Principal, amount: bigint): void {
        const outcome = this.transfer(() => this.deps.assets.push(asset, to, amount));
        if (!outcome.success) {
            throw new StakingError('TransferFailed', `${asset} transfer call failed`);
        }
        if (asset === NATIVE_ASSET && outcome.returnData.length > 0 && !decodeTransferFlag(outcome.returnData)) {
            throw new StakingError('TransferFailed', 'native transfer operation did not succeed');
        }
    }

    /** Collaborator failures surface as TransferFailed unless already typed. */
    private transfer<T>(fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            if (error instanceof StakingError) throw error;
            throw new StakingError('TransferFailed', describeError(error));
        }
    }
}

function requireAmount(value: bigint, label: string): void {
    if (!isUint(value)) throw invalidParameter(`${label} must be an unsigned 256-bit integer`);
}

function requirePositiveWeight(weight: bigint): void {
    if (weight <= 0n || !isUint(weight)) throw invalidParameter('invalid pool weight');
}

function requireLockBlocks(blocks: number): void {
    if (!isHeight(blocks) || blocks <= 0) throw invalidParameter('invalid withdraw locked blocks');
}
