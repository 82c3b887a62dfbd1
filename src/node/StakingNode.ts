import { logger } from '../protocol/utils/logger.js';
import { NATIVE_ASSET, NATIVE_POOL_ID } from '../protocol/params/staking.js';
import { Role, RoleAuthorizer, requireAuthorized } from '../protocol/security/access-control.js';
import { WEIGHT_LOCK_KEY, poolLockKey, withTxLocks } from '../protocol/security/tx-lock.js';
import { StakingError, describeError, invalidParameter } from '../protocol/errors.js';
import { readRecord } from '../protocol/utils/json.js';
import { Storage } from '../protocol/storage/Storage.js';
import { MultiPoolStaking, encodeLedgerState, decodeLedgerState } from '../runtime/staking/index.js';
import type { StakingCollaborators } from '../runtime/staking/index.js';
import { AssetBank } from '../runtime/assets/AssetBank.js';
import { PauseSwitchboard, type PauseSwitch } from '../runtime/control/PauseSwitchboard.js';
import { ManualClock, SlotClock, decodeClockState, type BlockClock, type ClockState } from '../runtime/control/clock.js';
import { EventJournal } from '../runtime/events/EventJournal.js';
import type { NodeConfig } from './config.js';
import type {
    AddPoolParams,
    AssetId,
    CallContext,
    ClaimReceipt,
    Pool,
    PoolId,
    PoolParams,
    Principal,
    UserRecord,
    WithdrawReceipt,
} from '../runtime/staking/types.js';

export interface StakingNodeOptions {
    clock?: BlockClock;
    // null disables persistence regardless of config
    storage?: Storage | null;
}

/**
 * Build the configured clock, resuming from a saved clock state when there is
 * one. `floor` is the ledger's last committed height; the clock never starts below it.
 */
function createClock(config: NodeConfig['clock'], saved: ClockState | null, floor: number): BlockClock {
    if (config.mode === 'manual') {
        const height = saved?.mode === 'manual' ? saved.height : config.genesisHeight;
        return new ManualClock(Math.max(height, floor));
    }
    // A slot clock keeps the genesis it first ran with
    const genesis = saved?.mode === 'slot'
        ? saved
        : { genesisHeight: Math.max(config.genesisHeight, floor), genesisTime: config.genesisTime };
    return new SlotClock({
        genesisHeight: genesis.genesisHeight,
        genesisTime: genesis.genesisTime,
        slotDurationMs: config.slotDurationMs,
        floorHeight: floor,
    });
}

/**
 * Service shell around the ledger: supplies the clock height and caller,
 * serializes writes with per-pool locks, moves attached native value and
 * persists a snapshot after every committed write.
 */
export class StakingNode {
    readonly authorizer = new RoleAuthorizer();
    readonly pauses: PauseSwitchboard;
    readonly bank: AssetBank;
    readonly journal = new EventJournal();
    readonly clock: BlockClock;
    private staking: MultiPoolStaking;
    private storage: Storage | null;
    private log = logger.child('Node');

    constructor(readonly config: NodeConfig, options: StakingNodeOptions = {}) {
        for (const admin of config.roles.admins) this.authorizer.grantRole(admin, Role.ADMIN);
        for (const guardian of config.roles.guardians) this.authorizer.grantRole(guardian, Role.GUARDIAN);

        this.pauses = new PauseSwitchboard(this.authorizer);
        this.bank = new AssetBank(config.accounts);
        this.storage = options.storage !== undefined
            ? options.storage
            : config.storage.persist ? new Storage(config.storage.dataDir) : null;

        const deps: StakingCollaborators = {
            authorizer: this.authorizer,
            pauses: this.pauses,
            assets: this.bank,
            rewards: this.bank,
            events: this.journal,
        };

        if (this.storage) this.log.info(`💾 Persisting ledger to ${this.storage.location}`);

        const saved = this.storage?.loadState() ?? null;
        let savedClock: ClockState | null = null;
        if (saved !== null) {
            const root = readRecord(saved, 'state');
            this.staking = MultiPoolStaking.fromState(decodeLedgerState(root.staking), deps);
            this.bank.loadFromData(root.assets);
            this.pauses.loadFromData(root.pauses);
            if (root.clock !== undefined) savedClock = decodeClockState(root.clock);
            this.log.info(`📂 Loaded ledger: ${this.staking.poolCount()} pools, height ${this.staking.lastObservedHeight()}`);
        } else {
            this.staking = new MultiPoolStaking({ emission: config.emission, shortfallMode: config.shortfallMode }, deps);
        }

        this.clock = options.clock ?? createClock(config.clock, savedClock, this.staking.lastObservedHeight());
        if (this.clock.currentHeight() < this.staking.lastObservedHeight()) {
            this.log.warn(`⏳ Clock at ${this.clock.currentHeight()} is behind ledger height ${this.staking.lastObservedHeight()}; writes wait for it to catch up`);
        }
    }

    /** Read access for queries; writes go through the node. */
    get ledger(): MultiPoolStaking {
        return this.staking;
    }

    height(): number {
        return this.clock.currentHeight();
    }

    context(caller: Principal): CallContext {
        return { caller, height: this.height() };
    }

    // ========== STAKING ==========

    /** The native amount moves into custody first, as value attached to the call. */
    depositNative(caller: Principal, value: bigint): UserRecord {
        return this.write('depositNative', [poolLockKey(NATIVE_POOL_ID)], () => {
            this.bank.transfer(NATIVE_ASSET, caller, this.bank.custody, value);
            try {
                return this.staking.depositNative(this.context(caller), value);
            } catch (error) {
                this.bank.transfer(NATIVE_ASSET, this.bank.custody, caller, value);
                throw error;
            }
        });
    }

    deposit(caller: Principal, poolId: PoolId, amount: bigint): UserRecord {
        return this.write('deposit', [poolLockKey(poolId)], () =>
            this.staking.deposit(this.context(caller), poolId, amount));
    }

    unstake(caller: Principal, poolId: PoolId, amount: bigint): UserRecord {
        return this.write('unstake', [poolLockKey(poolId)], () =>
            this.staking.unstake(this.context(caller), poolId, amount));
    }

    withdraw(caller: Principal, poolId: PoolId): WithdrawReceipt {
        return this.write('withdraw', [poolLockKey(poolId)], () =>
            this.staking.withdraw(this.context(caller), poolId));
    }

    claim(caller: Principal, poolId: PoolId): ClaimReceipt {
        return this.write('claim', [poolLockKey(poolId)], () =>
            this.staking.claim(this.context(caller), poolId));
    }

    // ========== ADMINISTRATION ==========

    addPool(caller: Principal, params: AddPoolParams): Pool {
        return this.write('addPool', this.allPoolKeys(), () =>
            this.staking.addPool(this.context(caller), params));
    }

    updatePool(caller: Principal, poolId: PoolId, params: PoolParams): Pool {
        return this.write('updatePool', [poolLockKey(poolId)], () =>
            this.staking.updatePool(this.context(caller), poolId, params));
    }

    setPoolWeight(caller: Principal, poolId: PoolId, weight: bigint, withSettle: boolean): Pool {
        const keys = withSettle ? this.allPoolKeys() : [poolLockKey(poolId), WEIGHT_LOCK_KEY];
        return this.write('setPoolWeight', keys, () =>
            this.staking.setPoolWeight(this.context(caller), poolId, weight, withSettle));
    }

    setRewardAsset(caller: Principal, asset: AssetId): void {
        this.write('setRewardAsset', this.allPoolKeys(), () => this.staking.setRewardAsset(this.context(caller), asset));
    }

    setStartHeight(caller: Principal, startHeight: number): void {
        this.write('setStartHeight', this.allPoolKeys(), () => this.staking.setStartHeight(this.context(caller), startHeight));
    }

    setEndHeight(caller: Principal, endHeight: number): void {
        this.write('setEndHeight', this.allPoolKeys(), () => this.staking.setEndHeight(this.context(caller), endHeight));
    }

    setRewardPerBlock(caller: Principal, rewardPerBlock: bigint): void {
        this.write('setRewardPerBlock', this.allPoolKeys(), () => this.staking.setRewardPerBlock(this.context(caller), rewardPerBlock));
    }

    settlePool(caller: Principal, poolId: PoolId): Pool {
        return this.write('settlePool', [poolLockKey(poolId)], () =>
            this.staking.settlePool(this.context(caller), poolId));
    }

    settleAllPools(caller: Principal): Pool[] {
        return this.write('settleAllPools', this.allPoolKeys(), () =>
            this.staking.settleAllPools(this.context(caller)));
    }

    pause(caller: Principal, target: PauseSwitch): void {
        this.write('pause', [], () => this.pauses.pause(caller, target));
    }

    unpause(caller: Principal, target: PauseSwitch): void {
        this.write('unpause', [], () => this.pauses.unpause(caller, target));
    }

    fundRewards(caller: Principal, amount: bigint): bigint {
        return this.write('fundRewards', [], () => {
            requireAuthorized(this.authorizer, caller, 'emission:update');
            return this.bank.fundRewards(this.staking.emission().rewardAssetId, amount);
        });
    }

    /** Dev-only: move a manual clock forward. */
    advanceClock(caller: Principal, blocks: number): number {
        if (!(this.clock instanceof ManualClock)) {
            throw invalidParameter('clock is not manual');
        }
        const clock = this.clock;
        return this.write('advanceClock', [], () => {
            if (!this.authorizer.hasRole(caller, Role.ADMIN)) {
                throw new StakingError('Unauthorized', `${caller} may not move the clock`);
            }
            return clock.advance(blocks);
        });
    }

    // ========== ASSETS ==========

    approve(caller: Principal, asset: AssetId, amount: bigint): void {
        this.write('approve', [], () => this.bank.approve(asset, caller, amount));
    }

    faucet(caller: Principal, asset: AssetId): bigint {
        if (!this.config.faucet.enabled) {
            throw invalidParameter('faucet is disabled');
        }
        if (asset === this.staking.emission().rewardAssetId) {
            throw invalidParameter('the reward asset cannot be minted by the faucet');
        }
        return this.write('faucet', [], () => this.bank.mint(asset, caller, this.config.faucet.amount));
    }

    // ========== INTERNALS ==========

    private allPoolKeys(): string[] {
        return [...Array.from({ length: this.staking.poolCount() }, (_, id) => poolLockKey(id)), WEIGHT_LOCK_KEY];
    }

    private write<T>(operation: string, keys: readonly string[], fn: () => T): T {
        let result: T;
        try {
            result = withTxLocks(keys, fn);
        } catch (error) {
            const code = StakingError.is(error) ? error.kind : 'Error';
            this.log.warn(`${operation} rejected (${code}): ${describeError(error)}`);
            throw error;
        }
        try {
            this.persist();
        } catch (error) {
            // committed in memory; the next successful save carries it
            this.log.error(`💾 ${operation} committed but the snapshot was not saved: ${describeError(error)}`);
        }
        return result;
    }

    private persist(): void {
        if (!this.storage) return;
        this.storage.saveState({
            staking: encodeLedgerState(this.staking.exportState()),
            assets: this.bank.toJSON(),
            pauses: this.pauses.status(),
            clock: this.clock.toJSON(),
        });
    }
}
