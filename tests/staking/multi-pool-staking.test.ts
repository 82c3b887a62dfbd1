import { describe, it, expect } from 'vitest';
import { MultiPoolStaking } from '../../src/runtime/staking/MultiPoolStaking.js';
import { decodeLedgerState, encodeLedgerState } from '../../src/runtime/staking/snapshot.js';
import { AssetBank } from '../../src/runtime/assets/AssetBank.js';
import { encodeTransferFlag } from '../../src/runtime/assets/transfer-flag.js';
import { PauseSwitchboard } from '../../src/runtime/control/PauseSwitchboard.js';
import { NATIVE_ASSET } from '../../src/protocol/params/staking.js';
import { errorKind } from '../helpers/errors.js';
import { ADMIN, GUARDIAN, REWARD, TOKEN, at, createHarness, createTwoPoolHarness } from '../helpers/ledger.js';
import type { AssetId, Principal, TransferOutcome } from '../../src/runtime/staking/types.js';

class ScriptedBank extends AssetBank {
    outcome: TransferOutcome | undefined;

    push(asset: AssetId, to: Principal, amount: bigint): TransferOutcome {
        return this.outcome ?? super.push(asset, to, amount);
    }
}

describe('MultiPoolStaking: reward accrual', () => {
    it('reports 50 pending at height 150 and pays exactly that on claim', () => {
        const h = createHarness({ emission: { startHeight: 100, endHeight: 200, rewardPerBlock: 1n } });
        h.staking.addPool(at(ADMIN, 0), { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 10 });
        expect(h.staking.getPool(0).lastSettledHeight).toBe(100);

        h.stakeNative('alice', 100n, 100);
        h.bank.fundRewards(REWARD, 1000n);

        expect(h.staking.pendingReward(0, 'alice', 150)).toBe(50n);

        const receipt = h.staking.claim(at('alice', 150), 0);
        expect(receipt).toEqual({ poolId: 0, owed: 50n, paid: 50n, shortfall: 0n });
        expect(h.bank.balanceOf(REWARD, 'alice')).toBe(50n);
        expect(h.staking.pendingReward(0, 'alice', 150)).toBe(0n);
    });

    it('stops accruing at endHeight', () => {
        const h = createHarness({ emission: { startHeight: 100, endHeight: 200, rewardPerBlock: 1n } });
        h.staking.addPool(at(ADMIN, 0), { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 10 });
        h.stakeNative('alice', 100n, 100);
        expect(h.staking.pendingReward(0, 'alice', 250)).toBe(100n);
        expect(h.staking.pendingReward(0, 'alice', 900)).toBe(100n);
    });

    it('splits emission between pools by weight', () => {
        const h = createTwoPoolHarness();
        h.stakeNative('alice', 10n, 0);
        h.stakeToken('bob', 1, 10n, 0);

        expect(h.staking.pendingReward(0, 'alice', 10)).toBe(250n);
        expect(h.staking.pendingReward(1, 'bob', 10)).toBe(750n);
    });

    it('applies a new weight from the settle point when withSettle is set', () => {
        const h = createTwoPoolHarness();
        h.stakeNative('alice', 10n, 0);
        h.stakeToken('bob', 1, 10n, 0);

        const pool = h.staking.setPoolWeight(at(ADMIN, 10), 1, 1n, true);
        expect(pool.weight).toBe(1n);
        expect(h.staking.totalWeight()).toBe(2n);
        expect(h.staking.getPool(0).lastSettledHeight).toBe(10);

        expect(h.staking.pendingReward(0, 'alice', 20)).toBe(750n);
        expect(h.staking.pendingReward(1, 'bob', 20)).toBe(1250n);
    });

    it('never pays out more than was emitted', () => {
        const h = createHarness();
        h.staking.addPool(at(ADMIN, 0), { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 });
        for (const user of ['a', 'b', 'c']) h.stakeNative(user, 1n, 0);

        const owed = ['a', 'b', 'c'].map(user => h.staking.pendingReward(0, user, 1));
        expect(owed).toEqual([33n, 33n, 33n]);
        expect(owed.reduce((sum, value) => sum + value, 0n)).toBeLessThanOrEqual(100n);
    });

    it('accounts for every emitted unit across deposits, unstakes and claims', () => {
        const h = createTwoPoolHarness();
        h.bank.fundRewards(REWARD, 10_000n);

        h.stakeToken('bob', 1, 3n, 0);
        h.stakeToken('carol', 1, 7n, 7);
        h.staking.unstake(at('bob', 13), 1, 1n);
        const carolClaim = h.staking.claim(at('carol', 20), 1);
        h.stakeToken('dave', 1, 11n, 29);
        const bobClaim = h.staking.claim(at('bob', 35), 1);
        h.staking.unstake(at('carol', 41), 1, 7n);

        const paid = carolClaim.paid + bobClaim.paid;
        expect(paid).toBe(h.bank.balanceOf(REWARD, 'bob') + h.bank.balanceOf(REWARD, 'carol'));
        const pending = ['bob', 'carol', 'dave']
            .map(user => h.staking.pendingReward(1, user, 50))
            .reduce((sum, value) => sum + value, 0n);

        // pool 1 holds 3 of 4 weight: 50 blocks * 100 * 3 / 4
        const emitted = (h.staking.multiplier(0, 50) * 3n) / 4n;
        expect(emitted).toBe(3750n);
        expect(paid + pending).toBeLessThanOrEqual(emitted);
        // flooring loses at most one unit per settlement (seven here)
        expect(emitted - (paid + pending)).toBeLessThanOrEqual(7n);
    });

    it('folds accrued reward into pending on a second deposit', () => {
        const h = createHarness();
        h.staking.addPool(at(ADMIN, 0), { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 });
        h.stakeNative('alice', 10n, 0);
        h.stakeNative('alice', 10n, 10);

        const user = h.staking.getUser(0, 'alice');
        expect(user.stakeAmount).toBe(20n);
        expect(user.pendingReward).toBe(1000n);
        expect(h.staking.pendingReward(0, 'alice', 20)).toBe(2000n);
    });

    it('a zero deposit only settles rewards', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 0);

        const user = h.staking.deposit(at('bob', 10), 1, 0n);
        expect(user.stakeAmount).toBe(10n);
        expect(user.pendingReward).toBe(750n);
        expect(user.withdrawalQueue).toEqual([]);
        expect(h.staking.getPool(1).totalStaked).toBe(10n);
        expect(h.staking.getPool(1).lastSettledHeight).toBe(10);
        expect(h.staking.pendingReward(1, 'bob', 20)).toBe(1500n);
    });

    it('a claim with nothing owed pays nothing', () => {
        const h = createTwoPoolHarness();
        expect(h.staking.claim(at('nobody', 5), 1)).toEqual({ poolId: 1, owed: 0n, paid: 0n, shortfall: 0n });
    });
});

describe('MultiPoolStaking: unstake and withdraw', () => {
    it('locks unstaked amounts until maturity', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 0);

        const user = h.staking.unstake(at('bob', 10), 1, 4n);
        expect(user.stakeAmount).toBe(6n);
        expect(user.pendingReward).toBe(750n);
        expect(user.withdrawalQueue).toEqual([{ amount: 4n, maturityHeight: 15 }]);
        expect(h.staking.getPool(1).totalStaked).toBe(6n);

        expect(h.staking.withdraw(at('bob', 14), 1)).toEqual({ poolId: 1, amount: 0n, released: 0, remaining: 1 });
        expect(h.staking.withdrawalStatus(1, 'bob', 14)).toEqual({ requestAmount: 4n, withdrawableAmount: 0n });

        expect(h.staking.withdraw(at('bob', 15), 1)).toEqual({ poolId: 1, amount: 4n, released: 1, remaining: 0 });
        expect(h.bank.balanceOf(TOKEN, 'bob')).toBe(4n);
        expect(h.staking.getUser(1, 'bob').withdrawalQueue).toEqual([]);
    });

    it('keeps earning on the remaining stake after an unstake', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 0);
        h.staking.unstake(at('bob', 10), 1, 4n);
        expect(h.staking.pendingReward(1, 'bob', 20)).toBe(1500n);
    });

    it('a zero unstake settles rewards and queues nothing', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 0);

        const user = h.staking.unstake(at('bob', 10), 1, 0n);
        expect(user.stakeAmount).toBe(10n);
        expect(user.pendingReward).toBe(750n);
        expect(user.withdrawalQueue).toEqual([]);
        expect(h.staking.withdrawalStatus(1, 'bob', 100)).toEqual({ requestAmount: 0n, withdrawableAmount: 0n });
        expect(h.staking.getPool(1).totalStaked).toBe(10n);
        expect(h.staking.pendingReward(1, 'bob', 20)).toBe(1500n);
    });

    it('rejects unstaking more than the stake', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 0);
        expect(errorKind(() => h.staking.unstake(at('bob', 1), 1, 11n))).toBe('InsufficientBalance');
        expect(h.staking.getUser(1, 'bob').stakeAmount).toBe(10n);
    });

    it('checks the pool id before the pause flag', () => {
        const h = createTwoPoolHarness();
        h.pauses.pause(GUARDIAN, 'withdraw');
        expect(errorKind(() => h.staking.unstake(at('bob', 1), 9, 1n))).toBe('InvalidPoolId');
        expect(errorKind(() => h.staking.unstake(at('bob', 1), 1, 1n))).toBe('Paused');
    });

    it('releases a shortened-lock request only behind the older one', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 0);
        h.staking.updatePool(at(ADMIN, 0), 1, { minDeposit: 0n, unstakeLockBlocks: 10 });
        h.staking.unstake(at('bob', 0), 1, 2n);
        h.staking.updatePool(at(ADMIN, 1), 1, { minDeposit: 0n, unstakeLockBlocks: 2 });
        h.staking.unstake(at('bob', 1), 1, 3n);

        expect(h.staking.withdrawalStatus(1, 'bob', 5)).toEqual({ requestAmount: 5n, withdrawableAmount: 3n });
        expect(h.staking.withdraw(at('bob', 5), 1).amount).toBe(0n);
        expect(h.staking.withdraw(at('bob', 10), 1)).toEqual({ poolId: 1, amount: 5n, released: 2, remaining: 0 });
    });

    it('withdraw with nothing queued is a no-op', () => {
        const h = createTwoPoolHarness();
        expect(h.staking.withdraw(at('carol', 3), 1)).toEqual({ poolId: 1, amount: 0n, released: 0, remaining: 0 });
    });

    it('fails when a native transfer reports false', () => {
        const bank = new ScriptedBank({ custody: 'custody', treasury: 'treasury' });
        const h = createTwoPoolHarness({ bank });
        h.stakeNative('alice', 10n, 0);
        h.staking.unstake(at('alice', 1), 0, 10n);

        bank.outcome = { success: true, returnData: encodeTransferFlag(false) };
        expect(errorKind(() => h.staking.withdraw(at('alice', 6), 0))).toBe('TransferFailed');
        expect(h.staking.getUser(0, 'alice').withdrawalQueue).toHaveLength(1);

        bank.outcome = { success: false, returnData: new Uint8Array() };
        expect(errorKind(() => h.staking.withdraw(at('alice', 6), 0))).toBe('TransferFailed');

        bank.outcome = { success: true, returnData: encodeTransferFlag(true) };
        expect(h.staking.withdraw(at('alice', 6), 0).amount).toBe(10n);
    });
});

describe('MultiPoolStaking: atomicity', () => {
    it('leaves pool and user untouched when the token pull fails', () => {
        const h = createTwoPoolHarness();
        h.bank.mint(TOKEN, 'bob', 10n);

        expect(errorKind(() => h.staking.deposit(at('bob', 10), 1, 10n))).toBe('TransferFailed');

        const pool = h.staking.getPool(1);
        expect(pool.totalStaked).toBe(0n);
        expect(pool.lastSettledHeight).toBe(0);
        expect(h.staking.getUser(1, 'bob').stakeAmount).toBe(0n);
        expect(h.staking.lastObservedHeight()).toBe(0);
        expect(h.journal.list({ type: 'Deposit' })).toEqual([]);
    });

    it('rejects a height behind the last committed one', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 10);
        expect(errorKind(() => h.staking.claim(at('bob', 5), 1))).toBe('InvalidParameter');
    });
});

describe('MultiPoolStaking: reward shortfall', () => {
    it('lenient mode pays what the treasury holds and forfeits the rest', () => {
        const h = createTwoPoolHarness();
        h.stakeNative('alice', 10n, 0);
        h.bank.fundRewards(REWARD, 100n);

        expect(h.staking.getShortfallMode()).toBe('lenient');
        expect(h.staking.claim(at('alice', 10), 0)).toEqual({ poolId: 0, owed: 250n, paid: 100n, shortfall: 150n });
        expect(h.bank.balanceOf(REWARD, 'alice')).toBe(100n);
        expect(h.bank.rewardBalance(REWARD)).toBe(0n);
        expect(h.staking.pendingReward(0, 'alice', 10)).toBe(0n);
    });

    it('strict mode rejects the claim and keeps the reward owed', () => {
        const h = createTwoPoolHarness({ shortfallMode: 'strict' });
        h.stakeNative('alice', 10n, 0);
        h.bank.fundRewards(REWARD, 100n);

        expect(errorKind(() => h.staking.claim(at('alice', 10), 0))).toBe('InsufficientBalance');
        expect(h.staking.pendingReward(0, 'alice', 10)).toBe(250n);
        expect(h.staking.getPool(0).lastSettledHeight).toBe(0);
        expect(h.bank.rewardBalance(REWARD)).toBe(100n);
    });
});

describe('MultiPoolStaking: administration', () => {
    it('requires the first pool to stake the native asset', () => {
        const h = createHarness();
        expect(errorKind(() => h.staking.addPool(at(ADMIN, 0), { stakeAssetId: TOKEN, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 }))).toBe('InvalidParameter');
    });

    it('validates pool parameters', () => {
        const h = createHarness();
        const base = { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 };
        expect(errorKind(() => h.staking.addPool(at(ADMIN, 0), { ...base, weight: 0n }))).toBe('InvalidParameter');
        expect(errorKind(() => h.staking.addPool(at(ADMIN, 0), { ...base, unstakeLockBlocks: 0 }))).toBe('InvalidParameter');
        expect(errorKind(() => h.staking.addPool(at(ADMIN, 1000), base))).toBe('InvalidParameter');
        expect(h.staking.poolCount()).toBe(0);
    });

    it('rejects a second pool for the same asset', () => {
        const h = createTwoPoolHarness();
        expect(errorKind(() => h.staking.addPool(at(ADMIN, 0), { stakeAssetId: TOKEN, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 }))).toBe('InvalidParameter');
        expect(errorKind(() => h.staking.addPool(at(ADMIN, 0), { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 }))).toBe('InvalidParameter');
    });

    it('only admins may change pools and emission', () => {
        const h = createTwoPoolHarness();
        expect(errorKind(() => h.staking.addPool(at('bob', 0), { stakeAssetId: 'DAI', weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 }))).toBe('Unauthorized');
        expect(errorKind(() => h.staking.setRewardPerBlock(at(GUARDIAN, 0), 5n))).toBe('Unauthorized');
        expect(errorKind(() => h.staking.setPoolWeight(at('bob', 0), 1, 9n))).toBe('Unauthorized');
        h.staking.setRewardPerBlock(at(ADMIN, 0), 5n);
        expect(h.staking.emission().rewardPerBlock).toBe(5n);
    });

    it('enforces the minimum deposit inclusively', () => {
        const h = createTwoPoolHarness();
        h.staking.updatePool(at(ADMIN, 0), 1, { minDeposit: 5n, unstakeLockBlocks: 5 });
        expect(errorKind(() => h.stakeToken('bob', 1, 4n, 0))).toBe('InvalidParameter');
        h.stakeToken('carol', 1, 5n, 0);
        expect(h.staking.stakingBalance(1, 'carol')).toBe(5n);
    });

    it('routes native stake only through depositNative', () => {
        const h = createTwoPoolHarness();
        expect(errorKind(() => h.staking.deposit(at('alice', 0), 0, 1n))).toBe('InvalidParameter');
        expect(errorKind(() => h.staking.deposit(at('alice', 0), 7, 1n))).toBe('InvalidPoolId');
        expect(errorKind(() => createHarness().staking.depositNative(at('alice', 0), 1n))).toBe('InvalidPoolId');
    });

    it('records events for every committed change', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 3);

        const [deposit] = h.journal.list({ poolId: 1, user: 'bob', type: 'Deposit' });
        expect(deposit.event).toEqual({ type: 'Deposit', poolId: 1, user: 'bob', amount: 10n, height: 3 });
        expect(h.journal.list({ type: 'PoolAdded' })).toHaveLength(2);
    });
});

describe('MultiPoolStaking: state export', () => {
    it('restores an identical ledger from a JSON snapshot', () => {
        const h = createTwoPoolHarness();
        h.stakeNative('alice', 10n, 0);
        h.stakeToken('bob', 1, 10n, 0);
        h.staking.unstake(at('bob', 10), 1, 4n);

        const json = JSON.parse(JSON.stringify(encodeLedgerState(h.staking.exportState())));
        const restored = MultiPoolStaking.fromState(decodeLedgerState(json), {
            authorizer: h.authorizer,
            pauses: new PauseSwitchboard(h.authorizer),
            assets: h.bank,
            rewards: h.bank,
        });

        expect(restored.listPools()).toEqual(h.staking.listPools());
        expect(restored.getUser(1, 'bob')).toEqual(h.staking.getUser(1, 'bob'));
        expect(restored.pendingReward(1, 'bob', 20)).toBe(1500n);
        expect(restored.lastObservedHeight()).toBe(10);
        expect(restored.totalWeight()).toBe(4n);
    });

    it('rejects snapshots whose pool totals disagree with their users', () => {
        const h = createTwoPoolHarness();
        h.stakeToken('bob', 1, 10n, 0);
        const state = h.staking.exportState();
        state.pools[1].totalStaked = 11n;
        expect(errorKind(() => MultiPoolStaking.fromState(state, {
            authorizer: h.authorizer,
            pauses: h.pauses,
            assets: h.bank,
            rewards: h.bank,
        }))).toBe('InvalidParameter');
    });

    it('rejects an unknown snapshot version', () => {
        const h = createTwoPoolHarness();
        const json = JSON.parse(JSON.stringify(encodeLedgerState(h.staking.exportState())));
        json.version = 2;
        expect(errorKind(() => decodeLedgerState(json))).toBe('InvalidParameter');
    });
});
