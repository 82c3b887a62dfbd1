import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Storage } from '../../src/protocol/storage/Storage.js';
import { NATIVE_ASSET } from '../../src/protocol/params/staking.js';
import { StakingNode } from '../../src/node/StakingNode.js';
import { errorKind } from '../helpers/errors.js';
import { createTestNode, testConfig } from '../helpers/node.js';

class FailingStorage extends Storage {
    saveState(): void {
        throw new Error('disk full');
    }
}

function withPools(node: StakingNode): StakingNode {
    node.addPool('admin', { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 });
    node.addPool('admin', { stakeAssetId: 'USDX', weight: 3n, minDeposit: 0n, unstakeLockBlocks: 5 });
    return node;
}

describe('StakingNode', () => {
    it('runs a deposit, accrual and claim against the clock', () => {
        const node = withPools(createTestNode());
        node.faucet('alice', NATIVE_ASSET);
        node.depositNative('alice', 10n);
        expect(node.bank.balanceOf(NATIVE_ASSET, 'alice')).toBe(990n);
        expect(node.bank.balanceOf(NATIVE_ASSET, node.bank.custody)).toBe(10n);

        expect(node.advanceClock('admin', 10)).toBe(10);
        expect(node.ledger.pendingReward(0, 'alice', node.height())).toBe(250n);

        expect(node.fundRewards('admin', 1000n)).toBe(1000n);
        expect(node.claim('alice', 0).paid).toBe(250n);
        expect(node.bank.balanceOf('MNT', 'alice')).toBe(250n);
    });

    it('refunds attached native value when the deposit is rejected', () => {
        const node = withPools(createTestNode());
        node.faucet('alice', NATIVE_ASSET);
        node.updatePool('admin', 0, { minDeposit: 100n, unstakeLockBlocks: 5 });

        expect(errorKind(() => node.depositNative('alice', 50n))).toBe('InvalidParameter');
        expect(node.bank.balanceOf(NATIVE_ASSET, 'alice')).toBe(1000n);
        expect(errorKind(() => node.depositNative('alice', 5000n))).toBe('InsufficientBalance');
    });

    it('returns unstaked tokens after the lock', () => {
        const node = withPools(createTestNode());
        node.faucet('bob', 'USDX');
        node.approve('bob', 'USDX', 40n);
        node.deposit('bob', 1, 40n);
        node.unstake('bob', 1, 15n);

        node.advanceClock('admin', 4);
        expect(node.withdraw('bob', 1).amount).toBe(0n);
        node.advanceClock('admin', 1);
        expect(node.withdraw('bob', 1).amount).toBe(15n);
        expect(node.bank.balanceOf('USDX', 'bob')).toBe(975n);
    });

    it('guards the clock and the faucet', () => {
        const node = withPools(createTestNode());
        expect(errorKind(() => node.advanceClock('alice', 1))).toBe('Unauthorized');
        expect(errorKind(() => node.faucet('alice', 'MNT'))).toBe('InvalidParameter');
        expect(errorKind(() => node.fundRewards('guardian', 1n))).toBe('Unauthorized');

        const mainnet = createTestNode(null, { NETWORK_NAME: 'mainnet' });
        expect(errorKind(() => mainnet.faucet('alice', 'USDX'))).toBe('InvalidParameter');
    });

    it('lets guardians pause but not manage pools', () => {
        const node = withPools(createTestNode());
        node.pause('guardian', 'withdraw');
        expect(node.pauses.status().withdrawPaused).toBe(true);
        expect(errorKind(() => node.setPoolWeight('guardian', 1, 5n, false))).toBe('Unauthorized');
    });
});

describe('StakingNode persistence', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'multistake-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('restores ledger, balances and pauses from disk', () => {
        const first = withPools(createTestNode(new Storage(dir)));
        first.faucet('bob', 'USDX');
        first.approve('bob', 'USDX', 40n);
        first.deposit('bob', 1, 40n);
        first.pause('guardian', 'claim');
        first.advanceClock('admin', 10);
        first.unstake('bob', 1, 10n);

        const second = createTestNode(new Storage(dir));
        expect(second.ledger.listPools()).toEqual(first.ledger.listPools());
        expect(second.ledger.getUser(1, 'bob')).toEqual(first.ledger.getUser(1, 'bob'));
        expect(second.ledger.lastObservedHeight()).toBe(10);
        expect(second.bank.balanceOf('USDX', 'bob')).toBe(960n);
        expect(second.pauses.status()).toEqual({ withdrawPaused: false, claimPaused: true });
    });

    it('resumes the manual clock and accepts writes after a restart', () => {
        const config = testConfig();
        const first = withPools(new StakingNode(config, { storage: new Storage(dir) }));
        first.faucet('alice', NATIVE_ASSET);
        first.depositNative('alice', 10n);
        first.advanceClock('admin', 50);

        const second = new StakingNode(config, { storage: new Storage(dir) });
        expect(second.height()).toBe(50);
        expect(second.fundRewards('admin', 10_000n)).toBe(10_000n);
        expect(second.claim('alice', 0)).toEqual({ poolId: 0, owed: 1250n, paid: 1250n, shortfall: 0n });
        expect(second.depositNative('alice', 5n).stakeAmount).toBe(15n);
        expect(second.ledger.lastObservedHeight()).toBe(50);
    });

    it('starts the clock at the ledger height when the snapshot has no clock', () => {
        const config = testConfig();
        const first = withPools(new StakingNode(config, { storage: new Storage(dir) }));
        first.advanceClock('admin', 10);
        first.faucet('alice', NATIVE_ASSET);
        first.depositNative('alice', 10n);

        const file = path.join(dir, 'ledger.json');
        const snapshot = JSON.parse(fs.readFileSync(file, 'utf-8'));
        delete snapshot.clock;
        fs.writeFileSync(file, JSON.stringify(snapshot));

        const second = new StakingNode(config, { storage: new Storage(dir) });
        expect(second.height()).toBe(10);
        expect(second.unstake('alice', 0, 4n).stakeAmount).toBe(6n);
    });

    it('keeps the slot clock genesis across restarts', () => {
        const first = new StakingNode(
            testConfig({ CLOCK_MODE: 'slot', SLOT_DURATION_MS: '1000', GENESIS_TIME: String(Date.now() - 30_000) }),
            { storage: new Storage(dir) },
        );
        withPools(first);
        const observed = first.ledger.lastObservedHeight();
        expect(observed).toBeGreaterThanOrEqual(30);

        const second = new StakingNode(testConfig({ CLOCK_MODE: 'slot', SLOT_DURATION_MS: '1000' }), { storage: new Storage(dir) });
        expect(second.clock.toJSON()).toEqual(first.clock.toJSON());
        expect(second.height()).toBeGreaterThanOrEqual(observed);
        expect(second.addPool('admin', { stakeAssetId: 'DAI', weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 }).id).toBe(2);
    });

    it('keeps a committed write when the snapshot cannot be saved', () => {
        const node = withPools(createTestNode(new FailingStorage(dir)));
        node.faucet('alice', NATIVE_ASSET);
        expect(node.depositNative('alice', 10n).stakeAmount).toBe(10n);
        expect(node.ledger.poolCount()).toBe(2);
        expect(node.bank.balanceOf(NATIVE_ASSET, node.bank.custody)).toBe(10n);
    });

    it('writes nothing for a rejected operation', () => {
        const storage = new Storage(dir);
        const node = createTestNode(storage);
        expect(errorKind(() => node.addPool('alice', { stakeAssetId: NATIVE_ASSET, weight: 1n, minDeposit: 0n, unstakeLockBlocks: 5 }))).toBe('Unauthorized');
        expect(storage.loadState()).toBeNull();
    });

    it('refuses a corrupt snapshot', () => {
        fs.writeFileSync(path.join(dir, 'ledger.json'), '{not json');
        expect(() => createTestNode(new Storage(dir))).toThrow(SyntaxError);
    });
});
