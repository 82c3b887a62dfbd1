import { describe, it, expect } from 'vitest';
import { AssetBank } from '../../src/runtime/assets/AssetBank.js';
import { errorKind } from '../helpers/errors.js';

const accounts = { custody: 'custody', treasury: 'treasury' };

describe('AssetBank', () => {
    it('requires distinct custody and treasury accounts', () => {
        expect(errorKind(() => new AssetBank({ custody: 'x', treasury: 'x' }))).toBe('InvalidParameter');
    });

    it('pull moves approved funds into custody and spends the allowance', () => {
        const bank = new AssetBank(accounts);
        bank.mint('USDX', 'bob', 10n);
        bank.approve('USDX', 'bob', 8n);
        bank.pull('USDX', 'bob', 6n);

        expect(bank.balanceOf('USDX', 'bob')).toBe(4n);
        expect(bank.balanceOf('USDX', 'custody')).toBe(6n);
        expect(bank.allowance('USDX', 'bob')).toBe(2n);
    });

    it('pull fails without enough allowance or balance', () => {
        const bank = new AssetBank(accounts);
        bank.mint('USDX', 'bob', 5n);
        expect(errorKind(() => bank.pull('USDX', 'bob', 1n))).toBe('TransferFailed');
        bank.approve('USDX', 'bob', 10n);
        expect(errorKind(() => bank.pull('USDX', 'bob', 6n))).toBe('TransferFailed');
        expect(bank.balanceOf('USDX', 'bob')).toBe(5n);
    });

    it('push reports failure when custody is short', () => {
        const bank = new AssetBank(accounts);
        const outcome = bank.push('USDX', 'bob', 1n);
        expect(outcome.success).toBe(false);
        expect(outcome.returnData).toHaveLength(0);
    });

    it('rewards are paid from the treasury only', () => {
        const bank = new AssetBank(accounts);
        bank.mint('MNT', 'custody', 50n);
        bank.fundRewards('MNT', 20n);
        expect(bank.rewardBalance('MNT')).toBe(20n);
        expect(errorKind(() => bank.rewardTransfer('MNT', 'alice', 21n))).toBe('InsufficientBalance');
        bank.rewardTransfer('MNT', 'alice', 20n);
        expect(bank.balanceOf('MNT', 'alice')).toBe(20n);
        expect(bank.balanceOf('MNT', 'custody')).toBe(50n);
    });

    it('mint rejects non-positive amounts', () => {
        expect(errorKind(() => new AssetBank(accounts).mint('USDX', 'bob', 0n))).toBe('InvalidParameter');
    });

    it('round-trips through its JSON form', () => {
        const bank = new AssetBank(accounts);
        bank.mint('USDX', 'bob', 7n);
        bank.approve('USDX', 'bob', 3n);

        const copy = new AssetBank(accounts);
        copy.loadFromData(JSON.parse(JSON.stringify(bank.toJSON())));
        expect(copy.toJSON()).toEqual({
            balances: { USDX: { bob: '7' } },
            allowances: { USDX: { bob: '3' } },
        });
    });
});
