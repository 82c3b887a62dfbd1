import { describe, it, expect } from 'vitest';
import { EmissionSchedule } from '../../src/runtime/staking/EmissionSchedule.js';
import { errorKind } from '../helpers/errors.js';

const schedule = () => new EmissionSchedule({ rewardAssetId: 'MNT', startHeight: 100, endHeight: 200, rewardPerBlock: 10n });

describe('EmissionSchedule.multiplier', () => {
    it('counts blocks inside the window', () => {
        expect(schedule().multiplier(120, 150)).toBe(300n);
    });
    it('clips to startHeight and endHeight', () => {
        expect(schedule().multiplier(50, 120)).toBe(200n);
        expect(schedule().multiplier(180, 260)).toBe(200n);
        expect(schedule().multiplier(0, 1000)).toBe(1000n);
    });
    it('returns 0 when the clipped range is empty', () => {
        expect(schedule().multiplier(10, 50)).toBe(0n);
        expect(schedule().multiplier(200, 300)).toBe(0n);
        expect(schedule().multiplier(150, 150)).toBe(0n);
    });
    it('rejects from > to', () => {
        expect(errorKind(() => schedule().multiplier(151, 150))).toBe('InvalidParameter');
    });
    it('raises Overflow instead of wrapping', () => {
        const huge = new EmissionSchedule({ rewardAssetId: 'MNT', startHeight: 0, endHeight: 10, rewardPerBlock: 2n ** 255n });
        expect(errorKind(() => huge.multiplier(0, 2))).toBe('Overflow');
    });
});

describe('EmissionSchedule setters', () => {
    it('rejects a start height after the end height', () => {
        const s = schedule();
        expect(errorKind(() => s.setStartHeight(201))).toBe('InvalidParameter');
        expect(s.startHeight).toBe(100);
    });
    it('rejects an end height before the start height', () => {
        expect(errorKind(() => schedule().setEndHeight(99))).toBe('InvalidParameter');
    });
    it('accepts start == end', () => {
        const s = schedule();
        s.setEndHeight(100);
        expect(s.multiplier(0, 1000)).toBe(0n);
    });
    it('rejects a zero reward per block', () => {
        expect(errorKind(() => schedule().setRewardPerBlock(0n))).toBe('InvalidParameter');
    });
    it('rejects an empty reward asset', () => {
        expect(errorKind(() => schedule().setRewardAsset(' '))).toBe('InvalidParameter');
    });
    it('validates the initial configuration', () => {
        expect(errorKind(() => new EmissionSchedule({ rewardAssetId: 'MNT', startHeight: 5, endHeight: 4, rewardPerBlock: 1n }))).toBe('InvalidParameter');
    });
    it('snapshot is a copy', () => {
        const s = schedule();
        const snap = s.snapshot();
        s.setRewardPerBlock(7n);
        expect(snap.rewardPerBlock).toBe(10n);
        expect(s.rewardPerBlock).toBe(7n);
    });
});
