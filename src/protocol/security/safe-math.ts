import { MAX_UINT256 } from '../params/staking.js';
import { StakingError } from '../errors.js';

/**
 * Checked unsigned arithmetic over the uint256 range.
 * Results outside [0, 2^256 - 1] raise Overflow instead of wrapping.
 */
export const SafeMath = {
    add(a: bigint, b: bigint): bigint {
        return bounded(a + b, 'addition');
    },
    sub(a: bigint, b: bigint): bigint {
        if (b > a) throw new StakingError('Overflow', 'Underflow in subtraction');
        return bounded(a - b, 'subtraction');
    },
    mul(a: bigint, b: bigint): bigint {
        return bounded(a * b, 'multiplication');
    },
    div(a: bigint, b: bigint): bigint {
        if (b === 0n) throw new StakingError('Overflow', 'Division by zero');
        return bounded(a / b, 'division');
    },
    /** a * b / c with the intermediate product checked. */
    mulDiv(a: bigint, b: bigint, c: bigint): bigint {
        return SafeMath.div(SafeMath.mul(a, b), c);
    },
    min(a: bigint, b: bigint): bigint {
        return a < b ? a : b;
    },
};

function bounded(value: bigint, op: string): bigint {
    if (value < 0n) throw new StakingError('Overflow', `Underflow in ${op}`);
    if (value > MAX_UINT256) throw new StakingError('Overflow', `Overflow in ${op}`);
    return value;
}

/** Block heights are plain numbers; keep them within the safe-integer range. */
export function addHeight(height: number, blocks: number): number {
    const result = height + blocks;
    if (!Number.isSafeInteger(result)) {
        throw new StakingError('Overflow', `Height overflow: ${height} + ${blocks}`);
    }
    return result;
}

export function isUint(value: bigint): boolean {
    return value >= 0n && value <= MAX_UINT256;
}

export function isHeight(value: number): boolean {
    return Number.isSafeInteger(value) && value >= 0;
}
