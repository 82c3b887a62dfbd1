/**
 * Staking Parameters (Protocol Level)
 *
 * Deterministic constants shared by every runtime module.
 * Node-local settings (ports, paths, keys) belong in node/config.ts.
 */

// Fixed-point precision of accRewardPerShare (1e18)
export const SCALE = 10n ** 18n;

// Largest representable ledger integer (uint256)
export const MAX_UINT256 = 2n ** 256n - 1n;

// Pool 0 always stakes the native currency
export const NATIVE_POOL_ID = 0;
export const NATIVE_ASSET = 'native';

export const stakingParams = {
    scale: SCALE,
    maxUint: MAX_UINT256,
    nativePoolId: NATIVE_POOL_ID,
    nativeAsset: NATIVE_ASSET,

    // Defaults used when the node starts without explicit emission settings
    defaults: {
        rewardAsset: 'MNT',
        startHeight: 1,
        endHeight: 999_999_999_999,
        rewardPerBlock: 10n ** 18n,   // 1 reward token per block (18 decimals)
        slotDurationMs: 12_000,
    },
} as const;

export type ShortfallMode = 'lenient' | 'strict';

export const SHORTFALL_MODES: readonly ShortfallMode[] = ['lenient', 'strict'];

export function isShortfallMode(value: string): value is ShortfallMode {
    return value === 'lenient' || value === 'strict';
}
