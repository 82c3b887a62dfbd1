import { SafeMath, isHeight } from '../../protocol/security/safe-math.js';
import { invalidParameter } from '../../protocol/errors.js';
import type { AssetId, EmissionConfig } from './types.js';

/**
 * Constant-rate reward emission over the half-open window [startHeight, endHeight).
 */
export class EmissionSchedule {
    private config: EmissionConfig;

    constructor(config: EmissionConfig) {
        validateHeight(config.startHeight, 'start height');
        validateHeight(config.endHeight, 'end height');
        if (config.startHeight > config.endHeight) {
            throw invalidParameter(`start height ${config.startHeight} is after end height ${config.endHeight}`);
        }
        if (config.rewardPerBlock <= 0n) {
            throw invalidParameter('reward per block must be positive');
        }
        validateAsset(config.rewardAssetId);
        this.config = { ...config };
    }

    get startHeight(): number { return this.config.startHeight; }
    get endHeight(): number { return this.config.endHeight; }
    get rewardPerBlock(): bigint { return this.config.rewardPerBlock; }
    get rewardAssetId(): AssetId { return this.config.rewardAssetId; }

    snapshot(): EmissionConfig {
        return { ...this.config };
    }

    /**
     * Reward emitted over [from, to), clipped to the active window.
     * An empty clipped range yields 0.
     */
    multiplier(from: number, to: number): bigint {
        if (from > to) {
            throw invalidParameter(`invalid block range: ${from} > ${to}`);
        }
        const clippedFrom = Math.max(from, this.config.startHeight);
        const clippedTo = Math.min(to, this.config.endHeight);
        if (clippedTo <= clippedFrom) return 0n;

        return SafeMath.mul(BigInt(clippedTo - clippedFrom), this.config.rewardPerBlock);
    }

    setStartHeight(startHeight: number): void {
        validateHeight(startHeight, 'start height');
        if (startHeight > this.config.endHeight) {
            throw invalidParameter('start height must not be after end height');
        }
        this.config.startHeight = startHeight;
    }

    setEndHeight(endHeight: number): void {
        validateHeight(endHeight, 'end height');
        if (this.config.startHeight > endHeight) {
            throw invalidParameter('end height must not be before start height');
        }
        this.config.endHeight = endHeight;
    }

    setRewardPerBlock(rewardPerBlock: bigint): void {
        if (rewardPerBlock <= 0n) {
            throw invalidParameter('reward per block must be positive');
        }
        this.config.rewardPerBlock = SafeMath.add(rewardPerBlock, 0n);
    }

    setRewardAsset(asset: AssetId): void {
        validateAsset(asset);
        this.config.rewardAssetId = asset;
    }
}

function validateHeight(height: number, label: string): void {
    if (!isHeight(height)) throw invalidParameter(`${label} must be a non-negative integer`);
}

function validateAsset(asset: AssetId): void {
    if (asset.trim().length === 0) throw invalidParameter('reward asset must not be empty');
}
