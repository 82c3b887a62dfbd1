import { invalidParameter } from '../../protocol/errors.js';
import { isHeight } from '../../protocol/security/safe-math.js';
import { readInteger, readRecord, readString } from '../../protocol/utils/json.js';

export type ClockState =
    | { mode: 'manual'; height: number }
    | { mode: 'slot'; genesisHeight: number; genesisTime: number };

/** Source of the current block height. Never decreases. */
export interface BlockClock {
    currentHeight(): number;
    toJSON(): ClockState;
}

export function decodeClockState(value: unknown): ClockState {
    const data = readRecord(value, 'clock');
    const mode = readString(data.mode, 'clock.mode');
    switch (mode) {
        case 'manual':
            return { mode: 'manual', height: readInteger(data.height, 'clock.height') };
        case 'slot':
            return {
                mode: 'slot',
                genesisHeight: readInteger(data.genesisHeight, 'clock.genesisHeight'),
                genesisTime: readInteger(data.genesisTime, 'clock.genesisTime'),
            };
        default:
            throw invalidParameter(`unknown clock mode: ${mode}`);
    }
}

/** Height moves only when told to; used by tests and the dev node. */
export class ManualClock implements BlockClock {
    constructor(private height: number = 0) {
        if (!isHeight(height)) throw invalidParameter('height must be a non-negative integer');
    }

    currentHeight(): number {
        return this.height;
    }

    advance(blocks: number = 1): number {
        if (!isHeight(blocks)) throw invalidParameter('blocks must be a non-negative integer');
        return this.setHeight(this.height + blocks);
    }

    setHeight(height: number): number {
        if (!isHeight(height) || height < this.height) {
            throw invalidParameter(`height must not go backwards (${this.height} → ${height})`);
        }
        this.height = height;
        return this.height;
    }

    toJSON(): ClockState {
        return { mode: 'manual', height: this.height };
    }
}

export interface SlotClockOptions {
    genesisHeight: number;
    genesisTime: number;
    slotDurationMs: number;
    // heights below this are never reported
    floorHeight?: number;
    now?: () => number;
}

/** One block per slot since genesis: genesisHeight + floor(elapsed / slot). */
export class SlotClock implements BlockClock {
    private now: () => number;

    constructor(private options: SlotClockOptions) {
        if (options.slotDurationMs <= 0) throw invalidParameter('slot duration must be positive');
        this.now = options.now ?? Date.now;
    }

    currentHeight(): number {
        const elapsed = Math.max(0, this.now() - this.options.genesisTime);
        const height = this.options.genesisHeight + Math.floor(elapsed / this.options.slotDurationMs);
        return Math.max(height, this.options.floorHeight ?? 0);
    }

    toJSON(): ClockState {
        return { mode: 'slot', genesisHeight: this.options.genesisHeight, genesisTime: this.options.genesisTime };
    }
}
