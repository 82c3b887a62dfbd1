import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../protocol/utils/logger.js';
import type { EventSink, PoolId, Principal, StakingEvent, StakingEventType } from '../staking/types.js';

export interface JournalEntry {
    id: string;
    seq: number;
    recordedAt: number;
    event: StakingEvent;
}

export interface JournalFilter {
    poolId?: PoolId;
    user?: Principal;
    type?: StakingEventType;
    limit?: number;
}

const DEFAULT_CAPACITY = 10_000;

/**
 * Bounded in-memory event log. Oldest entries are dropped past capacity.
 */
export class EventJournal implements EventSink {
    private entries: JournalEntry[] = [];
    private seq = 0;
    private log = logger.child('Events');

    constructor(private capacity: number = DEFAULT_CAPACITY) { }

    emit(event: StakingEvent): void {
        this.seq++;
        this.entries.push({ id: uuidv4(), seq: this.seq, recordedAt: Date.now(), event });
        if (this.entries.length > this.capacity) {
            this.entries.splice(0, this.entries.length - this.capacity);
        }
        this.log.debug(`📣 ${event.type} #${this.seq}`);
    }

    /** Newest first. */
    list(filter: JournalFilter = {}): JournalEntry[] {
        const matches = this.entries.filter(({ event }) => {
            if (filter.type !== undefined && event.type !== filter.type) return false;
            if (filter.poolId !== undefined && (!('poolId' in event) || event.poolId !== filter.poolId)) return false;
            if (filter.user !== undefined && (!('user' in event) || event.user !== filter.user)) return false;
            return true;
        });
        matches.reverse();
        return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
    }

    get size(): number {
        return this.entries.length;
    }
}
