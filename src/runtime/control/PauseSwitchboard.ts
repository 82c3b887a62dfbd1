import { logger, short } from '../../protocol/utils/logger.js';
import { requireAuthorized, type Authorizer } from '../../protocol/security/access-control.js';
import { invalidParameter } from '../../protocol/errors.js';
import { readBoolean, readRecord } from '../../protocol/utils/json.js';
import type { PauseFlags, Principal } from '../staking/types.js';

export type PauseSwitch = 'withdraw' | 'claim';

export interface PauseState {
    withdrawPaused: boolean;
    claimPaused: boolean;
}

/**
 * Two independent switches: "withdraw" gates unstake and withdraw,
 * "claim" gates claim. Only authorized principals may flip them.
 */
export class PauseSwitchboard implements PauseFlags {
    private state: PauseState = { withdrawPaused: false, claimPaused: false };
    private log = logger.child('Pause');

    constructor(private authorizer: Authorizer) { }

    isWithdrawPaused(): boolean {
        return this.state.withdrawPaused;
    }

    isClaimPaused(): boolean {
        return this.state.claimPaused;
    }

    status(): PauseState {
        return { ...this.state };
    }

    pause(caller: Principal, target: PauseSwitch): void {
        this.toggle(caller, target, true);
    }

    unpause(caller: Principal, target: PauseSwitch): void {
        this.toggle(caller, target, false);
    }

    loadFromData(data: unknown): void {
        const root = readRecord(data, 'pauses');
        this.state = {
            withdrawPaused: readBoolean(root.withdrawPaused, 'pauses.withdrawPaused'),
            claimPaused: readBoolean(root.claimPaused, 'pauses.claimPaused'),
        };
    }

    private toggle(caller: Principal, target: PauseSwitch, paused: boolean): void {
        requireAuthorized(this.authorizer, caller, 'pause:toggle');
        const current = target === 'withdraw' ? this.state.withdrawPaused : this.state.claimPaused;
        if (current === paused) {
            throw invalidParameter(`${target} has been already ${paused ? 'paused' : 'unpaused'}`);
        }
        this.state = target === 'withdraw'
            ? { ...this.state, withdrawPaused: paused }
            : { ...this.state, claimPaused: paused };
        this.log.warn(`${paused ? '⏸️' : '▶️'} ${target} ${paused ? 'paused' : 'unpaused'} by ${short(caller)}`);
    }
}
