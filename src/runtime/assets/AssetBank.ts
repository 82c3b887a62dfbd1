/**
 * In-memory asset bank.
 *
 * Holds balances for the native currency, staking tokens and the reward
 * token. Staked principal sits in the custody account; reward funds sit in
 * a separate treasury so a pool can never pay rewards out of principal.
 */

import { logger, short } from '../../protocol/utils/logger.js';
import { SafeMath } from '../../protocol/security/safe-math.js';
import { StakingError, invalidParameter } from '../../protocol/errors.js';
import { readAmount, readRecord } from '../../protocol/utils/json.js';
import type {
    AssetId,
    Principal,
    RewardVault,
    StakeAssetGateway,
    TransferOutcome,
} from '../staking/types.js';

export interface AssetBankAccounts {
    custody: Principal;
    treasury: Principal;
}

export interface AssetBankData {
    balances: Record<AssetId, Record<Principal, string>>;
    allowances: Record<AssetId, Record<Principal, string>>;
}

export class AssetBank implements StakeAssetGateway, RewardVault {
    private balances = new Map<AssetId, Map<Principal, bigint>>();
    // asset -> owner -> amount the custody account may pull
    private allowances = new Map<AssetId, Map<Principal, bigint>>();
    private log = logger.child('Assets');

    constructor(private accounts: AssetBankAccounts) {
        if (accounts.custody === accounts.treasury) {
            throw invalidParameter('custody and treasury must be different accounts');
        }
    }

    get custody(): Principal { return this.accounts.custody; }
    get treasury(): Principal { return this.accounts.treasury; }

    balanceOf(asset: AssetId, owner: Principal): bigint {
        return this.balances.get(asset)?.get(owner) ?? 0n;
    }

    allowance(asset: AssetId, owner: Principal): bigint {
        return this.allowances.get(asset)?.get(owner) ?? 0n;
    }

    mint(asset: AssetId, to: Principal, amount: bigint): bigint {
        requirePositive(amount);
        const next = SafeMath.add(this.balanceOf(asset, to), amount);
        this.write(this.balances, asset, to, next);
        this.log.debug(`🪙 Minted ${amount} ${asset} to ${short(to)}`);
        return next;
    }

    transfer(asset: AssetId, from: Principal, to: Principal, amount: bigint): void {
        if (amount < 0n) throw invalidParameter('transfer amount must not be negative');
        const available = this.balanceOf(asset, from);
        if (available < amount) {
            throw new StakingError('InsufficientBalance', `${short(from)} holds ${available} ${asset}, needs ${amount}`);
        }
        if (from === to || amount === 0n) return;
        const credited = SafeMath.add(this.balanceOf(asset, to), amount);
        this.write(this.balances, asset, from, available - amount);
        this.write(this.balances, asset, to, credited);
    }

    /** Let the custody account pull up to `amount` of the owner's asset. */
    approve(asset: AssetId, owner: Principal, amount: bigint): void {
        if (amount < 0n) throw invalidParameter('allowance must not be negative');
        this.write(this.allowances, asset, owner, amount);
    }

    /** Seed the reward treasury. */
    fundRewards(asset: AssetId, amount: bigint): bigint {
        return this.mint(asset, this.accounts.treasury, amount);
    }

    // ========== StakeAssetGateway ==========

    pull(asset: AssetId, from: Principal, amount: bigint): void {
        const allowed = this.allowance(asset, from);
        if (allowed < amount) {
            throw new StakingError('TransferFailed', `allowance ${allowed} ${asset} is below ${amount}`);
        }
        const available = this.balanceOf(asset, from);
        if (available < amount) {
            throw new StakingError('TransferFailed', `${short(from)} holds ${available} ${asset}, needs ${amount}`);
        }
        this.transfer(asset, from, this.accounts.custody, amount);
        this.write(this.allowances, asset, from, allowed - amount);
    }

    push(asset: AssetId, to: Principal, amount: bigint): TransferOutcome {
        if (this.balanceOf(asset, this.accounts.custody) < amount) {
            this.log.error(`Custody cannot cover ${amount} ${asset} for ${short(to)}`);
            return { success: false, returnData: new Uint8Array() };
        }
        this.transfer(asset, this.accounts.custody, to, amount);
        return { success: true, returnData: new Uint8Array() };
    }

    // ========== RewardVault ==========

    rewardBalance(asset: AssetId): bigint {
        return this.balanceOf(asset, this.accounts.treasury);
    }

    rewardTransfer(asset: AssetId, to: Principal, amount: bigint): void {
        this.transfer(asset, this.accounts.treasury, to, amount);
    }

    // ========== PERSISTENCE ==========

    toJSON(): AssetBankData {
        return { balances: dump(this.balances), allowances: dump(this.allowances) };
    }

    loadFromData(data: unknown): void {
        const root = readRecord(data, 'assets');
        this.balances = restore(root.balances, 'assets.balances');
        this.allowances = restore(root.allowances, 'assets.allowances');
    }

    private write(table: Map<AssetId, Map<Principal, bigint>>, asset: AssetId, owner: Principal, amount: bigint): void {
        const accounts = table.get(asset) ?? new Map<Principal, bigint>();
        if (amount === 0n) {
            accounts.delete(owner);
        } else {
            accounts.set(owner, amount);
        }
        table.set(asset, accounts);
    }
}

function requirePositive(amount: bigint): void {
    if (amount <= 0n) throw invalidParameter('amount must be positive');
}

function dump(table: Map<AssetId, Map<Principal, bigint>>): Record<AssetId, Record<Principal, string>> {
    const result: Record<AssetId, Record<Principal, string>> = {};
    for (const [asset, accounts] of table) {
        const entries: Record<Principal, string> = {};
        for (const [owner, amount] of accounts) entries[owner] = amount.toString();
        result[asset] = entries;
    }
    return result;
}

function restore(value: unknown, path: string): Map<AssetId, Map<Principal, bigint>> {
    const table = new Map<AssetId, Map<Principal, bigint>>();
    for (const [asset, accounts] of Object.entries(readRecord(value, path))) {
        const owners = new Map<Principal, bigint>();
        for (const [owner, amount] of Object.entries(readRecord(accounts, `${path}.${asset}`))) {
            owners.set(owner, readAmount(amount, `${path}.${asset}.${owner}`));
        }
        table.set(asset, owners);
    }
    return table;
}
