import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { stakingParams, isShortfallMode, type ShortfallMode } from '../protocol/params/staking.js';
import { invalidParameter } from '../protocol/errors.js';
import { readAmount, readInteger, isRecord } from '../protocol/utils/json.js';
import type { EmissionConfig, Principal } from '../runtime/staking/types.js';

// Read version from package.json dynamically
export function getPackageVersion(): string {
    try {
        const __filename = fileURLToPath(import.meta.url);
        const __dirname = dirname(__filename);
        const pkgPath = join(__dirname, '../../package.json');
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
        return isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
    } catch {
        return '0.0.0';
    }
}

export type ClockMode = 'manual' | 'slot';

export interface NodeConfig {
    nodeVersion: string;
    network: string;
    api: {
        port: number;
        corsOrigin: string;
        rateLimit: {
            windowMs: number;
            maxRequests: number;
        };
        // API key -> principal
        keys: Record<string, Principal>;
    };
    storage: {
        dataDir: string;
        persist: boolean;
    };
    emission: EmissionConfig;
    shortfallMode: ShortfallMode;
    clock: {
        mode: ClockMode;
        genesisHeight: number;
        genesisTime: number;
        slotDurationMs: number;
    };
    roles: {
        admins: Principal[];
        guardians: Principal[];
    };
    accounts: {
        custody: Principal;
        treasury: Principal;
    };
    faucet: {
        enabled: boolean;
        amount: bigint;
    };
}

type Env = Record<string, string | undefined>;

function list(value: string | undefined): string[] {
    return (value ?? '').split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    throw invalidParameter(`expected true/false, got ${value}`);
}

function integer(env: Env, name: string, fallback: number): number {
    const value = env[name];
    return value === undefined || value === '' ? fallback : readInteger(value, name);
}

function amount(env: Env, name: string, fallback: bigint): bigint {
    const value = env[name];
    return value === undefined || value === '' ? fallback : readAmount(value, name);
}

function parseApiKeys(value: string | undefined): Record<string, Principal> {
    const keys: Record<string, Principal> = {};
    for (const pair of list(value)) {
        const separator = pair.indexOf('=');
        if (separator <= 0 || separator === pair.length - 1) {
            throw invalidParameter(`API_KEYS entry "${pair}" must look like key=principal`);
        }
        keys[pair.slice(0, separator)] = pair.slice(separator + 1);
    }
    return keys;
}

/**
 * Build the node configuration from environment variables.
 * Unset values fall back to protocol defaults; malformed values throw.
 */
export function loadConfig(env: Env = process.env): NodeConfig {
    const network = env.NETWORK_NAME || 'devnet';
    const defaults = stakingParams.defaults;

    const shortfallMode = env.SHORTFALL_MODE || 'lenient';
    if (!isShortfallMode(shortfallMode)) {
        throw invalidParameter(`SHORTFALL_MODE must be lenient or strict, got ${shortfallMode}`);
    }

    const clockMode = env.CLOCK_MODE || 'slot';
    if (clockMode !== 'manual' && clockMode !== 'slot') {
        throw invalidParameter(`CLOCK_MODE must be manual or slot, got ${clockMode}`);
    }

    const custody = env.CUSTODY_PRINCIPAL || 'stake-custody';
    const treasury = env.TREASURY_PRINCIPAL || 'reward-treasury';
    if (custody === treasury) {
        throw invalidParameter('CUSTODY_PRINCIPAL and TREASURY_PRINCIPAL must differ');
    }

    return {
        nodeVersion: getPackageVersion(),
        network,
        api: {
            port: integer(env, 'API_PORT', 3001),
            corsOrigin: env.CORS_ORIGIN || '*',
            rateLimit: {
                windowMs: integer(env, 'RATE_LIMIT_WINDOW_MS', 60_000),
                maxRequests: integer(env, 'RATE_LIMIT_MAX', 100),
            },
            keys: parseApiKeys(env.API_KEYS),
        },
        storage: {
            dataDir: env.DATA_DIR || `./data/${network}`,
            persist: flag(env.PERSIST, true),
        },
        emission: {
            rewardAssetId: env.REWARD_ASSET || defaults.rewardAsset,
            startHeight: integer(env, 'START_HEIGHT', defaults.startHeight),
            endHeight: integer(env, 'END_HEIGHT', defaults.endHeight),
            rewardPerBlock: amount(env, 'REWARD_PER_BLOCK', defaults.rewardPerBlock),
        },
        shortfallMode,
        clock: {
            mode: clockMode,
            genesisHeight: integer(env, 'GENESIS_HEIGHT', 0),
            genesisTime: integer(env, 'GENESIS_TIME', Date.now()),
            slotDurationMs: integer(env, 'SLOT_DURATION_MS', defaults.slotDurationMs),
        },
        roles: {
            admins: list(env.ADMIN_PRINCIPALS),
            guardians: list(env.GUARDIAN_PRINCIPALS),
        },
        accounts: { custody, treasury },
        faucet: {
            enabled: flag(env.FAUCET_ENABLED, network !== 'mainnet'),
            amount: amount(env, 'FAUCET_AMOUNT', 1000n * 10n ** 18n),
        },
    };
}
