import { Router, Request, Response } from 'express';
import { readInteger, readString, toJsonValue } from '../../../protocol/utils/json.js';
import { invalidParameter } from '../../../protocol/errors.js';
import type { StakingNode } from '../../StakingNode.js';
import type { JournalFilter } from '../../../runtime/events/EventJournal.js';
import type { StakingEventType } from '../../../runtime/staking/types.js';

const EVENT_TYPES: readonly StakingEventType[] = [
    'PoolAdded', 'PoolUpdated', 'PoolWeightSet', 'PoolSettled', 'Deposit', 'UnstakeRequested',
    'Withdraw', 'Claim', 'RewardAssetSet', 'StartHeightSet', 'EndHeightSet', 'RewardPerBlockSet',
];

function isEventType(value: string): value is StakingEventType {
    return EVENT_TYPES.some(type => type === value);
}

function queryValue(req: Request, name: string): string | undefined {
    const value: unknown = req.query[name];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Read-only ledger views.
 */
export function createPoolRoutes(node: StakingNode): Router {
    const router = Router();

    router.get('/pools', (_req: Request, res: Response) => {
        const ledger = node.ledger;
        res.json({
            success: true,
            data: toJsonValue({
                height: node.height(),
                totalWeight: ledger.totalWeight(),
                emission: ledger.emission(),
                shortfallMode: ledger.getShortfallMode(),
                pauses: node.pauses.status(),
                pools: ledger.listPools(),
            }),
        });
    });

    router.get('/pools/:id', (req: Request, res: Response) => {
        const poolId = readInteger(req.params.id, 'poolId');
        const ledger = node.ledger;
        res.json({
            success: true,
            data: toJsonValue({
                pool: ledger.getPool(poolId),
                stakers: ledger.usersOf(poolId).length,
            }),
        });
    });

    router.get('/pools/:id/users/:user', (req: Request, res: Response) => {
        const poolId = readInteger(req.params.id, 'poolId');
        const user = readString(req.params.user, 'user');
        const height = node.height();
        const ledger = node.ledger;
        const record = ledger.getUser(poolId, user);
        res.json({
            success: true,
            data: toJsonValue({
                poolId,
                user,
                height,
                stakeAmount: record.stakeAmount,
                pendingReward: ledger.pendingReward(poolId, user, height),
                withdrawals: ledger.withdrawalStatus(poolId, user, height),
                queue: record.withdrawalQueue,
            }),
        });
    });

    router.get('/events', (req: Request, res: Response) => {
        const filter: JournalFilter = { limit: 100 };
        const poolId = queryValue(req, 'poolId');
        const user = queryValue(req, 'user');
        const type = queryValue(req, 'type');
        const limit = queryValue(req, 'limit');

        if (poolId !== undefined) filter.poolId = readInteger(poolId, 'poolId');
        if (user !== undefined) filter.user = user;
        if (type !== undefined) {
            if (!isEventType(type)) throw invalidParameter(`unknown event type ${type}`);
            filter.type = type;
        }
        if (limit !== undefined) filter.limit = Math.min(readInteger(limit, 'limit'), 1000);

        res.json({ success: true, data: toJsonValue(node.journal.list(filter)) });
    });

    return router;
}
