import { Router, Request, Response } from 'express';
import { invalidParameter } from '../../../protocol/errors.js';
import { readAmount, readBoolean, readInteger, readRecord, readString, toJsonValue } from '../../../protocol/utils/json.js';
import { callerOf } from '../middleware/auth.js';
import type { PauseSwitch } from '../../../runtime/control/PauseSwitchboard.js';
import type { StakingNode } from '../../StakingNode.js';

function body(req: Request): Record<string, unknown> {
    const raw: unknown = req.body ?? {};
    return readRecord(raw, 'body');
}

function optionalFlag(value: unknown, path: string): boolean {
    return value === undefined ? false : readBoolean(value, path);
}

function pauseTarget(value: string): PauseSwitch {
    if (value !== 'withdraw' && value !== 'claim') {
        throw invalidParameter(`unknown pause target ${value}`);
    }
    return value;
}

/**
 * Administrative routes. Authorization is decided by the ledger's
 * authorizer, so a valid API key without a role gets 403.
 */
export function createAdminRoutes(node: StakingNode): Router {
    const router = Router();

    // ========== POOLS ==========

    router.post('/pools', (req: Request, res: Response) => {
        const input = body(req);
        const pool = node.addPool(callerOf(res), {
            stakeAssetId: readString(input.stakeAssetId, 'stakeAssetId'),
            weight: readAmount(input.weight, 'weight'),
            minDeposit: readAmount(input.minDeposit ?? 0, 'minDeposit'),
            unstakeLockBlocks: readInteger(input.unstakeLockBlocks, 'unstakeLockBlocks'),
            withSettle: optionalFlag(input.withSettle, 'withSettle'),
        });
        res.status(201).json({ success: true, data: toJsonValue(pool) });
    });

    router.patch('/pools/:id', (req: Request, res: Response) => {
        const input = body(req);
        const pool = node.updatePool(callerOf(res), readInteger(req.params.id, 'poolId'), {
            minDeposit: readAmount(input.minDeposit, 'minDeposit'),
            unstakeLockBlocks: readInteger(input.unstakeLockBlocks, 'unstakeLockBlocks'),
        });
        res.json({ success: true, data: toJsonValue(pool) });
    });

    router.put('/pools/:id/weight', (req: Request, res: Response) => {
        const input = body(req);
        const pool = node.setPoolWeight(
            callerOf(res),
            readInteger(req.params.id, 'poolId'),
            readAmount(input.weight, 'weight'),
            optionalFlag(input.withSettle, 'withSettle'),
        );
        res.json({ success: true, data: toJsonValue({ pool, totalWeight: node.ledger.totalWeight() }) });
    });

    router.post('/pools/:id/settle', (req: Request, res: Response) => {
        const pool = node.settlePool(callerOf(res), readInteger(req.params.id, 'poolId'));
        res.json({ success: true, data: toJsonValue(pool) });
    });

    router.post('/settle', (_req: Request, res: Response) => {
        const pools = node.settleAllPools(callerOf(res));
        res.json({ success: true, data: toJsonValue(pools) });
    });

    // ========== EMISSION ==========

    router.put('/emission/:field', (req: Request, res: Response) => {
        const caller = callerOf(res);
        const value = body(req).value;
        switch (req.params.field) {
            case 'reward-asset':
                node.setRewardAsset(caller, readString(value, 'value'));
                break;
            case 'start-height':
                node.setStartHeight(caller, readInteger(value, 'value'));
                break;
            case 'end-height':
                node.setEndHeight(caller, readInteger(value, 'value'));
                break;
            case 'reward-per-block':
                node.setRewardPerBlock(caller, readAmount(value, 'value'));
                break;
            default:
                throw invalidParameter(`unknown emission field ${req.params.field}`);
        }
        res.json({ success: true, data: toJsonValue(node.ledger.emission()) });
    });

    router.post('/rewards/fund', (req: Request, res: Response) => {
        const treasuryBalance = node.fundRewards(callerOf(res), readAmount(body(req).amount, 'amount'));
        res.json({ success: true, data: toJsonValue({ treasuryBalance }) });
    });

    // ========== PAUSES ==========

    router.post('/pause/:target', (req: Request, res: Response) => {
        node.pause(callerOf(res), pauseTarget(req.params.target));
        res.json({ success: true, data: node.pauses.status() });
    });

    router.post('/unpause/:target', (req: Request, res: Response) => {
        node.unpause(callerOf(res), pauseTarget(req.params.target));
        res.json({ success: true, data: node.pauses.status() });
    });

    // ========== CLOCK ==========

    router.post('/clock/advance', (req: Request, res: Response) => {
        const blocks = readInteger(body(req).blocks ?? 1, 'blocks');
        const height = node.advanceClock(callerOf(res), blocks);
        res.json({ success: true, data: { height } });
    });

    return router;
}
