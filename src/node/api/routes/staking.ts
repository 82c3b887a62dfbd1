import { Router, Request, Response } from 'express';
import { NATIVE_POOL_ID } from '../../../protocol/params/staking.js';
import { readAmount, readInteger, readRecord, toJsonValue } from '../../../protocol/utils/json.js';
import { callerOf } from '../middleware/auth.js';
import type { StakingNode } from '../../StakingNode.js';

function body(req: Request): Record<string, unknown> {
    const raw: unknown = req.body ?? {};
    return readRecord(raw, 'body');
}

/**
 * Staker operations. The caller is the principal behind the API key.
 */
export function createStakingRoutes(node: StakingNode): Router {
    const router = Router();

    /**
     * POST /deposit - { poolId, amount }
     * Pool 0 debits the caller's native balance as attached value;
     * token pools pull an amount approved beforehand via /api/assets/approve.
     */
    router.post('/deposit', (req: Request, res: Response) => {
        const input = body(req);
        const caller = callerOf(res);
        const poolId = readInteger(input.poolId, 'poolId');
        const amount = readAmount(input.amount, 'amount');

        const user = poolId === NATIVE_POOL_ID
            ? node.depositNative(caller, amount)
            : node.deposit(caller, poolId, amount);

        res.json({ success: true, data: toJsonValue({ poolId, height: node.height(), user }) });
    });

    router.post('/unstake', (req: Request, res: Response) => {
        const input = body(req);
        const poolId = readInteger(input.poolId, 'poolId');
        const amount = readAmount(input.amount, 'amount');
        const user = node.unstake(callerOf(res), poolId, amount);
        res.json({ success: true, data: toJsonValue({ poolId, height: node.height(), user }) });
    });

    router.post('/withdraw', (req: Request, res: Response) => {
        const poolId = readInteger(body(req).poolId, 'poolId');
        const receipt = node.withdraw(callerOf(res), poolId);
        res.json({ success: true, data: toJsonValue(receipt) });
    });

    router.post('/claim', (req: Request, res: Response) => {
        const poolId = readInteger(body(req).poolId, 'poolId');
        const receipt = node.claim(callerOf(res), poolId);
        res.json({ success: true, data: toJsonValue(receipt) });
    });

    return router;
}
