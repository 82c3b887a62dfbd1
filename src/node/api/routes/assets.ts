import { Router, Request, Response } from 'express';
import { readAmount, readRecord, readString, toJsonValue } from '../../../protocol/utils/json.js';
import { callerOf, principalAuth } from '../middleware/auth.js';
import type { StakingNode } from '../../StakingNode.js';

function body(req: Request): Record<string, unknown> {
    const raw: unknown = req.body ?? {};
    return readRecord(raw, 'body');
}

export function createAssetRoutes(node: StakingNode): Router {
    const router = Router();
    const auth = principalAuth(node.config.api.keys);

    router.get('/:asset/balance/:owner', (req: Request, res: Response) => {
        const { asset, owner } = req.params;
        res.json({
            success: true,
            data: toJsonValue({
                asset,
                owner,
                balance: node.bank.balanceOf(asset, owner),
                allowance: node.bank.allowance(asset, owner),
            }),
        });
    });

    router.post('/approve', auth, (req: Request, res: Response) => {
        const input = body(req);
        const caller = callerOf(res);
        const asset = readString(input.asset, 'asset');
        const amount = readAmount(input.amount, 'amount');
        node.approve(caller, asset, amount);
        res.json({ success: true, data: toJsonValue({ asset, owner: caller, allowance: amount }) });
    });

    router.post('/faucet', auth, (req: Request, res: Response) => {
        const caller = callerOf(res);
        const asset = readString(body(req).asset, 'asset');
        const balance = node.faucet(caller, asset);
        res.json({ success: true, data: toJsonValue({ asset, owner: caller, balance }) });
    });

    return router;
}
