import type { Server } from 'http';
import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { logger } from '../../protocol/utils/logger.js';
import type { StakingNode } from '../StakingNode.js';
import { principalAuth } from './middleware/auth.js';
import { errorHandler, notFound } from './middleware/errors.js';
import { createPoolRoutes } from './routes/pools.js';
import { createStakingRoutes } from './routes/staking.js';
import { createAdminRoutes } from './routes/admin.js';
import { createAssetRoutes } from './routes/assets.js';

export function createApp(node: StakingNode): Express {
    const { api } = node.config;
    const app: Express = express();

    // Trust proxy for nginx/cloudflare (needed for rate limiting behind proxy)
    app.set('trust proxy', 1);

    const apiLimiter = rateLimit({
        windowMs: api.rateLimit.windowMs,
        max: api.rateLimit.maxRequests,
        message: { success: false, error: 'Too many requests', code: 'RateLimited' },
    });

    app.use(cors({ origin: api.corsOrigin }));
    app.use(express.json({ limit: '1mb' }));
    app.use('/api', apiLimiter);

    const auth = principalAuth(api.keys);

    app.use('/api', createPoolRoutes(node));
    app.use('/api/staking', auth, createStakingRoutes(node));
    app.use('/api/admin', auth, createAdminRoutes(node));
    app.use('/api/assets', createAssetRoutes(node));

    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            network: node.config.network,
            version: node.config.nodeVersion,
            height: node.height(),
            pools: node.ledger.poolCount(),
        });
    });

    app.use(notFound);
    app.use(errorHandler);

    return app;
}

export function startApiServer(node: StakingNode, port: number = node.config.api.port): Promise<Server> {
    const app = createApp(node);
    return new Promise((resolve, reject) => {
        const server = app.listen(port);
        server.once('listening', () => {
            logger.info(`🌍 API Server running on http://localhost:${port}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}
