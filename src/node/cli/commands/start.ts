import { logger } from '../../../protocol/utils/logger.js';
import { c, infoBox, newline, sym } from '../../../protocol/utils/cli.js';
import { loadConfig, type NodeConfig } from '../../config.js';
import { StakingNode } from '../../StakingNode.js';
import { startApiServer } from '../../api/server.js';

export interface StartOptions {
    port?: string;
    data?: string;
    network?: string;
    manualClock?: boolean;
    persist?: boolean;
    logLevel?: string;
}

/** CLI flags take precedence over the environment. */
export function applyStartOptions(config: NodeConfig, options: StartOptions): NodeConfig {
    return {
        ...config,
        network: options.network ?? config.network,
        api: {
            ...config.api,
            port: options.port !== undefined ? parseInt(options.port, 10) : config.api.port,
        },
        storage: {
            dataDir: options.data ?? config.storage.dataDir,
            persist: options.persist === false ? false : config.storage.persist,
        },
        clock: options.manualClock ? { ...config.clock, mode: 'manual' } : config.clock,
    };
}

export async function startNode(options: StartOptions): Promise<void> {
    if (options.logLevel) logger.setLevel(options.logLevel);
    const config = applyStartOptions(loadConfig(), options);
    if (!Number.isInteger(config.api.port) || config.api.port <= 0) {
        logger.error(`Invalid API port: ${options.port}`);
        process.exit(1);
    }

    newline();
    console.log(infoBox(
        [
            `${c.label('Network:')}   ${c.value(config.network)}`,
            `${c.label('Clock:')}     ${c.value(config.clock.mode)}`,
            `${c.label('Shortfall:')} ${c.value(config.shortfallMode)}`,
        ].join('\n'),
        `${sym.pool} Multistake Ledger v${config.nodeVersion}`,
    ));
    newline();

    logger.info(`${sym.folder} Data directory: ${config.storage.persist ? config.storage.dataDir : '(in-memory)'}`);
    if (Object.keys(config.api.keys).length === 0) {
        logger.warn('No API_KEYS configured: every write endpoint will answer 401');
    }

    const node = new StakingNode(config);
    logger.info(`${sym.clock} Current height: ${node.height()}`);

    const server = await startApiServer(node);

    process.on('SIGINT', () => {
        console.log('\n👋 Shutting down node...');
        server.close(() => process.exit(0));
    });
}
