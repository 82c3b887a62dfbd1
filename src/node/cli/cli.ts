#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { startNode, type StartOptions } from './commands/start.js';
import { statusCommand } from './commands/status.js';
import { poolsCommand } from './commands/pools.js';
import { getPackageVersion } from '../config.js';

const program = new Command();

program
    .name('multistake')
    .description('Multistake Ledger Node - multi-pool staking with block-based rewards')
    .version(getPackageVersion());

program
    .command('start')
    .description('Start the ledger node and its HTTP API')
    .option('-p, --port <number>', 'API server port (default: API_PORT or 3001)')
    .option('-d, --data <path>', 'Data directory path (default: DATA_DIR)')
    .option('-n, --network <name>', 'Network name (default: NETWORK_NAME or devnet)')
    .option('--manual-clock', 'Advance heights only through /api/admin/clock/advance')
    .option('--no-persist', 'Keep the ledger in memory only')
    .option('-l, --log-level <level>', 'debug, info, warn, error or silent (default: LOG_LEVEL or info)')
    .action(async (options: StartOptions) => {
        await startNode(options);
    });

program.addCommand(statusCommand);
program.addCommand(poolsCommand);

await program.parseAsync();
