/**
 * Pools CLI Command
 * Prints every pool with its weight, stake and accumulator.
 */

import { Command } from 'commander';
import { isRecord, readArray } from '../../../protocol/utils/json.js';
import cli, { c, sym } from '../../../protocol/utils/cli.js';

function field(record: Record<string, unknown>, key: string): string {
    const value = record[key];
    return typeof value === 'string' || typeof value === 'number' ? String(value) : '-';
}

export const poolsCommand = new Command('pools')
    .description('List staking pools')
    .option('-p, --port <number>', 'API server port', '3001')
    .action(async (options: { port: string }) => {
        const port = parseInt(options.port, 10);
        try {
            const response = await fetch(`http://localhost:${port}/api/pools`);
            const body: unknown = await response.json();
            if (!isRecord(body) || body.success !== true || !isRecord(body.data)) {
                throw new Error('unexpected /api/pools response');
            }
            const data = body.data;
            const pools = readArray(data.pools, 'pools');

            console.log('');
            console.log(cli.header('Pools'));
            cli.keyValue('Height', field(data, 'height'));
            cli.keyValue('Total weight', field(data, 'totalWeight'));
            cli.divider();

            if (pools.length === 0) {
                cli.warn('No pools yet');
                return;
            }

            for (const pool of pools) {
                if (!isRecord(pool)) continue;
                console.log(`${sym.bullet} ${c.highlight(`#${field(pool, 'id')}`)} ${c.bold(field(pool, 'stakeAssetId'))}`);
                cli.keyValue('Weight', field(pool, 'weight'), 3);
                cli.keyValue('Staked', cli.formatAmount(field(pool, 'totalStaked')), 3);
                cli.keyValue('Min deposit', cli.formatAmount(field(pool, 'minDeposit')), 3);
                cli.keyValue('Unstake lock', `${field(pool, 'unstakeLockBlocks')} blocks`, 3);
                cli.keyValue('Last settled', field(pool, 'lastSettledHeight'), 3);
            }
            cli.newline();
        } catch (error) {
            cli.error(`Could not list pools on port ${port}: ${error instanceof Error ? error.message : 'Unknown'}`);
            process.exitCode = 1;
        }
    });
