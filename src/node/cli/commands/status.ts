import { Command } from 'commander';
import { isRecord } from '../../../protocol/utils/json.js';
import { c, errorBox, successBox, sym } from '../../../protocol/utils/cli.js';

export const statusCommand = new Command('status')
    .description('Show node status')
    .option('-p, --port <number>', 'API server port', '3001')
    .action(async (options: { port: string }) => {
        const port = parseInt(options.port, 10);
        try {
            const response = await fetch(`http://localhost:${port}/health`);
            const health: unknown = await response.json();
            if (!isRecord(health)) throw new Error('unexpected /health response');

            console.log(successBox([
                `${c.label('Status:')}  ${health.status === 'ok' ? c.success('🟢 Running') : c.error('🔴 Error')}`,
                `${c.label('Network:')} ${c.value(String(health.network))}`,
                `${c.label('Version:')} ${c.value(String(health.version))}`,
                `${c.label('Height:')}  ${c.value(String(health.height))}`,
                `${c.label('Pools:')}   ${c.value(String(health.pools))}`,
            ].join('\n'), `${sym.pool} Node Status`));
        } catch {
            console.log(errorBox(`Node is not running on port ${port}`, `${sym.error} Offline`));
            process.exitCode = 1;
        }
    });
