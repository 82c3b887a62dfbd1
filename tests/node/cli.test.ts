import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatAmount } from '../../src/protocol/utils/cli.js';
import { logger } from '../../src/protocol/utils/logger.js';
import { applyStartOptions } from '../../src/node/cli/commands/start.js';
import { testConfig } from '../helpers/node.js';

describe('formatAmount', () => {
    it('renders 18-decimal amounts', () => {
        expect(formatAmount('50000000000000000000')).toBe('50');
        expect(formatAmount('1500000000000000000')).toBe('1.5');
        expect(formatAmount('5')).toBe('0');
        expect(formatAmount('0')).toBe('0');
    });
    it('passes through non-numeric text', () => {
        expect(formatAmount('-')).toBe('-');
    });
});

describe('applyStartOptions', () => {
    it('lets flags override the environment', () => {
        const config = applyStartOptions(testConfig({ CLOCK_MODE: 'slot', PERSIST: 'true' }), {
            port: '4100',
            data: '/tmp/ledger',
            manualClock: true,
            persist: false,
        });
        expect(config.api.port).toBe(4100);
        expect(config.storage).toEqual({ dataDir: '/tmp/ledger', persist: false });
        expect(config.clock.mode).toBe('manual');
    });

    it('keeps the environment when no flags are given', () => {
        const base = testConfig();
        expect(applyStartOptions(base, {})).toEqual(base);
    });
});

describe('logger levels', () => {
    afterEach(() => {
        logger.setLevel('silent');
        vi.restoreAllMocks();
    });

    it('filters lines below the level set by --log-level', () => {
        const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const log = logger.child('Test');

        logger.setLevel('warn');
        log.info('hidden');
        log.warn('shown');
        expect(output).toHaveBeenCalledTimes(1);
        expect(String(output.mock.calls[0][0])).toContain('[Ledger:Test]');
        expect(String(output.mock.calls[0][0])).toContain('shown');

        logger.setLevel('silent');
        log.error('muted');
        expect(output).toHaveBeenCalledTimes(1);
    });

    it('falls back to info for an unknown level', () => {
        const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        logger.setLevel('verbose');
        logger.debug('hidden');
        logger.info('shown');
        expect(output).toHaveBeenCalledTimes(1);
    });
});
