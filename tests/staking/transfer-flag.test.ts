import { describe, it, expect } from 'vitest';
import { decodeTransferFlag, encodeTransferFlag } from '../../src/runtime/assets/transfer-flag.js';
import { errorKind } from '../helpers/errors.js';

describe('decodeTransferFlag', () => {
    it('reads true and false words', () => {
        expect(decodeTransferFlag(encodeTransferFlag(true))).toBe(true);
        expect(decodeTransferFlag(encodeTransferFlag(false))).toBe(false);
    });

    it('ignores bytes after the first word', () => {
        const data = new Uint8Array(64);
        data[31] = 1;
        data[63] = 9;
        expect(decodeTransferFlag(data)).toBe(true);
    });

    it('rejects payloads shorter than 32 bytes', () => {
        expect(errorKind(() => decodeTransferFlag(new Uint8Array(31)))).toBe('TransferFailed');
    });

    it('rejects a word that is not 0 or 1', () => {
        const high = encodeTransferFlag(true);
        high[0] = 1;
        expect(errorKind(() => decodeTransferFlag(high))).toBe('TransferFailed');

        const two = new Uint8Array(32);
        two[31] = 2;
        expect(errorKind(() => decodeTransferFlag(two))).toBe('TransferFailed');
    });
});
