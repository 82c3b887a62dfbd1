import { StakingError } from '../../protocol/errors.js';

const WORD_BYTES = 32;

/**
 * Decode the return payload of a native transfer as an ABI-encoded bool.
 * The first 32-byte word must be 0 or 1; anything else is malformed.
 */
export function decodeTransferFlag(returnData: Uint8Array): boolean {
    if (returnData.length < WORD_BYTES) {
        throw new StakingError('TransferFailed', `transfer returned ${returnData.length} bytes, expected a 32-byte flag`);
    }
    for (let i = 0; i < WORD_BYTES - 1; i++) {
        if (returnData[i] !== 0) {
            throw new StakingError('TransferFailed', 'transfer returned a malformed flag');
        }
    }
    const flag = returnData[WORD_BYTES - 1];
    if (flag !== 0 && flag !== 1) {
        throw new StakingError('TransferFailed', 'transfer returned a malformed flag');
    }
    return flag === 1;
}

export function encodeTransferFlag(flag: boolean): Uint8Array {
    const word = new Uint8Array(WORD_BYTES);
    word[WORD_BYTES - 1] = flag ? 1 : 0;
    return word;
}
