import { invalidParameter } from '../errors.js';

/**
 * Readers for persisted or client-supplied JSON. Amounts travel as decimal
 * strings because JSON numbers cannot carry uint256 values.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readRecord(value: unknown, path: string): Record<string, unknown> {
    if (!isRecord(value)) throw invalidParameter(`${path} must be an object`);
    return value;
}

export function readArray(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) throw invalidParameter(`${path} must be an array`);
    return value;
}

export function readString(value: unknown, path: string): string {
    if (typeof value !== 'string') throw invalidParameter(`${path} must be a string`);
    return value;
}

export function readInteger(value: unknown, path: string): number {
    const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
        throw invalidParameter(`${path} must be a non-negative integer`);
    }
    return parsed;
}

export function readAmount(value: unknown, path: string): bigint {
    if (typeof value === 'bigint') {
        if (value < 0n) throw invalidParameter(`${path} must not be negative`);
        return value;
    }
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
        return BigInt(value);
    }
    if (typeof value === 'string' && /^\d+$/.test(value)) {
        return BigInt(value);
    }
    throw invalidParameter(`${path} must be a non-negative integer amount`);
}

export function readBoolean(value: unknown, path: string): boolean {
    if (typeof value !== 'boolean') throw invalidParameter(`${path} must be a boolean`);
    return value;
}

/** JSON.stringify replacer that writes bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

export function toJsonValue<T>(value: T): unknown {
    return JSON.parse(JSON.stringify(value, bigintReplacer));
}
