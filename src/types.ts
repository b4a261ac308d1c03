/**
 * Branded types and the type guards used to validate untyped input.
 *
 * @packageDocumentation
 */
import type { Bytes20, Bytes32 } from './branded.js';

export type { Bytes20, Bytes32 } from './branded.js';

/** Which fixed-width identifier family a value belongs to. */
export type IdType = 'Id' | 'ShortId' | 'NodeId';

export const UINT64_MAX = 2n ** 64n - 1n;

export function isUInt32(value: unknown): value is number {
    return typeof value === 'number' && globalThis.Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

export function isUInt53(value: unknown): value is number {
    return (
        typeof value === 'number' &&
        globalThis.Number.isInteger(value) &&
        value >= 0 &&
        value <= globalThis.Number.MAX_SAFE_INTEGER
    );
}

export function isUInt64(value: unknown): value is bigint {
    return typeof value === 'bigint' && value >= 0n && value <= UINT64_MAX;
}

export function isString(value: unknown): value is string {
    return typeof value === 'string';
}

export function isNullish(value: unknown): value is null | undefined {
    return value === null || value === undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !globalThis.Array.isArray(value);
}

export function isBytes32(value: unknown): value is Bytes32 {
    return value instanceof Uint8Array && value.length === 32;
}

export function isBytes20(value: unknown): value is Bytes20 {
    return value instanceof Uint8Array && value.length === 20;
}
