/**
 * Branded type definitions for type-safe primitives.
 *
 * @packageDocumentation
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type Bytes32 = Brand<Uint8Array, 'Bytes32'>;
export type Bytes20 = Brand<Uint8Array, 'Bytes20'>;
