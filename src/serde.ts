/**
 * Binding of identifiers inside structured (JSON) documents.
 *
 * Identifiers serialize as their canonical text. On the way in, a field is
 * bound either as optional (absent or null means no identifier) or as
 * required (absent is an error). A present value that does not parse is an
 * error in both modes.
 *
 * @packageDocumentation
 */
import { DecodeError, ErrorCode, SchemaBindingError } from './errors.js';
import type { FixedId } from './ids/base.js';
import { Id } from './ids/id.js';
import { NodeId } from './ids/node-id.js';
import { ShortId } from './ids/short-id.js';
import { isNullish, isRecord, isString, type IdType } from './types.js';

export type BindingMode = 'optional' | 'required';

export interface IdBinding<T extends FixedId> {
    readonly type: IdType;
    /** Absent or null → undefined; anything else must parse. */
    readonly optional: (value: unknown, field?: string) => T | undefined;
    /** Absent or null is an error; anything else must parse. */
    readonly required: (value: unknown, field?: string) => T;
}

function describe(type: IdType, field: string | undefined): string {
    return field === undefined ? type : `${type} field '${field}'`;
}

function bindPresent<T extends FixedId>(value: unknown, type: IdType, parse: (text: string) => T, field?: string): T {
    if (!isString(value)) {
        throw new SchemaBindingError(`${describe(type, field)} must be a string, got ${typeof value}`, ErrorCode.INVALID_FIELD, {
            field,
            value,
        });
    }
    try {
        return parse(value);
    } catch (e) {
        if (e instanceof DecodeError) {
            throw new SchemaBindingError(`${describe(type, field)} is not a valid ${type}: ${e.message}`, ErrorCode.INVALID_FIELD, { field, value }, e);
        }
        throw e;
    }
}

function createBinding<T extends FixedId>(type: IdType, parse: (text: string) => T): IdBinding<T> {
    return {
        type,
        optional: (value, field) => (isNullish(value) ? undefined : bindPresent(value, type, parse, field)),
        required: (value, field) => {
            if (isNullish(value)) {
                throw new SchemaBindingError(`empty ${describe(type, field)} from deserialization`, ErrorCode.MISSING_FIELD, { field });
            }
            return bindPresent(value, type, parse, field);
        },
    };
}

export const idBinding: IdBinding<Id> = createBinding('Id', Id.parse);
export const shortIdBinding: IdBinding<ShortId> = createBinding('ShortId', ShortId.parse);
export const nodeIdBinding: IdBinding<NodeId> = createBinding('NodeId', NodeId.parse);

export function serializeId(id: FixedId): string {
    return id.toString();
}

export const deserializeId = idBinding.optional;
export const mustDeserializeId = idBinding.required;
export const deserializeShortId = shortIdBinding.optional;
export const mustDeserializeShortId = shortIdBinding.required;
export const deserializeNodeId = nodeIdBinding.optional;
export const mustDeserializeNodeId = nodeIdBinding.required;

/**
 * Reads and binds one field of a parsed JSON document.
 *
 * @example
 * ```typescript
 * import { readIdField, idBinding, nodeIdBinding } from 'ledger-ids';
 *
 * const doc: unknown = JSON.parse(text);
 * const chainId = readIdField(doc, 'chainId', idBinding, 'required');
 * const nodeId = readIdField(doc, 'nodeId', nodeIdBinding, 'optional');
 * ```
 *
 * @throws SchemaBindingError if `doc` is not an object, or the field fails to bind
 */
export function readIdField<T extends FixedId>(doc: unknown, field: string, binding: IdBinding<T>, mode: 'required'): T;
export function readIdField<T extends FixedId>(
    doc: unknown,
    field: string,
    binding: IdBinding<T>,
    mode: 'optional',
): T | undefined;
export function readIdField<T extends FixedId>(
    doc: unknown,
    field: string,
    binding: IdBinding<T>,
    mode: BindingMode,
): T | undefined {
    if (!isRecord(doc)) {
        throw new SchemaBindingError(`cannot read ${describe(binding.type, field)} from a non-object document`, ErrorCode.INVALID_FIELD, {
            field,
            value: doc,
        });
    }
    const value = Object.hasOwn(doc, field) ? doc[field] : undefined;
    return mode === 'required' ? binding.required(value, field) : binding.optional(value, field);
}

/**
 * Binds an array of identifier strings, every element required.
 *
 * @throws SchemaBindingError if `value` is not an array or any element fails to bind
 */
export function readIdArray<T extends FixedId>(value: unknown, binding: IdBinding<T>, field?: string): T[] {
    if (!Array.isArray(value)) {
        throw new SchemaBindingError(`${describe(binding.type, field)} must be an array`, ErrorCode.INVALID_FIELD, { field, value });
    }
    return value.map((item: unknown, index) => binding.required(item, field === undefined ? `[${index}]` : `${field}[${index}]`));
}

export type IdFieldBindings = Readonly<Record<string, readonly [IdBinding<FixedId>, BindingMode]>>;

/**
 * Builds a `JSON.parse` reviver that binds the named fields wherever they
 * occur. Required fields must also be present on the top-level object, so a
 * document fails on its first bad required field.
 *
 * An optional field holding `null` is dropped from the result.
 *
 * @example
 * ```typescript
 * import { idReviver, idBinding, nodeIdBinding } from 'ledger-ids';
 *
 * const doc = JSON.parse(text, idReviver({ chainId: [idBinding, 'required'], nodeId: [nodeIdBinding, 'optional'] }));
 * ```
 */
export function idReviver(fields: IdFieldBindings): (key: string, value: unknown) => unknown {
    return (key, value) => {
        if (key === '') {
            if (isRecord(value)) {
                for (const [field, [binding, mode]] of Object.entries(fields)) {
                    if (mode === 'required' && !Object.hasOwn(value, field)) {
                        binding.required(undefined, field);
                    }
                }
            }
            return value;
        }
        if (!Object.hasOwn(fields, key)) return value;

        const [binding, mode] = fields[key];
        return mode === 'required' ? binding.required(value, key) : binding.optional(value, key);
    };
}
