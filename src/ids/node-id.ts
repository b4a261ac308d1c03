/**
 * 20-byte identifier of a network participant.
 *
 * Shares its byte layout with {@link ShortId} but is a distinct type with a
 * `NodeID-` text prefix; converting between the two is always explicit.
 *
 * @packageDocumentation
 */
import { readCertificateFile, certificateFromPem } from '../cert.js';
import { NODE_ID_ENCODE_PREFIX, NODE_ID_LEN } from '../constants.js';
import { hash160 } from '../crypto.js';
import { DecodeError } from '../errors.js';
import { decodeFixedWidth, decodeHex, FixedId, toFixedWidth } from './base.js';
import { ShortId } from './short-id.js';

/**
 * Removes a leading `NodeID-` if present.
 */
export function stripNodeIdPrefix(text: string): string {
    return text.startsWith(NODE_ID_ENCODE_PREFIX) ? text.slice(NODE_ID_ENCODE_PREFIX.length) : text;
}

/**
 * @example
 * ```typescript
 * import { NodeId } from 'ledger-ids';
 *
 * const nodeId = NodeId.fromCertFile('/etc/node/staker.crt');
 * nodeId.toString(); // 'NodeID-...'
 * NodeId.parse('6ZmBHXTqjknJoZtXbnJ6x7af863rXDTwx'); // prefix optional
 * ```
 */
export class NodeId extends FixedId {
    static readonly LENGTH = NODE_ID_LEN;

    static #empty: NodeId | undefined;

    readonly type = 'NodeId' as const;

    private constructor(bytes: Uint8Array) {
        super(bytes);
        Object.freeze(this);
    }

    static get EMPTY(): NodeId {
        if (NodeId.#empty === undefined) {
            NodeId.#empty = new NodeId(new Uint8Array(NODE_ID_LEN));
        }
        return NodeId.#empty;
    }

    static empty(): NodeId {
        return NodeId.EMPTY;
    }

    /**
     * Copies up to 20 bytes, right-padding shorter input with zeros.
     *
     * @throws ConstructionError if `bytes` is longer than 20
     */
    static fromBytes(bytes: Uint8Array): NodeId {
        return new NodeId(toFixedWidth(bytes, NODE_ID_LEN, 'NodeId'));
    }

    static fromHex(hex: string): NodeId {
        return NodeId.fromBytes(decodeHex(hex, NodeId.LENGTH, 'NodeId'));
    }

    /** Reinterprets a short id's bytes as a node id. */
    static fromShortId(shortId: ShortId): NodeId {
        return NodeId.fromBytes(shortId.toBytes());
    }

    /**
     * Parses the text form, with or without the `NodeID-` prefix.
     *
     * @throws DecodeError if the body is not CB58, fails its checksum or does not hold 20 bytes
     */
    static parse(text: string): NodeId {
        return new NodeId(decodeFixedWidth(stripNodeIdPrefix(text), NODE_ID_LEN, 'NodeId'));
    }

    static tryParse(text: string): NodeId | undefined {
        try {
            return NodeId.parse(text);
        } catch (e) {
            if (e instanceof DecodeError) return undefined;
            throw e;
        }
    }

    /**
     * Derives the node id of a DER-encoded certificate:
     * `ripemd160(sha256(der))`.
     */
    static fromCertRaw(der: Uint8Array): NodeId {
        return new NodeId(hash160(der));
    }

    /**
     * Derives the node id of the certificate in the first PEM block of `pem`.
     *
     * @param source - Name used in error messages, such as the file it came from
     * @throws CertificateLoadError if the first PEM item is not an X.509 certificate
     */
    static fromCertPem(pem: string, source: string = '<memory>'): NodeId {
        return NodeId.fromCertRaw(certificateFromPem(pem, source));
    }

    /**
     * Loads a node id from a PEM-encoded X.509 certificate file.
     *
     * @throws CertificateLoadError if the file does not exist or its first
     * PEM item is not an X.509 certificate
     */
    static fromCertFile(certFilePath: string): NodeId {
        return NodeId.fromCertRaw(readCertificateFile(certFilePath));
    }

    /** Same bytes, as a {@link ShortId}. No re-hashing. */
    shortId(): ShortId {
        return ShortId.fromBytes(this.bytes);
    }

    toString(): string {
        return NODE_ID_ENCODE_PREFIX + super.toString();
    }
}
