/**
 * PEM/X.509 certificate loading for node id derivation.
 *
 * Only the first PEM item of a file is considered, and it must be a
 * certificate. A key placed first is rejected even when a certificate follows.
 *
 * @packageDocumentation
 */
import { X509Certificate } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { CertificateLoadError, ErrorCode } from './errors.js';
import { fromBase64 } from './io/base64.js';

export interface PemBlock {
    /** Text between `-----BEGIN ` and `-----`, e.g. `CERTIFICATE` */
    label: string;
    /** Decoded body */
    der: Uint8Array;
}

const PEM_BLOCK = /-----BEGIN ([A-Z0-9 ]+)-----([\s\S]*?)-----END \1-----/;
const CERTIFICATE_LABEL = 'CERTIFICATE';
const PRIVATE_KEY_LABELS = new Set(['PRIVATE KEY', 'RSA PRIVATE KEY', 'EC PRIVATE KEY', 'ENCRYPTED PRIVATE KEY']);

/**
 * Reads the first PEM block of `pem`.
 *
 * @returns The block, or undefined if there is none
 * @throws If the body is not valid base64
 */
export function readFirstPemBlock(pem: string): PemBlock | undefined {
    const match = PEM_BLOCK.exec(pem);
    if (!match) return undefined;
    return { label: match[1], der: fromBase64(match[2]) };
}

/**
 * Extracts the DER bytes of the certificate in the first PEM block.
 *
 * @param source - Where the PEM came from, for error messages
 */
export function certificateFromPem(pem: string, source: string): Uint8Array {
    let block: PemBlock | undefined;
    try {
        block = readFirstPemBlock(pem);
    } catch (e) {
        throw new CertificateLoadError(`cert path ${source} has a malformed PEM body`, ErrorCode.CERT_INVALID, { path: source }, e);
    }
    if (block === undefined) {
        throw new CertificateLoadError(`cert path ${source} found no cert`, ErrorCode.CERT_NOT_FOUND, { path: source });
    }
    if (block.label !== CERTIFICATE_LABEL) {
        if (PRIVATE_KEY_LABELS.has(block.label)) {
            console.warn(`cert path ${source} has unexpected private key`);
        }
        throw new CertificateLoadError(`cert path ${source} found no cert (first item is ${block.label})`, ErrorCode.CERT_UNSUPPORTED, {
            path: source,
            actual: block.label,
        });
    }

    let certificate: X509Certificate;
    try {
        certificate = new X509Certificate(block.der);
    } catch (e) {
        throw new CertificateLoadError(`cert path ${source} is not a valid X.509 certificate`, ErrorCode.CERT_INVALID, { path: source }, e);
    }
    return new Uint8Array(certificate.raw);
}

function errnoCode(e: unknown): string | undefined {
    return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

/**
 * Reads a PEM file and returns the DER bytes of its leading certificate.
 *
 * @throws CertificateLoadError if the file is missing, cannot be read or does
 * not start with a certificate
 */
export function readCertificateFile(certFilePath: string): Uint8Array {
    let pem: string;
    try {
        pem = readFileSync(certFilePath, 'utf8');
    } catch (e) {
        const errno = errnoCode(e);
        if (errno === 'ENOENT') {
            throw new CertificateLoadError(`cert path ${certFilePath} does not exist`, ErrorCode.CERT_NOT_FOUND, { path: certFilePath }, e);
        }
        throw new CertificateLoadError(
            `cert path ${certFilePath} cannot be read (${errno ?? 'unknown error'})`,
            ErrorCode.CERT_UNREADABLE,
            { path: certFilePath, actual: errno },
            e,
        );
    }
    return certificateFromPem(pem, certFilePath);
}
