/**
 * Error hierarchy for identifier construction, decoding, certificate loading
 * and document binding.
 *
 * @packageDocumentation
 */

export const ErrorCode = {
    INVALID_LENGTH: 'INVALID_LENGTH',
    INVALID_TAG: 'INVALID_TAG',
    INVALID_ENCODING: 'INVALID_ENCODING',
    CHECKSUM_MISMATCH: 'CHECKSUM_MISMATCH',
    CERT_NOT_FOUND: 'CERT_NOT_FOUND',
    CERT_UNREADABLE: 'CERT_UNREADABLE',
    CERT_UNSUPPORTED: 'CERT_UNSUPPORTED',
    CERT_INVALID: 'CERT_INVALID',
    MISSING_FIELD: 'MISSING_FIELD',
    INVALID_FIELD: 'INVALID_FIELD',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ConstructionErrorCode = typeof ErrorCode.INVALID_LENGTH | typeof ErrorCode.INVALID_TAG;

export type DecodeErrorCode =
    | typeof ErrorCode.INVALID_ENCODING
    | typeof ErrorCode.CHECKSUM_MISMATCH
    | typeof ErrorCode.INVALID_LENGTH;

export type CertificateErrorCode =
    | typeof ErrorCode.CERT_NOT_FOUND
    | typeof ErrorCode.CERT_UNREADABLE
    | typeof ErrorCode.CERT_UNSUPPORTED
    | typeof ErrorCode.CERT_INVALID;

export type SchemaBindingErrorCode = typeof ErrorCode.MISSING_FIELD | typeof ErrorCode.INVALID_FIELD;

/**
 * Additional context for errors
 */
export interface ErrorDetails {
    /** Document field being bound */
    field?: string;
    /** The offending value */
    value?: unknown;
    /** Expected length or format */
    expected?: unknown;
    /** Actual length or format received */
    actual?: unknown;
    /** Certificate path */
    path?: string;
    [key: string]: unknown;
}

/**
 * Base class for every error raised by this package.
 * Carries a machine-readable code and structured details.
 */
export class IdError extends Error {
    readonly code: ErrorCode;
    readonly details: ErrorDetails;

    constructor(message: string, code: ErrorCode, details: ErrorDetails = {}, cause?: unknown) {
        super(message);
        this.name = 'IdError';
        this.code = code;
        this.details = details;
        if (cause !== undefined) {
            this.cause = cause;
        }

        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    toJSON(): { name: string; message: string; code: ErrorCode; details: ErrorDetails } {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            details: this.details,
        };
    }
}

/**
 * Raw input longer than an identifier's width, or a prefix tag outside the
 * u64 range. Signals a caller bug rather than bad external input.
 */
export class ConstructionError extends IdError {
    constructor(message: string, code: ConstructionErrorCode, details: ErrorDetails = {}) {
        super(message, code, details);
        this.name = 'ConstructionError';
    }
}

/**
 * Text that is not valid CB58, fails its checksum, or decodes to the wrong width.
 */
export class DecodeError extends IdError {
    constructor(message: string, code: DecodeErrorCode, details: ErrorDetails = {}, cause?: unknown) {
        super(message, code, details, cause);
        this.name = 'DecodeError';
    }
}

/**
 * Certificate file missing, or its first PEM item is not an X.509 certificate.
 */
export class CertificateLoadError extends IdError {
    constructor(message: string, code: CertificateErrorCode, details: ErrorDetails = {}, cause?: unknown) {
        super(message, code, details, cause);
        this.name = 'CertificateLoadError';
    }
}

/**
 * A required identifier field was absent, or a present one could not be parsed.
 */
export class SchemaBindingError extends IdError {
    constructor(message: string, code: SchemaBindingErrorCode, details: ErrorDetails = {}, cause?: unknown) {
        super(message, code, details, cause);
        this.name = 'SchemaBindingError';
    }
}
