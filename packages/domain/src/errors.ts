/**
 * Error taxonomy for the exchange rate client.
 *
 * Every failure surfaced to a caller is an `FxError` with a stable `code`.
 * Per-entry parse problems are not errors: they are reported as `ParseSkip`
 * diagnostics and the parse carries on.
 */

export const FX_ERROR_CODES = {
    INVALID_REQUEST: 'INVALID_REQUEST',
    REMOTE_ERROR: 'REMOTE_ERROR',
    TRANSPORT_ERROR: 'TRANSPORT_ERROR',
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    RATE_NOT_FOUND: 'RATE_NOT_FOUND'
} as const;

export type FxErrorCode = (typeof FX_ERROR_CODES)[keyof typeof FX_ERROR_CODES];

export interface FxErrorOptions {
    cause?: unknown;
    details?: unknown;
}

export class FxError extends Error {
    readonly code: FxErrorCode;
    readonly details?: unknown;

    constructor(code: FxErrorCode, message: string, options: FxErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'FxError';
        this.code = code;
        this.details = options.details;
    }

    toJSON(): { error: { code: string; message: string; details?: unknown } } {
        const error: { code: string; message: string; details?: unknown } = {
            code: this.code,
            message: this.message
        };
        if (this.details !== undefined) {
            error.details = this.details;
        }
        return { error };
    }
}

/** The request could not be built; nothing was sent. */
export class InvalidRequestError extends FxError {
    constructor(message: string, options?: FxErrorOptions) {
        super(FX_ERROR_CODES.INVALID_REQUEST, message, options);
        this.name = 'InvalidRequestError';
    }
}

/** The service answered with a status other than 200. */
export class RemoteError extends FxError {
    readonly status: number;

    constructor(status: number, options?: FxErrorOptions) {
        super(FX_ERROR_CODES.REMOTE_ERROR, `Exchange rate service responded with status ${status}.`, options);
        this.name = 'RemoteError';
        this.status = status;
    }
}

/** The connection failed, or the body could not be read. */
export class TransportError extends FxError {
    constructor(message: string, options?: FxErrorOptions) {
        super(FX_ERROR_CODES.TRANSPORT_ERROR, message, options);
        this.name = 'TransportError';
    }
}

export class ConfigurationError extends FxError {
    constructor(message: string, options?: FxErrorOptions) {
        super(FX_ERROR_CODES.CONFIGURATION_ERROR, message, options);
        this.name = 'ConfigurationError';
    }
}

export class RateNotFoundError extends FxError {
    readonly currency: string;

    constructor(currency: string) {
        super(FX_ERROR_CODES.RATE_NOT_FOUND, `No exchange rate available for ${currency}.`);
        this.name = 'RateNotFoundError';
        this.currency = currency;
    }
}

export function isFxError(error: unknown): error is FxError {
    return error instanceof FxError;
}
