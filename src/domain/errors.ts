export type ErrorCode =
    | 'EMPTY_IDENTIFIER'
    | 'VALIDATION_ERROR'
    | 'MISSING_CREDENTIAL'
    | 'NETWORK_ERROR'
    | 'TIMEOUT'
    | 'API_ERROR'
    | 'FLATTEN_FAILED'
    | 'UNKNOWN';
export class LookupError extends Error {
    public readonly code: ErrorCode;
    public readonly service: string;
    public readonly retryable: boolean;
    public readonly statusCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(opts: {
        message: string;
        code: ErrorCode;
        service?: string;
        retryable?: boolean;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super(opts.message);
        this.name = 'LookupError';
        this.code = opts.code;
        this.service = opts.service ?? 'shipment-lookup';
        this.retryable = opts.retryable ?? false;
        this.statusCode = opts.statusCode;
        this.details = opts.details;
        if (opts.cause) {
            this.cause = opts.cause;
        }
    }
    toJSON() {
        return {
            error: {
                code: this.code,
                message: this.message,
                service: this.service,
                retryable: this.retryable,
                ...(this.statusCode ? { statusCode: this.statusCode } : {}),
                ...(this.details ? { details: this.details } : {}),
            },
        };
    }
}

export class EmptyIdentifierError extends LookupError {
    constructor() {
        super({
            message: 'Enter a valid unique_id.',
            code: 'EMPTY_IDENTIFIER',
            retryable: false,
        });
        this.name = 'EmptyIdentifierError';
    }
}

export class ValidationError extends LookupError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({
            message,
            code: 'VALIDATION_ERROR',
            retryable: false,
            details,
        });
        this.name = 'ValidationError';
    }
}

export class MissingCredentialError extends LookupError {
    constructor(service: string) {
        super({
            message: `Missing authentication token for ${service}. Pass --token or set SHIPSTREAM_AUTH_TOKEN.`,
            code: 'MISSING_CREDENTIAL',
            service,
            retryable: false,
        });
        this.name = 'MissingCredentialError';
    }
}

export class NetworkError extends LookupError {
    constructor(service: string, message: string, cause?: Error) {
        super({
            message,
            code: 'NETWORK_ERROR',
            service,
            retryable: true,
            cause,
        });
        this.name = 'NetworkError';
    }
}

export class TimeoutError extends LookupError {
    constructor(service: string, timeoutMs: number) {
        super({
            message: `Request to ${service} timed out after ${timeoutMs}ms`,
            code: 'TIMEOUT',
            service,
            retryable: true,
        });
        this.name = 'TimeoutError';
    }
}

/** HTTP status >= 400. Carried on the report rather than thrown, so the raw body still renders. */
export class ApiError extends LookupError {
    constructor(service: string, statusCode: number, body?: unknown) {
        super({
            message: `${service} API responded with an error (HTTP ${statusCode})`,
            code: 'API_ERROR',
            service,
            statusCode,
            retryable: statusCode >= 500,
            details: body === undefined ? undefined : { body },
        });
        this.name = 'ApiError';
    }
}

export class FlattenError extends LookupError {
    constructor(message: string, cause?: Error) {
        super({
            message,
            code: 'FLATTEN_FAILED',
            retryable: false,
            cause,
        });
        this.name = 'FlattenError';
    }
}
