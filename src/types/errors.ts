import { AnomalyCode } from './index';

export class IndexerError extends Error {
    public readonly details: Record<string, unknown>;

    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = 'IndexerError';
        this.details = details;
    }
}

/**
 * Timeout, refused connection, HTTP 5xx/429 or a retryable JSON-RPC error.
 */
export class TransientRpcError extends IndexerError {
    public readonly endpoint: string;
    public readonly method: string;

    constructor(endpoint: string, method: string, reason: string, cause?: unknown) {
        super(`Transient RPC failure on ${endpoint} (${method}): ${reason}`, { endpoint, method, reason });
        this.name = 'TransientRpcError';
        this.endpoint = endpoint;
        this.method = method;
        this.cause = cause;
    }
}

/**
 * The endpoint answered, but with an error that retrying will not change.
 */
export class RpcResponseError extends IndexerError {
    public readonly endpoint: string;
    public readonly method: string;
    public readonly errorName: string;
    public readonly causeName: string | undefined;

    constructor(endpoint: string, method: string, errorName: string, causeName?: string, message?: string) {
        super(
            `RPC ${method} on ${endpoint} failed with ${errorName}${causeName ? `/${causeName}` : ''}${message ? `: ${message}` : ''}`,
            { endpoint, method, errorName, causeName }
        );
        this.name = 'RpcResponseError';
        this.endpoint = endpoint;
        this.method = method;
        this.errorName = errorName;
        this.causeName = causeName;
    }
}

export class RpcExhaustedError extends IndexerError {
    public readonly method: string;
    public readonly attempts: number;

    constructor(method: string, attempts: number, lastError: unknown) {
        super(
            `RPC ${method} failed on every endpoint after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
            { method, attempts }
        );
        this.name = 'RpcExhaustedError';
        this.method = method;
        this.attempts = attempts;
        this.cause = lastError;
    }
}

export class MalformedDataError extends IndexerError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'MalformedDataError';
    }
}

export class ConsistencyError extends IndexerError {
    public readonly code: AnomalyCode;

    constructor(code: AnomalyCode, message: string, details: Record<string, unknown> = {}) {
        super(message, { code, ...details });
        this.name = 'ConsistencyError';
        this.code = code;
    }
}

export class PersistenceError extends IndexerError {
    constructor(operation: string, cause: unknown) {
        super(
            `Persistence operation ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
            { operation }
        );
        this.name = 'PersistenceError';
        this.cause = cause;
    }
}

export class CheckpointIntegrityError extends IndexerError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'CheckpointIntegrityError';
    }
}

export class ConfigurationError extends IndexerError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class SyncCancelledError extends IndexerError {
    constructor(message = 'Sync pass cancelled') {
        super(message);
        this.name = 'SyncCancelledError';
    }
}

/**
 * Raised by API handlers for invalid query or path parameters.
 */
export class RequestValidationError extends IndexerError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, details);
        this.name = 'RequestValidationError';
    }
}

export class NotFoundError extends IndexerError {
    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}
