import axios, { AxiosInstance } from 'axios';
import { RpcResponseError, TransientRpcError } from '../types/errors';

export type RpcParams = Record<string, unknown> | unknown[];

/**
 * One JSON-RPC endpoint. Implementations throw TransientRpcError for failures
 * worth retrying and RpcResponseError for everything else.
 */
export interface RpcTransport {
    readonly url: string;
    request(method: string, params: RpcParams): Promise<unknown>;
}

// NEAR error names and causes that are worth retrying on the same or another endpoint
const TRANSIENT_ERROR_NAMES = new Set(['INTERNAL_ERROR']);
const TRANSIENT_CAUSE_NAMES = new Set(['TIMEOUT_ERROR', 'INTERNAL_ERROR', 'NO_SYNCED_BLOCKS', 'NOT_SYNCED_YET']);
const TRANSIENT_NETWORK_CODES = new Set([
    'ECONNABORTED', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE', 'ERR_NETWORK'
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Maps a JSON-RPC `error` member to a typed error.
 */
export function classifyRpcErrorBody(url: string, method: string, body: Record<string, unknown>): TransientRpcError | RpcResponseError {
    const errorName = typeof body.name === 'string' ? body.name : 'UNKNOWN_ERROR';
    const causeName = isRecord(body.cause) && typeof body.cause.name === 'string' ? body.cause.name : undefined;
    const message = typeof body.data === 'string'
        ? body.data
        : typeof body.message === 'string' ? body.message : undefined;

    if (TRANSIENT_ERROR_NAMES.has(errorName) || (causeName && TRANSIENT_CAUSE_NAMES.has(causeName))) {
        return new TransientRpcError(url, method, `${errorName}${causeName ? `/${causeName}` : ''}${message ? `: ${message}` : ''}`);
    }
    return new RpcResponseError(url, method, errorName, causeName, message);
}

/**
 * Maps an axios failure (thrown before or instead of a JSON-RPC body) to a typed error.
 */
export function classifyTransportError(url: string, method: string, error: unknown): TransientRpcError | RpcResponseError {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === undefined) {
            // No response at all: timeout, refused or dropped connection
            const code = error.code ?? 'ERR_NETWORK';
            const reason = TRANSIENT_NETWORK_CODES.has(code) ? code : `${code} (unrecognised)`;
            return new TransientRpcError(url, method, `${reason}: ${error.message}`, error);
        }
        if (status >= 500 || status === 429 || status === 408) {
            return new TransientRpcError(url, method, `HTTP ${status}`, error);
        }
        const data: unknown = error.response?.data;
        if (isRecord(data) && isRecord(data.error)) {
            return classifyRpcErrorBody(url, method, data.error);
        }
        return new RpcResponseError(url, method, `HTTP_${status}`, undefined, error.message);
    }
    return new TransientRpcError(url, method, error instanceof Error ? error.message : String(error), error);
}

/**
 * JSON-RPC 2.0 transport over axios.
 */
export class JsonRpcTransport implements RpcTransport {
    public readonly url: string;
    private readonly client: AxiosInstance;
    private requestId = 0;

    public constructor(url: string, timeoutMs: number = 30000, client?: AxiosInstance) {
        this.url = url;
        this.client = client ?? axios.create({
            timeout: timeoutMs,
            headers: {
                'Accept': 'application/json',
                'Content-Type': 'application/json'
            }
        });
    }

    public async request(method: string, params: RpcParams): Promise<unknown> {
        let data: unknown;
        try {
            const response = await this.client.post(this.url, {
                jsonrpc: '2.0',
                id: `indexer-${++this.requestId}`,
                method,
                params
            });
            data = response.data;
        } catch (error) {
            throw classifyTransportError(this.url, method, error);
        }

        if (!isRecord(data)) {
            throw new TransientRpcError(this.url, method, 'Response body is not a JSON object');
        }
        if (isRecord(data.error)) {
            throw classifyRpcErrorBody(this.url, method, data.error);
        }
        if (!('result' in data)) {
            throw new TransientRpcError(this.url, method, 'Response has neither result nor error');
        }
        return data.result;
    }
}
