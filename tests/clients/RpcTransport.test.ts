import axios, { AxiosError, AxiosHeaders, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, test } from 'vitest';
import { classifyRpcErrorBody, classifyTransportError, JsonRpcTransport } from '../../src/clients/RpcTransport';
import { RpcResponseError, TransientRpcError } from '../../src/types/errors';

const URL = 'http://rpc.test';

function httpError(status: number, data: unknown = {}): AxiosError {
    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, {
        status,
        statusText: '',
        headers: {},
        config,
        data
    });
}

function transportAnswering(data: unknown, sent: unknown[] = []): JsonRpcTransport {
    const client = axios.create({
        adapter: async config => {
            sent.push(JSON.parse(String(config.data)));
            return { data, status: 200, statusText: 'OK', headers: {}, config };
        }
    });
    return new JsonRpcTransport(URL, 1000, client);
}

describe('RpcTransport', () => {
    describe('classifyRpcErrorBody', () => {
        test('should keep a missing block as a response error', () => {
            const error = classifyRpcErrorBody(URL, 'block', {
                name: 'HANDLER_ERROR',
                cause: { name: 'UNKNOWN_BLOCK' },
                data: 'DB Not Found Error'
            });

            expect(error).toBeInstanceOf(RpcResponseError);
            if (error instanceof RpcResponseError) {
                expect(error.errorName).toBe('HANDLER_ERROR');
                expect(error.causeName).toBe('UNKNOWN_BLOCK');
            }
        });

        test('should treat node timeouts and internal errors as transient', () => {
            expect(classifyRpcErrorBody(URL, 'block', { name: 'HANDLER_ERROR', cause: { name: 'TIMEOUT_ERROR' } }))
                .toBeInstanceOf(TransientRpcError);
            expect(classifyRpcErrorBody(URL, 'block', { name: 'INTERNAL_ERROR' })).toBeInstanceOf(TransientRpcError);
        });
    });

    describe('classifyTransportError', () => {
        test('should treat timeouts and server errors as transient', () => {
            expect(classifyTransportError(URL, 'block', new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED')))
                .toBeInstanceOf(TransientRpcError);
            expect(classifyTransportError(URL, 'block', httpError(503))).toBeInstanceOf(TransientRpcError);
            expect(classifyTransportError(URL, 'block', httpError(429))).toBeInstanceOf(TransientRpcError);
        });

        test('should read the JSON-RPC error of a client error response', () => {
            const error = classifyTransportError(URL, 'block', httpError(400, { error: { name: 'REQUEST_VALIDATION_ERROR' } }));

            expect(error).toBeInstanceOf(RpcResponseError);
            if (error instanceof RpcResponseError) {
                expect(error.errorName).toBe('REQUEST_VALIDATION_ERROR');
            }
        });

        test('should name bare client errors by status', () => {
            const error = classifyTransportError(URL, 'block', httpError(404, 'not found'));

            expect(error).toBeInstanceOf(RpcResponseError);
            if (error instanceof RpcResponseError) {
                expect(error.errorName).toBe('HTTP_404');
            }
        });
    });

    describe('JsonRpcTransport', () => {
        test('should post a JSON-RPC envelope and return the result', async () => {
            const sent: unknown[] = [];
            const transport = transportAnswering({ jsonrpc: '2.0', id: 'indexer-1', result: { ok: true } }, sent);

            const result = await transport.request('block', { block_id: 5 });

            expect(result).toEqual({ ok: true });
            expect(sent).toEqual([{ jsonrpc: '2.0', id: 'indexer-1', method: 'block', params: { block_id: 5 } }]);
        });

        test('should raise the classified error member', async () => {
            const transport = transportAnswering({ jsonrpc: '2.0', id: 'indexer-1', error: { name: 'HANDLER_ERROR', cause: { name: 'UNKNOWN_BLOCK' } } });

            await expect(transport.request('block', { block_id: 5 })).rejects.toBeInstanceOf(RpcResponseError);
        });

        test('should treat a body without result as transient', async () => {
            await expect(transportAnswering('<html>bad gateway</html>').request('block', {})).rejects.toBeInstanceOf(TransientRpcError);
            await expect(transportAnswering({ jsonrpc: '2.0' }).request('block', {})).rejects.toBeInstanceOf(TransientRpcError);
        });

        test('should treat a refused connection as transient', async () => {
            const client = axios.create({
                adapter: async config => {
                    throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
                }
            });
            const transport = new JsonRpcTransport(URL, 1000, client);

            await expect(transport.request('block', {})).rejects.toBeInstanceOf(TransientRpcError);
        });
    });
});
