import { RetryPolicy } from '../config';
import { RpcExhaustedError, RpcResponseError } from '../types/errors';
import { logger } from '../utils/logger';
import { backoffDelay, formatError, sleep, throwIfAborted } from '../utils/util';
import { RpcParams, RpcTransport } from './RpcTransport';

export interface RpcGatewayOptions extends RetryPolicy {
    // consecutive failures after which an endpoint cools down
    failureThreshold: number;
    cooldownMs: number;
    now?: () => number;
    random?: () => number;
}

export interface EndpointHealth {
    url: string;
    consecutiveFailures: number;
    coolingUntil: number | null;
}

interface EndpointState {
    transport: RpcTransport;
    consecutiveFailures: number;
    coolingUntil: number;
}

/**
 * Retrying, failing-over access to an ordered list of JSON-RPC endpoints.
 *
 * Each endpoint gets the same retry budget (maxRetries retries after the first
 * attempt, exponential backoff with jitter). Once an endpoint has failed
 * `failureThreshold` times in a row it cools down and is skipped until the
 * cooldown ends or the next planning cycle starts.
 */
export class RpcGateway {
    private readonly endpoints: EndpointState[];
    private readonly options: RpcGatewayOptions;
    private readonly now: () => number;

    public constructor(transports: RpcTransport[], options: RpcGatewayOptions) {
        if (transports.length === 0) {
            throw new Error('At least one RPC endpoint must be provided');
        }
        this.endpoints = transports.map(transport => ({
            transport,
            consecutiveFailures: 0,
            coolingUntil: 0
        }));
        this.options = options;
        this.now = options.now ?? Date.now;
    }

    /**
     * Clears endpoint health so a cooled-down primary is tried again.
     */
    public beginCycle(): void {
        for (const endpoint of this.endpoints) {
            if (endpoint.consecutiveFailures > 0 || endpoint.coolingUntil > 0) {
                logger.debug(`[RpcGateway] Resetting health of ${endpoint.transport.url}`);
            }
            endpoint.consecutiveFailures = 0;
            endpoint.coolingUntil = 0;
        }
    }

    public getEndpointHealth(): EndpointHealth[] {
        const now = this.now();
        return this.endpoints.map(endpoint => ({
            url: endpoint.transport.url,
            consecutiveFailures: endpoint.consecutiveFailures,
            coolingUntil: endpoint.coolingUntil > now ? endpoint.coolingUntil : null
        }));
    }

    /**
     * A response error (such as `UNKNOWN_BLOCK` from a node that pruned the
     * height) moves on to the next endpoint without retries. It is rethrown
     * only when every configured endpoint answered with one.
     */
    public async call(method: string, params: RpcParams, signal?: AbortSignal): Promise<unknown> {
        const { maxRetries, baseDelayMs, maxDelayMs } = this.options;
        let attempts = 0;
        let lastError: unknown = null;
        let lastResponse: RpcResponseError | null = null;
        let responses = 0;

        for (const endpoint of this.endpointOrder()) {
            const url = endpoint.transport.url;

            for (let attempt = 0; attempt <= maxRetries; attempt++) {
                throwIfAborted(signal);
                attempts++;
                try {
                    const result = await endpoint.transport.request(method, params);
                    this.markSuccess(endpoint);
                    return result;
                } catch (error) {
                    lastError = error;

                    if (error instanceof RpcResponseError) {
                        // The endpoint is alive; its answer may still differ from an archival node's
                        this.markSuccess(endpoint);
                        lastResponse = error;
                        responses++;
                        logger.debug(`[RpcGateway] ${method} answered ${error.errorName} on ${url}, asking the next endpoint`);
                        break;
                    }

                    this.markFailure(endpoint);

                    if (this.isCooling(endpoint)) {
                        logger.warn(`[RpcGateway] ${url} is cooling down after ${endpoint.consecutiveFailures} consecutive failures`);
                        break;
                    }
                    if (attempt < maxRetries) {
                        const delay = backoffDelay(attempt + 1, baseDelayMs, maxDelayMs, this.options.random);
                        logger.warn(`[RpcGateway] ${method} failed on ${url} (attempt ${attempt + 1}/${maxRetries + 1}): ${formatError(error)}. Retrying in ${delay}ms`);
                        await sleep(delay, signal);
                    }
                }
            }

            if (!(lastError instanceof RpcResponseError)) {
                logger.warn(`[RpcGateway] ${method} exhausted its budget on ${url}, failing over`);
            }
        }

        if (lastResponse && responses === this.endpoints.length) {
            throw lastResponse;
        }

        logger.error(`[RpcGateway] ${method} failed on every endpoint after ${attempts} attempts`);
        throw new RpcExhaustedError(method, attempts, lastError);
    }

    /**
     * Endpoints in configured order, skipping cooling ones unless all are cooling.
     */
    private endpointOrder(): EndpointState[] {
        const available = this.endpoints.filter(endpoint => !this.isCooling(endpoint));
        return available.length > 0 ? available : this.endpoints;
    }

    private isCooling(endpoint: EndpointState): boolean {
        return endpoint.coolingUntil > this.now();
    }

    private markSuccess(endpoint: EndpointState): void {
        endpoint.consecutiveFailures = 0;
        endpoint.coolingUntil = 0;
    }

    private markFailure(endpoint: EndpointState): void {
        endpoint.consecutiveFailures++;
        if (endpoint.consecutiveFailures >= this.options.failureThreshold) {
            endpoint.coolingUntil = this.now() + this.options.cooldownMs;
        }
    }
}
