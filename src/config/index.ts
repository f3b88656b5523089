import { ConfigurationError } from '../types/errors';

export type ApyCompounding = 'simple' | 'compound';

export interface RetryPolicy {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface RpcConfig extends RetryPolicy {
    primaryUrl: string;
    secondaryUrl: string;
    timeoutMs: number;
    failureThreshold: number;
    cooldownMs: number;
}

export interface IndexerConfig {
    validatorAccountId: string;
    rpc: RpcConfig;
    parallelLimit: number;
    batchSize: number;
    epochBlocks: number;
    delegatorBatchSize: number;
    genesisStartHeight: number;
    epochsPerYear: number;
    apyCompounding: ApyCompounding;
    mongoUri: string;
    dbName: string;
    persistence: {
        maxRetries: number;
        retryDelayMs: number;
    };
    sync: {
        cron: string;
        failureBackoffMs: number;
        maxFailureBackoffMs: number;
    };
    api: {
        enabled: boolean;
        port: number;
    };
}

type Env = Record<string, string | undefined>;

function getRequired(env: Env, key: string): string {
    const value = env[key]?.trim();
    if (!value) {
        throw new ConfigurationError(`${key} must be set`);
    }
    return value;
}

// Environment variable parsing with defaults
function getEnvNumber(env: Env, key: string, defaultValue: number, min = 1): number {
    const value = env[key]?.trim();
    if (!value) return defaultValue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed < min) {
        throw new ConfigurationError(`${key} must be an integer >= ${min}, got "${value}"`);
    }
    return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
    const value = env[key]?.trim().toLowerCase();
    if (!value) return defaultValue;
    return value === 'true' || value === '1';
}

function getApyCompounding(env: Env): ApyCompounding {
    const value = env.APY_COMPOUNDING?.trim().toLowerCase() || 'simple';
    if (value !== 'simple' && value !== 'compound') {
        throw new ConfigurationError(`APY_COMPOUNDING must be "simple" or "compound", got "${value}"`);
    }
    return value;
}

function getUrl(env: Env, key: string): string {
    const value = getRequired(env, key);
    if (!/^https?:\/\//.test(value)) {
        throw new ConfigurationError(`${key} must be an http(s) URL, got "${value}"`);
    }
    return value;
}

/**
 * Reads and validates the indexer configuration.
 * Throws ConfigurationError on a missing or invalid value.
 */
export function loadConfig(env: Env = process.env): IndexerConfig {
    const failureBackoffMs = getEnvNumber(env, 'SYNC_FAILURE_BACKOFF_MS', 60000);

    return Object.freeze({
        validatorAccountId: getRequired(env, 'VALIDATOR_ACCOUNT_ID'),
        rpc: {
            primaryUrl: getUrl(env, 'PRIMARY_RPC'),
            secondaryUrl: getUrl(env, 'SECONDARY_RPC'),
            timeoutMs: getEnvNumber(env, 'RPC_TIMEOUT_MS', 30000),
            maxRetries: getEnvNumber(env, 'RPC_MAX_RETRIES', 3, 0),
            baseDelayMs: getEnvNumber(env, 'RPC_RETRY_BASE_DELAY_MS', 1000, 0),
            maxDelayMs: getEnvNumber(env, 'RPC_RETRY_MAX_DELAY_MS', 16000, 0),
            failureThreshold: getEnvNumber(env, 'RPC_FAILURE_THRESHOLD', 5),
            cooldownMs: getEnvNumber(env, 'RPC_COOLDOWN_MS', 60000, 0)
        },
        parallelLimit: getEnvNumber(env, 'PARALLEL_LIMIT', 35),
        batchSize: getEnvNumber(env, 'BATCH_SIZE', 10),
        epochBlocks: getEnvNumber(env, 'EPOCH_BLOCKS', 43200),
        delegatorBatchSize: getEnvNumber(env, 'DELEGATOR_BATCH_SIZE', 1000),
        genesisStartHeight: getEnvNumber(env, 'GENESIS_START_HEIGHT', 9820210, 0),
        epochsPerYear: getEnvNumber(env, 'EPOCHS_PER_YEAR', 730),
        apyCompounding: getApyCompounding(env),
        mongoUri: getRequired(env, 'MONGO_URI'),
        dbName: getRequired(env, 'DB_NAME'),
        persistence: {
            maxRetries: getEnvNumber(env, 'PERSISTENCE_MAX_RETRIES', 3),
            retryDelayMs: getEnvNumber(env, 'PERSISTENCE_RETRY_DELAY_MS', 2000, 0)
        },
        sync: {
            cron: env.SYNC_CRON?.trim() || '*/30 * * * * *',
            failureBackoffMs,
            maxFailureBackoffMs: Math.max(failureBackoffMs, 10 * 60 * 1000)
        },
        api: {
            enabled: getEnvBoolean(env, 'API_ENABLED', false),
            port: getEnvNumber(env, 'PORT', 3000)
        }
    });
}
