import dotenv from 'dotenv';
import { Server } from 'http';
import { IndexerConfig, loadConfig } from './config';
import { Database } from './database';
import { setupIndexes } from './database/setup';
import { mongoRepositories } from './database/repositories';
import { JsonRpcTransport } from './clients/RpcTransport';
import { RpcGateway } from './clients/RpcGateway';
import { NearClient } from './clients/NearClient';
import { StakingTransactionParser } from './services/staking/StakingTransactionParser';
import { EpochRangePlanner } from './services/sync/EpochRangePlanner';
import { BatchFetcher } from './services/sync/BatchFetcher';
import { SyncCheckpointWriter } from './services/sync/SyncCheckpointWriter';
import { SyncEngine } from './services/sync/SyncEngine';
import { SyncScheduler } from './services/sync/SyncScheduler';
import { DelegatorLedger } from './services/ledger/DelegatorLedger';
import { ValidatorMetricsCalculator } from './services/metrics/ValidatorMetricsCalculator';
import { EpochDataService } from './services/epoch/EpochDataService';
import { startApiServer } from './api/server';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

interface Indexer {
    scheduler: SyncScheduler;
    gateway: RpcGateway;
}

function createIndexer(config: IndexerConfig): Indexer {
    const repositories = mongoRepositories();

    const gateway = new RpcGateway(
        [
            new JsonRpcTransport(config.rpc.primaryUrl, config.rpc.timeoutMs),
            new JsonRpcTransport(config.rpc.secondaryUrl, config.rpc.timeoutMs)
        ],
        config.rpc
    );
    const client = new NearClient(gateway);
    const grid = { genesisStartHeight: config.genesisStartHeight, epochBlocks: config.epochBlocks };

    const engine = new SyncEngine(
        {
            gateway,
            client,
            planner: new EpochRangePlanner(client, repositories.epochSync, grid),
            fetcher: new BatchFetcher(client, new StakingTransactionParser(config.validatorAccountId), {
                batchSize: config.batchSize,
                parallelLimit: config.parallelLimit
            }),
            ledger: new DelegatorLedger(repositories.delegators, repositories.transactions),
            calculator: new ValidatorMetricsCalculator(client, {
                validatorAccountId: config.validatorAccountId,
                epochsPerYear: config.epochsPerYear,
                apyCompounding: config.apyCompounding
            }),
            checkpointWriter: new SyncCheckpointWriter(repositories.epochSync, config.genesisStartHeight, config.persistence),
            epochData: new EpochDataService(repositories, config.validatorAccountId),
            repositories
        },
        {
            validatorAccountId: config.validatorAccountId,
            delegatorBatchSize: config.delegatorBatchSize,
            persistence: config.persistence
        }
    );

    return { scheduler: new SyncScheduler(engine, config.sync), gateway };
}

async function start(): Promise<void> {
    logger.info('Starting NEAR pool indexer...');

    let config: IndexerConfig;
    const database = Database.getInstance();
    try {
        config = loadConfig();
        await database.connect({ uri: config.mongoUri, dbName: config.dbName });
        await setupIndexes();
    } catch (error) {
        logger.logError(error, 'Startup');
        process.exit(1);
    }

    logger.info(`Indexing pool ${config.validatorAccountId} from height ${config.genesisStartHeight}`);
    const { scheduler, gateway } = createIndexer(config);

    let server: Server | null = null;
    if (config.api.enabled) {
        server = await startApiServer({ repositories: mongoRepositories(), validatorAccountId: config.validatorAccountId, gateway }, config.api.port);
    }

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info(`${signal} signal received. Starting graceful shutdown...`);
        try {
            await scheduler.stop();
            if (server) {
                const closing = server;
                await new Promise<void>((resolve, reject) => closing.close(err => (err ? reject(err) : resolve())));
            }
            await database.disconnect();
            logger.info('Shutdown complete');
            process.exit(0);
        } catch (error) {
            logger.logError(error, 'Shutdown');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => {
        shutdown('SIGTERM').catch(error => logger.logError(error, 'Shutdown'));
    });
    process.on('SIGINT', () => {
        shutdown('SIGINT').catch(error => logger.logError(error, 'Shutdown'));
    });

    scheduler.start();
}

start().catch(error => {
    logger.logError(error, 'Startup');
    process.exit(1);
});
