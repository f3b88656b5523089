import express from 'express';
import { Server } from 'http';
import { Repositories } from '../database/repositories/interfaces';
import { DelegatorController, EpochController, GatewayHealthSource, SyncController, ValidatorController } from './controllers/indexer';
import { createIndexerRouter } from './routes/v1/indexer';
import { compressionMiddleware, corsMiddleware } from './middleware';
import { errorHandler, notFoundHandler } from './errorHandlers';
import { logger } from '../utils/logger';

export interface ApiDependencies {
    repositories: Repositories;
    validatorAccountId: string;
    gateway?: GatewayHealthSource;
}

/**
 * Read-only query API over the indexed collections.
 */
export function createApp(deps: ApiDependencies): express.Express {
    const app = express();
    app.set('trust proxy', ['loopback', 'linklocal', 'uniquelocal']);

    app.use(corsMiddleware);
    app.use(compressionMiddleware);
    app.use(express.json());

    const { repositories, validatorAccountId } = deps;
    app.use('/api/v1', createIndexerRouter({
        sync: new SyncController(repositories.epochSync, deps.gateway ?? null),
        delegators: new DelegatorController(repositories.delegators, repositories.transactions, validatorAccountId),
        validator: new ValidatorController(repositories.validators, validatorAccountId),
        epochs: new EpochController(repositories.epochData, validatorAccountId)
    }));

    app.get('/', (_req, res) => {
        res.json({ message: 'NEAR pool indexer API', validatorAccountId });
    });

    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
}

export function startApiServer(deps: ApiDependencies, port: number): Promise<Server> {
    const app = createApp(deps);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            logger.info(`[API] Server running at http://localhost:${port}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}
