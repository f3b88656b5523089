import express from 'express';
import { asyncHandler } from '../../middleware/asyncHandler';
import { DelegatorController, EpochController, SyncController, ValidatorController } from '../../controllers/indexer';

export interface IndexerControllers {
    sync: SyncController;
    delegators: DelegatorController;
    validator: ValidatorController;
    epochs: EpochController;
}

export function createIndexerRouter(controllers: IndexerControllers): express.Router {
    const router = express.Router();

    router.get('/sync/status', asyncHandler(controllers.sync.getStatus));
    router.get('/delegators/:delegatorId', asyncHandler(controllers.delegators.getDelegator));
    router.get('/transactions', asyncHandler(controllers.delegators.getTransactions));
    router.get('/validator/metrics', asyncHandler(controllers.validator.getMetrics));
    router.get('/validator/performance', asyncHandler(controllers.validator.getPerformance));
    router.get('/epochs/:epoch', asyncHandler(controllers.epochs.getEpoch));

    return router;
}
