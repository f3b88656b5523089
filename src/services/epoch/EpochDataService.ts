import { Repositories } from '../../database/repositories/interfaces';
import { EpochDataRecord } from '../../types';
import { logger } from '../../utils/logger';

type EpochDataRepositories = Pick<Repositories, 'delegators' | 'transactions' | 'epochSync' | 'epochData'>;

export interface EpochSpan {
    epoch: number;
    epochId: string;
    startBlock: number;
    endBlock: number;
}

/**
 * Maintains the `epoch_data` rollup, which is derived entirely from the
 * delegators, transactions and epoch_sync collections.
 */
export class EpochDataService {
    private readonly repositories: EpochDataRepositories;
    private readonly validatorAccountId: string;
    private readonly now: () => Date;

    constructor(repositories: EpochDataRepositories, validatorAccountId: string, now: () => Date = () => new Date()) {
        this.repositories = repositories;
        this.validatorAccountId = validatorAccountId;
        this.now = now;
    }

    async build(span: EpochSpan): Promise<EpochDataRecord> {
        const [delegators, transactions] = await Promise.all([
            this.repositories.delegators.findByEpoch(this.validatorAccountId, span.epoch),
            this.repositories.transactions.findByBlockRange(span.startBlock, span.endBlock)
        ]);

        const record: EpochDataRecord = {
            epoch: span.epoch,
            epochId: span.epochId,
            validatorAccountId: this.validatorAccountId,
            startBlockHeight: span.startBlock,
            endBlockHeight: span.endBlock,
            timestamp: this.now(),
            delegators,
            transactions
        };
        await this.repositories.epochData.upsert(record);

        logger.info(`[EpochDataService] Epoch ${span.epoch} rollup saved (${delegators.length} delegators, ${transactions.length} transactions)`);
        return record;
    }

    /**
     * Rebuilds one epoch from its checkpoints; null when the epoch was never checkpointed.
     */
    async rebuild(epoch: number): Promise<EpochDataRecord | null> {
        const checkpoints = await this.repositories.epochSync.findByEpoch(epoch);
        if (checkpoints.length === 0) {
            logger.warn(`[EpochDataService] Epoch ${epoch} has no checkpoints, nothing to rebuild`);
            return null;
        }

        return this.build({
            epoch,
            epochId: checkpoints[checkpoints.length - 1].epochId,
            startBlock: Math.min(...checkpoints.map(cp => cp.startBlock)),
            endBlock: Math.max(...checkpoints.map(cp => cp.endBlock))
        });
    }

    /**
     * Rebuilds every checkpointed epoch. Returns the number of rollups written.
     */
    async rebuildAll(): Promise<number> {
        const checkpoints = await this.repositories.epochSync.findAll();
        const epochs = [...new Set(checkpoints.map(cp => cp.epoch))].sort((a, b) => a - b);
        let rebuilt = 0;
        for (const epoch of epochs) {
            if (await this.rebuild(epoch)) {
                rebuilt++;
            }
        }
        return rebuilt;
    }
}
