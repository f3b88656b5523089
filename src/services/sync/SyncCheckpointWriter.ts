import { IEpochSyncRepository } from '../../database/repositories/interfaces';
import { PersistenceRetryPolicy, withPersistenceRetry } from '../../database/retry';
import { EpochSyncState, PlannedRange } from '../../types';
import { CheckpointIntegrityError } from '../../types/errors';
import { logger } from '../../utils/logger';

/**
 * Appends a checkpoint once a range is fully processed. A checkpoint must not
 * overlap an existing one and must follow an existing one (or the genesis
 * start height) without a gap.
 */
export class SyncCheckpointWriter {
    private readonly repository: IEpochSyncRepository;
    private readonly genesisStartHeight: number;
    private readonly retryPolicy: PersistenceRetryPolicy;
    private readonly now: () => Date;

    public constructor(
        repository: IEpochSyncRepository,
        genesisStartHeight: number,
        retryPolicy: PersistenceRetryPolicy,
        now: () => Date = () => new Date()
    ) {
        this.repository = repository;
        this.genesisStartHeight = genesisStartHeight;
        this.retryPolicy = retryPolicy;
        this.now = now;
    }

    public async record(range: PlannedRange, epochId: string, signal?: AbortSignal): Promise<EpochSyncState> {
        const existing = await withPersistenceRetry('load checkpoints', () => this.repository.findAll(), this.retryPolicy, signal);

        const overlapping = existing.find(cp => cp.startBlock <= range.endBlock && cp.endBlock >= range.startBlock);
        if (overlapping) {
            throw new CheckpointIntegrityError(
                `Range [${range.startBlock}, ${range.endBlock}] overlaps checkpoint [${overlapping.startBlock}, ${overlapping.endBlock}]`,
                { range, overlapping }
            );
        }

        const contiguous = range.startBlock === this.genesisStartHeight
            || existing.some(cp => cp.endBlock === range.startBlock - 1);
        if (!contiguous) {
            throw new CheckpointIntegrityError(
                `Range [${range.startBlock}, ${range.endBlock}] does not follow any checkpoint`,
                { range }
            );
        }

        const state: EpochSyncState = {
            startBlock: range.startBlock,
            endBlock: range.endBlock,
            epoch: range.epoch,
            epochId,
            timestamp: this.now()
        };
        const result = await withPersistenceRetry('record checkpoint', () => this.repository.insert(state), this.retryPolicy, signal);
        if (result === 'duplicate') {
            return this.confirmDuplicate(state, signal);
        }
        logger.info(`[SyncCheckpointWriter] Checkpointed [${state.startBlock}, ${state.endBlock}] (epoch ${state.epoch})`);
        return state;
    }

    /**
     * An attempt whose acknowledgement was lost may have stored the checkpoint
     * already; that is only accepted when the stored range is the same.
     */
    private async confirmDuplicate(state: EpochSyncState, signal?: AbortSignal): Promise<EpochSyncState> {
        const stored = await withPersistenceRetry('load checkpoints', () => this.repository.findAll(), this.retryPolicy, signal);
        const match = stored.find(cp => cp.startBlock === state.startBlock);
        if (!match || match.endBlock !== state.endBlock) {
            throw new CheckpointIntegrityError(
                `A different checkpoint already starts at ${state.startBlock}`,
                { range: { startBlock: state.startBlock, endBlock: state.endBlock }, stored: match ?? null }
            );
        }
        logger.warn(`[SyncCheckpointWriter] Checkpoint [${state.startBlock}, ${state.endBlock}] was already recorded`);
        return match;
    }
}
