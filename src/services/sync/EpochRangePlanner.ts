import { ChainClient } from '../../clients/NearClient';
import { IEpochSyncRepository } from '../../database/repositories/interfaces';
import { EpochSyncState, PlannedRange } from '../../types';
import { CheckpointIntegrityError } from '../../types/errors';
import { logger } from '../../utils/logger';
import { EpochGrid, epochOf } from './epochGrid';

export type PlanResult =
    | { kind: 'idle'; nextStart: number; head: number }
    | { kind: 'range'; range: PlannedRange; head: number };

export interface ResumePoint {
    start: number;
    // last height before the next checkpoint when `start` opens a gap
    limit: number | null;
}

/**
 * First height not covered by the checkpoints (sorted by start block). A gap
 * between two checkpoints is returned before the tail; overlapping
 * checkpoints are an integrity failure.
 */
export function findResumePoint(checkpoints: readonly EpochSyncState[], genesisStartHeight: number): ResumePoint {
    let expected = genesisStartHeight;

    for (const checkpoint of checkpoints) {
        if (checkpoint.endBlock < genesisStartHeight) {
            continue;
        }
        if (checkpoint.startBlock > expected) {
            return { start: expected, limit: checkpoint.startBlock - 1 };
        }
        if (checkpoint.startBlock < expected && expected > genesisStartHeight) {
            throw new CheckpointIntegrityError(
                `Checkpoint [${checkpoint.startBlock}, ${checkpoint.endBlock}] overlaps blocks already checkpointed up to ${expected - 1}`,
                { startBlock: checkpoint.startBlock, endBlock: checkpoint.endBlock, coveredUpTo: expected - 1 }
            );
        }
        expected = checkpoint.endBlock + 1;
    }

    return { start: expected, limit: null };
}

/**
 * Decides the next block range to sync from the persisted checkpoints and
 * the finalized chain head.
 */
export class EpochRangePlanner {
    private readonly client: Pick<ChainClient, 'getLatestBlockHeight'>;
    private readonly checkpoints: IEpochSyncRepository;
    private readonly grid: EpochGrid;

    public constructor(client: Pick<ChainClient, 'getLatestBlockHeight'>, checkpoints: IEpochSyncRepository, grid: EpochGrid) {
        this.client = client;
        this.checkpoints = checkpoints;
        this.grid = grid;
    }

    public async plan(signal?: AbortSignal): Promise<PlanResult> {
        const checkpoints = await this.checkpoints.findAll();
        const resume = findResumePoint(checkpoints, this.grid.genesisStartHeight);
        if (resume.limit !== null) {
            logger.warn(`[EpochRangePlanner] Gap detected: blocks [${resume.start}, ${resume.limit}] were never checkpointed`);
        }

        const head = await this.client.getLatestBlockHeight(signal);
        if (resume.start > head) {
            logger.debug(`[EpochRangePlanner] Nothing to sync: next start ${resume.start} is beyond head ${head}`);
            return { kind: 'idle', nextStart: resume.start, head };
        }

        const bounds = epochOf(resume.start, this.grid);
        const endBlock = Math.min(bounds.endBlock, head, resume.limit ?? Number.POSITIVE_INFINITY);
        const range: PlannedRange = {
            startBlock: resume.start,
            endBlock,
            epoch: bounds.epoch,
            epochStartBlock: bounds.startBlock,
            epochEndBlock: bounds.endBlock,
            completesEpoch: endBlock === bounds.endBlock
        };

        logger.info(`[EpochRangePlanner] Planned [${range.startBlock}, ${range.endBlock}] of epoch ${range.epoch} (head ${head})`);
        return { kind: 'range', range, head };
    }
}
