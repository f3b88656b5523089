import { Semaphore } from 'async-mutex';
import { ChainClient } from '../../clients/NearClient';
import { StakingTransactionParser } from '../staking/StakingTransactionParser';
import { BlockRange, StakingTransaction } from '../../types';
import { BlockView, ChunkView } from '../../types/near';
import { MalformedDataError, SyncCancelledError } from '../../types/errors';
import { logger } from '../../utils/logger';
import { formatError, throwIfAborted } from '../../utils/util';

export interface BatchFetcherOptions {
    batchSize: number;
    parallelLimit: number;
}

export interface FetchedBlock {
    height: number;
    hash: string;
    epochId: string;
}

export interface SubBatchFailure {
    batch: BlockRange;
    error: Error;
}

export interface FetchResult {
    transactions: StakingTransaction[];
    failures: SubBatchFailure[];
    // epoch id of the lowest fetched block
    epochId: string | null;
    // highest fetched block
    lastBlock: FetchedBlock | null;
    blocksFetched: number;
    skippedHeights: number[];
    peakConcurrency: number;
}

interface SubBatchResult {
    transactions: StakingTransaction[];
    blocks: FetchedBlock[];
    skippedHeights: number[];
}

/**
 * Contiguous sub-batches of at most `batchSize` blocks covering the range.
 */
export function partitionRange(range: BlockRange, batchSize: number): BlockRange[] {
    if (batchSize < 1) {
        throw new RangeError('batchSize must be at least 1');
    }
    const batches: BlockRange[] = [];
    for (let start = range.startBlock; start <= range.endBlock; start += batchSize) {
        batches.push({ startBlock: start, endBlock: Math.min(start + batchSize - 1, range.endBlock) });
    }
    return batches;
}

/**
 * Fetches the blocks of a range in sub-batches, at most `parallelLimit` at a
 * time, and extracts the pool's staking transactions.
 */
export class BatchFetcher {
    private readonly client: ChainClient;
    private readonly parser: StakingTransactionParser;
    private readonly options: BatchFetcherOptions;

    public constructor(client: ChainClient, parser: StakingTransactionParser, options: BatchFetcherOptions) {
        if (options.parallelLimit < 1) {
            throw new RangeError('parallelLimit must be at least 1');
        }
        this.client = client;
        this.parser = parser;
        this.options = options;
    }

    public async fetchRange(range: BlockRange, signal?: AbortSignal): Promise<FetchResult> {
        const batches = partitionRange(range, this.options.batchSize);
        const semaphore = new Semaphore(this.options.parallelLimit);
        let inFlight = 0;
        let peakConcurrency = 0;

        logger.info(`[BatchFetcher] Fetching [${range.startBlock}, ${range.endBlock}] in ${batches.length} sub-batches (limit ${this.options.parallelLimit})`);

        const outcomes = await Promise.all(batches.map(batch => semaphore.runExclusive(async (): Promise<{ batch: BlockRange; result: SubBatchResult } | SubBatchFailure> => {
            throwIfAborted(signal);
            inFlight++;
            peakConcurrency = Math.max(peakConcurrency, inFlight);
            try {
                return { batch, result: await this.fetchSubBatch(batch, signal) };
            } catch (error) {
                if (error instanceof SyncCancelledError) {
                    throw error;
                }
                logger.error(`[BatchFetcher] Sub-batch [${batch.startBlock}, ${batch.endBlock}] failed: ${formatError(error)}`);
                return { batch, error: error instanceof Error ? error : new Error(String(error)) };
            } finally {
                inFlight--;
            }
        })));

        const transactions: StakingTransaction[] = [];
        const failures: SubBatchFailure[] = [];
        const blocks: FetchedBlock[] = [];
        const skippedHeights: number[] = [];

        for (const outcome of outcomes) {
            if ('error' in outcome) {
                failures.push({ batch: outcome.batch, error: outcome.error });
                continue;
            }
            transactions.push(...outcome.result.transactions);
            blocks.push(...outcome.result.blocks);
            skippedHeights.push(...outcome.result.skippedHeights);
        }

        blocks.sort((a, b) => a.height - b.height);
        transactions.sort((a, b) => a.blockHeight - b.blockHeight || a.transactionHash.localeCompare(b.transactionHash));

        return {
            transactions,
            failures,
            epochId: blocks.length > 0 ? blocks[0].epochId : null,
            lastBlock: blocks.length > 0 ? blocks[blocks.length - 1] : null,
            blocksFetched: blocks.length,
            skippedHeights: skippedHeights.sort((a, b) => a - b),
            peakConcurrency
        };
    }

    private async fetchSubBatch(batch: BlockRange, signal?: AbortSignal): Promise<SubBatchResult> {
        const result: SubBatchResult = { transactions: [], blocks: [], skippedHeights: [] };

        for (let height = batch.startBlock; height <= batch.endBlock; height++) {
            throwIfAborted(signal);

            let block: BlockView | null;
            try {
                block = await this.client.getBlock(height, signal);
            } catch (error) {
                if (!(error instanceof MalformedDataError)) {
                    throw error;
                }
                logger.warn(`[BatchFetcher] Skipping malformed block ${height}: ${error.message}`);
                result.skippedHeights.push(height);
                continue;
            }

            if (!block) {
                result.skippedHeights.push(height);
                continue;
            }

            result.blocks.push({ height, hash: block.header.hash, epochId: block.header.epoch_id });
            result.transactions.push(...await this.processBlock(block, signal));
        }

        return result;
    }

    private async processBlock(block: BlockView, signal?: AbortSignal): Promise<StakingTransaction[]> {
        const transactions: StakingTransaction[] = [];
        const height = block.header.height;

        // Chunks not produced at this height repeat an older chunk
        for (const chunkHeader of block.chunks.filter(chunk => chunk.height_included === height)) {
            let chunk: ChunkView;
            try {
                chunk = await this.client.getChunk(chunkHeader.chunk_hash, signal);
            } catch (error) {
                if (!(error instanceof MalformedDataError)) {
                    throw error;
                }
                logger.warn(`[BatchFetcher] Skipping malformed chunk ${chunkHeader.chunk_hash} of block ${height}: ${error.message}`);
                continue;
            }

            for (const call of this.parser.extractCalls(block, chunk)) {
                try {
                    const transaction = await this.parser.resolve(call, this.client, signal);
                    if (transaction) {
                        transactions.push(transaction);
                    }
                } catch (error) {
                    if (!(error instanceof MalformedDataError)) {
                        throw error;
                    }
                    logger.warn(`[BatchFetcher] Skipping transaction ${call.transactionHash}: ${error.message}`);
                }
            }
        }

        return transactions;
    }
}
