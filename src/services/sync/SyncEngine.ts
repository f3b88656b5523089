import { v4 as uuidv4 } from 'uuid';
import { ChainClient } from '../../clients/NearClient';
import { Repositories } from '../../database/repositories/interfaces';
import { PersistenceRetryPolicy, withPersistenceRetry } from '../../database/retry';
import { DelegatorSnapshot, EpochSyncState, PlannedRange } from '../../types';
import { PoolAccountView } from '../../types/near';
import { logger } from '../../utils/logger';
import { throwIfAborted } from '../../utils/util';
import { EpochDataService } from '../epoch/EpochDataService';
import { DelegatorLedger, LedgerContext } from '../ledger/DelegatorLedger';
import { ValidatorMetricsCalculator } from '../metrics/ValidatorMetricsCalculator';
import { BatchFetcher, FetchResult } from './BatchFetcher';
import { EpochRangePlanner } from './EpochRangePlanner';
import { SyncCheckpointWriter } from './SyncCheckpointWriter';

// Used when every height of a range was skipped and no block carried an epoch id
export const UNKNOWN_EPOCH_ID = 'unknown';

export interface SyncEngineDependencies {
    gateway: { beginCycle(): void };
    client: ChainClient;
    planner: EpochRangePlanner;
    fetcher: BatchFetcher;
    ledger: DelegatorLedger;
    calculator: ValidatorMetricsCalculator;
    checkpointWriter: SyncCheckpointWriter;
    epochData: EpochDataService;
    repositories: Pick<Repositories, 'transactions' | 'delegators' | 'validators'>;
}

export interface SyncEngineOptions {
    validatorAccountId: string;
    delegatorBatchSize: number;
    persistence: PersistenceRetryPolicy;
}

interface PassSummary {
    runId: string;
    range: PlannedRange;
    transactions: number;
    newTransactions: number;
    peakConcurrency: number;
}

export type PassOutcome =
    | { status: 'idle'; runId: string; nextStart: number; head: number }
    | (PassSummary & { status: 'incomplete'; failedBatches: number })
    | (PassSummary & { status: 'synced'; snapshots: number; anomalies: number; checkpoint: EpochSyncState });

/**
 * One planning cycle: plan, fetch, aggregate, persist and checkpoint.
 *
 * Nothing is checkpointed unless every step succeeded, so an abandoned or
 * failed pass leaves the range to be planned again.
 */
export class SyncEngine {
    private readonly deps: SyncEngineDependencies;
    private readonly options: SyncEngineOptions;

    public constructor(deps: SyncEngineDependencies, options: SyncEngineOptions) {
        this.deps = deps;
        this.options = options;
    }

    public async runPass(signal?: AbortSignal, runId: string = uuidv4()): Promise<PassOutcome> {
        const { transactions, delegators } = this.deps.repositories;

        this.deps.gateway.beginCycle();
        const plan = await this.deps.planner.plan(signal);
        if (plan.kind === 'idle') {
            return { status: 'idle', runId, nextStart: plan.nextStart, head: plan.head };
        }

        const range = plan.range;
        logger.info(`[SyncEngine] [${runId}] Syncing [${range.startBlock}, ${range.endBlock}] of epoch ${range.epoch}`);

        const fetched = await this.deps.fetcher.fetchRange(range, signal);
        throwIfAborted(signal);

        // Stored even when the range is incomplete; upserts are keyed by hash
        const newTransactions = await this.persist('upsert transactions', () => transactions.upsertMany(fetched.transactions), signal);
        const summary: PassSummary = {
            runId,
            range,
            transactions: fetched.transactions.length,
            newTransactions,
            peakConcurrency: fetched.peakConcurrency
        };

        if (fetched.failures.length > 0) {
            logger.warn(`[SyncEngine] [${runId}] ${fetched.failures.length} sub-batches failed; [${range.startBlock}, ${range.endBlock}] stays pending`);
            return { ...summary, status: 'incomplete', failedBatches: fetched.failures.length };
        }

        const epochId = fetched.epochId ?? UNKNOWN_EPOCH_ID;
        if (fetched.epochId === null) {
            logger.warn(`[SyncEngine] [${runId}] No block of [${range.startBlock}, ${range.endBlock}] was produced; epoch id unknown`);
        }

        const context: LedgerContext = {
            validatorAccountId: this.options.validatorAccountId,
            epoch: range.epoch,
            epochId,
            epochStartBlock: range.epochStartBlock,
            endBlock: range.endBlock
        };
        const poolAccounts = range.completesEpoch ? await this.loadPoolAccounts(fetched, runId, signal) : undefined;
        const ledger = await this.deps.ledger.buildEpochSnapshots(context, fetched.transactions, poolAccounts);

        for (const anomaly of ledger.anomalies) {
            logger.logError(anomaly, 'DelegatorLedger', { runId, epoch: range.epoch });
        }

        throwIfAborted(signal);
        await this.persist('upsert delegators', () => delegators.upsertMany(ledger.snapshots, this.options.delegatorBatchSize), signal);

        if (range.completesEpoch) {
            await this.completeEpoch(range, epochId, ledger.snapshots, runId, signal);
        }

        const checkpoint = await this.deps.checkpointWriter.record(range, epochId, signal);
        return {
            ...summary,
            status: 'synced',
            snapshots: ledger.snapshots.length,
            anomalies: ledger.anomalies.length,
            checkpoint
        };
    }

    private async loadPoolAccounts(fetched: FetchResult, runId: string, signal?: AbortSignal): Promise<PoolAccountView[]> {
        if (!fetched.lastBlock) {
            logger.warn(`[SyncEngine] [${runId}] No block to read pool accounts at; settling without them`);
            return [];
        }
        return this.deps.client.getPoolAccounts(this.options.validatorAccountId, fetched.lastBlock.hash, signal);
    }

    private async completeEpoch(
        range: PlannedRange,
        epochId: string,
        snapshots: DelegatorSnapshot[],
        runId: string,
        signal?: AbortSignal
    ): Promise<void> {
        if (epochId === UNKNOWN_EPOCH_ID) {
            logger.warn(`[SyncEngine] [${runId}] Epoch ${range.epoch} complete without a known epoch id; validator metrics skipped`);
        } else {
            const info = await this.deps.client.getEpochInfo(epochId, signal);
            logger.info(`[SyncEngine] [${runId}] Epoch ${range.epoch} complete (chain epoch height ${info.epochHeight}, started at ${info.epochStartHeight})`);

            const { metrics, performance } = await this.deps.calculator.calculate({ epoch: range.epoch, epochId, snapshots }, signal);
            throwIfAborted(signal);

            const { validators } = this.deps.repositories;
            await this.persist('upsert validator metrics', () => validators.upsertMetrics(metrics), signal);
            await this.persist('upsert validator performance', () => validators.upsertPerformance(performance), signal);
        }

        await this.persist('rebuild epoch data', () => this.deps.epochData.build({
            epoch: range.epoch,
            epochId,
            startBlock: range.epochStartBlock,
            endBlock: range.endBlock
        }), signal);
    }

    private persist<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        return withPersistenceRetry(operation, fn, this.options.persistence, signal);
    }
}
