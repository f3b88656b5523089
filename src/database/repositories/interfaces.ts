/**
 * Repository interfaces
 * The sync pipeline only depends on these; Mongo implementations live beside them
 * and tests use in-memory ones.
 */

import {
    DelegatorSnapshot,
    EpochDataRecord,
    EpochSyncState,
    PageQuery,
    StakingTransaction,
    ValidatorMetricsRecord,
    ValidatorPerformanceRecord
} from '../../types';

export interface Page<T> {
    items: T[];
    total: number;
    page: number;
    limit: number;
}

export interface ITransactionRepository {
    /**
     * Inserts transactions not yet stored, keyed by hash. Returns how many were new.
     */
    upsertMany(transactions: StakingTransaction[]): Promise<number>;

    /**
     * Transactions with block height in [startBlock, endBlock], ascending by height.
     */
    findByBlockRange(startBlock: number, endBlock: number): Promise<StakingTransaction[]>;

    findByDelegator(delegatorAddress: string, query: PageQuery): Promise<Page<StakingTransaction>>;
}

export interface IDelegatorRepository {
    /**
     * Latest snapshot of each delegator from an epoch before `epoch`.
     */
    findLatestBefore(validatorAccountId: string, epoch: number): Promise<DelegatorSnapshot[]>;

    findByEpoch(validatorAccountId: string, epoch: number): Promise<DelegatorSnapshot[]>;

    /**
     * Snapshots of one delegator, newest epoch first.
     */
    findByDelegator(validatorAccountId: string, delegatorId: string): Promise<DelegatorSnapshot[]>;

    /**
     * Upserts on (delegatorId, validatorAccountId, epoch), `batchSize` documents per write.
     */
    upsertMany(snapshots: DelegatorSnapshot[], batchSize: number): Promise<void>;
}

export interface IValidatorRepository {
    upsertMetrics(record: ValidatorMetricsRecord): Promise<void>;
    upsertPerformance(record: ValidatorPerformanceRecord): Promise<void>;

    /**
     * Newest epochs first.
     */
    findMetrics(validatorAccountId: string, limit: number): Promise<ValidatorMetricsRecord[]>;
    findPerformance(validatorId: string, limit: number): Promise<ValidatorPerformanceRecord[]>;
}

export type CheckpointInsertResult = 'inserted' | 'duplicate';

export interface IEpochSyncRepository {
    /**
     * All checkpoints ordered by start block.
     */
    findAll(): Promise<EpochSyncState[]>;
    findLatest(): Promise<EpochSyncState | null>;
    findByEpoch(epoch: number): Promise<EpochSyncState[]>;
    count(): Promise<number>;
    /**
     * 'duplicate' when a checkpoint with the same start block is already stored.
     */
    insert(state: EpochSyncState): Promise<CheckpointInsertResult>;
}

export interface IEpochDataRepository {
    upsert(record: EpochDataRecord): Promise<void>;
    findByEpoch(validatorAccountId: string, epoch: number): Promise<EpochDataRecord | null>;
}

export interface Repositories {
    transactions: ITransactionRepository;
    delegators: IDelegatorRepository;
    validators: IValidatorRepository;
    epochSync: IEpochSyncRepository;
    epochData: IEpochDataRepository;
}
