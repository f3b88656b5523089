import {
    CheckpointInsertResult,
    IDelegatorRepository,
    IEpochDataRepository,
    IEpochSyncRepository,
    ITransactionRepository,
    IValidatorRepository,
    Page,
    Repositories
} from '../../src/database/repositories/interfaces';
import {
    DelegatorSnapshot,
    EpochDataRecord,
    EpochSyncState,
    PageQuery,
    StakingTransaction,
    ValidatorMetricsRecord,
    ValidatorPerformanceRecord
} from '../../src/types';
import { chunkArray } from '../../src/utils/util';

export class InMemoryTransactionRepository implements ITransactionRepository {
    readonly byHash = new Map<string, StakingTransaction>();
    failuresLeft = 0;

    async upsertMany(transactions: StakingTransaction[]): Promise<number> {
        if (this.failuresLeft > 0) {
            this.failuresLeft--;
            throw new Error('write failed');
        }
        let inserted = 0;
        for (const tx of transactions) {
            if (!this.byHash.has(tx.transactionHash)) {
                this.byHash.set(tx.transactionHash, { ...tx });
                inserted++;
            }
        }
        return inserted;
    }

    async findByBlockRange(startBlock: number, endBlock: number): Promise<StakingTransaction[]> {
        return [...this.byHash.values()]
            .filter(tx => tx.blockHeight >= startBlock && tx.blockHeight <= endBlock)
            .sort((a, b) => a.blockHeight - b.blockHeight);
    }

    async findByDelegator(delegatorAddress: string, query: PageQuery): Promise<Page<StakingTransaction>> {
        const all = [...this.byHash.values()]
            .filter(tx => tx.delegatorAddress === delegatorAddress)
            .sort((a, b) => b.blockHeight - a.blockHeight);
        const start = (query.page - 1) * query.limit;
        return { items: all.slice(start, start + query.limit), total: all.length, page: query.page, limit: query.limit };
    }
}

export class InMemoryDelegatorRepository implements IDelegatorRepository {
    readonly snapshots = new Map<string, DelegatorSnapshot>();
    readonly writtenBatchSizes: number[] = [];
    failuresLeft = 0;

    static key(snapshot: Pick<DelegatorSnapshot, 'delegatorId' | 'validatorAccountId' | 'epoch'>): string {
        return `${snapshot.delegatorId}|${snapshot.validatorAccountId}|${snapshot.epoch}`;
    }

    async findLatestBefore(validatorAccountId: string, epoch: number): Promise<DelegatorSnapshot[]> {
        const latest = new Map<string, DelegatorSnapshot>();
        for (const snapshot of this.snapshots.values()) {
            if (snapshot.validatorAccountId !== validatorAccountId || snapshot.epoch >= epoch) {
                continue;
            }
            const current = latest.get(snapshot.delegatorId);
            if (!current || current.epoch < snapshot.epoch) {
                latest.set(snapshot.delegatorId, snapshot);
            }
        }
        return [...latest.values()].sort((a, b) => a.delegatorId.localeCompare(b.delegatorId));
    }

    async findByEpoch(validatorAccountId: string, epoch: number): Promise<DelegatorSnapshot[]> {
        return [...this.snapshots.values()]
            .filter(s => s.validatorAccountId === validatorAccountId && s.epoch === epoch)
            .sort((a, b) => a.delegatorId.localeCompare(b.delegatorId));
    }

    async findByDelegator(validatorAccountId: string, delegatorId: string): Promise<DelegatorSnapshot[]> {
        return [...this.snapshots.values()]
            .filter(s => s.validatorAccountId === validatorAccountId && s.delegatorId === delegatorId)
            .sort((a, b) => b.epoch - a.epoch);
    }

    async upsertMany(snapshots: DelegatorSnapshot[], batchSize: number): Promise<void> {
        if (this.failuresLeft > 0) {
            this.failuresLeft--;
            throw new Error('write failed');
        }
        for (const batch of chunkArray(snapshots, batchSize)) {
            this.writtenBatchSizes.push(batch.length);
            for (const snapshot of batch) {
                this.snapshots.set(InMemoryDelegatorRepository.key(snapshot), structuredClone(snapshot));
            }
        }
    }

    put(...snapshots: DelegatorSnapshot[]): void {
        for (const snapshot of snapshots) {
            this.snapshots.set(InMemoryDelegatorRepository.key(snapshot), snapshot);
        }
    }
}

export class InMemoryValidatorRepository implements IValidatorRepository {
    readonly metrics = new Map<number, ValidatorMetricsRecord>();
    readonly performance = new Map<number, ValidatorPerformanceRecord>();

    async upsertMetrics(record: ValidatorMetricsRecord): Promise<void> {
        this.metrics.set(record.epoch, record);
    }

    async upsertPerformance(record: ValidatorPerformanceRecord): Promise<void> {
        this.performance.set(record.epoch, record);
    }

    async findMetrics(validatorAccountId: string, limit: number): Promise<ValidatorMetricsRecord[]> {
        return [...this.metrics.values()]
            .filter(m => m.validatorAccountId === validatorAccountId)
            .sort((a, b) => b.epoch - a.epoch)
            .slice(0, limit);
    }

    async findPerformance(validatorId: string, limit: number): Promise<ValidatorPerformanceRecord[]> {
        return [...this.performance.values()]
            .filter(p => p.validatorId === validatorId)
            .sort((a, b) => b.epoch - a.epoch)
            .slice(0, limit);
    }
}

export class InMemoryEpochSyncRepository implements IEpochSyncRepository {
    readonly states: EpochSyncState[] = [];
    failuresLeft = 0;
    // inserts that are stored but then fail as if the acknowledgement was lost
    lostAcknowledgements = 0;

    async findAll(): Promise<EpochSyncState[]> {
        return [...this.states].sort((a, b) => a.startBlock - b.startBlock);
    }

    async findLatest(): Promise<EpochSyncState | null> {
        const sorted = [...this.states].sort((a, b) => b.endBlock - a.endBlock);
        return sorted[0] ?? null;
    }

    async findByEpoch(epoch: number): Promise<EpochSyncState[]> {
        return (await this.findAll()).filter(state => state.epoch === epoch);
    }

    async count(): Promise<number> {
        return this.states.length;
    }

    async insert(state: EpochSyncState): Promise<CheckpointInsertResult> {
        if (this.failuresLeft > 0) {
            this.failuresLeft--;
            throw new Error('write failed');
        }
        if (this.states.some(stored => stored.startBlock === state.startBlock)) {
            return 'duplicate';
        }
        this.states.push(state);
        if (this.lostAcknowledgements > 0) {
            this.lostAcknowledgements--;
            throw new Error('connection closed before the write was acknowledged');
        }
        return 'inserted';
    }
}

export class InMemoryEpochDataRepository implements IEpochDataRepository {
    readonly records = new Map<string, EpochDataRecord>();

    async upsert(record: EpochDataRecord): Promise<void> {
        this.records.set(`${record.epoch}|${record.validatorAccountId}`, record);
    }

    async findByEpoch(validatorAccountId: string, epoch: number): Promise<EpochDataRecord | null> {
        return this.records.get(`${epoch}|${validatorAccountId}`) ?? null;
    }
}

export interface InMemoryRepositories extends Repositories {
    transactions: InMemoryTransactionRepository;
    delegators: InMemoryDelegatorRepository;
    validators: InMemoryValidatorRepository;
    epochSync: InMemoryEpochSyncRepository;
    epochData: InMemoryEpochDataRepository;
}

export function inMemoryRepositories(): InMemoryRepositories {
    return {
        transactions: new InMemoryTransactionRepository(),
        delegators: new InMemoryDelegatorRepository(),
        validators: new InMemoryValidatorRepository(),
        epochSync: new InMemoryEpochSyncRepository(),
        epochData: new InMemoryEpochDataRepository()
    };
}
