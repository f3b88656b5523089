import { beforeEach, describe, expect, test } from 'vitest';
import { EpochDataService } from '../../../src/services/epoch/EpochDataService';
import { EpochSyncState } from '../../../src/types';
import { inMemoryRepositories, InMemoryRepositories } from '../../helpers/InMemoryRepositories';
import { POOL, snapshot, stakingTx } from '../../helpers/fixtures';

const NOW = new Date('2024-01-01T00:00:00.000Z');

function checkpoint(startBlock: number, endBlock: number, epoch: number, epochId: string): EpochSyncState {
    return { startBlock, endBlock, epoch, epochId, timestamp: NOW };
}

describe('EpochDataService', () => {
    let repositories: InMemoryRepositories;
    let service: EpochDataService;

    beforeEach(async () => {
        repositories = inMemoryRepositories();
        service = new EpochDataService(repositories, POOL, () => NOW);

        repositories.delegators.put(
            snapshot({ delegatorId: 'alice.near', epoch: 1, initialStake: '100' }),
            snapshot({ delegatorId: 'alice.near', epoch: 2, initialStake: '100', autoCompoundedStake: '5' }),
            snapshot({ delegatorId: 'bob.near', epoch: 2, initialStake: '70' })
        );
        await repositories.transactions.upsertMany([
            stakingTx({ transactionHash: 'tx-1', type: 'stake', amount: '100', blockHeight: 103 }),
            stakingTx({ transactionHash: 'tx-2', type: 'stake', amount: '5', blockHeight: 112 }),
            stakingTx({ transactionHash: 'tx-3', type: 'stake', amount: '70', blockHeight: 118, delegatorAddress: 'bob.near' })
        ]);
        repositories.epochSync.states.push(
            checkpoint(100, 109, 1, 'epoch-a'),
            checkpoint(110, 114, 2, 'epoch-b'),
            checkpoint(115, 119, 2, 'epoch-b')
        );
    });

    test('should roll up the delegators and transactions of an epoch', async () => {
        const record = await service.build({ epoch: 2, epochId: 'epoch-b', startBlock: 110, endBlock: 119 });

        expect(record.delegators.map(s => s.delegatorId)).toEqual(['alice.near', 'bob.near']);
        expect(record.transactions.map(tx => tx.transactionHash)).toEqual(['tx-2', 'tx-3']);
        expect(record).toMatchObject({ epoch: 2, epochId: 'epoch-b', validatorAccountId: POOL, startBlockHeight: 110, endBlockHeight: 119, timestamp: NOW });
        await expect(repositories.epochData.findByEpoch(POOL, 2)).resolves.toEqual(record);
    });

    test('should rebuild an epoch over the span of its checkpoints', async () => {
        const record = await service.rebuild(2);

        expect(record?.startBlockHeight).toBe(110);
        expect(record?.endBlockHeight).toBe(119);
        expect(record?.epochId).toBe('epoch-b');
        expect(record?.transactions).toHaveLength(2);
    });

    test('should skip epochs that were never checkpointed', async () => {
        await expect(service.rebuild(9)).resolves.toBeNull();
        expect(repositories.epochData.records.size).toBe(0);
    });

    test('should rebuild every checkpointed epoch', async () => {
        await expect(service.rebuildAll()).resolves.toBe(2);

        const first = await repositories.epochData.findByEpoch(POOL, 1);
        expect(first?.delegators.map(s => s.initialStake)).toEqual(['100']);
        expect(first?.transactions.map(tx => tx.transactionHash)).toEqual(['tx-1']);
    });
});
