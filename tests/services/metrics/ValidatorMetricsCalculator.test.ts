import { beforeEach, describe, expect, test } from 'vitest';
import {
    describeKickout,
    PERFORMANCE_OK,
    PERFORMANCE_UNDETERMINED,
    ValidatorMetricsCalculator
} from '../../../src/services/metrics/ValidatorMetricsCalculator';
import { FakeChainClient } from '../../helpers/FakeChainClient';
import { POOL, snapshot, validatorInfo, validatorView } from '../../helpers/fixtures';

const NOW = new Date('2024-01-01T00:00:00.000Z');

describe('ValidatorMetricsCalculator', () => {
    let client: FakeChainClient;
    let calculator: ValidatorMetricsCalculator;

    beforeEach(() => {
        client = new FakeChainClient();
        calculator = new ValidatorMetricsCalculator(client, {
            validatorAccountId: POOL,
            epochsPerYear: 730,
            apyCompounding: 'simple'
        }, () => NOW);
    });

    const snapshots = [
        snapshot({ delegatorId: 'alice.near', epoch: 3, initialStake: '1000', pendingRewards: '10' }),
        snapshot({ delegatorId: 'bob.near', epoch: 3, initialStake: '500', pendingRewards: '5' }),
        snapshot({ delegatorId: 'carol.near', epoch: 3 })
    ];

    test('should aggregate stake, rewards and production for the epoch', async () => {
        // Given
        client.validators.set('epoch-c', validatorInfo());

        // When
        const { metrics, performance } = await calculator.calculate({ epoch: 3, epochId: 'epoch-c', snapshots });

        // Then
        expect(metrics).toEqual({
            validatorAccountId: POOL,
            epoch: 3,
            epochId: 'epoch-c',
            totalStaked: '1515',
            totalDelegators: 2,
            apy: 730,
            rewards: '15',
            uptime: 0.94,
            timestamp: NOW
        });
        expect(performance).toEqual({
            validatorId: POOL,
            epoch: 3,
            epochId: 'epoch-c',
            blocksProduced: 90,
            blocksExpected: 100,
            blockProductionRate: 0.9,
            chunksProduced: 380,
            chunksExpected: 400,
            chunkProductionRate: 0.95,
            message: PERFORMANCE_OK
        });
    });

    test('should leave uptime undetermined while nothing is expected', async () => {
        client.validators.set('epoch-c', validatorInfo({
            current_validators: [validatorView({
                num_produced_blocks: 0,
                num_expected_blocks: 0,
                num_produced_chunks: 0,
                num_expected_chunks: 0
            })]
        }));

        const { metrics, performance } = await calculator.calculate({ epoch: 3, epochId: 'epoch-c', snapshots });

        expect(metrics.uptime).toBeNull();
        expect(performance.blockProductionRate).toBe(0);
        expect(performance.message).toBe(PERFORMANCE_UNDETERMINED);
    });

    test('should leave uptime undetermined while no blocks are expected even if chunks are', async () => {
        // Given
        client.validators.set('epoch-c', validatorInfo({
            current_validators: [validatorView({
                num_produced_blocks: 0,
                num_expected_blocks: 0,
                num_produced_chunks: 50,
                num_expected_chunks: 100
            })]
        }));

        // When
        const { metrics, performance } = await calculator.calculate({ epoch: 3, epochId: 'epoch-c', snapshots });

        // Then
        expect(metrics.uptime).toBeNull();
        expect(performance.chunkProductionRate).toBe(0.5);
        expect(performance.message).toBe(PERFORMANCE_UNDETERMINED);
    });

    test('should total the pool-reported stake of settled snapshots', async () => {
        // Given
        client.validators.set('epoch-c', validatorInfo());
        const settled = [
            snapshot({ delegatorId: 'alice.near', epoch: 3, initialStake: '1000', pendingRewards: '10', reportedStake: '1010' }),
            snapshot({ delegatorId: 'ivan.near', epoch: 3, initialStake: '1000', reportedStake: '0' })
        ];

        // When
        const { metrics } = await calculator.calculate({ epoch: 3, epochId: 'epoch-c', snapshots: settled });

        // Then
        expect(metrics.totalStaked).toBe('1010');
        expect(metrics.totalDelegators).toBe(1);
        expect(metrics.rewards).toBe('10');
        expect(metrics.apy).toBe(730);
    });

    test('should explain a kicked out validator', async () => {
        client.validators.set('epoch-c', validatorInfo({
            current_validators: [],
            prev_epoch_kickout: [{ account_id: POOL, reason: { NotEnoughBlocks: { produced: 1, expected: 10 } } }]
        }));

        const { metrics, performance } = await calculator.calculate({ epoch: 3, epochId: 'epoch-c', snapshots });

        expect(metrics.uptime).toBeNull();
        expect(metrics.totalStaked).toBe('1515');
        expect(performance.message).toBe('kicked out: NotEnoughBlocks {"produced":1,"expected":10}');
        expect(performance.blocksExpected).toBe(0);
    });

    test('should report a validator missing from the set', async () => {
        client.validators.set('epoch-c', validatorInfo({ current_validators: [validatorView({ account_id: 'other.poolv1.near' })] }));

        const { performance } = await calculator.calculate({ epoch: 3, epochId: 'epoch-c', snapshots: [] });

        expect(performance.message).toBe('not in the current validator set');
    });

    test('should compound when configured', async () => {
        client.validators.set('epoch-c', validatorInfo());
        const compounding = new ValidatorMetricsCalculator(client, {
            validatorAccountId: POOL,
            epochsPerYear: 730,
            apyCompounding: 'compound'
        }, () => NOW);

        const { metrics } = await compounding.calculate({
            epoch: 3,
            epochId: 'epoch-c',
            snapshots: [snapshot({ delegatorId: 'alice.near', epoch: 3, initialStake: '1000', pendingRewards: '1' })]
        });

        expect(metrics.apy).toBe(107.43);
    });

    test('should describe kickout reasons', () => {
        expect(describeKickout({ account_id: POOL, reason: 'Slashed' })).toBe('kicked out: Slashed');
        expect(describeKickout({ account_id: POOL, reason: { Unstaked: null } })).toBe('kicked out: Unstaked');
    });
});
