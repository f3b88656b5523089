import { ApyCompounding } from '../../config';
import { ChainClient } from '../../clients/NearClient';
import { DelegatorSnapshot, ValidatorMetricsRecord, ValidatorPerformanceRecord } from '../../types';
import { EpochValidatorInfo, ValidatorKickoutView } from '../../types/near';
import { snapshotStake } from '../ledger/DelegatorLedger';
import { toBigInt } from '../../utils/amount';
import { logger } from '../../utils/logger';
import { calculateApy, productionRate } from './apy';

export const PERFORMANCE_OK = 'ok';
export const PERFORMANCE_UNDETERMINED = 'expected blocks not yet determined';

export interface MetricsCalculatorOptions {
    validatorAccountId: string;
    epochsPerYear: number;
    apyCompounding: ApyCompounding;
}

export interface EpochMetricsInput {
    epoch: number;
    epochId: string;
    // settled snapshots of every delegator for the epoch
    snapshots: readonly DelegatorSnapshot[];
}

export interface EpochMetrics {
    metrics: ValidatorMetricsRecord;
    performance: ValidatorPerformanceRecord;
}

export function describeKickout(kickout: ValidatorKickoutView): string {
    if (typeof kickout.reason === 'string') {
        return `kicked out: ${kickout.reason}`;
    }
    const [name, detail] = Object.entries(kickout.reason)[0] ?? ['Unknown', null];
    return detail === null || detail === undefined
        ? `kicked out: ${name}`
        : `kicked out: ${name} ${JSON.stringify(detail)}`;
}

/**
 * Derives the pool's epoch metrics from its settled delegator snapshots and
 * the chain's validator view of the epoch.
 */
export class ValidatorMetricsCalculator {
    private readonly client: Pick<ChainClient, 'getValidators'>;
    private readonly options: MetricsCalculatorOptions;
    private readonly now: () => Date;

    constructor(client: Pick<ChainClient, 'getValidators'>, options: MetricsCalculatorOptions, now: () => Date = () => new Date()) {
        this.client = client;
        this.options = options;
        this.now = now;
    }

    async calculate(input: EpochMetricsInput, signal?: AbortSignal): Promise<EpochMetrics> {
        const info = await this.client.getValidators(input.epochId, signal);
        const performance = this.performance(info, input);

        let totalStaked = 0n;
        let rewards = 0n;
        let activeDelegators = 0;
        for (const snapshot of input.snapshots) {
            // The pool's own balance wins over a ledger stake that drifted from it
            const stake = snapshot.reportedStake !== null ? toBigInt(snapshot.reportedStake) : snapshotStake(snapshot);
            totalStaked += stake;
            rewards += toBigInt(snapshot.pendingRewards);
            if (stake > 0n) {
                activeDelegators++;
            }
        }

        // Uptime stays undetermined until the chain has assigned blocks
        const expected = performance.blocksExpected > 0 ? performance.blocksExpected + performance.chunksExpected : 0;
        const produced = performance.blocksProduced + performance.chunksProduced;

        const metrics: ValidatorMetricsRecord = {
            validatorAccountId: this.options.validatorAccountId,
            epoch: input.epoch,
            epochId: input.epochId,
            totalStaked: totalStaked.toString(),
            totalDelegators: activeDelegators,
            apy: calculateApy(rewards, totalStaked, this.options.epochsPerYear, this.options.apyCompounding),
            rewards: rewards.toString(),
            uptime: expected > 0 ? productionRate(produced, expected) : null,
            timestamp: this.now()
        };

        logger.info(`[ValidatorMetricsCalculator] Epoch ${input.epoch}: staked ${metrics.totalStaked}, ${metrics.totalDelegators} active delegators, APY ${metrics.apy}%, ${performance.message}`);
        return { metrics, performance };
    }

    private performance(info: EpochValidatorInfo, input: EpochMetricsInput): ValidatorPerformanceRecord {
        const base = { validatorId: this.options.validatorAccountId, epoch: input.epoch, epochId: input.epochId };
        const validator = info.current_validators.find(v => v.account_id === this.options.validatorAccountId);

        if (!validator) {
            const kickout = info.prev_epoch_kickout.find(k => k.account_id === this.options.validatorAccountId);
            const message = kickout ? describeKickout(kickout) : 'not in the current validator set';
            logger.warn(`[ValidatorMetricsCalculator] ${this.options.validatorAccountId} has no production data for epoch ${input.epoch}: ${message}`);
            return {
                ...base,
                blocksProduced: 0,
                blocksExpected: 0,
                blockProductionRate: 0,
                chunksProduced: 0,
                chunksExpected: 0,
                chunkProductionRate: 0,
                message
            };
        }

        return {
            ...base,
            blocksProduced: validator.num_produced_blocks,
            blocksExpected: validator.num_expected_blocks,
            blockProductionRate: productionRate(validator.num_produced_blocks, validator.num_expected_blocks),
            chunksProduced: validator.num_produced_chunks,
            chunksExpected: validator.num_expected_chunks,
            chunkProductionRate: productionRate(validator.num_produced_chunks, validator.num_expected_chunks),
            message: validator.num_expected_blocks === 0 ? PERFORMANCE_UNDETERMINED : PERFORMANCE_OK
        };
    }
}
