export type StakingTransactionType = 'stake' | 'unstake' | 'withdraw' | 'deposit';

export interface StakingTransaction {
    transactionHash: string;
    amount: string;
    method: string;
    action: string;
    type: StakingTransactionType;
    blockHeight: number;
    timestamp: Date;
    delegatorAddress: string;
    gasFee: string;
}

export type AnomalyCode = 'NEGATIVE_STAKE' | 'OVER_WITHDRAWAL' | 'NEGATIVE_REWARD';

export interface LedgerAnomaly {
    code: AnomalyCode;
    blockHeight: number;
    transactionHash?: string;
    message: string;
}

/**
 * Per-epoch ledger state of one delegator. Amounts are yocto strings.
 */
export interface DelegatorSnapshot {
    delegatorId: string;
    validatorAccountId: string;
    epoch: number;
    epochId: string;
    startBlockHeight: number;
    endBlockHeight: number;
    initialStake: string;
    autoCompoundedStake: string;
    totalRewardsEarned: string;
    pendingRewards: string;
    tokensWithdrawn: string;
    lastUpdateBlock: number;
    // staked balance the pool reported when the epoch was settled
    reportedStake: string | null;
    anomalies: LedgerAnomaly[];
}

export interface ValidatorMetricsRecord {
    validatorAccountId: string;
    epoch: number;
    epochId: string;
    totalStaked: string;
    totalDelegators: number;
    apy: number;
    rewards: string;
    uptime: number | null;
    timestamp: Date;
}

export interface ValidatorPerformanceRecord {
    validatorId: string;
    epoch: number;
    epochId: string;
    blocksProduced: number;
    blocksExpected: number;
    blockProductionRate: number;
    chunksProduced: number;
    chunksExpected: number;
    chunkProductionRate: number;
    message: string;
}

export interface EpochSyncState {
    startBlock: number;
    endBlock: number;
    epoch: number;
    epochId: string;
    timestamp: Date;
}

export interface EpochDataRecord {
    epoch: number;
    epochId: string;
    validatorAccountId: string;
    startBlockHeight: number;
    endBlockHeight: number;
    timestamp: Date;
    delegators: DelegatorSnapshot[];
    transactions: StakingTransaction[];
}

export interface BlockRange {
    startBlock: number;
    endBlock: number;
}

export interface PlannedRange extends BlockRange {
    epoch: number;
    epochStartBlock: number;
    epochEndBlock: number;
    // true when endBlock is the last height of the epoch
    completesEpoch: boolean;
}

export interface PageQuery {
    page: number;
    limit: number;
}
