import {
  DelegatorSnapshot,
  EpochDataRecord,
  EpochSyncState,
  StakingTransaction,
  ValidatorMetricsRecord,
  ValidatorPerformanceRecord
} from '../../types';

/**
 * Lean documents carry _id and, for some collections, bookkeeping fields.
 * These copy out exactly the domain fields.
 */

export function toTransaction(doc: StakingTransaction): StakingTransaction {
  return {
    transactionHash: doc.transactionHash,
    amount: doc.amount,
    method: doc.method,
    action: doc.action,
    type: doc.type,
    blockHeight: doc.blockHeight,
    timestamp: new Date(doc.timestamp),
    delegatorAddress: doc.delegatorAddress,
    gasFee: doc.gasFee
  };
}

export function toSnapshot(doc: DelegatorSnapshot): DelegatorSnapshot {
  return {
    delegatorId: doc.delegatorId,
    validatorAccountId: doc.validatorAccountId,
    epoch: doc.epoch,
    epochId: doc.epochId,
    startBlockHeight: doc.startBlockHeight,
    endBlockHeight: doc.endBlockHeight,
    initialStake: doc.initialStake,
    autoCompoundedStake: doc.autoCompoundedStake,
    totalRewardsEarned: doc.totalRewardsEarned,
    pendingRewards: doc.pendingRewards,
    tokensWithdrawn: doc.tokensWithdrawn,
    lastUpdateBlock: doc.lastUpdateBlock,
    reportedStake: doc.reportedStake ?? null,
    anomalies: (doc.anomalies ?? []).map(anomaly => ({
      code: anomaly.code,
      blockHeight: anomaly.blockHeight,
      ...(anomaly.transactionHash ? { transactionHash: anomaly.transactionHash } : {}),
      message: anomaly.message
    }))
  };
}

export function toMetrics(doc: ValidatorMetricsRecord): ValidatorMetricsRecord {
  return {
    validatorAccountId: doc.validatorAccountId,
    epoch: doc.epoch,
    epochId: doc.epochId,
    totalStaked: doc.totalStaked,
    totalDelegators: doc.totalDelegators,
    apy: doc.apy,
    rewards: doc.rewards,
    uptime: doc.uptime ?? null,
    timestamp: new Date(doc.timestamp)
  };
}

export function toPerformance(doc: ValidatorPerformanceRecord): ValidatorPerformanceRecord {
  return {
    validatorId: doc.validatorId,
    epoch: doc.epoch,
    epochId: doc.epochId,
    blocksProduced: doc.blocksProduced,
    blocksExpected: doc.blocksExpected,
    blockProductionRate: doc.blockProductionRate,
    chunksProduced: doc.chunksProduced,
    chunksExpected: doc.chunksExpected,
    chunkProductionRate: doc.chunkProductionRate,
    message: doc.message
  };
}

export function toSyncState(doc: EpochSyncState): EpochSyncState {
  return {
    startBlock: doc.startBlock,
    endBlock: doc.endBlock,
    epoch: doc.epoch,
    epochId: doc.epochId,
    timestamp: new Date(doc.timestamp)
  };
}

export function toEpochData(doc: EpochDataRecord): EpochDataRecord {
  return {
    epoch: doc.epoch,
    epochId: doc.epochId,
    validatorAccountId: doc.validatorAccountId,
    startBlockHeight: doc.startBlockHeight,
    endBlockHeight: doc.endBlockHeight,
    timestamp: new Date(doc.timestamp),
    delegators: doc.delegators.map(toSnapshot),
    transactions: doc.transactions.map(toTransaction)
  };
}
