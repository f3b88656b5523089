import { IDelegatorRepository, ITransactionRepository } from '../../database/repositories/interfaces';
import { AnomalyCode, DelegatorSnapshot, LedgerAnomaly, StakingTransaction } from '../../types';
import { PoolAccountView } from '../../types/near';
import { ConsistencyError } from '../../types/errors';
import { parseAmount, toBigInt } from '../../utils/amount';
import { logger } from '../../utils/logger';

export interface LedgerContext {
    validatorAccountId: string;
    epoch: number;
    epochId: string;
    epochStartBlock: number;
    // last height the snapshots cover
    endBlock: number;
}

export interface LedgerResult {
    snapshots: DelegatorSnapshot[];
    anomalies: ConsistencyError[];
}

/**
 * Running state of one delegator while an epoch is replayed.
 */
interface LedgerState {
    delegatorId: string;
    initialStake: bigint;
    autoCompoundedStake: bigint;
    totalRewardsEarned: bigint;
    pendingRewards: bigint;
    tokensWithdrawn: bigint;
    lastUpdateBlock: number;
    reportedStake: bigint | null;
    anomalies: LedgerAnomaly[];
}

export function snapshotStake(snapshot: DelegatorSnapshot): bigint {
    return toBigInt(snapshot.initialStake)
        + toBigInt(snapshot.autoCompoundedStake)
        + toBigInt(snapshot.totalRewardsEarned)
        + toBigInt(snapshot.pendingRewards);
}

/**
 * Deduplicated by hash and ordered by (block height, hash).
 */
export function orderTransactions(transactions: readonly StakingTransaction[]): StakingTransaction[] {
    const byHash = new Map<string, StakingTransaction>();
    for (const tx of transactions) {
        if (!byHash.has(tx.transactionHash)) {
            byHash.set(tx.transactionHash, tx);
        }
    }
    return [...byHash.values()].sort((a, b) =>
        a.blockHeight - b.blockHeight || (a.transactionHash < b.transactionHash ? -1 : a.transactionHash > b.transactionHash ? 1 : 0)
    );
}

/**
 * Opening state for a new epoch: the previous epoch's pending rewards are
 * folded into the earned total.
 */
function openFromBaseline(baseline: DelegatorSnapshot): LedgerState {
    return {
        delegatorId: baseline.delegatorId,
        initialStake: toBigInt(baseline.initialStake),
        autoCompoundedStake: toBigInt(baseline.autoCompoundedStake),
        totalRewardsEarned: toBigInt(baseline.totalRewardsEarned) + toBigInt(baseline.pendingRewards),
        pendingRewards: 0n,
        tokensWithdrawn: toBigInt(baseline.tokensWithdrawn),
        lastUpdateBlock: baseline.lastUpdateBlock,
        reportedStake: null,
        anomalies: []
    };
}

function emptyState(delegatorId: string, blockHeight: number): LedgerState {
    return {
        delegatorId,
        initialStake: 0n,
        autoCompoundedStake: 0n,
        totalRewardsEarned: 0n,
        pendingRewards: 0n,
        tokensWithdrawn: 0n,
        lastUpdateBlock: blockHeight,
        reportedStake: null,
        anomalies: []
    };
}

/**
 * Turns staking transactions into per-delegator, per-epoch snapshots.
 *
 * The snapshot of epoch E is always rebuilt from the latest snapshot of an
 * earlier epoch plus every transaction of E up to the range end, so
 * processing a range twice yields the same snapshots.
 *
 * The ledger is a single-writer stage: it runs once per sync pass, after
 * every sub-batch has been fetched, and replays each delegator's
 * transactions sequentially in (height, hash) order. Passes never overlap
 * (see SyncScheduler), so no two writers touch a (delegator, epoch) key.
 */
export class DelegatorLedger {
    private readonly delegators: IDelegatorRepository;
    private readonly transactions: ITransactionRepository;

    public constructor(delegators: IDelegatorRepository, transactions: ITransactionRepository) {
        this.delegators = delegators;
        this.transactions = transactions;
    }

    /**
     * Snapshots for the epoch up to `context.endBlock`. Without `poolAccounts`
     * only delegators with transactions in the epoch get one; with them the
     * epoch is settled and every known delegator gets one.
     */
    public async buildEpochSnapshots(
        context: LedgerContext,
        newTransactions: readonly StakingTransaction[],
        poolAccounts?: readonly PoolAccountView[]
    ): Promise<LedgerResult> {
        const [baselineSnapshots, stored] = await Promise.all([
            this.delegators.findLatestBefore(context.validatorAccountId, context.epoch),
            this.transactions.findByBlockRange(context.epochStartBlock, context.endBlock)
        ]);
        const baseline = new Map(baselineSnapshots.map(snapshot => [snapshot.delegatorId, snapshot]));

        const epochTransactions = orderTransactions([...stored, ...newTransactions])
            .filter(tx => tx.blockHeight >= context.epochStartBlock && tx.blockHeight <= context.endBlock);

        const byDelegator = new Map<string, StakingTransaction[]>();
        for (const tx of epochTransactions) {
            const list = byDelegator.get(tx.delegatorAddress) ?? [];
            list.push(tx);
            byDelegator.set(tx.delegatorAddress, list);
        }

        const anomalies: ConsistencyError[] = [];
        const states = new Map<string, LedgerState>();

        for (const [delegatorId, transactions] of byDelegator) {
            const state = this.replay(delegatorId, baseline.get(delegatorId) ?? null, transactions, context, anomalies);
            if (state) {
                states.set(delegatorId, state);
            }
        }

        if (poolAccounts) {
            this.settle(states, baseline, poolAccounts, context, anomalies);
        }

        const snapshots = [...states.values()]
            .sort((a, b) => (a.delegatorId < b.delegatorId ? -1 : a.delegatorId > b.delegatorId ? 1 : 0))
            .map(state => this.toSnapshot(state, context));

        logger.info(`[DelegatorLedger] Epoch ${context.epoch} up to block ${context.endBlock}: ${epochTransactions.length} transactions, ${snapshots.length} snapshots, ${anomalies.length} anomalies`);
        return { snapshots, anomalies };
    }

    private replay(
        delegatorId: string,
        baseline: DelegatorSnapshot | null,
        transactions: readonly StakingTransaction[],
        context: LedgerContext,
        anomalies: ConsistencyError[]
    ): LedgerState | null {
        let state = baseline ? openFromBaseline(baseline) : null;

        for (const tx of transactions) {
            const amount = toBigInt(tx.amount);

            switch (tx.type) {
                case 'stake':
                    if (state) {
                        state.autoCompoundedStake += amount;
                    } else {
                        state = emptyState(delegatorId, tx.blockHeight);
                        state.initialStake = amount;
                    }
                    break;

                case 'unstake': {
                    state ??= emptyState(delegatorId, tx.blockHeight);
                    const remaining = state.autoCompoundedStake - amount;
                    if (remaining < 0n) {
                        state.autoCompoundedStake = 0n;
                        this.flag(state, 'NEGATIVE_STAKE', tx,
                            `Unstake of ${amount} exceeds auto-compounded stake by ${-remaining}`, context, anomalies);
                    } else {
                        state.autoCompoundedStake = remaining;
                    }
                    break;
                }

                case 'withdraw': {
                    state ??= emptyState(delegatorId, tx.blockHeight);
                    state.tokensWithdrawn += amount;
                    const ceiling = state.initialStake + state.totalRewardsEarned;
                    if (state.tokensWithdrawn > ceiling) {
                        this.flag(state, 'OVER_WITHDRAWAL', tx,
                            `Withdrawn ${state.tokensWithdrawn} exceeds initial stake plus rewards ${ceiling}`, context, anomalies);
                    }
                    break;
                }

                case 'deposit':
                    // Deposits stay unstaked; they only touch a known delegator
                    break;
            }

            if (state) {
                state.lastUpdateBlock = tx.blockHeight;
            }
        }

        return state;
    }

    /**
     * Completes the epoch: carries untouched delegators forward, bootstraps
     * delegators only the pool knows about and derives pending rewards from
     * the pool's reported stake. The reported stake is kept on each snapshot;
     * a delegator missing from a non-empty pool view has none left there.
     */
    private settle(
        states: Map<string, LedgerState>,
        baseline: ReadonlyMap<string, DelegatorSnapshot>,
        poolAccounts: readonly PoolAccountView[],
        context: LedgerContext,
        anomalies: ConsistencyError[]
    ): void {
        for (const [delegatorId, snapshot] of baseline) {
            if (!states.has(delegatorId)) {
                states.set(delegatorId, openFromBaseline(snapshot));
            }
        }

        const listed = new Set(poolAccounts.map(account => account.account_id));
        if (poolAccounts.length > 0) {
            for (const [delegatorId, state] of states) {
                if (!listed.has(delegatorId)) {
                    state.reportedStake = 0n;
                }
            }
        }

        for (const account of poolAccounts) {
            const reported = parseAmount(account.staked_balance);
            if (reported === null) {
                logger.warn(`[DelegatorLedger] Pool account ${account.account_id} reports an invalid staked balance, skipping`);
                continue;
            }

            const state = states.get(account.account_id);
            if (!state) {
                if (reported === 0n && toBigInt(account.unstaked_balance) === 0n) {
                    continue;
                }
                const bootstrapped = emptyState(account.account_id, context.endBlock);
                bootstrapped.initialStake = reported;
                bootstrapped.reportedStake = reported;
                states.set(account.account_id, bootstrapped);
                continue;
            }

            state.reportedStake = reported;
            const pending = reported - (state.initialStake + state.autoCompoundedStake + state.totalRewardsEarned);
            if (pending < 0n) {
                state.pendingRewards = 0n;
                this.report(state, {
                    code: 'NEGATIVE_REWARD',
                    blockHeight: context.endBlock,
                    message: `Pool reports ${reported}, ${-pending} below the ledger's stake`
                }, context, anomalies);
            } else {
                state.pendingRewards = pending;
            }
        }
    }

    private flag(
        state: LedgerState,
        code: AnomalyCode,
        tx: StakingTransaction,
        message: string,
        context: LedgerContext,
        anomalies: ConsistencyError[]
    ): void {
        this.report(state, { code, blockHeight: tx.blockHeight, transactionHash: tx.transactionHash, message }, context, anomalies);
    }

    private report(state: LedgerState, anomaly: LedgerAnomaly, context: LedgerContext, anomalies: ConsistencyError[]): void {
        state.anomalies.push(anomaly);
        anomalies.push(new ConsistencyError(anomaly.code, `${state.delegatorId}: ${anomaly.message}`, {
            delegatorId: state.delegatorId,
            validatorAccountId: context.validatorAccountId,
            epoch: context.epoch,
            blockHeight: anomaly.blockHeight,
            transactionHash: anomaly.transactionHash,
            initialStake: state.initialStake.toString(),
            autoCompoundedStake: state.autoCompoundedStake.toString(),
            totalRewardsEarned: state.totalRewardsEarned.toString(),
            tokensWithdrawn: state.tokensWithdrawn.toString()
        }));
    }

    private toSnapshot(state: LedgerState, context: LedgerContext): DelegatorSnapshot {
        return {
            delegatorId: state.delegatorId,
            validatorAccountId: context.validatorAccountId,
            epoch: context.epoch,
            epochId: context.epochId,
            startBlockHeight: context.epochStartBlock,
            endBlockHeight: context.endBlock,
            initialStake: state.initialStake.toString(),
            autoCompoundedStake: state.autoCompoundedStake.toString(),
            totalRewardsEarned: state.totalRewardsEarned.toString(),
            pendingRewards: state.pendingRewards.toString(),
            tokensWithdrawn: state.tokensWithdrawn.toString(),
            lastUpdateBlock: state.lastUpdateBlock,
            reportedStake: state.reportedStake === null ? null : state.reportedStake.toString(),
            anomalies: state.anomalies
        };
    }
}
