import { DelegatorSnapshot, StakingTransaction } from '../../src/types';
import { BlockView, ChunkView, CurrentEpochValidatorView, EpochValidatorInfo, SignedTransactionView } from '../../src/types/near';

export const POOL = 'test.poolv1.near';

// Block timestamps are 1_700_000_000_000 ms + height seconds
export function timestampOf(height: number): Date {
    return new Date(1_700_000_000_000 + height * 1000);
}

export function blockAt(height: number, options: { epochId?: string; chunkHashes?: string[]; includedAt?: number } = {}): BlockView {
    const chunkHashes = options.chunkHashes ?? [`chunk-${height}`];
    return {
        author: 'producer.near',
        header: {
            height,
            hash: `block-${height}`,
            prev_hash: `block-${height - 1}`,
            epoch_id: options.epochId ?? 'epoch-a',
            timestamp_nanosec: `${timestampOf(height).getTime()}000000`
        },
        chunks: chunkHashes.map((chunk_hash, shard_id) => ({
            chunk_hash,
            shard_id,
            height_created: options.includedAt ?? height,
            height_included: options.includedAt ?? height
        }))
    };
}

export function chunkWith(chunkHash: string, height: number, transactions: SignedTransactionView[]): ChunkView {
    return {
        author: 'producer.near',
        header: { chunk_hash: chunkHash, shard_id: 0, height_created: height, height_included: height },
        transactions
    };
}

export function encodeArgs(args: Record<string, unknown>): string {
    return Buffer.from(JSON.stringify(args)).toString('base64');
}

export function callTx(
    hash: string,
    signer: string,
    method: string,
    options: { amount?: string; deposit?: string; receiver?: string } = {}
): SignedTransactionView {
    return {
        hash,
        signer_id: signer,
        receiver_id: options.receiver ?? POOL,
        actions: [{
            FunctionCall: {
                method_name: method,
                args: options.amount !== undefined ? encodeArgs({ amount: options.amount }) : '',
                gas: 125_000_000_000_000,
                deposit: options.deposit ?? '0'
            }
        }]
    };
}

export function stakingTx(overrides: Partial<StakingTransaction> & Pick<StakingTransaction, 'transactionHash' | 'type' | 'amount' | 'blockHeight'>): StakingTransaction {
    return {
        method: overrides.type,
        action: 'FunctionCall',
        timestamp: timestampOf(overrides.blockHeight),
        delegatorAddress: 'alice.near',
        gasFee: '0',
        ...overrides
    };
}

export function snapshot(overrides: Partial<DelegatorSnapshot> & Pick<DelegatorSnapshot, 'delegatorId' | 'epoch'>): DelegatorSnapshot {
    return {
        validatorAccountId: POOL,
        epochId: `epoch-${overrides.epoch}`,
        startBlockHeight: 0,
        endBlockHeight: 0,
        initialStake: '0',
        autoCompoundedStake: '0',
        totalRewardsEarned: '0',
        pendingRewards: '0',
        tokensWithdrawn: '0',
        lastUpdateBlock: 0,
        reportedStake: null,
        anomalies: [],
        ...overrides
    };
}

export function validatorView(overrides: Partial<CurrentEpochValidatorView> = {}): CurrentEpochValidatorView {
    return {
        account_id: POOL,
        stake: '0',
        is_slashed: false,
        num_produced_blocks: 90,
        num_expected_blocks: 100,
        num_produced_chunks: 380,
        num_expected_chunks: 400,
        ...overrides
    };
}

export function validatorInfo(overrides: Partial<EpochValidatorInfo> = {}): EpochValidatorInfo {
    return {
        current_validators: [validatorView()],
        prev_epoch_kickout: [],
        epoch_start_height: 100,
        epoch_height: 7,
        ...overrides
    };
}
