/**
 * Shapes of the NEAR JSON-RPC views consumed by the indexer.
 * Only the fields the indexer reads are declared.
 */

export type BlockReference = number | 'final';

export interface BlockHeaderView {
    height: number;
    hash: string;
    prev_hash: string;
    epoch_id: string;
    timestamp_nanosec: string;
}

export interface ChunkHeaderView {
    chunk_hash: string;
    shard_id: number;
    height_created: number;
    height_included: number;
}

export interface BlockView {
    author: string;
    header: BlockHeaderView;
    chunks: ChunkHeaderView[];
}

export interface FunctionCallView {
    method_name: string;
    args: string; // base64 encoded JSON
    gas: number;
    deposit: string;
}

export type ActionView = { FunctionCall: FunctionCallView } | Record<string, unknown> | string;

export interface SignedTransactionView {
    hash: string;
    signer_id: string;
    receiver_id: string;
    actions: ActionView[];
}

export interface ChunkView {
    author: string;
    header: ChunkHeaderView;
    transactions: SignedTransactionView[];
}

export interface CurrentEpochValidatorView {
    account_id: string;
    stake: string;
    is_slashed?: boolean;
    num_produced_blocks: number;
    num_expected_blocks: number;
    num_produced_chunks: number;
    num_expected_chunks: number;
}

export interface ValidatorKickoutView {
    account_id: string;
    reason: Record<string, unknown> | string;
}

export interface EpochValidatorInfo {
    current_validators: CurrentEpochValidatorView[];
    prev_epoch_kickout: ValidatorKickoutView[];
    epoch_start_height: number;
    epoch_height: number;
}

export interface EpochInfo {
    epochId: string;
    epochStartHeight: number;
    epochHeight: number;
}

export interface TransactionOutcome {
    transactionHash: string;
    success: boolean;
    gasFee: string;
}

export interface PoolAccountView {
    account_id: string;
    unstaked_balance: string;
    staked_balance: string;
    can_withdraw: boolean;
}
