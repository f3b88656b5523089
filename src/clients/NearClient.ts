import {
    ActionView,
    BlockReference,
    BlockView,
    ChunkHeaderView,
    ChunkView,
    CurrentEpochValidatorView,
    EpochInfo,
    EpochValidatorInfo,
    PoolAccountView,
    SignedTransactionView,
    TransactionOutcome,
    ValidatorKickoutView
} from '../types/near';
import { MalformedDataError, RpcResponseError } from '../types/errors';
import { sumAmounts } from '../utils/amount';
import { RpcGateway } from './RpcGateway';

/**
 * Chain capability surface used by the sync pipeline.
 */
export interface ChainClient {
    getBlock(reference: BlockReference, signal?: AbortSignal): Promise<BlockView | null>;
    getLatestBlockHeight(signal?: AbortSignal): Promise<number>;
    getChunk(chunkHash: string, signal?: AbortSignal): Promise<ChunkView>;
    getValidators(epochId: string, signal?: AbortSignal): Promise<EpochValidatorInfo>;
    getEpochInfo(epochId: string, signal?: AbortSignal): Promise<EpochInfo>;
    getTransactionOutcome(transactionHash: string, signerId: string, signal?: AbortSignal): Promise<TransactionOutcome>;
    getPoolAccounts(poolId: string, blockHash: string, signal?: AbortSignal): Promise<PoolAccountView[]>;
    getPoolAccount(poolId: string, accountId: string, blockHash: string, signal?: AbortSignal): Promise<PoolAccountView>;
}

const POOL_ACCOUNTS_PAGE_SIZE = 1000;
const SKIPPED_BLOCK_ERRORS = new Set(['UNKNOWN_BLOCK']);

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, what: string): JsonRecord {
    if (!isRecord(value)) {
        throw new MalformedDataError(`${what} is not an object`);
    }
    return value;
}

function requireString(record: JsonRecord, key: string, what: string): string {
    const value = record[key];
    if (typeof value !== 'string') {
        throw new MalformedDataError(`${what}.${key} is not a string`, { value });
    }
    return value;
}

function requireNumber(record: JsonRecord, key: string, what: string): number {
    const value = record[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new MalformedDataError(`${what}.${key} is not a number`, { value });
    }
    return value;
}

function requireArray(record: JsonRecord, key: string, what: string): unknown[] {
    const value = record[key];
    if (!Array.isArray(value)) {
        throw new MalformedDataError(`${what}.${key} is not an array`);
    }
    return value;
}

function amountString(record: JsonRecord, key: string, what: string): string {
    const value = record[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
        return BigInt(Math.trunc(value)).toString();
    }
    if (typeof value === 'string') {
        return value;
    }
    throw new MalformedDataError(`${what}.${key} is not an amount`, { value });
}

export function parseChunkHeader(value: unknown): ChunkHeaderView {
    const header = requireRecord(value, 'chunk header');
    return {
        chunk_hash: requireString(header, 'chunk_hash', 'chunk header'),
        shard_id: requireNumber(header, 'shard_id', 'chunk header'),
        height_created: requireNumber(header, 'height_created', 'chunk header'),
        height_included: requireNumber(header, 'height_included', 'chunk header')
    };
}

export function parseBlockView(value: unknown): BlockView {
    const block = requireRecord(value, 'block');
    const header = requireRecord(block.header, 'block.header');
    return {
        author: typeof block.author === 'string' ? block.author : '',
        header: {
            height: requireNumber(header, 'height', 'block.header'),
            hash: requireString(header, 'hash', 'block.header'),
            prev_hash: requireString(header, 'prev_hash', 'block.header'),
            epoch_id: requireString(header, 'epoch_id', 'block.header'),
            timestamp_nanosec: typeof header.timestamp_nanosec === 'string'
                ? header.timestamp_nanosec
                : amountString(header, 'timestamp', 'block.header')
        },
        chunks: requireArray(block, 'chunks', 'block').map(parseChunkHeader)
    };
}

function parseAction(value: unknown): ActionView {
    if (typeof value === 'string') {
        return value;
    }
    const action = requireRecord(value, 'action');
    if (isRecord(action.FunctionCall)) {
        const call = action.FunctionCall;
        return {
            FunctionCall: {
                method_name: requireString(call, 'method_name', 'FunctionCall'),
                args: typeof call.args === 'string' ? call.args : '',
                gas: typeof call.gas === 'number' ? call.gas : 0,
                deposit: amountString(call, 'deposit', 'FunctionCall')
            }
        };
    }
    return action;
}

function parseSignedTransaction(value: unknown): SignedTransactionView {
    const tx = requireRecord(value, 'transaction');
    return {
        hash: requireString(tx, 'hash', 'transaction'),
        signer_id: requireString(tx, 'signer_id', 'transaction'),
        receiver_id: requireString(tx, 'receiver_id', 'transaction'),
        actions: requireArray(tx, 'actions', 'transaction').map(parseAction)
    };
}

export function parseChunkView(value: unknown): ChunkView {
    const chunk = requireRecord(value, 'chunk');
    return {
        author: typeof chunk.author === 'string' ? chunk.author : '',
        header: parseChunkHeader(chunk.header),
        transactions: requireArray(chunk, 'transactions', 'chunk').map(parseSignedTransaction)
    };
}

function parseCurrentValidator(value: unknown): CurrentEpochValidatorView {
    const validator = requireRecord(value, 'validator');
    return {
        account_id: requireString(validator, 'account_id', 'validator'),
        stake: amountString(validator, 'stake', 'validator'),
        is_slashed: validator.is_slashed === true,
        num_produced_blocks: requireNumber(validator, 'num_produced_blocks', 'validator'),
        num_expected_blocks: requireNumber(validator, 'num_expected_blocks', 'validator'),
        num_produced_chunks: typeof validator.num_produced_chunks === 'number' ? validator.num_produced_chunks : 0,
        num_expected_chunks: typeof validator.num_expected_chunks === 'number' ? validator.num_expected_chunks : 0
    };
}

function parseKickout(value: unknown): ValidatorKickoutView {
    const kickout = requireRecord(value, 'kickout');
    const reason = kickout.reason;
    return {
        account_id: requireString(kickout, 'account_id', 'kickout'),
        reason: typeof reason === 'string' || isRecord(reason) ? reason : String(reason)
    };
}

export function parseEpochValidatorInfo(value: unknown): EpochValidatorInfo {
    const info = requireRecord(value, 'validators');
    return {
        current_validators: requireArray(info, 'current_validators', 'validators').map(parseCurrentValidator),
        prev_epoch_kickout: Array.isArray(info.prev_epoch_kickout) ? info.prev_epoch_kickout.map(parseKickout) : [],
        epoch_start_height: requireNumber(info, 'epoch_start_height', 'validators'),
        epoch_height: typeof info.epoch_height === 'number' ? info.epoch_height : 0
    };
}

function parsePoolAccount(value: unknown): PoolAccountView {
    const account = requireRecord(value, 'pool account');
    return {
        account_id: requireString(account, 'account_id', 'pool account'),
        unstaked_balance: amountString(account, 'unstaked_balance', 'pool account'),
        staked_balance: amountString(account, 'staked_balance', 'pool account'),
        can_withdraw: account.can_withdraw === true
    };
}

function tokensBurnt(value: unknown, what: string): string {
    const wrapper = requireRecord(value, what);
    const outcome = requireRecord(wrapper.outcome, `${what}.outcome`);
    return amountString(outcome, 'tokens_burnt', `${what}.outcome`);
}

export function parseTransactionOutcome(transactionHash: string, value: unknown): TransactionOutcome {
    const result = requireRecord(value, 'tx status');
    const status = requireRecord(result.status, 'tx status.status');
    const burnt = [tokensBurnt(result.transaction_outcome, 'transaction_outcome')];
    const receipts = Array.isArray(result.receipts_outcome) ? result.receipts_outcome : [];
    for (const receipt of receipts) {
        burnt.push(tokensBurnt(receipt, 'receipt_outcome'));
    }
    return {
        transactionHash,
        success: !('Failure' in status),
        gasFee: sumAmounts(burnt).toString()
    };
}

function decodeCallResult(value: unknown, what: string): unknown {
    const result = requireRecord(value, what);
    const bytes = requireArray(result, 'result', what).map(byte => {
        if (typeof byte !== 'number') {
            throw new MalformedDataError(`${what}.result is not a byte array`);
        }
        return byte;
    });
    const text = Buffer.from(bytes).toString('utf8');
    try {
        return JSON.parse(text);
    } catch {
        throw new MalformedDataError(`${what} returned invalid JSON`, { text: text.slice(0, 200) });
    }
}

/**
 * Typed NEAR JSON-RPC calls over the failover gateway.
 */
export class NearClient implements ChainClient {
    private readonly gateway: RpcGateway;

    public constructor(gateway: RpcGateway) {
        this.gateway = gateway;
    }

    /**
     * Returns null when the height was skipped by the chain.
     */
    public async getBlock(reference: BlockReference, signal?: AbortSignal): Promise<BlockView | null> {
        const params = reference === 'final' ? { finality: 'final' } : { block_id: reference };
        try {
            return parseBlockView(await this.gateway.call('block', params, signal));
        } catch (error) {
            if (error instanceof RpcResponseError && typeof reference === 'number' && this.isSkippedBlock(error)) {
                return null;
            }
            throw error;
        }
    }

    public async getLatestBlockHeight(signal?: AbortSignal): Promise<number> {
        const block = await this.getBlock('final', signal);
        if (!block) {
            throw new MalformedDataError('Final block query returned no block');
        }
        return block.header.height;
    }

    public async getChunk(chunkHash: string, signal?: AbortSignal): Promise<ChunkView> {
        return parseChunkView(await this.gateway.call('chunk', { chunk_id: chunkHash }, signal));
    }

    public async getValidators(epochId: string, signal?: AbortSignal): Promise<EpochValidatorInfo> {
        return parseEpochValidatorInfo(await this.gateway.call('validators', { epoch_id: epochId }, signal));
    }

    public async getEpochInfo(epochId: string, signal?: AbortSignal): Promise<EpochInfo> {
        const info = await this.getValidators(epochId, signal);
        return {
            epochId,
            epochStartHeight: info.epoch_start_height,
            epochHeight: info.epoch_height
        };
    }

    public async getTransactionOutcome(transactionHash: string, signerId: string, signal?: AbortSignal): Promise<TransactionOutcome> {
        const result = await this.gateway.call('tx', [transactionHash, signerId], signal);
        return parseTransactionOutcome(transactionHash, result);
    }

    public async getPoolAccounts(poolId: string, blockHash: string, signal?: AbortSignal): Promise<PoolAccountView[]> {
        const accounts: PoolAccountView[] = [];
        for (let fromIndex = 0; ; fromIndex += POOL_ACCOUNTS_PAGE_SIZE) {
            const page = await this.callView(poolId, 'get_accounts', { from_index: fromIndex, limit: POOL_ACCOUNTS_PAGE_SIZE }, blockHash, signal);
            if (!Array.isArray(page)) {
                throw new MalformedDataError('get_accounts did not return an array');
            }
            accounts.push(...page.map(parsePoolAccount));
            if (page.length < POOL_ACCOUNTS_PAGE_SIZE) {
                return accounts;
            }
        }
    }

    public async getPoolAccount(poolId: string, accountId: string, blockHash: string, signal?: AbortSignal): Promise<PoolAccountView> {
        return parsePoolAccount(await this.callView(poolId, 'get_account', { account_id: accountId }, blockHash, signal));
    }

    private async callView(contractId: string, methodName: string, args: Record<string, unknown>, blockHash: string, signal?: AbortSignal): Promise<unknown> {
        const result = await this.gateway.call('query', {
            request_type: 'call_function',
            block_id: blockHash,
            account_id: contractId,
            method_name: methodName,
            args_base64: Buffer.from(JSON.stringify(args)).toString('base64')
        }, signal);
        return decodeCallResult(result, methodName);
    }

    private isSkippedBlock(error: RpcResponseError): boolean {
        return SKIPPED_BLOCK_ERRORS.has(error.errorName) || (error.causeName !== undefined && SKIPPED_BLOCK_ERRORS.has(error.causeName));
    }
}
