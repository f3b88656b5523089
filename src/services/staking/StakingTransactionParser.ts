import { ChainClient } from '../../clients/NearClient';
import { StakingTransaction, StakingTransactionType } from '../../types';
import { ActionView, BlockView, ChunkView, FunctionCallView, PoolAccountView, SignedTransactionView } from '../../types/near';
import { MalformedDataError } from '../../types/errors';
import { parseAmount } from '../../utils/amount';
import { logger } from '../../utils/logger';

type BalanceField = keyof Pick<PoolAccountView, 'staked_balance' | 'unstaked_balance'>;

interface StakingMethod {
    type: StakingTransactionType;
    // where the amount comes from when the call carries none
    balanceField?: BalanceField;
}

export const STAKING_METHODS: ReadonlyMap<string, StakingMethod> = new Map<string, StakingMethod>([
    ['deposit', { type: 'deposit' }],
    ['deposit_and_stake', { type: 'stake' }],
    ['stake', { type: 'stake' }],
    ['stake_all', { type: 'stake', balanceField: 'unstaked_balance' }],
    ['unstake', { type: 'unstake' }],
    ['unstake_all', { type: 'unstake', balanceField: 'staked_balance' }],
    ['withdraw', { type: 'withdraw' }],
    ['withdraw_all', { type: 'withdraw', balanceField: 'unstaked_balance' }]
]);

/**
 * A staking call found in a chunk, before its outcome and amount are known.
 */
export interface StakingCall {
    transactionHash: string;
    delegatorAddress: string;
    method: string;
    type: StakingTransactionType;
    // null when the amount must be read from the pool state at the parent block
    amount: string | null;
    balanceField?: BalanceField;
    blockHeight: number;
    blockHash: string;
    prevBlockHash: string;
    timestamp: Date;
}

export function nanosToDate(nanos: string): Date {
    const parsed = parseAmount(nanos);
    if (parsed === null) {
        throw new MalformedDataError(`Invalid block timestamp ${nanos}`);
    }
    return new Date(Number(parsed / 1_000_000n));
}

function isFunctionCall(action: ActionView): action is { FunctionCall: FunctionCallView } {
    return typeof action === 'object' && 'FunctionCall' in action;
}

function decodeArgs(args: string): Record<string, unknown> {
    if (!args) {
        return {};
    }
    try {
        const decoded: unknown = JSON.parse(Buffer.from(args, 'base64').toString('utf8'));
        return typeof decoded === 'object' && decoded !== null && !Array.isArray(decoded)
            ? Object.fromEntries(Object.entries(decoded))
            : {};
    } catch {
        throw new MalformedDataError('Function call arguments are not base64 JSON');
    }
}

/**
 * Finds staking calls made against the pool and turns them into transaction
 * records once their outcome is known.
 */
export class StakingTransactionParser {
    private readonly validatorAccountId: string;

    public constructor(validatorAccountId: string) {
        this.validatorAccountId = validatorAccountId;
    }

    /**
     * Staking calls among the chunk's transactions. Malformed transactions are
     * logged and skipped.
     */
    public extractCalls(block: BlockView, chunk: ChunkView): StakingCall[] {
        const calls: StakingCall[] = [];
        const timestamp = nanosToDate(block.header.timestamp_nanosec);

        for (const tx of chunk.transactions) {
            if (tx.receiver_id !== this.validatorAccountId) {
                continue;
            }
            try {
                const call = this.toStakingCall(tx, block, timestamp);
                if (call) {
                    calls.push(call);
                }
            } catch (error) {
                if (!(error instanceof MalformedDataError)) {
                    throw error;
                }
                logger.warn(`[StakingTransactionParser] Skipping malformed transaction ${tx.hash} at block ${block.header.height}: ${error.message}`);
            }
        }
        return calls;
    }

    /**
     * Resolves outcome, gas fee and amount. Returns null for failed transactions.
     */
    public async resolve(call: StakingCall, client: ChainClient, signal?: AbortSignal): Promise<StakingTransaction | null> {
        const outcome = await client.getTransactionOutcome(call.transactionHash, call.delegatorAddress, signal);
        if (!outcome.success) {
            logger.debug(`[StakingTransactionParser] Transaction ${call.transactionHash} failed on chain, skipping`);
            return null;
        }

        let amount = call.amount;
        if (amount === null) {
            const field = call.balanceField ?? 'staked_balance';
            const account = await client.getPoolAccount(this.validatorAccountId, call.delegatorAddress, call.prevBlockHash, signal);
            const parsed = parseAmount(account[field]);
            if (parsed === null) {
                throw new MalformedDataError(`Pool account ${call.delegatorAddress} has an invalid ${field}`, { value: account[field] });
            }
            amount = parsed.toString();
        }

        return {
            transactionHash: call.transactionHash,
            amount,
            method: call.method,
            action: 'FunctionCall',
            type: call.type,
            blockHeight: call.blockHeight,
            timestamp: call.timestamp,
            delegatorAddress: call.delegatorAddress,
            gasFee: outcome.gasFee
        };
    }

    private toStakingCall(tx: SignedTransactionView, block: BlockView, timestamp: Date): StakingCall | null {
        // A transaction may batch several calls (e.g. deposit then stake_all); the
        // first call that moves stake describes it, a bare deposit otherwise.
        const stakingCalls: Array<{ call: FunctionCallView; method: StakingMethod }> = [];
        for (const action of tx.actions.filter(isFunctionCall)) {
            const method = STAKING_METHODS.get(action.FunctionCall.method_name);
            if (method) {
                stakingCalls.push({ call: action.FunctionCall, method });
            }
        }

        const chosen = stakingCalls.find(candidate => candidate.method.type !== 'deposit') ?? stakingCalls[0];
        if (!chosen) {
            return null;
        }

        const { call, method } = chosen;
        return {
            transactionHash: tx.hash,
            delegatorAddress: tx.signer_id,
            method: call.method_name,
            type: method.type,
            amount: method.balanceField ? null : this.callAmount(call),
            balanceField: method.balanceField,
            blockHeight: block.header.height,
            blockHash: block.header.hash,
            prevBlockHash: block.header.prev_hash,
            timestamp
        };
    }

    private callAmount(call: FunctionCallView): string {
        const raw = call.method_name.startsWith('deposit')
            ? call.deposit
            : decodeArgs(call.args).amount;
        const amount = parseAmount(raw);
        if (amount === null) {
            throw new MalformedDataError(`Call ${call.method_name} has no valid amount`, { raw });
        }
        return amount.toString();
    }
}
