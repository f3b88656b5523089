import { beforeEach, describe, expect, test } from 'vitest';
import { StakingCall, StakingTransactionParser } from '../../../src/services/staking/StakingTransactionParser';
import { SignedTransactionView } from '../../../src/types/near';
import { FakeChainClient } from '../../helpers/FakeChainClient';
import { blockAt, callTx, chunkWith, POOL, timestampOf } from '../../helpers/fixtures';

describe('StakingTransactionParser', () => {
    let parser: StakingTransactionParser;

    beforeEach(() => {
        parser = new StakingTransactionParser(POOL);
    });

    const extract = (transactions: SignedTransactionView[]): StakingCall[] =>
        parser.extractCalls(blockAt(10), chunkWith('chunk-10', 10, transactions));

    describe('extractCalls', () => {
        test('should take deposit amounts from the attached deposit and others from the arguments', () => {
            const calls = extract([
                callTx('tx-1', 'alice.near', 'deposit_and_stake', { deposit: '1000' }),
                callTx('tx-2', 'bob.near', 'unstake', { amount: '400' })
            ]);

            expect(calls).toEqual([
                {
                    transactionHash: 'tx-1',
                    delegatorAddress: 'alice.near',
                    method: 'deposit_and_stake',
                    type: 'stake',
                    amount: '1000',
                    balanceField: undefined,
                    blockHeight: 10,
                    blockHash: 'block-10',
                    prevBlockHash: 'block-9',
                    timestamp: timestampOf(10)
                },
                {
                    transactionHash: 'tx-2',
                    delegatorAddress: 'bob.near',
                    method: 'unstake',
                    type: 'unstake',
                    amount: '400',
                    balanceField: undefined,
                    blockHeight: 10,
                    blockHash: 'block-10',
                    prevBlockHash: 'block-9',
                    timestamp: timestampOf(10)
                }
            ]);
        });

        test('should ignore other receivers and non-staking methods', () => {
            const calls = extract([
                callTx('tx-1', 'alice.near', 'deposit_and_stake', { deposit: '1000', receiver: 'other.poolv1.near' }),
                callTx('tx-2', 'alice.near', 'ping')
            ]);

            expect(calls).toEqual([]);
        });

        test('should not mistake inherited object members for staking methods', () => {
            const calls = extract([
                callTx('tx-1', 'alice.near', 'constructor'),
                callTx('tx-2', 'alice.near', 'toString'),
                callTx('tx-3', 'alice.near', '__proto__')
            ]);

            expect(calls).toEqual([]);
        });

        test('should leave the amount of *_all methods to the pool state', () => {
            const [call] = extract([callTx('tx-1', 'alice.near', 'unstake_all')]);

            expect(call.amount).toBeNull();
            expect(call.type).toBe('unstake');
            expect(call.balanceField).toBe('staked_balance');
        });

        test('should describe a batched transaction by its first stake-moving call', () => {
            const tx: SignedTransactionView = {
                hash: 'tx-1',
                signer_id: 'alice.near',
                receiver_id: POOL,
                actions: [
                    { FunctionCall: { method_name: 'deposit', args: '', gas: 1, deposit: '500' } },
                    { FunctionCall: { method_name: 'stake_all', args: '', gas: 1, deposit: '0' } }
                ]
            };

            const [call] = extract([tx]);

            expect(call.method).toBe('stake_all');
            expect(call.type).toBe('stake');
            expect(call.balanceField).toBe('unstaked_balance');
        });

        test('should skip malformed arguments and keep the rest', () => {
            const broken = callTx('tx-1', 'alice.near', 'unstake');
            broken.actions = [{ FunctionCall: { method_name: 'unstake', args: Buffer.from('{broken').toString('base64'), gas: 1, deposit: '0' } }];

            const calls = extract([
                broken,
                callTx('tx-2', 'bob.near', 'withdraw'),
                callTx('tx-3', 'carol.near', 'withdraw', { amount: '70' })
            ]);

            expect(calls.map(call => call.transactionHash)).toEqual(['tx-3']);
            expect(calls[0].type).toBe('withdraw');
            expect(calls[0].amount).toBe('70');
        });
    });

    describe('resolve', () => {
        let client: FakeChainClient;

        beforeEach(() => {
            client = new FakeChainClient();
        });

        test('should build the transaction record with the gas fee', async () => {
            const [call] = extract([callTx('tx-1', 'alice.near', 'deposit_and_stake', { deposit: '1000' })]);

            const transaction = await parser.resolve(call, client);

            expect(transaction).toEqual({
                transactionHash: 'tx-1',
                amount: '1000',
                method: 'deposit_and_stake',
                action: 'FunctionCall',
                type: 'stake',
                blockHeight: 10,
                timestamp: timestampOf(10),
                delegatorAddress: 'alice.near',
                gasFee: '100'
            });
        });

        test('should drop failed transactions', async () => {
            client.outcomes.set('tx-1', { transactionHash: 'tx-1', success: false, gasFee: '50' });
            const [call] = extract([callTx('tx-1', 'alice.near', 'unstake', { amount: '10' })]);

            await expect(parser.resolve(call, client)).resolves.toBeNull();
        });

        test('should read *_all amounts from the pool at the parent block', async () => {
            client.poolAccount.set('block-9|bob.near', {
                account_id: 'bob.near',
                unstaked_balance: '250',
                staked_balance: '750',
                can_withdraw: false
            });
            const [unstakeAll] = extract([callTx('tx-1', 'bob.near', 'unstake_all')]);
            const [withdrawAll] = extract([callTx('tx-2', 'bob.near', 'withdraw_all')]);

            const unstaked = await parser.resolve(unstakeAll, client);
            const withdrawn = await parser.resolve(withdrawAll, client);

            expect(unstaked?.amount).toBe('750');
            expect(withdrawn?.amount).toBe('250');
        });
    });
});
