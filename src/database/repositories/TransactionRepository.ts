/**
 * Transaction Repository
 * Staking transactions, deduplicated on transaction hash
 */

import { Transaction } from '../models/Transaction';
import { PageQuery, StakingTransaction } from '../../types';
import { ITransactionRepository, Page } from './interfaces';
import { toTransaction } from './mappers';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/util';

export class TransactionRepository implements ITransactionRepository {
  private static instance: TransactionRepository | null = null;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  public static getInstance(): TransactionRepository {
    if (!TransactionRepository.instance) {
      TransactionRepository.instance = new TransactionRepository();
    }
    return TransactionRepository.instance;
  }

  public async upsertMany(transactions: StakingTransaction[]): Promise<number> {
    if (transactions.length === 0) {
      return 0;
    }
    try {
      // Immutable once stored: only inserts, never overwrites
      const result = await Transaction.bulkWrite(
        transactions.map(tx => ({
          updateOne: {
            filter: { transactionHash: tx.transactionHash },
            update: { $setOnInsert: tx },
            upsert: true
          }
        })),
        { ordered: false }
      );
      logger.debug(`[TransactionRepository] ${result.upsertedCount} of ${transactions.length} transactions were new`);
      return result.upsertedCount;
    } catch (error) {
      logger.error(`[TransactionRepository] Error upserting transactions: ${formatError(error)}`);
      throw error;
    }
  }

  public async findByBlockRange(startBlock: number, endBlock: number): Promise<StakingTransaction[]> {
    try {
      const docs = await Transaction.find({ blockHeight: { $gte: startBlock, $lte: endBlock } })
        .sort({ blockHeight: 1, transactionHash: 1 })
        .lean<StakingTransaction[]>();
      return docs.map(toTransaction);
    } catch (error) {
      logger.error(`[TransactionRepository] Error finding transactions in [${startBlock}, ${endBlock}]: ${formatError(error)}`);
      throw error;
    }
  }

  public async findByDelegator(delegatorAddress: string, query: PageQuery): Promise<Page<StakingTransaction>> {
    try {
      const filter = { delegatorAddress };
      const [docs, total] = await Promise.all([
        Transaction.find(filter)
          .sort({ blockHeight: -1 })
          .skip((query.page - 1) * query.limit)
          .limit(query.limit)
          .lean<StakingTransaction[]>(),
        Transaction.countDocuments(filter)
      ]);
      return { items: docs.map(toTransaction), total, page: query.page, limit: query.limit };
    } catch (error) {
      logger.error(`[TransactionRepository] Error finding transactions of ${delegatorAddress}: ${formatError(error)}`);
      throw error;
    }
  }
}
