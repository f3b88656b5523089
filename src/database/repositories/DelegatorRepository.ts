/**
 * Delegator Repository
 * Per-epoch delegator snapshots keyed by (delegatorId, validatorAccountId, epoch)
 */

import { Delegator } from '../models/Delegator';
import { DelegatorSnapshot } from '../../types';
import { IDelegatorRepository } from './interfaces';
import { toSnapshot } from './mappers';
import { logger } from '../../utils/logger';
import { chunkArray, formatError } from '../../utils/util';

export class DelegatorRepository implements IDelegatorRepository {
  private static instance: DelegatorRepository | null = null;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  public static getInstance(): DelegatorRepository {
    if (!DelegatorRepository.instance) {
      DelegatorRepository.instance = new DelegatorRepository();
    }
    return DelegatorRepository.instance;
  }

  public async findLatestBefore(validatorAccountId: string, epoch: number): Promise<DelegatorSnapshot[]> {
    try {
      const docs = await Delegator.aggregate<DelegatorSnapshot>([
        { $match: { validatorAccountId, epoch: { $lt: epoch } } },
        { $sort: { delegatorId: 1, epoch: -1 } },
        { $group: { _id: '$delegatorId', latest: { $first: '$$ROOT' } } },
        { $replaceRoot: { newRoot: '$latest' } },
        { $sort: { delegatorId: 1 } }
      ]).allowDiskUse(true);
      return docs.map(toSnapshot);
    } catch (error) {
      logger.error(`[DelegatorRepository] Error loading snapshots before epoch ${epoch}: ${formatError(error)}`);
      throw error;
    }
  }

  public async findByEpoch(validatorAccountId: string, epoch: number): Promise<DelegatorSnapshot[]> {
    try {
      const docs = await Delegator.find({ validatorAccountId, epoch })
        .sort({ delegatorId: 1 })
        .lean<DelegatorSnapshot[]>();
      return docs.map(toSnapshot);
    } catch (error) {
      logger.error(`[DelegatorRepository] Error loading snapshots of epoch ${epoch}: ${formatError(error)}`);
      throw error;
    }
  }

  public async findByDelegator(validatorAccountId: string, delegatorId: string): Promise<DelegatorSnapshot[]> {
    try {
      const docs = await Delegator.find({ validatorAccountId, delegatorId })
        .sort({ epoch: -1 })
        .lean<DelegatorSnapshot[]>();
      return docs.map(toSnapshot);
    } catch (error) {
      logger.error(`[DelegatorRepository] Error loading snapshots of ${delegatorId}: ${formatError(error)}`);
      throw error;
    }
  }

  public async upsertMany(snapshots: DelegatorSnapshot[], batchSize: number): Promise<void> {
    const batches = chunkArray(snapshots, batchSize);
    for (const [index, batch] of batches.entries()) {
      try {
        await Delegator.bulkWrite(
          batch.map(snapshot => ({
            updateOne: {
              filter: {
                delegatorId: snapshot.delegatorId,
                validatorAccountId: snapshot.validatorAccountId,
                epoch: snapshot.epoch
              },
              update: { $set: snapshot },
              upsert: true
            }
          })),
          { ordered: false }
        );
        logger.debug(`[DelegatorRepository] Wrote delegator batch ${index + 1}/${batches.length} (${batch.length} snapshots)`);
      } catch (error) {
        logger.error(`[DelegatorRepository] Error writing delegator batch ${index + 1}/${batches.length}: ${formatError(error)}`);
        throw error;
      }
    }
  }
}
