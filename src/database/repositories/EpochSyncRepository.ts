/**
 * Epoch Sync Repository
 * Append-only log of checkpointed block ranges
 */

import { EpochSync } from '../models/EpochSync';
import { EpochSyncState } from '../../types';
import { CheckpointInsertResult, IEpochSyncRepository } from './interfaces';
import { toSyncState } from './mappers';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/util';

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

export class EpochSyncRepository implements IEpochSyncRepository {
  private static instance: EpochSyncRepository | null = null;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  public static getInstance(): EpochSyncRepository {
    if (!EpochSyncRepository.instance) {
      EpochSyncRepository.instance = new EpochSyncRepository();
    }
    return EpochSyncRepository.instance;
  }

  public async findAll(): Promise<EpochSyncState[]> {
    try {
      const docs = await EpochSync.find({}).sort({ startBlock: 1 }).lean<EpochSyncState[]>();
      return docs.map(toSyncState);
    } catch (error) {
      logger.error(`[EpochSyncRepository] Error loading checkpoints: ${formatError(error)}`);
      throw error;
    }
  }

  public async findLatest(): Promise<EpochSyncState | null> {
    try {
      const doc = await EpochSync.findOne({}).sort({ endBlock: -1 }).lean<EpochSyncState>();
      return doc ? toSyncState(doc) : null;
    } catch (error) {
      logger.error(`[EpochSyncRepository] Error loading latest checkpoint: ${formatError(error)}`);
      throw error;
    }
  }

  public async findByEpoch(epoch: number): Promise<EpochSyncState[]> {
    try {
      const docs = await EpochSync.find({ epoch }).sort({ startBlock: 1 }).lean<EpochSyncState[]>();
      return docs.map(toSyncState);
    } catch (error) {
      logger.error(`[EpochSyncRepository] Error loading checkpoints of epoch ${epoch}: ${formatError(error)}`);
      throw error;
    }
  }

  public async count(): Promise<number> {
    return EpochSync.countDocuments({});
  }

  public async insert(state: EpochSyncState): Promise<CheckpointInsertResult> {
    try {
      await EpochSync.create(state);
      logger.debug(`[EpochSyncRepository] Checkpoint [${state.startBlock}, ${state.endBlock}] recorded`);
      return 'inserted';
    } catch (error) {
      // MongoDB duplicate key error on startBlock
      if (isDuplicateKeyError(error)) {
        logger.warn(`[EpochSyncRepository] A checkpoint starting at ${state.startBlock} already exists`);
        return 'duplicate';
      }
      logger.error(`[EpochSyncRepository] Error recording checkpoint [${state.startBlock}, ${state.endBlock}]: ${formatError(error)}`);
      throw error;
    }
  }
}
