/**
 * Epoch Data Repository
 * Per-epoch rollups keyed by (epoch, validatorAccountId)
 */

import { EpochData } from '../models/EpochData';
import { EpochDataRecord } from '../../types';
import { IEpochDataRepository } from './interfaces';
import { toEpochData } from './mappers';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/util';

export class EpochDataRepository implements IEpochDataRepository {
  private static instance: EpochDataRepository | null = null;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  public static getInstance(): EpochDataRepository {
    if (!EpochDataRepository.instance) {
      EpochDataRepository.instance = new EpochDataRepository();
    }
    return EpochDataRepository.instance;
  }

  public async upsert(record: EpochDataRecord): Promise<void> {
    try {
      await EpochData.replaceOne(
        { epoch: record.epoch, validatorAccountId: record.validatorAccountId },
        record,
        { upsert: true }
      );
    } catch (error) {
      logger.error(`[EpochDataRepository] Error saving epoch ${record.epoch}: ${formatError(error)}`);
      throw error;
    }
  }

  public async findByEpoch(validatorAccountId: string, epoch: number): Promise<EpochDataRecord | null> {
    try {
      const doc = await EpochData.findOne({ validatorAccountId, epoch }).lean<EpochDataRecord>();
      return doc ? toEpochData(doc) : null;
    } catch (error) {
      logger.error(`[EpochDataRepository] Error loading epoch ${epoch}: ${formatError(error)}`);
      throw error;
    }
  }
}
