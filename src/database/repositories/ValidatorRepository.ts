/**
 * Validator Repository
 * Epoch metrics and block/chunk production records of the pool
 */

import { ValidatorMetrics, METRICS_HISTORY_LIMIT } from '../models/ValidatorMetrics';
import { ValidatorPerformance } from '../models/ValidatorPerformance';
import { ValidatorMetricsRecord, ValidatorPerformanceRecord } from '../../types';
import { IValidatorRepository } from './interfaces';
import { toMetrics, toPerformance } from './mappers';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/util';

export class ValidatorRepository implements IValidatorRepository {
  private static instance: ValidatorRepository | null = null;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  public static getInstance(): ValidatorRepository {
    if (!ValidatorRepository.instance) {
      ValidatorRepository.instance = new ValidatorRepository();
    }
    return ValidatorRepository.instance;
  }

  /**
   * Replaces the epoch's metrics; the values being replaced go to `history`.
   */
  public async upsertMetrics(record: ValidatorMetricsRecord): Promise<void> {
    const filter = { validatorAccountId: record.validatorAccountId, epoch: record.epoch };
    try {
      const previous = await ValidatorMetrics.findOne(filter, { history: 0 }).lean<ValidatorMetricsRecord>();
      const update = previous
        ? { $set: record, $push: { history: { $each: [toMetrics(previous)], $slice: -METRICS_HISTORY_LIMIT } } }
        : { $set: record };
      await ValidatorMetrics.updateOne(filter, update, { upsert: true });
      logger.debug(`[ValidatorRepository] Metrics for epoch ${record.epoch} saved`);
    } catch (error) {
      logger.error(`[ValidatorRepository] Error saving metrics for epoch ${record.epoch}: ${formatError(error)}`);
      throw error;
    }
  }

  public async upsertPerformance(record: ValidatorPerformanceRecord): Promise<void> {
    try {
      await ValidatorPerformance.updateOne(
        { validatorId: record.validatorId, epoch: record.epoch },
        { $set: record },
        { upsert: true }
      );
      logger.debug(`[ValidatorRepository] Performance for epoch ${record.epoch} saved`);
    } catch (error) {
      logger.error(`[ValidatorRepository] Error saving performance for epoch ${record.epoch}: ${formatError(error)}`);
      throw error;
    }
  }

  public async findMetrics(validatorAccountId: string, limit: number): Promise<ValidatorMetricsRecord[]> {
    try {
      const docs = await ValidatorMetrics.find({ validatorAccountId }, { history: 0 })
        .sort({ epoch: -1 })
        .limit(limit)
        .lean<ValidatorMetricsRecord[]>();
      return docs.map(toMetrics);
    } catch (error) {
      logger.error(`[ValidatorRepository] Error finding metrics: ${formatError(error)}`);
      throw error;
    }
  }

  public async findPerformance(validatorId: string, limit: number): Promise<ValidatorPerformanceRecord[]> {
    try {
      const docs = await ValidatorPerformance.find({ validatorId })
        .sort({ epoch: -1 })
        .limit(limit)
        .lean<ValidatorPerformanceRecord[]>();
      return docs.map(toPerformance);
    } catch (error) {
      logger.error(`[ValidatorRepository] Error finding performance: ${formatError(error)}`);
      throw error;
    }
  }
}
