import dotenv from 'dotenv';
import { Database } from './index';
import { Delegator, EpochData, EpochSync, Transaction, ValidatorMetrics, ValidatorPerformance } from './models';
import { loadConfig } from '../config';
import { logger } from '../utils/logger';
import { formatError } from '../utils/util';

/**
 * Creates the indexes every collection declares in its schema.
 */
export async function setupIndexes(): Promise<void> {
  const models = [Transaction, Delegator, ValidatorMetrics, ValidatorPerformance, EpochSync, EpochData];
  await Promise.all(models.map(async model => {
    await model.createIndexes();
    logger.info(`[DatabaseSetup] Indexes ready for ${model.collection.collectionName}`);
  }));
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const database = Database.getInstance();
  try {
    await database.connect({ uri: config.mongoUri, dbName: config.dbName });
    await setupIndexes();
    logger.info('[DatabaseSetup] Database indexes initialized successfully');
  } finally {
    await database.disconnect();
  }
}

if (require.main === module) {
  main().catch(error => {
    logger.error(`[DatabaseSetup] Error setting up database: ${formatError(error)}`);
    process.exit(1);
  });
}
