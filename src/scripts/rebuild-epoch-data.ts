/**
 * Rebuilds the epoch_data rollups from the delegators, transactions and
 * epoch_sync collections.
 *
 * Usage: npm run rebuild-epoch-data -- [epoch]
 * Without an epoch every checkpointed epoch is rebuilt.
 */

import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { Database } from '../database';
import { mongoRepositories } from '../database/repositories';
import { EpochDataService } from '../services/epoch/EpochDataService';
import { ConfigurationError } from '../types/errors';
import { logger } from '../utils/logger';

export function parseEpochArgument(arg: string | undefined): number | null {
  if (arg === undefined) {
    return null;
  }
  const epoch = Number(arg);
  if (!Number.isInteger(epoch) || epoch < 1) {
    throw new ConfigurationError(`Epoch must be a positive integer, got ${arg}`);
  }
  return epoch;
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const epoch = parseEpochArgument(process.argv[2]);

  const database = Database.getInstance();
  await database.connect({ uri: config.mongoUri, dbName: config.dbName });

  try {
    const service = new EpochDataService(mongoRepositories(), config.validatorAccountId);
    if (epoch === null) {
      const rebuilt = await service.rebuildAll();
      logger.info(`[RebuildEpochData] Rebuilt ${rebuilt} epoch rollups`);
    } else {
      const record = await service.rebuild(epoch);
      logger.info(record
        ? `[RebuildEpochData] Rebuilt epoch ${epoch}`
        : `[RebuildEpochData] Epoch ${epoch} was never checkpointed`);
    }
  } finally {
    await database.disconnect();
  }
}

if (require.main === module) {
  main()
    .then(() => process.exit(0))
    .catch(error => {
      logger.logError(error, 'RebuildEpochData');
      process.exit(1);
    });
}
