import mongoose from 'mongoose';
import { logger } from '../utils/logger';
import { formatError } from '../utils/util';

export interface DatabaseOptions {
  uri: string;
  dbName: string;
}

/**
 * Process-wide MongoDB connection.
 */
export class Database {
  private static instance: Database | null = null;
  private isConnected: boolean = false;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  static getInstance(): Database {
    if (!Database.instance) {
      Database.instance = new Database();
    }
    return Database.instance;
  }

  /**
   * Connects once; rejects when the server cannot be reached so startup can fail fast.
   */
  async connect(options: DatabaseOptions): Promise<void> {
    if (this.isConnected) {
      return;
    }

    logger.info(`[Database] Connecting to MongoDB (database ${options.dbName})...`);
    await mongoose.connect(options.uri, {
      dbName: options.dbName,
      serverSelectionTimeoutMS: 10000
    });
    this.isConnected = true;
    logger.info('[Database] MongoDB connected successfully');

    mongoose.connection.on('error', err => {
      logger.error(`[Database] MongoDB connection error: ${formatError(err)}`);
    });

    mongoose.connection.on('disconnected', () => {
      logger.warn('[Database] MongoDB disconnected');
    });

    mongoose.connection.on('reconnected', () => {
      logger.info('[Database] MongoDB reconnected');
    });
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }
    await mongoose.disconnect();
    this.isConnected = false;
    logger.info('[Database] MongoDB connection closed');
  }
}
