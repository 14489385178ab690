import mongoose, { type Connection } from 'mongoose';
import type { AppConfig } from '../config.js';
import { createLogger } from '../logger.js';

const logger = createLogger('mongo');

/**
 * Opens the process-wide connection. The caller owns it: inject it into the store and
 * lesson gateway, and close it on shutdown.
 */
export async function openMongoConnection(config: AppConfig['mongo']): Promise<Connection> {
  logger.info({ dbName: config.dbName }, 'connecting to MongoDB');
  const connection = mongoose.createConnection(config.uri, {
    dbName: config.dbName,
    serverSelectionTimeoutMS: config.timeoutMs,
    socketTimeoutMS: config.timeoutMs * 2
  });
  await connection.asPromise();
  logger.info('MongoDB connection established');
  return connection;
}

export async function closeMongoConnection(connection: Connection): Promise<void> {
  await connection.close();
  logger.info('MongoDB connection closed');
}
