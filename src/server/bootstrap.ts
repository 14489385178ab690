import type { Connection } from 'mongoose';
import type { AppConfig } from './config.js';
import { DisabledLessonGateway, type LessonContentGateway } from './enrichment/lesson-gateway.js';
import { MongoLessonGateway } from './enrichment/mongo-lesson-gateway.js';
import { createLogger } from './logger.js';
import { MemoryTrackingStore } from './persistence/memory-store.js';
import { openMongoConnection } from './persistence/mongo-connection.js';
import { MongoTrackingStore } from './persistence/mongo-store.js';
import type { TrackingStore } from './persistence/record-store.js';
import { SnapshotStore } from './persistence/snapshot-store.js';

const logger = createLogger('bootstrap');

export type ConnectionOpener = (config: AppConfig['mongo']) => Promise<Connection>;

export interface Runtime {
  store: TrackingStore;
  lessons: LessonContentGateway;
  /** Set when a MongoDB connection was opened; close it on shutdown. */
  connection?: Connection;
  /** Set for the memory driver; flush it on shutdown. */
  memoryStore?: MemoryTrackingStore;
}

async function createMemoryStore(config: AppConfig): Promise<MemoryTrackingStore> {
  const { snapshotPath, snapshotFlushMs } = config.store;
  const memoryStore = new MemoryTrackingStore(snapshotPath ? new SnapshotStore(snapshotPath, snapshotFlushMs) : undefined);
  const restored = await memoryStore.restore();
  logger.info({ restored, snapshotPath }, 'memory store ready');
  return memoryStore;
}

/**
 * Chooses the store and lesson gateway for `config`. The mongo driver needs the database
 * and fails when it is unreachable; the memory driver only uses it for enrichment and runs
 * without lesson details instead.
 */
export async function buildRuntime(config: AppConfig, openConnection: ConnectionOpener = openMongoConnection): Promise<Runtime> {
  if (config.store.driver === 'mongo') {
    const connection = await openConnection(config.mongo);
    const mongoStore = new MongoTrackingStore(connection, config.mongo.timeoutMs);
    await mongoStore.ensureIndexes();
    const lessons = config.enrichment.enabled
      ? new MongoLessonGateway(connection, config.enrichment.collection, config.mongo.timeoutMs)
      : new DisabledLessonGateway();
    return { store: mongoStore, lessons, connection };
  }

  const memoryStore = await createMemoryStore(config);
  if (!config.enrichment.enabled) {
    return { store: memoryStore, lessons: new DisabledLessonGateway(), memoryStore };
  }

  try {
    const connection = await openConnection(config.mongo);
    const lessons = new MongoLessonGateway(connection, config.enrichment.collection, config.mongo.timeoutMs);
    return { store: memoryStore, lessons, connection, memoryStore };
  } catch (error) {
    logger.warn({ err: error }, 'lesson database unreachable, serving without lesson details');
    return { store: memoryStore, lessons: new DisabledLessonGateway(), memoryStore };
  }
}
