import 'dotenv/config';
import http from 'node:http';
import { createApp } from './app.js';
import { buildRuntime } from './bootstrap.js';
import { loadConfig } from './config.js';
import { createLogger, initialiseLogger } from './logger.js';
import { Counters } from './metrics/counters.js';
import { closeMongoConnection } from './persistence/mongo-connection.js';
import { TrackingService } from './tracking/tracking-service.js';

const config = loadConfig();
initialiseLogger(config);
const logger = createLogger('server');

logger.info({ store: config.store.driver }, 'starting tracking service');

const { store, lessons, connection, memoryStore } = await buildRuntime(config);

const counters = new Counters();
const service = new TrackingService({ store, lessons, counters });
const app = createApp({ service, counters, storeDriver: config.store.driver, startedAt: Date.now() }, { corsOrigins: config.corsOrigins });
const server = http.createServer(app);

server.listen(config.port, config.host, () => {
  logger.info({ host: config.host, port: config.port }, 'tracking service listening');
});

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  logger.info({ signal }, 'shutting down');
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  if (memoryStore) await memoryStore.flush();
  if (connection) await closeMongoConnection(connection);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'shutdown failed');
        process.exit(1);
      });
  });
}
