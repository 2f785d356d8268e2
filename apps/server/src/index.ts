/**
 * Reelwatch server entry point
 *
 * Loads configuration, builds the connector, storage and pipeline, serves the
 * status API and handles signals: SIGINT/SIGTERM shut down gracefully, SIGHUP
 * re-reads the environment file and hot-reloads the pipeline tunables.
 */

import { Redis } from 'ioredis';
import { buildApp } from './app.js';
import { ENV_FILE_PATH, loadEnvFile, parseEnv, type AppConfig } from './config/env.js';
import { createDatabase, type DatabaseHandle } from './db/client.js';
import { ensureHistorySchema } from './db/init.js';
import { MonitoringPipeline } from './jobs/pipeline.js';
import { createMediaServerClient } from './services/mediaServer/index.js';
import {
  MemoryHistoryRepository,
  PostgresHistoryRepository,
  type HistoryRepository,
} from './services/history/repository.js';
import { createAgents } from './services/notifications/agents/index.js';
import {
  MemorySessionStore,
  RedisSessionStore,
  type SessionStore,
} from './services/sessions/sessionStore.js';
import { errorMessage } from './utils/errors.js';
import { createLogger, rootLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('Server');

async function createHistoryRepository(
  config: AppConfig
): Promise<{ repository: HistoryRepository; database: DatabaseHandle | null }> {
  if (!config.databaseUrl) {
    log.warn('DATABASE_URL not set, watch history is kept in memory only');
    return { repository: new MemoryHistoryRepository(), database: null };
  }

  const database = createDatabase(config.databaseUrl);
  try {
    await ensureHistorySchema(database.db);
  } catch (error) {
    // Writes retry until storage answers; not a reason to refuse to start
    log.error('Could not prepare history table', { error: errorMessage(error) });
  }
  return { repository: new PostgresHistoryRepository(database.db), database };
}

function createSessionStore(config: AppConfig): { store: SessionStore; redis: Redis | null } {
  if (!config.redisUrl) {
    return { store: new MemorySessionStore(), redis: null };
  }

  const redis = new Redis(config.redisUrl, { maxRetriesPerRequest: 3 });
  redis.on('error', (error) => {
    log.error('Redis connection error', { error: error.message });
  });
  return { store: new RedisSessionStore(redis), redis };
}

async function start(): Promise<void> {
  loadEnvFile();
  const config = parseEnv();
  if (config.logLevel) setLogLevel(config.logLevel);

  const client = createMediaServerClient({
    type: config.mediaServer.type,
    url: config.mediaServer.url,
    token: config.mediaServer.token,
    timeoutMs: config.mediaServer.timeoutMs,
  });

  const { repository, database } = await createHistoryRepository(config);
  const { store, redis } = createSessionStore(config);
  const handlers = createAgents(config.notifications);

  const pipeline = new MonitoringPipeline({
    client,
    historyRepository: repository,
    config: config.pipeline,
    sessionStore: store,
    handlers,
  });

  const app = await buildApp({
    pipeline,
    checkDatabase: database?.checkConnection,
    checkRedis: redis ? async () => (await redis.ping()) === 'PONG' : undefined,
  });

  app.addHook('onClose', async () => {
    await pipeline.stop();
    await database?.close();
    await redis?.quit();
  });

  // Handle graceful shutdown
  let shuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.on(signal, () => {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info(`Received ${signal}, shutting down gracefully...`);
      app
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  }

  let current = config;
  process.on('SIGHUP', () => {
    try {
      loadEnvFile(ENV_FILE_PATH, true);
      const next = parseEnv();

      if (next.logLevel) setLogLevel(next.logLevel);
      pipeline.updateConfig(next.pipeline);

      const server = next.mediaServer;
      if (server.type !== current.mediaServer.type) {
        log.warn('MEDIA_SERVER_TYPE changed; restart to switch connectors');
      } else if (
        server.url !== current.mediaServer.url ||
        server.token !== current.mediaServer.token ||
        server.timeoutMs !== current.mediaServer.timeoutMs
      ) {
        pipeline.reconfigureConnector({ url: server.url, token: server.token, timeoutMs: server.timeoutMs });
      }

      current = next;
      log.info('Configuration reloaded');
    } catch (error) {
      log.error('Configuration reload failed, keeping the running configuration', {
        error: errorMessage(error),
      });
    }
  });

  await app.listen({ port: config.port, host: config.host });
  log.info(`Server running at http://${config.host}:${config.port}`);

  if (!(await client.testConnection())) {
    log.warn(`Could not reach ${config.mediaServer.type} at ${config.mediaServer.url}; polling will keep trying`);
  }

  // Mirror entries left by a previous process describe sessions this one never saw
  try {
    await store.clear();
  } catch (error) {
    log.warn('Could not clear the live session mirror', { error: errorMessage(error) });
  }
  pipeline.start();
}

start().catch((error: unknown) => {
  rootLogger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
