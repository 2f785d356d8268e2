/**
 * Fastify application: health check, status API and error handling.
 * Built separately from the process entry point so tests can inject requests.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { API_BASE_PATH } from '@reelwatch/shared';
import type { MonitoringPipeline } from './jobs/pipeline.js';
import { historyRoutes } from './routes/history.js';
import { pipelineRoutes } from './routes/pipeline.js';
import { sessionRoutes } from './routes/sessions.js';
import { registerErrorHandler } from './utils/errors.js';
import { rootLogger } from './utils/logger.js';

export interface AppDependencies {
  pipeline: MonitoringPipeline;
  /** Resolves true when the history database answers; omitted for in-memory history */
  checkDatabase?: () => Promise<boolean>;
  /** Resolves true when Redis answers; omitted for the in-memory session mirror */
  checkRedis?: () => Promise<boolean>;
  /** Request logging; defaults to the shared pino root */
  logger?: boolean;
}

async function probe(check: (() => Promise<boolean>) | undefined): Promise<boolean | null> {
  if (!check) return null;
  try {
    return await check();
  } catch {
    return false;
  }
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const options: FastifyServerOptions =
    deps.logger === false ? { logger: false } : { loggerInstance: rootLogger };
  const app = Fastify(options);

  registerErrorHandler(app);

  // Health check endpoint
  app.get('/health', async (_request, reply) => {
    const [database, redis] = await Promise.all([
      probe(deps.checkDatabase),
      probe(deps.checkRedis),
    ]);
    const status = deps.pipeline.getStatus();
    const healthy = database !== false && redis !== false && !status.connector.unauthorized;

    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      pipeline: status.running,
      database,
      redis,
      connector: status.connector.unauthorized ? 'unauthorized' : 'ok',
      historyStorage: status.history.storageDegraded ? 'degraded' : 'ok',
    });
  });

  await app.register(sessionRoutes, { prefix: `${API_BASE_PATH}/sessions`, pipeline: deps.pipeline });
  await app.register(historyRoutes, {
    prefix: `${API_BASE_PATH}/history`,
    repository: deps.pipeline.historyRepository,
  });
  await app.register(pipelineRoutes, { prefix: API_BASE_PATH, pipeline: deps.pipeline });

  return app;
}
