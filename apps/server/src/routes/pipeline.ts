/**
 * Pipeline routes - status snapshot and configuration hot reload
 */

import type { FastifyPluginAsync } from 'fastify';
import type { MonitoringPipeline } from '../jobs/pipeline.js';

export interface PipelineRouteOptions {
  pipeline: MonitoringPipeline;
}

export const pipelineRoutes: FastifyPluginAsync<PipelineRouteOptions> = async (
  app,
  { pipeline }
) => {
  /**
   * GET /pipeline/status - Poller, push channel, history and dispatcher state
   */
  app.get('/pipeline/status', async () => {
    return { data: pipeline.getStatus() };
  });

  /**
   * GET /settings - Running pipeline configuration
   */
  app.get('/settings', async () => {
    return { data: pipeline.getConfig() };
  });

  /**
   * PATCH /settings - Update any subset of the tunables; applied without restart
   */
  app.patch('/settings', async (request) => {
    const config = pipeline.updateConfig(request.body ?? {});
    request.log.info({ config }, 'Pipeline settings updated');
    return { data: config };
  });
};
