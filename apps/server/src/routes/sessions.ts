/**
 * Session routes - the reconciler's live session table
 *
 * Read-only; sessions are returned as flat records (no raw upstream payload).
 */

import type { FastifyPluginAsync } from 'fastify';
import type { MonitoringPipeline } from '../jobs/pipeline.js';
import { toLiveSessionRecord } from '../services/sessions/sessionStore.js';
import { NotFoundError } from '../utils/errors.js';

export interface SessionRouteOptions {
  pipeline: MonitoringPipeline;
}

export const sessionRoutes: FastifyPluginAsync<SessionRouteOptions> = async (app, { pipeline }) => {
  /**
   * GET /sessions - Every live session, including ones awaiting their history write
   */
  app.get('/', async () => {
    const data = pipeline.reconciler.getSnapshot().map(toLiveSessionRecord);
    return { data, total: data.length };
  });

  /**
   * GET /sessions/:sessionKey - One live session
   */
  app.get<{ Params: { sessionKey: string } }>('/:sessionKey', async (request) => {
    const session = pipeline.reconciler.getSession(request.params.sessionKey);
    if (!session) {
      throw new NotFoundError('Session', request.params.sessionKey);
    }
    return { data: toLiveSessionRecord(session) };
  });
};
