/**
 * History routes - most recent watch entries for a status view
 */

import type { FastifyPluginAsync } from 'fastify';
import { recentHistoryQuerySchema } from '@reelwatch/shared';
import type { HistoryRepository } from '../services/history/repository.js';
import { ValidationError } from '../utils/errors.js';

export interface HistoryRouteOptions {
  repository: HistoryRepository;
}

export const historyRoutes: FastifyPluginAsync<HistoryRouteOptions> = async (
  app,
  { repository }
) => {
  /**
   * GET /history/recent?limit=20 - Newest entries first (by stop time)
   */
  app.get('/recent', async (request) => {
    const query = recentHistoryQuerySchema.safeParse(request.query);
    if (!query.success) {
      throw ValidationError.fromZodError(query.error);
    }

    const data = await repository.listRecent(query.data.limit);
    return { data };
  });
};
