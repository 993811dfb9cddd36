/**
 * Operational endpoints: liveness and the Prometheus scrape target.
 */

import type { FastifyInstance } from 'fastify';
import { getMetrics, getMetricsContentType } from '../middleware/metrics.js';

export async function opsRoutes(app: FastifyInstance): Promise<void> {
  app.get('/health', async () => ({ status: 'healthy' }));

  app.get('/metrics', async (_request, reply) => {
    reply.header('cache-control', 'no-store').type(getMetricsContentType());
    return getMetrics();
  });
}
