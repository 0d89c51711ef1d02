import type { FastifyInstance } from 'fastify';
import { isObject } from '../collectors/coerce.js';
import { isProblemEvent, type ProblemStore } from './store.js';

/**
 * Monitoring webhook: the monitoring system posts problem/resolve events
 * so the graph can flag affected nodes.
 */
export async function registerProblemRoutes(app: FastifyInstance, problems: ProblemStore): Promise<void> {
  app.post('/api/v1/webhook/monitoring-event', async (request, reply) => {
    const body = request.body;
    if (!isObject(body)) return reply.code(400).send({ error: 'JSON object body required.' });

    const { event, server } = body;
    if (!isProblemEvent(event)) {
      return reply.code(400).send({ error: 'event must be "problem" or "resolve".' });
    }
    if (typeof server !== 'string' || server.trim() === '') {
      return reply.code(400).send({ error: 'server is required.' });
    }

    problems.apply(event, server.trim());
    return reply.send({ status: 'ok', event, server: server.trim() });
  });

  app.get('/api/v1/problems', async (_req, reply) => {
    return reply.send(problems.list());
  });
}
