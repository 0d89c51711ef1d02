import type { FastifyInstance } from 'fastify';
import type { TopologyCache } from '../topology/cache.js';
import type { AddressClassifier } from '../../services/ipv4.js';
import { queryGraph, type GraphQueryDeps } from './query.js';

interface GraphQuery {
  host?: string;
  src?: string;
  dst?: string;
  port?: string;
  ip?: string;
  exclude_public?: string;
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export interface GraphRouteDeps {
  topology: Pick<TopologyCache, 'current'>;
  classifier: AddressClassifier;
  inventory?: GraphQueryDeps['inventory'];
  problems?: GraphQueryDeps['problems'];
}

/** Live connection graph, answered from the topology snapshot only. */
export async function registerGraphRoutes(app: FastifyInstance, deps: GraphRouteDeps): Promise<void> {
  app.get<{ Querystring: GraphQuery }>('/api/v1/graph', async (request, reply) => {
    const snapshot = deps.topology.current();
    if (!snapshot) {
      return reply.code(503).send({ error: 'not_yet_available' });
    }
    const q = request.query;
    const result = queryGraph(
      snapshot,
      {
        host: q.host?.trim() || undefined,
        src: q.src,
        dst: q.dst,
        port: q.port,
        ip: q.ip,
        exclude_public: parseFlag(q.exclude_public),
      },
      { classifier: deps.classifier, inventory: deps.inventory, problems: deps.problems },
    );
    return reply.send(result);
  });
}
