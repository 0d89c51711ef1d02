import type { FastifyInstance } from 'fastify';
import type { InventoryCache } from './cache.js';

interface NameQuery {
  name?: string;
}

/** CMDB details for the map client's side panel; served from the cache only. */
export async function registerInventoryRoutes(
  app: FastifyInstance,
  inventory: Pick<InventoryCache, 'lookup' | 'services'>,
): Promise<void> {
  app.get<{ Querystring: NameQuery }>('/api/v1/inventory/host', async (request, reply) => {
    const name = request.query.name?.trim();
    if (!name) return reply.code(400).send({ error: 'name is required.' });

    const record = inventory.lookup(name);
    if (!record) return reply.code(404).send({ error: 'Host not found in inventory' });
    return reply.send(record);
  });

  app.get<{ Querystring: NameQuery }>('/api/v1/inventory/services', async (request, reply) => {
    const name = request.query.name?.trim();
    if (!name) return reply.code(400).send({ error: 'name is required.' });
    return reply.send(inventory.services(name));
  });
}
