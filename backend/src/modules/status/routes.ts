import type { FastifyInstance } from 'fastify';
import type { TopologyCache } from '../topology/cache.js';
import type { InventoryCache } from '../inventory/cache.js';
import type { ReportGenerator } from '../reports/generator.js';
import { localTimestamp } from '../../config/index.js';

export interface StatusRouteDeps {
  topology: Pick<TopologyCache, 'current' | 'lastRefreshError'>;
  inventory: Pick<InventoryCache, 'current'>;
  reports: Pick<ReportGenerator, 'latestRun'>;
}

export async function registerStatusRoutes(app: FastifyInstance, deps: StatusRouteDeps): Promise<void> {
  app.get('/api/v1/status', async (_req, reply) => {
    const topo = deps.topology.current();
    const inv = deps.inventory.current();
    return reply.send({
      time: localTimestamp(),
      topology: topo
        ? {
            refreshed_at: topo.refreshedAt,
            window_start: topo.windowStart,
            hosts: topo.hosts.length,
            records: topo.records.length,
            failures: topo.failures,
            failed_hosts: topo.failedHosts,
            last_error: deps.topology.lastRefreshError(),
          }
        : { refreshed_at: null, last_error: deps.topology.lastRefreshError() },
      inventory: inv
        ? {
            refreshed_at: inv.refreshedAt,
            hosts: inv.records.size,
            lookup_failures: inv.individualLookupFailures,
          }
        : { refreshed_at: null },
      last_report_run: deps.reports.latestRun(),
    });
  });
}
