import { config, localTimestamp } from './config/index.js';
import { logger } from './config/logger.js';
import { initDb, closeDb, getDb } from './db/index.js';
import { buildApp } from './app.js';
import { createAddressClassifier } from './services/ipv4.js';
import { errorMessage } from './types/errors.js';
import { JsonRpcMonitoringClient } from './modules/monitoring/client.js';
import { RestCmdbClient } from './modules/inventory/cmdbClient.js';
import { InventoryCache } from './modules/inventory/cache.js';
import { TopologyCache, visibleHostNames } from './modules/topology/cache.js';
import { HistoryCache } from './modules/history/cache.js';
import { ArtifactStore } from './modules/reports/artifacts.js';
import { KnexRunHistoryStore, type RunHistoryStore } from './modules/reports/runStore.js';
import { ReportGenerator } from './modules/reports/generator.js';
import { ProblemStore } from './modules/problems/store.js';
import { startSchedulers } from './modules/scheduler/scheduler.js';
import { getCollectorItemNames } from './modules/collectors/registry.js';

async function main(): Promise<void> {
  logger.info('Starting network connection map backend…');

  // 1. Report-run history; the service still runs without a database.
  let runs: RunHistoryStore | undefined;
  try {
    await initDb();
    runs = new KnexRunHistoryStore(getDb());
  } catch (err) {
    logger.warn(`Database unavailable, report runs will not be recorded: ${errorMessage(err)}`);
    await closeDb();
  }

  // 2. Upstream clients and caches
  const known = getCollectorItemNames();
  for (const item of config.collectorItems) {
    if (!known.includes(item)) logger.warn(`No collector adapter for item "${item}"; its hosts will be skipped`);
  }
  const classifier = createAddressClassifier(config.privateNetworks);
  const monitoring = new JsonRpcMonitoringClient({
    url: config.monitoringUrl,
    token: config.monitoringToken,
    timeoutMs: config.requestTimeoutMs,
  });
  const cmdb = new RestCmdbClient({
    url: config.cmdbUrl,
    token: config.cmdbToken,
    timeoutMs: config.requestTimeoutMs,
  });

  let topology: TopologyCache | null = null;
  const inventory = new InventoryCache(cmdb, {
    trackedHosts: config.trackedHosts,
    visibleHosts: () => {
      const snapshot = topology?.current();
      return snapshot ? visibleHostNames(snapshot) : [];
    },
  });
  topology = new TopologyCache(monitoring, {
    windowHours: config.topologyWindowHours,
    collectorItems: config.collectorItems,
    classifier,
    concurrency: config.reportConcurrency,
    inventory,
  });

  const history = new HistoryCache(monitoring, {
    dir: config.cacheDir,
    retentionDays: config.reportRetentionDays,
    concurrency: config.reportConcurrency,
  });
  const artifacts = new ArtifactStore(config.reportDir);
  const reports = new ReportGenerator(
    { monitoring, history, artifacts, classifier, inventory, runs },
    {
      collectorItems: config.collectorItems,
      excludedHosts: config.excludedHosts,
      keep: config.reportKeep,
      concurrency: config.reportConcurrency,
    },
  );
  const problems = new ProblemStore();

  // 3. Background tasks
  const schedulers = startSchedulers(
    { topology, inventory, reports },
    {
      topologyRefreshMs: config.topologyRefreshMs,
      inventoryRefreshMs: config.inventoryRefreshMs,
      reportIntervalMs: config.reportIntervalMs,
    },
  );

  // 4. HTTP API
  const app = await buildApp({
    classifier,
    topology,
    inventory,
    problems,
    artifacts,
    reports,
    runs,
    reportTask: schedulers.reports,
  });

  try {
    await app.listen({ host: config.host, port: config.port });
    logger.info(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error(`[${localTimestamp()}] Failed to start server:`, err);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down…`);
    schedulers.stopAll();
    try {
      await app.close();
      await closeDb();
    } catch (err) {
      console.error(`[${localTimestamp()}] Error during shutdown:`, err);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });
  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });
}

main().catch((err) => {
  console.error(`[${localTimestamp()}] Fatal error:`, err);
  process.exit(1);
});
