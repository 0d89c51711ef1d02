import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { localTimestamp } from './config/index.js';
import type { AddressClassifier } from './services/ipv4.js';
import type { TopologyCache } from './modules/topology/cache.js';
import type { InventoryCache } from './modules/inventory/cache.js';
import type { ArtifactStore } from './modules/reports/artifacts.js';
import type { RunHistoryStore } from './modules/reports/runStore.js';
import type { ReportGenerator } from './modules/reports/generator.js';
import type { ProblemStore } from './modules/problems/store.js';
import type { TaskHandle } from './modules/scheduler/scheduler.js';
import { registerGraphRoutes } from './modules/graph/routes.js';
import { registerInventoryRoutes } from './modules/inventory/routes.js';
import { registerReportRoutes } from './modules/reports/routes.js';
import { registerProblemRoutes } from './modules/problems/routes.js';
import { registerStatusRoutes } from './modules/status/routes.js';

export interface AppDeps {
  classifier: AddressClassifier;
  topology: Pick<TopologyCache, 'current' | 'lastRefreshError'>;
  inventory: Pick<InventoryCache, 'current' | 'lookup' | 'services'>;
  problems: ProblemStore;
  artifacts: ArtifactStore;
  reports: Pick<ReportGenerator, 'latestRun'>;
  runs?: RunHistoryStore;
  reportTask?: Pick<TaskHandle, 'trigger' | 'isRunning'>;
}

export interface AppOptions {
  /** Request logging through pino; tests turn it off. */
  logger?: boolean;
}

export async function buildApp(deps: AppDeps, options: AppOptions = {}): Promise<FastifyInstance> {
  const isProd = process.env.NODE_ENV === 'production';
  const app = Fastify({
    logger: options.logger === false
      ? false
      : isProd
        ? true
        : {
            transport: {
              target: 'pino-pretty',
              options: { translateTime: 'SYS:standard', ignore: 'pid,hostname' },
            },
          },
    bodyLimit: 1_048_576,
  });

  // ── Security plugins ───────────────────────────────────────
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  const corsOrigin = process.env.CORS_ORIGIN;
  await app.register(cors, {
    origin: corsOrigin ? corsOrigin.split(',').map((s) => s.trim()) : true,
    methods: ['GET', 'POST'],
  });

  // ── Rate limiting ──────────────────────────────────────────
  await app.register(rateLimit, {
    max: 200,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
  });

  // ── Health check ───────────────────────────────────────────
  app.get('/healthz', async () => ({ status: 'ok', time: localTimestamp() }));

  // ── API routes ─────────────────────────────────────────────
  await registerStatusRoutes(app, deps);
  await registerGraphRoutes(app, {
    topology: deps.topology,
    classifier: deps.classifier,
    inventory: deps.inventory,
    problems: deps.problems,
  });
  await registerInventoryRoutes(app, deps.inventory);
  await registerReportRoutes(app, { artifacts: deps.artifacts, runs: deps.runs, task: deps.reportTask });
  await registerProblemRoutes(app, deps.problems);

  return app;
}
