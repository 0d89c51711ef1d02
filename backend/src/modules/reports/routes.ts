import type { FastifyInstance } from 'fastify';
import { readFile } from 'node:fs/promises';
import archiver from 'archiver';
import { logger } from '../../config/logger.js';
import { errorMessage } from '../../types/errors.js';
import type { ArtifactStore } from './artifacts.js';
import { parseArtifactName } from './artifacts.js';
import type { RunHistoryStore } from './runStore.js';

const log = logger.child('reports-api');

const CONTENT_TYPES: Record<string, string> = {
  csv: 'text/csv; charset=utf-8',
  json: 'application/json; charset=utf-8',
  drawio: 'application/xml; charset=utf-8',
};

export interface ReportRouteDeps {
  artifacts: ArtifactStore;
  runs?: RunHistoryStore;
  /** The report task handle; absent when generation is disabled. */
  task?: { trigger: () => Promise<boolean>; isRunning: () => boolean };
}

function parseLimit(value: string | undefined, fallback: number): number {
  const n = Number(value);
  if (!value || !Number.isInteger(n) || n < 1) return fallback;
  return Math.min(n, 100);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function registerReportRoutes(app: FastifyInstance, deps: ReportRouteDeps): Promise<void> {
  const { artifacts } = deps;

  // Latest artifact per (kind, scope)
  app.get('/api/v1/reports', async (_req, reply) => {
    return reply.send(await artifacts.latest());
  });

  app.get<{ Params: { name: string } }>('/api/v1/reports/files/:name', async (request, reply) => {
    const { name } = request.params;
    const path = artifacts.resolve(name);
    const parsed = parseArtifactName(name);
    if (!path || !parsed) return reply.code(400).send({ error: 'Invalid report file name' });

    let content: Buffer;
    try {
      content = await readFile(path);
    } catch (err) {
      if (isMissingFile(err)) return reply.code(404).send({ error: 'Report file not found' });
      throw err;
    }
    return reply
      .header('Content-Disposition', `attachment; filename="${name}"`)
      .type(CONTENT_TYPES[parsed.format] ?? 'application/octet-stream')
      .send(content);
  });

  // Zip of the latest set
  app.get('/api/v1/reports/archive', async (_req, reply) => {
    const latest = await artifacts.latest();
    if (latest.length === 0) return reply.code(404).send({ error: 'No reports generated yet' });

    const archive = archiver('zip', { zlib: { level: 9 } });
    archive.on('warning', (err) => log.warn(`Archive warning: ${errorMessage(err)}`));
    for (const a of latest) {
      const path = artifacts.resolve(a.name);
      if (path) archive.file(path, { name: a.name });
    }
    archive.finalize().catch((err: unknown) => {
      log.error(`Archive failed: ${errorMessage(err)}`);
    });

    return reply
      .header('Content-Disposition', 'attachment; filename="network_blueprint_reports.zip"')
      .type('application/zip')
      .send(archive);
  });

  app.get<{ Querystring: { limit?: string } }>('/api/v1/reports/runs', async (request, reply) => {
    if (!deps.runs) return reply.send([]);
    return reply.send(await deps.runs.recent(parseLimit(request.query.limit, 20)));
  });

  app.post('/api/v1/reports/generate', async (_req, reply) => {
    const task = deps.task;
    if (!task) return reply.code(503).send({ error: 'Report generation is not running' });
    if (task.isRunning()) return reply.code(409).send({ error: 'Report generation already in progress' });

    void task.trigger();
    return reply.code(202).send({ status: 'accepted' });
  });
}
