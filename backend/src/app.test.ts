import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { createAddressClassifier } from './services/ipv4.js';
import { DEFAULT_PRIVATE_NETWORKS } from './config/index.js';
import { setLogLevel } from './config/logger.js';
import { ArtifactStore } from './modules/reports/artifacts.js';
import type { RunHistoryStore } from './modules/reports/runStore.js';
import { ProblemStore } from './modules/problems/store.js';
import { InventoryCache } from './modules/inventory/cache.js';
import type { CmdbClient } from './modules/inventory/cmdbClient.js';
import type { TopologySnapshot } from './modules/topology/cache.js';
import type { InventoryRecord, ReportRunResult } from './types/index.js';

const db1: InventoryRecord = {
  name: 'db1',
  vcpus: 4,
  memory_mb: 8192,
  disk_mb: null,
  os: 'RHEL 9',
  os_eol: null,
  patch_window: 'Sun 02:00',
  role: 'prod database',
  tags: [],
  ha_peers: [],
  primary_ip: '10.0.0.20',
  services: [],
};

const cmdb: CmdbClient = {
  listVirtualMachines: async () => [{ ...db1 }],
  listServices: async () => [{ host: 'db1', name: 'postgres', protocol: 'tcp', ports: [5432] }],
  getVirtualMachine: async () => null,
};

const snapshot: TopologySnapshot = {
  records: [
    {
      direction: 'outgoing',
      local_host: 'web1',
      local_ip: '10.0.0.10',
      remote_host: 'db1',
      remote_ip: '10.0.0.20',
      port: 5432,
      is_public_remote: false,
      observed_count: 2,
      peak_connections: 1,
      last_seen: '2024-05-31T11:00:00.000Z',
    },
    {
      direction: 'incoming',
      local_host: 'web1',
      local_ip: '10.0.0.10',
      remote_host: '203.0.113.9',
      remote_ip: '203.0.113.9',
      port: 443,
      is_public_remote: true,
      observed_count: 1,
      peak_connections: 1,
      last_seen: '2024-05-31T11:00:00.000Z',
    },
  ],
  hostIps: new Map([['web1', '10.0.0.10']]),
  hosts: ['web1'],
  failedHosts: [],
  failures: 0,
  refreshedAt: '2024-05-31T12:00:00.000Z',
  windowStart: '2024-05-30T12:00:00.000Z',
};

const pastRun: ReportRunResult = {
  id: 'run-1',
  started_at: '2024-05-31T02:00:00.000Z',
  finished_at: '2024-05-31T02:00:05.000Z',
  duration_ms: 5000,
  status: 'success',
  artifacts_written: [],
  artifacts_failed: [],
  incomplete_hosts: [],
  error: null,
};

let dir: string;
let app: FastifyInstance;
let current: TopologySnapshot | null;
let running: boolean;
let problems: ProblemStore;
let artifacts: ArtifactStore;
const trigger = vi.fn(async () => true);

const runs: RunHistoryStore = {
  record: async () => {},
  recent: async (limit) => [pastRun].slice(0, limit),
};

beforeAll(() => setLogLevel('error'));

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'netmap-app-'));
  current = null;
  running = false;
  trigger.mockClear();
  problems = new ProblemStore(() => Date.parse('2024-05-31T12:00:00Z'));
  artifacts = new ArtifactStore(dir);
  const inventory = new InventoryCache(cmdb);
  await inventory.refresh();

  app = await buildApp(
    {
      classifier: createAddressClassifier(DEFAULT_PRIVATE_NETWORKS),
      topology: { current: () => current, lastRefreshError: () => null },
      inventory,
      problems,
      artifacts,
      reports: { latestRun: () => null },
      runs,
      reportTask: { trigger, isRunning: () => running },
    },
    { logger: false },
  );
});

afterEach(async () => {
  await app.close();
  await rm(dir, { recursive: true, force: true });
});

describe('HTTP API', () => {
  it('answers the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
  });

  describe('graph', () => {
    it('is 503 until the first topology refresh', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/graph' });
      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ error: 'not_yet_available' });
    });

    it('applies query filters', async () => {
      current = snapshot;
      const all = await app.inject({ method: 'GET', url: '/api/v1/graph' });
      expect(all.json().edges).toHaveLength(2);

      const res = await app.inject({ method: 'GET', url: '/api/v1/graph?exclude_public=true&port=1-10000' });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.edges.map((e: { source: string; target: string }) => `${e.source}>${e.target}`)).toEqual(['web1>db1']);
      expect(body.nodes.map((n: { id: string; environment: string }) => [n.id, n.environment])).toEqual([
        ['db1', 'prod'],
        ['web1', 'unknown'],
      ]);
    });

    it('flags hosts with an active problem', async () => {
      current = snapshot;
      const hook = await app.inject({
        method: 'POST',
        url: '/api/v1/webhook/monitoring-event',
        payload: { event: 'problem', server: 'db1' },
      });
      expect(hook.statusCode).toBe(200);

      const res = await app.inject({ method: 'GET', url: '/api/v1/graph?host=db1' });
      const nodes: Array<{ id: string; problem: boolean }> = res.json().nodes;
      expect(nodes.map((n) => [n.id, n.problem])).toEqual([
        ['db1', true],
        ['web1', false],
      ]);
    });
  });

  describe('problems webhook', () => {
    it('opens and resolves problems', async () => {
      await app.inject({ method: 'POST', url: '/api/v1/webhook/monitoring-event', payload: { event: 'problem', server: 'web1' } });
      let list = await app.inject({ method: 'GET', url: '/api/v1/problems' });
      expect(list.json()).toEqual([{ host: 'web1', since: '2024-05-31T12:00:00.000Z' }]);

      await app.inject({ method: 'POST', url: '/api/v1/webhook/monitoring-event', payload: { event: 'resolve', server: 'WEB1' } });
      list = await app.inject({ method: 'GET', url: '/api/v1/problems' });
      expect(list.json()).toEqual([]);
    });

    it('rejects malformed events', async () => {
      const bad = await app.inject({ method: 'POST', url: '/api/v1/webhook/monitoring-event', payload: { event: 'ack', server: 'web1' } });
      expect(bad.statusCode).toBe(400);
      const noServer = await app.inject({ method: 'POST', url: '/api/v1/webhook/monitoring-event', payload: { event: 'problem' } });
      expect(noServer.statusCode).toBe(400);
    });
  });

  describe('inventory', () => {
    it('returns the cached record and services', async () => {
      const host = await app.inject({ method: 'GET', url: '/api/v1/inventory/host?name=DB1' });
      expect(host.statusCode).toBe(200);
      expect(host.json().patch_window).toBe('Sun 02:00');

      const services = await app.inject({ method: 'GET', url: '/api/v1/inventory/services?name=db1' });
      expect(services.json()).toEqual([{ name: 'postgres', protocol: 'tcp', ports: [5432] }]);
    });

    it('is 404 for unknown hosts and 400 without a name', async () => {
      expect((await app.inject({ method: 'GET', url: '/api/v1/inventory/host?name=nope' })).statusCode).toBe(404);
      expect((await app.inject({ method: 'GET', url: '/api/v1/inventory/host' })).statusCode).toBe(400);
    });
  });

  describe('reports', () => {
    it('lists and downloads the latest artifacts', async () => {
      const name = await artifacts.write('exchange', 'all', 'Source,SourceIP,Target,TargetIP,Port,Count\n', new Date('2024-05-31T02:00:00Z'));

      const list = await app.inject({ method: 'GET', url: '/api/v1/reports' });
      expect(list.json().map((a: { name: string }) => a.name)).toEqual([name]);

      const file = await app.inject({ method: 'GET', url: `/api/v1/reports/files/${name}` });
      expect(file.statusCode).toBe(200);
      expect(file.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(file.body).toBe('Source,SourceIP,Target,TargetIP,Port,Count\n');
    });

    it('rejects unknown and invalid file names', async () => {
      const missing = await app.inject({ method: 'GET', url: '/api/v1/reports/files/network_blueprint_summary_all_20240101-000000.csv' });
      expect(missing.statusCode).toBe(404);
      const invalid = await app.inject({ method: 'GET', url: '/api/v1/reports/files/passwd' });
      expect(invalid.statusCode).toBe(400);
    });

    it('zips the latest set', async () => {
      expect((await app.inject({ method: 'GET', url: '/api/v1/reports/archive' })).statusCode).toBe(404);

      await artifacts.write('summary', 'all', 'x\n', new Date('2024-05-31T02:00:00Z'));
      const res = await app.inject({ method: 'GET', url: '/api/v1/reports/archive' });
      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('application/zip');
      expect(res.rawPayload.subarray(0, 2).toString('latin1')).toBe('PK');
    });

    it('returns recent runs', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/reports/runs?limit=5' });
      expect(res.json()).toEqual([pastRun]);
    });

    it('triggers generation unless a run is in progress', async () => {
      const accepted = await app.inject({ method: 'POST', url: '/api/v1/reports/generate' });
      expect(accepted.statusCode).toBe(202);
      expect(trigger).toHaveBeenCalledTimes(1);

      running = true;
      const busy = await app.inject({ method: 'POST', url: '/api/v1/reports/generate' });
      expect(busy.statusCode).toBe(409);
      expect(trigger).toHaveBeenCalledTimes(1);
    });
  });

  it('reports status', async () => {
    current = snapshot;
    const res = await app.inject({ method: 'GET', url: '/api/v1/status' });
    const body = res.json();
    expect(body.topology).toMatchObject({ refreshed_at: '2024-05-31T12:00:00.000Z', hosts: 1, records: 2, failures: 0 });
    expect(body.inventory.hosts).toBe(1);
    expect(body.last_report_run).toBeNull();
  });
});
