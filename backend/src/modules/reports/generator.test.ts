import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ReportGenerator } from './generator.js';
import { ArtifactStore } from './artifacts.js';
import type { RunHistoryStore } from './runStore.js';
import { HistoryCache } from '../history/cache.js';
import { dayStartSeconds } from '../history/days.js';
import { InMemoryMonitoringClient } from '../monitoring/inMemoryClient.js';
import { createAddressClassifier } from '../../services/ipv4.js';
import { DEFAULT_COLLECTOR_ITEMS, DEFAULT_PRIVATE_NETWORKS } from '../../config/index.js';
import { setLogLevel } from '../../config/logger.js';
import type { ReportKind, ReportRunResult, ReportScope } from '../../types/index.js';

const NOW = Date.parse('2024-05-31T12:00:00Z');

class MemoryRunStore implements RunHistoryStore {
  readonly runs: ReportRunResult[] = [];

  async record(run: ReportRunResult): Promise<void> {
    this.runs.push(structuredClone(run));
  }

  async recent(limit: number): Promise<ReportRunResult[]> {
    return this.runs.slice(-limit).reverse();
  }
}

class FlakyArtifactStore extends ArtifactStore {
  async write(kind: ReportKind, scope: ReportScope, content: string, generatedAt: Date): Promise<string> {
    if (kind === 'diagram') throw new Error('disk full');
    return super.write(kind, scope, content, generatedAt);
  }
}

function linux(incoming: Array<[string, number, string]>, outgoing: Array<[string, string, number]> = []) {
  return {
    openports: [],
    incomingconnections: incoming.map(([localip, localport, remoteip]) => ({ localip, localport: String(localport), remoteip, count: '1' })),
    outgoingconnections: outgoing.map(([localip, remoteip, remoteport]) => ({ localip, remoteip, remoteport: String(remoteport), count: '1' })),
  };
}

let root: string;
let monitoring: InMemoryMonitoringClient;
let runs: MemoryRunStore;
let clock: number;

function makeGenerator(artifacts = new ArtifactStore(join(root, 'reports'))) {
  const history = new HistoryCache(monitoring, { dir: join(root, 'cache'), retentionDays: 30, now: () => NOW });
  const generator = new ReportGenerator(
    { monitoring, history, artifacts, classifier: createAddressClassifier(DEFAULT_PRIVATE_NETWORKS), runs },
    { collectorItems: DEFAULT_COLLECTOR_ITEMS, excludedHosts: ['Zabbix server'], keep: 3, concurrency: 2, now: () => clock },
  );
  return { generator, artifacts };
}

async function latestContent(artifacts: ArtifactStore, kind: ReportKind, scope: ReportScope): Promise<string> {
  const entry = (await artifacts.latest()).find((a) => a.kind === kind && a.scope === scope);
  if (!entry) throw new Error(`no ${kind}/${scope} artifact`);
  return readFile(join(artifacts.dir, entry.name), 'utf8');
}

beforeAll(() => setLogLevel('error'));

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'netmap-reports-'));
  runs = new MemoryRunStore();
  clock = NOW;
  monitoring = new InMemoryMonitoringClient()
    .addItem({ item_id: '1', host: 'web1', name: 'linux-network-connections' }, '10.0.0.10')
    .addItem({ item_id: '2', host: 'db1', name: 'linux-network-connections' }, '10.0.0.20')
    .addSample('1', dayStartSeconds('2024-05-10') + 3600, linux([['10.0.0.10', 443, '203.0.113.9']]))
    .addSample('1', dayStartSeconds('2024-05-15') + 3600, linux([['10.0.0.10', 8443, '203.0.113.9']]))
    .addSample('1', NOW / 1000 - 3600, linux([], [['10.0.0.10', '10.0.0.20', 5432]]))
    .addSample('2', dayStartSeconds('2024-05-20') + 3600, linux([['10.0.0.20', 5432, '10.0.0.10']]));
  // Day 15 of web1's window cannot be fetched.
  const failing = dayStartSeconds('2024-05-15');
  monitoring.failHistory = (call) => call.itemId === '1' && call.timeFrom === failing;
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('ReportGenerator', () => {
  it('marks hosts with a failed day incomplete and keeps the others correct', async () => {
    const { generator, artifacts } = makeGenerator();
    const run = await generator.generateAll();

    expect(run.status).toBe('partial');
    expect(run.incomplete_hosts).toEqual(['web1']);
    expect(run.artifacts_written).toHaveLength(12);
    expect(run.artifacts_failed).toEqual([]);
    expect(run.artifacts_written).toContain('network_blueprint_summary_all_20240531-120000.csv');

    expect(await latestContent(artifacts, 'summary', 'all')).toBe(
      'Host,Direction,LocalIP,Port,RemoteIP,RemoteHost,Observed,PeakConnections,Public,LastSeen\n' +
      'db1,incoming,10.0.0.20,5432,10.0.0.10,web1,1,1,false,2024-05-20T01:00:00.000Z\n' +
      'web1,incoming,10.0.0.10,443,203.0.113.9,203.0.113.9,1,1,true,2024-05-10T01:00:00.000Z\n' +
      'web1,outgoing,10.0.0.10,5432,10.0.0.20,db1,1,1,false,2024-05-31T11:00:00.000Z\n' +
      '# incomplete: web1\n',
    );

    const perHost = JSON.parse(await latestContent(artifacts, 'per_host', 'all'));
    expect(perHost.window).toEqual({ start: '2024-05-01', end: '2024-05-31' });
    expect(perHost.hosts.map((h: { host: string; incomplete: boolean; missing_days: string[] }) =>
      [h.host, h.incomplete, h.missing_days])).toEqual([
      ['db1', false, []],
      ['web1', true, ['2024-05-15']],
    ]);

    expect(await latestContent(artifacts, 'exchange', 'public')).toBe(
      'Source,SourceIP,Target,TargetIP,Port,Count\n' +
      '203.0.113.9,203.0.113.9,web1,10.0.0.10,443,1\n',
    );
    expect(await latestContent(artifacts, 'exchange', 'internal')).toBe(
      'Source,SourceIP,Target,TargetIP,Port,Count\n' +
      'web1,10.0.0.10,db1,10.0.0.20,5432,1\n' +
      'web1,10.0.0.10,db1,10.0.0.20,5432,1\n',
    );
  });

  it('produces identical content on a second run without upstream changes', async () => {
    const { generator, artifacts } = makeGenerator();
    await generator.generateAll();
    const first = await Promise.all(
      (await artifacts.latest()).map((a) => readFile(join(artifacts.dir, a.name), 'utf8')),
    );
    expect(monitoring.historyCalls).toHaveLength(62);

    clock = NOW + 60_000;
    const second = await generator.generateAll();
    expect(second.artifacts_written).toContain('network_blueprint_summary_all_20240531-120100.csv');
    const again = await Promise.all(
      (await artifacts.latest()).map((a) => readFile(join(artifacts.dir, a.name), 'utf8')),
    );
    expect(again).toEqual(first);
    // Today for both items plus the retried failed day.
    expect(monitoring.historyCalls).toHaveLength(65);
  });

  it('counts undecodable samples against the host', async () => {
    monitoring.addSample('2', dayStartSeconds('2024-05-21') + 60, 'garbage');
    const { generator, artifacts } = makeGenerator();
    const run = await generator.generateAll();
    expect(run.incomplete_hosts).toEqual(['db1', 'web1']);

    const perHost = JSON.parse(await latestContent(artifacts, 'per_host', 'internal'));
    const db1 = perHost.hosts.find((h: { host: string }) => h.host === 'db1');
    expect(db1.decode_errors).toBe(1);
    expect(db1.incomplete).toBe(true);
    expect(db1.incoming).toHaveLength(1);
  });

  it('records a failed artifact and still writes the rest', async () => {
    const { generator } = makeGenerator(new FlakyArtifactStore(join(root, 'reports')));
    const run = await generator.generateAll();
    expect(run.artifacts_failed).toEqual(['diagram/all', 'diagram/internal', 'diagram/public']);
    expect(run.artifacts_written).toHaveLength(9);
    expect(run.status).toBe('partial');
  });

  it('records the run in history', async () => {
    const { generator } = makeGenerator();
    const run = await generator.generateAll();
    expect(runs.runs).toEqual([run]);
    expect(generator.latestRun()).toBe(run);
    expect(run.started_at).toBe('2024-05-31T12:00:00.000Z');
  });

  it('fails the run when items cannot be listed', async () => {
    monitoring.failItemListing = true;
    const { generator } = makeGenerator();
    await expect(generator.generateAll()).rejects.toThrow('report generation failed: monitoring: item.get failed');
    expect(runs.runs).toHaveLength(1);
    expect(runs.runs[0].status).toBe('failed');
    expect(runs.runs[0].error).toBe('monitoring: item.get failed');
    expect(generator.latestRun()?.status).toBe('failed');
  });

  it('prunes old artifacts beyond the keep count', async () => {
    const { generator, artifacts } = makeGenerator();
    for (let i = 0; i < 4; i++) {
      clock = NOW + i * 1000;
      await generator.generateAll();
    }
    const summaries = (await artifacts.list()).filter((a) => a.kind === 'summary' && a.scope === 'all');
    expect(summaries.map((a) => a.name)).toEqual([
      'network_blueprint_summary_all_20240531-120003.csv',
      'network_blueprint_summary_all_20240531-120002.csv',
      'network_blueprint_summary_all_20240531-120001.csv',
    ]);
  });
});
