import { v4 as uuidv4 } from 'uuid';
import {
  REPORT_KINDS,
  REPORT_SCOPES,
  type ConnectionRecord,
  type HostInterface,
  type MonitoredItem,
  type ReportKind,
  type ReportRunResult,
  type ReportRunStatus,
} from '../../types/index.js';
import { errorMessage } from '../../types/errors.js';
import { logger } from '../../config/logger.js';
import type { AddressClassifier } from '../../services/ipv4.js';
import { mapSettled } from '../../services/concurrency.js';
import type { MonitoringClient } from '../monitoring/client.js';
import type { HistoryCache } from '../history/cache.js';
import type { Day } from '../history/days.js';
import { getCollectorAdapter } from '../collectors/registry.js';
import { ConnectionMerger, toConnectionRecords, type HostResolver } from '../collectors/records.js';
import { buildHostResolver, type IpNameSource } from '../topology/cache.js';
import { buildExchangeCsv, buildPerHostJson, buildSummaryCsv, type HostStatus, type ReportContext } from './builders.js';
import { buildDiagram } from './diagram.js';
import { partitionByScope } from './scopes.js';
import type { ArtifactStore } from './artifacts.js';
import type { RunHistoryStore } from './runStore.js';

const log = logger.child('report');

export interface ReportGeneratorDeps {
  monitoring: MonitoringClient;
  history: HistoryCache;
  artifacts: ArtifactStore;
  classifier: AddressClassifier;
  inventory?: IpNameSource;
  runs?: RunHistoryStore;
}

export interface ReportGeneratorOptions {
  collectorItems: readonly string[];
  excludedHosts: readonly string[];
  /** Artifacts kept per (kind, scope). */
  keep: number;
  concurrency: number;
  now?: () => number;
}

interface ItemOutcome {
  records: ConnectionRecord[];
  missingDays: Day[];
  decodeErrors: number;
}

function emptyStatus(): HostStatus {
  return { missing_days: [], decode_errors: 0, error: null };
}

/**
 * Builds the full report set (four kinds × three scopes) from the
 * long-retention history window.
 *
 * Gaps never abort a run: a host whose history or decoding failed is
 * rendered with an incomplete marker, and a failed artifact write only
 * loses that one file.
 */
export class ReportGenerator {
  private lastRun: ReportRunResult | null = null;

  constructor(
    private readonly deps: ReportGeneratorDeps,
    private readonly options: ReportGeneratorOptions,
  ) {}

  latestRun(): ReportRunResult | null {
    return this.lastRun;
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }

  async generateAll(): Promise<ReportRunResult> {
    const startedMs = this.now();
    const run: ReportRunResult = {
      id: uuidv4(),
      started_at: new Date(startedMs).toISOString(),
      finished_at: '',
      duration_ms: 0,
      status: 'failed',
      artifacts_written: [],
      artifacts_failed: [],
      incomplete_hosts: [],
      error: null,
    };
    log.info('Report generation started');

    try {
      await this.buildAndWrite(run, new Date(startedMs));
    } catch (err) {
      run.error = errorMessage(err);
      log.error('Report generation failed:', err);
    }

    const finishedMs = this.now();
    run.finished_at = new Date(finishedMs).toISOString();
    run.duration_ms = Math.max(0, finishedMs - startedMs);
    run.status = this.statusOf(run);
    this.lastRun = run;

    if (this.deps.runs) {
      try {
        await this.deps.runs.record(run);
      } catch (err) {
        log.warn(`Could not record report run ${run.id}: ${errorMessage(err)}`);
      }
    }

    log.info(
      `Report generation ${run.status}: written=${run.artifacts_written.length}, ` +
      `failed=${run.artifacts_failed.length}, incomplete_hosts=${run.incomplete_hosts.length}`,
    );
    if (run.error) throw new Error(`report generation failed: ${run.error}`);
    return run;
  }

  private statusOf(run: ReportRunResult): ReportRunStatus {
    if (run.error || run.artifacts_written.length === 0) return 'failed';
    if (run.artifacts_failed.length > 0 || run.incomplete_hosts.length > 0) return 'partial';
    return 'success';
  }

  private async buildAndWrite(run: ReportRunResult, generatedAt: Date): Promise<void> {
    const { monitoring, history, artifacts, classifier } = this.deps;
    const today = history.today();
    const windowStart = history.windowStart(today);

    const items = await monitoring.getConnectionItems(this.options.collectorItems);
    if (items.length === 0) log.warn('No connection items found; reports will be empty');

    const evicted = await history.sweep(today);
    if (evicted > 0) log.info(`Evicted ${evicted} stale history buckets`);

    let interfaces: HostInterface[] = [];
    try {
      interfaces = await monitoring.getHostInterfaces();
    } catch (err) {
      log.warn(`Host interface lookup failed, remote IPs stay unresolved: ${errorMessage(err)}`);
    }
    const { resolve } = buildHostResolver(interfaces, this.deps.inventory);

    const settled = await mapSettled(items, this.options.concurrency, (item) =>
      this.collectItem(item, windowStart, today, resolve),
    );

    const merger = new ConnectionMerger();
    const hostStatus = new Map<string, HostStatus>();
    settled.forEach((result, i) => {
      const item = items[i];
      const status = hostStatus.get(item.host) ?? emptyStatus();
      hostStatus.set(item.host, status);
      if (result.status === 'rejected') {
        status.error = errorMessage(result.reason);
        log.warn(`Item ${item.item_id} (${item.host}) rendered incomplete: ${status.error}`);
        return;
      }
      merger.add(result.value.records);
      status.missing_days = [...new Set([...status.missing_days, ...result.value.missingDays])].sort();
      status.decode_errors += result.value.decodeErrors;
    });

    const records = merger.values();
    const ctxBase = { window: { start: windowStart, end: today }, hostStatus };
    run.incomplete_hosts = [...hostStatus.entries()]
      .filter(([, s]) => s.missing_days.length > 0 || s.decode_errors > 0 || s.error !== null)
      .map(([host]) => host)
      .sort();

    const scoped = partitionByScope(records, classifier);
    for (const scope of REPORT_SCOPES) {
      const ctx: ReportContext = { ...ctxBase, scope };
      for (const kind of REPORT_KINDS) {
        const label = `${kind}/${scope}`;
        let name: string;
        try {
          name = await artifacts.write(kind, scope, this.render(kind, scoped[scope], ctx), generatedAt);
        } catch (err) {
          run.artifacts_failed.push(label);
          log.error(`Writing ${label} failed: ${errorMessage(err)}`);
          continue;
        }
        run.artifacts_written.push(name);
        try {
          const pruned = await artifacts.prune(kind, scope, this.options.keep);
          if (pruned.length > 0) log.debug(`Pruned ${pruned.join(', ')}`);
        } catch (err) {
          log.warn(`Pruning ${label} failed: ${errorMessage(err)}`);
        }
      }
    }
  }

  private render(kind: ReportKind, rows: ConnectionRecord[], ctx: ReportContext): string {
    switch (kind) {
      case 'summary':
        return buildSummaryCsv(rows, ctx);
      case 'per_host':
        return buildPerHostJson(rows, ctx);
      case 'exchange':
        return buildExchangeCsv(rows);
      case 'diagram':
        return buildDiagram(rows, this.options.excludedHosts);
    }
  }

  private async collectItem(
    item: MonitoredItem,
    startDay: Day,
    endDay: Day,
    resolve: HostResolver,
  ): Promise<ItemOutcome> {
    const adapter = getCollectorAdapter(item.name);
    if (!adapter) throw new Error(`no collector adapter for item "${item.name}"`);

    await this.deps.history.ensureRange(item.item_id, startDay, endDay);
    const { samples, missingDays } = await this.deps.history.readRange(item.item_id, startDay, endDay);

    const merger = new ConnectionMerger();
    let decodeErrors = 0;
    for (const sample of samples) {
      try {
        const report = adapter.parse(sample.value, sample.timestamp);
        merger.add(toConnectionRecords(report, item.host, resolve, this.deps.classifier));
      } catch (err) {
        decodeErrors++;
        log.debug(`Item ${item.item_id} sample @${sample.timestamp} skipped: ${errorMessage(err)}`);
      }
    }
    if (decodeErrors > 0) log.warn(`Item ${item.item_id} (${item.host}): ${decodeErrors} samples could not be decoded`);
    return { records: merger.values(), missingDays, decodeErrors };
  }
}
