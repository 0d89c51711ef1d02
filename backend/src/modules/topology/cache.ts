import type { ConnectionRecord, HostInterface, MonitoredItem } from '../../types/index.js';
import { CollectorDecodeError, errorMessage } from '../../types/errors.js';
import { logger } from '../../config/logger.js';
import { isIpv4, type AddressClassifier } from '../../services/ipv4.js';
import { mapSettled } from '../../services/concurrency.js';
import type { MonitoringClient } from '../monitoring/client.js';
import { getCollectorAdapter } from '../collectors/registry.js';
import { ConnectionMerger, toConnectionRecords, type HostResolver } from '../collectors/records.js';

const log = logger.child('topology');

/** Immutable result of one refresh cycle. */
export interface TopologySnapshot {
  readonly records: readonly ConnectionRecord[];
  /** Hostname → first known IP. */
  readonly hostIps: ReadonlyMap<string, string>;
  /** Hosts that reported successfully this cycle. */
  readonly hosts: readonly string[];
  readonly failedHosts: readonly string[];
  readonly failures: number;
  readonly refreshedAt: string;
  readonly windowStart: string;
}

/** The subset of the inventory cache topology naming depends on. */
export interface IpNameSource {
  lookupByIp(ip: string): string | undefined;
}

export interface TopologyCacheOptions {
  windowHours: number;
  collectorItems: readonly string[];
  classifier: AddressClassifier;
  concurrency?: number;
  inventory?: IpNameSource;
  now?: () => number;
}

/**
 * Build the IP → host resolver: monitoring interfaces first, then CMDB
 * primary IPs.
 */
export function buildHostResolver(
  interfaces: readonly HostInterface[],
  inventory?: IpNameSource,
): { resolve: HostResolver; hostIps: Map<string, string> } {
  const ipToHost = new Map<string, string>();
  const hostIps = new Map<string, string>();
  for (const { host, ip } of interfaces) {
    if (!ipToHost.has(ip)) ipToHost.set(ip, host);
    if (!hostIps.has(host)) hostIps.set(host, ip);
  }
  const resolve: HostResolver = (ip) => ipToHost.get(ip) ?? inventory?.lookupByIp(ip);
  return { resolve, hostIps };
}

/** Every named node of the graph: reporting hosts and resolved remote peers. */
export function visibleHostNames(snapshot: TopologySnapshot): string[] {
  const names = new Set<string>(snapshot.hosts);
  for (const r of snapshot.records) {
    if (!isIpv4(r.remote_host)) names.add(r.remote_host);
  }
  return [...names].sort();
}

/**
 * Rolling connection graph for the short window (24h by default).
 *
 * refresh() rebuilds the whole snapshot and swaps the reference; current()
 * hands out whatever snapshot is in place, so readers never see a
 * half-built graph and never wait on a refresh.
 */
export class TopologyCache {
  private snapshot: TopologySnapshot | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly monitoring: MonitoringClient,
    private readonly options: TopologyCacheOptions,
  ) {}

  current(): TopologySnapshot | null {
    return this.snapshot;
  }

  /** Error of the last failed cycle, cleared by the next successful one. */
  lastRefreshError(): string | null {
    return this.lastError;
  }

  async refresh(): Promise<TopologySnapshot> {
    try {
      const next = await this.build();
      this.snapshot = next;
      this.lastError = null;
      return next;
    } catch (err) {
      this.lastError = errorMessage(err);
      throw err;
    }
  }

  private async build(): Promise<TopologySnapshot> {
    const start = Date.now();
    const nowMs = this.options.now ? this.options.now() : Date.now();
    const timeTill = Math.floor(nowMs / 1000);
    const timeFrom = timeTill - Math.round(this.options.windowHours * 3600);

    const items = await this.monitoring.getConnectionItems(this.options.collectorItems);

    let interfaces: HostInterface[] = [];
    try {
      interfaces = await this.monitoring.getHostInterfaces();
    } catch (err) {
      log.warn(`Host interface lookup failed, remote IPs stay unresolved: ${errorMessage(err)}`);
    }
    const { resolve, hostIps } = buildHostResolver(interfaces, this.options.inventory);

    const settled = await mapSettled(items, this.options.concurrency ?? 4, (item) =>
      this.collectItem(item, timeFrom, timeTill + 1, resolve),
    );

    const merger = new ConnectionMerger();
    const hosts = new Set<string>();
    const failedHosts = new Set<string>();
    settled.forEach((result, i) => {
      const item = items[i];
      if (result.status === 'fulfilled') {
        merger.add(result.value);
        hosts.add(item.host);
        return;
      }
      failedHosts.add(item.host);
      log.warn(`Host "${item.host}" (item ${item.item_id}) dropped this cycle: ${errorMessage(result.reason)}`);
    });

    const records = merger.values();
    for (const r of records) {
      if (!hostIps.has(r.local_host)) hostIps.set(r.local_host, r.local_ip);
    }

    const snapshot: TopologySnapshot = Object.freeze({
      records: Object.freeze(records.map((r) => Object.freeze(r))),
      hostIps,
      hosts: [...hosts].sort(),
      failedHosts: [...failedHosts].sort(),
      failures: failedHosts.size,
      refreshedAt: new Date(nowMs).toISOString(),
      windowStart: new Date(timeFrom * 1000).toISOString(),
    });

    log.info(
      `Refreshed in ${Date.now() - start}ms: items=${items.length}, records=${records.length}, failures=${failedHosts.size}`,
    );
    return snapshot;
  }

  private async collectItem(
    item: MonitoredItem,
    timeFrom: number,
    timeTill: number,
    resolve: HostResolver,
  ): Promise<ConnectionRecord[]> {
    const adapter = getCollectorAdapter(item.name);
    if (!adapter) throw new CollectorDecodeError(`no collector adapter for item "${item.name}"`);

    const history = await this.monitoring.getHistory(item.item_id, timeFrom, timeTill);
    const merger = new ConnectionMerger();
    for (const sample of history) {
      const report = adapter.parse(sample.value, sample.timestamp);
      merger.add(toConnectionRecords(report, item.host, resolve, this.options.classifier));
    }
    return merger.values();
  }
}
