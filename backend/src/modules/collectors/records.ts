import type { ConnectionRecord } from '../../types/index.js';
import type { AddressClassifier } from '../../services/ipv4.js';
import type { CollectorReport } from './interface.js';

/** Maps an IP to a known hostname; undefined leaves the bare IP. */
export type HostResolver = (ip: string) => string | undefined;

/**
 * Expand one decoded report into canonical connection records, each
 * counting as a single observation.
 */
export function toConnectionRecords(
  report: CollectorReport,
  host: string,
  resolveHost: HostResolver,
  classifier: AddressClassifier,
): ConnectionRecord[] {
  const last_seen = new Date(report.captured_at * 1000).toISOString();
  const records: ConnectionRecord[] = [];

  for (const c of report.incoming) {
    records.push({
      direction: 'incoming',
      local_host: host,
      local_ip: c.local_ip,
      remote_host: resolveHost(c.remote_ip) ?? c.remote_ip,
      remote_ip: c.remote_ip,
      port: c.local_port,
      is_public_remote: classifier.isPublic(c.remote_ip),
      observed_count: 1,
      peak_connections: c.count,
      last_seen,
    });
  }

  for (const c of report.outgoing) {
    records.push({
      direction: 'outgoing',
      local_host: host,
      local_ip: c.local_ip,
      remote_host: resolveHost(c.remote_ip) ?? c.remote_ip,
      remote_ip: c.remote_ip,
      port: c.remote_port,
      is_public_remote: classifier.isPublic(c.remote_ip),
      observed_count: 1,
      peak_connections: c.count,
      last_seen,
    });
  }

  return records;
}

export function recordKey(r: ConnectionRecord): string {
  return `${r.direction}|${r.local_host}|${r.local_ip}|${r.remote_ip}|${r.port}`;
}

function cmp(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Stable ordering for every emitted row: (local_host, remote_host, port, …). */
export function compareRecords(a: ConnectionRecord, b: ConnectionRecord): number {
  return (
    cmp(a.local_host, b.local_host) ||
    cmp(a.remote_host, b.remote_host) ||
    cmp(a.port, b.port) ||
    cmp(a.direction, b.direction) ||
    cmp(a.local_ip, b.local_ip) ||
    cmp(a.remote_ip, b.remote_ip)
  );
}

/**
 * Merges records by tuple (direction, local host, local IP, remote IP,
 * port), summing observations.
 */
export class ConnectionMerger {
  private readonly byKey = new Map<string, ConnectionRecord>();

  add(records: Iterable<ConnectionRecord>): void {
    for (const r of records) {
      const key = recordKey(r);
      const existing = this.byKey.get(key);
      if (!existing) {
        this.byKey.set(key, { ...r });
        continue;
      }
      existing.observed_count += r.observed_count;
      existing.peak_connections = Math.max(existing.peak_connections, r.peak_connections);
      if (r.last_seen > existing.last_seen) existing.last_seen = r.last_seen;
    }
  }

  get size(): number {
    return this.byKey.size;
  }

  /** Merged records in stable order. */
  values(): ConnectionRecord[] {
    return [...this.byKey.values()].sort(compareRecords);
  }
}

/** Union of record sets without duplicate tuples. */
export function mergeRecords(...sets: Iterable<ConnectionRecord>[]): ConnectionRecord[] {
  const merger = new ConnectionMerger();
  for (const s of sets) merger.add(s);
  return merger.values();
}
