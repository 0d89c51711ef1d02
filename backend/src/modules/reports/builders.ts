import type { ConnectionRecord, ReportScope } from '../../types/index.js';
import { compareRecords } from '../collectors/records.js';
import { csvDocument } from './csv.js';

/** Per-host data quality, rendered as the "incomplete data" marker. */
export interface HostStatus {
  missing_days: string[];
  decode_errors: number;
  error: string | null;
}

export interface ReportContext {
  scope: ReportScope;
  window: { start: string; end: string };
  hostStatus: ReadonlyMap<string, HostStatus>;
}

export function isIncomplete(status: HostStatus | undefined): boolean {
  return !!status && (status.missing_days.length > 0 || status.decode_errors > 0 || status.error !== null);
}

function incompleteHosts(ctx: ReportContext): string[] {
  return [...ctx.hostStatus.entries()]
    .filter(([, status]) => isIncomplete(status))
    .map(([host]) => host)
    .sort();
}

function sorted(rows: readonly ConnectionRecord[]): ConnectionRecord[] {
  return [...rows].sort(compareRecords);
}

// ── Summary (CSV) ────────────────────────────────────────────

const SUMMARY_HEADER = [
  'Host', 'Direction', 'LocalIP', 'Port', 'RemoteIP', 'RemoteHost',
  'Observed', 'PeakConnections', 'Public', 'LastSeen',
];

/**
 * Every connection of the scope, one row each. Hosts with partial data
 * are listed in a trailing `# incomplete:` line.
 */
export function buildSummaryCsv(rows: readonly ConnectionRecord[], ctx: ReportContext): string {
  let doc = csvDocument(
    SUMMARY_HEADER,
    sorted(rows).map((r) => [
      r.local_host, r.direction, r.local_ip, r.port, r.remote_ip, r.remote_host,
      r.observed_count, r.peak_connections, r.is_public_remote, r.last_seen,
    ]),
  );
  const incomplete = incompleteHosts(ctx);
  if (incomplete.length > 0) doc += `# incomplete: ${incomplete.join(',')}\n`;
  return doc;
}

// ── Per host (JSON) ──────────────────────────────────────────

interface PerHostRow {
  local_ip: string;
  port: number;
  remote_ip: string;
  remote_host: string;
  observed_count: number;
  peak_connections: number;
  is_public_remote: boolean;
  last_seen: string;
}

interface PerHostSection {
  host: string;
  incomplete: boolean;
  missing_days: string[];
  decode_errors: number;
  incoming: PerHostRow[];
  outgoing: PerHostRow[];
}

function perHostRow(r: ConnectionRecord): PerHostRow {
  return {
    local_ip: r.local_ip,
    port: r.port,
    remote_ip: r.remote_ip,
    remote_host: r.remote_host,
    observed_count: r.observed_count,
    peak_connections: r.peak_connections,
    is_public_remote: r.is_public_remote,
    last_seen: r.last_seen,
  };
}

/**
 * One section per reporting host. Hosts with partial history appear even
 * when the scope holds none of their rows, so the gap is visible.
 */
export function buildPerHostJson(rows: readonly ConnectionRecord[], ctx: ReportContext): string {
  const byHost = new Map<string, ConnectionRecord[]>();
  for (const r of sorted(rows)) {
    const list = byHost.get(r.local_host) ?? [];
    list.push(r);
    byHost.set(r.local_host, list);
  }
  for (const host of incompleteHosts(ctx)) {
    if (!byHost.has(host)) byHost.set(host, []);
  }

  const hosts: PerHostSection[] = [...byHost.keys()].sort().map((host) => {
    const status = ctx.hostStatus.get(host);
    const records = byHost.get(host) ?? [];
    return {
      host,
      incomplete: isIncomplete(status),
      missing_days: status ? [...status.missing_days] : [],
      decode_errors: status?.decode_errors ?? 0,
      incoming: records.filter((r) => r.direction === 'incoming').map(perHostRow),
      outgoing: records.filter((r) => r.direction === 'outgoing').map(perHostRow),
    };
  });

  return JSON.stringify({ scope: ctx.scope, window: ctx.window, hosts }, null, 2) + '\n';
}

// ── Exchange format (CSV edge list for graph tools) ──────────

/** Oriented edge list: Source,SourceIP,Target,TargetIP,Port,Count. */
export function buildExchangeCsv(rows: readonly ConnectionRecord[]): string {
  const lines: Array<Array<string | number>> = [];
  for (const r of sorted(rows)) {
    if (!r.local_host || !r.remote_host) continue;
    lines.push(
      r.direction === 'outgoing'
        ? [r.local_host, r.local_ip, r.remote_host, r.remote_ip, r.port, r.observed_count]
        : [r.remote_host, r.remote_ip, r.local_host, r.local_ip, r.port, r.observed_count],
    );
  }
  return csvDocument(['Source', 'SourceIP', 'Target', 'TargetIP', 'Port', 'Count'], lines);
}
