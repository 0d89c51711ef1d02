import type { HistorySample, HostInterface, MonitoredItem } from '../../types/index.js';
import { UpstreamError } from '../../types/errors.js';
import { isObject } from '../collectors/coerce.js';

// ── Monitoring client interface ──────────────────────────────

/**
 * Read-only access to the monitoring system. The topology cache, the
 * history cache and the report generator only depend on this interface;
 * tests substitute an in-memory implementation.
 */
export interface MonitoringClient {
  /** Enabled hosts with their interface IPs. */
  getHostInterfaces(): Promise<HostInterface[]>;
  /** Connection-listing items, one per host and collector. */
  getConnectionItems(itemNames: readonly string[]): Promise<MonitoredItem[]>;
  /** Samples of one item with timeFrom <= clock < timeTill, oldest first. */
  getHistory(itemId: string, timeFrom: number, timeTill: number): Promise<HistorySample[]>;
}

// ── JSON-RPC implementation ──────────────────────────────────

export interface JsonRpcMonitoringOptions {
  url: string;
  token: string;
  timeoutMs: number;
  /** Cap on samples per history.get call. */
  historyLimit?: number;
}

/** Text history type (collector reports are stored as text items). */
const HISTORY_TYPE_TEXT = 4;

function asString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Monitoring client speaking the Zabbix-style JSON-RPC 2.0 API
 * (`host.get`, `item.get`, `history.get`).
 */
export class JsonRpcMonitoringClient implements MonitoringClient {
  private requestId = 0;

  constructor(private readonly options: JsonRpcMonitoringOptions) {}

  async call(method: string, params: Record<string, unknown>): Promise<unknown> {
    const payload = {
      jsonrpc: '2.0',
      method,
      params,
      id: ++this.requestId,
    };

    const headers: Record<string, string> = { 'Content-Type': 'application/json-rpc' };
    if (this.options.token) headers.Authorization = `Bearer ${this.options.token}`;

    let res: Response;
    try {
      res = await fetch(this.options.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamError('monitoring', `${method} request failed`, { cause: err });
    }

    if (!res.ok) {
      throw new UpstreamError('monitoring', `${method} HTTP ${res.status}: ${(await res.text()).slice(0, 200)}`);
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      throw new UpstreamError('monitoring', `${method}: malformed response`, { cause: err });
    }
    if (!isObject(data)) throw new UpstreamError('monitoring', `${method}: malformed response`);
    if (data.error !== undefined) {
      throw new UpstreamError('monitoring', `${method}: ${JSON.stringify(data.error)}`);
    }
    return data.result;
  }

  async getHostInterfaces(): Promise<HostInterface[]> {
    const result = await this.call('host.get', {
      output: ['host'],
      selectInterfaces: ['ip'],
      filter: { status: 0 },
    });

    const out: HostInterface[] = [];
    for (const h of Array.isArray(result) ? result : []) {
      if (!isObject(h)) continue;
      const host = asString(h.host);
      if (!host) continue;
      for (const iface of Array.isArray(h.interfaces) ? h.interfaces : []) {
        const ip = isObject(iface) ? asString(iface.ip) : null;
        if (ip) out.push({ host, ip });
      }
    }
    return out;
  }

  async getConnectionItems(itemNames: readonly string[]): Promise<MonitoredItem[]> {
    const result = await this.call('item.get', {
      output: ['itemid', 'name'],
      filter: { name: [...itemNames] },
      selectHosts: ['host'],
    });

    const out: MonitoredItem[] = [];
    for (const item of Array.isArray(result) ? result : []) {
      if (!isObject(item)) continue;
      const item_id = asString(item.itemid);
      const name = asString(item.name);
      const firstHost: unknown = Array.isArray(item.hosts) ? item.hosts[0] : undefined;
      const host = isObject(firstHost) ? asString(firstHost.host) : null;
      if (item_id && name && host) out.push({ item_id, host, name });
    }
    return out;
  }

  async getHistory(itemId: string, timeFrom: number, timeTill: number): Promise<HistorySample[]> {
    const result = await this.call('history.get', {
      output: 'extend',
      history: HISTORY_TYPE_TEXT,
      itemids: [itemId],
      time_from: timeFrom,
      // time_till is inclusive upstream
      time_till: timeTill - 1,
      sortfield: 'clock',
      sortorder: 'ASC',
      limit: this.options.historyLimit ?? 100_000,
    });

    const out: HistorySample[] = [];
    for (const entry of Array.isArray(result) ? result : []) {
      if (!isObject(entry)) continue;
      const clock = Number(entry.clock);
      const value = asString(entry.value);
      if (!Number.isFinite(clock) || value === null) continue;
      out.push({ item_id: itemId, timestamp: clock, value });
    }
    return out;
  }
}
