import type { HistorySample, HostInterface, MonitoredItem } from '../../types/index.js';
import { UpstreamError } from '../../types/errors.js';
import type { MonitoringClient } from './client.js';

export interface HistoryCall {
  itemId: string;
  timeFrom: number;
  timeTill: number;
}

/** In-process MonitoringClient over fixed data, for tests. */
export class InMemoryMonitoringClient implements MonitoringClient {
  interfaces: HostInterface[] = [];
  items: MonitoredItem[] = [];
  readonly historyCalls: HistoryCall[] = [];
  /** Return true to make a history call fail with an UpstreamError. */
  failHistory: (call: HistoryCall) => boolean = () => false;
  failItemListing = false;
  failInterfaces = false;
  /** Artificial latency of every history call. */
  historyDelayMs = 0;
  /** Called as each history call starts. */
  onHistory?: (call: HistoryCall) => void;
  /** Most history calls seen in flight at once. */
  peakHistoryInFlight = 0;

  private historyInFlight = 0;

  private readonly samples = new Map<string, HistorySample[]>();

  addItem(item: MonitoredItem, ip?: string): this {
    this.items.push(item);
    if (ip) this.interfaces.push({ host: item.host, ip });
    return this;
  }

  addSample(itemId: string, timestamp: number, value: unknown): this {
    const list = this.samples.get(itemId) ?? [];
    list.push({ item_id: itemId, timestamp, value: typeof value === 'string' ? value : JSON.stringify(value) });
    list.sort((a, b) => a.timestamp - b.timestamp);
    this.samples.set(itemId, list);
    return this;
  }

  async getHostInterfaces(): Promise<HostInterface[]> {
    if (this.failInterfaces) throw new UpstreamError('monitoring', 'host.get failed');
    return [...this.interfaces];
  }

  async getConnectionItems(itemNames: readonly string[]): Promise<MonitoredItem[]> {
    if (this.failItemListing) throw new UpstreamError('monitoring', 'item.get failed');
    return this.items.filter((i) => itemNames.includes(i.name));
  }

  async getHistory(itemId: string, timeFrom: number, timeTill: number): Promise<HistorySample[]> {
    const call = { itemId, timeFrom, timeTill };
    this.historyCalls.push(call);
    this.onHistory?.(call);
    this.historyInFlight++;
    this.peakHistoryInFlight = Math.max(this.peakHistoryInFlight, this.historyInFlight);
    try {
      if (this.historyDelayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.historyDelayMs));
      if (this.failHistory(call)) throw new UpstreamError('monitoring', `history.get failed for ${itemId}`);
      return (this.samples.get(itemId) ?? []).filter((s) => s.timestamp >= timeFrom && s.timestamp < timeTill);
    } finally {
      this.historyInFlight--;
    }
  }
}
