import type { InventoryRecord, ServiceDefinition } from '../../types/index.js';
import { logger } from '../../config/logger.js';
import { errorMessage } from '../../types/errors.js';
import type { CmdbClient } from './cmdbClient.js';

const log = logger.child('inventory');

export interface InventorySnapshot {
  readonly records: ReadonlyMap<string, InventoryRecord>;  // lowercased name → record
  readonly byIp: ReadonlyMap<string, string>;              // primary IP → name
  readonly refreshedAt: string;
  readonly individualLookupFailures: number;
}

export interface InventoryCacheOptions {
  /** Hosts always looked up, even when the bulk pull misses them. */
  trackedHosts?: readonly string[];
  /** Hosts currently visible in the graph (read at refresh time). */
  visibleHosts?: () => Iterable<string>;
}

/**
 * CMDB attributes per host, refreshed wholesale on a slow cadence so
 * graph and report rendering never wait on the CMDB. Readers get the
 * current frozen snapshot; refresh() swaps in a new one.
 */
export class InventoryCache {
  private snapshot: InventorySnapshot | null = null;

  constructor(
    private readonly client: CmdbClient,
    private readonly options: InventoryCacheOptions = {},
  ) {}

  current(): InventorySnapshot | null {
    return this.snapshot;
  }

  async refresh(): Promise<InventorySnapshot> {
    // Bulk pull failures propagate and leave the previous snapshot in place.
    const [vms, services] = await Promise.all([
      this.client.listVirtualMachines(),
      this.client.listServices(),
    ]);

    const records = new Map<string, InventoryRecord>();
    for (const vm of vms) {
      records.set(vm.name.toLowerCase(), { ...vm, services: [] });
    }

    const wanted = new Set<string>([
      ...(this.options.trackedHosts ?? []),
      ...(this.options.visibleHosts ? this.options.visibleHosts() : []),
    ]);
    let individualLookupFailures = 0;
    for (const host of [...wanted].sort()) {
      if (records.has(host.toLowerCase())) continue;
      try {
        const rec = await this.client.getVirtualMachine(host);
        if (rec) records.set(rec.name.toLowerCase(), { ...rec, services: [] });
      } catch (err) {
        individualLookupFailures++;
        log.warn(`Lookup of "${host}" failed: ${errorMessage(err)}`);
      }
    }

    for (const svc of services) {
      const rec = records.get(svc.host.toLowerCase());
      if (!rec) continue;
      rec.services.push({ name: svc.name, protocol: svc.protocol, ports: [...svc.ports] });
    }

    const byIp = new Map<string, string>();
    for (const rec of records.values()) {
      rec.services.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      Object.freeze(rec);
      if (rec.primary_ip && !byIp.has(rec.primary_ip)) byIp.set(rec.primary_ip, rec.name);
    }

    const next: InventorySnapshot = Object.freeze({
      records,
      byIp,
      refreshedAt: new Date().toISOString(),
      individualLookupFailures,
    });
    this.snapshot = next;
    log.info(`Refreshed: ${records.size} hosts, ${services.length} services`);
    return next;
  }

  lookup(host: string): InventoryRecord | undefined {
    return this.snapshot?.records.get(host.toLowerCase());
  }

  lookupByIp(ip: string): string | undefined {
    return this.snapshot?.byIp.get(ip);
  }

  services(host: string): ServiceDefinition[] {
    return this.lookup(host)?.services ?? [];
  }
}
