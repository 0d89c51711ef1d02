import type { InventoryRecord, ServiceDefinition } from '../../types/index.js';
import { UpstreamError } from '../../types/errors.js';
import { isObject, type JsonObject } from '../collectors/coerce.js';

export interface HostService extends ServiceDefinition {
  host: string;
}

/** Read-only CMDB access used by the inventory cache. */
export interface CmdbClient {
  listVirtualMachines(): Promise<InventoryRecord[]>;
  listServices(): Promise<HostService[]>;
  /** Single host lookup; null when the CMDB does not know the host. */
  getVirtualMachine(name: string): Promise<InventoryRecord | null>;
}

export interface RestCmdbOptions {
  url: string;
  token: string;
  timeoutMs: number;
  pageSize?: number;
}

// ── Field mapping ────────────────────────────────────────────

function str(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return null;
}

function num(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** `{ name }`, `{ value }` or a plain string. */
function nameOf(value: unknown): string | null {
  if (isObject(value)) return str(value.name) ?? str(value.display) ?? str(value.value);
  return str(value);
}

function namesOf(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const v of value) {
    const n = nameOf(v);
    if (n) out.push(n);
  }
  return out;
}

export function mapVirtualMachine(vm: JsonObject): InventoryRecord | null {
  const name = str(vm.name) ?? str(vm.display);
  if (!name) return null;
  const cf = isObject(vm.custom_fields) ? vm.custom_fields : {};
  const primary = isObject(vm.primary_ip4) ? str(vm.primary_ip4.address) : null;
  return {
    name,
    vcpus: num(vm.vcpus),
    memory_mb: num(vm.memory),
    disk_mb: num(vm.disk),
    os: nameOf(vm.platform) ?? str(cf.operating_system),
    os_eol: str(cf.operating_system_EOL),
    patch_window: str(cf.patch_window),
    role: nameOf(vm.role),
    tags: namesOf(vm.tags),
    ha_peers: namesOf(cf.ha_with_server),
    primary_ip: primary ? primary.split('/')[0] : null,
    services: [],
  };
}

export function mapService(svc: JsonObject): HostService | null {
  const host = nameOf(svc.virtual_machine) ?? nameOf(svc.device);
  const name = str(svc.name);
  if (!host || !name) return null;
  const ports: number[] = [];
  for (const p of Array.isArray(svc.ports) ? svc.ports : []) {
    const n = num(p);
    if (n !== null) ports.push(n);
  }
  return { host, name, protocol: nameOf(svc.protocol) ?? 'tcp', ports };
}

// ── REST implementation ──────────────────────────────────────

/**
 * CMDB client for a NetBox-style REST API: token auth and paginated
 * `{ results, next }` list responses.
 */
export class RestCmdbClient implements CmdbClient {
  constructor(private readonly options: RestCmdbOptions) {}

  private async getJson(url: string): Promise<JsonObject> {
    let res: Response;
    try {
      res = await fetch(url, {
        headers: {
          Authorization: `Token ${this.options.token}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamError('cmdb', `GET ${url} failed`, { cause: err });
    }
    if (!res.ok) throw new UpstreamError('cmdb', `GET ${url} HTTP ${res.status}`);
    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      throw new UpstreamError('cmdb', `GET ${url}: malformed response`, { cause: err });
    }
    if (!isObject(data)) throw new UpstreamError('cmdb', `GET ${url}: malformed response`);
    return data;
  }

  /** Follow `next` links until exhausted. */
  private async listAll(path: string, query: Record<string, string> = {}): Promise<JsonObject[]> {
    const params = new URLSearchParams({ limit: String(this.options.pageSize ?? 1000), ...query });
    let url: string | null = `${this.options.url}${path}?${params}`;
    const out: JsonObject[] = [];
    while (url) {
      const page: JsonObject = await this.getJson(url);
      for (const r of Array.isArray(page.results) ? page.results : []) {
        if (isObject(r)) out.push(r);
      }
      url = str(page.next);
    }
    return out;
  }

  async listVirtualMachines(): Promise<InventoryRecord[]> {
    const rows = await this.listAll('/api/virtualization/virtual-machines/');
    const out: InventoryRecord[] = [];
    for (const row of rows) {
      const rec = mapVirtualMachine(row);
      if (rec) out.push(rec);
    }
    return out;
  }

  async listServices(): Promise<HostService[]> {
    const rows = await this.listAll('/api/ipam/services/');
    const out: HostService[] = [];
    for (const row of rows) {
      const svc = mapService(row);
      if (svc) out.push(svc);
    }
    return out;
  }

  async getVirtualMachine(name: string): Promise<InventoryRecord | null> {
    const rows = await this.listAll('/api/virtualization/virtual-machines/', { name });
    for (const row of rows) {
      const rec = mapVirtualMachine(row);
      if (rec) return rec;
    }
    return null;
  }
}
