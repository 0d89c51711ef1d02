import type {
  ConnectionRecord,
  GraphResult,
  InventoryRecord,
  TopologyEdge,
  TopologyNode,
} from '../../types/index.js';
import type { AddressClassifier } from '../../services/ipv4.js';
import type { TopologySnapshot } from '../topology/cache.js';
import { compileEdgeFilter, type GraphFilterInput } from './filters.js';
import { classifyNode, ENV_COLORS } from './environment.js';

export interface GraphQueryDeps {
  classifier: AddressClassifier;
  inventory?: { lookup(host: string): InventoryRecord | undefined };
  problems?: { has(host: string): boolean };
}

function cmp(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orient records as graph edges (incoming: remote → local, outgoing:
 * local → remote) and collapse duplicates on (source, target, port,
 * public flag).
 */
export function buildEdges(records: readonly ConnectionRecord[]): TopologyEdge[] {
  const byKey = new Map<string, TopologyEdge>();
  for (const r of records) {
    const incoming = r.direction === 'incoming';
    const edge: TopologyEdge = {
      source: incoming ? r.remote_host : r.local_host,
      source_ip: incoming ? r.remote_ip : r.local_ip,
      target: incoming ? r.local_host : r.remote_host,
      target_ip: incoming ? r.local_ip : r.remote_ip,
      port: r.port,
      label: `port ${r.port}`,
      is_public: r.is_public_remote,
      observed_count: r.observed_count,
    };
    const key = `${edge.source}|${edge.target}|${edge.port}|${edge.is_public}`;
    const existing = byKey.get(key);
    if (existing) {
      existing.observed_count += edge.observed_count;
    } else {
      byKey.set(key, edge);
    }
  }
  return [...byKey.values()].sort(
    (a, b) => cmp(a.source, b.source) || cmp(a.target, b.target) || cmp(a.port, b.port),
  );
}

/**
 * Project a topology snapshot into the node/edge document the map client
 * draws. Pure: the snapshot is never modified, degrees are computed per
 * result.
 */
export function queryGraph(
  snapshot: TopologySnapshot,
  filters: GraphFilterInput,
  deps: GraphQueryDeps,
): GraphResult {
  const keep = compileEdgeFilter(filters);
  const edges = buildEdges(snapshot.records).filter(keep);

  const degree = new Map<string, number>();
  const endpointIp = new Map<string, string>();
  for (const e of edges) {
    degree.set(e.source, (degree.get(e.source) ?? 0) + 1);
    degree.set(e.target, (degree.get(e.target) ?? 0) + 1);
    if (!endpointIp.has(e.source)) endpointIp.set(e.source, e.source_ip);
    if (!endpointIp.has(e.target)) endpointIp.set(e.target, e.target_ip);
  }

  const nodes: TopologyNode[] = [...degree.keys()].sort().map((id) => {
    const ip = snapshot.hostIps.get(id) ?? endpointIp.get(id) ?? '';
    const environment = classifyNode(id, deps.classifier.isPublic(ip), deps.inventory?.lookup(id));
    return {
      id,
      label: ip && ip !== id ? `${id} (${ip})` : id,
      ip,
      degree: degree.get(id) ?? 0,
      environment,
      color: ENV_COLORS[environment],
      problem: deps.problems?.has(id) ?? false,
    };
  });

  let min = nodes.length > 0 ? Infinity : 0;
  let max = 0;
  for (const n of nodes) {
    if (n.degree < min) min = n.degree;
    if (n.degree > max) max = n.degree;
  }
  return {
    nodes,
    edges,
    degree: { min, max },
    refreshed_at: snapshot.refreshedAt,
    failures: snapshot.failures,
  };
}
