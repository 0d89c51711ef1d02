// ── Connection records (canonical collector output) ──────────

export const DIRECTIONS = ['incoming', 'outgoing'] as const;

export type Direction = (typeof DIRECTIONS)[number];

/** One observed (or aggregated) flow, relative to the reporting host. */
export interface ConnectionRecord {
  direction: Direction;
  local_host: string;
  local_ip: string;
  remote_host: string;
  remote_ip: string;
  /** Listening side's port: local port for incoming, remote port for outgoing. */
  port: number;
  is_public_remote: boolean;
  /** Number of raw samples merged into this record. */
  observed_count: number;
  /** Largest simultaneous connection count a collector reported. */
  peak_connections: number;
  last_seen: string;          // ISO 8601
}

// ── Graph view ───────────────────────────────────────────────

export const ENVIRONMENTS = ['prod', 'dev', 'test', 'qa', 'external', 'unknown'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export interface TopologyNode {
  id: string;
  label: string;
  ip: string;
  degree: number;
  environment: Environment;
  color: string;
  problem: boolean;
}

export interface TopologyEdge {
  source: string;
  target: string;
  port: number;
  label: string;
  is_public: boolean;
  source_ip: string;
  target_ip: string;
  observed_count: number;
}

export interface GraphResult {
  nodes: TopologyNode[];
  edges: TopologyEdge[];
  degree: { min: number; max: number };
  refreshed_at: string;
  failures: number;
}

// ── Inventory (CMDB) ─────────────────────────────────────────

export interface ServiceDefinition {
  name: string;
  protocol: string;
  ports: number[];
}

export interface InventoryRecord {
  name: string;
  vcpus: number | null;
  memory_mb: number | null;
  disk_mb: number | null;
  os: string | null;
  os_eol: string | null;
  patch_window: string | null;
  role: string | null;
  tags: string[];
  ha_peers: string[];
  primary_ip: string | null;
  services: ServiceDefinition[];
}

// ── Monitoring system ────────────────────────────────────────

/** A monitored connection-listing item (one per host and collector). */
export interface MonitoredItem {
  item_id: string;
  host: string;
  /** Item name; selects the collector adapter. */
  name: string;
}

export interface HostInterface {
  host: string;
  ip: string;
}

export interface HistorySample {
  item_id: string;
  timestamp: number;          // unix seconds
  value: string;
}

// ── Reports ──────────────────────────────────────────────────

export const REPORT_KINDS = ['summary', 'per_host', 'exchange', 'diagram'] as const;
export type ReportKind = (typeof REPORT_KINDS)[number];

export const REPORT_SCOPES = ['all', 'internal', 'public'] as const;
export type ReportScope = (typeof REPORT_SCOPES)[number];

export const REPORT_FORMATS: Record<ReportKind, string> = {
  summary: 'csv',
  per_host: 'json',
  exchange: 'csv',
  diagram: 'drawio',
};

export interface ReportArtifactInfo {
  name: string;
  kind: ReportKind;
  scope: ReportScope;
  format: string;
  generated_at: string;
  size_bytes: number;
  mtime: string;
}

export type ReportRunStatus = 'success' | 'partial' | 'failed';

export interface ReportRunResult {
  id: string;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  status: ReportRunStatus;
  artifacts_written: string[];
  artifacts_failed: string[];
  incomplete_hosts: string[];
  error: string | null;
}
