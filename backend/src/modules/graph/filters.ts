import { matchesIp, parseIpMatchers } from '../../services/ipv4.js';
import type { TopologyEdge } from '../../types/index.js';

/** Raw filter parameters as they arrive on the query string. */
export interface GraphFilterInput {
  host?: string;
  src?: string;
  dst?: string;
  port?: string;
  ip?: string;
  exclude_public?: boolean;
}

type PortRule = { type: 'single'; port: number } | { type: 'range'; min: number; max: number };

/**
 * Port filter: "443", "80,443", "1000-2000" or a mix. Reversed ranges are
 * normalised, invalid tokens ignored. Returns null when no token is valid
 * (no filtering).
 */
export function parsePortFilter(value: string | undefined): ((port: number) => boolean) | null {
  if (!value) return null;
  const rules: PortRule[] = [];

  for (const raw of value.split(',')) {
    const token = raw.trim();
    if (/^\d+$/.test(token)) {
      rules.push({ type: 'single', port: Number(token) });
      continue;
    }
    const m = /^(\d+)\s*-\s*(\d+)$/.exec(token);
    if (m) {
      const a = Number(m[1]);
      const b = Number(m[2]);
      rules.push({ type: 'range', min: Math.min(a, b), max: Math.max(a, b) });
    }
  }

  if (rules.length === 0) return null;
  return (port) =>
    rules.some((rule) => (rule.type === 'single' ? port === rule.port : port >= rule.min && port <= rule.max));
}

/** "srv1, SRV2,10.0.0." → ["srv1", "srv2", "10.0.0."] */
export function parseListFilter(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
}

/** Case-insensitive substring match of any token against name or IP. */
export function matchesEndpoint(tokens: readonly string[], name: string, ip: string): boolean {
  if (tokens.length === 0) return true;
  const nameLc = name.toLowerCase();
  const ipLc = ip.toLowerCase();
  return tokens.some((tok) => nameLc.includes(tok) || ipLc.includes(tok));
}

/** Compile the filter input into a single edge predicate. */
export function compileEdgeFilter(input: GraphFilterInput): (edge: TopologyEdge) => boolean {
  const host = input.host?.trim().toLowerCase() ?? '';
  const src = parseListFilter(input.src);
  const dst = parseListFilter(input.dst);
  const port = parsePortFilter(input.port);
  const excludedIps = parseIpMatchers(input.ip);
  const excludePublic = input.exclude_public === true;

  return (edge) => {
    if (host && edge.source.toLowerCase() !== host && edge.target.toLowerCase() !== host) return false;
    if (excludePublic && edge.is_public) return false;
    if (port && !port(edge.port)) return false;
    if (!matchesEndpoint(src, edge.source, edge.source_ip)) return false;
    if (!matchesEndpoint(dst, edge.target, edge.target_ip)) return false;
    if (excludedIps.length > 0 && (matchesIp(edge.source_ip, excludedIps) || matchesIp(edge.target_ip, excludedIps))) {
      return false;
    }
    return true;
  };
}
