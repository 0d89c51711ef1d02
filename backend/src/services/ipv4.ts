/**
 * IPv4 helpers shared by the topology cache, graph filters and reports.
 *
 * Addresses are handled as unsigned 32-bit numbers. Only dotted-quad
 * IPv4 is understood; anything else is "not an IP" and never matches.
 */

const IPV4_RE = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/** Parse a dotted quad into an unsigned 32-bit number, or null. */
export function parseIpv4(ip: string): number | null {
  const m = IPV4_RE.exec(ip.trim());
  if (!m) return null;
  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = Number(m[i]);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function isIpv4(ip: string): boolean {
  return parseIpv4(ip) !== null;
}

export type IpMatcher =
  | { type: 'exact'; value: number }
  | { type: 'cidr'; base: number; mask: number }
  | { type: 'range'; start: number; end: number };

function maskFor(prefix: number): number {
  // 2^32 - 2^(32 - prefix), kept unsigned
  return prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
}

/**
 * Parse one entry: "10.0.0.5", "10.0.0.0/8" or "10.0.0.1-10.0.0.9".
 * Reversed ranges are normalised. Returns null for anything else.
 */
export function parseIpMatcher(entry: string): IpMatcher | null {
  const s = entry.trim();
  if (s === '') return null;

  const range = /^([\d.]+)\s*-\s*([\d.]+)$/.exec(s);
  if (range) {
    const a = parseIpv4(range[1]);
    const b = parseIpv4(range[2]);
    if (a === null || b === null) return null;
    return { type: 'range', start: Math.min(a, b), end: Math.max(a, b) };
  }

  const cidr = /^([\d.]+)\/(\d{1,2})$/.exec(s);
  if (cidr) {
    const base = parseIpv4(cidr[1]);
    const prefix = Number(cidr[2]);
    if (base === null || prefix > 32) return null;
    const mask = maskFor(prefix);
    return { type: 'cidr', base: (base & mask) >>> 0, mask };
  }

  const value = parseIpv4(s);
  return value === null ? null : { type: 'exact', value };
}

/** Comma-separated list of entries; invalid entries are dropped. */
export function parseIpMatchers(list: string | undefined | null): IpMatcher[] {
  if (!list) return [];
  const out: IpMatcher[] = [];
  for (const part of list.split(',')) {
    const m = parseIpMatcher(part);
    if (m) out.push(m);
  }
  return out;
}

export function matchesIp(ip: string, matchers: readonly IpMatcher[]): boolean {
  const num = parseIpv4(ip);
  if (num === null) return false;
  return matchers.some((m) => {
    switch (m.type) {
      case 'exact':
        return num === m.value;
      case 'cidr':
        return ((num & m.mask) >>> 0) === m.base;
      case 'range':
        return num >= m.start && num <= m.end;
    }
  });
}

export interface AddressClassifier {
  /** In one of the configured private networks. */
  isPrivate(ip: string): boolean;
  /** A valid IPv4 address outside every private network. */
  isPublic(ip: string): boolean;
  isLoopback(ip: string): boolean;
}

const LOOPBACK = parseIpMatchers('127.0.0.0/8');

/**
 * Build the public/private classifier from a list of CIDR (or range)
 * entries. Strings that are not IPv4 are neither public nor private.
 */
export function createAddressClassifier(privateNetworks: readonly string[]): AddressClassifier {
  const matchers = parseIpMatchers(privateNetworks.join(','));
  return {
    isPrivate: (ip) => matchesIp(ip, matchers),
    isPublic: (ip) => isIpv4(ip) && !matchesIp(ip, matchers),
    isLoopback: (ip) => matchesIp(ip, LOOPBACK),
  };
}
