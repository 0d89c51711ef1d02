import type { ConnectionRecord } from '../../types/index.js';
import { compareRecords } from '../collectors/records.js';

/**
 * draw.io (mxfile) diagram: one page per reporting host with the host in
 * the middle and its peers on a circle around it. Layout and ids depend
 * only on the rows, so identical input gives identical XML.
 */

const NODE_WIDTH = 160;
const NODE_HEIGHT = 80;
const MARGIN = 50;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function attrs(values: Record<string, string | number>): string {
  return Object.entries(values)
    .map(([k, v]) => `${k}="${escapeXml(String(v))}"`)
    .join(' ');
}

/** Host → sorted distinct IPs seen for it (bare-IP hosts excluded). */
function hostIpMap(rows: readonly ConnectionRecord[]): Map<string, string[]> {
  const ips = new Map<string, Set<string>>();
  const add = (host: string, ip: string) => {
    if (!host || !ip || host === ip) return;
    const set = ips.get(host) ?? new Set<string>();
    set.add(ip);
    ips.set(host, set);
  };
  for (const r of rows) {
    add(r.local_host, r.local_ip);
    add(r.remote_host, r.remote_ip);
  }
  return new Map([...ips].map(([host, set]) => [host, [...set].sort()]));
}

interface PageEdge {
  source: string;
  target: string;
  label: string;
}

function renderPage(host: string, index: number, rows: readonly ConnectionRecord[], ips: Map<string, string[]>): string | null {
  const peers: string[] = [];
  const edges: PageEdge[] = [];
  const seenEdges = new Set<string>();
  for (const r of rows) {
    const [source, target] = r.direction === 'outgoing'
      ? [r.local_host, r.remote_host]
      : [r.remote_host, r.local_host];
    const label = `${r.direction} (port=${r.port})`;
    const key = `${source}|${target}|${label}`;
    if (seenEdges.has(key)) continue;
    seenEdges.add(key);
    edges.push({ source, target, label });
    if (r.remote_host !== host && !peers.includes(r.remote_host)) peers.push(r.remote_host);
  }
  if (edges.length === 0) return null;
  peers.sort();

  const radius = Math.max(300, peers.length * 40);
  const center = MARGIN + radius;
  const positions = new Map<string, { x: number; y: number }>([[host, { x: center, y: center }]]);
  peers.forEach((peer, i) => {
    const angle = (2 * Math.PI * i) / peers.length;
    positions.set(peer, {
      x: Math.round(center + radius * Math.cos(angle)),
      y: Math.round(center + radius * Math.sin(angle)),
    });
  });

  const ids = new Map<string, string>();
  const cells: string[] = ['<mxCell id="0"/>', '<mxCell id="1" parent="0"/>'];
  [host, ...peers].forEach((name, i) => {
    const id = `node${i + 1}`;
    ids.set(name, id);
    const hostIps = ips.get(name) ?? [];
    const label = hostIps.length > 0 ? `${name} (${hostIps.join(', ')})` : name;
    const pos = positions.get(name) ?? { x: MARGIN, y: MARGIN };
    cells.push(
      `<mxCell ${attrs({ id, value: label, style: 'shape=rectangle;whiteSpace=wrap;html=1;strokeWidth=2;align=center;', vertex: 1, parent: 1 })}>` +
      `<mxGeometry ${attrs({ x: pos.x, y: pos.y, width: NODE_WIDTH, height: NODE_HEIGHT, as: 'geometry' })}/></mxCell>`,
    );
  });
  edges.forEach((e, i) => {
    cells.push(
      `<mxCell ${attrs({ id: `edge${i + 1}`, value: e.label, style: 'endArrow=classic;html=1;', edge: 1, parent: 1, source: ids.get(e.source) ?? '', target: ids.get(e.target) ?? '' })}>` +
      '<mxGeometry relative="1" as="geometry"/></mxCell>',
    );
  });

  const size = 2 * (MARGIN + radius) + NODE_WIDTH;
  return (
    `  <diagram ${attrs({ id: `host-${index + 1}`, name: host.slice(0, 31) })}>\n` +
    `    <mxGraphModel ${attrs({ dx: 1600, dy: 1200, grid: 1, gridSize: 10, guides: 1, tooltips: 1, connect: 1, arrows: 1, fold: 1, page: 1, pageScale: 1, pageWidth: size, pageHeight: size, math: 0, shadow: 0 })}>\n` +
    '      <root>\n' +
    cells.map((c) => `        ${c}\n`).join('') +
    '      </root>\n' +
    '    </mxGraphModel>\n' +
    '  </diagram>\n'
  );
}

export function buildDiagram(rows: readonly ConnectionRecord[], excludedHosts: readonly string[]): string {
  const excluded = new Set(excludedHosts);
  const ips = hostIpMap(rows);
  const byHost = new Map<string, ConnectionRecord[]>();
  for (const r of [...rows].sort(compareRecords)) {
    if (excluded.has(r.local_host) || excluded.has(r.remote_host)) continue;
    const list = byHost.get(r.local_host) ?? [];
    list.push(r);
    byHost.set(r.local_host, list);
  }

  const pages: string[] = [];
  for (const host of [...byHost.keys()].sort()) {
    const page = renderPage(host, pages.length, byHost.get(host) ?? [], ips);
    if (page) pages.push(page);
  }

  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    '<mxfile host="app.diagrams.net" type="device">\n' +
    pages.join('') +
    '</mxfile>\n'
  );
}
