import type { CollectorAdapter, CollectorReport, IncomingTuple, OutgoingTuple } from './interface.js';
import { asCount, asIp, asPort, isObject, listField, parseReportObject } from './coerce.js';

/**
 * Adapter for the Linux `ss`-based collector.
 *
 * Shape (all values strings, lists always arrays):
 *   { "openports": [{ "port": "22" }],
 *     "incomingconnections": [{ "localip", "localport", "remoteip", "count" }],
 *     "outgoingconnections": [{ "localip", "remoteip", "remoteport", "count" }] }
 */
export class LinuxCollectorAdapter implements CollectorAdapter {
  readonly itemName = 'linux-network-connections';

  parse(value: string, capturedAt: number): CollectorReport {
    const obj = parseReportObject(value);

    const open_ports: number[] = [];
    for (const entry of listField(obj, 'openports')) {
      const port = asPort(isObject(entry) ? entry.port : entry);
      if (port !== null) open_ports.push(port);
    }

    const incoming: IncomingTuple[] = [];
    for (const c of listField(obj, 'incomingconnections')) {
      if (!isObject(c)) continue;
      const local_ip = asIp(c.localip);
      const remote_ip = asIp(c.remoteip);
      const local_port = asPort(c.localport);
      if (!local_ip || !remote_ip || local_port === null) continue;
      incoming.push({ local_ip, local_port, remote_ip, count: asCount(c.count) });
    }

    const outgoing: OutgoingTuple[] = [];
    for (const c of listField(obj, 'outgoingconnections')) {
      if (!isObject(c)) continue;
      const local_ip = asIp(c.localip);
      const remote_ip = asIp(c.remoteip);
      const remote_port = asPort(c.remoteport);
      if (!local_ip || !remote_ip || remote_port === null) continue;
      outgoing.push({ local_ip, remote_ip, remote_port, count: asCount(c.count) });
    }

    return { open_ports, incoming, outgoing, captured_at: capturedAt };
  }
}
