import type { CollectorAdapter, CollectorReport, IncomingTuple, OutgoingTuple } from './interface.js';
import { asCount, asIp, asPort, isObject, listField, parseReportObject, pick } from './coerce.js';

const LOCAL_IP = ['localip', 'LocalAddress', 'LocalIP'];
const LOCAL_PORT = ['localport', 'LocalPort'];
const REMOTE_IP = ['remoteip', 'RemoteAddress', 'RemoteIP'];
const REMOTE_PORT = ['remoteport', 'RemotePort'];
const COUNT = ['count', 'Count'];

/**
 * Adapter for the PowerShell (Get-NetTCPConnection) collector.
 *
 * Same three lists as the Linux collector, but values are numbers, keys
 * may be PascalCase, a one-element list arrives as a bare object and
 * `openports` may be a plain list of numbers.
 */
export class WindowsCollectorAdapter implements CollectorAdapter {
  readonly itemName = 'windows-network-connections';

  parse(value: string, capturedAt: number): CollectorReport {
    const obj = parseReportObject(value);

    const open_ports: number[] = [];
    for (const entry of listField(obj, 'openports')) {
      const port = asPort(isObject(entry) ? pick(entry, ['port', 'Port', 'LocalPort']) : entry);
      if (port !== null) open_ports.push(port);
    }

    const incoming: IncomingTuple[] = [];
    for (const c of listField(obj, 'incomingconnections')) {
      if (!isObject(c)) continue;
      const local_ip = asIp(pick(c, LOCAL_IP));
      const remote_ip = asIp(pick(c, REMOTE_IP));
      const local_port = asPort(pick(c, LOCAL_PORT));
      if (!local_ip || !remote_ip || local_port === null) continue;
      incoming.push({ local_ip, local_port, remote_ip, count: asCount(pick(c, COUNT)) });
    }

    const outgoing: OutgoingTuple[] = [];
    for (const c of listField(obj, 'outgoingconnections')) {
      if (!isObject(c)) continue;
      const local_ip = asIp(pick(c, LOCAL_IP));
      const remote_ip = asIp(pick(c, REMOTE_IP));
      const remote_port = asPort(pick(c, REMOTE_PORT));
      if (!local_ip || !remote_ip || remote_port === null) continue;
      outgoing.push({ local_ip, remote_ip, remote_port, count: asCount(pick(c, COUNT)) });
    }

    return { open_ports, incoming, outgoing, captured_at: capturedAt };
  }
}
