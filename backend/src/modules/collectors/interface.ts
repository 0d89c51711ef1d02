/** One incoming connection to a port the host listens on. */
export interface IncomingTuple {
  local_ip: string;
  local_port: number;
  remote_ip: string;
  count: number;
}

/** One outgoing connection from the host to a remote service port. */
export interface OutgoingTuple {
  local_ip: string;
  remote_ip: string;
  remote_port: number;
  count: number;
}

/** A collector report decoded into the common shape, independent of OS. */
export interface CollectorReport {
  open_ports: number[];
  incoming: IncomingTuple[];
  outgoing: OutgoingTuple[];
  captured_at: number;        // unix seconds
}

/**
 * Decodes the raw value a collector script stores in the monitoring
 * system. One adapter per collector implementation; downstream code only
 * ever sees CollectorReport.
 */
export interface CollectorAdapter {
  /** Monitoring item name the collector publishes under. */
  readonly itemName: string;
  parse(value: string, capturedAt: number): CollectorReport;
}
