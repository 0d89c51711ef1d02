/** An upstream HTTP/RPC call failed, returned an error, or timed out. */
export class UpstreamError extends Error {
  constructor(
    readonly service: 'monitoring' | 'cmdb',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${service}: ${message}`, options);
    this.name = 'UpstreamError';
  }
}

/** A collector report could not be decoded into connection tuples. */
export class CollectorDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectorDecodeError';
  }
}

/** The topology cache has never completed a refresh. */
export class NotYetAvailableError extends Error {
  constructor(what: string) {
    super(`${what} is not yet available`);
    this.name = 'NotYetAvailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
