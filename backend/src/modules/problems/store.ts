import { logger } from '../../config/logger.js';

const log = logger.child('problems');

export const PROBLEM_EVENTS = ['problem', 'resolve'] as const;
export type ProblemEvent = (typeof PROBLEM_EVENTS)[number];

export interface ActiveProblem {
  host: string;
  since: string;
}

export function isProblemEvent(value: unknown): value is ProblemEvent {
  return typeof value === 'string' && (PROBLEM_EVENTS as readonly string[]).includes(value);
}

/**
 * Hosts with an open monitoring problem, fed by the monitoring webhook.
 * Keys are case-insensitive; the first spelling seen is reported.
 */
export class ProblemStore {
  private readonly active = new Map<string, ActiveProblem>();

  constructor(private readonly now: () => number = Date.now) {}

  apply(event: ProblemEvent, host: string): void {
    const key = host.toLowerCase();
    if (event === 'problem') {
      if (!this.active.has(key)) {
        this.active.set(key, { host, since: new Date(this.now()).toISOString() });
        log.info(`Problem opened on ${host}`);
      }
      return;
    }
    if (this.active.delete(key)) log.info(`Problem resolved on ${host}`);
  }

  has(host: string): boolean {
    return this.active.has(host.toLowerCase());
  }

  list(): ActiveProblem[] {
    return [...this.active.values()].sort((a, b) => (a.host < b.host ? -1 : a.host > b.host ? 1 : 0));
  }
}
