import type { Knex } from 'knex';
import type { ReportRunResult, ReportRunStatus } from '../../types/index.js';
import { isObject } from '../collectors/coerce.js';

/** Where finished report runs are recorded. */
export interface RunHistoryStore {
  record(run: ReportRunResult): Promise<void>;
  recent(limit: number): Promise<ReportRunResult[]>;
}

/** Row shape of the report_runs table. */
export interface ReportRunRow {
  id: string;
  started_at: string | Date;
  finished_at: string | Date;
  duration_ms: number;
  status: ReportRunStatus;
  artifacts_written: number;
  artifacts_failed: number;
  details: string | Record<string, unknown>;
  error: string | null;
}

interface RunDetails {
  artifacts_written: string[];
  artifacts_failed: string[];
  incomplete_hosts: string[];
}

function toIso(value: string | Date): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function parseDetails(raw: string | Record<string, unknown>): RunDetails {
  let obj: unknown = raw;
  if (typeof raw === 'string') {
    try {
      obj = JSON.parse(raw);
    } catch {
      obj = {};
    }
  }
  const rec = isObject(obj) ? obj : {};
  return {
    artifacts_written: stringList(rec.artifacts_written),
    artifacts_failed: stringList(rec.artifacts_failed),
    incomplete_hosts: stringList(rec.incomplete_hosts),
  };
}

export function runToRow(run: ReportRunResult): ReportRunRow {
  const details: RunDetails = {
    artifacts_written: run.artifacts_written,
    artifacts_failed: run.artifacts_failed,
    incomplete_hosts: run.incomplete_hosts,
  };
  return {
    id: run.id,
    started_at: run.started_at,
    finished_at: run.finished_at,
    duration_ms: run.duration_ms,
    status: run.status,
    artifacts_written: run.artifacts_written.length,
    artifacts_failed: run.artifacts_failed.length,
    details: JSON.stringify(details),
    error: run.error,
  };
}

/** pg returns timestamps as Date and jsonb as objects; both forms are accepted. */
export function rowToRun(row: ReportRunRow): ReportRunResult {
  const details = parseDetails(row.details);
  return {
    id: row.id,
    started_at: toIso(row.started_at),
    finished_at: toIso(row.finished_at),
    duration_ms: Number(row.duration_ms),
    status: row.status,
    artifacts_written: details.artifacts_written,
    artifacts_failed: details.artifacts_failed,
    incomplete_hosts: details.incomplete_hosts,
    error: row.error,
  };
}

/** PostgreSQL-backed run history (table created by the 001 migration). */
export class KnexRunHistoryStore implements RunHistoryStore {
  constructor(private readonly db: Knex) {}

  async record(run: ReportRunResult): Promise<void> {
    await this.db<ReportRunRow>('report_runs').insert(runToRow(run));
  }

  async recent(limit: number): Promise<ReportRunResult[]> {
    const rows = await this.db<ReportRunRow>('report_runs')
      .orderBy('started_at', 'desc')
      .limit(limit)
      .select('*');
    return rows.map(rowToRun);
  }
}
