import { describe, it, expect } from 'vitest';
import { rowToRun, runToRow } from './runStore.js';
import type { ReportRunResult } from '../../types/index.js';

const run: ReportRunResult = {
  id: '00000000-0000-4000-8000-000000000001',
  started_at: '2024-05-31T02:00:00.000Z',
  finished_at: '2024-05-31T02:01:30.000Z',
  duration_ms: 90_000,
  status: 'partial',
  artifacts_written: ['network_blueprint_summary_all_20240531-020000.csv'],
  artifacts_failed: ['diagram/all'],
  incomplete_hosts: ['web1'],
  error: null,
};

describe('report run rows', () => {
  it('stores counts in columns and names in details', () => {
    const row = runToRow(run);
    expect(row.artifacts_written).toBe(1);
    expect(row.artifacts_failed).toBe(1);
    expect(row.details).toBe(JSON.stringify({
      artifacts_written: ['network_blueprint_summary_all_20240531-020000.csv'],
      artifacts_failed: ['diagram/all'],
      incomplete_hosts: ['web1'],
    }));
  });

  it('reads back rows as returned by pg', () => {
    const row = runToRow(run);
    expect(rowToRun({
      ...row,
      started_at: new Date(run.started_at),
      finished_at: new Date(run.finished_at),
      details: {
        artifacts_written: run.artifacts_written,
        artifacts_failed: run.artifacts_failed,
        incomplete_hosts: run.incomplete_hosts,
      },
    })).toEqual(run);
    expect(rowToRun(row)).toEqual(run);
  });

  it('tolerates malformed details', () => {
    const restored = rowToRun({ ...runToRow(run), details: 'not json' });
    expect(restored.artifacts_written).toEqual([]);
    expect(restored.incomplete_hosts).toEqual([]);
  });
});
