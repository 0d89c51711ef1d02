import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { startSchedulers, startTask } from './scheduler.js';
import { setLogLevel } from '../../config/logger.js';

beforeEach(() => {
  vi.useFakeTimers();
  setLogLevel('error');
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('startTask', () => {
  it('runs immediately and then on every interval until stopped', async () => {
    const run = vi.fn().mockResolvedValue(undefined);
    const task = startTask({ name: 'poll', intervalMs: 1000, run });
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(4);

    task.stop();
    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(4);
  });

  it('survives a failing run', async () => {
    const run = vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValue(undefined);
    const task = startTask({ name: 'poll', intervalMs: 1000, run });
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(2);
    task.stop();
  });

  it('skips ticks while a run is still in progress', async () => {
    setLogLevel('warn');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    let release: () => void = () => {};
    const run = vi.fn(() => new Promise<void>((resolve) => { release = resolve; }));
    const task = startTask({ name: 'slow', intervalMs: 1000, run });

    await vi.advanceTimersByTimeAsync(2500);
    expect(run).toHaveBeenCalledTimes(1);
    expect(task.isRunning()).toBe(true);
    expect(warn).toHaveBeenCalledWith(expect.any(String), 'slow: previous run still in progress, skipping interval run');

    release();
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(2);
    task.stop();
  });

  it('trigger starts a run unless one is active', async () => {
    let release: () => void = () => {};
    const run = vi.fn(() => new Promise<void>((resolve) => { release = resolve; }));
    const task = startTask({ name: 'manual', intervalMs: 60_000, run });

    expect(await task.trigger()).toBe(false);
    release();
    await vi.advanceTimersByTimeAsync(0);

    const triggered = task.trigger();
    expect(run).toHaveBeenCalledTimes(2);
    release();
    expect(await triggered).toBe(true);
    task.stop();
    expect(await task.trigger()).toBe(false);
  });
});

describe('startSchedulers', () => {
  it('starts three independent tasks', async () => {
    const calls: string[] = [];
    const schedulers = startSchedulers(
      {
        topology: { refresh: async () => { calls.push('topology'); } },
        inventory: { refresh: async () => { calls.push('inventory'); } },
        reports: { generateAll: async () => { calls.push('reports'); } },
      },
      { topologyRefreshMs: 1000, inventoryRefreshMs: 5000, reportIntervalMs: 10_000 },
    );
    expect(calls).toEqual(['inventory', 'topology', 'reports']);

    await vi.advanceTimersByTimeAsync(5000);
    expect(calls.filter((c) => c === 'topology')).toHaveLength(6);
    expect(calls.filter((c) => c === 'inventory')).toHaveLength(2);
    expect(calls.filter((c) => c === 'reports')).toHaveLength(1);

    schedulers.stopAll();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(calls).toHaveLength(9);
  });
});
