import { logger } from '../../config/logger.js';
import { errorMessage } from '../../types/errors.js';

const log = logger.child('scheduler');

export interface TaskSpec {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
}

export interface TaskHandle {
  readonly name: string;
  stop: () => void;
  /**
   * Start a run now unless one is in progress. Resolves once that run
   * settles; false when the request was skipped.
   */
  trigger: () => Promise<boolean>;
  isRunning: () => boolean;
}

/**
 * Run a background task once immediately, then every `intervalMs`.
 *
 * A tick that fires while the previous run is still going is skipped,
 * not queued. Errors are logged and never escape: the scheduler is the
 * outermost boundary for background work.
 */
export function startTask(spec: TaskSpec): TaskHandle {
  let running = false;
  let stopped = false;

  const tick = async (source: 'start' | 'interval' | 'manual'): Promise<boolean> => {
    if (stopped) return false;
    if (running) {
      log.warn(`${spec.name}: previous run still in progress, skipping ${source} run`);
      return false;
    }
    running = true;
    const started = Date.now();
    try {
      await spec.run();
      log.debug(`${spec.name}: finished in ${Date.now() - started}ms`);
    } catch (err) {
      log.error(`${spec.name}: run failed: ${errorMessage(err)}`);
    } finally {
      running = false;
    }
    return true;
  };

  const timer = setInterval(() => {
    void tick('interval');
  }, spec.intervalMs);

  log.info(`${spec.name} scheduler started (interval=${spec.intervalMs}ms).`);
  void tick('start');

  return {
    name: spec.name,
    stop: () => {
      stopped = true;
      clearInterval(timer);
      log.info(`${spec.name} scheduler stopped.`);
    },
    trigger: () => tick('manual'),
    isRunning: () => running,
  };
}

export interface SchedulerTargets {
  topology: { refresh: () => Promise<unknown> };
  inventory: { refresh: () => Promise<unknown> };
  reports: { generateAll: () => Promise<unknown> };
}

export interface SchedulerIntervals {
  topologyRefreshMs: number;
  inventoryRefreshMs: number;
  reportIntervalMs: number;
}

export interface Schedulers {
  topology: TaskHandle;
  inventory: TaskHandle;
  reports: TaskHandle;
  stopAll: () => void;
}

/** Wire the three independent background tasks. */
export function startSchedulers(targets: SchedulerTargets, intervals: SchedulerIntervals): Schedulers {
  // Inventory first so the first topology cycle can already name hosts by CMDB IP.
  const inventory = startTask({
    name: 'inventory-refresh',
    intervalMs: intervals.inventoryRefreshMs,
    run: () => targets.inventory.refresh(),
  });
  const topology = startTask({
    name: 'topology-refresh',
    intervalMs: intervals.topologyRefreshMs,
    run: () => targets.topology.refresh(),
  });
  const reports = startTask({
    name: 'report-generation',
    intervalMs: intervals.reportIntervalMs,
    run: () => targets.reports.generateAll(),
  });
  return {
    topology,
    inventory,
    reports,
    stopAll: () => {
      topology.stop();
      inventory.stop();
      reports.stop();
    },
  };
}
