import { readFile, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { HistorySample } from '../../types/index.js';
import { errorMessage } from '../../types/errors.js';
import { logger } from '../../config/logger.js';
import { writeFileAtomic } from '../../services/atomicWrite.js';
import { mapSettled } from '../../services/concurrency.js';
import { isObject } from '../collectors/coerce.js';
import type { MonitoringClient } from '../monitoring/client.js';
import { addDays, dayEndSeconds, dayOf, daysBetween, dayStartSeconds, isDay, type Day } from './days.js';

const log = logger.child('history');

// ── Types ──────────────────────────────────────────────────────

/** One item's samples for one UTC day, as persisted on disk. */
export interface DayBucket {
  item_id: string;
  day: Day;
  /** True once the day has ended and was fetched in full. */
  complete: boolean;
  fetched_at: string;
  samples: HistorySample[];
}

export interface EnsureRangeResult {
  fetchedDays: Day[];
  cachedDays: Day[];
  failedDays: Day[];
  evictedDays: Day[];
}

export interface ReadRangeResult {
  samples: HistorySample[];
  /** Days with no trustworthy bucket: partial data for the caller. */
  missingDays: Day[];
}

export interface HistoryCacheOptions {
  dir: string;
  retentionDays: number;
  /** Upstream history calls in flight per ensureRange. */
  concurrency?: number;
  now?: () => number;
}

type DayOutcome = 'fetched' | 'cached';

// ── Helpers ────────────────────────────────────────────────────

/** Item ids become directory names; anything unusual is flattened. */
function itemDirName(itemId: string): string {
  return itemId.replace(/[^A-Za-z0-9_-]/g, '_');
}

function parseBucket(raw: string): DayBucket | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isObject(data) || !Array.isArray(data.samples)) return null;
  if (typeof data.item_id !== 'string' || typeof data.day !== 'string' || !isDay(data.day)) return null;

  const samples: HistorySample[] = [];
  for (const s of data.samples) {
    if (!isObject(s) || typeof s.timestamp !== 'number' || typeof s.value !== 'string') return null;
    samples.push({ item_id: data.item_id, timestamp: s.timestamp, value: s.value });
  }
  return {
    item_id: data.item_id,
    day: data.day,
    complete: data.complete === true,
    fetched_at: typeof data.fetched_at === 'string' ? data.fetched_at : '',
    samples,
  };
}

// ── History cache ──────────────────────────────────────────────

/**
 * Day-granular on-disk cache of raw item history.
 *
 * A past day is fetched once and kept as a complete bucket (empty days
 * included); today is refetched on every ensureRange. Buckets older than
 * the retention window are evicted. Concurrent fetches of the same
 * (item, day) share one upstream call.
 */
export class HistoryCache {
  private readonly inflight = new Map<string, Promise<DayOutcome>>();

  constructor(
    private readonly monitoring: MonitoringClient,
    private readonly options: HistoryCacheOptions,
  ) {}

  today(): Day {
    return dayOf(this.options.now ? this.options.now() : Date.now());
  }

  /** First day kept when the window ends on `endDay`. */
  windowStart(endDay: Day): Day {
    return addDays(endDay, -this.options.retentionDays);
  }

  bucketPath(itemId: string, day: Day): string {
    return join(this.options.dir, itemDirName(itemId), `${day}.json`);
  }

  async readBucket(itemId: string, day: Day): Promise<DayBucket | null> {
    let raw: string;
    try {
      raw = await readFile(this.bucketPath(itemId, day), 'utf8');
    } catch (err) {
      if (isObject(err) && err.code === 'ENOENT') return null;
      throw err;
    }
    const bucket = parseBucket(raw);
    if (!bucket) log.warn(`Ignoring unreadable bucket ${this.bucketPath(itemId, day)}`);
    return bucket;
  }

  /**
   * Make every day in [startDay, endDay] available on disk, then evict
   * this item's buckets older than the retention window. Days after
   * today are ignored. Fetch failures are reported, not thrown.
   */
  async ensureRange(itemId: string, startDay: Day, endDay: Day): Promise<EnsureRangeResult> {
    const today = this.today();
    const result: EnsureRangeResult = { fetchedDays: [], cachedDays: [], failedDays: [], evictedDays: [] };
    const days = daysBetween(startDay, endDay < today ? endDay : today);

    const outcomes = await mapSettled(days, this.options.concurrency ?? 4, (day) => this.ensureDay(itemId, day, today));
    days.forEach((day, i) => {
      const outcome = outcomes[i];
      if (outcome.status === 'rejected') {
        log.warn(`Item ${itemId} day ${day} unavailable: ${errorMessage(outcome.reason)}`);
        result.failedDays.push(day);
      } else if (outcome.value === 'fetched') {
        result.fetchedDays.push(day);
      } else {
        result.cachedDays.push(day);
      }
    });

    result.evictedDays = await this.evictItem(itemId, endDay);
    return result;
  }

  /** Samples for [startDay, endDay] in day order, with the days that are missing. */
  async readRange(itemId: string, startDay: Day, endDay: Day): Promise<ReadRangeResult> {
    const today = this.today();
    const samples: HistorySample[] = [];
    const missingDays: Day[] = [];

    for (const day of daysBetween(startDay, endDay < today ? endDay : today)) {
      let bucket: DayBucket | null;
      try {
        bucket = await this.readBucket(itemId, day);
      } catch (err) {
        log.warn(`Reading item ${itemId} day ${day} failed: ${errorMessage(err)}`);
        bucket = null;
      }
      // Past days are only trusted when complete; today is partial by nature.
      if (!bucket || (day !== today && !bucket.complete)) {
        missingDays.push(day);
        continue;
      }
      samples.push(...[...bucket.samples].sort((a, b) => a.timestamp - b.timestamp));
    }
    return { samples, missingDays };
  }

  /** Evict stale buckets of every cached item. */
  async sweep(endDay: Day = this.today()): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.options.dir);
    } catch (err) {
      if (isObject(err) && err.code === 'ENOENT') return 0;
      throw err;
    }
    let evicted = 0;
    for (const entry of entries.sort()) {
      evicted += (await this.evictDir(join(this.options.dir, entry), endDay)).length;
    }
    return evicted;
  }

  /** Single flight per (item, day): the on-disk check and the fetch share one key. */
  private ensureDay(itemId: string, day: Day, today: Day): Promise<DayOutcome> {
    const key = `${itemId}|${day}`;
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const promise = this.loadOrFetch(itemId, day, today).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return promise;
  }

  private async loadOrFetch(itemId: string, day: Day, today: Day): Promise<DayOutcome> {
    if (day !== today) {
      const existing = await this.readBucket(itemId, day);
      if (existing?.complete) return 'cached';
    }
    await this.fetchAndStore(itemId, day);
    return 'fetched';
  }

  private async fetchAndStore(itemId: string, day: Day): Promise<DayBucket> {
    // Decided before the request: a day that ends while it is in flight is still partial.
    const complete = day < this.today();
    const samples = await this.monitoring.getHistory(itemId, dayStartSeconds(day), dayEndSeconds(day));
    const bucket: DayBucket = {
      item_id: itemId,
      day,
      complete,
      fetched_at: new Date(this.options.now ? this.options.now() : Date.now()).toISOString(),
      samples: samples.map((s) => ({ item_id: itemId, timestamp: s.timestamp, value: s.value })),
    };
    await writeFileAtomic(this.bucketPath(itemId, day), JSON.stringify(bucket));
    log.debug(`Stored item ${itemId} day ${day}: ${samples.length} samples`);
    return bucket;
  }

  private evictItem(itemId: string, endDay: Day): Promise<Day[]> {
    return this.evictDir(join(this.options.dir, itemDirName(itemId)), endDay);
  }

  private async evictDir(dir: string, endDay: Day): Promise<Day[]> {
    const keepFrom = this.windowStart(endDay);
    let files: string[];
    try {
      files = await readdir(dir);
    } catch (err) {
      if (isObject(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return [];
      throw err;
    }
    const evicted: Day[] = [];
    for (const file of files) {
      const day = file.endsWith('.json') ? file.slice(0, -5) : '';
      if (!isDay(day) || day >= keepFrom) continue;
      await rm(join(dir, file), { force: true });
      evicted.push(day);
    }
    return evicted.sort();
  }
}
