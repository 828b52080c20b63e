/**
 * Admission Control - In-Process Counter Store
 *
 * Single-instance deployments and tests. Each operation yields to the event
 * loop once (standing in for the network round trip) and then runs its
 * read-modify-write synchronously, so concurrent callers interleave
 * between operations but never inside one.
 */

import type { Clock } from '../types.js';

import type {
  CounterStore,
  FixedWindowHit,
  FixedWindowReply,
  MovingWindowHit,
  MovingWindowReply,
  OffenseHit,
  OffenseReply,
} from './types.js';

interface Entry<T> {
  value: T;
  /** Epoch milliseconds; null means no expiry */
  expiresAt: number | null;
}

interface OffenseMeta {
  offenses: number;
  bans: number;
}

function pruneExpired<T>(map: Map<string, Entry<T>>, now: number): number {
  let removed = 0;
  for (const [key, entry] of map) {
    if (entry.expiresAt !== null && entry.expiresAt <= now) {
      map.delete(key);
      removed++;
    }
  }
  return removed;
}

export interface MemoryCounterStoreOptions {
  /** Minimum time between sweeps of expired entries */
  sweepIntervalMs?: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export class MemoryCounterStore implements CounterStore {
  private counters = new Map<string, Entry<number>>();
  private offenseMeta = new Map<string, Entry<OffenseMeta>>();
  private bans = new Map<string, Entry<true>>();
  private clock: Clock;
  private sweepIntervalMs: number;
  private lastSweep: number;

  constructor(clock: Clock = Date.now, options: MemoryCounterStoreOptions = {}) {
    this.clock = clock;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.lastSweep = clock();
  }

  public async hitFixedWindow(hit: FixedWindowHit): Promise<FixedWindowReply> {
    await this.roundTrip();
    const now = this.clock();
    this.sweep(now);

    const entry = this.live(this.counters, hit.key, now);
    if (entry === undefined) {
      this.counters.set(hit.key, { value: 1, expiresAt: now + hit.windowMs });
      return { allowed: 1 <= hit.limit, count: 1 };
    }

    entry.value += 1;
    return { allowed: entry.value <= hit.limit, count: entry.value };
  }

  public async hitMovingWindow(hit: MovingWindowHit): Promise<MovingWindowReply> {
    await this.roundTrip();
    const now = this.clock();
    this.sweep(now);

    const previous = this.live(this.counters, hit.previousKey, now)?.value ?? 0;
    const currentEntry = this.live(this.counters, hit.currentKey, now);
    const current = currentEntry?.value ?? 0;

    const approx = current + previous * (1 - hit.elapsedMs / hit.windowMs);
    if (approx + 1 > hit.limit) {
      return { allowed: false, current, previous };
    }

    if (currentEntry === undefined) {
      this.counters.set(hit.currentKey, { value: 1, expiresAt: now + hit.windowMs * 2 });
      return { allowed: true, current: 1, previous };
    }

    currentEntry.value += 1;
    return { allowed: true, current: currentEntry.value, previous };
  }

  public async getBanTtlMs(banKey: string): Promise<number> {
    await this.roundTrip();
    const now = this.clock();
    this.sweep(now);

    const entry = this.live(this.bans, banKey, now);
    if (entry === undefined) {
      return -2;
    }
    return entry.expiresAt === null ? -1 : entry.expiresAt - now;
  }

  public async recordOffense(hit: OffenseHit): Promise<OffenseReply> {
    await this.roundTrip();
    const now = this.clock();
    this.sweep(now);
    const { banOffenses, banLength, banMaxLength, banCounterTtl } = hit.policy;

    const meta = this.live(this.offenseMeta, hit.metaKey, now)?.value ?? { offenses: 0, bans: 0 };
    meta.offenses += 1;

    let banSeconds = 0;
    if (meta.offenses >= banOffenses) {
      meta.bans += 1;
      meta.offenses = 0;
      banSeconds = Math.floor(Math.min(banLength * 2 ** (meta.bans - 1), banMaxLength));
      this.bans.set(hit.banKey, { value: true, expiresAt: now + banSeconds * 1000 });
    }

    this.offenseMeta.set(hit.metaKey, { value: meta, expiresAt: now + banCounterTtl * 1000 });

    return { offenses: meta.offenses, banCount: meta.bans, banSeconds };
  }

  public async clearBan(metaKey: string, banKey: string): Promise<void> {
    await this.roundTrip();
    this.offenseMeta.delete(metaKey);
    this.bans.delete(banKey);
  }

  /**
   * Drop expired entries. Reads already ignore them; this only frees memory.
   * Past window keys are never read again, so only a sweep removes them.
   */
  public prune(): number {
    const now = this.clock();
    this.lastSweep = now;
    return this.pruneAt(now);
  }

  public size(): number {
    return this.counters.size + this.offenseMeta.size + this.bans.size;
  }

  private sweep(now: number): void {
    if (now - this.lastSweep >= this.sweepIntervalMs) {
      this.lastSweep = now;
      this.pruneAt(now);
    }
  }

  private pruneAt(now: number): number {
    return (
      pruneExpired(this.counters, now) +
      pruneExpired(this.offenseMeta, now) +
      pruneExpired(this.bans, now)
    );
  }

  private live<T>(map: Map<string, Entry<T>>, key: string, now: number): Entry<T> | undefined {
    const entry = map.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= now) {
      map.delete(key);
      return undefined;
    }
    return entry;
  }

  private roundTrip(): Promise<void> {
    return new Promise((resolve) => setImmediate(() => resolve()));
  }
}

export function createMemoryCounterStore(
  clock?: Clock,
  options?: MemoryCounterStoreOptions
): MemoryCounterStore {
  return new MemoryCounterStore(clock, options);
}

export default MemoryCounterStore;
