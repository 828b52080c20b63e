/**
 * Admission Control - Counter Store Contract
 * Every method is one atomic round trip to the backing store.
 */

import type { BanPolicy } from '../types.js';

export interface FixedWindowHit {
  key: string;
  limit: number;
  windowMs: number;
}

export interface FixedWindowReply {
  allowed: boolean;
  /** Count after this request's increment */
  count: number;
}

export interface MovingWindowHit {
  previousKey: string;
  currentKey: string;
  limit: number;
  windowMs: number;
  /** Time already elapsed in the current subwindow */
  elapsedMs: number;
}

export interface MovingWindowReply {
  allowed: boolean;
  /** Current subwindow count, including this request when admitted */
  current: number;
  previous: number;
}

export interface OffenseHit {
  metaKey: string;
  banKey: string;
  policy: BanPolicy;
}

export interface OffenseReply {
  offenses: number;
  banCount: number;
  /** Length of the ban applied by this offense; 0 when none */
  banSeconds: number;
}

export interface CounterStore {
  /** Increment, set TTL on creation, compare with the limit */
  hitFixedWindow(hit: FixedWindowHit): Promise<FixedWindowReply>;
  /** Weighted two-subwindow check; increments only when admitted */
  hitMovingWindow(hit: MovingWindowHit): Promise<MovingWindowReply>;
  /** Remaining ban lifetime in milliseconds; 0 or less when not banned. Read-only. */
  getBanTtlMs(banKey: string): Promise<number>;
  /** Count an offense and apply an escalated ban at the threshold */
  recordOffense(hit: OffenseHit): Promise<OffenseReply>;
  /** Remove a ban and its offense history */
  clearBan(metaKey: string, banKey: string): Promise<void>;
}
