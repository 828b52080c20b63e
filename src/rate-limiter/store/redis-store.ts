/**
 * Admission Control - Redis Counter Store
 *
 * Shared counters for multi-instance deployments. Every operation is a
 * single Lua script, bounded by a timeout; failures surface as BackendError.
 */

import type { RedisClientWrapper } from '../../storage/redis.js';
import { asBackendError, type BackendOperation } from '../../utils/errors.js';
import { withTimeout } from '../../utils/helpers.js';
import {
  BAN_STATUS_SCRIPT,
  CLEAR_BAN_SCRIPT,
  FIXED_WINDOW_SCRIPT,
  MOVING_WINDOW_SCRIPT,
  RECORD_OFFENSE_SCRIPT,
} from '../scripts.js';

import type {
  CounterStore,
  FixedWindowHit,
  FixedWindowReply,
  MovingWindowHit,
  MovingWindowReply,
  OffenseHit,
  OffenseReply,
} from './types.js';

export interface RedisCounterStoreOptions {
  /** Upper bound for one script round trip */
  timeoutMs: number;
}

// =============================================================================
// Reply Parsing
// =============================================================================

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Read an integer array reply of exactly `length` entries
 */
export function parseIntegerReply(reply: unknown, length: number): number[] {
  if (!Array.isArray(reply) || reply.length !== length) {
    throw new Error(`Unexpected script reply: ${JSON.stringify(reply)}`);
  }
  const values: number[] = [];
  for (const item of reply) {
    const value = toInteger(item);
    if (value === undefined) {
      throw new Error(`Unexpected script reply: ${JSON.stringify(reply)}`);
    }
    values.push(value);
  }
  return values;
}

function parseScalarReply(reply: unknown): number {
  const value = toInteger(reply);
  if (value === undefined) {
    throw new Error(`Unexpected script reply: ${JSON.stringify(reply)}`);
  }
  return value;
}

// =============================================================================
// Redis Counter Store Class
// =============================================================================

export class RedisCounterStore implements CounterStore {
  private redis: RedisClientWrapper;
  private timeoutMs: number;

  constructor(redis: RedisClientWrapper, options: RedisCounterStoreOptions) {
    this.redis = redis;
    this.timeoutMs = options.timeoutMs;
  }

  public async hitFixedWindow(hit: FixedWindowHit): Promise<FixedWindowReply> {
    const [allowed = 0, count = 0] = await this.run(
      'window-check',
      FIXED_WINDOW_SCRIPT,
      [hit.key],
      [hit.limit.toString(), hit.windowMs.toString()],
      2
    );
    return { allowed: allowed === 1, count };
  }

  public async hitMovingWindow(hit: MovingWindowHit): Promise<MovingWindowReply> {
    const [allowed = 0, current = 0, previous = 0] = await this.run(
      'window-check',
      MOVING_WINDOW_SCRIPT,
      [hit.previousKey, hit.currentKey],
      [hit.limit.toString(), hit.windowMs.toString(), hit.elapsedMs.toString()],
      3
    );
    return { allowed: allowed === 1, current, previous };
  }

  public async getBanTtlMs(banKey: string): Promise<number> {
    try {
      const reply = await withTimeout(
        this.redis.eval(BAN_STATUS_SCRIPT, [banKey], []),
        this.timeoutMs,
        'ban-check'
      );
      return parseScalarReply(reply);
    } catch (error) {
      throw asBackendError('ban-check', error);
    }
  }

  public async recordOffense(hit: OffenseHit): Promise<OffenseReply> {
    const { banOffenses, banLength, banMaxLength, banCounterTtl } = hit.policy;
    const [offenses = 0, banCount = 0, banSeconds = 0] = await this.run(
      'record-offense',
      RECORD_OFFENSE_SCRIPT,
      [hit.metaKey, hit.banKey],
      [banOffenses.toString(), banLength.toString(), banMaxLength.toString(), banCounterTtl.toString()],
      3
    );
    return { offenses, banCount, banSeconds };
  }

  public async clearBan(metaKey: string, banKey: string): Promise<void> {
    try {
      await withTimeout(
        this.redis.eval(CLEAR_BAN_SCRIPT, [metaKey, banKey], []),
        this.timeoutMs,
        'clear-ban'
      );
    } catch (error) {
      throw asBackendError('clear-ban', error);
    }
  }

  private async run(
    operation: BackendOperation,
    script: string,
    keys: string[],
    args: string[],
    replyLength: number
  ): Promise<number[]> {
    try {
      const reply = await withTimeout(this.redis.eval(script, keys, args), this.timeoutMs, operation);
      return parseIntegerReply(reply, replyLength);
    } catch (error) {
      throw asBackendError(operation, error);
    }
  }
}

export function createRedisCounterStore(
  redis: RedisClientWrapper,
  options: RedisCounterStoreOptions
): RedisCounterStore {
  return new RedisCounterStore(redis, options);
}

export default RedisCounterStore;
