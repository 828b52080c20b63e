/**
 * Admission Control - Ban Manager
 *
 * Tracks offenses per identity and scope. Every `banOffenses` offenses
 * produce a ban whose length doubles with each ban in the same record, up
 * to `banMaxLength`. The record expires after `banCounterTtl` seconds
 * without offenses, which is the only way bans de-escalate.
 */

import { asBackendError } from '../utils/errors.js';
import { hashIdentity } from '../utils/helpers.js';
import { logBan } from '../utils/logger.js';

import type { CounterStore, OffenseReply } from './store/types.js';
import type { BanPolicy, BanScope, BanStatus, OffenseOutcome, RateRule } from './types.js';

// =============================================================================
// Key Builders
// =============================================================================

export function buildScopeKey(identity: string, scope: BanScope): string {
  const identityKey = hashIdentity(identity);
  return scope.kind === 'site' ? `site:${identityKey}` : `rule:${scope.ruleId}:${identityKey}`;
}

export function buildOffenseKey(scopeKey: string): string {
  return `offense:${scopeKey}`;
}

export function buildBanKey(scopeKey: string): string {
  return `ban:${scopeKey}`;
}

export function describeScope(scope: BanScope): string {
  return scope.kind === 'site' ? 'site' : scope.ruleId;
}

// =============================================================================
// Ban Manager Class
// =============================================================================

export interface BanManagerOptions {
  policy: BanPolicy;
  /** One ban for the whole site instead of one per rule */
  siteBan: boolean;
}

export class BanManager {
  private store: CounterStore;
  private policy: BanPolicy;
  private siteBan: boolean;

  constructor(store: CounterStore, options: BanManagerOptions) {
    this.store = store;
    this.policy = { ...options.policy };
    this.siteBan = options.siteBan;
  }

  public scopeFor(rule: RateRule): BanScope {
    return this.siteBan ? { kind: 'site' } : { kind: 'rule', ruleId: rule.id };
  }

  /**
   * Read-only; never extends or creates a ban
   */
  public async isBanned(identity: string, scope: BanScope): Promise<BanStatus> {
    const banKey = buildBanKey(buildScopeKey(identity, scope));

    let ttlMs: number;
    try {
      ttlMs = await this.store.getBanTtlMs(banKey);
    } catch (error) {
      throw asBackendError('ban-check', error);
    }

    if (ttlMs <= 0) {
      return { banned: false, remainingSeconds: 0 };
    }
    return { banned: true, remainingSeconds: Math.ceil(ttlMs / 1000) };
  }

  public async recordOffense(identity: string, scope: BanScope): Promise<OffenseOutcome> {
    const scopeKey = buildScopeKey(identity, scope);

    let reply: OffenseReply;
    try {
      reply = await this.store.recordOffense({
        metaKey: buildOffenseKey(scopeKey),
        banKey: buildBanKey(scopeKey),
        policy: this.policy,
      });
    } catch (error) {
      throw asBackendError('record-offense', error);
    }

    const banned = reply.banSeconds > 0;
    if (banned) {
      logBan({
        identity: scopeKey,
        scope: describeScope(scope),
        banCount: reply.banCount,
        durationSeconds: reply.banSeconds,
      });
    }

    return {
      offenses: reply.offenses,
      banCount: reply.banCount,
      banned,
      banSeconds: reply.banSeconds,
    };
  }

  /**
   * Lift a ban and forget the offense history behind it
   */
  public async clearBan(identity: string, scope: BanScope): Promise<void> {
    const scopeKey = buildScopeKey(identity, scope);
    try {
      await this.store.clearBan(buildOffenseKey(scopeKey), buildBanKey(scopeKey));
    } catch (error) {
      throw asBackendError('clear-ban', error);
    }
  }

  public getPolicy(): BanPolicy {
    return { ...this.policy };
  }

  public isSiteBan(): boolean {
    return this.siteBan;
  }
}

export function createBanManager(store: CounterStore, options: BanManagerOptions): BanManager {
  return new BanManager(store, options);
}

export default BanManager;
