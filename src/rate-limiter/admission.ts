/**
 * Admission Control - Admission Controller
 * Per-request decision: exempt, banned, unrestricted, allowed or rate limited
 */

import { BackendError } from '../utils/errors.js';
import { hashIdentity, normalizePath } from '../utils/helpers.js';
import logger, { logConfig, logDecision } from '../utils/logger.js';

import { BanManager } from './ban-manager.js';
import { generateHeaders, generateRetryAfterHeaders } from './headers.js';
import type { RuleIndex } from './rules/rule-index.js';
import type { CounterStore } from './store/types.js';
import type {
  AdmissionDecision,
  AdmissionMetrics,
  AdmissionSettings,
  BanPolicy,
  BanScope,
  BanStatus,
  Clock,
  RateRule,
  WindowDecision,
} from './types.js';
import { WindowLimiter } from './window-limiter.js';

// =============================================================================
// Types
// =============================================================================

export interface AdmissionControllerOptions {
  ruleIndex: RuleIndex;
  store: CounterStore;
  policy: BanPolicy;
  settings: AdmissionSettings;
  clock?: Clock;
}

// =============================================================================
// Binding Rule Selection
// =============================================================================

/**
 * The rule whose numbers the client sees. Among denials, the one that
 * keeps the caller out longest; otherwise the rule closest to its limit.
 * Ties keep the earlier, more specific rule.
 */
export function selectBindingDecision(decisions: readonly WindowDecision[]): WindowDecision | undefined {
  const denied = decisions.filter((decision) => !decision.allowed);

  if (denied.length > 0) {
    return denied.reduce((binding, decision) =>
      decision.resetSeconds > binding.resetSeconds ? decision : binding
    );
  }

  return decisions.reduce<WindowDecision | undefined>((binding, decision) => {
    if (binding === undefined) {
      return decision;
    }
    return decision.remaining / decision.limit < binding.remaining / binding.limit
      ? decision
      : binding;
  }, undefined);
}

function createEmptyMetrics(): AdmissionMetrics {
  return {
    checks: 0,
    allowed: 0,
    exempt: 0,
    unrestricted: 0,
    rateLimited: 0,
    banned: 0,
    backendErrors: 0,
  };
}

// =============================================================================
// Admission Controller Class
// =============================================================================

export class AdmissionController {
  private ruleIndex: RuleIndex;
  private settings: AdmissionSettings;
  private windowLimiter: WindowLimiter;
  private banManager: BanManager;
  private metrics: AdmissionMetrics = createEmptyMetrics();

  constructor(options: AdmissionControllerOptions) {
    this.ruleIndex = options.ruleIndex;
    this.settings = { ...options.settings };
    this.windowLimiter = new WindowLimiter(options.store, options.clock);
    this.banManager = new BanManager(options.store, {
      policy: options.policy,
      siteBan: options.settings.siteBan,
    });

    logger.info('Admission controller initialized', {
      rules: this.ruleIndex.size,
      enableBans: this.settings.enableBans,
      siteBan: this.settings.siteBan,
      failureMode: this.settings.failureMode,
    });
  }

  // ===========================================================================
  // Core Admission
  // ===========================================================================

  public async check(path: string, identity: string): Promise<AdmissionDecision> {
    this.metrics.checks++;

    // One index for the whole request, even if a reload lands mid-check
    const ruleIndex = this.ruleIndex;
    const normalized = normalizePath(path);

    if (ruleIndex.isExempt(normalized)) {
      this.metrics.exempt++;
      return this.finish(normalized, identity, { allowed: true, status: 200, outcome: 'exempt', headers: {} });
    }

    const matched = ruleIndex.match(normalized);

    try {
      if (this.settings.enableBans) {
        const ban = await this.checkBans(identity, matched);
        if (ban.banned) {
          this.metrics.banned++;
          return this.finish(normalized, identity, {
            allowed: false,
            status: 403,
            outcome: 'banned',
            headers: generateRetryAfterHeaders(ban.remainingSeconds),
            retryAfter: ban.remainingSeconds,
          });
        }
      }

      if (matched.length === 0) {
        this.metrics.unrestricted++;
        return this.finish(normalized, identity, {
          allowed: true,
          status: 200,
          outcome: 'unrestricted',
          headers: {},
        });
      }

      const decisions = await Promise.all(
        matched.map((rule) => this.windowLimiter.check(rule, identity))
      );
      const binding = selectBindingDecision(decisions);
      if (binding === undefined) {
        throw new Error('No window decision for a matched path');
      }

      if (!binding.allowed) {
        if (this.settings.enableBans) {
          await this.banManager.recordOffense(identity, this.banManager.scopeFor(binding.rule));
        }
        this.metrics.rateLimited++;
        return this.finish(normalized, identity, {
          allowed: false,
          status: 429,
          outcome: 'rate_limited',
          headers: generateHeaders(binding),
          bindingRule: binding.rule,
          retryAfter: binding.resetSeconds,
        });
      }

      this.metrics.allowed++;
      return this.finish(normalized, identity, {
        allowed: true,
        status: 200,
        outcome: 'allowed',
        headers: generateHeaders(binding),
        bindingRule: binding.rule,
      });
    } catch (error) {
      if (!(error instanceof BackendError)) {
        throw error;
      }
      return this.handleBackendError(normalized, identity, error);
    }
  }

  /**
   * Site scope, or in per-rule mode every matched rule's scope. Banned when
   * any scope is; the longest remaining ban is reported.
   */
  private async checkBans(identity: string, matched: readonly RateRule[]): Promise<BanStatus> {
    const scopes: BanScope[] = this.settings.siteBan
      ? [{ kind: 'site' }]
      : matched.map((rule) => this.banManager.scopeFor(rule));

    if (scopes.length === 0) {
      return { banned: false, remainingSeconds: 0 };
    }

    const statuses = await Promise.all(scopes.map((scope) => this.banManager.isBanned(identity, scope)));

    return statuses.reduce<BanStatus>(
      (worst, status) =>
        status.banned && status.remainingSeconds > worst.remainingSeconds ? status : worst,
      { banned: false, remainingSeconds: 0 }
    );
  }

  private handleBackendError(path: string, identity: string, error: BackendError): AdmissionDecision {
    this.metrics.backendErrors++;
    const failOpen = this.settings.failureMode === 'open';

    logger.error('Counter store unavailable', {
      path,
      operation: error.operation,
      failureMode: this.settings.failureMode,
      error: error.message,
    });

    return this.finish(path, identity, {
      allowed: failOpen,
      status: failOpen ? 200 : 503,
      outcome: 'backend_error',
      headers: {},
      error,
    });
  }

  private finish(path: string, identity: string, decision: AdmissionDecision): AdmissionDecision {
    logDecision({
      path,
      identity: hashIdentity(identity),
      outcome: decision.outcome,
      status: decision.status,
      rule: decision.bindingRule?.id,
      retryAfter: decision.retryAfter,
    });
    return decision;
  }

  // ===========================================================================
  // Configuration Management
  // ===========================================================================

  /**
   * Swap in a freshly compiled rule set. Checks already running keep the
   * index they started with.
   */
  public reload(ruleIndex: RuleIndex): void {
    this.ruleIndex = ruleIndex;
    logConfig('Rule index reloaded', {
      rules: ruleIndex.size,
      exempt: ruleIndex.getExemptPatterns().length,
    });
  }

  public getRuleIndex(): RuleIndex {
    return this.ruleIndex;
  }

  public getSettings(): AdmissionSettings {
    return { ...this.settings };
  }

  public getBanManager(): BanManager {
    return this.banManager;
  }

  // ===========================================================================
  // Metrics
  // ===========================================================================

  public getMetrics(): AdmissionMetrics {
    return { ...this.metrics };
  }

  public resetMetrics(): void {
    this.metrics = createEmptyMetrics();
    logger.debug('Admission metrics reset');
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createAdmissionController(options: AdmissionControllerOptions): AdmissionController {
  return new AdmissionController(options);
}

export default AdmissionController;
