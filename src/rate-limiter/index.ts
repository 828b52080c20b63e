/**
 * Admission Control - Rate Limiter Module
 *
 * Features:
 * - Exact and wildcard path rules, most specific first
 * - Fixed and moving window counting, atomic per check
 * - Offense tracking with escalating bans, site-wide or per rule
 * - Redis-backed for distributed environments, in-memory for one process
 * - Express middleware with RateLimit headers
 */

// =============================================================================
// Admission Controller
// =============================================================================

export {
  AdmissionController,
  createAdmissionController,
  selectBindingDecision,
  type AdmissionControllerOptions,
} from './admission.js';

// =============================================================================
// Window Limiting
// =============================================================================

export { WindowLimiter, createWindowLimiter } from './window-limiter.js';

export {
  FixedWindowLimiter,
  createFixedWindowLimiter,
  MovingWindowLimiter,
  createMovingWindowLimiter,
  movingWindowRetryMs,
  type MovingWindowState,
} from './algorithms/index.js';

// =============================================================================
// Bans
// =============================================================================

export {
  BanManager,
  createBanManager,
  buildScopeKey,
  buildOffenseKey,
  buildBanKey,
  describeScope,
  type BanManagerOptions,
} from './ban-manager.js';

// =============================================================================
// Rules
// =============================================================================

export {
  RuleIndex,
  compileRuleIndex,
  createEmptyRuleIndex,
  parsePattern,
} from './rules/index.js';

// =============================================================================
// Counter Stores
// =============================================================================

export {
  MemoryCounterStore,
  createMemoryCounterStore,
  type MemoryCounterStoreOptions,
  RedisCounterStore,
  createRedisCounterStore,
  parseIntegerReply,
  type RedisCounterStoreOptions,
  type CounterStore,
  type FixedWindowHit,
  type FixedWindowReply,
  type MovingWindowHit,
  type MovingWindowReply,
  type OffenseHit,
  type OffenseReply,
} from './store/index.js';

// =============================================================================
// Headers and Middleware
// =============================================================================

export { generateHeaders, generateRetryAfterHeaders } from './headers.js';

export {
  createAdmissionMiddleware,
  extractClientIP,
  wantsJson,
  buildRefusalBody,
  renderRefusalPage,
  type AdmissionMiddlewareOptions,
  type RefusalBody,
} from './middleware.js';

// =============================================================================
// Lua Scripts
// =============================================================================

export {
  FIXED_WINDOW_SCRIPT,
  MOVING_WINDOW_SCRIPT,
  RECORD_OFFENSE_SCRIPT,
  BAN_STATUS_SCRIPT,
  CLEAR_BAN_SCRIPT,
} from './scripts.js';

// =============================================================================
// Types
// =============================================================================

export type {
  WindowStrategy,
  RateRule,
  RateRuleInput,
  WindowDecision,
  WindowAlgorithm,
  BanScope,
  BanStatus,
  OffenseOutcome,
  BanPolicy,
  AdmissionOutcome,
  FailureMode,
  RateLimitHeaders,
  AdmissionDecision,
  AdmissionSettings,
  AdmissionMetrics,
  Clock,
} from './types.js';
