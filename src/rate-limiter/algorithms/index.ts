/**
 * Admission Control - Window Algorithms
 * Barrel export for the window strategy implementations
 */

// =============================================================================
// Fixed Window Algorithm
// =============================================================================

export { FixedWindowLimiter, createFixedWindowLimiter } from './fixed-window.js';

// =============================================================================
// Moving Window Algorithm
// =============================================================================

export {
  MovingWindowLimiter,
  createMovingWindowLimiter,
  movingWindowRetryMs,
  type MovingWindowState,
} from './moving-window.js';

// =============================================================================
// Re-export Types
// =============================================================================

export type { WindowAlgorithm, WindowDecision, WindowStrategy } from '../types.js';
