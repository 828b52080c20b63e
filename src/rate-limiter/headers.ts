/**
 * Admission Control - Rate Limit Headers
 * RateLimit / RateLimit-Policy fields and Retry-After
 */

import type { RateLimitHeaders, WindowDecision } from './types.js';

/**
 * Headers describing the binding rule's window
 */
export function generateHeaders(decision: WindowDecision): RateLimitHeaders {
  const headers: RateLimitHeaders = {
    RateLimit: `limit=${decision.limit}, remaining=${decision.remaining}, reset=${decision.resetSeconds}`,
    'RateLimit-Policy': `${decision.limit};w=${decision.rule.periodSeconds}`,
  };

  if (!decision.allowed) {
    headers['Retry-After'] = decision.resetSeconds.toString();
  }

  return headers;
}

export function generateRetryAfterHeaders(seconds: number): RateLimitHeaders {
  return { 'Retry-After': Math.max(0, Math.ceil(seconds)).toString() };
}
