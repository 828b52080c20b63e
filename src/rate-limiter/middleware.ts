/**
 * Admission Control - Express Middleware
 * Runs every request through the admission controller and renders refusals
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

import logger from '../utils/logger.js';

import type { AdmissionController } from './admission.js';
import type { AdmissionDecision, RateLimitHeaders } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface AdmissionMiddlewareOptions {
  /** Admission controller instance */
  controller: AdmissionController;

  /**
   * Exactly one proxy in front: key callers by the X-Forwarded-For hop it
   * appended instead of the socket peer
   */
  trustProxy?: boolean;

  /** Custom identity extractor; overrides the address lookup */
  extractIdentity?: (req: Request) => string;

  /** Whether to skip admission for certain requests */
  skip?: (req: Request) => boolean;

  /** Custom refusal handler, replacing the default JSON/HTML body */
  onRefused?: (req: Request, res: Response, decision: AdmissionDecision) => void;
}

export interface RefusalBody {
  error: 'rate_limit_exceeded' | 'forbidden' | 'service_unavailable';
  detail: string;
  retry_after: number;
}

// =============================================================================
// Constants
// =============================================================================

/** User agents of command-line and API tools, which get JSON bodies */
const API_CLIENT_AGENTS = ['curl', 'wget', 'postman', 'insomnia', 'httpie', 'python-requests'];

const PAGE_STYLE =
  'margin:0;min-height:100vh;display:flex;align-items:center;justify-content:center;' +
  'font-family:system-ui,sans-serif;background:#f6f8fa;color:#24292f';

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Caller address: behind a trusted proxy, the last X-Forwarded-For hop,
 * which that proxy appended from its own socket peer; otherwise the socket
 * peer. Earlier hops are whatever the client sent and are ignored.
 */
export function extractClientIP(req: Request, trustProxy: boolean): string {
  if (trustProxy) {
    const forwardedFor = req.headers['x-forwarded-for'];
    if (forwardedFor) {
      const hops = (Array.isArray(forwardedFor) ? forwardedFor.join(',') : forwardedFor).split(',');
      const ip = hops[hops.length - 1]?.trim();
      if (ip) {
        return ip;
      }
    }
  }

  return req.socket.remoteAddress ?? req.ip ?? '0.0.0.0';
}

/**
 * JSON for API clients, HTML for browsers
 */
export function wantsJson(req: Request): boolean {
  const accept = req.headers.accept ?? '';
  if (accept.includes('application/json') || accept.includes('text/json')) {
    return true;
  }
  const userAgent = (req.headers['user-agent'] ?? '').toLowerCase();
  return API_CLIENT_AGENTS.some((agent) => userAgent.includes(agent));
}

function setAdmissionHeaders(res: Response, headers: RateLimitHeaders): void {
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      res.setHeader(name, value);
    }
  }
}

export function buildRefusalBody(decision: AdmissionDecision): RefusalBody {
  const retryAfter = decision.retryAfter ?? 0;
  switch (decision.status) {
    case 429:
      return { error: 'rate_limit_exceeded', detail: 'Rate limit exceeded', retry_after: retryAfter };
    case 403:
      return { error: 'forbidden', detail: 'Access blocked due to repeated abuse', retry_after: retryAfter };
    default:
      return {
        error: 'service_unavailable',
        detail: 'Rate limiting is temporarily unavailable',
        retry_after: retryAfter,
      };
  }
}

export function renderRefusalPage(decision: AdmissionDecision): string {
  const body = buildRefusalBody(decision);
  const title =
    decision.status === 429
      ? '429 Too Many Requests'
      : decision.status === 403
        ? '403 Forbidden'
        : '503 Service Unavailable';
  const retry = body.retry_after > 0 ? `<p>Retry in <strong>${body.retry_after}</strong>s</p>` : '';

  return (
    `<!DOCTYPE html><html><head><meta charset="utf-8"><title>${title}</title></head>` +
    `<body style="${PAGE_STYLE}"><main><h1>${title}</h1><p>${body.detail}.</p>${retry}</main></body></html>`
  );
}

function defaultOnRefused(req: Request, res: Response, decision: AdmissionDecision): void {
  res.status(decision.status);
  if (wantsJson(req)) {
    res.json(buildRefusalBody(decision));
  } else {
    res.type('html').send(renderRefusalPage(decision));
  }
}

// =============================================================================
// Middleware Factory
// =============================================================================

export function createAdmissionMiddleware(options: AdmissionMiddlewareOptions): RequestHandler {
  const { controller, trustProxy = false, extractIdentity, skip, onRefused = defaultOnRefused } = options;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    if (skip && skip(req)) {
      next();
      return;
    }

    try {
      const identity = extractIdentity ? extractIdentity(req) : extractClientIP(req, trustProxy);
      const decision = await controller.check(req.path, identity);

      setAdmissionHeaders(res, decision.headers);

      if (!decision.allowed) {
        onRefused(req, res, decision);
        return;
      }

      // Downstream handlers read the decision from res.locals.admission
      res.locals.admission = decision;

      next();
    } catch (error) {
      logger.error('Admission middleware error', {
        error: error instanceof Error ? error.message : String(error),
        path: req.path,
        method: req.method,
      });
      next(error);
    }
  };
}

export default createAdmissionMiddleware;
