// =============================================================================
// STOCKROOM — Request Hardening Middleware
//
// Covers:
//   - Request IDs for tracing
//   - Final error handler (no stack traces in production)
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { AuthError, sendAuthError } from '../errors';
import { createLogger } from '../logging';

const log = createLogger('ERROR');

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a request ID for tracing. A well-formed inbound X-Request-ID is
 * reused; anything else is replaced.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const inbound = req.get('X-Request-ID');
    const id = inbound && REQUEST_ID_PATTERN.test(inbound) ? inbound : uuidv4();
    res.set('X-Request-ID', id);
    res.locals.requestId = id;
    next();
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

/**
 * Global error handler. AuthErrors keep their status and reason; anything
 * else is a 500 that never leaks stack traces in production.
 */
export function errorHandler(nodeEnv: string): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AuthError) {
      sendAuthError(res, err);
      return;
    }

    // Client errors raised by body parsing (malformed JSON, oversized body)
    if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
      if (!res.headersSent) res.status(err.status).json({ error: err.message });
      return;
    }

    const isProd = nodeEnv === 'production';
    const error = err instanceof Error ? err : new Error(String(err));
    log.error(error.message, isProd ? '' : error.stack);

    if (res.headersSent) return;
    res.status(500).json({
      error: isProd ? 'Internal server error' : error.message,
      ...(isProd ? {} : { stack: error.stack }),
    });
  };
}
