// =============================================================================
// STOCKROOM — Authentication Routes
//
// Token issuance and session introspection. Tokens are returned in the body
// and in the same response headers used for transparent rotation.
// =============================================================================

import { Router, Request, Response, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { LoginError } from '../errors';
import { createLogger } from '../logging';
import { getIdentity } from '../middleware/identity';
import { AuthService, LoginResult } from '../services/auth';
import { ROTATED_ACCESS_HEADER, ROTATED_REFRESH_HEADER } from '../types/auth';

const log = createLogger('Auth');

export interface AuthRouterOptions {
  authService: AuthService;
  authenticate: RequestHandler;
  /** Login attempts allowed per IP per 15 minutes */
  loginRateLimit: number;
}

export function createAuthRouter({ authService, authenticate, loginRateLimit }: AuthRouterOptions): Router {
  const router = Router();

  const loginLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: loginRateLimit,
    message: { error: 'Too many authentication attempts. Try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * POST /api/auth/login
   * Exchange a registered email for a token pair.
   */
  router.post('/login', loginLimiter, async (req: Request, res: Response) => {
    const email = typeof req.body?.email === 'string' ? req.body.email.trim() : '';
    if (!email) {
      res.status(400).json({ error: 'Email required' });
      return;
    }
    await respondWithLogin(res, () => authService.loginWithEmail(email));
  });

  /**
   * POST /api/auth/v2/login
   * Exchange an external identity provider assertion for a token pair.
   */
  router.post('/v2/login', loginLimiter, async (req: Request, res: Response) => {
    const idToken = typeof req.body?.idToken === 'string' ? req.body.idToken.trim() : '';
    if (!idToken) {
      res.status(400).json({ error: 'idToken required' });
      return;
    }
    await respondWithLogin(res, () => authService.loginWithAssertion(idToken));
  });

  /**
   * GET /api/auth/session
   * Return the identity established for this request.
   */
  router.get('/session', authenticate, (req: Request, res: Response) => {
    const identity = getIdentity(req);
    res.json({ user: { id: identity.subjectId, roles: identity.roles } });
  });

  return router;
}

async function respondWithLogin(res: Response, login: () => Promise<LoginResult>): Promise<void> {
  try {
    const result = await login();
    res.set(ROTATED_ACCESS_HEADER, result.accessToken);
    res.set(ROTATED_REFRESH_HEADER, result.refreshToken);
    res.json(result);
  } catch (err) {
    if (err instanceof LoginError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    log.error('Login error:', err instanceof Error ? err.message : err);
    res.status(500).json({ error: 'Internal server error' });
  }
}
