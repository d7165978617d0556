// =============================================================================
// STOCKROOM — Application Assembly
//
// Route architecture:
//
//   /api/health        — Health check (unauthenticated)
//   /api/auth/*        — Token issuance (login) and session introspection
//   /api/users/*       — Any authenticated caller
//   /api/inventory/*   — asset_manager, admin
//   /api/employee/*    — employee_manager, admin
//   /api/admin/*       — admin
//
// Every protected group runs authenticate, then its role guard, then the
// business router injected for it.
// =============================================================================

import express, { Express, Router } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { authenticate } from './middleware/authenticate';
import { requireRole } from './middleware/role-guard';
import { errorHandler, requestId } from './middleware/security';
import { createAuthRouter } from './routes/auth';
import { AuthService } from './services/auth';
import { IdentityProvider } from './services/identity-provider';
import { RoleLookup } from './services/role-lookup';
import { TokenCodec } from './services/token-codec';
import { UserDirectory } from './services/user-directory';
import {
  AuthHeaderNames,
  ROTATED_ACCESS_HEADER,
  ROTATED_REFRESH_HEADER,
} from './types/auth';

export interface GroupRouters {
  users?: Router;
  inventory?: Router;
  employee?: Router;
  admin?: Router;
}

export interface AppDeps {
  codec: TokenCodec;
  roleLookup: RoleLookup;
  users: UserDirectory;
  identityProvider?: IdentityProvider;
  headers: AuthHeaderNames;
  roleLookupTimeoutMs: number;
  loginRateLimit: number;
  nodeEnv: string;
  /** Resolves when the database answers; used by the health probe. */
  pingDatabase?: () => Promise<void>;
  routes?: GroupRouters;
}

const startTime = Date.now();

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: deps.nodeEnv === 'development' ? '*' : undefined,
    // Clients read rotated tokens from these
    exposedHeaders: [ROTATED_ACCESS_HEADER, ROTATED_REFRESH_HEADER],
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());

  // ── Routes ─────────────────────────────────────────────────────────────

  app.get('/api/health', async (_req, res) => {
    let database: 'healthy' | 'unhealthy' | 'unconfigured' = 'unconfigured';
    if (deps.pingDatabase) {
      try {
        await deps.pingDatabase();
        database = 'healthy';
      } catch {
        database = 'unhealthy';
      }
    }
    const healthy = database !== 'unhealthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: 'stockroom',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks: { database },
      timestamp: new Date().toISOString(),
    });
  });

  const auth = authenticate({
    codec: deps.codec,
    roleLookup: deps.roleLookup,
    headers: deps.headers,
    roleLookupTimeoutMs: deps.roleLookupTimeoutMs,
  });

  const authService = new AuthService({
    codec: deps.codec,
    roleLookup: deps.roleLookup,
    users: deps.users,
    identityProvider: deps.identityProvider,
  });

  app.use('/api/auth', createAuthRouter({
    authService,
    authenticate: auth,
    loginRateLimit: deps.loginRateLimit,
  }));

  const routes = deps.routes ?? {};
  app.use('/api/users', auth, routes.users ?? Router());
  app.use('/api/inventory', auth, requireRole('asset_manager', 'admin'), routes.inventory ?? Router());
  app.use('/api/employee', auth, requireRole('employee_manager', 'admin'), routes.employee ?? Router());
  app.use('/api/admin', auth, requireRole('admin'), routes.admin ?? Router());

  // ── 404 / Errors ───────────────────────────────────────────────────────

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler(deps.nodeEnv));

  return app;
}
