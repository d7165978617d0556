// =============================================================================
// STOCKROOM — Test Helpers
//
// In-process server, HTTP client, controllable clock, and in-memory
// stand-ins for the storage-backed collaborators.
// =============================================================================

import { Server } from 'http';
import { Express } from 'express';
import { createApp, AppDeps } from '../src/app';
import { IdentityProvider } from '../src/services/identity-provider';
import { RoleLookup } from '../src/services/role-lookup';
import { TokenCodec, TokenCodecSettings } from '../src/services/token-codec';
import { UserDirectory } from '../src/services/user-directory';
import { ExternalIdentity } from '../src/types/auth';
import { Role } from '../src/types/roles';

export const ACCESS_SECRET = 'test-access-secret';
export const REFRESH_SECRET = 'test-refresh-secret';

/** 2023-11-14T22:13:20Z */
export const T0 = 1_700_000_000;

export const ACCESS_TTL = 300;
export const REFRESH_TTL = 604_800;

/** Epoch-seconds clock the tests move by hand. */
export class TestClock {
  seconds = T0;

  readonly now = (): number => this.seconds;

  advance(seconds: number): void {
    this.seconds += seconds;
  }
}

export function makeCodec(clock: TestClock, overrides: Partial<TokenCodecSettings> = {}): TokenCodec {
  return new TokenCodec({
    accessSecret: ACCESS_SECRET,
    refreshSecret: REFRESH_SECRET,
    accessTtlSeconds: ACCESS_TTL,
    refreshTtlSeconds: REFRESH_TTL,
    now: clock.now,
    ...overrides,
  });
}

/** In-memory role assignments */
export class FakeRoleLookup implements RoleLookup {
  readonly calls: string[] = [];
  readonly roles = new Map<string, Role[]>();
  failWith: Error | undefined;
  /** When set, lookups never settle on their own. */
  hang = false;
  readonly signals: Array<AbortSignal | undefined> = [];

  async fetchRoles(userId: string, signal?: AbortSignal): Promise<Role[]> {
    this.calls.push(userId);
    this.signals.push(signal);
    if (this.failWith) throw this.failWith;
    if (this.hang) {
      return new Promise<Role[]>((resolve) => {
        signal?.addEventListener('abort', () => resolve([]), { once: true });
      });
    }
    return [...(this.roles.get(userId) ?? [])];
  }
}

/** In-memory user table keyed by email */
export class FakeUserDirectory implements UserDirectory {
  readonly users = new Map<string, string>();

  async findActiveUserIdByEmail(email: string): Promise<string | null> {
    return this.users.get(email) ?? null;
  }
}

/** Accepts exactly the assertions it has been told about */
export class FakeIdentityProvider implements IdentityProvider {
  readonly assertions = new Map<string, ExternalIdentity>();

  async verifyAssertion(assertion: string): Promise<ExternalIdentity> {
    const identity = this.assertions.get(assertion);
    if (!identity) throw new Error('assertion rejected');
    return identity;
  }
}

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Listen on an ephemeral loopback port. */
export async function listen(app: Express): Promise<TestServer> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server did not bind to a TCP port');
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export type TestAppDeps = Partial<AppDeps> & Pick<AppDeps, 'codec' | 'roleLookup'>;

/** Build the full application with test defaults and start it. */
export async function startApp(deps: TestAppDeps): Promise<TestServer> {
  const app = createApp({
    users: new FakeUserDirectory(),
    headers: { access: 'authorization', refresh: 'refresh_token' },
    roleLookupTimeoutMs: 1000,
    loginRateLimit: 100,
    nodeEnv: 'test',
    ...deps,
  });
  return listen(app);
}

/**
 * Make an API request against a test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  path: string,
  options: { headers?: Record<string, string>; body?: unknown } = {},
): Promise<Response> {
  const headers: Record<string, string> = { ...options.headers };
  const init: RequestInit = { method, headers };
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    init.body = JSON.stringify(options.body);
  }
  return fetch(`${server.baseUrl}${path}`, init);
}

/** Parse JSON response with error context. */
export async function json<T>(res: Response): Promise<T> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

export interface ErrorBody {
  error: string;
  code?: string;
}

/** Credential headers for a request */
export function credentials(accessToken?: string, refreshToken?: string): Record<string, string> {
  const headers: Record<string, string> = {};
  if (accessToken !== undefined) headers['Authorization'] = accessToken;
  if (refreshToken !== undefined) headers['refresh_token'] = refreshToken;
  return headers;
}
