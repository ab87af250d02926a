import type { AppConfig, AuthContext, AuthMode, Credential } from "../types/index.js";
import type { FetchFn } from "../api/http.js";
import { resolveAuthContext } from "./cms-url.js";
import { FileTokenCache, type TokenCache } from "./token-cache.js";
import { TraditionalAuthManager } from "./traditional-auth.js";
import { CacheModeAuthManager } from "./cache-mode-auth.js";

export { REFRESH_BUFFER_MS, DEFAULT_TOKEN_LIFETIME_MS, ensureUnexpired } from "./credential.js";

/**
 * Produces a currently valid bearer credential for the session client.
 * The strategy is fixed when the manager is constructed.
 */
export interface AuthManager {
  readonly mode: AuthMode;
  readonly context: AuthContext;
  /** Return a credential whose expiresAt lies in the future. */
  obtainCredential(): Promise<Credential>;
  /** Renew the credential regardless of the expiry buffer. */
  refresh(): Promise<Credential>;
  /** Mode-specific headers sent alongside the bearer token. */
  requestHeaders(credential: Credential): Record<string, string>;
}

export interface AuthManagerOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
  clock?: () => number;
}

export interface CreateAuthManagerOptions extends AuthManagerOptions {
  cache?: TokenCache;
}

export function createAuthManager(
  config: AppConfig,
  options: CreateAuthManagerOptions = {},
): AuthManager {
  const context = resolveAuthContext(config);
  const { cache, ...managerOptions } = options;

  if (config.auth.mode === "cache") {
    return new CacheModeAuthManager(
      {
        context,
        portalUrl: config.auth.portalUrl,
        portalCode: config.auth.portalCode,
        cache: cache ?? new FileTokenCache(config.auth.tokenCachePath),
      },
      managerOptions,
    );
  }

  return new TraditionalAuthManager(
    {
      context,
      baseUrl: config.baseUrl,
      apiKey: config.auth.apiKey,
    },
    managerOptions,
  );
}
