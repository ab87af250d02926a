import { z } from "zod";
import type { AuthContext, CachedTokens, Credential } from "../types/index.js";
import type { AuthManager, AuthManagerOptions } from "./auth-manager.js";
import type { TokenCache } from "./token-cache.js";
import { readBody, sendWithTimeout, type FetchFn } from "../api/http.js";
import { NetworkError } from "../api/errors.js";
import { AuthError, ConfigError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import { REFRESH_BUFFER_MS, ensureUnexpired } from "./credential.js";
import { decodeTokenExpiry } from "./jwt.js";

const PortalRegistrationSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().nullish(),
  url: z.string().min(1),
});

const RefreshResponseSchema = z.object({
  token: z.string().min(1).optional(),
  accessToken: z.string().min(1).optional(),
  refresh: z.string().min(1).optional(),
  refreshToken: z.string().min(1).optional(),
});

const ApiTokenResponseSchema = z.union([
  z.string(),
  z.object({
    token: z.string().optional(),
    accessToken: z.string().optional(),
    apiToken: z.string().optional(),
    expiresIn: z.number().positive().optional(), // seconds
  }),
]);

export interface CacheModeAuthParams {
  context: AuthContext;
  portalUrl: string;
  portalCode?: string;
  cache: TokenCache;
}

/**
 * Portal-code authentication with a persistent token cache.
 *
 * First run: the one-time portal code is exchanged for an access/refresh
 * token pair plus the publication URL, then the access token is exchanged
 * for an editing API token. Later runs reuse the cached API token until it
 * is within REFRESH_BUFFER_MS of expiry, at which point the access token is
 * refreshed and a new API token derived. The cache is rewritten after every
 * exchange.
 */
export class CacheModeAuthManager implements AuthManager {
  readonly mode = "cache" as const;
  readonly context: AuthContext;
  private readonly portalUrl: string;
  private readonly portalCode?: string;
  private readonly cache: TokenCache;
  private readonly fetchImpl: FetchFn;
  private readonly timeoutMs: number;
  private readonly clock: () => number;
  private tokens: CachedTokens | null = null;
  private cacheLoaded = false;
  private portalCodeUsed = false;

  constructor(params: CacheModeAuthParams, options: AuthManagerOptions = {}) {
    this.context = params.context;
    this.portalUrl = params.portalUrl.replace(/\/$/, "");
    this.portalCode = params.portalCode;
    this.cache = params.cache;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.clock = options.clock ?? Date.now;
  }

  async obtainCredential(): Promise<Credential> {
    const tokens = await this.currentTokens();

    if (
      tokens.apiToken !== undefined &&
      tokens.apiTokenExpiresAt !== undefined &&
      this.clock() < tokens.apiTokenExpiresAt - REFRESH_BUFFER_MS
    ) {
      log("DEBUG", "Using cached API token (still valid)");
      return this.toCredential(tokens);
    }

    log("DEBUG", "API token missing or within refresh buffer, renewing");
    return this.toCredential(await this.renewOrRegister(tokens));
  }

  async refresh(): Promise<Credential> {
    const tokens = await this.currentTokens();
    log("INFO", "Forcing token refresh");
    return this.toCredential(await this.renewOrRegister(tokens));
  }

  requestHeaders(): Record<string, string> {
    return {};
  }

  private async currentTokens(): Promise<CachedTokens> {
    if (!this.cacheLoaded) {
      this.tokens = await this.cache.load();
      this.cacheLoaded = true;
    }
    if (!this.tokens) {
      this.tokens = await this.register();
    }
    return this.tokens;
  }

  /**
   * Renew from the current tokens. When the service rejects them and an
   * unused portal code is configured, start over from the portal code.
   */
  private async renewOrRegister(tokens: CachedTokens): Promise<CachedTokens> {
    try {
      return await this.renew(tokens);
    } catch (error) {
      if (!(error instanceof AuthError) || !this.portalCode || this.portalCodeUsed) {
        throw error;
      }
      log("WARN", `Cached tokens were rejected (${error.message}); authenticating with the portal code`);
      this.tokens = null;
      this.tokens = await this.register();
      return this.tokens;
    }
  }

  private async renew(tokens: CachedTokens): Promise<CachedTokens> {
    let next = tokens;
    if (next.refreshToken) {
      next = await this.refreshAccessToken(next);
    }
    return this.deriveApiToken(next);
  }

  /**
   * Exchange the portal code for access/refresh tokens. The code is
   * single-use: it is sent at most once per run, and a failed exchange is final.
   */
  private async register(): Promise<CachedTokens> {
    if (this.portalCodeUsed) {
      throw new AuthError("the portal code was already used in this run; request a fresh code");
    }
    if (!this.portalCode) {
      throw new ConfigError(
        `no cached tokens at ${this.cache.location} and no portal code configured (CMS_PORTAL_CODE)`,
      );
    }
    this.portalCodeUsed = true;

    log("INFO", "Exchanging portal code for tokens");
    const url = `${this.portalUrl}/api/session/registration?sessionCode=${encodeURIComponent(this.portalCode)}`;

    let response: Response;
    try {
      response = await sendWithTimeout(
        this.fetchImpl,
        url,
        { method: "GET", headers: { Accept: "application/json" } },
        this.timeoutMs,
      );
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new AuthError(`portal code exchange failed: ${error.message}`, error);
      }
      throw error;
    }

    const body = await readBody(response);
    if (!response.ok) {
      const hint =
        response.status === 401
          ? " Portal codes are single-use; the code may be invalid, expired or already used."
          : "";
      throw new AuthError(`portal code exchange rejected (${response.status}).${hint}`);
    }

    const parsed = PortalRegistrationSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError("portal response did not contain accessToken and url");
    }

    let publicationUrl: string;
    try {
      publicationUrl = new URL(parsed.data.url).origin;
    } catch (error) {
      throw new AuthError(
        `portal returned an invalid publication url "${parsed.data.url}"`,
        error instanceof Error ? error : undefined,
      );
    }

    const tokens: CachedTokens = {
      accessToken: parsed.data.accessToken,
      ...(parsed.data.refreshToken ? { refreshToken: parsed.data.refreshToken } : {}),
      publicationUrl,
      savedAt: new Date(this.clock()).toISOString(),
    };
    await this.cache.save(tokens);
    log("INFO", `Portal code accepted, publication URL ${publicationUrl}`);

    return this.deriveApiToken(tokens);
  }

  private async refreshAccessToken(tokens: CachedTokens): Promise<CachedTokens> {
    log("DEBUG", "Refreshing access token");

    const url =
      `${tokens.publicationUrl}/api/token/refresh` +
      `?token=${encodeURIComponent(tokens.accessToken)}` +
      `&refreshToken=${encodeURIComponent(tokens.refreshToken ?? "")}`;

    const response = await sendWithTimeout(
      this.fetchImpl,
      url,
      {
        method: "GET",
        headers: {
          Authorization: `Bearer ${tokens.accessToken}`,
          Accept: "application/json",
        },
      },
      this.timeoutMs,
    );

    const body = await readBody(response);
    const parsed = RefreshResponseSchema.safeParse(body);
    if (!response.ok || !parsed.success) {
      // The current access token may still be accepted by the API token exchange
      log("WARN", `Token refresh rejected (${response.status}), continuing with current access token`);
      return tokens;
    }

    const next: CachedTokens = {
      ...tokens,
      accessToken: parsed.data.token ?? parsed.data.accessToken ?? tokens.accessToken,
      refreshToken: parsed.data.refresh ?? parsed.data.refreshToken ?? tokens.refreshToken,
      savedAt: new Date(this.clock()).toISOString(),
    };
    await this.cache.save(next);
    this.tokens = next;
    log("INFO", "Tokens refreshed");
    return next;
  }

  private async deriveApiToken(tokens: CachedTokens): Promise<CachedTokens> {
    log("DEBUG", "Requesting editing API token");

    const response = await sendWithTimeout(
      this.fetchImpl,
      `${tokens.publicationUrl}/api/token/EditingApiToken`,
      {
        method: "GET",
        headers: {
          Authorization: `Bearer ${tokens.accessToken}`,
          Accept: "application/json",
        },
      },
      this.timeoutMs,
    );

    if (!response.ok) {
      throw new AuthError(`editing API token request rejected (${response.status})`);
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (contentType.toLowerCase().includes("html")) {
      throw new AuthError(
        `received HTML instead of a token from ${tokens.publicationUrl}/api/token/EditingApiToken. ` +
          `The publication URL is probably wrong; delete ${this.cache.location} and authenticate with a fresh portal code.`,
      );
    }

    const { token, expiresIn } = extractApiToken(await readBody(response));
    const now = this.clock();
    const apiTokenExpiresAt =
      expiresIn !== undefined ? now + expiresIn * 1000 : decodeTokenExpiry(token);

    const next: CachedTokens = {
      ...tokens,
      apiToken: token,
      apiTokenExpiresAt,
      savedAt: new Date(now).toISOString(),
    };
    await this.cache.save(next);
    this.tokens = next;
    log("DEBUG", `API token expires at ${new Date(apiTokenExpiresAt).toISOString()}`);
    return next;
  }

  private toCredential(tokens: CachedTokens): Credential {
    if (tokens.apiToken === undefined || tokens.apiTokenExpiresAt === undefined) {
      throw new AuthError("no API token available");
    }
    return ensureUnexpired(
      {
        accessToken: tokens.apiToken,
        ...(tokens.refreshToken ? { refreshToken: tokens.refreshToken } : {}),
        publicationBaseUrl: tokens.publicationUrl,
        expiresAt: tokens.apiTokenExpiresAt,
      },
      this.clock(),
    );
  }
}

function extractApiToken(body: unknown): { token: string; expiresIn?: number } {
  const parsed = ApiTokenResponseSchema.safeParse(body);
  if (parsed.success) {
    const value = parsed.data;
    const token =
      typeof value === "string"
        ? value.trim().replace(/^"|"$/g, "")
        : (value.token ?? value.accessToken ?? value.apiToken ?? "");
    if (token) {
      return typeof value === "string" || value.expiresIn === undefined
        ? { token }
        : { token, expiresIn: value.expiresIn };
    }
  }
  throw new AuthError("EditingApiToken response did not contain a token");
}
