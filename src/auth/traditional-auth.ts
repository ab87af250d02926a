import { z } from "zod";
import type { AuthContext, Credential } from "../types/index.js";
import type { AuthManager, AuthManagerOptions } from "./auth-manager.js";
import { readBody, sendWithTimeout, type FetchFn } from "../api/http.js";
import { AuthError, ConfigError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import { DEFAULT_TOKEN_LIFETIME_MS, REFRESH_BUFFER_MS, ensureUnexpired } from "./credential.js";
import { tryDecodeTokenExpiry } from "./jwt.js";

const SessionTokenResponseSchema = z.object({
  sessionToken: z.string().min(1),
  expiresIn: z.number().positive().optional(), // seconds
});

export interface TraditionalAuthParams {
  context: AuthContext;
  baseUrl: string;
  apiKey?: string;
}

/**
 * Exchanges the static API key plus tenant/NT-account/ACL/project for a
 * short-lived session token. Nothing is persisted; the token is kept in
 * memory for the rest of the run and re-requested once it nears expiry.
 */
export class TraditionalAuthManager implements AuthManager {
  readonly mode = "traditional" as const;
  readonly context: AuthContext;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchFn;
  private readonly timeoutMs: number;
  private readonly clock: () => number;
  private current: Credential | null = null;

  constructor(params: TraditionalAuthParams, options: AuthManagerOptions = {}) {
    if (!params.apiKey) {
      throw new ConfigError("CMS_API_KEY is required when CMS_AUTH_MODE=traditional");
    }
    this.context = params.context;
    this.baseUrl = params.baseUrl.replace(/\/$/, "");
    this.apiKey = params.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.clock = options.clock ?? Date.now;
  }

  async obtainCredential(): Promise<Credential> {
    if (this.current && this.current.expiresAt - this.clock() > REFRESH_BUFFER_MS) {
      log("DEBUG", "Reusing session token");
      return this.current;
    }
    return this.refresh();
  }

  async refresh(): Promise<Credential> {
    log("DEBUG", "Requesting new session token");

    const response = await sendWithTimeout(
      this.fetchImpl,
      `${this.baseUrl}/auth/session`,
      {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          apiKey: this.apiKey,
          tenant: this.context.tenantId,
          ntAccount: this.context.ntAccount,
          acl: this.context.acl,
          projectId: this.context.projectId,
        }),
      },
      this.timeoutMs,
    );

    const body = await readBody(response);
    if (!response.ok) {
      throw new AuthError(
        `session token request rejected (${response.status}): ${typeof body === "string" ? body : JSON.stringify(body)}`,
      );
    }

    const parsed = SessionTokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError("session token response did not contain a sessionToken");
    }

    const now = this.clock();
    const { sessionToken, expiresIn } = parsed.data;
    const expiresAt =
      expiresIn !== undefined
        ? now + expiresIn * 1000
        : (tryDecodeTokenExpiry(sessionToken) ?? now + DEFAULT_TOKEN_LIFETIME_MS);

    this.current = ensureUnexpired(
      {
        accessToken: sessionToken,
        publicationBaseUrl: this.baseUrl,
        expiresAt,
      },
      now,
    );

    log("DEBUG", `Session token expires in ${Math.round((expiresAt - now) / 1000)}s`);
    return this.current;
  }

  requestHeaders(): Record<string, string> {
    return { "X-API-Key": this.apiKey };
  }
}
