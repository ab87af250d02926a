import type { SessionClientOptions, HttpMethod } from "./types.js";
import type { AuthManager } from "../auth/auth-manager.js";
import type { AuthContext, Credential } from "../types/index.js";
import { RequestPacer } from "./rate-limiter.js";
import { ApiError } from "./errors.js";
import { readBody, sendWithTimeout, type FetchFn } from "./http.js";
import { AuthError, ConfigError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

// A 401 triggers at most this many credential refreshes per call
const MAX_AUTH_RETRIES = 1;

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

/**
 * Authenticated client for the content-management REST API.
 *
 * Key features:
 * - Bearer credential from the AuthManager on every call, plus the mode's
 *   extra headers and the tenant/project/ACL scope headers
 * - 401 handling: refresh the credential once and retry, then fail with AuthError
 * - Fixed per-call timeout; timeouts surface as NetworkError and are not retried
 * - Optional pause after each call (rate limiting)
 * - HTTPS-only, except for local mock servers
 */
export class SessionClient {
  private readonly baseUrl: string;
  private readonly auth: AuthManager;
  private readonly fetchImpl: FetchFn;
  private readonly timeoutMs: number;
  private readonly pacer: RequestPacer;

  constructor(options: SessionClientOptions) {
    const base = new URL(options.baseUrl);
    if (base.protocol === "http:" && !LOCAL_HOSTS.has(base.hostname)) {
      throw new ConfigError(
        `HTTPS is required for ${options.baseUrl}; plain HTTP is only allowed for localhost`,
      );
    }

    // Strip trailing slash from baseUrl
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.auth = options.auth;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.pacer = new RequestPacer(options.rateLimitMs ?? 0, options.sleep);

    log("DEBUG", `SessionClient initialized for ${this.baseUrl} (${this.auth.mode} auth)`);
  }

  get context(): AuthContext {
    return this.auth.context;
  }

  /**
   * Issue one authenticated call.
   *
   * @param path - API path, may contain {tenantId}, {projectId} and {aclEntryId}
   * @returns Parsed JSON body, the raw text for non-JSON bodies, or undefined when empty
   * @throws ApiError on any non-2xx response other than the retried 401
   * @throws AuthError when the call is still unauthorized after one refresh
   * @throws NetworkError on timeouts and connection failures
   */
  async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const endpoint = this.resolvePath(path);
    const url = `${this.baseUrl}${endpoint}`;
    let credential = await this.auth.obtainCredential();

    try {
      for (let attempt = 0; ; attempt++) {
        log("DEBUG", `${attempt > 0 ? "Retrying" : "Requesting"} ${method} ${endpoint}`);

        const response = await sendWithTimeout(
          this.fetchImpl,
          url,
          {
            method,
            headers: this.buildHeaders(credential, body !== undefined),
            ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
          },
          this.timeoutMs,
        );

        if (response.status === 401) {
          await response.text();
          if (attempt >= MAX_AUTH_RETRIES) {
            throw new AuthError(
              `${method} ${endpoint} still unauthorized after refreshing the credential`,
            );
          }
          log("DEBUG", "401 response, refreshing credential and retrying once");
          credential = await this.auth.refresh();
          continue;
        }

        const data = await readBody(response);
        if (!response.ok) {
          throw new ApiError(response.status, `${method} ${endpoint}`, describeBody(data));
        }
        return data;
      }
    } finally {
      await this.pacer.pace();
    }
  }

  get(path: string): Promise<unknown> {
    return this.request("GET", path);
  }

  post(path: string, body?: unknown): Promise<unknown> {
    return this.request("POST", path, body);
  }

  put(path: string, body?: unknown): Promise<unknown> {
    return this.request("PUT", path, body);
  }

  delete(path: string): Promise<unknown> {
    return this.request("DELETE", path);
  }

  private resolvePath(path: string): string {
    const { tenantId, projectId, acl } = this.auth.context;
    const resolved = path
      .replaceAll("{tenantId}", tenantId)
      .replaceAll("{projectId}", projectId)
      .replaceAll("{aclEntryId}", acl[0] ?? "");
    return resolved.startsWith("/") ? resolved : `/${resolved}`;
  }

  private buildHeaders(credential: Credential, hasBody: boolean): Record<string, string> {
    const { tenantId, projectId, acl, ntAccount } = this.auth.context;
    return {
      Accept: "application/json",
      ...(hasBody ? { "Content-Type": "application/json" } : {}),
      ...this.auth.requestHeaders(credential),
      "X-Tenant-Id": tenantId,
      "X-Project-Id": projectId,
      "X-Acl-Entry-Id": acl.join(","),
      ...(ntAccount ? { "X-Nt-Account": ntAccount } : {}),
      Authorization: `Bearer ${credential.accessToken}`,
    };
  }
}

function describeBody(data: unknown): string {
  if (data === undefined) return "";
  return typeof data === "string" ? data : JSON.stringify(data);
}
