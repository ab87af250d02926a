/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import type { AppConfig, AuthConfig } from "../types/index.js";
import type { ConfigStoreData } from "./config-store.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_PORTAL_URL = "https://portal.askdelphi.com";
export const DEFAULT_TOKEN_CACHE_PATH = path.join(os.homedir(), ".topic-sync", "tokens.json");
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// Environment variable backing each config field, used in error messages
const ENV_KEYS: Record<string, string> = {
  baseUrl: "CMS_BASE_URL",
  authMode: "CMS_AUTH_MODE",
  apiKey: "CMS_API_KEY",
  tenant: "CMS_TENANT",
  projectId: "CMS_PROJECT_ID",
  acl: "CMS_ACL",
  ntAccount: "CMS_NT_ACCOUNT",
  cmsUrl: "CMS_URL",
  portalCode: "CMS_PORTAL_CODE",
  portalUrl: "CMS_PORTAL_URL",
  tokenCachePath: "CMS_TOKEN_CACHE",
  skipCheckoutCheckin: "SKIP_CHECKOUT_CHECKIN",
  rateLimitMs: "RATE_LIMIT_MS",
  requestTimeoutMs: "REQUEST_TIMEOUT_MS",
  debug: "DEBUG",
};

const RawConfigSchema = z.object({
  baseUrl: z.url(),
  authMode: z.enum(["traditional", "cache"]),
  apiKey: z.string().min(1).optional(),
  tenant: z.string().min(1).optional(),
  projectId: z.string().min(1).optional(),
  acl: z.array(z.string().min(1)),
  ntAccount: z.string().min(1).optional(),
  cmsUrl: z.string().min(1).optional(),
  portalCode: z.string().min(1).optional(),
  portalUrl: z.url(),
  tokenCachePath: z.string().min(1),
  skipCheckoutCheckin: z.boolean(),
  rateLimitMs: z.number().int().min(0),
  requestTimeoutMs: z.number().int().positive(),
  debug: z.boolean(),
});

/**
 * Build the application config from environment variables, falling back to
 * values from the optional JSON config file. Environment values win.
 *
 * @throws ConfigError listing every invalid or missing key
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  store: ConfigStoreData = {},
): AppConfig {
  const raw = {
    baseUrl: str(env.CMS_BASE_URL) ?? store.baseUrl,
    authMode: (str(env.CMS_AUTH_MODE) ?? store.authMode ?? "traditional").toLowerCase(),
    apiKey: str(env.CMS_API_KEY) ?? store.apiKey,
    tenant: str(env.CMS_TENANT) ?? store.tenant,
    projectId: str(env.CMS_PROJECT_ID) ?? store.projectId,
    acl: env.CMS_ACL !== undefined ? splitList(env.CMS_ACL) : (store.acl ?? []),
    ntAccount: str(env.CMS_NT_ACCOUNT) ?? store.ntAccount,
    cmsUrl: str(env.CMS_URL) ?? store.cmsUrl,
    portalCode: str(env.CMS_PORTAL_CODE) ?? store.portalCode,
    portalUrl: str(env.CMS_PORTAL_URL) ?? store.portalUrl ?? DEFAULT_PORTAL_URL,
    tokenCachePath: expandTilde(
      str(env.CMS_TOKEN_CACHE) ?? store.tokenCachePath ?? DEFAULT_TOKEN_CACHE_PATH,
    ),
    skipCheckoutCheckin:
      bool(env.SKIP_CHECKOUT_CHECKIN) ?? store.skipCheckoutCheckin ?? false,
    rateLimitMs: num(env.RATE_LIMIT_MS) ?? store.rateLimitMs ?? 0,
    requestTimeoutMs:
      num(env.REQUEST_TIMEOUT_MS) ?? store.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    debug: bool(env.DEBUG) ?? store.debug ?? false,
  };

  const result = RawConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = String(issue.path[0] ?? "");
      return `${ENV_KEYS[field] ?? field}: ${issue.message}`;
    });
    throw new ConfigError(issues.join("; "));
  }

  const values = result.data;
  const auth: AuthConfig =
    values.authMode === "cache"
      ? {
          mode: "cache",
          portalCode: values.portalCode,
          portalUrl: values.portalUrl.replace(/\/$/, ""),
          tokenCachePath: values.tokenCachePath,
        }
      : { mode: "traditional", apiKey: values.apiKey };

  return {
    baseUrl: values.baseUrl.replace(/\/$/, ""),
    auth,
    tenant: values.tenant,
    projectId: values.projectId,
    acl: values.acl,
    ntAccount: values.ntAccount,
    cmsUrl: values.cmsUrl,
    skipCheckoutCheckin: values.skipCheckoutCheckin,
    rateLimitMs: values.rateLimitMs,
    requestTimeoutMs: values.requestTimeoutMs,
    debug: values.debug,
  };
}

function str(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function bool(value: string | undefined): boolean | undefined {
  const trimmed = str(value);
  if (trimmed === undefined) return undefined;
  return ["true", "1", "yes"].includes(trimmed.toLowerCase());
}

function num(value: string | undefined): number | undefined {
  const trimmed = str(value);
  return trimmed === undefined ? undefined : Number(trimmed);
}

export function expandTilde(filePath: string): string {
  if (filePath.startsWith("~")) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

export type { AppConfig };
