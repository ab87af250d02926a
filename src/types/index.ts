/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Bearer credential handed to the session client
export interface Credential {
  accessToken: string;
  refreshToken?: string;
  publicationBaseUrl: string;
  expiresAt: number; // Unix timestamp ms
}

// Tokens persisted between runs (cache mode)
export interface CachedTokens {
  accessToken: string;
  refreshToken?: string;
  publicationUrl: string;
  apiToken?: string;
  apiTokenExpiresAt?: number; // Unix timestamp ms
  savedAt: string; // ISO timestamp
}

// On-disk layout of the token cache file
export interface TokenCacheRecord {
  access_token: string;
  refresh_token: string | null;
  publication_url: string;
  api_token?: string;
  expires_at?: number;
  saved_at: string;
}

// Tenant/project/ACL scope attached to every request
export interface AuthContext {
  tenantId: string;
  projectId: string;
  acl: string[];
  ntAccount?: string;
}

export type AuthMode = "traditional" | "cache";

export type AuthConfig =
  | {
      mode: "traditional";
      apiKey?: string;
    }
  | {
      mode: "cache";
      portalCode?: string;
      portalUrl: string;
      tokenCachePath: string;
    };

// Application configuration
export interface AppConfig {
  baseUrl: string;
  auth: AuthConfig;
  tenant?: string;
  projectId?: string;
  acl: string[];
  ntAccount?: string;
  cmsUrl?: string;
  skipCheckoutCheckin: boolean;
  rateLimitMs: number;
  requestTimeoutMs: number;
  debug: boolean;
}

export interface TopicRelation {
  relationTypeId: string;
  targetTopicIds: string[];
}

// A node of the topic tree produced by the mapper
export interface TopicNode {
  readonly id: string;
  readonly title: string;
  readonly topicTypeId: string;
  readonly parentId: string | null;
  readonly children: readonly TopicNode[];
  readonly tags: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly parts: Readonly<Record<string, unknown>>;
  readonly relations: readonly TopicRelation[];
}

export type ImportState =
  | "absent"
  | "created"
  | "checked-out"
  | "updated"
  | "checked-in";

export interface ImportOutcome {
  topicId: string;
  title: string;
  state: ImportState;
  status: "succeeded" | "failed" | "skipped";
  error?: Error;
}

export interface DeleteOutcome {
  topicId: string;
  status: "deleted" | "absent" | "failed" | "blocked";
  error?: Error;
}

// Log levels
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";
