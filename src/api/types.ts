/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2026 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { AuthManager } from "../auth/auth-manager.js";
import type { FetchFn, HttpMethod } from "./http.js";
import type { SleepFn } from "./rate-limiter.js";

// Session client constructor options
export interface SessionClientOptions {
  baseUrl: string;
  auth: AuthManager;
  timeoutMs?: number; // default 30_000
  rateLimitMs?: number; // pause after each call, default 0
  fetch?: FetchFn;
  sleep?: SleepFn;
}

// Create topic payload (minimal contract)
export interface CreateTopicRequest {
  topicId: string;
  topicTitle: string;
  topicTypeId: string;
  copyParentTags: boolean;
  parentTopicId?: string;
}

export interface CheckinRequest {
  comment?: string;
}

export interface PartRequest {
  name: string;
  content: unknown;
}

export interface RelationRequest {
  relationTypeId: string;
  sourceTopicId: string;
  targetTopicIds: string[];
}

export interface TagRequest {
  tags: string[];
}

export type { FetchFn, HttpMethod };
