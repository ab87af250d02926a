/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2026 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Main client
export { SessionClient } from "./client.js";
export { TopicApi } from "./topics.js";
export type { CreateTopicResult, RemoteTopic, RemotePart } from "./topics.js";

// Transport and pacing
export { sendWithTimeout, readBody } from "./http.js";
export { RequestPacer, sleep } from "./rate-limiter.js";
export type { SleepFn } from "./rate-limiter.js";

// Errors
export { ApiError, NetworkError, isApiError } from "./errors.js";

// Types
export type {
  SessionClientOptions,
  CreateTopicRequest,
  CheckinRequest,
  PartRequest,
  RelationRequest,
  TagRequest,
  FetchFn,
  HttpMethod,
} from "./types.js";
