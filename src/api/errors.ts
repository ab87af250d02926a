/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { SyncError } from "../utils/errors.js";

// Any non-2xx response other than the retried 401
export class ApiError extends SyncError {
  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    public readonly responseBody: string = "",
    cause?: Error,
  ) {
    super(
      `[TSYNC-2001] API error (${status}) at ${endpoint}${responseBody ? `: ${truncate(responseBody)}` : ""}`,
      cause,
    );
    this.name = "ApiError";
  }
}

// Network-level error (no HTTP status code)
// For fetch failures, timeouts, DNS errors
export class NetworkError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(`[TSYNC-2002] Network error: ${message}`, cause);
    this.name = "NetworkError";
  }
}

export function isApiError(error: unknown, status?: number): error is ApiError {
  return error instanceof ApiError && (status === undefined || error.status === status);
}

function truncate(text: string, limit = 500): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
