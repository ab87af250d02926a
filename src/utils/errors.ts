/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "SyncError";
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(`[TSYNC-1001] Configuration error: ${message}`, cause);
    this.name = "ConfigError";
  }
}

export class ProcessValidationError extends ConfigError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.message = `[TSYNC-1002] Invalid process document: ${message}`;
    this.name = "ProcessValidationError";
  }
}

export class AuthError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(`[TSYNC-1003] Authentication failed: ${message}`, cause);
    this.name = "AuthError";
  }
}

export class TokenCacheError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(`[TSYNC-1004] Token cache error: ${message}`, cause);
    this.name = "TokenCacheError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
