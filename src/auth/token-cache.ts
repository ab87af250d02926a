/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { CachedTokens, TokenCacheRecord } from "../types/index.js";
import { TokenCacheError, toError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const TokenCacheRecordSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullable().optional(),
  publication_url: z.string().min(1),
  api_token: z.string().min(1).optional(),
  expires_at: z.number().optional(),
  saved_at: z.string(),
});

/**
 * Durable store for the tokens of the last successful authentication.
 * Only the cache-mode AuthManager reads or writes it.
 */
export interface TokenCache {
  readonly location: string;
  load(): Promise<CachedTokens | null>;
  save(tokens: CachedTokens): Promise<void>;
  clear(): Promise<void>;
}

export function toCacheRecord(tokens: CachedTokens): TokenCacheRecord {
  return {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken ?? null,
    publication_url: tokens.publicationUrl,
    ...(tokens.apiToken !== undefined ? { api_token: tokens.apiToken } : {}),
    ...(tokens.apiTokenExpiresAt !== undefined ? { expires_at: tokens.apiTokenExpiresAt } : {}),
    saved_at: tokens.savedAt,
  };
}

/**
 * Parse a cache record. Returns null when the value does not match the layout.
 */
export function fromCacheRecord(value: unknown): CachedTokens | null {
  const result = TokenCacheRecordSchema.safeParse(value);
  if (!result.success) {
    return null;
  }

  const record = result.data;
  return {
    accessToken: record.access_token,
    ...(record.refresh_token ? { refreshToken: record.refresh_token } : {}),
    publicationUrl: record.publication_url,
    ...(record.api_token !== undefined ? { apiToken: record.api_token } : {}),
    ...(record.expires_at !== undefined ? { apiTokenExpiresAt: record.expires_at } : {}),
    savedAt: record.saved_at,
  };
}

/**
 * FileTokenCache keeps the token record as JSON at a fixed path.
 * Writes go to a temp file that is renamed over the target, so a crash
 * mid-write leaves the previous record intact.
 */
export class FileTokenCache implements TokenCache {
  constructor(public readonly location: string) {}

  async save(tokens: CachedTokens): Promise<void> {
    const isWindows = process.platform === "win32";
    const dir = path.dirname(this.location);
    const tempPath = `${this.location}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;

    try {
      await fs.mkdir(dir, {
        recursive: true,
        ...(isWindows ? {} : { mode: 0o700 }),
      });

      await fs.writeFile(tempPath, JSON.stringify(toCacheRecord(tokens), null, 2), {
        encoding: "utf-8",
        ...(isWindows ? {} : { mode: 0o600 }),
      });
      await fs.rename(tempPath, this.location);

      log("DEBUG", `Tokens saved to ${this.location}`);
    } catch (error) {
      const err = toError(error);
      log("ERROR", `Failed to save tokens: ${err.message}`);
      await fs.rm(tempPath, { force: true });
      throw new TokenCacheError(`failed to write ${this.location}`, err);
    }
  }

  /**
   * Load tokens from disk.
   * Returns null if the file doesn't exist or is not a valid record.
   */
  async load(): Promise<CachedTokens | null> {
    let content: string;
    try {
      content = await fs.readFile(this.location, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        log("DEBUG", "No token cache file found");
      } else {
        const err = toError(error);
        log("WARN", `Failed to read token cache: ${err.message}`);
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const err = toError(error);
      log("WARN", `Token cache is not valid JSON, ignoring it: ${err.message}`);
      return null;
    }

    const tokens = fromCacheRecord(parsed);
    if (!tokens) {
      log("WARN", `Token cache at ${this.location} has an unexpected layout, ignoring it`);
      return null;
    }

    log("INFO", `Cached tokens loaded from ${this.location}`);
    return tokens;
  }

  async clear(): Promise<void> {
    try {
      await fs.unlink(this.location);
      log("DEBUG", `Token cache cleared: ${this.location}`);
    } catch (error) {
      // Already gone
      if (!isNotFound(error)) {
        const err = toError(error);
        log("WARN", `Failed to clear token cache: ${err.message}`);
      }
    }
  }
}

/**
 * In-process stand-in for FileTokenCache. Stores a serialized copy so that
 * callers never share object identity with the cached record.
 */
export class MemoryTokenCache implements TokenCache {
  readonly location = "memory";
  private record: TokenCacheRecord | null;
  saveCount = 0;

  constructor(initial?: CachedTokens) {
    this.record = initial ? toCacheRecord(initial) : null;
  }

  async load(): Promise<CachedTokens | null> {
    return this.record ? fromCacheRecord(structuredClone(this.record)) : null;
  }

  async save(tokens: CachedTokens): Promise<void> {
    this.record = toCacheRecord(tokens);
    this.saveCount++;
  }

  async clear(): Promise<void> {
    this.record = null;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
