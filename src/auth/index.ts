/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export { createAuthManager, REFRESH_BUFFER_MS, DEFAULT_TOKEN_LIFETIME_MS } from "./auth-manager.js";
export type { AuthManager, AuthManagerOptions, CreateAuthManagerOptions } from "./auth-manager.js";
export { TraditionalAuthManager } from "./traditional-auth.js";
export { CacheModeAuthManager } from "./cache-mode-auth.js";
export { FileTokenCache, MemoryTokenCache, toCacheRecord, fromCacheRecord } from "./token-cache.js";
export type { TokenCache } from "./token-cache.js";
export { parseCmsUrl, resolveAuthContext } from "./cms-url.js";
export type { CmsScope } from "./cms-url.js";
export { decodeTokenExpiry } from "./jwt.js";
