import type { Credential } from "../types/index.js";
import { AuthError } from "../utils/errors.js";

/**
 * Token refresh buffer - tokens within this time of expiry are considered invalid.
 * This prevents using tokens that might expire during a request.
 */
export const REFRESH_BUFFER_MS = 5 * 60 * 1000; // 5 minutes

// Assumed lifetime when the server states none
export const DEFAULT_TOKEN_LIFETIME_MS = 3600 * 1000;

/**
 * Guard on everything handed out: an expired credential never leaves the manager.
 */
export function ensureUnexpired(credential: Credential, now: number): Credential {
  if (credential.expiresAt <= now) {
    throw new AuthError(
      `received a token that already expired at ${new Date(credential.expiresAt).toISOString()}`,
    );
  }
  return credential;
}
