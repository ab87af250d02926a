import { decodeJwt } from "jose";
import { AuthError } from "../utils/errors.js";

/**
 * Read the `exp` claim of a JWT as a Unix timestamp in ms.
 * The signature is not verified; the server does that.
 *
 * @throws AuthError when the token is not a well-formed JWT or has no numeric exp
 */
export function decodeTokenExpiry(token: string): number {
  let exp: unknown;
  try {
    exp = decodeJwt(token).exp;
  } catch (error) {
    throw new AuthError(
      "token is not a well-formed JWT and no expiry was supplied",
      error instanceof Error ? error : undefined,
    );
  }

  if (typeof exp !== "number" || !Number.isFinite(exp)) {
    throw new AuthError("token carries no exp claim and no expiry was supplied");
  }
  return exp * 1000;
}

/** Same as decodeTokenExpiry, but returns null instead of throwing. */
export function tryDecodeTokenExpiry(token: string): number | null {
  try {
    return decodeTokenExpiry(token);
  } catch {
    return null;
  }
}
