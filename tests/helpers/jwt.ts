import { SignJWT, type JWTPayload } from "jose";

const SECRET = new TextEncoder().encode("test-secret-0123456789abcdefghij");

/** HS256-signed token carrying `claims`, with `exp` set when given (seconds). */
export async function testJwt(claims: JWTPayload = {}, exp?: number): Promise<string> {
  const jwt = new SignJWT(claims).setProtectedHeader({ alg: "HS256" });
  if (exp !== undefined) {
    jwt.setExpirationTime(exp);
  }
  return jwt.sign(SECRET);
}
