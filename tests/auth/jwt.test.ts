import { describe, it, expect } from "vitest";
import { decodeTokenExpiry, tryDecodeTokenExpiry } from "../../src/auth/jwt.js";
import { AuthError } from "../../src/utils/errors.js";
import { testJwt } from "../helpers/jwt.js";

describe("decodeTokenExpiry", () => {
  it("returns the exp claim in milliseconds", async () => {
    const token = await testJwt({ sub: "tester" }, 1_900_000_000);
    expect(decodeTokenExpiry(token)).toBe(1_900_000_000_000);
  });

  it("throws AuthError for a token that is not a JWT", () => {
    expect(() => decodeTokenExpiry("opaque-token")).toThrow(AuthError);
  });

  it("throws AuthError when exp is missing", async () => {
    const token = await testJwt({ sub: "tester" });
    expect(() => decodeTokenExpiry(token)).toThrow("token carries no exp claim");
  });
});

describe("tryDecodeTokenExpiry", () => {
  it("returns null instead of throwing", () => {
    expect(tryDecodeTokenExpiry("opaque-token")).toBeNull();
  });
});
