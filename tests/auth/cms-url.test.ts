import { describe, it, expect } from "vitest";
import { parseCmsUrl, resolveAuthContext } from "../../src/auth/cms-url.js";
import type { AppConfig } from "../../src/types/index.js";
import { ConfigError } from "../../src/utils/errors.js";

function config(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    baseUrl: "https://cms.test",
    auth: { mode: "traditional", apiKey: "test-api-key" },
    acl: [],
    skipCheckoutCheckin: false,
    rateLimitMs: 0,
    requestTimeoutMs: 30_000,
    debug: false,
    ...overrides,
  };
}

describe("parseCmsUrl", () => {
  it("extracts tenant, project and ACL entry", () => {
    expect(
      parseCmsUrl("https://company.example.com/cms/tenant/T1/project/P2/acl/A3/topics?x=1"),
    ).toEqual({ tenantId: "T1", projectId: "P2", aclEntryId: "A3" });
  });

  it("matches the segment names case-insensitively", () => {
    expect(parseCmsUrl("https://x.test/Tenant/t/PROJECT/p/Acl/a")).toEqual({
      tenantId: "t",
      projectId: "p",
      aclEntryId: "a",
    });
  });

  it("throws ConfigError when a segment is missing", () => {
    expect(() => parseCmsUrl("https://x.test/tenant/t/project/p")).toThrow(ConfigError);
    expect(() => parseCmsUrl("https://x.test/tenant//project/p/acl/a")).toThrow(ConfigError);
  });
});

describe("resolveAuthContext", () => {
  it("uses the discrete fields when no CMS URL is set", () => {
    const context = resolveAuthContext(
      config({ tenant: "t", projectId: "p", acl: ["a1", "a2"], ntAccount: "DOMAIN\\user" }),
    );
    expect(context).toEqual({ tenantId: "t", projectId: "p", acl: ["a1", "a2"], ntAccount: "DOMAIN\\user" });
  });

  it("lets CMS URL values win over discrete fields", () => {
    const context = resolveAuthContext(
      config({
        tenant: "old-t",
        projectId: "old-p",
        acl: ["old-a"],
        cmsUrl: "https://x.test/tenant/T/project/P/acl/A",
      }),
    );
    expect(context).toEqual({ tenantId: "T", projectId: "P", acl: ["A"] });
  });

  it("names every missing field", () => {
    expect(() => resolveAuthContext(config({ tenant: "t" }))).toThrow(
      "missing required credentials: CMS_PROJECT_ID (or CMS_URL), CMS_ACL (or CMS_URL)",
    );
  });

  it("rejects a malformed CMS URL even when discrete fields are present", () => {
    expect(() =>
      resolveAuthContext(config({ tenant: "t", projectId: "p", acl: ["a"], cmsUrl: "https://x.test/nothing" })),
    ).toThrow(ConfigError);
  });
});
