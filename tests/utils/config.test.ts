import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  DEFAULT_PORTAL_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TOKEN_CACHE_PATH,
  expandTilde,
  loadConfig,
} from "../../src/utils/config.js";
import { getConfigStorePath, loadConfigStore } from "../../src/utils/config-store.js";
import { ConfigError } from "../../src/utils/errors.js";

describe("loadConfig", () => {
  it("applies defaults for a minimal traditional setup", () => {
    const config = loadConfig({ CMS_BASE_URL: "https://cms.test/", CMS_API_KEY: "test-api-key" });

    expect(config).toEqual({
      baseUrl: "https://cms.test",
      auth: { mode: "traditional", apiKey: "test-api-key" },
      tenant: undefined,
      projectId: undefined,
      acl: [],
      ntAccount: undefined,
      cmsUrl: undefined,
      skipCheckoutCheckin: false,
      rateLimitMs: 0,
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      debug: false,
    });
  });

  it("builds the cache-mode variant", () => {
    const config = loadConfig({
      CMS_BASE_URL: "https://cms.test",
      CMS_AUTH_MODE: "Cache",
      CMS_PORTAL_CODE: "ABC-123",
    });

    expect(config.auth).toEqual({
      mode: "cache",
      portalCode: "ABC-123",
      portalUrl: DEFAULT_PORTAL_URL,
      tokenCachePath: DEFAULT_TOKEN_CACHE_PATH,
    });
  });

  it("parses lists, flags and numbers", () => {
    const config = loadConfig({
      CMS_BASE_URL: "https://cms.test",
      CMS_ACL: " a1, a2 ,,",
      SKIP_CHECKOUT_CHECKIN: "yes",
      RATE_LIMIT_MS: "250",
      REQUEST_TIMEOUT_MS: "5000",
      DEBUG: "1",
    });

    expect(config.acl).toEqual(["a1", "a2"]);
    expect(config.skipCheckoutCheckin).toBe(true);
    expect(config.rateLimitMs).toBe(250);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.debug).toBe(true);
  });

  it("lets environment values win over the config file", () => {
    const config = loadConfig(
      { CMS_BASE_URL: "https://env.test", CMS_TENANT: "env-tenant" },
      { baseUrl: "https://file.test", tenant: "file-tenant", projectId: "file-project" },
    );

    expect(config.baseUrl).toBe("https://env.test");
    expect(config.tenant).toBe("env-tenant");
    expect(config.projectId).toBe("file-project");
  });

  it("reports every invalid key by its variable name", () => {
    expect(() =>
      loadConfig({ CMS_BASE_URL: "not a url", CMS_AUTH_MODE: "oauth", RATE_LIMIT_MS: "-1" }),
    ).toThrow(ConfigError);

    let message = "";
    try {
      loadConfig({ CMS_BASE_URL: "not a url", RATE_LIMIT_MS: "soon" });
    } catch (error) {
      message = error instanceof Error ? error.message : "";
    }
    expect(message).toMatch(/^\[TSYNC-1001\] Configuration error: CMS_BASE_URL: .+; RATE_LIMIT_MS: .+$/);
  });
});

describe("expandTilde", () => {
  it("expands a leading tilde only", () => {
    expect(expandTilde("~/tokens.json")).toBe(path.join(os.homedir(), "tokens.json"));
    expect(expandTilde("/tmp/tokens.json")).toBe("/tmp/tokens.json");
  });
});

describe("config store", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-store-test-"));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("honours TOPIC_SYNC_CONFIG", () => {
    expect(getConfigStorePath({ TOPIC_SYNC_CONFIG: "/etc/topic-sync.json" })).toBe("/etc/topic-sync.json");
  });

  it("loads a valid file", async () => {
    const file = path.join(testDir, "config.json");
    await fs.writeFile(file, JSON.stringify({ baseUrl: "https://cms.test", acl: ["a"], rateLimitMs: 100 }));

    expect(loadConfigStore(file)).toEqual({ baseUrl: "https://cms.test", acl: ["a"], rateLimitMs: 100 });
  });

  it("rejects a file with wrong types", async () => {
    const file = path.join(testDir, "config.json");
    await fs.writeFile(file, JSON.stringify({ rateLimitMs: "fast" }));

    expect(() => loadConfigStore(file)).toThrow(ConfigError);
  });
});
