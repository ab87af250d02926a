import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  FileTokenCache,
  MemoryTokenCache,
  fromCacheRecord,
  toCacheRecord,
} from "../../src/auth/token-cache.js";
import type { CachedTokens } from "../../src/types/index.js";

const tokens: CachedTokens = {
  accessToken: "access-1",
  refreshToken: "refresh-1",
  publicationUrl: "https://publication.test",
  apiToken: "api-1",
  apiTokenExpiresAt: 1_900_000_000_000,
  savedAt: "2026-01-01T00:00:00.000Z",
};

describe("cache record layout", () => {
  it("maps to the snake_case record", () => {
    expect(toCacheRecord(tokens)).toEqual({
      access_token: "access-1",
      refresh_token: "refresh-1",
      publication_url: "https://publication.test",
      api_token: "api-1",
      expires_at: 1_900_000_000_000,
      saved_at: "2026-01-01T00:00:00.000Z",
    });
  });

  it("accepts records without an API token or refresh token", () => {
    expect(
      fromCacheRecord({
        access_token: "access-1",
        refresh_token: null,
        publication_url: "https://publication.test",
        saved_at: "2026-01-01T00:00:00.000Z",
      }),
    ).toEqual({
      accessToken: "access-1",
      publicationUrl: "https://publication.test",
      savedAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("rejects records missing required fields", () => {
    expect(fromCacheRecord({ access_token: "a" })).toBeNull();
    expect(fromCacheRecord("not an object")).toBeNull();
  });
});

describe("FileTokenCache", () => {
  let testDir: string;
  let file: string;

  beforeEach(async () => {
    // Isolated temp directory per test
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "token-cache-test-"));
    file = path.join(testDir, "nested", "tokens.json");
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("loads null when no file exists", async () => {
    expect(await new FileTokenCache(file).load()).toBeNull();
  });

  it("saves then loads the same tokens", async () => {
    const cache = new FileTokenCache(file);
    await cache.save(tokens);

    expect(await cache.load()).toEqual(tokens);
    const onDisk: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    expect(onDisk).toEqual(toCacheRecord(tokens));
  });

  it("leaves no temp files behind", async () => {
    await new FileTokenCache(file).save(tokens);
    expect(await fs.readdir(path.dirname(file))).toEqual(["tokens.json"]);
  });

  it("writes the file with mode 0600", async () => {
    await new FileTokenCache(file).save(tokens);
    const stat = await fs.stat(file);
    // Windows has no POSIX permission bits
    if (process.platform !== "win32") {
      expect(stat.mode & 0o777).toBe(0o600);
    }
  });

  it("treats a corrupt file as absent", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, "{ not json");
    expect(await new FileTokenCache(file).load()).toBeNull();
  });

  it("treats a record with the wrong layout as absent", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ token: "x" }));
    expect(await new FileTokenCache(file).load()).toBeNull();
  });

  it("clears the file and tolerates clearing twice", async () => {
    const cache = new FileTokenCache(file);
    await cache.save(tokens);
    await cache.clear();
    await cache.clear();
    expect(await cache.load()).toBeNull();
  });
});

describe("MemoryTokenCache", () => {
  it("round-trips tokens and counts saves", async () => {
    const cache = new MemoryTokenCache();
    expect(await cache.load()).toBeNull();

    await cache.save(tokens);
    expect(await cache.load()).toEqual(tokens);
    expect(cache.saveCount).toBe(1);
  });
});
