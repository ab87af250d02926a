import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { createRuntime, type Runtime } from "../../src/runtime.js";
import { runImport } from "../../src/commands/import.js";
import { runDelete } from "../../src/commands/delete.js";
import { defaultExportFile, runExport } from "../../src/commands/export.js";
import { runAuth } from "../../src/commands/auth.js";
import { API_KEY, BASE_URL, MockCms } from "../helpers/mock-cms.js";

const document = {
  process: {
    id: "proc",
    title: "Onboarding",
    tasks: [{ id: "task-1", title: "Prepare", steps: [{ id: "step-1", title: "Collect" }] }],
  },
};

describe("commands", () => {
  let testDir: string;
  let processFile: string;
  let cms: MockCms;
  let runtime: Runtime;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "commands-test-"));
    processFile = path.join(testDir, "process.json");
    await fs.writeFile(processFile, JSON.stringify(document), "utf-8");

    cms = new MockCms();
    runtime = createRuntime({
      env: {
        CMS_BASE_URL: BASE_URL,
        CMS_API_KEY: API_KEY,
        CMS_URL: "https://cms.test/tenant/t1/project/p1/acl/a1",
        TOPIC_SYNC_CONFIG: path.join(testDir, "absent-config.json"),
      },
      fetch: cms.fetch,
    });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("wires the runtime from the environment", () => {
    expect(runtime.config.auth.mode).toBe("traditional");
    expect(runtime.auth.context).toEqual({ tenantId: "t1", projectId: "p1", acl: ["a1"] });
  });

  it("imports a process document", async () => {
    const report = await runImport(runtime, processFile);

    expect(report?.succeeded).toBe(3);
    expect([...cms.topics.keys()]).toEqual(["proc", "task-1", "step-1"]);
  });

  it("reports existing topics as failures without --replace", async () => {
    cms.seedTopic("proc");

    const report = await runImport(runtime, processFile);

    expect(report?.failed).toBe(1);
    expect(report?.skipped).toBe(2);
  });

  it("deletes the existing tree first with --replace", async () => {
    cms.seedTopic("proc");
    cms.seedTopic("task-1", "proc");

    const report = await runImport(runtime, processFile, { replace: true, skipCheckout: true });

    expect(report?.succeeded).toBe(3);
    expect(cms.topicCalls()).toEqual([
      "DELETE /topics/step-1",
      "DELETE /topics/task-1",
      "DELETE /topics/proc",
      "POST /topics",
      "POST /topics",
      "POST /topics",
    ]);
  });

  it("does not import when the preliminary delete fails", async () => {
    cms.seedTopic("proc");
    cms.fail("DELETE", "/topics/proc", 500);

    const report = await runImport(runtime, processFile, { replace: true });

    expect(report).toBeNull();
    expect(cms.topicCalls()).not.toContain("POST /topics");
  });

  it("deletes a previously imported tree", async () => {
    await runImport(runtime, processFile);

    const report = await runDelete(runtime, processFile);

    expect(report.deleted).toBe(3);
    expect(cms.topics.size).toBe(0);
  });

  it("writes the export as pretty JSON", async () => {
    cms.seedTopic("proc");
    const output = path.join(testDir, "export.json");

    await runExport(runtime, output);

    expect(await fs.readFile(output, "utf-8")).toBe(
      JSON.stringify({ topics: [{ topicId: "proc", parentTopicId: null }] }, null, 2) + "\n",
    );
  });

  it("names export files after the timestamp", () => {
    expect(defaultExportFile(new Date("2026-03-01T12:30:45.123Z"))).toBe("export_2026-03-01T12-30-45-123Z.json");
  });

  it("reports the credential lifetime", async () => {
    const start = Date.now();
    const status = await runAuth(runtime, () => start);

    expect(status.mode).toBe("traditional");
    expect(status.tenantId).toBe("t1");
    expect(status.publicationBaseUrl).toBe(BASE_URL);
    expect(status.expiresInSeconds).toBeGreaterThan(3500);
    expect(status.expiresInSeconds).toBeLessThanOrEqual(3601);
  });
});
