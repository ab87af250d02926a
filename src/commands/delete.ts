import { Command } from "commander";
import type { Runtime } from "../runtime.js";
import { CascadeDeleter, loadProcessFile, type DeleteReport } from "../importer/index.js";

export async function runDelete(runtime: Runtime, file: string): Promise<DeleteReport> {
  const roots = await loadProcessFile(file);
  return new CascadeDeleter(runtime.api).deleteTopics(roots);
}

export function createDeleteCommand(getRuntime: () => Runtime): Command {
  return new Command("delete")
    .description("Remove the topic tree described by a process document, children first")
    .argument("<file>", "process document (JSON)")
    .action(async (file: string) => {
      const report = await runDelete(getRuntime(), file);
      if (report.failed > 0 || report.blocked > 0) {
        process.exitCode = 1;
      }
      console.log(
        `Deleted ${report.deleted} topic(s), ${report.absent} already absent, ` +
          `${report.failed} failed, ${report.blocked} blocked`,
      );
    });
}
