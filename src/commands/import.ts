import { Command } from "commander";
import type { Runtime } from "../runtime.js";
import { CascadeDeleter, TopicImporter, loadProcessFile, type ImportReport } from "../importer/index.js";
import { log } from "../utils/logger.js";

export interface ImportCommandOptions {
  replace?: boolean;
  skipCheckout?: boolean;
  comment?: string;
}

/**
 * Import a process document. With `replace`, the same tree is cascade-deleted
 * first and 409 on create is tolerated.
 *
 * @returns null when the preliminary delete left topics behind and the import was not attempted
 */
export async function runImport(
  runtime: Runtime,
  file: string,
  options: ImportCommandOptions = {},
): Promise<ImportReport | null> {
  const roots = await loadProcessFile(file);

  if (options.replace) {
    const cleared = await new CascadeDeleter(runtime.api).deleteTopics(roots);
    if (cleared.failed > 0 || cleared.blocked > 0) {
      log("ERROR", "Existing topics could not be removed; import not started");
      return null;
    }
  }

  const importer = new TopicImporter(runtime.api, {
    skipCheckoutCheckin: options.skipCheckout ?? runtime.config.skipCheckoutCheckin,
    replaceExisting: options.replace ?? false,
    checkinComment: options.comment,
  });
  return importer.importTopics(roots);
}

export function createImportCommand(getRuntime: () => Runtime): Command {
  return new Command("import")
    .description("Create the topic tree described by a process document")
    .argument("<file>", "process document (JSON)")
    .option("--replace", "delete the existing tree first, then import")
    .option("--skip-checkout", "apply updates without checkout/checkin")
    .option("--comment <text>", "checkin comment")
    .action(async (file: string, options: ImportCommandOptions) => {
      const report = await runImport(getRuntime(), file, options);
      if (report === null || report.failed > 0 || report.skipped > 0) {
        process.exitCode = 1;
      }
      if (report) {
        console.log(
          `Imported ${report.succeeded} topic(s); ${report.failed} failed, ${report.skipped} skipped`,
        );
      }
    });
}
