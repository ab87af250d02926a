import { writeFile } from "node:fs/promises";
import { Command } from "commander";
import type { Runtime } from "../runtime.js";
import { log } from "../utils/logger.js";

export function defaultExportFile(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  return `export_${stamp}.json`;
}

/**
 * Fetch the full content export and write it as pretty JSON.
 * Any error is fatal; there is no partial export.
 */
export async function runExport(runtime: Runtime, output: string): Promise<string> {
  const content = await runtime.api.exportContent();
  await writeFile(output, JSON.stringify(content ?? null, null, 2) + "\n", "utf-8");
  log("INFO", `Export written to ${output}`);
  return output;
}

export function createExportCommand(getRuntime: () => Runtime): Command {
  return new Command("export")
    .description("Download the full content export")
    .option("-o, --output <file>", "output file (default export_<timestamp>.json)")
    .action(async (options: { output?: string }) => {
      const file = await runExport(getRuntime(), options.output ?? defaultExportFile());
      console.log(`Exported to ${file}`);
    });
}
