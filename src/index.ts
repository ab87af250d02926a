#!/usr/bin/env node
/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import dotenv from "dotenv";
import { Command } from "commander";
import { log, setLogLevel } from "./utils/logger.js";
import { createRuntime, type Runtime } from "./runtime.js";
import { createImportCommand } from "./commands/import.js";
import { createDeleteCommand } from "./commands/delete.js";
import { createExportCommand } from "./commands/export.js";
import { createAuthCommand } from "./commands/auth.js";

dotenv.config({ quiet: true });

// Built on first use so that --help works without configuration
let runtime: Runtime | undefined;
function getRuntime(): Runtime {
  runtime ??= createRuntime();
  return runtime;
}

const program = new Command("topic-sync")
  .description("Synchronize process documents with a topic-based content-management service")
  .version("1.0.0")
  .option("--debug", "verbose logging")
  .hook("preAction", () => {
    if (program.opts<{ debug?: boolean }>().debug) {
      setLogLevel("DEBUG");
    }
  });

program.addCommand(createImportCommand(getRuntime));
program.addCommand(createDeleteCommand(getRuntime));
program.addCommand(createExportCommand(getRuntime));
program.addCommand(createAuthCommand(getRuntime));

program.parseAsync(process.argv).catch((error: unknown) => {
  log("ERROR", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
