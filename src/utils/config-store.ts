/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { ConfigError } from "./errors.js";

/** JSON schema for ~/.topic-sync/config.json */
export const ConfigStoreSchema = z.object({
  baseUrl: z.string().optional(),
  authMode: z.enum(["traditional", "cache"]).optional(),
  apiKey: z.string().optional(),
  tenant: z.string().optional(),
  projectId: z.string().optional(),
  acl: z.array(z.string()).optional(),
  ntAccount: z.string().optional(),
  cmsUrl: z.string().optional(),
  portalCode: z.string().optional(),
  portalUrl: z.string().optional(),
  tokenCachePath: z.string().optional(),
  skipCheckoutCheckin: z.boolean().optional(),
  rateLimitMs: z.number().int().min(0).optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  debug: z.boolean().optional(),
});

export type ConfigStoreData = z.infer<typeof ConfigStoreSchema>;

const CONFIG_DIR = path.join(os.homedir(), ".topic-sync");
const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");

export function getConfigStorePath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TOPIC_SYNC_CONFIG || CONFIG_FILE;
}

export function configStoreExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

export function loadConfigStore(filePath: string): ConfigStoreData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `could not read config file ${filePath}`,
      error instanceof Error ? error : undefined,
    );
  }

  const result = ConfigStoreSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid config file ${filePath}: ${issues.join(", ")}`);
  }
  return result.data;
}
