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

/** JSON schema for ~/.xio-cloud-mcp/config.json */
export const ConfigStoreSchema = z.object({
  baseUrl: z.string().optional(),
  token: z.string().optional(),
  accountId: z.string().optional(),
  cacheDurationMinutes: z.number().optional(),
  maxRetries: z.number().optional(),
  timeoutSeconds: z.number().optional(),
  rateLimitCapacity: z.number().optional(),
  rateLimitRefill: z.number().optional(),
  maxConcurrent: z.number().optional(),
  fanOutConcurrency: z.number().optional(),
  logLevel: z.string().optional(),
});

export type ConfigStoreData = z.infer<typeof ConfigStoreSchema>;

const DEFAULT_CONFIG_FILE = path.join(os.homedir(), ".xio-cloud-mcp", "config.json");

export function expandTilde(filePath: string): string {
  if (filePath.startsWith("~")) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

export function getConfigStorePath(env: NodeJS.ProcessEnv = process.env): string {
  return env.XIO_CONFIG_FILE ? expandTilde(env.XIO_CONFIG_FILE) : DEFAULT_CONFIG_FILE;
}

export function configStoreExists(filePath: string = getConfigStorePath()): boolean {
  return fs.existsSync(filePath);
}

export function loadConfigStore(filePath: string = getConfigStorePath()): ConfigStoreData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Could not read ${filePath}`,
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = ConfigStoreSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid ${filePath}: ${issues.join(", ")}`);
  }
  return parsed.data;
}
