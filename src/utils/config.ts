/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import type { AppConfig } from "../types/index.js";
import {
  configStoreExists,
  getConfigStorePath,
  loadConfigStore,
  type ConfigStoreData,
} from "./config-store.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://api.crestron.io/api";

const AppConfigSchema = z.object({
  baseUrl: z
    .string()
    .refine((url) => /^https:\/\/[^/\s]+/i.test(url), "baseUrl must be an https:// URL")
    .default(DEFAULT_BASE_URL),
  token: z
    .string({ error: "XIO_TOKEN is required" })
    .min(1, "XIO_TOKEN is required"),
  accountId: z
    .string({ error: "XIO_ACCOUNT_ID is required" })
    .min(1, "XIO_ACCOUNT_ID is required"),
  cacheDurationMinutes: z.coerce.number().min(0).default(5),
  maxRetries: z.coerce.number().int().min(0).max(10).default(3),
  timeoutSeconds: z.coerce.number().positive().default(30),
  rateLimitCapacity: z.coerce.number().int().min(1).default(10),
  rateLimitRefill: z.coerce.number().positive().default(3),
  maxConcurrent: z.coerce.number().int().min(1).default(5),
  fanOutConcurrency: z.coerce.number().int().min(1).default(5),
  logLevel: z
    .preprocess(
      (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
      z.enum(["DEBUG", "INFO", "WARN", "ERROR"]),
    )
    .default("INFO"),
});

// Empty env vars count as unset
function pick<T>(envValue: string | undefined, storeValue: T | undefined): string | T | undefined {
  if (envValue !== undefined && envValue.trim() !== "") return envValue.trim();
  return storeValue;
}

/**
 * Load configuration from environment variables, falling back to the
 * JSON config file (~/.xio-cloud-mcp/config.json or XIO_CONFIG_FILE).
 *
 * The result is frozen; pass it to the client rather than re-reading env.
 * @throws ConfigError if required values are missing or invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const storePath = getConfigStorePath(env);
  const store: ConfigStoreData = configStoreExists(storePath) ? loadConfigStore(storePath) : {};

  const parsed = AppConfigSchema.safeParse({
    baseUrl: pick(env.XIO_BASE_URL, store.baseUrl),
    token: pick(env.XIO_TOKEN, store.token),
    accountId: pick(env.XIO_ACCOUNT_ID, store.accountId),
    cacheDurationMinutes: pick(env.XIO_CACHE_DURATION_MINUTES, store.cacheDurationMinutes),
    maxRetries: pick(env.XIO_MAX_RETRIES, store.maxRetries),
    timeoutSeconds: pick(env.XIO_TIMEOUT_SECONDS, store.timeoutSeconds),
    rateLimitCapacity: pick(env.XIO_RATE_LIMIT_CAPACITY, store.rateLimitCapacity),
    rateLimitRefill: pick(env.XIO_RATE_LIMIT_REFILL, store.rateLimitRefill),
    maxConcurrent: pick(env.XIO_MAX_CONCURRENT, store.maxConcurrent),
    fanOutConcurrency: pick(env.XIO_FANOUT_CONCURRENCY, store.fanOutConcurrency),
    logLevel: pick(env.XIO_LOG_LEVEL, store.logLevel),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`);
    throw new ConfigError(issues.join("; "));
  }

  const c = parsed.data;
  return Object.freeze({
    baseUrl: c.baseUrl.replace(/\/+$/, ""),
    token: c.token,
    accountId: c.accountId,
    cacheDurationMinutes: c.cacheDurationMinutes,
    maxRetries: c.maxRetries,
    timeoutSeconds: c.timeoutSeconds,
    rateLimit: Object.freeze({
      capacity: c.rateLimitCapacity,
      refillRate: c.rateLimitRefill,
      maxConcurrent: c.maxConcurrent,
    }),
    fanOutConcurrency: c.fanOutConcurrency,
    logLevel: c.logLevel,
  });
}

export type { AppConfig };
