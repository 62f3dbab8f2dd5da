/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { FanOutCoordinator, XioApiClient, type XioClientOptions } from "./api/index.js";
import type { AppConfig } from "./types/index.js";
import {
  registerClaimDevice,
  registerBulkClaimDevices,
  registerGetDevices,
  registerGetDeviceStatus,
  registerGetDeviceNetworkInfo,
  registerGetMultiDeviceStatus,
  registerGetMultiDeviceNetworkInfo,
  type ToolDeps,
} from "./tools/index.js";
import { log } from "./utils/logger.js";

export const SERVER_NAME = "xio-cloud";
export const SERVER_VERSION = "0.1.0";

/**
 * Build client + fan-out coordinator from configuration.
 * Extra client options (fetchImpl, sleep) are for tests.
 */
export function createToolDeps(
  config: AppConfig,
  overrides: Partial<Pick<XioClientOptions, "fetchImpl" | "sleep" | "random">> = {},
): ToolDeps {
  const client = new XioApiClient({
    baseUrl: config.baseUrl,
    token: config.token,
    accountId: config.accountId,
    timeoutMs: config.timeoutSeconds * 1000,
    retry: { maxRetries: config.maxRetries },
    cacheTtlMs: config.cacheDurationMinutes * 60_000,
    rateLimitConfig: config.rateLimit,
    ...overrides,
  });
  const fanOut = new FanOutCoordinator(client, config.fanOutConcurrency);
  return { client, fanOut };
}

/**
 * Create the MCP server with every XiO tool registered.
 */
export function createServer(deps: ToolDeps): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerClaimDevice(server, deps);
  registerBulkClaimDevices(server, deps);
  registerGetDevices(server, deps);
  registerGetDeviceStatus(server, deps);
  registerGetDeviceNetworkInfo(server, deps);
  registerGetMultiDeviceStatus(server, deps);
  registerGetMultiDeviceNetworkInfo(server, deps);
  log("DEBUG", "MCP tools registered (7 tools)");

  return server;
}
