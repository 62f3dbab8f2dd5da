#!/usr/bin/env node
/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import { enableStdoutGuard, log, setLogLevel } from "./utils/logger.js";
import { loadConfig } from "./utils/config.js";
import { createServer, createToolDeps } from "./server.js";

// CRITICAL: Enable stdout guard IMMEDIATELY to prevent corruption of stdio transport
enableStdoutGuard();

dotenv.config({ quiet: true });

// Unhandled rejection handler
process.on("unhandledRejection", (reason) => {
  log("ERROR", "Unhandled promise rejection", reason);
});

async function main(): Promise<void> {
  try {
    // Load configuration
    const config = loadConfig();
    setLogLevel(config.logLevel);
    log("DEBUG", "Configuration loaded", {
      baseUrl: config.baseUrl,
      accountId: config.accountId,
      cacheDurationMinutes: config.cacheDurationMinutes,
      maxRetries: config.maxRetries,
      timeoutSeconds: config.timeoutSeconds,
    });

    const server = createServer(createToolDeps(config));

    // Connect stdio transport
    const transport = new StdioServerTransport();
    await server.connect(transport);

    log("INFO", `XiO Cloud MCP Server running on stdio for ${config.baseUrl} (7 tools registered)`);
  } catch (error) {
    log("ERROR", "MCP Server failed to start", error);
    process.exit(1);
  }
}

// Graceful shutdown
process.on("SIGINT", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});
process.on("SIGTERM", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});

void main();
