import * as fs from "node:fs/promises";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallOptions } from "../api/index.js";
import type { Device, OperationResult, ToolOutcome } from "../types/index.js";
import { parseClaimCsv } from "../utils/csv.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { expandTilde } from "../utils/config-store.js";
import { log } from "../utils/logger.js";
import { BulkClaimDevicesSchema } from "./schemas.js";
import { outcomeResponse, runTool, summarize, type ToolDeps } from "./tool-helpers.js";

async function readCsv(filePath: string): Promise<string> {
  try {
    return await fs.readFile(expandTilde(filePath), "utf-8");
  } catch (error) {
    const code =
      error instanceof Error && "code" in error && typeof error.code === "string"
        ? error.code
        : "unknown";
    log("DEBUG", `bulk_claim_devices: could not read ${filePath} (${code})`);
    throw new InvalidArgumentError(
      code === "ENOENT" ? `CSV file not found: ${filePath}` : `Could not read CSV file ${filePath} (${code})`,
      "file_path",
    );
  }
}

/**
 * bulk_claim_devices: claim every row of a CSV file.
 * One result per data row, in file order; a failed row never stops the others.
 */
export function bulkClaimDevices(
  deps: ToolDeps,
  args: unknown,
  options?: CallOptions,
): Promise<ToolOutcome<OperationResult<Device>[]>> {
  return runTool("bulk_claim_devices", async () => {
    const { file_path } = BulkClaimDevicesSchema.parse(args);
    const rows = parseClaimCsv(await readCsv(file_path));
    log("DEBUG", `bulk_claim_devices: ${rows.length} rows parsed from ${file_path}`);
    return deps.fanOut.bulkClaimDevices(rows, options);
  });
}

/**
 * Register bulk_claim_devices tool
 */
export function registerBulkClaimDevices(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    "bulk_claim_devices",
    {
      title: "Bulk Claim Devices",
      description:
        "Claim many Crestron devices to XiO Cloud from a CSV file with columns MAC Address, Serial Number and (optionally) Device Name. " +
        "Returns one result per row in file order, with per-row errors.",
      inputSchema: BulkClaimDevicesSchema.shape,
    },
    async (args, extra) =>
      outcomeResponse(await bulkClaimDevices(deps, args, { signal: extra.signal }), summarize),
  );
}
