import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallOptions } from "../api/index.js";
import type { Device, ToolOutcome } from "../types/index.js";
import { GetDevicesSchema } from "./schemas.js";
import { outcomeResponse, runTool, type ToolDeps } from "./tool-helpers.js";
import { log } from "../utils/logger.js";

export function getDevices(
  deps: ToolDeps,
  args: unknown = {},
  options?: CallOptions,
): Promise<ToolOutcome<Device[]>> {
  return runTool("get_devices", async () => {
    GetDevicesSchema.parse(args);
    const devices = await deps.client.getDevices(options);
    log("INFO", `get_devices: Retrieved ${devices.length} devices`);
    return devices;
  });
}

/**
 * Register get_devices tool
 */
export function registerGetDevices(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    "get_devices",
    {
      title: "Get Devices",
      description:
        "List every device on the XiO Cloud account with id, name, MAC address, serial number and status. " +
        "Use this to find device ids for the status and network tools.",
      inputSchema: GetDevicesSchema.shape,
    },
    async (args, extra) => outcomeResponse(await getDevices(deps, args, { signal: extra.signal })),
  );
}
