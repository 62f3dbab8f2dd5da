import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallOptions } from "../api/index.js";
import type { DeviceStatus, ToolOutcome } from "../types/index.js";
import { GetDeviceStatusSchema } from "./schemas.js";
import { outcomeResponse, runTool, type ToolDeps } from "./tool-helpers.js";

export function getDeviceStatus(
  deps: ToolDeps,
  args: unknown,
  options?: CallOptions,
): Promise<ToolOutcome<DeviceStatus>> {
  return runTool("get_device_status", async () => {
    const { device_id } = GetDeviceStatusSchema.parse(args);
    return deps.client.getDeviceStatus(device_id, options);
  });
}

/**
 * Register get_device_status tool
 */
export function registerGetDeviceStatus(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    "get_device_status",
    {
      title: "Get Device Status",
      description:
        "Fetch the full status document of one XiO Cloud device (online state, firmware, network, etc.). " +
        "Fails with NotFound if the device id is unknown.",
      inputSchema: GetDeviceStatusSchema.shape,
    },
    async (args, extra) => outcomeResponse(await getDeviceStatus(deps, args, { signal: extra.signal })),
  );
}
