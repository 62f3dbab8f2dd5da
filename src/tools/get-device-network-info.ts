import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallOptions } from "../api/index.js";
import type { NetworkInfo, ToolOutcome } from "../types/index.js";
import { GetDeviceNetworkInfoSchema } from "./schemas.js";
import { outcomeResponse, runTool, type ToolDeps } from "./tool-helpers.js";

export function getDeviceNetworkInfo(
  deps: ToolDeps,
  args: unknown,
  options?: CallOptions,
): Promise<ToolOutcome<NetworkInfo>> {
  return runTool("get_device_network_info", async () => {
    const { device_id } = GetDeviceNetworkInfoSchema.parse(args);
    return deps.client.getDeviceNetworkInfo(device_id, options);
  });
}

/**
 * Register get_device_network_info tool
 */
export function registerGetDeviceNetworkInfo(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    "get_device_network_info",
    {
      title: "Get Device Network Info",
      description:
        "Get the IP address, MAC address and hostname of one XiO Cloud device. " +
        "Fields are null when the device reports no network section.",
      inputSchema: GetDeviceNetworkInfoSchema.shape,
    },
    async (args, extra) =>
      outcomeResponse(await getDeviceNetworkInfo(deps, args, { signal: extra.signal })),
  );
}
