import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallOptions } from "../api/index.js";
import type { NetworkInfo, OperationResult, ToolOutcome } from "../types/index.js";
import { MultiDeviceSchema } from "./schemas.js";
import { outcomeResponse, runTool, summarize, type ToolDeps } from "./tool-helpers.js";

export function getMultiDeviceNetworkInfo(
  deps: ToolDeps,
  args: unknown,
  options?: CallOptions,
): Promise<ToolOutcome<OperationResult<NetworkInfo>[]>> {
  return runTool("get_multi_device_network_info", async () => {
    const { device_ids } = MultiDeviceSchema.parse(args);
    return deps.fanOut.getMultiDeviceNetworkInfo(device_ids, options);
  });
}

/**
 * Register get_multi_device_network_info tool
 */
export function registerGetMultiDeviceNetworkInfo(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    "get_multi_device_network_info",
    {
      title: "Get Multi-Device Network Info",
      description:
        "Get IP address, MAC address and hostname for several XiO Cloud devices in parallel, " +
        "one result per id in the order given.",
      inputSchema: MultiDeviceSchema.shape,
    },
    async (args, extra) =>
      outcomeResponse(await getMultiDeviceNetworkInfo(deps, args, { signal: extra.signal }), summarize),
  );
}
