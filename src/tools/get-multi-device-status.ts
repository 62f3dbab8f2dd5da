import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallOptions } from "../api/index.js";
import type { DeviceStatus, OperationResult, ToolOutcome } from "../types/index.js";
import { MultiDeviceSchema } from "./schemas.js";
import { outcomeResponse, runTool, summarize, type ToolDeps } from "./tool-helpers.js";

export function getMultiDeviceStatus(
  deps: ToolDeps,
  args: unknown,
  options?: CallOptions,
): Promise<ToolOutcome<OperationResult<DeviceStatus>[]>> {
  return runTool("get_multi_device_status", async () => {
    const { device_ids } = MultiDeviceSchema.parse(args);
    return deps.fanOut.getMultiDeviceStatus(device_ids, options);
  });
}

/**
 * Register get_multi_device_status tool
 */
export function registerGetMultiDeviceStatus(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    "get_multi_device_status",
    {
      title: "Get Multi-Device Status",
      description:
        "Fetch status for several XiO Cloud devices in parallel. " +
        "Returns one result per id in the order given; an unknown id fails on its own without affecting the rest.",
      inputSchema: MultiDeviceSchema.shape,
    },
    async (args, extra) =>
      outcomeResponse(await getMultiDeviceStatus(deps, args, { signal: extra.signal }), summarize),
  );
}
