import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallOptions } from "../api/index.js";
import type { Device, ToolOutcome } from "../types/index.js";
import { ClaimDeviceSchema } from "./schemas.js";
import { outcomeResponse, runTool, type ToolDeps } from "./tool-helpers.js";

/**
 * claim_device: register one device (MAC + serial) to the XiO account.
 * A malformed MAC fails with InvalidArgument before any request is made.
 */
export function claimDevice(
  deps: ToolDeps,
  args: unknown,
  options?: CallOptions,
): Promise<ToolOutcome<Device>> {
  return runTool("claim_device", async () => {
    const { mac_address, serial_number, device_name } = ClaimDeviceSchema.parse(args);
    return deps.client.claimDevice(mac_address, serial_number, device_name, options);
  });
}

/**
 * Register claim_device tool
 */
export function registerClaimDevice(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    "claim_device",
    {
      title: "Claim Device",
      description:
        "Claim a single Crestron device to the XiO Cloud account using its MAC address and serial number. " +
        "Use this when the user wants to add, register, or onboard one device.",
      inputSchema: ClaimDeviceSchema.shape,
    },
    async (args, extra) => outcomeResponse(await claimDevice(deps, args, { signal: extra.signal })),
  );
}
