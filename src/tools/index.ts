/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Tool entry points and registration functions - barrel export
export { claimDevice, registerClaimDevice } from "./claim-device.js";
export { bulkClaimDevices, registerBulkClaimDevices } from "./bulk-claim-devices.js";
export { getDevices, registerGetDevices } from "./get-devices.js";
export { getDeviceStatus, registerGetDeviceStatus } from "./get-device-status.js";
export { getDeviceNetworkInfo, registerGetDeviceNetworkInfo } from "./get-device-network-info.js";
export { getMultiDeviceStatus, registerGetMultiDeviceStatus } from "./get-multi-device-status.js";
export {
  getMultiDeviceNetworkInfo,
  registerGetMultiDeviceNetworkInfo,
} from "./get-multi-device-network-info.js";

// Re-export shared helpers and schemas for convenience
export { toolResponse, errorResponse, outcomeResponse, runTool, summarize } from "./tool-helpers.js";
export type { ToolDeps, BatchReport } from "./tool-helpers.js";
export * from "./schemas.js";
