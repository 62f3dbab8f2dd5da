/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import { MAX_BATCH_SIZE } from "../api/index.js";

/**
 * Zod schemas for MCP tool input validation.
 * Their shapes are passed to the MCP SDK as inputSchema;
 * tool functions also run .parse(args) since they can be called directly.
 *
 * Format checks (MAC pattern, empty serial) live in the client so that
 * direct callers get the same errors.
 */

export const ClaimDeviceSchema = z.object({
  mac_address: z.string()
    .describe("Device MAC address as six hex pairs, e.g. 00.10.7f.b1.e3.00 (':' or '-' also accepted)"),
  serial_number: z.string()
    .describe("Device serial number as printed on the label"),
  device_name: z.string().optional()
    .describe("Optional display name for the device"),
});

export const BulkClaimDevicesSchema = z.object({
  file_path: z.string().min(1, "file_path must not be empty")
    .describe(`Path to a CSV file with header "MAC Address,Serial Number,Device Name" (Device Name optional, at most ${MAX_BATCH_SIZE} rows)`),
});

export const GetDevicesSchema = z.object({});

export const GetDeviceStatusSchema = z.object({
  device_id: z.string()
    .describe("XiO Cloud device id (device-cid) from get_devices"),
});

export const GetDeviceNetworkInfoSchema = GetDeviceStatusSchema;

export const MultiDeviceSchema = z.object({
  device_ids: z.array(z.string())
    .describe("XiO Cloud device ids; results come back in the same order"),
});
