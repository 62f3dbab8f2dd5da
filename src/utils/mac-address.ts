/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { InvalidArgumentError } from "./errors.js";

// Six hex pairs with one consistent delimiter, or twelve bare hex digits
const DELIMITED_MAC = /^[0-9a-f]{2}([:.-])[0-9a-f]{2}(?:\1[0-9a-f]{2}){4}$/i;
const BARE_MAC = /^[0-9a-f]{12}$/i;

export function isValidMacAddress(value: string): boolean {
  const trimmed = value.trim();
  return DELIMITED_MAC.test(trimmed) || BARE_MAC.test(trimmed);
}

/**
 * Normalize a MAC address to the lowercase dotted form XiO Cloud expects
 * ("00.10.7f.b1.e3.00").
 *
 * Accepts ":", "." or "-" between pairs, or no delimiter at all.
 * @throws InvalidArgumentError for anything else
 */
export function formatMacAddress(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidArgumentError("mac_address must not be empty", "mac_address");
  }
  if (!isValidMacAddress(trimmed)) {
    throw new InvalidArgumentError(
      `Invalid MAC address "${value}". Expected six hex pairs such as 00.10.7f.b1.e3.00`,
      "mac_address",
    );
  }

  const hex = trimmed.replace(/[:.-]/g, "").toLowerCase();
  return hex.match(/.{2}/g)?.join(".") ?? hex;
}
