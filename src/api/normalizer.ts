import type { Device, DeviceStatus, NetworkInfo } from "../types/index.js";

// XiO payloads use kebab-case keys; some endpoints and API versions use camelCase
const DEVICE_ID_KEYS = ["device-cid", "deviceCid", "device-id", "deviceId", "id"];
const DEVICE_NAME_KEYS = ["device-name", "deviceName", "name"];
const SERIAL_KEYS = ["serial-number", "serialNumber", "device-serial-number"];
const MAC_KEYS = ["mac-address", "macAddress", "device-mac-address"];
const STATUS_KEYS = ["device-status", "deviceStatus", "status", "connection-status"];
const LIST_KEYS = ["devices", "Devices", "items", "Items"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstString(record: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim() !== "") return value.trim();
    if (typeof value === "number") return String(value);
  }
  return null;
}

/**
 * Network section of a status document.
 * All fields are null when the device reports no network block.
 */
export function extractNetworkInfo(status: DeviceStatus): NetworkInfo {
  const network = status["network"];
  if (!isRecord(network)) {
    return { ipAddress: null, macAddress: null, hostname: null };
  }
  return {
    ipAddress: firstString(network, ["nic-1-ip-address"]),
    macAddress: firstString(network, ["nic-1-mac-address"]),
    hostname: firstString(network, ["status-host-name"]),
  };
}

export function normalizeDevice(raw: unknown): Device {
  if (!isRecord(raw)) {
    return { deviceId: null, macAddress: null, serialNumber: null, status: "unknown" };
  }

  const device: Device = {
    deviceId: firstString(raw, DEVICE_ID_KEYS),
    macAddress: firstString(raw, MAC_KEYS),
    serialNumber: firstString(raw, SERIAL_KEYS),
    status: firstString(raw, STATUS_KEYS) ?? "unknown",
  };
  const name = firstString(raw, DEVICE_NAME_KEYS);
  if (name) device.name = name;
  if (isRecord(raw["network"])) device.networkInfo = extractNetworkInfo(raw);
  return device;
}

/**
 * The device array of a list payload: a bare array, or one under a known envelope key.
 * Undefined for anything else (HTML error pages, unknown envelopes).
 */
export function deviceListItems(payload: unknown): unknown[] | undefined {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    for (const key of LIST_KEYS) {
      const list = payload[key];
      if (Array.isArray(list)) return list;
    }
  }
  return undefined;
}

export function normalizeDeviceList(payload: unknown): Device[] {
  const items = deviceListItems(payload);
  if (!items) {
    throw new TypeError("Unexpected device list payload");
  }
  return items.map(normalizeDevice);
}

// Callers get their own copy; the cached payload stays as received
export function normalizeDeviceStatus(payload: unknown): DeviceStatus {
  if (isRecord(payload)) return structuredClone(payload);
  if (payload === null) return {};
  return { value: payload };
}

/**
 * Device returned by a claim. The claim endpoint may answer with an empty body,
 * so identity falls back to what was sent.
 */
export function normalizeClaimedDevice(
  payload: unknown,
  sent: { macAddress: string; serialNumber: string; name?: string },
): Device {
  const reported = isRecord(payload) ? payload : {};
  const device: Device = {
    deviceId: firstString(reported, DEVICE_ID_KEYS),
    macAddress: sent.macAddress,
    serialNumber: sent.serialNumber,
    status: "claimed",
  };
  const name = sent.name ?? firstString(reported, DEVICE_NAME_KEYS);
  if (name) device.name = name;
  return device;
}

/**
 * Identities a payload can be invalidated by: lowercase MACs (dotted) and serials.
 */
export function identityKeys(payload: unknown): string[] {
  if (!isRecord(payload)) return [];
  const keys = new Set<string>();
  const add = (value: string | null): void => {
    if (value) keys.add(value.toLowerCase());
  };
  add(firstString(payload, SERIAL_KEYS));
  add(dottedMac(firstString(payload, MAC_KEYS)));
  const network = payload["network"];
  if (isRecord(network)) add(dottedMac(firstString(network, ["nic-1-mac-address"])));
  return [...keys];
}

function dottedMac(value: string | null): string | null {
  if (!value) return null;
  const hex = value.replace(/[^0-9a-f]/gi, "").toLowerCase();
  if (hex.length !== 12) return null;
  return hex.match(/.{2}/g)?.join(".") ?? null;
}
