import { vi } from "vitest";
import { XioApiClient } from "../src/api/client.js";
import type { XioClientOptions } from "../src/api/types.js";

export const BASE_URL = "https://api.xio.test/api";
export const ACCOUNT_ID = "acct-123";
export const TOKEN = "test-token";

export type FetchHandler = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function textResponse(body: string, status: number, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

/**
 * Fake fetch that hands every call to `handler` with a parsed URL.
 */
export function mockFetch(handler: FetchHandler) {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    return handler(url, init);
  });
}

export function requestedUrl(call: Parameters<typeof fetch>): string {
  const [input] = call;
  return input instanceof Request ? input.url : input.toString();
}

export function requestedMethod(call: Parameters<typeof fetch>): string {
  return call[1]?.method ?? "GET";
}

export function makeClient(
  fetchImpl: typeof fetch,
  overrides: Partial<Omit<XioClientOptions, "fetchImpl">> = {},
): XioApiClient {
  return new XioApiClient({
    baseUrl: BASE_URL,
    token: TOKEN,
    accountId: ACCOUNT_ID,
    timeoutMs: 5_000,
    fetchImpl,
    sleep: async () => {},
    random: () => 0,
    ...overrides,
  });
}

const DEVICE_PATH = `/api/v1/device/accountid/${ACCOUNT_ID}`;
const CLAIM_PATH = `/api/v2/deviceclaim/accountid/${ACCOUNT_ID}`;

/**
 * In-process XiO Cloud stand-in: claims succeed with an empty body, the
 * device list holds two devices, and status answers for `statuses` keys
 * with 404 for anything else.
 */
export function fakeXio(statuses: Record<string, Record<string, unknown>> = {}) {
  return mockFetch((url, init) => {
    const method = init?.method ?? "GET";
    if (method === "POST" && url.pathname.startsWith(`${CLAIM_PATH}/macaddress/`)) {
      return textResponse("", 200);
    }
    if (url.pathname === `${DEVICE_PATH}/devices`) {
      return jsonResponse({
        devices: [
          {
            "device-cid": "d-1",
            "device-name": "Lobby",
            "serial-number": "S1",
            "mac-address": "00.10.7f.b1.e3.00",
            "device-status": "Online",
          },
          { deviceCid: "d-2" },
        ],
      });
    }
    const match = /\/devicecid\/([^/]+)\/status$/.exec(url.pathname);
    if (match) {
      const status = statuses[decodeURIComponent(match[1])];
      return status ? jsonResponse(status) : textResponse("", 404);
    }
    return textResponse("no route", 500);
  });
}

export function statusPayload(deviceId: string, mac: string, ip: string): Record<string, unknown> {
  return {
    "device-cid": deviceId,
    "device-status": "Online",
    network: {
      "nic-1-ip-address": ip,
      "nic-1-mac-address": mac,
      "status-host-name": `host-${deviceId}`,
    },
  };
}
