import { describe, it, expect, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { createServer, createToolDeps } from "../src/server.js";
import type { AppConfig } from "../src/types/index.js";
import { ACCOUNT_ID, BASE_URL, TOKEN, fakeXio, statusPayload } from "./helpers.js";

const config: AppConfig = {
  baseUrl: BASE_URL,
  token: TOKEN,
  accountId: ACCOUNT_ID,
  cacheDurationMinutes: 5,
  maxRetries: 0,
  timeoutSeconds: 5,
  rateLimit: { capacity: 50, refillRate: 10, maxConcurrent: 5 },
  fanOutConcurrency: 5,
  logLevel: "ERROR",
};

let close: (() => Promise<void>) | undefined;

afterEach(async () => {
  await close?.();
  close = undefined;
});

async function connect(): Promise<Client> {
  const fetchImpl = fakeXio({ "d-1": statusPayload("d-1", "00.10.7f.b1.e3.00", "10.0.0.5") });
  const server = createServer(createToolDeps(config, { fetchImpl, sleep: async () => {} }));
  const client = new Client({ name: "xio-cloud-test-client", version: "1.0.0" }, { capabilities: {} });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);

  close = async () => {
    await Promise.allSettled([client.close(), server.close()]);
  };
  return client;
}

function readResult(result: unknown): { isError: boolean; body: unknown } {
  if (
    typeof result !== "object" ||
    result === null ||
    !("content" in result) ||
    !Array.isArray(result.content)
  ) {
    throw new Error("tool result has no content");
  }
  const first: unknown = result.content[0];
  if (typeof first !== "object" || first === null || !("text" in first) || typeof first.text !== "string") {
    throw new Error("tool result has no text content");
  }
  const body: unknown = JSON.parse(first.text);
  return { isError: "isError" in result && result.isError === true, body };
}

describe("MCP server", () => {
  it("registers every XiO tool", async () => {
    const client = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      "bulk_claim_devices",
      "claim_device",
      "get_device_network_info",
      "get_device_status",
      "get_devices",
      "get_multi_device_network_info",
      "get_multi_device_status",
    ]);
  });

  it("claims a device through a tool call", async () => {
    const client = await connect();

    const result = readResult(
      await client.callTool({
        name: "claim_device",
        arguments: { mac_address: "00:10:7F:B1:E3:00", serial_number: "1829JBH01829", device_name: "Lobby" },
      }),
    );

    expect(result).toEqual({
      isError: false,
      body: {
        deviceId: null,
        macAddress: "00.10.7f.b1.e3.00",
        serialNumber: "1829JBH01829",
        status: "claimed",
        name: "Lobby",
      },
    });
  });

  it("returns a summary with multi-device results", async () => {
    const client = await connect();

    const result = readResult(
      await client.callTool({
        name: "get_multi_device_network_info",
        arguments: { device_ids: ["d-1", "d-404"] },
      }),
    );

    expect(result.isError).toBe(false);
    expect(result.body).toMatchObject({
      summary: "Processed 2 devices. 1 successful, 1 failed.",
      results: [
        {
          index: 0,
          target: "d-1",
          status: "success",
          data: { ipAddress: "10.0.0.5", macAddress: "00.10.7f.b1.e3.00", hostname: "host-d-1" },
        },
        { index: 1, target: "d-404", status: "failure", error: { kind: "NotFound", status: 404 } },
      ],
    });
  });

  it("flags failed calls with isError and the error kind", async () => {
    const client = await connect();

    const result = readResult(
      await client.callTool({ name: "get_device_status", arguments: { device_id: "d-404" } }),
    );

    expect(result.isError).toBe(true);
    expect(result.body).toMatchObject({ error: { kind: "NotFound", status: 404 } });
  });
});
