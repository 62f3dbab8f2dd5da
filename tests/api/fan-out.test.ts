import { describe, it, expect } from "vitest";
import { FanOutCoordinator, MAX_BATCH_SIZE, runSettled } from "../../src/api/fan-out.js";
import type { FanOutTask } from "../../src/api/fan-out.js";
import { InvalidArgumentError } from "../../src/utils/errors.js";
import type { ParsedClaimRow } from "../../src/utils/csv.js";
import { fakeXio, makeClient, requestedMethod, statusPayload } from "../helpers.js";

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runSettled", () => {
  it("keeps input order when tasks finish out of order", async () => {
    const delays = [30, 5, 20, 1, 10];
    const tasks: FanOutTask<number>[] = delays.map((ms, i) => ({
      target: `t${i}`,
      run: async () => {
        await wait(ms);
        return i * 10;
      },
    }));

    const results = await runSettled(tasks, 3);

    expect(results).toEqual([0, 1, 2, 3, 4].map((i) => ({
      index: i,
      target: `t${i}`,
      status: "success",
      data: i * 10,
    })));
  });

  it("never runs more than the concurrency limit at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const tasks: FanOutTask<void>[] = Array.from({ length: 8 }, (_, i) => ({
      target: `t${i}`,
      run: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await wait(5);
        inFlight--;
      },
    }));

    await runSettled(tasks, 3);

    expect(peak).toBe(3);
  });

  it("isolates failures from their siblings", async () => {
    const tasks: FanOutTask<string>[] = [
      { target: "a", run: async () => "ok-a" },
      { target: "b", run: async () => { throw new InvalidArgumentError("bad input for b"); } },
      { target: "c", run: async () => { throw new Error("socket hang up"); } },
      { target: "d", run: async () => "ok-d" },
    ];

    const results = await runSettled(tasks, 2);

    expect(results).toEqual([
      { index: 0, target: "a", status: "success", data: "ok-a" },
      {
        index: 1,
        target: "b",
        status: "failure",
        error: { kind: "InvalidArgument", message: "bad input for b" },
      },
      {
        index: 2,
        target: "c",
        status: "failure",
        error: { kind: "RequestFailed", message: "An unexpected error occurred. Please try again." },
      },
      { index: 3, target: "d", status: "success", data: "ok-d" },
    ]);
  });

  it("returns an empty list for no tasks", async () => {
    await expect(runSettled([], 5)).resolves.toEqual([]);
  });
});

describe("FanOutCoordinator", () => {
  it("caps concurrency at the rate limiter's in-flight limit", () => {
    const client = makeClient(fakeXio(), {
      rateLimitConfig: { capacity: 10, refillRate: 3, maxConcurrent: 2 },
    });

    expect(new FanOutCoordinator(client, 10).concurrency).toBe(2);
    expect(new FanOutCoordinator(client, 1).concurrency).toBe(1);
    expect(new FanOutCoordinator(client, 0).concurrency).toBe(1);
  });

  it("returns one status result per id, failures in place", async () => {
    const d1 = statusPayload("d-1", "00.10.7f.b1.e3.00", "10.0.0.5");
    const d2 = statusPayload("d-2", "00.10.7f.b1.e3.01", "10.0.0.6");
    const fanOut = new FanOutCoordinator(makeClient(fakeXio({ "d-1": d1, "d-2": d2 })));

    const results = await fanOut.getMultiDeviceStatus(["d-1", "missing", "d-2"]);

    expect(results).toEqual([
      { index: 0, target: "d-1", status: "success", data: d1 },
      {
        index: 1,
        target: "missing",
        status: "failure",
        error: {
          kind: "NotFound",
          message: "API error (404) at GET /api/v1/device/accountid/acct-123/devicecid/missing/status: Not found",
          status: 404,
        },
      },
      { index: 2, target: "d-2", status: "success", data: d2 },
    ]);
  });

  it("returns network info per id", async () => {
    const fanOut = new FanOutCoordinator(
      makeClient(
        fakeXio({
          "d-1": statusPayload("d-1", "00.10.7f.b1.e3.00", "10.0.0.5"),
          "d-2": { "device-cid": "d-2" },
        }),
      ),
    );

    const results = await fanOut.getMultiDeviceNetworkInfo(["d-1", "d-2", ""]);

    expect(results.map((r) => r.status)).toEqual(["success", "success", "failure"]);
    expect(results[0]).toEqual({
      index: 0,
      target: "d-1",
      status: "success",
      data: { ipAddress: "10.0.0.5", macAddress: "00.10.7f.b1.e3.00", hostname: "host-d-1" },
    });
    expect(results[1]).toMatchObject({
      data: { ipAddress: null, macAddress: null, hostname: null },
    });
    expect(results[2]).toMatchObject({
      error: { kind: "InvalidArgument", message: "device_id must not be empty" },
    });
  });

  it("claims every valid row even when one row fails", async () => {
    const fetchImpl = fakeXio();
    const fanOut = new FanOutCoordinator(makeClient(fetchImpl));

    const results = await fanOut.bulkClaimDevices([
      { macAddress: "00.10.7f.b1.e3.00", serialNumber: "S1" },
      { macAddress: "not-a-mac", serialNumber: "S2" },
      { macAddress: "00-10-7F-B1-E3-02", serialNumber: "S3", deviceName: "Hall" },
    ]);

    expect(results).toEqual([
      {
        index: 0,
        target: "00.10.7f.b1.e3.00",
        status: "success",
        data: { deviceId: null, macAddress: "00.10.7f.b1.e3.00", serialNumber: "S1", status: "claimed" },
      },
      {
        index: 1,
        target: "not-a-mac",
        status: "failure",
        error: {
          kind: "InvalidArgument",
          message: 'Invalid MAC address "not-a-mac". Expected six hex pairs such as 00.10.7f.b1.e3.00',
        },
      },
      {
        index: 2,
        target: "00-10-7F-B1-E3-02",
        status: "success",
        data: {
          deviceId: null,
          macAddress: "00.10.7f.b1.e3.02",
          serialNumber: "S3",
          status: "claimed",
          name: "Hall",
        },
      },
    ]);
    expect(fetchImpl.mock.calls.filter((call) => requestedMethod(call) === "POST")).toHaveLength(2);
  });

  it("reports unparseable CSV rows without sending them", async () => {
    const fetchImpl = fakeXio();
    const fanOut = new FanOutCoordinator(makeClient(fetchImpl));
    const rows: ParsedClaimRow[] = [
      {
        line: 2,
        target: "00.10.7f.b1.e3.00",
        status: "parsed",
        request: { macAddress: "00.10.7f.b1.e3.00", serialNumber: "S1" },
      },
      {
        line: 3,
        target: "line 3",
        status: "invalid",
        error: new InvalidArgumentError("Line 3: expected 3 columns, found 1"),
      },
    ];

    const results = await fanOut.bulkClaimDevices(rows);

    expect(results.map((r) => r.status)).toEqual(["success", "failure"]);
    expect(results[1]).toEqual({
      index: 1,
      target: "line 3",
      status: "failure",
      error: { kind: "InvalidArgument", message: "Line 3: expected 3 columns, found 1" },
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("refuses bulk claims over the limit before any request", async () => {
    const fetchImpl = fakeXio();
    const fanOut = new FanOutCoordinator(makeClient(fetchImpl));
    const rows = Array.from({ length: MAX_BATCH_SIZE + 1 }, (_, i) => ({
      macAddress: "00.10.7f.b1.e3.00",
      serialNumber: `S${i}`,
    }));

    await expect(fanOut.bulkClaimDevices(rows)).rejects.toMatchObject({
      kind: "InvalidArgument",
      detail: "Too many devices: 201 given, at most 200 per call",
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("looks up any number of device ids, one result each", async () => {
    const fetchImpl = fakeXio({ "d-0": statusPayload("d-0", "00.10.7f.b1.e3.00", "10.0.0.5") });
    const client = makeClient(fetchImpl, {
      rateLimitConfig: { capacity: 1_000, refillRate: 1_000, maxConcurrent: 5 },
    });
    const fanOut = new FanOutCoordinator(client);
    const ids = Array.from({ length: MAX_BATCH_SIZE + 1 }, (_, i) => `d-${i}`);

    const results = await fanOut.getMultiDeviceStatus(ids);

    expect(results).toHaveLength(201);
    expect(results.map((r) => r.target)).toEqual(ids);
    expect(results[0].status).toBe("success");
    expect(results.filter((r) => r.status === "failure")).toHaveLength(200);
    expect(fetchImpl).toHaveBeenCalledTimes(201);
  });

  it("returns no results for no device ids", async () => {
    const fetchImpl = fakeXio();
    const fanOut = new FanOutCoordinator(makeClient(fetchImpl));

    await expect(fanOut.getMultiDeviceNetworkInfo([])).resolves.toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
