import type { XioApiClient } from "./client.js";
import type { CallOptions } from "./types.js";
import type {
  ClaimRequest,
  Device,
  DeviceStatus,
  NetworkInfo,
  OperationResult,
} from "../types/index.js";
import type { ParsedClaimRow } from "../utils/csv.js";
import { describeError } from "./errors.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

// XiO bulk-claim limit per file
export const MAX_BATCH_SIZE = 200;

export interface FanOutTask<T> {
  target: string;
  run: () => Promise<T>;
}

/**
 * Run tasks with at most `concurrency` in flight.
 * Every task settles; results come back in input order.
 */
export async function runSettled<T>(
  tasks: FanOutTask<T>[],
  concurrency: number,
): Promise<OperationResult<T>[]> {
  const results = new Array<OperationResult<T>>(tasks.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];
      try {
        const data = await task.run();
        results[index] = { index, target: task.target, status: "success", data };
      } catch (error) {
        results[index] = {
          index,
          target: task.target,
          status: "failure",
          error: describeError(error),
        };
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, tasks.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}


/**
 * Runs single-device operations concurrently for multi-device tools.
 * One failure never cancels its siblings.
 */
export class FanOutCoordinator {
  readonly concurrency: number;

  constructor(
    private readonly client: XioApiClient,
    concurrency: number = 5,
  ) {
    // Never more parallel calls than the limiter lets through
    this.concurrency = Math.max(1, Math.min(concurrency, client.maxConcurrent));
  }

  async bulkClaimDevices(
    rows: Array<ParsedClaimRow | ClaimRequest>,
    options?: CallOptions,
  ): Promise<OperationResult<Device>[]> {
    if (rows.length > MAX_BATCH_SIZE) {
      throw new InvalidArgumentError(
        `Too many devices: ${rows.length} given, at most ${MAX_BATCH_SIZE} per call`,
      );
    }

    const tasks = rows.map((row): FanOutTask<Device> => {
      if ("status" in row) {
        if (row.status === "invalid") {
          const error = row.error;
          return { target: row.target, run: () => Promise.reject(error) };
        }
        return { target: row.target, run: () => this.claim(row.request, options) };
      }
      return { target: row.macAddress, run: () => this.claim(row, options) };
    });

    const results = await runSettled(tasks, this.concurrency);
    const failed = results.filter((r) => r.status === "failure").length;
    log(
      "INFO",
      `bulk_claim_devices: Processed ${results.length} devices. ${results.length - failed} successful, ${failed} failed.`,
    );
    return results;
  }

  async getMultiDeviceStatus(
    deviceIds: string[],
    options?: CallOptions,
  ): Promise<OperationResult<DeviceStatus>[]> {
    return runSettled(
      deviceIds.map((id) => ({
        target: id,
        run: () => this.client.getDeviceStatus(id, options),
      })),
      this.concurrency,
    );
  }

  async getMultiDeviceNetworkInfo(
    deviceIds: string[],
    options?: CallOptions,
  ): Promise<OperationResult<NetworkInfo>[]> {
    return runSettled(
      deviceIds.map((id) => ({
        target: id,
        run: () => this.client.getDeviceNetworkInfo(id, options),
      })),
      this.concurrency,
    );
  }

  private claim(request: ClaimRequest, options?: CallOptions): Promise<Device> {
    return this.client.claimDevice(
      request.macAddress,
      request.serialNumber,
      request.deviceName,
      options,
    );
  }
}
