import type { CallOptions, XioClientOptions } from "./types.js";
import { DEFAULT_RATE_LIMIT } from "./types.js";
import { TTLCache, requestSignature } from "./cache.js";
import { TokenBucket } from "./rate-limiter.js";
import { HttpTransport } from "./transport.js";
import {
  extractNetworkInfo,
  identityKeys,
  deviceListItems,
  normalizeClaimedDevice,
  normalizeDeviceList,
  normalizeDeviceStatus,
} from "./normalizer.js";
import type { Device, DeviceStatus, NetworkInfo } from "../types/index.js";
import { formatMacAddress } from "../utils/mac-address.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const DEVICE_SERVICE = "v1/device";
const CLAIM_SERVICE = "v2/deviceclaim";
const DEVICE_LIST_TAG = "devices";

function deviceTag(deviceId: string): string {
  return `device:${deviceId.toLowerCase()}`;
}

/**
 * XiO Cloud device client with caching, rate limiting, and retries.
 *
 * Key features:
 * - Reads are cached per request signature for cacheTtlMs (default 5 min)
 * - Every request waits on a FIFO token bucket with an in-flight cap
 * - Claims bypass the cache and invalidate entries for the claimed device
 * - Claims are not retried on ambiguous failures (only after 429)
 */
export class XioApiClient {
  private readonly transport: HttpTransport;
  private readonly cache: TTLCache;
  private readonly rateLimiter: TokenBucket;
  private readonly cacheTtlMs: number;

  constructor(options: XioClientOptions) {
    this.cacheTtlMs = options.cacheTtlMs ?? 300_000;

    // Initialize cache and rate limiter
    this.cache = new TTLCache();
    const rateLimitConfig = options.rateLimitConfig ?? DEFAULT_RATE_LIMIT;
    this.rateLimiter = new TokenBucket(
      rateLimitConfig.capacity,
      rateLimitConfig.refillRate,
      rateLimitConfig.maxConcurrent,
    );
    this.transport = new HttpTransport({ ...options, rateLimiter: this.rateLimiter });

    log("DEBUG", `XioApiClient initialized for ${options.baseUrl}`);
  }

  /** Highest number of requests the limiter lets run at once. */
  get maxConcurrent(): number {
    return this.rateLimiter.maxConcurrent;
  }

  /**
   * Claim a device to the account.
   *
   * MAC and serial are validated before any network call.
   * @throws InvalidArgumentError for a malformed MAC or empty serial number
   */
  async claimDevice(
    macAddress: string,
    serialNumber: string,
    deviceName?: string,
    options?: CallOptions,
  ): Promise<Device> {
    const mac = formatMacAddress(macAddress);
    const serial = serialNumber.trim();
    if (!serial) {
      throw new InvalidArgumentError("serial_number must not be empty", "serial_number");
    }
    const name = deviceName?.trim() || undefined;

    const payload = await this.transport.send({
      method: "POST",
      service: CLAIM_SERVICE,
      path: `/macaddress/${encodeURIComponent(mac)}/serialnumber/${encodeURIComponent(serial)}`,
      body: name ? { deviceName: name } : undefined,
      idempotent: false,
      signal: options?.signal,
    });

    const device = normalizeClaimedDevice(payload, { macAddress: mac, serialNumber: serial, name });

    // Device list and anything cached for this device id/MAC/serial is now stale
    const stale = [DEVICE_LIST_TAG, deviceTag(mac), deviceTag(serial)];
    if (device.deviceId) stale.push(deviceTag(device.deviceId));
    const removed = this.cache.invalidate((_key, entry) =>
      entry.tags.some((tag) => stale.includes(tag)),
    );
    log("DEBUG", `Claim of ${mac} invalidated ${removed} cache entries`);

    log("INFO", `${mac}: Device claimed successfully`);
    return device;
  }

  /** List every device on the account. Cached. */
  async getDevices(options?: CallOptions): Promise<Device[]> {
    const payload = await this.cachedGet(
      "/devices",
      () => [DEVICE_LIST_TAG],
      options,
      (body) => deviceListItems(body) !== undefined,
    );
    return normalizeDeviceList(payload);
  }

  /**
   * Status document for one device. Cached.
   * @throws ApiError with kind NotFound when the device id is unknown
   */
  async getDeviceStatus(deviceId: string, options?: CallOptions): Promise<DeviceStatus> {
    const id = this.requireDeviceId(deviceId);
    const payload = await this.cachedGet(
      `/devicecid/${encodeURIComponent(id)}/status`,
      (status) => [deviceTag(id), ...identityKeys(status).map(deviceTag)],
      options,
    );
    return normalizeDeviceStatus(payload);
  }

  /** IP, MAC and hostname from the device's status document. */
  async getDeviceNetworkInfo(deviceId: string, options?: CallOptions): Promise<NetworkInfo> {
    const status = await this.getDeviceStatus(deviceId, options);
    return extractNetworkInfo(status);
  }

  /**
   * Clear all cached responses.
   */
  clearCache(): void {
    this.cache.clear();
    log("DEBUG", "Cache cleared");
  }

  /**
   * Get current cache size (number of cached entries).
   */
  get cacheSize(): number {
    return this.cache.size;
  }

  private requireDeviceId(deviceId: string): string {
    const id = deviceId.trim();
    if (!id) {
      throw new InvalidArgumentError("device_id must not be empty", "device_id");
    }
    return id;
  }

  private async cachedGet(
    path: string,
    tagsFor: (payload: unknown) => string[],
    options?: CallOptions,
    accept?: (payload: unknown) => boolean,
  ): Promise<unknown> {
    const key = requestSignature("GET", `/${DEVICE_SERVICE}${path}`);
    if (this.cache.has(key)) {
      log("DEBUG", `Cache hit: ${key}`);
      return this.cache.get(key);
    }

    const payload = await this.transport.send({
      method: "GET",
      service: DEVICE_SERVICE,
      path,
      accept,
      signal: options?.signal,
    });

    // Written only after a complete, accepted response; abandoned requests never get here
    this.cache.set(key, payload, this.cacheTtlMs, tagsFor(payload));
    log("DEBUG", `Cached response for ${key} (TTL: ${this.cacheTtlMs}ms)`);
    return payload;
  }
}
