/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2026 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// XiO Cloud API client and infrastructure - public exports

// Main client
export { XioApiClient } from "./client.js";
export { HttpTransport } from "./transport.js";

// Multi-device fan-out
export { FanOutCoordinator, runSettled, MAX_BATCH_SIZE } from "./fan-out.js";

// Cache and rate limiting
export { TTLCache, requestSignature } from "./cache.js";
export { TokenBucket } from "./rate-limiter.js";

// Errors
export {
  ApiError,
  RateLimitError,
  NetworkError,
  TimeoutError,
  describeError,
} from "./errors.js";

// Types
export type {
  CallOptions,
  HttpMethod,
  RetryPolicy,
  TransportOptions,
  TransportRequest,
  XioClientOptions,
} from "./types.js";
export { DEFAULT_RETRY_POLICY, DEFAULT_RATE_LIMIT } from "./types.js";
