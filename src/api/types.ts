/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2026 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { RateLimitConfig } from "../types/index.js";
import type { TokenBucket } from "./rate-limiter.js";

export type HttpMethod = "GET" | "POST";

export type QueryParams = Record<string, string | number | boolean | undefined>;

// Exponential backoff with jitter
export interface RetryPolicy {
  maxRetries: number; // additional attempts after the first
  baseDelayMs: number; // default 500
  maxDelayMs: number; // default 8_000
  maxRetryAfterMs: number; // cap on server-supplied Retry-After, default 60_000
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  maxRetryAfterMs: 60_000,
};

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  capacity: 10,
  refillRate: 3,
  maxConcurrent: 5,
};

export interface TransportRequest {
  method: HttpMethod;
  service: string; // e.g. "v1/device", scoped by /accountid/{id}
  path: string; // e.g. "/devices"
  query?: QueryParams;
  body?: unknown;
  /** Allow retries on ambiguous failures. Defaults to true for GET only. */
  idempotent?: boolean;
  /** Shape check for a 2xx body; a refused body raises RequestFailed. */
  accept?: (payload: unknown) => boolean;
  signal?: AbortSignal;
}

export interface TransportOptions {
  baseUrl: string;
  token: string;
  accountId: string;
  timeoutMs?: number; // default 30_000
  retry?: Partial<RetryPolicy>;
  fetchImpl?: typeof fetch;
  rateLimiter?: TokenBucket; // admits each attempt, retries included
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

// XiO device client constructor options
export interface XioClientOptions extends TransportOptions {
  cacheTtlMs?: number; // default 5 min (300_000)
  rateLimitConfig?: RateLimitConfig;
}

export interface CallOptions {
  signal?: AbortSignal;
}
