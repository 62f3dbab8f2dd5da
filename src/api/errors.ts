/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { ZodError } from "zod";
import type { ErrorDescriptor, ErrorKind } from "../types/index.js";
import { XioError } from "../utils/errors.js";

function kindForStatus(status: number): ErrorKind {
  if (status === 404) return "NotFound";
  if (status === 401 || status === 403) return "AuthError";
  if (status === 429) return "RateLimited";
  return "RequestFailed";
}

// Base class for all HTTP API errors
export class ApiError extends XioError {
  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    message: string,
    public readonly responseBody?: string,
    cause?: Error,
  ) {
    super(
      kindForStatus(status),
      "XIO-2001",
      `API error (${status}) at ${endpoint}: ${message}`,
      cause,
    );
    this.name = "ApiError";
  }
}

// Rate limit error (429 Too Many Requests), raised once retries are spent
export class RateLimitError extends ApiError {
  constructor(
    endpoint: string,
    public readonly retryAfter?: number, // seconds
    responseBody?: string,
  ) {
    const message = retryAfter
      ? `Rate limited, retry after ${retryAfter}s`
      : "Rate limited";
    super(429, endpoint, message, responseBody);
    this.name = "RateLimitError";
  }
}

// Network-level error (no HTTP status code)
// For fetch failures, DNS errors, connection resets
export class NetworkError extends XioError {
  constructor(message: string, cause?: Error, kind: ErrorKind = "NetworkError") {
    super(kind, kind === "Timeout" ? "XIO-2003" : "XIO-2002", `Network error: ${message}`, cause);
    this.name = "NetworkError";
  }
}

export class TimeoutError extends NetworkError {
  constructor(
    endpoint: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(`Request to ${endpoint} timed out after ${timeoutMs}ms`, cause, "Timeout");
    this.name = "TimeoutError";
  }
}

/**
 * Map any thrown value to the external error shape.
 * Unknown errors get a generic message; nothing internal leaks.
 */
export function describeError(error: unknown): ErrorDescriptor {
  if (error instanceof ApiError) {
    const descriptor: ErrorDescriptor = {
      kind: error.kind,
      message: error.detail,
      status: error.status,
    };
    if (error.kind === "RequestFailed" && error.responseBody) {
      descriptor.body = error.responseBody;
    }
    return descriptor;
  }

  if (error instanceof XioError) {
    return { kind: error.kind, message: error.detail };
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.map(String).join(".")}: ${i.message}` : i.message,
    );
    return { kind: "InvalidArgument", message: `Invalid input: ${issues.join(", ")}` };
  }

  return { kind: "RequestFailed", message: "An unexpected error occurred. Please try again." };
}
