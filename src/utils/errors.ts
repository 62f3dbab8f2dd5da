/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { ErrorKind } from "../types/index.js";

export class XioError extends Error {
  // Message without the code prefix, for tool output
  public readonly detail: string;

  constructor(
    public readonly kind: ErrorKind,
    public readonly code: string,
    message: string,
    public readonly cause?: Error,
  ) {
    super(`[${code}] ${message}`);
    this.name = "XioError";
    this.detail = message;
  }
}

export class InvalidArgumentError extends XioError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super("InvalidArgument", "XIO-1001", message);
    this.name = "InvalidArgumentError";
  }
}

export class ConfigError extends XioError {
  constructor(message: string, cause?: Error) {
    super("ConfigError", "XIO-1002", `Configuration error: ${message}`, cause);
    this.name = "ConfigError";
  }
}

export class CancelledError extends XioError {
  constructor(message: string = "Request was cancelled", cause?: Error) {
    super("Cancelled", "XIO-1003", message, cause);
    this.name = "CancelledError";
  }
}
