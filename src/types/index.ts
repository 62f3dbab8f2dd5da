/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Log levels
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

// Token bucket + in-flight cap for outbound XiO requests
export interface RateLimitConfig {
  capacity: number; // max burst size (e.g., 10)
  refillRate: number; // tokens per second (e.g., 3)
  maxConcurrent: number; // requests in flight at once (e.g., 5)
}

// Application configuration (frozen after loadConfig)
export interface AppConfig {
  baseUrl: string;
  token: string;
  accountId: string;
  cacheDurationMinutes: number;
  maxRetries: number;
  timeoutSeconds: number;
  rateLimit: RateLimitConfig;
  fanOutConcurrency: number;
  logLevel: LogLevel;
}

// Every failure the tools can report
export type ErrorKind =
  | "InvalidArgument"
  | "NotFound"
  | "AuthError"
  | "RateLimited"
  | "Timeout"
  | "NetworkError"
  | "RequestFailed"
  | "Cancelled"
  | "ConfigError";

// External-facing error representation
export interface ErrorDescriptor {
  kind: ErrorKind;
  message: string;
  status?: number;
  body?: string;
}

export interface NetworkInfo {
  ipAddress: string | null;
  macAddress: string | null;
  hostname: string | null;
}

// Device as reported by XiO Cloud, normalized
export interface Device {
  deviceId: string | null;
  macAddress: string | null;
  serialNumber: string | null;
  name?: string;
  status: string;
  networkInfo?: NetworkInfo;
}

// Raw status document from /devicecid/{id}/status
export type DeviceStatus = Record<string, unknown>;

export interface ClaimRequest {
  macAddress: string;
  serialNumber: string;
  deviceName?: string;
}

export type OperationResult<T> =
  | { index: number; target: string; status: "success"; data: T }
  | { index: number; target: string; status: "failure"; error: ErrorDescriptor };

export type ToolOutcome<T> =
  | { ok: true; result: T }
  | { ok: false; error: ErrorDescriptor };
