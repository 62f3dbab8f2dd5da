import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../api/index.js";
import type { FanOutCoordinator, XioApiClient } from "../api/index.js";
import type { ErrorDescriptor, OperationResult, ToolOutcome } from "../types/index.js";
import { log } from "../utils/logger.js";

// What every tool needs; built once in main()
export interface ToolDeps {
  client: XioApiClient;
  fanOut: FanOutCoordinator;
}

export interface BatchReport<T> {
  summary: string;
  results: OperationResult<T>[];
}

/**
 * Run a tool body and translate any failure into an ErrorDescriptor.
 */
export async function runTool<T>(
  name: string,
  body: () => Promise<T>,
): Promise<ToolOutcome<T>> {
  try {
    log("DEBUG", `${name} tool called`);
    return { ok: true, result: await body() };
  } catch (error) {
    const descriptor = describeError(error);
    // Full error to stderr for debugging (token redaction handled by logger)
    log("ERROR", `${name} failed: ${descriptor.kind}`, error);
    return { ok: false, error: descriptor };
  }
}

export function summarize<T>(results: OperationResult<T>[]): BatchReport<T> {
  const failed = results.filter((r) => r.status === "failure").length;
  return {
    summary: `Processed ${results.length} devices. ${results.length - failed} successful, ${failed} failed.`,
    results,
  };
}

/**
 * Wrap data as MCP-compatible tool result
 */
export function toolResponse(data: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

/**
 * Wrap an error descriptor as MCP-compatible tool result
 */
export function errorResponse(error: ErrorDescriptor): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ error }, null, 2),
      },
    ],
    isError: true,
  };
}

export function outcomeResponse<T>(
  outcome: ToolOutcome<T>,
  present: (result: T) => unknown = (result) => result,
): CallToolResult {
  return outcome.ok ? toolResponse(present(outcome.result)) : errorResponse(outcome.error);
}
