/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { ClaimRequest } from "../types/index.js";
import { InvalidArgumentError } from "./errors.js";

export const MAC_ADDRESS_COLUMN = "MAC Address";
export const SERIAL_NUMBER_COLUMN = "Serial Number";
export const DEVICE_NAME_COLUMN = "Device Name";

export type ParsedClaimRow =
  | { line: number; target: string; status: "parsed"; request: ClaimRequest }
  | { line: number; target: string; status: "invalid"; error: InvalidArgumentError };

interface CsvRecord {
  line: number; // 1-based line the record starts on
  fields: string[];
}

/**
 * Split CSV text into records.
 * Handles quoted fields, "" escapes, CRLF and newlines inside quotes.
 */
export function parseCsvRecords(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const endRecord = (): void => {
    fields.push(field);
    // Skip blank lines
    if (!(fields.length === 1 && fields[0].trim() === "")) {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    field = "";
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === "\n") line++;
        field += char;
      }
      continue;
    }

    if (char === '"' && field.trim() === "") {
      field = "";
      inQuotes = true;
    } else if (char === ",") {
      fields.push(field);
      field = "";
    } else if (char === "\r" && input[i + 1] === "\n") {
      continue;
    } else if (char === "\n" || char === "\r") {
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new InvalidArgumentError(`Unterminated quoted field starting on line ${recordLine}`);
  }
  if (field !== "" || fields.length > 0) {
    endRecord();
  }

  return records;
}

function normalizeHeader(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Parse a device-claim CSV.
 *
 * Header row is required and must contain "MAC Address" and "Serial Number";
 * "Device Name" is optional. One result per data row, in file order.
 * Row-level problems are returned as invalid rows, never thrown.
 * @throws InvalidArgumentError when the file is empty or the header is unusable
 */
export function parseClaimCsv(text: string): ParsedClaimRow[] {
  const records = parseCsvRecords(text);
  const [header, ...rows] = records;
  if (!header) {
    throw new InvalidArgumentError("CSV file is empty; a header row is required");
  }

  const columns = header.fields.map(normalizeHeader);
  const macIndex = columns.indexOf(normalizeHeader(MAC_ADDRESS_COLUMN));
  const serialIndex = columns.indexOf(normalizeHeader(SERIAL_NUMBER_COLUMN));
  const nameIndex = columns.indexOf(normalizeHeader(DEVICE_NAME_COLUMN));

  const missing = [
    macIndex === -1 ? MAC_ADDRESS_COLUMN : null,
    serialIndex === -1 ? SERIAL_NUMBER_COLUMN : null,
  ].filter((name): name is string => name !== null);
  if (missing.length > 0) {
    throw new InvalidArgumentError(
      `CSV header is missing required column(s): ${missing.join(", ")}. ` +
        `Expected header: ${MAC_ADDRESS_COLUMN},${SERIAL_NUMBER_COLUMN},${DEVICE_NAME_COLUMN}`,
    );
  }

  return rows.map((record): ParsedClaimRow => {
    const macAddress = (record.fields[macIndex] ?? "").trim();
    const serialNumber = (record.fields[serialIndex] ?? "").trim();
    const target = macAddress || `line ${record.line}`;

    if (record.fields.length !== columns.length) {
      return {
        line: record.line,
        target,
        status: "invalid",
        error: new InvalidArgumentError(
          `Line ${record.line}: expected ${columns.length} columns, found ${record.fields.length}`,
        ),
      };
    }

    const deviceName = nameIndex === -1 ? "" : (record.fields[nameIndex] ?? "").trim();
    return {
      line: record.line,
      target,
      status: "parsed",
      request: deviceName ? { macAddress, serialNumber, deviceName } : { macAddress, serialNumber },
    };
  });
}
