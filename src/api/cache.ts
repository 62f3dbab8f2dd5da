/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { createHash } from "node:crypto";

// In-memory TTL cache using Map + setTimeout
// No disk persistence; entries are dropped on expiry or invalidation

export interface CacheEntry<T> {
  data: T;
  expiresAt: number; // Unix timestamp ms
  tags: readonly string[];
  timerId: NodeJS.Timeout;
}

export type CachePredicate<T> = (key: string, entry: Readonly<CacheEntry<T>>) => boolean;

export class TTLCache<T = unknown> {
  private cache = new Map<string, CacheEntry<T>>();

  set(key: string, value: T, ttlMs: number, tags: readonly string[] = []): void {
    // Clear existing timer if key exists
    const existing = this.cache.get(key);
    if (existing) {
      clearTimeout(existing.timerId);
    }

    if (ttlMs <= 0) {
      this.cache.delete(key);
      return;
    }

    // Set new timer to auto-delete after TTL
    const timerId = setTimeout(() => {
      this.cache.delete(key);
    }, ttlMs);
    timerId.unref();

    // Store entry in one assignment so readers never see a half-written value
    this.cache.set(key, {
      data: value,
      expiresAt: Date.now() + ttlMs,
      tags,
      timerId,
    });
  }

  get(key: string): T | undefined {
    const entry = this.live(key);
    return entry?.data;
  }

  has(key: string): boolean {
    return this.live(key) !== undefined;
  }

  delete(key: string): boolean {
    const entry = this.cache.get(key);
    if (entry) {
      clearTimeout(entry.timerId);
      this.cache.delete(key);
      return true;
    }
    return false;
  }

  /**
   * Remove every entry the predicate matches.
   * @returns number of entries removed
   */
  invalidate(predicate: CachePredicate<T>): number {
    let removed = 0;
    for (const [key, entry] of [...this.cache.entries()]) {
      if (predicate(key, entry)) {
        clearTimeout(entry.timerId);
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    // Clear all timers
    for (const entry of this.cache.values()) {
      clearTimeout(entry.timerId);
    }
    // Clear map
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  // Timers can fire late under load; never serve past expiresAt
  private live(key: string): CacheEntry<T> | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.delete(key);
      return undefined;
    }
    return entry;
  }
}

function stableStringify(value: unknown): string {
  if (value === undefined) return "";
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(",")}}`;
}

/**
 * Build the cache key for a request: method, path, sorted query, body digest.
 * Two requests share a key only when they are the same logical request.
 */
export function requestSignature(
  method: string,
  path: string,
  query?: Record<string, string | number | boolean | undefined>,
  body?: unknown,
): string {
  const params = Object.entries(query ?? {})
    .filter((pair): pair is [string, string | number | boolean] => pair[1] !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(String(v))}`)
    .join("&");

  const digest =
    body === undefined
      ? ""
      : createHash("sha256").update(stableStringify(body)).digest("hex");

  return `${method.toUpperCase()} ${path}?${params}#${digest}`;
}
