import { setTimeout as delay } from "node:timers/promises";
import type { TokenBucket } from "./rate-limiter.js";
import type { RetryPolicy, TransportOptions, TransportRequest } from "./types.js";
import { DEFAULT_RETRY_POLICY } from "./types.js";
import { ApiError, NetworkError, RateLimitError, TimeoutError } from "./errors.js";
import { CancelledError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

interface RawResponse {
  response: Response;
  text: string;
}

const MAX_MESSAGE_BODY = 500;

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

/**
 * Parse a response body: empty → null, JSON when it parses, raw text otherwise.
 */
export function parseBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Seconds the server asked us to wait, from Retry-After or a
 * "Try again in N seconds" message in the body.
 */
export function retryAfterSeconds(header: string | null, body: string): number | undefined {
  if (header && /^\d+$/.test(header.trim())) {
    return parseInt(header.trim(), 10);
  }
  const match = /try again in (\d+)/i.exec(body);
  return match ? parseInt(match[1], 10) : undefined;
}

function statusMessage(status: number, text: string): string {
  if (status === 404) return "Not found";
  if (status === 401 || status === 403) {
    return "Authentication rejected. Check the XiO Cloud token and account id.";
  }
  const trimmed = text.trim();
  if (!trimmed) return "Request failed";
  return trimmed.length > MAX_MESSAGE_BODY
    ? `${trimmed.slice(0, MAX_MESSAGE_BODY)}...`
    : trimmed;
}

/**
 * HTTP transport for the XiO Cloud API.
 *
 * - Bearer token + subscription key on every request
 * - Account scoping via /{service}/accountid/{accountId}/...
 * - Per-attempt timeout, caller cancellation through AbortSignal
 * - Each attempt waits on the shared rate limiter
 * - Retries network errors, timeouts, 5xx and 429 with exponential backoff + jitter
 * - Non-idempotent calls retry only after 429 (request was rejected unprocessed)
 */
export class HttpTransport {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly accountId: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly rateLimiter?: TokenBucket;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(options: TransportOptions) {
    // HTTPS-only enforcement
    if (options.baseUrl.startsWith("http://")) {
      throw new Error(
        "HTTPS is required for the XiO Cloud API. HTTP URLs are not allowed for security reasons.",
      );
    }

    // Strip trailing slash from baseUrl
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.accountId = options.accountId;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.rateLimiter = options.rateLimiter;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  buildUrl(request: Pick<TransportRequest, "service" | "path" | "query">): URL {
    const service = request.service.replace(/^\/+|\/+$/g, "");
    const path = request.path.startsWith("/") ? request.path : `/${request.path}`;
    const url = new URL(
      `${this.baseUrl}/${service}/accountid/${encodeURIComponent(this.accountId)}${path}`,
    );
    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  /**
   * Send a request and return the parsed body.
   * @throws ApiError for non-2xx responses (RateLimitError for 429), or a 2xx body `accept` refuses
   * @throws NetworkError / TimeoutError once retries are spent
   * @throws CancelledError when the caller's signal aborts
   */
  async send(request: TransportRequest): Promise<unknown> {
    const url = this.buildUrl(request);
    const endpoint = `${request.method} ${url.pathname}`;
    const idempotent = request.idempotent ?? request.method === "GET";
    const init: RequestInit = {
      method: request.method,
      headers: this.buildHeaders(request.body !== undefined),
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
    };

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < this.retry.maxRetries;
      log("DEBUG", `${attempt > 0 ? "Retrying" : "Requesting"} ${endpoint}`);

      let raw: RawResponse;
      try {
        raw = await this.attempt(url, init, endpoint, request.signal);
      } catch (error) {
        if (error instanceof CancelledError || !idempotent || !canRetry) {
          throw error;
        }
        const wait = this.backoffDelay(attempt);
        log("WARN", `${endpoint} failed (${errorMessage(error)}), retrying in ${wait}ms`);
        await this.pause(wait, endpoint, request.signal);
        continue;
      }

      const { status } = raw.response;
      if (status >= 200 && status < 300) {
        const payload = parseBody(raw.text);
        if (request.accept && !request.accept(payload)) {
          throw new ApiError(status, endpoint, "Unexpected response from XiO Cloud", raw.text);
        }
        return payload;
      }

      if (status === 429) {
        const retryAfter = retryAfterSeconds(raw.response.headers.get("Retry-After"), raw.text);
        if (!canRetry) {
          throw new RateLimitError(endpoint, retryAfter, raw.text);
        }
        const wait = this.backoffDelay(attempt, retryAfter);
        log("WARN", `${endpoint} rate limited (429), retrying in ${wait}ms`);
        await this.pause(wait, endpoint, request.signal);
        continue;
      }

      if (status >= 500 && idempotent && canRetry) {
        const wait = this.backoffDelay(attempt);
        log("WARN", `${endpoint} returned ${status}, retrying in ${wait}ms`);
        await this.pause(wait, endpoint, request.signal);
        continue;
      }

      throw new ApiError(status, endpoint, statusMessage(status, raw.text), raw.text);
    }
  }

  /**
   * Delay before retry number `attempt + 1`.
   * Server hint wins when present; otherwise base * 2^attempt, capped, with jitter in [50%, 100%].
   */
  backoffDelay(attempt: number, retryAfter?: number): number {
    if (retryAfter !== undefined) {
      return Math.min(retryAfter * 1000, this.retry.maxRetryAfterMs);
    }
    const exponential = Math.min(
      this.retry.maxDelayMs,
      this.retry.baseDelayMs * 2 ** attempt,
    );
    return Math.round(exponential * (0.5 + this.random() / 2));
  }

  private async attempt(
    url: URL,
    init: RequestInit,
    endpoint: string,
    signal?: AbortSignal,
  ): Promise<RawResponse> {
    if (signal?.aborted) {
      throw new CancelledError(`Request ${endpoint} was cancelled`);
    }

    const permit = await this.rateLimiter?.acquire(signal);
    // The signal may have fired between admission and here
    if (signal?.aborted) {
      if (permit) this.rateLimiter?.release(permit);
      throw new CancelledError(`Request ${endpoint} was cancelled`);
    }
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      // Body read stays under the same timeout
      const text = await response.text();
      return { response, text };
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (timedOut) {
        throw new TimeoutError(endpoint, this.timeoutMs, cause);
      }
      if (signal?.aborted) {
        throw new CancelledError(`Request ${endpoint} was cancelled`, cause);
      }
      throw new NetworkError(`Request ${endpoint} failed: ${errorMessage(error)}`, cause);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
      if (permit) this.rateLimiter?.release(permit);
    }
  }

  private async pause(ms: number, endpoint: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(
          `Request ${endpoint} was cancelled`,
          error instanceof Error ? error : undefined,
        );
      }
      throw error;
    }
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      "XiO-subscription-key": this.token,
      Accept: "application/json",
      "User-Agent": "xio-cloud-mcp/0.1.0",
    };
    if (hasBody) {
      headers["Content-Type"] = "application/json";
    }
    return headers;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
