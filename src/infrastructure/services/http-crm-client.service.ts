/**
 * CRM REST API client.
 * Auth header: X-Keap-API-Key. Every call goes through a single-lane p-queue
 * capped at `requestsPerSecond`, and through undici with the configured timeout
 * (Node's default fetch has a 10s connect limit).
 */

import { fetch, Agent, Dispatcher } from "undici";
import PQueue from "p-queue";
import { ApiConfig } from "../../core/domain/entities/config.entity.js";
import {
  ApiError,
  AuthenticationError,
  NotFoundError,
  QuotaExhaustedError,
  RateLimitedError,
  ServerUnavailableError,
  ThrottleState,
  ValidationFailedError,
} from "../../core/domain/errors/api.errors.js";
import { ILogger } from "../../core/domain/services/logger.service.js";

export type QueryParams = Record<string, string | number | undefined>;

/** Raw JSON transport consumed by the typed adapter. */
export interface CrmTransport {
  get(path: string, params?: QueryParams): Promise<unknown>;
}

function parseIntHeader(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value.trim());
  return Number.isInteger(n) ? n : undefined;
}

export function parseThrottleState(
  headers: Readonly<Record<string, string>>,
  prefix: string,
): ThrottleState {
  return {
    productAvailable: parseIntHeader(headers[`${prefix}product-throttle-available`]),
    tenantAvailable: parseIntHeader(headers[`${prefix}tenant-throttle-available`]),
  };
}

/** Map a failed HTTP response onto the API error taxonomy. */
export function errorForResponse(
  status: number,
  headers: Readonly<Record<string, string>>,
  url: string,
  body: string,
  prefix: string,
): ApiError {
  const details = { statusCode: status, url, body: body.slice(0, 2000) };
  if (status === 401) {
    return new AuthenticationError(`Authentication failed (401) for ${url}`, details);
  }
  if (status === 404) return new NotFoundError(`Resource not found: ${url}`, details);
  if (status === 400 || status === 422) {
    return new ValidationFailedError(`Request rejected (${status}) for ${url}: ${body.slice(0, 200)}`, details);
  }
  if (status === 429) {
    const quotaAvailable = parseIntHeader(headers[`${prefix}product-quota-available`]);
    const timeUnit = (headers[`${prefix}product-quota-time-unit`] ?? "").toLowerCase();
    if (quotaAvailable === 0 && timeUnit === "day") {
      const limit = headers[`${prefix}product-quota-limit`] ?? "unknown";
      const used = headers[`${prefix}product-quota-used`] ?? "unknown";
      return new QuotaExhaustedError(
        `Daily API quota exhausted (limit: ${limit}, used: ${used})`,
        details,
      );
    }
    const throttle = parseThrottleState(headers, prefix);
    const limitType =
      throttle.productAvailable === 0
        ? "product throttle"
        : throttle.tenantAvailable === 0
          ? "tenant throttle"
          : "unknown";
    const relevant: Record<string, string> = {};
    for (const [k, v] of Object.entries(headers)) {
      if (k.startsWith(prefix)) relevant[k] = v;
    }
    return new RateLimitedError(`Rate limit exceeded (${limitType})`, relevant, throttle, details);
  }
  if (status >= 500) return new ServerUnavailableError(`Server error (${status}) for ${url}`, details);
  return new ApiError(`API request failed (${status}) for ${url}`, details);
}

export interface HttpCrmClientOptions {
  /** Swap the connection pool, e.g. for an undici MockAgent in tests. */
  dispatcher?: Dispatcher;
}

/** Body of a response; a transport failure mid-body is a retryable outage. */
export async function readResponseText(
  res: { text(): Promise<string> },
  url: string,
): Promise<string> {
  try {
    return await res.text();
  } catch (e) {
    throw new ServerUnavailableError(
      `Failed to read response body from ${url}: ${e instanceof Error ? e.message : String(e)}`,
      { url, cause: e },
    );
  }
}

export class HttpCrmClient implements CrmTransport {
  private readonly dispatcher: Dispatcher;
  private readonly queue: PQueue;
  private readonly baseUrl: string;

  constructor(
    private readonly api: ApiConfig,
    private readonly logger: ILogger,
    options: HttpCrmClientOptions = {},
  ) {
    if (!api.apiKey) {
      throw new AuthenticationError("CRM API key is not configured (api.apiKey or CRM_API_KEY)");
    }
    this.baseUrl = api.baseUrl.replace(/\/$/, "");
    this.dispatcher =
      options.dispatcher ??
      new Agent({
        connectTimeout: api.timeoutMs,
        headersTimeout: api.timeoutMs,
        bodyTimeout: api.timeoutMs,
      });
    this.queue =
      api.requestsPerSecond > 0
        ? new PQueue({
            concurrency: 1,
            intervalCap: Math.max(1, Math.floor(api.requestsPerSecond)),
            interval: 1000,
          })
        : new PQueue({ concurrency: 1 });
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\//, "")}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  get(path: string, params: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(path, params);
    return this.queue.add(() => this.send(url), { throwOnTimeout: true });
  }

  private async send(url: string): Promise<unknown> {
    const start = Date.now();
    let res: Awaited<ReturnType<typeof fetch>>;
    try {
      res = await fetch(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          "X-Keap-API-Key": this.api.apiKey,
        },
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.api.timeoutMs),
      });
    } catch (e) {
      throw new ServerUnavailableError(
        `Request failed for ${url}: ${e instanceof Error ? e.message : String(e)}`,
        { url, cause: e },
      );
    }

    const headers: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    const text = await readResponseText(res, url);
    this.logger.debug("GET", {
      url,
      statusCode: res.status,
      latencyMs: Date.now() - start,
      throttle: parseThrottleState(headers, this.api.headerPrefix),
    });

    if (!res.ok) {
      const err = errorForResponse(res.status, headers, url, text, this.api.headerPrefix);
      this.logger.warn(err.message, { statusCode: res.status, kind: err.kind });
      throw err;
    }
    if (text.trim() === "") return null;
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (e) {
      throw new ApiError(
        `Failed to parse JSON response from ${url}: ${e instanceof Error ? e.message : String(e)}`,
        { statusCode: res.status, url, body: text.slice(0, 2000) },
      );
    }
  }

  async close(): Promise<void> {
    await this.queue.onIdle();
    await this.dispatcher.close();
  }
}
