import {
  ApiError,
  ApiErrorKind,
  RateLimitedError,
  ThrottleState,
} from "../errors/api.errors.js";
import { ILogger } from "./logger.service.js";

/** Upstream throttle windows reset every minute. */
export const THROTTLE_RESET_MS = 60_000;
export const THROTTLE_JITTER_MS = 10_000;

export const DEFAULT_RETRYABLE_KINDS: readonly ApiErrorKind[] = [
  "rate_limited",
  "server_unavailable",
];

export interface RetryOptions {
  retryableKinds?: readonly ApiErrorKind[];
  /** Retries after the first attempt. */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoffBase?: number;
  jitter?: boolean;
  sleep?: (ms: number) => Promise<void>;
  /** Uniform source in [0, 1). */
  random?: () => number;
  logger?: ILogger;
  /** Names the operation in retry log lines. */
  label?: string;
}

type ResolvedRetryOptions = Required<Omit<RetryOptions, "logger" | "label">> &
  Pick<RetryOptions, "logger" | "label">;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function resolveOptions(opts: RetryOptions): ResolvedRetryOptions {
  return {
    retryableKinds: opts.retryableKinds ?? DEFAULT_RETRYABLE_KINDS,
    maxRetries: opts.maxRetries ?? 5,
    baseDelayMs: opts.baseDelayMs ?? 1000,
    maxDelayMs: opts.maxDelayMs ?? 60_000,
    backoffBase: opts.backoffBase ?? 2,
    jitter: opts.jitter ?? true,
    sleep: opts.sleep ?? sleep,
    random: opts.random ?? Math.random,
    logger: opts.logger,
    label: opts.label,
  };
}

function trackedWindows(throttle: ThrottleState): number[] {
  return [throttle.productAvailable, throttle.tenantAvailable].filter(
    (v): v is number => v !== undefined,
  );
}

/**
 * Delay before the retry following failed attempt number `attempt` (1-based).
 * Throttle metadata on a rate-limit error takes precedence over backoff.
 */
export function computeRetryDelay(
  err: unknown,
  attempt: number,
  options: RetryOptions = {},
): number {
  const opts = resolveOptions(options);
  if (err instanceof RateLimitedError) {
    const windows = trackedWindows(err.throttle);
    if (windows.length > 0) {
      if (windows.every((available) => available > 0)) return 0;
      return THROTTLE_RESET_MS + opts.random() * THROTTLE_JITTER_MS;
    }
  }
  const exponential = Math.min(
    opts.baseDelayMs * opts.backoffBase ** (attempt - 1),
    opts.maxDelayMs,
  );
  return opts.jitter ? exponential * (0.5 + opts.random()) : exponential;
}

function isRetryable(err: unknown, kinds: readonly ApiErrorKind[]): boolean {
  return err instanceof ApiError && kinds.includes(err.kind);
}

/**
 * Run `operation`, retrying retryable API failures up to `maxRetries` times.
 * Quota exhaustion is re-raised at once whatever the retryable kinds say.
 * Once retries run out the last error is re-raised.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const opts = resolveOptions(options);
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof ApiError && err.kind === "quota_exhausted") throw err;
      if (!isRetryable(err, opts.retryableKinds)) throw err;
      if (attempt > opts.maxRetries) {
        opts.logger?.error("Retries exhausted", {
          operation: opts.label,
          attempts: attempt,
          error: err instanceof Error ? err.message : String(err),
        });
        throw err;
      }
      const delayMs = computeRetryDelay(err, attempt, opts);
      opts.logger?.warn("Retrying after transient failure", {
        operation: opts.label,
        attempt,
        maxRetries: opts.maxRetries,
        delayMs: Math.round(delayMs),
        error: err instanceof Error ? err.message : String(err),
      });
      if (delayMs > 0) await opts.sleep(delayMs);
    }
  }
}

/** Reusable, stateless bundle of retry settings shared by call sites. */
export class RetryPolicy {
  constructor(private readonly defaults: RetryOptions = {}) {}

  execute<T>(operation: () => Promise<T>, overrides: RetryOptions = {}): Promise<T> {
    return withRetry(operation, { ...this.defaults, ...overrides });
  }

  /** Whether a single attempt should hand `err` back to the policy. */
  isRetryable(err: unknown): boolean {
    if (err instanceof ApiError && err.kind === "quota_exhausted") return false;
    return isRetryable(err, this.defaults.retryableKinds ?? DEFAULT_RETRYABLE_KINDS);
  }
}
