/**
 * Retry Runner
 *
 * Retry logic for AWS API calls (throttling, rate limiting, transient
 * network faults) and the fixed-delay loop used for state imports.
 */

import { extractErrorCode, extractHttpStatus, formatErrorMessage } from "./errors.js";
import type { Logger } from "./logging/logger.js";

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

/**
 * Retry options
 */
export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
};

/**
 * Default retry configuration for AWS API calls
 */
export const AWS_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

function resolveRetryConfig(
  defaults: Required<RetryConfig>,
  overrides?: RetryConfig,
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Run `fn` until it resolves, the attempt budget is spent, or `shouldRetry`
 * declines. Delays grow exponentially from `minDelayMs` up to `maxDelayMs`;
 * setting both to the same value gives a fixed delay.
 */
export async function retryAsync<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const resolved = resolveRetryConfig(AWS_RETRY_DEFAULTS, options);
  const maxAttempts = resolved.attempts;
  const minDelayMs = resolved.minDelayMs;
  const maxDelayMs = resolved.maxDelayMs;
  const jitter = resolved.jitter;
  const shouldRetry = options.shouldRetry ?? (() => true);
  let lastErr: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) break;

      const retryAfterMs = options.retryAfterMs?.(err);
      const hasRetryAfter = typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs);
      const baseDelay = hasRetryAfter
        ? Math.max(retryAfterMs, minDelayMs)
        : minDelayMs * 2 ** (attempt - 1);
      let delay = Math.min(baseDelay, maxDelayMs);
      delay = applyJitter(delay, jitter);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      options.onRetry?.({
        attempt,
        maxAttempts,
        delayMs: delay,
        err,
        label: options.label,
      });
      await sleep(delay);
    }
  }

  throw lastErr ?? new Error("Retry failed");
}

/**
 * Retry with a constant delay between attempts.
 */
export async function retryFixed<T>(
  fn: () => Promise<T>,
  options: {
    attempts: number;
    delayMs: number;
    label?: string;
    shouldRetry?: (err: unknown, attempt: number) => boolean;
    onRetry?: (info: RetryInfo) => void;
  },
): Promise<T> {
  return retryAsync(fn, {
    attempts: options.attempts,
    minDelayMs: options.delayMs,
    maxDelayMs: options.delayMs,
    jitter: 0,
    label: options.label,
    shouldRetry: options.shouldRetry,
    onRetry: options.onRetry,
  });
}

// =============================================================================
// AWS-Specific Retry Logic
// =============================================================================

/**
 * Throttling and connection failures seen from the GuardDuty,
 * Organizations, STS and SSM clients
 */
const AWS_RETRY_PATTERN = /throttl|rate exceeded|timed out|ECONNRESET|ETIMEDOUT|socket hang up/i;

const AWS_RETRYABLE_CODES = new Set([
  // GuardDuty, SSM
  "ThrottlingException",
  // STS
  "Throttling",
  // Organizations, GuardDuty
  "TooManyRequestsException",
  // Organizations
  "ServiceException",
  // GuardDuty
  "InternalServerErrorException",
  // SSM
  "InternalServerError",
  "ECONNRESET",
  "ETIMEDOUT",
]);

/**
 * Extract retry-after delay from AWS error response
 */
export function getAWSRetryAfterMs(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;

  const status = extractHttpStatus(err);
  if (status === 429 || status === 503) {
    const response: unknown = Reflect.get(err, "$response");
    const headers: unknown = response && typeof response === "object" ? Reflect.get(response, "headers") : undefined;
    const retryAfter: unknown = headers && typeof headers === "object" ? Reflect.get(headers, "retry-after") : undefined;
    if (typeof retryAfter === "string") {
      const seconds = parseInt(retryAfter, 10);
      if (!Number.isNaN(seconds)) return seconds * 1000;
    }
  }

  return undefined;
}

/**
 * Determine if an AWS error should be retried
 */
export function shouldRetryAWSError(err: unknown, _attempt: number): boolean {
  if (!err) return false;

  const code = extractErrorCode(err);
  if (code && AWS_RETRYABLE_CODES.has(code)) return true;

  if (err instanceof Error) {
    if (AWS_RETRYABLE_CODES.has(err.name)) return true;

    const statusCode = extractHttpStatus(err);
    if (statusCode === 429 || statusCode === 500 || statusCode === 502 || statusCode === 503 || statusCode === 504) {
      return true;
    }
  }

  return AWS_RETRY_PATTERN.test(formatErrorMessage(err));
}

/**
 * AWS retry options type
 */
export type AWSRetryOptions = {
  retry?: RetryConfig;
  logger?: Logger;
  onRetry?: (info: RetryInfo) => void;
};

export type AWSRetryRunner = <T>(fn: () => Promise<T>, label?: string) => Promise<T>;

/**
 * Create an AWS retry runner function
 */
export function createAWSRetryRunner(options: AWSRetryOptions = {}): AWSRetryRunner {
  const config = resolveRetryConfig(AWS_RETRY_DEFAULTS, options.retry);

  return async function awsRetry<T>(
    fn: () => Promise<T>,
    label?: string,
  ): Promise<T> {
    return retryAsync(fn, {
      ...config,
      label,
      shouldRetry: shouldRetryAWSError,
      retryAfterMs: getAWSRetryAfterMs,
      onRetry: (info) => {
        options.logger?.debug(
          `${info.label ?? "operation"} throttled, retry ${info.attempt}/${info.maxAttempts} in ${info.delayMs}ms`,
          { error: formatErrorMessage(info.err) },
        );
        options.onRetry?.(info);
      },
    });
  };
}
