import { ConfigError, EmptyResponseError, ProviderConnectionError } from "../errors";

interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: unknown;
}

interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  multiplier?: number;
  maxDelayMs?: number;
  jitter?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: RetryAttemptInfo) => void;
}

interface RetryPolicy {
  /** Total attempts, always at least 1. */
  attempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitter: number;
}

const DEFAULT_RETRY: Required<Pick<RetryOptions, "maxAttempts" | "initialDelayMs" | "multiplier" | "maxDelayMs" | "jitter">> = {
  maxAttempts: 3,
  initialDelayMs: 30_000,
  multiplier: 2,
  maxDelayMs: 300_000,
  jitter: 0,
};

class RetryError extends Error {
  readonly attempts: number;
  readonly exhausted: boolean;

  constructor(message: string, attempts: number, exhausted: boolean, cause: unknown) {
    super(message, { cause });
    this.name = "RetryError";
    this.attempts = attempts;
    this.exhausted = exhausted;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function resolveRetryPolicy(options: RetryOptions = {}): RetryPolicy {
  const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY.maxAttempts;
  const initialDelayMs = options.initialDelayMs ?? DEFAULT_RETRY.initialDelayMs;
  const multiplier = options.multiplier ?? DEFAULT_RETRY.multiplier;
  const maxDelayMs = options.maxDelayMs ?? Math.max(DEFAULT_RETRY.maxDelayMs, initialDelayMs);
  const jitter = options.jitter ?? DEFAULT_RETRY.jitter;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 0) {
    throw new ConfigError(`retry.maxAttempts must be a non-negative integer (got ${maxAttempts})`);
  }
  if (!Number.isFinite(initialDelayMs) || initialDelayMs <= 0) {
    throw new ConfigError(`retry.initialDelayMs must be greater than 0 (got ${initialDelayMs})`);
  }
  if (!Number.isFinite(multiplier) || multiplier < 1) {
    throw new ConfigError(`retry.multiplier must be at least 1 (got ${multiplier})`);
  }
  if (!Number.isFinite(maxDelayMs) || maxDelayMs < initialDelayMs) {
    throw new ConfigError(`retry.maxDelayMs must be at least initialDelayMs (got ${maxDelayMs})`);
  }
  if (!Number.isFinite(jitter) || jitter < 0 || jitter > 1) {
    throw new ConfigError(`retry.jitter must be between 0 and 1 (got ${jitter})`);
  }

  return {
    attempts: Math.max(1, maxAttempts),
    initialDelayMs,
    multiplier,
    maxDelayMs,
    jitter,
  };
}

/**
 * Delay to wait after the failed attempt at 0-based `retryIndex`.
 */
function computeDelay(policy: RetryPolicy, retryIndex: number, random: () => number = Math.random): number {
  const base = Math.min(policy.maxDelayMs, policy.initialDelayMs * Math.pow(policy.multiplier, retryIndex));
  if (policy.jitter === 0) return base;
  return Math.min(policy.maxDelayMs, base + base * policy.jitter * random());
}

async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = resolveRetryPolicy(options);
  const shouldRetry = options.shouldRetry || isRetryableError;
  const wait = options.sleep || sleep;
  const random = options.random || Math.random;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!shouldRetry(err)) {
        throw new RetryError(`Non-retryable failure on attempt ${attempt}: ${describeError(err)}`, attempt, false, err);
      }
      if (attempt >= policy.attempts) {
        throw new RetryError(
          `Gave up after ${attempt} attempt${attempt !== 1 ? "s" : ""}: ${describeError(err)}`,
          attempt,
          true,
          err,
        );
      }

      const delayMs = computeDelay(policy, attempt - 1, random);
      options.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs);
    }
  }
}

const RETRYABLE_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"]);

const RETRYABLE_PATTERNS = [
  "rate limit",
  "resource exhausted",
  "timeout",
  "timed out",
  "overloaded",
  "socket hang up",
  "econnreset",
];

// Status codes quoted in a message, as whole numbers only
const RETRYABLE_STATUS_IN_MESSAGE = /\b(408|429|50[0-4])\b/;

function readStatus(error: object): number | undefined {
  const status = "status" in error ? error.status : undefined;
  return typeof status === "number" ? status : undefined;
}

function readCode(error: object): string | undefined {
  const code = "code" in error ? error.code : undefined;
  return typeof code === "string" ? code : undefined;
}

function isRetryableError(error: unknown): boolean {
  if (error instanceof EmptyResponseError || error instanceof ProviderConnectionError) return true;
  if (!(error instanceof Error)) return false;

  const status = readStatus(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500;
  }

  // fetch() failures carry the socket error as their cause
  const code = readCode(error) ?? (error.cause instanceof Error ? readCode(error.cause) : undefined);
  if (code && RETRYABLE_CODES.has(code)) return true;

  const message = error.message.toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern)) || RETRYABLE_STATUS_IN_MESSAGE.test(message);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export {
  RetryError,
  DEFAULT_RETRY,
  withRetry,
  resolveRetryPolicy,
  computeDelay,
  isRetryableError,
  describeError,
  sleep,
};
export type { RetryOptions, RetryPolicy, RetryAttemptInfo };
