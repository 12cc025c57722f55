import { RateLimitExceededError } from "../errors";
import { componentLogger, type AppLogger } from "../logger";
import { backoffDelay, sleep as defaultSleep, withRetry } from "../utils";

export interface RateLimiterOptions {
  requestsPerWindow?: number;
  tokensPerWindow?: number;
  windowMs?: number;
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  jitterRatio?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: AppLogger;
}

export interface ScheduleOptions {
  operation: string;
  estimatedTokens?: number;
}

interface TokenEntry {
  at: number;
  tokens: number;
}

export function isRateLimitResponse(error: unknown): boolean {
  if (error instanceof RateLimitExceededError) {
    return true;
  }
  return typeof error === "object" && error !== null && "status" in error && error.status === 429;
}

export function isTransientUpstreamError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return false;
  }
  const { status } = error;
  return typeof status === "number" && status >= 500;
}

/**
 * Process-wide limiter shared by every call to the same model endpoint.
 * Enforces sliding request and token windows before a call starts and
 * retries limit-exceeded responses with exponential backoff and jitter.
 */
export class RateLimiter {
  private readonly requests: number[] = [];

  private readonly tokens: TokenEntry[] = [];

  private readonly requestsPerWindow: number;

  private readonly tokensPerWindow: number;

  private readonly windowMs: number;

  private readonly maxRetries: number;

  private readonly initialDelayMs: number;

  private readonly maxDelayMs: number;

  private readonly backoffFactor: number;

  private readonly jitterRatio: number;

  private readonly now: () => number;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly random: () => number;

  private readonly logger: AppLogger;

  constructor(options: RateLimiterOptions = {}) {
    this.requestsPerWindow = options.requestsPerWindow ?? 500;
    this.tokensPerWindow = options.tokensPerWindow ?? 1_000_000;
    this.windowMs = options.windowMs ?? 60_000;
    this.maxRetries = options.maxRetries ?? 5;
    this.initialDelayMs = options.initialDelayMs ?? 1_000;
    this.maxDelayMs = options.maxDelayMs ?? 120_000;
    this.backoffFactor = options.backoffFactor ?? 2;
    this.jitterRatio = options.jitterRatio ?? 0.25;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? componentLogger("rate-limiter");
  }

  async schedule<T>(task: () => Promise<T>, { operation, estimatedTokens = 0 }: ScheduleOptions): Promise<T> {
    let attempts = 0;
    try {
      return await withRetry(
        async () => {
          attempts += 1;
          await this.acquire(estimatedTokens);
          return task();
        },
        {
          retries: this.maxRetries,
          initialDelayMs: this.initialDelayMs,
          factor: this.backoffFactor,
          maxDelayMs: this.maxDelayMs,
          jitterRatio: this.jitterRatio,
          sleep: this.sleep,
          random: this.random,
          shouldRetry: (error) => isRateLimitResponse(error) || isTransientUpstreamError(error),
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn("llm:retry", { operation, attempt, delayMs: Math.round(delayMs), status: statusOf(error) });
          }
        }
      );
    } catch (error) {
      if (isRateLimitResponse(error)) {
        throw new RateLimitExceededError(operation, attempts, error);
      }
      throw error;
    }
  }

  /** Delay the next retry would use, exposed for diagnostics and tests. */
  retryDelay(attempt: number, random: () => number = this.random): number {
    return backoffDelay(
      attempt,
      {
        initialDelayMs: this.initialDelayMs,
        factor: this.backoffFactor,
        maxDelayMs: this.maxDelayMs,
        jitterRatio: this.jitterRatio
      },
      random
    );
  }

  usage(): { requests: number; tokens: number } {
    this.prune(this.now());
    return { requests: this.requests.length, tokens: this.tokens.reduce((sum, entry) => sum + entry.tokens, 0) };
  }

  private async acquire(tokens: number): Promise<void> {
    for (;;) {
      const waitMs = this.reserve(tokens);
      if (waitMs <= 0) {
        return;
      }
      this.logger.debug("llm:throttled", { waitMs });
      await this.sleep(waitMs);
    }
  }

  // Reservation happens synchronously so concurrent callers never overbook a window.
  private reserve(tokens: number): number {
    const now = this.now();
    this.prune(now);

    if (this.requests.length >= this.requestsPerWindow) {
      return this.requests[0] + this.windowMs - now;
    }

    const used = this.tokens.reduce((sum, entry) => sum + entry.tokens, 0);
    if (used > 0 && used + tokens > this.tokensPerWindow) {
      return this.tokens[0].at + this.windowMs - now;
    }

    this.requests.push(now);
    if (tokens > 0) {
      this.tokens.push({ at: now, tokens });
    }
    return 0;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.requests.length > 0 && this.requests[0] <= cutoff) {
      this.requests.shift();
    }
    while (this.tokens.length > 0 && this.tokens[0].at <= cutoff) {
      this.tokens.shift();
    }
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}
