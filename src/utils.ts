import axios, { AxiosRequestConfig } from "axios";
import { CircuitOpenError, UpstreamTimeoutError } from "./errors";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
  maxDelayMs?: number;
  /** Upper bound of the random extra delay, as a fraction of the base delay. */
  jitterRatio?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(
  attempt: number,
  { initialDelayMs = 250, factor = 2, maxDelayMs = Number.POSITIVE_INFINITY, jitterRatio = 0 }: RetryOptions,
  random: () => number = Math.random
): number {
  const base = initialDelayMs * factor ** attempt;
  return Math.min(maxDelayMs, base + base * jitterRatio * random());
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, shouldRetry = () => true, onRetry, sleep: wait = sleep, random = Math.random } = options;
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error, attempt)) {
        throw error;
      }
      const delay = backoffDelay(attempt, options, random);
      onRetry?.(error, attempt + 1, delay);
      await wait(delay);
      attempt += 1;
    }
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new UpstreamTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor(
    private readonly host: string,
    { failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      return Promise.reject(new CircuitOpenError(this.host));
    }

    return action()
      .then((result) => {
        this.reset();
        return result;
      })
      .catch((error: unknown) => {
        this.recordFailure();
        throw error;
      });
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  private isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

const breakerMap = new Map<string, CircuitBreaker>();

function getCircuitBreaker(host: string, options?: CircuitBreakerOptions): CircuitBreaker {
  const key = host.toLowerCase();
  const existing = breakerMap.get(key);
  if (existing) {
    return existing;
  }
  const breaker = new CircuitBreaker(key, options);
  breakerMap.set(key, breaker);
  return breaker;
}

export function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch (_error) {
    return null;
  }
}

export async function fetchJson(
  url: string,
  config: AxiosRequestConfig = {},
  retryOptions?: RetryOptions,
  cbOptions?: CircuitBreakerOptions
): Promise<unknown> {
  const parsed = new URL(url);
  const breaker = getCircuitBreaker(parsed.host, cbOptions);
  const executor = () => axios<unknown>({ url, ...config }).then((response) => response.data);
  return breaker.exec(() => withRetry(executor, retryOptions));
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Case- and whitespace-insensitive prefix used to spot near-identical passages. */
export function contentKey(content: string, prefixLength: number): string {
  return normalizeWhitespace(content).toLowerCase().slice(0, prefixLength);
}

export function uniqueStrings(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = normalizeWhitespace(value);
    const key = trimmed.toLowerCase();
    if (trimmed.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(trimmed);
  }
  return result;
}
