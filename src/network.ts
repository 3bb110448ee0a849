import { RETRYABLE_STATUSES } from "./constants";
import { logger } from "./logger";
import type {
  CrawlOptions,
  FetchFailure,
  FetchResult,
  PageFetcher,
} from "./types";
import { sleep } from "./utils";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export type FetchImplementation = typeof fetch;

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status} ${statusText}`.trim());
    this.name = "HttpStatusError";
  }
}

export class FetchTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
  }
}

/**
 * Process-wide request spacing. Every caller queues behind the previous one
 * and reserves the next start slot, so request starts are never closer than
 * `intervalMs` no matter how many workers share the limiter.
 */
export class RateLimiter {
  private throttle: Promise<void> = Promise.resolve();
  private nextAllowed = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  async acquire(): Promise<void> {
    if (this.intervalMs <= 0) {
      return;
    }
    let release: () => void = () => undefined;
    const previous = this.throttle;
    this.throttle = new Promise((resolve) => {
      release = resolve;
    });
    await previous;
    const now = this.clock.now();
    const wait = Math.max(0, this.nextAllowed - now);
    this.nextAllowed = Math.max(now, this.nextAllowed) + this.intervalMs;
    release();
    if (wait > 0) {
      await this.clock.sleep(wait);
    }
  }
}

export async function fetchWithTimeout(
  targetUrl: string,
  options: Pick<CrawlOptions, "timeoutMs" | "userAgent">,
  fetchImpl: FetchImplementation = fetch
): Promise<string> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  try {
    const response = await fetchImpl(targetUrl, {
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
      },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText);
    }
    return await response.text();
  } catch (error) {
    if (timedOut) {
      throw new FetchTimeoutError(options.timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return RETRYABLE_STATUSES.has(error.status);
  }
  return true;
}

export function toFetchFailure(url: string, error: unknown): FetchFailure {
  if (error instanceof HttpStatusError) {
    return { kind: "status", url, status: error.status, message: error.message };
  }
  if (error instanceof FetchTimeoutError) {
    return { kind: "timeout", url, message: error.message };
  }
  return {
    kind: "network",
    url,
    message: error instanceof Error ? error.message : String(error),
  };
}

export function retryDelayMs(attempt: number, backoffMs: number): number {
  return backoffMs * 2 ** (attempt - 1);
}

export interface PageFetcherDeps {
  limiter: RateLimiter;
  fetchImpl?: FetchImplementation;
  clock?: Clock;
}

/**
 * Build the crawler's fetch capability. Each attempt waits on the shared
 * limiter; retryable failures back off exponentially. The returned function
 * never rejects.
 */
export function createPageFetcher(
  options: Pick<
    CrawlOptions,
    "timeoutMs" | "retries" | "retryBackoffMs" | "userAgent"
  >,
  deps: PageFetcherDeps
): PageFetcher {
  const clock = deps.clock ?? systemClock;
  const maxAttempts = options.retries + 1;

  return async (targetUrl: string): Promise<FetchResult> => {
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      await deps.limiter.acquire();
      try {
        logger.logFetch(targetUrl, attempt, maxAttempts);
        const body = await fetchWithTimeout(targetUrl, options, deps.fetchImpl);
        return { ok: true, body };
      } catch (error) {
        lastError = error;
        logger.logFetchError(targetUrl, attempt, error);
        if (!isRetryable(error) || attempt === maxAttempts) {
          break;
        }
        await clock.sleep(retryDelayMs(attempt, options.retryBackoffMs));
      }
    }

    return { ok: false, failure: toFetchFailure(targetUrl, lastError) };
  };
}
