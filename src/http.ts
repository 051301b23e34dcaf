/**
 * Pooled HTTP client for page images.
 *
 * This is the transport retry layer: it retries transient statuses and
 * network errors on its own, independently of the per-image attempts made
 * by the acquisition pool.
 */

import pLimit, { type LimitFunction } from "p-limit";
import { FetchError, errorMessage } from "./errors.js";
import { delay } from "./utils.js";

/** Statuses worth retrying at the transport level */
export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36",
  Accept: "image/webp,image/apng,image/*,*/*;q=0.8",
  "Accept-Encoding": "gzip, deflate, br",
};

/** Anything that can turn an image URL into bytes */
export interface ImageFetcher {
  getBuffer(url: string): Promise<Buffer>;
}

export interface HttpClientOptions {
  /** Maximum concurrent requests across the whole client */
  maxConnections: number;
  /** Extra attempts after the first, for transient failures */
  retries: number;
  /** Base backoff; the n-th retry waits `backoffMs * 2^(n-1)` */
  backoffMs: number;
  /** Per-request timeout */
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Injected for tests */
  fetch?: typeof fetch;
}

/**
 * Parse a `Retry-After` header given in seconds.
 *
 * @returns Delay in milliseconds, or null when absent or not numeric
 */
export function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value.trim());
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return seconds * 1000;
}

export class HttpClient implements ImageFetcher {
  private readonly limit: LimitFunction;
  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;

  constructor(private readonly options: HttpClientOptions) {
    this.limit = pLimit(options.maxConnections);
    this.fetchImpl = options.fetch ?? fetch;
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
  }

  /**
   * Fetch a URL and return its body.
   *
   * @throws {FetchError} On a non-retryable status or once retries are exhausted
   */
  getBuffer(url: string): Promise<Buffer> {
    return this.limit(() => this.fetchWithRetry(url));
  }

  private backoff(retry: number): number {
    return this.options.backoffMs * 2 ** (retry - 1);
  }

  private async fetchWithRetry(url: string): Promise<Buffer> {
    const { retries, timeoutMs } = this.options;

    for (let retry = 0; ; retry++) {
      const canRetry = retry < retries;
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: this.headers,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        if (!canRetry) {
          throw new FetchError(`Request failed for ${url}: ${errorMessage(error)}`, { url, cause: error });
        }
        await delay(this.backoff(retry + 1));
        continue;
      }

      if (response.ok) {
        return Buffer.from(await response.arrayBuffer());
      }

      // release the connection before deciding anything else
      await response.body?.cancel();

      if (RETRY_STATUSES.has(response.status) && canRetry) {
        const retryAfter = parseRetryAfter(response.headers.get("retry-after"));
        await delay(retryAfter ?? this.backoff(retry + 1));
        continue;
      }

      throw new FetchError(`HTTP ${response.status} for ${url}`, { url, status: response.status });
    }
  }
}
