import { RateLimiter, sleep as defaultSleep, type Sleep } from './rate-limiter.js';
import { ProviderApiError, NotFoundError, RateLimitError, DataParseError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ResponseCache } from './cache.js';

/**
 * Rate-limited, cached HTTP GET shared by the upstream clients.
 *
 * Retries network faults, 429 and 5xx with exponential backoff;
 * 404 and other 4xx fail immediately.
 */

const MAX_RETRIES = 3;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  provider: string;
  headers?: Record<string, string>;
  requestsPerSecond?: number;
  timeoutMs?: number;
  cache?: ResponseCache | null;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  logger?: Logger;
  /** Hint appended to 403 errors */
  forbiddenHint?: string;
  /** Strips secrets (API tokens) from URLs before they reach logs, errors or cache keys */
  redact?: (url: string) => string;
}

export class HttpClient {
  private readonly rateLimiter: RateLimiter;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly redact: (url: string) => string;

  constructor(private readonly options: HttpClientOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.rateLimiter = new RateLimiter(options.requestsPerSecond ?? 10, this.sleep);
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = (options.logger ?? silentLogger).child({ provider: options.provider });
    this.redact = options.redact ?? (url => url);
  }

  get provider(): string {
    return this.options.provider;
  }

  async getText(url: string, cacheTtlHours: number = 24): Promise<string> {
    const safeUrl = this.redact(url);
    const cache = this.options.cache;

    if (cache) {
      try {
        const cached = cache.get(safeUrl);
        if (cached !== null) return cached;
      } catch (err) {
        this.logger.debug({ err: errorMessage(err) }, 'cache read failed; fetching');
      }
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      await this.rateLimiter.acquire();

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: { Accept: 'application/json', ...this.options.headers },
          signal: AbortSignal.timeout(this.options.timeoutMs ?? 15_000),
        });
      } catch (err) {
        lastError = new ProviderApiError(
          `Network error fetching ${safeUrl}: ${errorMessage(err)}`,
          0,
          safeUrl,
          this.provider
        );
        await this.backoff(attempt);
        continue;
      }

      if (response.ok) {
        const body = await response.text();
        if (cache) {
          try {
            cache.set(safeUrl, body, cacheTtlHours);
          } catch (err) {
            this.logger.debug({ err: errorMessage(err) }, 'cache write failed');
          }
        }
        return body;
      }

      if (response.status === 404) {
        throw new NotFoundError(safeUrl, this.provider);
      }

      if (response.status === 429) {
        lastError = new RateLimitError(safeUrl, this.provider);
        await this.backoff(attempt);
        continue;
      }

      if (response.status === 403) {
        const hint = this.options.forbiddenHint ? ` ${this.options.forbiddenHint}` : '';
        throw new ProviderApiError(
          `${this.provider} API rejected request (403 Forbidden).${hint}`,
          403,
          safeUrl,
          this.provider
        );
      }

      if (response.status >= 500) {
        lastError = new ProviderApiError(
          `${this.provider} server error: ${response.status}`,
          response.status,
          safeUrl,
          this.provider
        );
        await this.backoff(attempt);
        continue;
      }

      throw new ProviderApiError(
        `${this.provider} API error: ${response.status} ${response.statusText}`,
        response.status,
        safeUrl,
        this.provider
      );
    }

    throw lastError ?? new ProviderApiError(`Failed after ${MAX_RETRIES} retries`, 0, safeUrl, this.provider);
  }

  /** No wait after the last attempt; the caller throws straight away */
  private async backoff(attempt: number): Promise<void> {
    if (attempt < MAX_RETRIES - 1) await this.sleep(backoffMs(attempt));
  }

  async getJson(url: string, cacheTtlHours: number = 24): Promise<unknown> {
    const body = await this.getText(url, cacheTtlHours);
    try {
      return JSON.parse(body);
    } catch {
      throw new DataParseError(
        `Failed to parse ${this.provider} response. The API format may have changed.`,
        this.redact(url)
      );
    }
  }
}

/** Exponential backoff with jitter: 1s, 2s, 4s */
function backoffMs(attempt: number): number {
  const base = 1000 * Math.pow(2, attempt);
  const jitter = Math.random() * 500;
  return base + jitter;
}
