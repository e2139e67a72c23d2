import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  params?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  body?: unknown;
}

export interface HttpOutcome {
  ok: boolean;
  status: number; // 0 when the request never got a response
  data: unknown;
  transportError?: string;
  attempts: number;
}

export interface HttpClientOptions {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  cacheTtlMs: number;
}

const DEFAULT_HTTP_OPTIONS: HttpClientOptions = {
  timeoutMs: 15_000,
  maxAttempts: 3,
  baseDelayMs: 500,
  cacheTtlMs: 30_000,
};

interface CacheEntry {
  expiresAt: number;
  outcome: HttpOutcome;
}

/**
 * Executes backend requests with exponential backoff. 2xx and 4xx answers are
 * returned at once; 5xx answers and transport failures are retried. Never
 * throws: every failure comes back as an {@link HttpOutcome}.
 *
 * Successful GETs are cached for a short TTL to collapse duplicate reads
 * inside one user turn. Any successful write clears the cache.
 */
export class BookingHttpClient {
  private readonly logger = new Logger(BookingHttpClient.name);
  private readonly cache = new Map<string, CacheEntry>();
  private readonly options: HttpClientOptions;

  constructor(
    private readonly http: AxiosInstance,
    options: Partial<HttpClientOptions> = {},
  ) {
    this.options = { ...DEFAULT_HTTP_OPTIONS, ...options };
  }

  async request(request: HttpRequest): Promise<HttpOutcome> {
    const cacheKey = request.method === 'GET' ? this.cacheKey(request) : undefined;
    if (cacheKey) {
      const cached = this.cache.get(cacheKey);
      if (cached && cached.expiresAt > Date.now()) {
        return cached.outcome;
      }
      this.cache.delete(cacheKey);
    }

    let outcome: HttpOutcome = { ok: false, status: 0, data: undefined, attempts: 0 };
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      outcome = await this.send(request, attempt);
      if (outcome.status > 0 && outcome.status < 500) {
        break;
      }
      if (attempt < this.options.maxAttempts) {
        const delay = this.options.baseDelayMs * 2 ** (attempt - 1);
        this.logger.warn(
          `${request.method} ${request.url} failed (${outcome.transportError ?? `HTTP ${outcome.status}`}), retrying in ${delay}ms`,
        );
        await sleep(delay);
      }
    }

    if (outcome.ok) {
      if (cacheKey) {
        this.cache.set(cacheKey, { expiresAt: Date.now() + this.options.cacheTtlMs, outcome });
      } else {
        this.cache.clear();
      }
    }
    return outcome;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async send(request: HttpRequest, attempt: number): Promise<HttpOutcome> {
    try {
      const response = await this.http.request({
        method: request.method,
        url: request.url,
        params: request.params,
        headers: request.headers,
        data: request.body,
        timeout: this.options.timeoutMs,
        validateStatus: () => true,
      });
      return {
        ok: response.status >= 200 && response.status < 300,
        status: response.status,
        data: response.data,
        attempts: attempt,
      };
    } catch (error) {
      const transportError = axios.isAxiosError(error)
        ? `${error.code ?? 'ERR_NETWORK'}: ${error.message}`
        : error instanceof Error
          ? error.message
          : String(error);
      return { ok: false, status: 0, data: undefined, transportError, attempts: attempt };
    }
  }

  private cacheKey(request: HttpRequest): string {
    const params = Object.entries(request.params ?? {})
      .filter(([, value]) => value !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, value]) => `${key}=${String(value)}`)
      .join('&');
    return `${request.method} ${request.url}?${params}`;
  }
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}
