import { computeBackoff, sleep } from '../util/backoff';
import { Logger } from '../util/logger';

export interface RequestOptions extends RequestInit {
  retry?: number;
  timeoutMs?: number;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public status: number,
    public body?: string
  ) {
    super(message);
  }
}

/** The request never produced a response: refused connection, DNS failure, abort on timeout. */
export class NetworkError extends Error {
  constructor(
    message: string,
    public timedOut: boolean,
    public source?: unknown
  ) {
    super(message);
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 2;
const RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

export class HttpClient {
  private baseUrl: string;
  private requestTimeoutMs: number;
  private maxRetries: number;
  private fetchImpl: FetchLike;

  constructor(
    baseUrl: string,
    private logger: Logger,
    options?: {
      requestTimeoutMs?: number;
      maxRetries?: number;
      fetchImpl?: FetchLike;
    }
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options?.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.fetchImpl = options?.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  setBaseUrl(baseUrl: string): void {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async requestJson(path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.requestResponse(path, options);
    const text = await response.text();
    if (!text.trim()) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new HttpError('Response is not valid JSON', response.status, sanitizeBody(text));
    }
  }

  private async requestResponse(path: string, options: RequestOptions): Promise<Response> {
    const url = new URL(path, `${this.baseUrl}/`).toString();
    const headers = this.buildHeaders(options.headers);
    const method = (options.method ?? 'GET').toUpperCase();
    const idempotent = ['GET', 'HEAD', 'OPTIONS'].includes(method);
    const maxRetries = options.retry ?? (idempotent ? this.maxRetries : 0);
    const timeoutMs = options.timeoutMs !== undefined ? options.timeoutMs : this.requestTimeoutMs;
    let attempt = 0;
    let lastError: unknown;

    const startTime = Date.now();
    this.logger.debug(`[HTTP] ${method} ${path}`);

    while (attempt <= maxRetries) {
      try {
        const response = await this.fetchWithTimeout(url, { ...options, method, headers }, timeoutMs);
        const duration = Date.now() - startTime;

        if (response.ok) {
          this.logger.info(`[HTTP] ${method} ${path} ${response.status} ${duration}ms`);
          return response;
        }

        this.logger.error(`[HTTP] ${method} ${path} ${response.status} ${duration}ms`);

        const error = await this.buildHttpError(response);
        lastError = error;
        if (attempt < maxRetries && RETRYABLE_STATUSES.includes(response.status)) {
          attempt += 1;
          this.logger.debug(`request retry ${attempt}/${maxRetries} after HTTP ${response.status}`);
          await sleep(computeBackoff(attempt - 1));
          continue;
        }
        throw error;
      } catch (err) {
        if (err instanceof HttpError) {
          throw err;
        }
        const networkError = this.asNetworkError(err, timeoutMs);
        lastError = networkError;
        if (attempt < maxRetries) {
          attempt += 1;
          this.logger.debug(`request retry ${attempt}/${maxRetries} after error: ${networkError.message}`);
          await sleep(computeBackoff(attempt - 1));
          continue;
        }
        throw networkError;
      }
    }

    throw lastError instanceof Error ? lastError : new Error('Request failed');
  }

  private buildHeaders(extra?: HeadersInit): Headers {
    const headers = new Headers(extra);
    if (!headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }
    if (!headers.has('Accept')) {
      headers.set('Accept', 'application/json');
    }
    return headers;
  }

  private async fetchWithTimeout(
    url: string,
    options: RequestInit,
    timeoutMs: number | undefined
  ): Promise<Response> {
    if (!timeoutMs || timeoutMs <= 0) {
      return this.fetchImpl(url, options);
    }
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await this.fetchImpl(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async buildHttpError(response: Response): Promise<HttpError> {
    let text = '';
    try {
      text = await response.text();
    } catch {
      text = '';
    }
    const safeText = sanitizeBody(text);
    const detail = extractErrorDetail(text, response.headers.get('content-type') ?? '');
    if (safeText) {
      this.logger.debug(`HTTP ${response.status} ${response.statusText}: ${safeText}`);
    }
    const message = detail || response.statusText || `HTTP ${response.status}`;
    return new HttpError(message, response.status, detail || safeText || undefined);
  }

  private asNetworkError(err: unknown, timeoutMs: number | undefined): NetworkError {
    if (err instanceof NetworkError) {
      return err;
    }
    if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
      return new NetworkError(`Request timed out after ${timeoutMs ?? 0}ms`, true, err);
    }
    const message = err instanceof Error ? err.message : String(err);
    return new NetworkError(message || 'Request failed', false, err);
  }
}

export function sanitizeBody(text: string): string {
  if (!text) {
    return '';
  }
  return text
    .slice(0, 1000)
    .replace(/"(api_key|token|authorization)"\s*:\s*"[^"]*"/gi, '"$1":"[redacted]"');
}

function extractErrorDetail(text: string, contentType: string): string {
  const normalized = text.trim();
  if (!normalized) {
    return '';
  }
  const isJson =
    contentType.includes('application/json') ||
    normalized.startsWith('{') ||
    normalized.startsWith('[');
  if (!isJson) {
    return normalized.slice(0, 512);
  }
  try {
    const parsed: unknown = JSON.parse(normalized);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      const record: Record<string, unknown> = { ...parsed };
      const detail =
        (typeof record.error === 'string' && record.error) ||
        (typeof record.detail === 'string' && record.detail) ||
        (typeof record.message === 'string' && record.message) ||
        '';
      if (detail) {
        return detail.slice(0, 512);
      }
    }
  } catch {
    return normalized.slice(0, 512);
  }
  return normalized.slice(0, 512);
}
