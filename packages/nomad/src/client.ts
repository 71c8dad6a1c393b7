import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_JITTER_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  HttpStatusError,
  MalformedRecordError,
  MAX_PAGE_SIZE,
  NOMAD_INDEX_HEADER,
  NOMAD_NEXT_TOKEN_HEADER,
  NOMAD_TOKEN_HEADER,
  RetryExhaustedError,
  SourceRequestError,
  SourceUnavailableError,
  TAP_NAME,
  nullLogger,
  withRetry,
  type Logger,
  type RetryOptions,
} from '@tap-nomad/shared';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Configuration options for NomadClient
 */
export interface NomadClientConfig {
  /** Agent address, e.g. 'http://127.0.0.1:4646' (a path prefix is kept) */
  baseUrl: string;
  /** ACL token sent as X-Nomad-Token */
  token?: string;
  /** Namespace query parameter; '*' lists across namespaces */
  namespace?: string;
  region?: string;
  /** Items per page, capped at MAX_PAGE_SIZE (default: DEFAULT_PAGE_SIZE) */
  pageSize?: number;
  /** Request timeout in milliseconds (default: DEFAULT_REQUEST_TIMEOUT_MS) */
  requestTimeoutMs?: number;
  retry?: Partial<Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>>;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  logger?: Logger;
}

export interface NomadPage {
  items: unknown[];
  /** Value of X-Nomad-NextToken; absent on the last page */
  nextToken?: string;
  /** Raft index the listing was served at (X-Nomad-Index) */
  index?: number;
}

export type QueryParams = Readonly<Record<string, string>>;

/**
 * Client for the Nomad HTTP API list endpoints.
 *
 * Features:
 * - Cursor pagination over X-Nomad-NextToken
 * - Request timeouts
 * - Exponential backoff on 429, 5xx, connection errors and timeouts
 * - Immediate failure on other 4xx responses
 *
 * The client holds no cursor state between calls: every paginate() call is
 * an independent sequence.
 */
export class NomadClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly namespace?: string;
  private readonly region?: string;
  private readonly pageSize: number;
  private readonly requestTimeoutMs: number;
  private readonly retry: Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(config: NomadClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.token = config.token;
    this.namespace = config.namespace;
    this.region = config.region;
    this.pageSize = Math.min(Math.max(config.pageSize ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retry = {
      maxRetries: config.retry?.maxRetries ?? DEFAULT_MAX_RETRIES,
      baseDelayMs: config.retry?.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
      maxDelayMs: config.retry?.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS,
      jitterMs: config.retry?.jitterMs ?? DEFAULT_RETRY_JITTER_MS,
    };
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (config.logger ?? nullLogger).child({ component: 'nomad-client' });
  }

  /**
   * Lazily pages through a list endpoint, following X-Nomad-NextToken until
   * the server stops sending one.
   *
   * @throws SourceRequestError on non-retryable responses or a repeated token
   * @throws SourceUnavailableError when retries are exhausted
   * @throws MalformedRecordError when a body is not a JSON array
   */
  async *paginate(path: string, params: QueryParams = {}, startToken?: string): AsyncGenerator<NomadPage> {
    const seenTokens = new Set<string>();
    let nextToken = startToken;
    if (nextToken !== undefined) seenTokens.add(nextToken);

    while (true) {
      const page = await this.getPage(path, params, nextToken);
      yield page;

      if (page.nextToken === undefined) {
        return;
      }
      if (seenTokens.has(page.nextToken)) {
        throw new SourceRequestError(`Pagination token '${page.nextToken}' repeated on ${path}`, path);
      }
      seenTokens.add(page.nextToken);
      nextToken = page.nextToken;
    }
  }

  /**
   * Flattened view of paginate(): one raw item at a time, across all pages.
   */
  async *fetch(path: string, params: QueryParams = {}): AsyncGenerator<unknown> {
    for await (const page of this.paginate(path, params)) {
      yield* page.items;
    }
  }

  /**
   * Fetches a single page with retry.
   */
  async getPage(path: string, params: QueryParams = {}, nextToken?: string): Promise<NomadPage> {
    const url = this.buildUrl(path, params, nextToken);

    try {
      return await withRetry(() => this.requestPage(url, path), {
        ...this.retry,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn('Retrying Nomad request', {
            path,
            attempt,
            delayMs: Math.round(delayMs),
            error: error.message,
          });
        },
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new SourceUnavailableError(path, error.attempts, error.lastError);
      }
      throw error;
    }
  }

  private buildUrl(path: string, params: QueryParams, nextToken?: string): string {
    const query = new URLSearchParams();
    if (this.namespace) query.set('namespace', this.namespace);
    if (this.region) query.set('region', this.region);
    for (const [key, value] of Object.entries(params)) {
      query.set(key, value);
    }
    query.set('per_page', String(this.pageSize));
    if (nextToken) query.set('next_token', nextToken);

    return `${this.baseUrl}${path}?${query.toString()}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': TAP_NAME,
    };
    if (this.token) {
      headers[NOMAD_TOKEN_HEADER] = this.token;
    }
    return headers;
  }

  private async requestPage(url: string, path: string): Promise<NomadPage> {
    const { response, text } = await this.fetchWithTimeout(url);

    if (!response.ok) {
      if (response.status === 429 || response.status >= 500) {
        throw new HttpStatusError(path, response.status, response.statusText);
      }
      const detail = text.trim() ? `: ${text.trim().slice(0, 200)}` : '';
      throw new SourceRequestError(
        `Nomad request failed with HTTP ${response.status} on ${path}${detail}`,
        path,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new MalformedRecordError(`Response body on ${path} is not valid JSON`, {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (!Array.isArray(body)) {
      throw new MalformedRecordError(`Expected a JSON array from ${path}, got ${body === null ? 'null' : typeof body}`, { path });
    }

    const page: NomadPage = { items: body };
    const nextToken = response.headers.get(NOMAD_NEXT_TOKEN_HEADER);
    if (nextToken) page.nextToken = nextToken;
    const index = Number(response.headers.get(NOMAD_INDEX_HEADER));
    if (Number.isFinite(index) && index > 0) page.index = index;

    this.logger.debug('Fetched page', { path, items: body.length, hasMore: page.nextToken !== undefined });
    return page;
  }

  /**
   * The timeout covers the body as well as the headers. Failures while the
   * body streams in propagate as-is so the retry policy sees a network error.
   */
  private async fetchWithTimeout(url: string): Promise<{ response: Response; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers(),
        signal: controller.signal,
      });
      const text = await response.text();
      return { response, text };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${this.requestTimeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
