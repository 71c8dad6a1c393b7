import { isJsonObject, NOMAD_INDEX_HEADER, NOMAD_NEXT_TOKEN_HEADER, NOMAD_TOKEN_HEADER } from '@tap-nomad/shared';
import type { FetchLike } from '../client.js';

export interface FakeRequest {
  path: string;
  params: Record<string, string>;
  token: string | null;
}

/**
 * What a scripted fault returns instead of the collection page. `droppedBody`
 * sends a 200 whose body stream fails part-way; `stalledBody` sends a 200
 * whose body never completes until the request is aborted.
 */
export type FaultResponse =
  | { status: number; body?: string }
  | { networkError: true }
  | { rawBody: string }
  | { droppedBody: true }
  | { stalledBody: true };

interface Fault {
  response: FaultResponse;
  remaining: number;
  afterRequests: number;
}

export interface FaultOptions {
  /** How many requests the fault applies to (default 1) */
  times?: number;
  /** Let this many requests to the path succeed first (default 0) */
  afterRequests?: number;
}

const DEFAULT_PER_PAGE = 100;
const LOOP_TOKEN = 'loop-token';

function tokenOf(item: unknown, position: number): string {
  if (isJsonObject(item)) {
    if (typeof item.ID === 'string') return item.ID;
    if (typeof item.Name === 'string') return item.Name;
  }
  return `position-${position}`;
}

function maxModifyIndex(items: unknown[]): number {
  let max = 1;
  for (const item of items) {
    if (isJsonObject(item) && typeof item.ModifyIndex === 'number' && item.ModifyIndex > max) {
      max = item.ModifyIndex;
    }
  }
  return max;
}

/** A 200 whose body starts with `prefix` and then fails when `fail` hands over an error */
function streamedResponse(prefix: string, fail: (error: (reason: Error) => void) => void): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(prefix));
      fail((reason) => controller.error(reason));
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function jsonResponse(body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

/**
 * In-process stand-in for a Nomad agent's list endpoints.
 *
 * Serves registered collections with Nomad's cursor pagination (`per_page`,
 * `next_token`, `X-Nomad-NextToken` holding the ID of the next item) and
 * lets tests script failures per path. Pass `api.fetch` to NomadClient.
 */
export class FakeNomadApi {
  readonly requests: FakeRequest[] = [];

  private collections = new Map<string, unknown[]>();
  private faults = new Map<string, Fault[]>();
  private looping = new Set<string>();
  private requiredToken?: string;

  constructor(collections: Record<string, unknown[]> = {}, options: { requiredToken?: string } = {}) {
    for (const [path, items] of Object.entries(collections)) {
      this.collections.set(path, [...items]);
    }
    this.requiredToken = options.requiredToken;
  }

  setCollection(path: string, items: unknown[]): this {
    this.collections.set(path, [...items]);
    return this;
  }

  fail(path: string, response: FaultResponse, options: FaultOptions = {}): this {
    const list = this.faults.get(path) ?? [];
    list.push({ response, remaining: options.times ?? 1, afterRequests: options.afterRequests ?? 0 });
    this.faults.set(path, list);
    return this;
  }

  /** Makes the path hand back the same continuation token forever */
  loopPagination(path: string): this {
    this.looping.add(path);
    return this;
  }

  requestsFor(path: string): FakeRequest[] {
    return this.requests.filter((request) => request.path === path);
  }

  reset(): void {
    this.requests.length = 0;
    this.faults.clear();
    this.looping.clear();
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const path = url.pathname;
    const headers = new Headers(init?.headers);
    const previousRequests = this.requestsFor(path).length;

    this.requests.push({
      path,
      params: Object.fromEntries(url.searchParams.entries()),
      token: headers.get(NOMAD_TOKEN_HEADER),
    });

    if (this.requiredToken !== undefined && headers.get(NOMAD_TOKEN_HEADER) !== this.requiredToken) {
      return new Response('Permission denied', { status: 403, statusText: 'Forbidden' });
    }

    const fault = this.faults.get(path)?.find((f) => f.remaining > 0 && previousRequests >= f.afterRequests);
    if (fault) {
      fault.remaining -= 1;
      if ('networkError' in fault.response) {
        throw new TypeError('fetch failed');
      }
      if ('droppedBody' in fault.response) {
        return streamedResponse('[{"ID":', (error) => error(new TypeError('terminated')));
      }
      if ('stalledBody' in fault.response) {
        const signal = init?.signal;
        return streamedResponse('[', (error) => {
          signal?.addEventListener('abort', () => {
            const aborted = new Error('This operation was aborted');
            aborted.name = 'AbortError';
            error(aborted);
          });
        });
      }
      if ('rawBody' in fault.response) {
        return new Response(fault.response.rawBody, { status: 200, headers: { 'Content-Type': 'application/json' } });
      }
      return new Response(fault.response.body ?? `fault ${fault.response.status}`, {
        status: fault.response.status,
        statusText: `Status ${fault.response.status}`,
      });
    }

    const items = this.collections.get(path);
    if (!items) {
      return new Response('404 page not found', { status: 404, statusText: 'Not Found' });
    }

    const perPage = Number(url.searchParams.get('per_page') ?? DEFAULT_PER_PAGE);
    const token = url.searchParams.get('next_token');
    const indexHeader = { [NOMAD_INDEX_HEADER]: String(maxModifyIndex(items)) };

    if (this.looping.has(path)) {
      return jsonResponse(items.slice(0, perPage), { ...indexHeader, [NOMAD_NEXT_TOKEN_HEADER]: LOOP_TOKEN });
    }

    let start = 0;
    if (token) {
      start = items.findIndex((item, position) => tokenOf(item, position) === token);
      if (start === -1) {
        return new Response(`invalid next_token ${token}`, { status: 400, statusText: 'Bad Request' });
      }
    }

    const end = start + perPage;
    const pageHeaders: Record<string, string> = { ...indexHeader };
    if (end < items.length) {
      pageHeaders[NOMAD_NEXT_TOKEN_HEADER] = tokenOf(items[end], end);
    }
    return jsonResponse(items.slice(start, end), pageHeaders);
  };
}
