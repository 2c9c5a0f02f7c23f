/**
 * Mock infrastructure for testing.
 */

import { Readable } from 'node:stream';
import { ApiError } from '../errors/index.js';
import type { EncodedRequest } from '../encoding/encoder.js';
import type { TokenRefreshHandler } from '../refresh/coordinator.js';
import type { HttpTransport, RawResponse, SendOptions, StreamedResponse } from '../transport/index.js';
import type { HeaderMap } from '../types/descriptor.js';

export { StaticConnectivityProbe } from '../connectivity/index.js';

/**
 * Recorded request for verification.
 */
export interface RecordedRequest {
  /** The request that was made. */
  request: EncodedRequest;
  /** Options passed with it. */
  options: SendOptions;
  /** Whether it went through `stream`. */
  streamed: boolean;
  timestamp: Date;
}

/**
 * Mock response configuration.
 */
export interface MockResponse {
  status: number;
  headers?: HeaderMap;
  /** Objects are JSON-encoded; strings and bytes are sent as is. */
  body?: unknown;
  /** Individual Set-Cookie values. */
  setCookie?: string[];
  /** Optional delay in milliseconds. Honors the abort signal. */
  delay?: number;
  /** Optional error to throw instead of responding. */
  error?: Error;
}

/**
 * Mock transport for testing. Responses are queued per URL path; the
 * last queued response for a path keeps answering.
 */
export class MockTransport implements HttpTransport {
  private readonly responses: Map<string, MockResponse[]> = new Map();
  private readonly defaultResponse: MockResponse;
  private readonly recordedRequests: RecordedRequest[] = [];

  constructor(defaultResponse?: MockResponse) {
    this.defaultResponse = defaultResponse ?? { status: 200 };
  }

  /**
   * Queues a response for a URL path.
   */
  onPath(path: string, response: MockResponse): this {
    const existing = this.responses.get(path) ?? [];
    existing.push(response);
    this.responses.set(path, existing);
    return this;
  }

  clearResponses(): this {
    this.responses.clear();
    return this;
  }

  getRecordedRequests(): RecordedRequest[] {
    return [...this.recordedRequests];
  }

  getRequestCount(): number {
    return this.recordedRequests.length;
  }

  clearRecordedRequests(): this {
    this.recordedRequests.length = 0;
    return this;
  }

  async send(request: EncodedRequest, options: SendOptions = {}): Promise<RawResponse> {
    const response = await this.respond(request, options, false);
    const raw: RawResponse = {
      status: response.status,
      headers: lowerCaseHeaders(response),
      body: encodeBody(response.body),
    };
    if (response.setCookie) {
      raw.setCookie = [...response.setCookie];
    }
    return raw;
  }

  async stream(request: EncodedRequest, options: SendOptions = {}): Promise<StreamedResponse> {
    const response = await this.respond(request, options, true);
    return {
      status: response.status,
      headers: lowerCaseHeaders(response),
      body: Readable.from([encodeBody(response.body)]),
    };
  }

  private async respond(request: EncodedRequest, options: SendOptions, streamed: boolean): Promise<MockResponse> {
    this.recordedRequests.push({ request, options, streamed, timestamp: new Date() });

    const response = this.getNextResponse(new URL(request.url).pathname);

    if (response.delay) {
      await sleep(response.delay, options.signal);
    }
    if (options.signal?.aborted) {
      throw ApiError.cancelled();
    }
    if (response.error) {
      throw response.error;
    }
    return response;
  }

  private getNextResponse(path: string): MockResponse {
    const responses = this.responses.get(path);
    if (!responses || responses.length === 0) {
      return this.defaultResponse;
    }

    if (responses.length > 1) {
      return responses.shift() ?? this.defaultResponse;
    }
    return responses[0] ?? this.defaultResponse;
  }
}

/**
 * Refresh handler that records calls and answers from a queue of outcomes.
 */
export class MockRefreshHandler implements TokenRefreshHandler {
  private readonly outcomes: Array<boolean | Error>;
  private calls = 0;
  private readonly delay: number;
  private readonly onRefresh?: () => void;

  constructor(outcomes: Array<boolean | Error> = [true], options: { delay?: number; onRefresh?: () => void } = {}) {
    this.outcomes = [...outcomes];
    this.delay = options.delay ?? 0;
    this.onRefresh = options.onRefresh;
  }

  async refresh(): Promise<boolean> {
    this.calls++;
    if (this.delay > 0) {
      await sleep(this.delay);
    }
    this.onRefresh?.();
    const outcome = this.outcomes.length > 1 ? this.outcomes.shift() : this.outcomes[0];
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome ?? false;
  }

  getCallCount(): number {
    return this.calls;
  }
}

/**
 * Creates a JSON mock response.
 */
export function jsonResponse(status: number, body: unknown, headers?: HeaderMap): MockResponse {
  return { status, body, headers: { 'content-type': 'application/json', ...headers } };
}

function encodeBody(body: unknown): Buffer {
  if (body === undefined) {
    return Buffer.alloc(0);
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8');
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  return Buffer.from(JSON.stringify(body), 'utf8');
}

function lowerCaseHeaders(response: MockResponse): HeaderMap {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(response.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }
  if (response.setCookie && response.setCookie.length > 0) {
    headers['set-cookie'] = response.setCookie.join(', ');
  }
  return headers;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(ApiError.cancelled());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(ApiError.cancelled());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
