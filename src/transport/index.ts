/**
 * HTTP transport layer.
 */

import { Readable } from 'node:stream';
import type { Agent } from 'node:https';
import axios, { AxiosHeaders, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { PipelineConfig } from '../config/index.js';
import type { EncodedRequest } from '../encoding/encoder.js';
import { ApiError, isApiError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { HeaderMap } from '../types/descriptor.js';
import type { TlsPinningPolicy } from '../types/tls.js';
import { createPinnedAgent } from './pinning.js';

export { CertificatePinner, computePublicKeyHash, createPinnedAgent } from './pinning.js';

/**
 * Per-send options.
 */
export interface SendOptions {
  /** Aborts the in-flight request. */
  signal?: AbortSignal;
  /** Certificate pinning applied to this request. */
  tlsPolicy?: TlsPinningPolicy;
}

/**
 * Fully buffered response.
 */
export interface RawResponse {
  status: number;
  /** Lower-cased header names; repeated values joined with ", ". */
  headers: HeaderMap;
  body: Buffer;
  /** Individual Set-Cookie values, before joining. */
  setCookie?: string[];
}

/**
 * Response whose body has not been read yet.
 */
export interface StreamedResponse {
  status: number;
  headers: HeaderMap;
  body: Readable;
}

/**
 * HTTP transport interface.
 */
export interface HttpTransport {
  /**
   * Sends a request and buffers the response. Never throws on an HTTP
   * status; only socket-level failures reject.
   */
  send(request: EncodedRequest, options?: SendOptions): Promise<RawResponse>;

  /**
   * Sends a request and hands back the body unread.
   */
  stream(request: EncodedRequest, options?: SendOptions): Promise<StreamedResponse>;
}

/** Socket error codes reported as network failures. */
const SOCKET_ERROR_CODES = new Set([
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK',
]);

/**
 * Default HTTP transport using axios.
 */
export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly agents = new WeakMap<TlsPinningPolicy, Promise<Agent>>();

  constructor(config: PipelineConfig, logger: Logger = new NoopLogger(), client?: AxiosInstance) {
    this.config = config;
    this.logger = logger;
    this.client = client ?? axios.create();
  }

  async send(request: EncodedRequest, options: SendOptions = {}): Promise<RawResponse> {
    const response = await this.execute(request, options, 'arraybuffer');
    const result: RawResponse = {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body: toBuffer(response.data),
    };
    const setCookie = extractSetCookie(response.headers);
    if (setCookie.length > 0) {
      result.setCookie = setCookie;
    }
    return result;
  }

  async stream(request: EncodedRequest, options: SendOptions = {}): Promise<StreamedResponse> {
    const response = await this.execute(request, options, 'stream');
    const body = response.data;
    if (!(body instanceof Readable)) {
      throw ApiError.invalidResponse(new Error('Expected a readable response body'));
    }
    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body,
    };
  }

  private async execute(
    request: EncodedRequest,
    options: SendOptions,
    responseType: 'arraybuffer' | 'stream'
  ): Promise<AxiosResponse<unknown>> {
    const axiosConfig: AxiosRequestConfig = {
      method: request.method,
      url: request.url,
      headers: new AxiosHeaders({ ...request.headers }),
      data: request.body,
      timeout: this.config.timeout,
      maxRedirects: this.config.maxRedirects,
      responseType,
      transformResponse: (data: unknown) => data,
      validateStatus: () => true, // Classification happens in the executor
      signal: options.signal,
    };

    if (this.config.maxResponseBytes !== undefined) {
      axiosConfig.maxContentLength = this.config.maxResponseBytes;
    }

    try {
      if (options.tlsPolicy && (options.tlsPolicy.enabled ?? true)) {
        axiosConfig.httpsAgent = await this.agentFor(options.tlsPolicy);
      }
      return await this.client.request<unknown>(axiosConfig);
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private agentFor(policy: TlsPinningPolicy): Promise<Agent> {
    let agent = this.agents.get(policy);
    if (!agent) {
      agent = createPinnedAgent(policy, this.logger);
      this.agents.set(policy, agent);
    }
    return agent;
  }

  private mapError(error: unknown): ApiError {
    if (isApiError(error)) {
      return error;
    }
    if (axios.isCancel(error)) {
      return ApiError.cancelled();
    }
    if (axios.isAxiosError(error)) {
      const code = error.code;
      if (code === 'ERR_CANCELED') {
        return ApiError.cancelled();
      }
      if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
        return ApiError.network(`Request timed out after ${this.config.timeout}ms`, code, error);
      }
      if (code !== undefined && SOCKET_ERROR_CODES.has(code)) {
        return ApiError.network(`Network error: ${error.message}`, code, error);
      }
      if (error.response) {
        return ApiError.invalidResponse(error);
      }
      return ApiError.network(error.message, code, error);
    }
    return ApiError.network(error instanceof Error ? error.message : 'Unknown network error', undefined, error);
  }
}

/**
 * Lower-cases header names and joins repeated values with ", ".
 */
export function normalizeHeaders(headers: object): HeaderMap {
  const result: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.map(String).join(', ');
    }
  }
  return result;
}

function extractSetCookie(headers: object): string[] {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== 'set-cookie') {
      continue;
    }
    if (Array.isArray(value)) {
      return value.map(String);
    }
    if (typeof value === 'string') {
      return [value];
    }
  }
  return [];
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8');
  }
  return Buffer.alloc(0);
}

/**
 * Creates an HTTP transport.
 */
export function createTransport(config: PipelineConfig, logger?: Logger): HttpTransport {
  return new AxiosTransport(config, logger);
}
