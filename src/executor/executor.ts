/**
 * Runs request descriptors through encode, send, classify, refresh and
 * decode.
 */

import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { Readable } from 'node:stream';
import { finished, pipeline } from 'node:stream/promises';
import { PipelineConfig } from '../config/index.js';
import { AlwaysOnlineProbe, type ConnectivityProbe } from '../connectivity/index.js';
import { ResponseDecoder } from '../decoding/registry.js';
import type { TypeTag } from '../decoding/type-tag.js';
import { TaskEncoder, type EncodedRequest } from '../encoding/encoder.js';
import { ApiError, isApiError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { NetworkLogger } from '../observability/network-logger.js';
import { RefreshCoordinator } from '../refresh/coordinator.js';
import { HttpStatusCategory, classifyStatus } from '../status/index.js';
import type { HttpTransport, RawResponse, StreamedResponse } from '../transport/index.js';
import type { RequestDescriptor } from '../types/descriptor.js';
import { parseSetCookieHeader, type DownloadedFile, type NetworkResponse } from '../types/response.js';
import { failure, success, type Result } from '../types/result.js';
import { describeTask } from '../types/task.js';
import type { TlsPinningPolicy, TlsPolicyProvider } from '../types/tls.js';

/**
 * Collaborators of a {@link RequestExecutor}. Only the transport is required.
 */
export interface ExecutorDependencies {
  transport: HttpTransport;
  config?: PipelineConfig;
  encoder?: TaskEncoder;
  decoder?: ResponseDecoder;
  refreshCoordinator?: RefreshCoordinator;
  connectivity?: ConnectivityProbe;
  logger?: Logger;
  /** Pinning policy for descriptors that carry none. */
  tlsPolicyProvider?: TlsPolicyProvider;
}

/**
 * Per-call options.
 */
export interface PerformOptions {
  signal?: AbortSignal;
}

type Attempt<R> = { request: EncodedRequest; response: R };

/**
 * Executes requests. A 401 on an authorized descriptor triggers one
 * shared token refresh and, if it succeeds, exactly one retry.
 */
export class RequestExecutor {
  readonly config: PipelineConfig;
  private readonly transport: HttpTransport;
  private readonly encoder: TaskEncoder;
  private readonly decoder: ResponseDecoder;
  private readonly refreshCoordinator: RefreshCoordinator;
  private readonly connectivity: ConnectivityProbe;
  private readonly logger: Logger;
  private readonly networkLogger: NetworkLogger;
  private readonly tlsPolicyProvider?: TlsPolicyProvider;

  constructor(deps: ExecutorDependencies) {
    this.config = deps.config ?? PipelineConfig.fromOptions();
    this.transport = deps.transport;
    this.encoder = deps.encoder ?? new TaskEncoder(this.config.defaultHeaders);
    this.decoder = deps.decoder ?? new ResponseDecoder();
    this.logger = deps.logger ?? new NoopLogger();
    this.refreshCoordinator = deps.refreshCoordinator ?? new RefreshCoordinator(this.logger);
    this.connectivity = deps.connectivity ?? new AlwaysOnlineProbe();
    this.networkLogger = new NetworkLogger(this.logger, { logBodies: this.config.logBodies });
    this.tlsPolicyProvider = deps.tlsPolicyProvider;
  }

  /**
   * Sends the request and decodes the body as `type`.
   *
   * @throws {ApiError}
   */
  async perform<T>(descriptor: RequestDescriptor, type: TypeTag<T>, options: PerformOptions = {}): Promise<T> {
    const { response } = await this.execute(descriptor, options);
    return this.decoder.decode(type, response.body);
  }

  /**
   * Like {@link perform}, also returning status, headers and cookies.
   */
  async performWithResponse<T>(
    descriptor: RequestDescriptor,
    type: TypeTag<T>,
    options: PerformOptions = {}
  ): Promise<NetworkResponse<T>> {
    const { response } = await this.execute(descriptor, options);
    const data = this.decoder.decode(type, response.body);
    const rawSetCookieHeader = response.headers['set-cookie'];
    const cookies = response.setCookie
      ? response.setCookie.flatMap((value) => parseSetCookieHeader(value))
      : parseSetCookieHeader(rawSetCookieHeader);

    const result: NetworkResponse<T> = {
      data,
      statusCode: response.status,
      headers: response.headers,
      cookies,
    };
    if (rawSetCookieHeader !== undefined) {
      result.rawSetCookieHeader = rawSetCookieHeader;
    }
    return result;
  }

  /**
   * Sends the request and discards the body.
   */
  async performSuccess(descriptor: RequestDescriptor, options: PerformOptions = {}): Promise<void> {
    await this.execute(descriptor, options);
  }

  /**
   * Streams the response body to `<downloadDirectory>/<last URL segment>`.
   * The file is only opened once the status is a success.
   */
  async performDownload(descriptor: RequestDescriptor, options: PerformOptions = {}): Promise<DownloadedFile> {
    const signal = options.signal;
    await this.ensureOnline(signal);
    const tlsPolicy = await this.resolveTlsPolicy(descriptor);

    const first = await this.streamAttempt(descriptor, tlsPolicy, options, 1);
    const category = classifyStatus(first.response.status);
    if (category === HttpStatusCategory.Success) {
      return this.writeDownload(descriptor, first, signal);
    }

    if (category === HttpStatusCategory.NotAuthorized && descriptor.isAuthorized) {
      await this.drain(first.response.body);
      if (await this.waitForRefresh(signal)) {
        const retry = await this.streamAttempt(descriptor, tlsPolicy, options, 2);
        if (classifyStatus(retry.response.status) === HttpStatusCategory.Success) {
          return this.writeDownload(descriptor, retry, signal);
        }
        retry.response.body.destroy();
        this.logger.warn('Retry after token refresh failed', { url: retry.request.url, status: retry.response.status });
      }
      throw ApiError.http(HttpStatusCategory.NotAuthorized, first.response.status);
    }

    first.response.body.destroy();
    throw ApiError.http(category, first.response.status);
  }

  performResult<T>(
    descriptor: RequestDescriptor,
    type: TypeTag<T>,
    options?: PerformOptions
  ): Promise<Result<T, ApiError>> {
    return toResult(() => this.perform(descriptor, type, options));
  }

  performResultWithResponse<T>(
    descriptor: RequestDescriptor,
    type: TypeTag<T>,
    options?: PerformOptions
  ): Promise<Result<NetworkResponse<T>, ApiError>> {
    return toResult(() => this.performWithResponse(descriptor, type, options));
  }

  performSuccessResult(descriptor: RequestDescriptor, options?: PerformOptions): Promise<Result<void, ApiError>> {
    return toResult(() => this.performSuccess(descriptor, options));
  }

  performDownloadResult(
    descriptor: RequestDescriptor,
    options?: PerformOptions
  ): Promise<Result<DownloadedFile, ApiError>> {
    return toResult(() => this.performDownload(descriptor, options));
  }

  private async execute(descriptor: RequestDescriptor, options: PerformOptions): Promise<Attempt<RawResponse>> {
    const signal = options.signal;
    await this.ensureOnline(signal);
    const tlsPolicy = await this.resolveTlsPolicy(descriptor);

    const first = await this.sendAttempt(descriptor, tlsPolicy, options, 1);
    const category = classifyStatus(first.response.status);
    if (category === HttpStatusCategory.Success) {
      return first;
    }

    if (category === HttpStatusCategory.NotAuthorized && descriptor.isAuthorized) {
      const refreshed = await this.waitForRefresh(signal);
      if (refreshed) {
        // Re-encoded so the retry carries the refreshed auth headers.
        const retry = await this.sendAttempt(descriptor, tlsPolicy, options, 2);
        if (classifyStatus(retry.response.status) === HttpStatusCategory.Success) {
          return retry;
        }
        this.logger.warn('Retry after token refresh failed', { url: retry.request.url, status: retry.response.status });
      }
      throw ApiError.http(HttpStatusCategory.NotAuthorized, first.response.status);
    }

    throw ApiError.http(category, first.response.status);
  }

  private async sendAttempt(
    descriptor: RequestDescriptor,
    tlsPolicy: TlsPinningPolicy | undefined,
    options: PerformOptions,
    attempt: number
  ): Promise<Attempt<RawResponse>> {
    const request = await this.encoder.encode(descriptor);
    throwIfAborted(options.signal);
    this.logRequest(descriptor, request, attempt);

    try {
      const response = await this.transport.send(request, { signal: options.signal, tlsPolicy });
      this.networkLogger.logResponse({
        method: request.method,
        url: request.url,
        statusCode: response.status,
        body: response.body,
        attempt,
      });
      return { request, response };
    } catch (error) {
      this.networkLogger.logResponse({ method: request.method, url: request.url, error, attempt });
      throw error;
    }
  }

  private async streamAttempt(
    descriptor: RequestDescriptor,
    tlsPolicy: TlsPinningPolicy | undefined,
    options: PerformOptions,
    attempt: number
  ): Promise<Attempt<StreamedResponse>> {
    const request = await this.encoder.encode(descriptor);
    throwIfAborted(options.signal);
    this.logRequest(descriptor, request, attempt);

    try {
      const response = await this.transport.stream(request, { signal: options.signal, tlsPolicy });
      this.networkLogger.logResponse({
        method: request.method,
        url: request.url,
        statusCode: response.status,
        body: '[stream]',
        attempt,
      });
      return { request, response };
    } catch (error) {
      this.networkLogger.logResponse({ method: request.method, url: request.url, error, attempt });
      throw error;
    }
  }

  private logRequest(descriptor: RequestDescriptor, request: EncodedRequest, attempt: number): void {
    this.networkLogger.logRequest({
      method: request.method,
      url: request.url,
      task: describeTask(descriptor.task),
      headers: request.headers,
      parameters: request.parameters,
      // Only JSON bodies are worth printing.
      body: descriptor.task.type === 'encodedBody' ? request.body : undefined,
      attempt,
    });
  }

  private async ensureOnline(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    if (!(await this.connectivity.isOnline())) {
      this.logger.warn('Request skipped: device is offline');
      throw ApiError.noNetwork();
    }
  }

  private async resolveTlsPolicy(descriptor: RequestDescriptor): Promise<TlsPinningPolicy | undefined> {
    if (descriptor.tlsPolicy) {
      return descriptor.tlsPolicy;
    }
    return this.tlsPolicyProvider ? await this.tlsPolicyProvider.getPolicy() : undefined;
  }

  /**
   * Waits for the shared refresh. An abort releases this caller only;
   * the refresh itself keeps running for the others.
   */
  private waitForRefresh(signal?: AbortSignal): Promise<boolean> {
    const refresh = this.refreshCoordinator.attemptRefresh();
    if (!signal) {
      return refresh;
    }
    if (signal.aborted) {
      return Promise.reject(ApiError.cancelled());
    }
    return new Promise<boolean>((resolve, reject) => {
      const onAbort = (): void => reject(ApiError.cancelled());
      signal.addEventListener('abort', onAbort, { once: true });
      void refresh.then(
        (refreshed) => {
          signal.removeEventListener('abort', onAbort);
          resolve(refreshed);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async drain(body: Readable): Promise<void> {
    body.resume();
    try {
      await finished(body);
    } catch (error) {
      this.logger.debug('Discarded response body ended with an error', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async writeDownload(
    descriptor: RequestDescriptor,
    attempt: Attempt<StreamedResponse>,
    signal?: AbortSignal
  ): Promise<DownloadedFile> {
    const { request, response } = attempt;
    const localPath = join(this.config.downloadDirectory, downloadFileName(request.url));
    const task = descriptor.task;
    const append = task.type === 'downloadResumable' && task.offset !== undefined && response.status === 206;

    try {
      await mkdir(this.config.downloadDirectory, { recursive: true });
      const sink = createWriteStream(localPath, { flags: append ? 'a' : 'w' });
      await pipeline(response.body, sink, { signal });
      this.logger.debug('Download complete', { localPath, bytes: sink.bytesWritten, append });
      return {
        localPath,
        remoteUrl: request.url,
        statusCode: response.status,
        headers: response.headers,
        bytesWritten: sink.bytesWritten,
      };
    } catch (error) {
      response.body.destroy();
      if (signal?.aborted) {
        throw ApiError.cancelled();
      }
      throw ApiError.invalidResponse(error);
    }
  }
}

/**
 * Last non-empty path segment of the URL, decoded, or "download" when
 * there is none or it would leave the download directory.
 */
export function downloadFileName(url: string): string {
  const segments = new URL(url).pathname.split('/').filter((s) => s !== '');
  const last = segments[segments.length - 1];
  if (last === undefined) {
    return 'download';
  }
  let name: string;
  try {
    name = decodeURIComponent(last);
  } catch {
    name = last;
  }
  if (name === '.' || name === '..' || /[\\/]/.test(name)) {
    return 'download';
  }
  return name;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw ApiError.cancelled();
  }
}

async function toResult<T>(run: () => Promise<T>): Promise<Result<T, ApiError>> {
  try {
    return success(await run());
  } catch (error) {
    return failure(isApiError(error) ? error : ApiError.invalidResponse(error));
  }
}
