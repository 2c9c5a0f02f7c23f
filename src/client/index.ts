/**
 * Network client facade.
 */

import type { z } from 'zod';
import { PipelineConfig } from '../config/index.js';
import { AlwaysOnlineProbe, type ConnectivityProbe } from '../connectivity/index.js';
import { ConverterRegistry, ResponseDecoder } from '../decoding/registry.js';
import type { Converter, ObjectTag, TypeTag } from '../decoding/type-tag.js';
import type { ApiError } from '../errors/index.js';
import { RequestExecutor, type PerformOptions } from '../executor/executor.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import { RefreshCoordinator, type TokenRefreshHandler } from '../refresh/coordinator.js';
import { AxiosTransport, type HttpTransport } from '../transport/index.js';
import type { RequestDescriptor } from '../types/descriptor.js';
import type { DownloadedFile, NetworkResponse } from '../types/response.js';
import type { Result } from '../types/result.js';
import type { TlsPolicyProvider } from '../types/tls.js';

/**
 * Options for creating a network client.
 */
export interface NetworkClientOptions {
  /** Pipeline configuration. Defaults to {@link PipelineConfig.fromOptions}. */
  config?: PipelineConfig;
  /** Logger instance. Defaults to a console logger at the configured level. */
  logger?: Logger;
  /** Custom transport (for testing). */
  transport?: HttpTransport;
  /** Connectivity pre-check. */
  connectivity?: ConnectivityProbe;
  /** Shared converter registry. */
  registry?: ConverterRegistry;
  /** Token refresh handler for authorized requests. */
  refreshHandler?: TokenRefreshHandler;
  tlsPolicyProvider?: TlsPolicyProvider;
}

/**
 * Entry point wiring configuration, transport, converters, token refresh
 * and connectivity into one executor.
 */
export class NetworkClient {
  readonly registry: ConverterRegistry;
  readonly refreshCoordinator: RefreshCoordinator;

  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly transport: HttpTransport;
  private readonly executor: RequestExecutor;

  constructor(options: NetworkClientOptions = {}) {
    this.config = options.config ?? PipelineConfig.fromOptions();
    this.logger = options.logger ?? new ConsoleLogger({ level: this.config.logLevel });
    this.transport = options.transport ?? new AxiosTransport(this.config, this.logger);
    this.registry = options.registry ?? new ConverterRegistry();
    this.refreshCoordinator = new RefreshCoordinator(this.logger);
    if (options.refreshHandler) {
      this.refreshCoordinator.register(options.refreshHandler);
    }

    this.executor = new RequestExecutor({
      transport: this.transport,
      config: this.config,
      decoder: new ResponseDecoder(this.registry),
      refreshCoordinator: this.refreshCoordinator,
      connectivity: options.connectivity ?? new AlwaysOnlineProbe(),
      logger: this.logger,
      tlsPolicyProvider: options.tlsPolicyProvider,
    });
  }

  static builder(): NetworkClientBuilder {
    return new NetworkClientBuilder();
  }

  /**
   * Creates a client configured from `NETWORK_*` environment variables.
   */
  static fromEnv(): NetworkClient {
    return new NetworkClient({ config: PipelineConfig.fromEnv() });
  }

  register<T>(type: ObjectTag<T>, converter: Converter<T>): this {
    this.registry.register(type, converter);
    return this;
  }

  registerSchema<T>(type: ObjectTag<T>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): this {
    this.registry.registerSchema(type, schema);
    return this;
  }

  registerRefreshHandler(handler: TokenRefreshHandler): this {
    this.refreshCoordinator.register(handler);
    return this;
  }

  clearRefreshHandler(): this {
    this.refreshCoordinator.clear();
    return this;
  }

  getConfig(): PipelineConfig {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getExecutor(): RequestExecutor {
    return this.executor;
  }

  perform<T>(descriptor: RequestDescriptor, type: TypeTag<T>, options?: PerformOptions): Promise<T> {
    return this.executor.perform(descriptor, type, options);
  }

  performWithResponse<T>(
    descriptor: RequestDescriptor,
    type: TypeTag<T>,
    options?: PerformOptions
  ): Promise<NetworkResponse<T>> {
    return this.executor.performWithResponse(descriptor, type, options);
  }

  performSuccess(descriptor: RequestDescriptor, options?: PerformOptions): Promise<void> {
    return this.executor.performSuccess(descriptor, options);
  }

  performDownload(descriptor: RequestDescriptor, options?: PerformOptions): Promise<DownloadedFile> {
    return this.executor.performDownload(descriptor, options);
  }

  performResult<T>(
    descriptor: RequestDescriptor,
    type: TypeTag<T>,
    options?: PerformOptions
  ): Promise<Result<T, ApiError>> {
    return this.executor.performResult(descriptor, type, options);
  }

  performResultWithResponse<T>(
    descriptor: RequestDescriptor,
    type: TypeTag<T>,
    options?: PerformOptions
  ): Promise<Result<NetworkResponse<T>, ApiError>> {
    return this.executor.performResultWithResponse(descriptor, type, options);
  }

  performSuccessResult(descriptor: RequestDescriptor, options?: PerformOptions): Promise<Result<void, ApiError>> {
    return this.executor.performSuccessResult(descriptor, options);
  }

  performDownloadResult(
    descriptor: RequestDescriptor,
    options?: PerformOptions
  ): Promise<Result<DownloadedFile, ApiError>> {
    return this.executor.performDownloadResult(descriptor, options);
  }
}

/**
 * Builder for creating NetworkClient instances.
 */
export class NetworkClientBuilder {
  private options: NetworkClientOptions = {};

  config(config: PipelineConfig): this {
    this.options.config = config;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Sets a custom transport.
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  connectivity(probe: ConnectivityProbe): this {
    this.options.connectivity = probe;
    return this;
  }

  registry(registry: ConverterRegistry): this {
    this.options.registry = registry;
    return this;
  }

  refreshHandler(handler: TokenRefreshHandler): this {
    this.options.refreshHandler = handler;
    return this;
  }

  tlsPolicyProvider(provider: TlsPolicyProvider): this {
    this.options.tlsPolicyProvider = provider;
    return this;
  }

  build(): NetworkClient {
    return new NetworkClient(this.options);
  }
}

/**
 * Creates a network client.
 */
export function createClient(options?: NetworkClientOptions): NetworkClient {
  return new NetworkClient(options);
}
