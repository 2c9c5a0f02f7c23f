/**
 * Configuration for the request pipeline.
 */

import { tmpdir } from 'node:os';
import { z } from 'zod';
import { ApiError } from '../errors/index.js';
import { LogLevel, parseLogLevel } from '../observability/logging.js';
import { DEFAULT_HEADERS, setHeader, type HeaderMap } from '../types/descriptor.js';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 60000;

/** Default number of redirects followed per attempt. */
export const DEFAULT_MAX_REDIRECTS = 5;

/**
 * Options accepted by {@link PipelineConfig.fromOptions}.
 */
export interface PipelineConfigOptions {
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Redirects followed per attempt. */
  maxRedirects?: number;
  /** Upper bound on a buffered response body. */
  maxResponseBytes?: number;
  /** Directory downloads are written to. Defaults to the OS temp directory. */
  downloadDirectory?: string;
  /** Log request and response bodies. */
  logBodies?: boolean;
  /** Minimum level for the default console logger. */
  logLevel?: LogLevel;
  /** Headers every request starts from. */
  defaultHeaders?: HeaderMap;
}

const configSchema = z.object({
  timeout: z.number().int().positive(),
  maxRedirects: z.number().int().min(0),
  maxResponseBytes: z.number().int().positive().optional(),
  downloadDirectory: z.string().min(1),
  logBodies: z.boolean(),
  logLevel: z.nativeEnum(LogLevel),
  defaultHeaders: z.record(z.string()),
});

/**
 * Validated, immutable pipeline configuration.
 */
export class PipelineConfig {
  readonly timeout: number;
  readonly maxRedirects: number;
  readonly maxResponseBytes?: number;
  readonly downloadDirectory: string;
  readonly logBodies: boolean;
  readonly logLevel: LogLevel;
  readonly defaultHeaders: Readonly<HeaderMap>;

  private constructor(values: z.infer<typeof configSchema>) {
    this.timeout = values.timeout;
    this.maxRedirects = values.maxRedirects;
    this.maxResponseBytes = values.maxResponseBytes;
    this.downloadDirectory = values.downloadDirectory;
    this.logBodies = values.logBodies;
    this.logLevel = values.logLevel;
    this.defaultHeaders = Object.freeze({ ...values.defaultHeaders });
  }

  static builder(): PipelineConfigBuilder {
    return new PipelineConfigBuilder();
  }

  /**
   * Validates options and fills defaults.
   *
   * @throws {ApiError} Configuration error naming the first invalid field.
   */
  static fromOptions(options: PipelineConfigOptions = {}): PipelineConfig {
    const parsed = configSchema.safeParse({
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      maxRedirects: options.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
      maxResponseBytes: options.maxResponseBytes,
      downloadDirectory: options.downloadDirectory ?? tmpdir(),
      logBodies: options.logBodies ?? true,
      logLevel: options.logLevel ?? LogLevel.Info,
      defaultHeaders: options.defaultHeaders ?? { ...DEFAULT_HEADERS },
    });

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? issue.path.join('.') : 'config';
      throw ApiError.configuration(`Invalid ${field}: ${issue?.message ?? 'validation failed'}`);
    }

    return new PipelineConfig(parsed.data);
  }

  /**
   * Reads configuration from `NETWORK_*` environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const builder = new PipelineConfigBuilder();

    const timeout = parseInteger(env['NETWORK_TIMEOUT_MS'], 'NETWORK_TIMEOUT_MS');
    if (timeout !== undefined) {
      builder.timeout(timeout);
    }

    const maxRedirects = parseInteger(env['NETWORK_MAX_REDIRECTS'], 'NETWORK_MAX_REDIRECTS');
    if (maxRedirects !== undefined) {
      builder.maxRedirects(maxRedirects);
    }

    const downloadDir = env['NETWORK_DOWNLOAD_DIR'];
    if (downloadDir) {
      builder.downloadDirectory(downloadDir);
    }

    const logBodies = env['NETWORK_LOG_BODIES'];
    if (logBodies) {
      builder.logBodies(!['false', '0', 'no', 'off'].includes(logBodies.trim().toLowerCase()));
    }

    const logLevel = env['NETWORK_LOG_LEVEL'];
    if (logLevel) {
      builder.logLevel(parseLogLevel(logLevel));
    }

    return builder.build();
  }

  /**
   * Timeout in seconds, for display.
   */
  getTimeoutSecs(): number {
    return this.timeout / 1000;
  }
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw ApiError.configuration(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Builder for PipelineConfig.
 */
export class PipelineConfigBuilder {
  private readonly options: PipelineConfigOptions = {};
  private headers: HeaderMap = { ...DEFAULT_HEADERS };

  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  timeoutSecs(secs: number): this {
    this.options.timeout = secs * 1000;
    return this;
  }

  maxRedirects(count: number): this {
    this.options.maxRedirects = count;
    return this;
  }

  maxResponseBytes(bytes: number): this {
    this.options.maxResponseBytes = bytes;
    return this;
  }

  downloadDirectory(path: string): this {
    this.options.downloadDirectory = path;
    return this;
  }

  logBodies(enabled: boolean): this {
    this.options.logBodies = enabled;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.options.logLevel = level;
    return this;
  }

  /**
   * Adds or replaces a default header.
   */
  header(name: string, value: string): this {
    setHeader(this.headers, name, value);
    return this;
  }

  /**
   * Replaces the default header set.
   */
  defaultHeaders(headers: HeaderMap): this {
    this.headers = { ...headers };
    return this;
  }

  build(): PipelineConfig {
    return PipelineConfig.fromOptions({ ...this.options, defaultHeaders: this.headers });
  }
}
