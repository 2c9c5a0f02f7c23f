/**
 * Request/response log events.
 */

import type { HeaderMap } from '../types/descriptor.js';
import type { Logger } from './logging.js';

const REDACTED = '[REDACTED]';

/** Headers whose values never reach the log. */
const SENSITIVE_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie', 'set-cookie']);

export interface RequestLogEvent {
  method: string;
  url: string;
  /** One-line task description. */
  task?: string;
  headers?: HeaderMap;
  parameters?: Record<string, unknown>;
  body?: Uint8Array | string;
  attempt?: number;
}

export interface ResponseLogEvent {
  method: string;
  url: string;
  statusCode?: number;
  body?: Uint8Array | string;
  error?: unknown;
  attempt?: number;
}

export interface NetworkLoggerOptions {
  /** Include request and response bodies. Defaults to true. */
  logBodies?: boolean;
  /** Keep sensitive header values. Defaults to false. */
  revealSensitiveHeaders?: boolean;
}

/**
 * Formats pipeline traffic into structured log lines.
 *
 * Logging never throws into the caller.
 */
export class NetworkLogger {
  private readonly logger: Logger;
  private readonly logBodies: boolean;
  private readonly revealSensitiveHeaders: boolean;

  constructor(logger: Logger, options: NetworkLoggerOptions = {}) {
    this.logger = logger;
    this.logBodies = options.logBodies ?? true;
    this.revealSensitiveHeaders = options.revealSensitiveHeaders ?? false;
  }

  logRequest(event: RequestLogEvent): void {
    const context: Record<string, unknown> = {
      method: event.method,
      url: event.url,
    };
    if (event.task !== undefined) {
      context.task = event.task;
    }
    if (event.attempt !== undefined) {
      context.attempt = event.attempt;
    }
    if (event.headers && Object.keys(event.headers).length > 0) {
      context.headers = this.redact(event.headers);
    }
    if (event.parameters && Object.keys(event.parameters).length > 0) {
      context.parameters = prettyJson(event.parameters);
    }
    if (this.logBodies && event.body !== undefined && event.body.length > 0) {
      context.body = prettyBody(event.body);
    }

    this.logger.debug(`Will send ${event.method} request for ${event.url}`, context);
  }

  logResponse(event: ResponseLogEvent): void {
    const context: Record<string, unknown> = {
      method: event.method,
      url: event.url,
    };
    if (event.attempt !== undefined) {
      context.attempt = event.attempt;
    }

    if (event.error !== undefined) {
      const error = event.error instanceof Error ? event.error : new Error(String(event.error));
      this.logger.error(
        `${event.statusCode ?? '-'} ${event.method} request for ${event.url} returned Error: ${error.message}`,
        error,
        context
      );
      return;
    }

    if (event.statusCode === undefined) {
      return;
    }

    context.statusCode = event.statusCode;
    if (this.logBodies) {
      context.body =
        event.body !== undefined && event.body.length > 0 ? prettyBody(event.body) : 'Empty or Void...';
    }

    const message = `Did receive response ${event.statusCode} for request ${event.url}`;
    if (event.statusCode >= 200 && event.statusCode < 300) {
      this.logger.debug(message, context);
    } else {
      this.logger.warn(message, context);
    }
  }

  private redact(headers: HeaderMap): HeaderMap {
    if (this.revealSensitiveHeaders) {
      return { ...headers };
    }
    const result: HeaderMap = {};
    for (const [name, value] of Object.entries(headers)) {
      result[name] = SENSITIVE_HEADERS.has(name.toLowerCase()) ? REDACTED : value;
    }
    return result;
  }
}

/**
 * Two-space indented JSON, or `String(value)` when it cannot be encoded.
 */
export function prettyJson(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Pretty-prints a body as JSON when it parses, otherwise as UTF-8 text.
 */
export function prettyBody(body: Uint8Array | string): string {
  const text = typeof body === 'string' ? body : Buffer.from(body).toString('utf8');
  try {
    return prettyJson(JSON.parse(text));
  } catch {
    return text;
  }
}
