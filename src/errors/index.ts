/**
 * Error types for the request pipeline.
 */

import { HttpStatusCategory } from '../status/index.js';

/**
 * Error kinds raised by the pipeline.
 */
export enum ApiErrorKind {
  /** The descriptor's URL could not be formed, or an upload file is missing. */
  InvalidUrl = 'invalid_url',
  /** A body could not be serialized, or a response did not match the expected shape. */
  DataConversionFailed = 'data_conversion_failed',
  /** One element of a list response could not be converted. */
  IndexedConversion = 'indexed_conversion_error',
  /** The connectivity pre-check reported the device offline. */
  NoNetwork = 'no_network',
  /** Socket-level failure while sending. */
  NetworkError = 'network_error',
  /** The server answered with a non-success status. */
  HttpError = 'http_error',
  /** Unexpected failure anywhere in the pipeline. */
  InvalidResponse = 'invalid_response',
  /** The caller aborted the request. */
  Cancelled = 'cancelled',
  /** Invalid pipeline configuration. */
  Configuration = 'configuration_error',
}

/**
 * Additional error details.
 */
export interface ApiErrorDetails {
  /** Status category for HTTP errors. */
  status?: HttpStatusCategory;
  /** Raw HTTP status code for HTTP errors. */
  statusCode?: number;
  /** Offending element index for indexed conversion errors. */
  index?: number;
  /** Low-level error code (ECONNREFUSED, ENOTFOUND, ...). */
  code?: string;
  /** Original error. */
  cause?: unknown;
}

/**
 * Pipeline error.
 */
export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly details: ApiErrorDetails;

  constructor(kind: ApiErrorKind, message: string, details: ApiErrorDetails = {}) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }

  /** Status category, set for {@link ApiErrorKind.HttpError}. */
  get status(): HttpStatusCategory | undefined {
    return this.details.status;
  }

  /** Element index, set for {@link ApiErrorKind.IndexedConversion}. */
  get index(): number | undefined {
    return this.details.index;
  }

  static invalidUrl(message = 'Invalid URL formation.', cause?: unknown): ApiError {
    return new ApiError(ApiErrorKind.InvalidUrl, message, { cause });
  }

  static dataConversion(message = 'Failed to convert data.', cause?: unknown): ApiError {
    return new ApiError(ApiErrorKind.DataConversionFailed, message, { cause });
  }

  static indexedConversion(index: number, message: string, cause?: unknown): ApiError {
    return new ApiError(ApiErrorKind.IndexedConversion, message, { index, cause });
  }

  static noNetwork(): ApiError {
    return new ApiError(ApiErrorKind.NoNetwork, 'No internet connection.');
  }

  static network(message: string, code?: string, cause?: unknown): ApiError {
    return new ApiError(ApiErrorKind.NetworkError, message, { code, cause });
  }

  static http(status: HttpStatusCategory, statusCode?: number): ApiError {
    const suffix = statusCode !== undefined ? ` (${statusCode})` : '';
    return new ApiError(
      ApiErrorKind.HttpError,
      `HTTP Error with status code: ${status}${suffix}`,
      { status, statusCode }
    );
  }

  static invalidResponse(cause?: unknown): ApiError {
    return new ApiError(ApiErrorKind.InvalidResponse, 'Invalid response.', { cause });
  }

  static cancelled(): ApiError {
    return new ApiError(ApiErrorKind.Cancelled, 'Request was cancelled.');
  }

  static configuration(message: string): ApiError {
    return new ApiError(ApiErrorKind.Configuration, message);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.details.status,
      statusCode: this.details.statusCode,
      index: this.details.index,
      code: this.details.code,
    };
  }
}

/**
 * Type guard for ApiError.
 */
export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * Coarse failure state a UI layer renders for a failed call.
 */
export type FailureState = 'noNetwork' | 'unauthorized' | 'noData' | 'serverError' | 'unexpected';

/**
 * Maps an error to the failure state a screen should show.
 */
export function toFailureState(error: unknown): FailureState {
  if (!isApiError(error)) {
    return 'unexpected';
  }

  switch (error.kind) {
    case ApiErrorKind.NoNetwork:
      return 'noNetwork';
    case ApiErrorKind.HttpError:
      switch (error.status) {
        case HttpStatusCategory.NotAuthorized:
          return 'unauthorized';
        case HttpStatusCategory.NotFound:
          return 'noData';
        case HttpStatusCategory.ServerError:
          return 'serverError';
        default:
          return 'unexpected';
      }
    default:
      return 'unexpected';
  }
}
