/**
 * Data model exports.
 */

export type { HttpMethod } from './method.js';
export { HTTP_METHODS, isHttpMethod } from './method.js';

export { FormPart, RequestTask, describeTask } from './task.js';
export type { RequestTaskType } from './task.js';

export type { TlsPinningPolicy, TlsPolicyProvider } from './tls.js';

export type {
  HeaderMap,
  HeaderSource,
  RequestDescriptor,
  RequestDefinition,
} from './descriptor.js';
export {
  DEFAULT_HEADERS,
  defineRequest,
  resolveAuthHeaders,
  mergeHeaders,
  setHeader,
  getHeader,
} from './descriptor.js';

export type { Result, Success, Failure } from './result.js';
export {
  success,
  failure,
  isSuccess,
  isFailure,
  mapResult,
  mapError,
  match,
  unwrap,
} from './result.js';

export type { Cookie, NetworkResponse, DownloadedFile } from './response.js';
export { cookieHeader, parseSetCookieHeader, splitSetCookie } from './response.js';

export { AppEnvironment, buildBaseUrl } from './target.js';
export type { TargetOptions } from './target.js';
