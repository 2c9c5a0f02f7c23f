/**
 * Declarative description of a single network call.
 */

import type { HttpMethod } from './method.js';
import { RequestTask } from './task.js';
import type { TlsPinningPolicy } from './tls.js';

/** Header name to value mapping; insertion order is kept. */
export type HeaderMap = Record<string, string>;

/**
 * Auth headers, either fixed or read on every encode so a refreshed
 * token is picked up by the retry.
 */
export type HeaderSource = HeaderMap | (() => HeaderMap | Promise<HeaderMap>);

/**
 * Describes one logical network call before it is turned into wire bytes.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly baseUrl: string;
  readonly path: string;
  readonly task: RequestTask;
  readonly headers: HeaderMap;
  /** Merged over `headers`; wins on key collision. */
  readonly authHeaders: HeaderSource;
  /** Whether a 401 on this call may trigger a token refresh. */
  readonly isAuthorized: boolean;
  readonly tlsPolicy?: TlsPinningPolicy;
}

/**
 * Fields accepted by {@link defineRequest}.
 */
export interface RequestDefinition {
  method: HttpMethod;
  baseUrl: string;
  path: string;
  task?: RequestTask;
  headers?: HeaderMap;
  authHeaders?: HeaderSource;
  isAuthorized?: boolean;
  tlsPolicy?: TlsPinningPolicy;
}

/** Headers every request starts from. */
export const DEFAULT_HEADERS: Readonly<HeaderMap> = Object.freeze({
  'Content-Type': 'application/json',
  Accept: '*/*',
});

/**
 * Builds a frozen descriptor with defaults for the optional fields.
 */
export function defineRequest(definition: RequestDefinition): RequestDescriptor {
  return Object.freeze({
    method: definition.method,
    baseUrl: definition.baseUrl,
    path: definition.path,
    task: definition.task ?? RequestTask.plain(),
    headers: { ...definition.headers },
    authHeaders: definition.authHeaders ?? {},
    isAuthorized: definition.isAuthorized ?? false,
    tlsPolicy: definition.tlsPolicy,
  });
}

/**
 * Reads the current auth headers of a descriptor.
 */
export async function resolveAuthHeaders(descriptor: RequestDescriptor): Promise<HeaderMap> {
  const source = descriptor.authHeaders;
  if (typeof source === 'function') {
    return { ...(await source()) };
  }
  return { ...source };
}

/**
 * Merges header layers left to right. Names compare case-insensitively;
 * a later layer replaces the earlier entry and its spelling.
 */
export function mergeHeaders(...layers: ReadonlyArray<Readonly<HeaderMap>>): HeaderMap {
  const merged: HeaderMap = {};
  for (const layer of layers) {
    for (const [name, value] of Object.entries(layer)) {
      setHeader(merged, name, value);
    }
  }
  return merged;
}

/**
 * Sets a header in place, dropping any entry whose name differs only in case.
 */
export function setHeader(headers: HeaderMap, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const existing of Object.keys(headers)) {
    if (existing !== name && existing.toLowerCase() === lower) {
      delete headers[existing];
    }
  }
  headers[name] = value;
}

/**
 * Case-insensitive header lookup.
 */
export function getHeader(headers: Readonly<HeaderMap>, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}
