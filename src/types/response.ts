/**
 * Decoded response wrappers.
 */

import type { HeaderMap } from './descriptor.js';

/**
 * Cookie parsed from a Set-Cookie header.
 */
export interface Cookie {
  name: string;
  value: string;
  expires?: string;
  maxAge?: number;
  domain?: string;
  path?: string;
  secure: boolean;
  httpOnly: boolean;
  sameSite?: string;
}

/**
 * Decoded response data with its status, headers and cookies.
 */
export interface NetworkResponse<T> {
  data: T;
  statusCode: number;
  headers: HeaderMap;
  /** Raw Set-Cookie header value, if present. */
  rawSetCookieHeader?: string;
  cookies: Cookie[];
}

/**
 * Result of a completed file download.
 */
export interface DownloadedFile {
  /** Where the body was written. */
  localPath: string;
  /** URL the body was fetched from. */
  remoteUrl: string;
  statusCode: number;
  headers: HeaderMap;
  bytesWritten: number;
}

/**
 * Returns a ready-to-send Cookie header (`a=1; b=2`), or undefined when
 * the response set no cookies.
 */
export function cookieHeader(response: Pick<NetworkResponse<unknown>, 'cookies'>): string | undefined {
  if (response.cookies.length === 0) {
    return undefined;
  }
  return response.cookies.map((c) => `${c.name}=${c.value}`).join('; ');
}

/**
 * Best-effort parse of a (possibly comma-joined) Set-Cookie header.
 * Malformed cookie strings are dropped.
 */
export function parseSetCookieHeader(headerValue: string | undefined): Cookie[] {
  if (headerValue === undefined || headerValue.trim() === '') {
    return [];
  }

  const cookies: Cookie[] = [];
  for (const part of splitSetCookie(headerValue)) {
    const cookie = parseCookie(part);
    if (cookie) {
      cookies.push(cookie);
    }
  }
  return cookies;
}

/**
 * Splits a merged Set-Cookie header on commas, except the one inside an
 * `Expires=` date. The date runs to the next semicolon or to the comma
 * after its weekday comma.
 */
export function splitSetCookie(headerValue: string): string[] {
  const parts: string[] = [];
  const lower = headerValue.toLowerCase();
  let start = 0;
  let inExpires = false;
  let seenDateComma = false;

  for (let i = 0; i < headerValue.length; i++) {
    const char = headerValue[i];
    if (!inExpires && lower.startsWith('expires=', i)) {
      inExpires = true;
      seenDateComma = false;
    }
    if (inExpires && char === ';') {
      inExpires = false;
    }
    if (char !== ',') {
      continue;
    }
    if (inExpires && !seenDateComma) {
      seenDateComma = true;
      continue;
    }
    inExpires = false;
    const part = headerValue.slice(start, i).trim();
    if (part !== '') {
      parts.push(part);
    }
    start = i + 1;
  }

  const last = headerValue.slice(start).trim();
  if (last !== '') {
    parts.push(last);
  }
  return parts;
}

function parseCookie(raw: string): Cookie | undefined {
  const [pair, ...attributes] = raw.split(';');
  const eq = pair.indexOf('=');
  if (eq <= 0) {
    return undefined;
  }

  const name = pair.slice(0, eq).trim();
  if (name === '' || /[\s",;\\]/.test(name)) {
    return undefined;
  }

  let value = pair.slice(eq + 1).trim();
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    value = value.slice(1, -1);
  }

  const cookie: Cookie = { name, value, secure: false, httpOnly: false };

  for (const attribute of attributes) {
    const idx = attribute.indexOf('=');
    const key = (idx === -1 ? attribute : attribute.slice(0, idx)).trim().toLowerCase();
    const attrValue = idx === -1 ? '' : attribute.slice(idx + 1).trim();

    switch (key) {
      case 'expires':
        cookie.expires = attrValue;
        break;
      case 'max-age': {
        const maxAge = Number.parseInt(attrValue, 10);
        if (Number.isNaN(maxAge)) {
          return undefined;
        }
        cookie.maxAge = maxAge;
        break;
      }
      case 'domain':
        cookie.domain = attrValue;
        break;
      case 'path':
        cookie.path = attrValue;
        break;
      case 'secure':
        cookie.secure = true;
        break;
      case 'httponly':
        cookie.httpOnly = true;
        break;
      case 'samesite':
        cookie.sameSite = attrValue;
        break;
    }
  }

  return cookie;
}
