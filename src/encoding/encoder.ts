/**
 * Turns request descriptors into transport-ready requests.
 */

import { readFile, stat } from 'node:fs/promises';
import FormData from 'form-data';
import { ApiError, isApiError } from '../errors/index.js';
import {
  DEFAULT_HEADERS,
  mergeHeaders,
  resolveAuthHeaders,
  setHeader,
  type HeaderMap,
  type RequestDescriptor,
} from '../types/descriptor.js';
import type { HttpMethod } from '../types/method.js';
import type { FormPart } from '../types/task.js';

/**
 * Wire-level request. Built fresh for every attempt and never resent.
 */
export interface EncodedRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: HeaderMap;
  readonly body?: Buffer;
  /** Query parameters appended to the URL, kept for logging. */
  readonly parameters?: Readonly<Record<string, unknown>>;
}

/**
 * Encodes each task shape of a {@link RequestDescriptor}.
 */
export class TaskEncoder {
  private readonly defaultHeaders: Readonly<HeaderMap>;

  constructor(defaultHeaders: Readonly<HeaderMap> = DEFAULT_HEADERS) {
    this.defaultHeaders = defaultHeaders;
  }

  /**
   * Builds the request for one attempt. Auth headers are read here, so a
   * second call after a token refresh carries the new token.
   *
   * @throws {ApiError} `InvalidUrl` for a malformed URL or missing upload
   *   file, `DataConversionFailed` for a body that cannot be serialized or
   *   a resume offset that is not a non-negative integer.
   */
  async encode(descriptor: RequestDescriptor): Promise<EncodedRequest> {
    const url = parseUrl(descriptor.baseUrl + descriptor.path);
    const authHeaders = await resolveAuthHeaders(descriptor);
    const headers = mergeHeaders(this.defaultHeaders, descriptor.headers, authHeaders);
    const method = descriptor.method;
    const task = descriptor.task;

    switch (task.type) {
      case 'plain':
      case 'download':
        return { method, url: url.toString(), headers };

      case 'parameters':
        appendQuery(url, task.parameters);
        return { method, url: url.toString(), headers, parameters: task.parameters };

      case 'encodedBody': {
        const body = Buffer.from(serializeJson(task.body), 'utf8');
        setHeader(headers, 'Content-Type', 'application/json');
        setHeader(headers, 'Content-Length', String(body.length));
        return { method, url: url.toString(), headers, body };
      }

      case 'uploadFile': {
        const body = await readUploadFile(task.filePath);
        setHeader(headers, 'Content-Length', String(body.length));
        return { method, url: url.toString(), headers, body };
      }

      case 'uploadMultipart': {
        const form = buildForm(task.fields);
        const body = form.getBuffer();
        setHeader(headers, 'Content-Type', `multipart/form-data; boundary=${form.getBoundary()}`);
        setHeader(headers, 'Content-Length', String(body.length));
        return { method, url: url.toString(), headers, body };
      }

      case 'downloadResumable':
        if (task.offset !== undefined) {
          if (!Number.isSafeInteger(task.offset) || task.offset < 0) {
            throw ApiError.dataConversion(`Invalid resume offset: ${task.offset}`);
          }
          setHeader(headers, 'Range', `bytes=${task.offset}-`);
        }
        return { method, url: url.toString(), headers };
    }
  }
}

function parseUrl(fullUrl: string): URL {
  if (fullUrl.trim() === '') {
    throw ApiError.invalidUrl('Request URL is empty');
  }
  try {
    return new URL(fullUrl);
  } catch (error) {
    throw ApiError.invalidUrl(`Invalid URL: ${fullUrl}`, error);
  }
}

/**
 * Appends parameters to the URL's query. Arrays repeat the key;
 * null and undefined entries are skipped.
 */
function appendQuery(url: URL, parameters: Readonly<Record<string, unknown>>): void {
  for (const [key, value] of Object.entries(parameters)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item === null || item === undefined) {
        continue;
      }
      url.searchParams.append(key, stringifyParameter(item));
    }
  }
}

function stringifyParameter(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return serializeJson(value);
  }
  return String(value);
}

function serializeJson(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch (error) {
    throw ApiError.dataConversion('Request body could not be serialized to JSON', error);
  }
  if (json === undefined) {
    throw ApiError.dataConversion('Request body has no JSON representation');
  }
  return json;
}

async function readUploadFile(filePath: string): Promise<Buffer> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw ApiError.invalidUrl(`Upload path is not a file: ${filePath}`);
    }
    return await readFile(filePath);
  } catch (error) {
    if (isApiError(error)) {
      throw error;
    }
    throw ApiError.invalidUrl(`Upload file not found: ${filePath}`, error);
  }
}

function buildForm(fields: Readonly<Record<string, FormPart>>): FormData {
  const form = new FormData();
  for (const [name, part] of Object.entries(fields)) {
    switch (part.type) {
      case 'binary':
        form.append(name, Buffer.from(part.data), {
          filename: part.fileName,
          contentType: part.mimeType,
        });
        break;
      case 'text':
        form.append(name, String(part.value));
        break;
    }
  }
  return form;
}
