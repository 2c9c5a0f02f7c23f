import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { RequestExecutor, downloadFileName } from '../executor.js';
import { PipelineConfig } from '../../config/index.js';
import { StaticConnectivityProbe } from '../../connectivity/index.js';
import { ConverterRegistry, ResponseDecoder } from '../../decoding/registry.js';
import { JsonValue, defineType, listOf } from '../../decoding/type-tag.js';
import { ApiError, ApiErrorKind } from '../../errors/index.js';
import { MockRefreshHandler, MockTransport, jsonResponse } from '../../mocks/index.js';
import { InMemoryLogger } from '../../observability/logging.js';
import { RefreshCoordinator, type TokenRefreshHandler } from '../../refresh/coordinator.js';
import { HttpStatusCategory } from '../../status/index.js';
import { defineRequest, type RequestDefinition, type RequestDescriptor } from '../../types/descriptor.js';
import { RequestTask } from '../../types/task.js';
import type { TlsPinningPolicy } from '../../types/tls.js';

interface User {
  id: number;
  name: string;
}

const UserType = defineType<User>('User');
const BASE = 'https://api.example.com';

function request(path: string, overrides: Partial<RequestDefinition> = {}): RequestDescriptor {
  return defineRequest({ method: 'GET', baseUrl: BASE, path, ...overrides });
}

describe('RequestExecutor', () => {
  let dir: string;
  let transport: MockTransport;
  let probe: StaticConnectivityProbe;
  let coordinator: RefreshCoordinator;
  let logger: InMemoryLogger;
  let executor: RequestExecutor;
  let token: string;

  function authorized(path: string, overrides: Partial<RequestDefinition> = {}): RequestDescriptor {
    return request(path, {
      isAuthorized: true,
      authHeaders: () => ({ Authorization: `Bearer ${token}` }),
      ...overrides,
    });
  }

  function useRefreshHandler(handler: TokenRefreshHandler): void {
    coordinator.register(handler);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'executor-test-'));
    token = 'old-token';
    transport = new MockTransport();
    probe = new StaticConnectivityProbe(true);
    logger = new InMemoryLogger();
    coordinator = new RefreshCoordinator(logger);
    const registry = new ConverterRegistry().register(UserType, (data) => ({
      id: Number(data['id']),
      name: String(data['name']),
    }));
    executor = new RequestExecutor({
      transport,
      config: PipelineConfig.fromOptions({ downloadDirectory: dir }),
      decoder: new ResponseDecoder(registry),
      refreshCoordinator: coordinator,
      connectivity: probe,
      logger,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('perform', () => {
    it('should decode a successful response', async () => {
      transport.onPath('/users/1', jsonResponse(200, { id: 1, name: 'Ada' }));

      const user = await executor.perform(request('/users/1'), UserType);

      expect(user).toEqual({ id: 1, name: 'Ada' });
      expect(transport.getRequestCount()).toBe(1);
    });

    it('should decode a list response', async () => {
      transport.onPath('/users', jsonResponse(200, [{ id: 1, name: 'Ada' }, { id: 2, name: 'Grace' }]));

      const users = await executor.perform(request('/users'), listOf(UserType));

      expect(users.map((u) => u.name)).toEqual(['Ada', 'Grace']);
    });

    it('should fail without sending when offline', async () => {
      probe.setOnline(false);

      await expect(executor.perform(request('/users/1'), UserType)).rejects.toMatchObject({
        kind: ApiErrorKind.NoNetwork,
      });
      expect(transport.getRequestCount()).toBe(0);
    });

    it('should fail without sending when the URL is invalid', async () => {
      await expect(
        executor.perform(request('', { baseUrl: 'not a url' }), UserType)
      ).rejects.toMatchObject({ kind: ApiErrorKind.InvalidUrl });
      expect(transport.getRequestCount()).toBe(0);
    });

    it('should map error statuses to HTTP errors', async () => {
      transport.onPath('/missing', { status: 404 });
      transport.onPath('/broken', { status: 503 });
      transport.onPath('/bad', { status: 422 });

      await expect(executor.perform(request('/missing'), UserType)).rejects.toMatchObject({
        kind: ApiErrorKind.HttpError,
        details: { status: HttpStatusCategory.NotFound, statusCode: 404 },
      });
      await expect(executor.perform(request('/broken'), UserType)).rejects.toMatchObject({
        details: { status: HttpStatusCategory.ServerError, statusCode: 503 },
      });
      await expect(executor.perform(request('/bad'), UserType)).rejects.toMatchObject({
        details: { status: HttpStatusCategory.ClientError, statusCode: 422 },
      });
    });

    it('should fail decoding a body that is not JSON', async () => {
      transport.onPath('/users/1', { status: 200, body: '<html>' });

      await expect(executor.perform(request('/users/1'), UserType)).rejects.toMatchObject({
        kind: ApiErrorKind.DataConversionFailed,
      });
    });

    it('should propagate transport errors without retrying', async () => {
      transport.onPath('/users/1', { status: 0, error: ApiError.network('Network error: socket hang up', 'ECONNRESET') });

      await expect(executor.perform(authorized('/users/1'), UserType)).rejects.toMatchObject({
        kind: ApiErrorKind.NetworkError,
      });
      expect(transport.getRequestCount()).toBe(1);
    });

    it('should log the request and the response', async () => {
      transport.onPath('/users/1', jsonResponse(200, { id: 1, name: 'Ada' }));

      await executor.perform(authorized('/users/1'), UserType);

      expect(logger.getMessages()).toEqual([
        'Will send GET request for https://api.example.com/users/1',
        'Did receive response 200 for request https://api.example.com/users/1',
      ]);
      expect(logger.getEntries()[0]?.context['headers']).toEqual({
        'Content-Type': 'application/json',
        Accept: '*/*',
        Authorization: '[REDACTED]',
      });
      expect(logger.getEntries()[0]?.context['task']).toBe('Plain request');
    });
  });

  describe('token refresh', () => {
    it('should not refresh for requests that are not authorized', async () => {
      const handler = new MockRefreshHandler([true]);
      useRefreshHandler(handler);
      transport.onPath('/public', { status: 401 });

      await expect(executor.perform(request('/public'), UserType)).rejects.toMatchObject({
        details: { status: HttpStatusCategory.NotAuthorized, statusCode: 401 },
      });
      expect(handler.getCallCount()).toBe(0);
      expect(transport.getRequestCount()).toBe(1);
    });

    it('should not retry when the refresh fails', async () => {
      const handler = new MockRefreshHandler([false]);
      useRefreshHandler(handler);
      transport.onPath('/me', { status: 401 });

      await expect(executor.perform(authorized('/me'), UserType)).rejects.toMatchObject({
        kind: ApiErrorKind.HttpError,
        details: { status: HttpStatusCategory.NotAuthorized },
      });
      expect(handler.getCallCount()).toBe(1);
      expect(transport.getRequestCount()).toBe(1);
    });

    it('should not retry without a refresh handler', async () => {
      transport.onPath('/me', { status: 401 });

      await expect(executor.perform(authorized('/me'), UserType)).rejects.toMatchObject({
        details: { status: HttpStatusCategory.NotAuthorized },
      });
      expect(transport.getRequestCount()).toBe(1);
    });

    it('should retry once with refreshed credentials', async () => {
      const handler = new MockRefreshHandler([true], {
        onRefresh: () => {
          token = 'new-token';
        },
      });
      useRefreshHandler(handler);
      transport.onPath('/me', { status: 401 }).onPath('/me', jsonResponse(200, { id: 9, name: 'Lin' }));

      const user = await executor.perform(authorized('/me'), UserType);

      const sent = transport.getRecordedRequests().map((r) => r.request.headers['Authorization']);
      expect(user).toEqual({ id: 9, name: 'Lin' });
      expect(sent).toEqual(['Bearer old-token', 'Bearer new-token']);
      expect(handler.getCallCount()).toBe(1);
    });

    it('should report unauthorized when the retry fails with another status', async () => {
      useRefreshHandler(new MockRefreshHandler([true]));
      transport.onPath('/me', { status: 401 }).onPath('/me', { status: 500 });

      const result = await executor.performResult(authorized('/me'), UserType);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(ApiErrorKind.HttpError);
        expect(result.error.details).toMatchObject({ status: HttpStatusCategory.NotAuthorized, statusCode: 401 });
      }
      expect(transport.getRequestCount()).toBe(2);
      expect(logger.getMessages()).toContain('Retry after token refresh failed');
    });

    it('should resend identical headers when the auth headers did not change', async () => {
      useRefreshHandler(new MockRefreshHandler([true]));
      transport.onPath('/me', { status: 401 }).onPath('/me', jsonResponse(200, { id: 1, name: 'Ada' }));

      await executor.perform(
        request('/me', { isAuthorized: true, authHeaders: { Authorization: 'Bearer fixed-token' } }),
        UserType
      );

      const [first, second] = transport.getRecordedRequests();
      expect(first?.request.headers).toEqual({
        'Content-Type': 'application/json',
        Accept: '*/*',
        Authorization: 'Bearer fixed-token',
      });
      expect(second?.request.headers).toEqual(first?.request.headers);
    });

    it('should not refresh a second time when the retry is unauthorized', async () => {
      const handler = new MockRefreshHandler([true]);
      useRefreshHandler(handler);
      transport.onPath('/me', { status: 401 });

      await expect(executor.perform(authorized('/me'), UserType)).rejects.toMatchObject({
        details: { status: HttpStatusCategory.NotAuthorized },
      });
      expect(handler.getCallCount()).toBe(1);
      expect(transport.getRequestCount()).toBe(2);
    });

    it('should share one refresh between concurrent requests', async () => {
      const handler = new MockRefreshHandler([true], { delay: 20 });
      useRefreshHandler(handler);
      transport
        .onPath('/me', { status: 401 })
        .onPath('/me', { status: 401 })
        .onPath('/me', { status: 401 })
        .onPath('/me', jsonResponse(200, { id: 1, name: 'Ada' }));

      const users = await Promise.all([
        executor.perform(authorized('/me'), UserType),
        executor.perform(authorized('/me'), UserType),
        executor.perform(authorized('/me'), UserType),
      ]);

      expect(users).toHaveLength(3);
      expect(handler.getCallCount()).toBe(1);
      expect(transport.getRequestCount()).toBe(6);
    });
  });

  describe('performWithResponse', () => {
    it('should return status, headers and cookies', async () => {
      transport.onPath('/login', {
        ...jsonResponse(200, { id: 1, name: 'Ada' }, { 'X-Request-Id': 'req-1' }),
        setCookie: ['session=abc; Path=/; HttpOnly', 'theme=dark'],
      });

      const response = await executor.performWithResponse(request('/login', { method: 'POST' }), UserType);

      expect(response.data).toEqual({ id: 1, name: 'Ada' });
      expect(response.statusCode).toBe(200);
      expect(response.headers['x-request-id']).toBe('req-1');
      expect(response.rawSetCookieHeader).toBe('session=abc; Path=/; HttpOnly, theme=dark');
      expect(response.cookies.map((c) => `${c.name}=${c.value}`)).toEqual(['session=abc', 'theme=dark']);
      expect(response.cookies[0]?.httpOnly).toBe(true);
    });

    it('should have no cookies when none are set', async () => {
      transport.onPath('/users/1', jsonResponse(200, { id: 1, name: 'Ada' }));

      const response = await executor.performWithResponse(request('/users/1'), JsonValue);

      expect(response.cookies).toEqual([]);
      expect(response.rawSetCookieHeader).toBeUndefined();
    });
  });

  describe('performSuccess', () => {
    it('should ignore the body of a success', async () => {
      transport.onPath('/items/1', { status: 204 });

      await expect(executor.performSuccess(request('/items/1', { method: 'DELETE' }))).resolves.toBeUndefined();
    });

    it('should fail on an error status', async () => {
      transport.onPath('/items/1', { status: 404 });

      await expect(executor.performSuccess(request('/items/1', { method: 'DELETE' }))).rejects.toMatchObject({
        details: { status: HttpStatusCategory.NotFound },
      });
    });
  });

  describe('result forms', () => {
    it('should wrap a success', async () => {
      transport.onPath('/users/1', jsonResponse(200, { id: 1, name: 'Ada' }));

      const result = await executor.performResult(request('/users/1'), UserType);

      expect(result).toEqual({ ok: true, value: { id: 1, name: 'Ada' } });
    });

    it('should wrap pipeline errors', async () => {
      probe.setOnline(false);

      const result = await executor.performSuccessResult(request('/users/1'));

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.kind).toBe(ApiErrorKind.NoNetwork);
    });

    it('should turn unexpected errors into invalid responses', async () => {
      const cause = new TypeError('boom');
      transport.onPath('/users/1', { status: 0, error: cause });

      const result = await executor.performResultWithResponse(request('/users/1'), UserType);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(ApiErrorKind.InvalidResponse);
        expect(result.error.details.cause).toBe(cause);
      }
    });
  });

  describe('cancellation', () => {
    it('should not send when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        executor.perform(request('/users/1'), UserType, { signal: controller.signal })
      ).rejects.toMatchObject({ kind: ApiErrorKind.Cancelled });
      expect(transport.getRequestCount()).toBe(0);
    });

    it('should cancel an in-flight request', async () => {
      transport.onPath('/slow', { ...jsonResponse(200, { id: 1, name: 'Ada' }), delay: 1000 });
      const controller = new AbortController();

      const pending = executor.perform(request('/slow'), UserType, { signal: controller.signal });
      setTimeout(() => controller.abort(), 10);

      await expect(pending).rejects.toMatchObject({ kind: ApiErrorKind.Cancelled });
    });

    it('should release a caller waiting on a refresh without stopping it', async () => {
      const handler = new MockRefreshHandler([true], { delay: 50 });
      useRefreshHandler(handler);
      transport.onPath('/me', { status: 401 }).onPath('/me', { status: 401 }).onPath('/me', jsonResponse(200, { id: 1, name: 'Ada' }));
      const controller = new AbortController();

      const cancelled = executor.perform(authorized('/me'), UserType, { signal: controller.signal });
      const other = executor.perform(authorized('/me'), UserType);
      setTimeout(() => controller.abort(), 10);

      await expect(cancelled).rejects.toMatchObject({ kind: ApiErrorKind.Cancelled });
      await expect(other).resolves.toEqual({ id: 1, name: 'Ada' });
      expect(handler.getCallCount()).toBe(1);
      expect(coordinator.state).toBe('idle');
    });
  });

  describe('performDownload', () => {
    it('should write the body to the download directory', async () => {
      transport.onPath('/files/report.txt', { status: 200, body: 'file-content', headers: { 'Content-Type': 'text/plain' } });

      const file = await executor.performDownload(
        request('/files/report.txt', { task: RequestTask.download('https://cdn.example.com/ignored') })
      );

      expect(file).toEqual({
        localPath: join(dir, 'report.txt'),
        remoteUrl: 'https://api.example.com/files/report.txt',
        statusCode: 200,
        headers: { 'content-type': 'text/plain' },
        bytesWritten: 12,
      });
      expect(await readFile(file.localPath, 'utf8')).toBe('file-content');
      expect(transport.getRecordedRequests()[0]?.streamed).toBe(true);
    });

    it('should not create a file for an error status', async () => {
      transport.onPath('/files/missing.txt', { status: 404, body: 'not here' });

      await expect(executor.performDownload(request('/files/missing.txt'))).rejects.toMatchObject({
        details: { status: HttpStatusCategory.NotFound },
      });
      await expect(stat(join(dir, 'missing.txt'))).rejects.toThrow();
    });

    it('should append a partial response to a resumable download', async () => {
      await writeFile(join(dir, 'video.bin'), 'hello ');
      transport.onPath('/files/video.bin', { status: 206, body: 'world' });

      const file = await executor.performDownload(
        request('/files/video.bin', { task: RequestTask.downloadResumable(6) })
      );

      expect(transport.getRecordedRequests()[0]?.request.headers['Range']).toBe('bytes=6-');
      expect(file.bytesWritten).toBe(5);
      expect(await readFile(file.localPath, 'utf8')).toBe('hello world');
    });

    it('should overwrite when the server ignores the range', async () => {
      await writeFile(join(dir, 'video.bin'), 'stale data');
      transport.onPath('/files/video.bin', { status: 200, body: 'full' });

      const file = await executor.performDownload(
        request('/files/video.bin', { task: RequestTask.downloadResumable(6) })
      );

      expect(await readFile(file.localPath, 'utf8')).toBe('full');
    });

    it('should retry a download after a refresh', async () => {
      const handler = new MockRefreshHandler([true]);
      useRefreshHandler(handler);
      transport.onPath('/files/a.txt', { status: 401, body: 'expired' }).onPath('/files/a.txt', { status: 200, body: 'A' });

      const file = await executor.performDownload(authorized('/files/a.txt'));

      expect(await readFile(file.localPath, 'utf8')).toBe('A');
      expect(transport.getRequestCount()).toBe(2);
      expect(handler.getCallCount()).toBe(1);
    });

    it('should fail a download when the refresh fails', async () => {
      useRefreshHandler(new MockRefreshHandler([false]));
      transport.onPath('/files/a.txt', { status: 401 });

      const result = await executor.performDownloadResult(authorized('/files/a.txt'));

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.status).toBe(HttpStatusCategory.NotAuthorized);
      expect(transport.getRequestCount()).toBe(1);
    });

    it('should report unauthorized when the download retry fails', async () => {
      useRefreshHandler(new MockRefreshHandler([true]));
      transport.onPath('/files/b.txt', { status: 401 }).onPath('/files/b.txt', { status: 503, body: 'busy' });

      await expect(executor.performDownload(authorized('/files/b.txt'))).rejects.toMatchObject({
        kind: ApiErrorKind.HttpError,
        details: { status: HttpStatusCategory.NotAuthorized, statusCode: 401 },
      });
      expect(transport.getRequestCount()).toBe(2);
      await expect(stat(join(dir, 'b.txt'))).rejects.toThrow();
    });
  });

  describe('tls policy', () => {
    it('should pass the descriptor policy to the transport', async () => {
      const policy: TlsPinningPolicy = { pinnedHosts: ['api.example.com'] };
      transport.onPath('/users/1', jsonResponse(200, { id: 1, name: 'Ada' }));

      await executor.perform(request('/users/1', { tlsPolicy: policy }), UserType);

      expect(transport.getRecordedRequests()[0]?.options.tlsPolicy).toBe(policy);
    });

    it('should fall back to the policy provider', async () => {
      const policy: TlsPinningPolicy = { pinnedHosts: ['api.example.com'], allowFallback: true };
      const withProvider = new RequestExecutor({
        transport,
        tlsPolicyProvider: { getPolicy: async () => policy },
      });

      await withProvider.performSuccess(request('/ping'));

      expect(transport.getRecordedRequests()[0]?.options.tlsPolicy).toBe(policy);
    });
  });
});

describe('downloadFileName', () => {
  it('should use the last path segment', () => {
    expect(downloadFileName('https://cdn.example.com/a/b/report%20v2.pdf?x=1')).toBe('report v2.pdf');
    expect(downloadFileName('https://cdn.example.com/a/b/')).toBe('b');
  });

  it('should fall back for paths without a usable name', () => {
    expect(downloadFileName('https://cdn.example.com/')).toBe('download');
    expect(downloadFileName('https://cdn.example.com/a/..%2Fetc')).toBe('download');
    expect(downloadFileName('https://cdn.example.com/%2E%2E')).toBe('download');
  });
});
