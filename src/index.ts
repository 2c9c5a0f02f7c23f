/**
 * Declarative HTTP request pipeline.
 *
 * @example
 * ```typescript
 * import { NetworkClient, defineRequest, defineType, RequestTask } from 'request-pipeline';
 *
 * interface User { id: number; name: string }
 * const UserType = defineType<User>('User');
 *
 * const client = NetworkClient.builder().build();
 * client.register(UserType, (data) => ({ id: Number(data.id), name: String(data.name) }));
 *
 * const user = await client.perform(
 *   defineRequest({
 *     method: 'GET',
 *     baseUrl: 'https://api.example.com',
 *     path: '/users/1',
 *     isAuthorized: true,
 *     authHeaders: () => ({ Authorization: `Bearer ${session.token}` }),
 *   }),
 *   UserType
 * );
 * ```
 *
 * @packageDocumentation
 */

// Client
export { NetworkClient, NetworkClientBuilder, createClient } from './client/index.js';
export type { NetworkClientOptions } from './client/index.js';

// Configuration
export { PipelineConfig, PipelineConfigBuilder, DEFAULT_TIMEOUT_MS, DEFAULT_MAX_REDIRECTS } from './config/index.js';
export type { PipelineConfigOptions } from './config/index.js';

// Errors
export { ApiError, ApiErrorKind, isApiError, toFailureState } from './errors/index.js';
export type { ApiErrorDetails, FailureState } from './errors/index.js';

// Status
export { HttpStatusCategory, classifyStatus, isSuccessStatus } from './status/index.js';

// Data model
export * from './types/index.js';

// Encoding
export { TaskEncoder } from './encoding/index.js';
export type { EncodedRequest } from './encoding/index.js';

// Decoding
export {
  TypeTag,
  ObjectTag,
  ListTag,
  PrimitiveTag,
  defineType,
  listOf,
  JsonValue,
  StringValue,
  NumberValue,
  BooleanValue,
  ConverterRegistry,
  ResponseDecoder,
} from './decoding/index.js';
export type { Converter } from './decoding/index.js';

// Transport
export {
  AxiosTransport,
  CertificatePinner,
  computePublicKeyHash,
  createPinnedAgent,
  createTransport,
  normalizeHeaders,
} from './transport/index.js';
export type { HttpTransport, RawResponse, StreamedResponse, SendOptions } from './transport/index.js';

// Token refresh
export { RefreshCoordinator } from './refresh/index.js';
export type { TokenRefreshHandler, RefreshState } from './refresh/index.js';

// Connectivity
export { AlwaysOnlineProbe, DnsConnectivityProbe, StaticConnectivityProbe } from './connectivity/index.js';
export type { ConnectivityProbe, ConnectivityListener, DnsConnectivityProbeOptions } from './connectivity/index.js';

// Executor
export { RequestExecutor, downloadFileName } from './executor/index.js';
export type { ExecutorDependencies, PerformOptions } from './executor/index.js';

// Observability
export * from './observability/index.js';

// Mocks (for testing)
export { MockTransport, MockRefreshHandler, jsonResponse } from './mocks/index.js';
export type { MockResponse, RecordedRequest } from './mocks/index.js';
