/**
 * Registry transport: Bearer-authenticated access to Docker Registry v2
 * style HTTP APIs, with transparent token refresh and pagination.
 *
 * @example
 * ```typescript
 * import { connect, parseResourceName, readText, BasicCredential, Action } from 'registry-transport';
 *
 * const transport = await connect(
 *   parseResourceName('registry.example.com/team/app'),
 *   new BasicCredential('robot', 'test-secret'),
 *   Action.Pull
 * );
 *
 * for await (const page of transport.paginatedRequest(
 *   'https://registry.example.com/v2/team/app/tags/list?n=100',
 *   [200]
 * )) {
 *   console.log(readText(page));
 * }
 * ```
 *
 * @module registry-transport
 */

// Transport
export {
  RegistryTransport,
  TransportState,
  type RegistryTransportOptions,
  type RequestOptions,
  type PaginatedRequestOptions,
  type AcceptedCodes,
} from './transport.js';
export { connect, type ConnectOptions } from './factory.js';

// Configuration
export {
  RegistryTransportConfig,
  RegistryTransportConfigBuilder,
  createDefaultConfig,
  validateConfig,
  DEFAULT_USER_AGENT,
  DEFAULT_TIMEOUT,
} from './config.js';

// Errors
export {
  RegistryTransportError,
  RegistryTransportErrorKind,
  BadStateError,
  DiagnosticError,
  errorKindFromStatus,
  isRegistryTransportError,
  type RegistryTransportErrorOptions,
} from './errors.js';

// Diagnostics
export {
  decodeDiagnostics,
  formatDiagnostic,
  diagnosticsEqual,
  UNKNOWN_DIAGNOSTIC_CODE,
  type Diagnostic,
} from './diagnostics.js';

// Authentication
export {
  AnonymousCredential,
  BasicCredential,
  BearerCredential,
  EnvBasicCredential,
  type CredentialProvider,
} from './auth/credentials.js';
export { parseBearerChallenge, BEARER_CHALLENGE, type AuthContext } from './auth/challenge.js';
export { CredentialSlot } from './auth/credential-slot.js';
export { SecretString } from './auth/secret.js';

// HTTP
export {
  readText,
  encodeBody,
  hasBody,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type RequestBody,
} from './http/transport.js';
export { FetchTransport, type FetchTransportOptions } from './http/fetch-transport.js';
export { parseNextLinkHeader, scheme } from './http/link.js';

// Types
export { Action, ACTIONS, parseAction, isAction } from './types/action.js';
export {
  Registry,
  Repository,
  Tag,
  Digest,
  parseResourceName,
  DEFAULT_REGISTRY,
  type ResourceName,
} from './types/name.js';
export * from './types/mime.js';

// Observability
export {
  ConsoleLogger,
  NoOpLogger,
  NoOpMetricCollector,
  InMemoryMetricCollector,
  MetricNames,
  type Logger,
  type LogLevel,
  type MetricCollector,
  type MetricLabels,
} from './observability/index.js';

// Simulation
export {
  RecordingTransport,
  type RecordingEntry,
  type RecordedRequest,
  type RecordedResponse,
} from './simulation/recorder.js';
export { ReplayTransport } from './simulation/replayer.js';

// Testing
export {
  MockHttpTransport,
  toHttpResponse,
  type MockResponse,
  type MockHandler,
} from './testing/mock-transport.js';
