/**
 * MCP client over Server-Sent Events, with requests delivered by HTTP POST.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  JsonObject,
  StreamEvent,
  Session,
  RequestId,
  JsonRpcRequest,
  JsonRpcNotification,
  JsonRpcErrorObject,
  JsonRpcResponse,
  ClientOptions,
  ClientState,
  IdGenerator,
  FetchLike,
} from './core/types.js';

// ── Errors ──
export {
  MCPClientError,
  ConnectionError,
  DeliveryError,
  RequestTimeoutError,
  RpcError,
  ClientDisposedError,
  InvalidStateError,
  DuplicateRequestIdError,
  ConfigError,
  InvalidEndpointError,
  ProtocolError,
} from './core/errors.js';

// ── Configuration ──
export {
  resolveConfig,
  loadConfigFromEnv,
  DEFAULT_PROTOCOL_VERSION,
  LEGACY_PROTOCOL_VERSION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_CONNECT_GRACE_MS,
} from './core/config.js';
export type { ClientConfig, ClientConfigInput, EnvConfig } from './core/config.js';

// ── Ids ──
export { randomIdGenerator, sequentialIdGenerator } from './core/ids.js';

// ── Logging ──
export {
  LogLevel,
  ConsoleLogger,
  createLogger,
  errorContext,
  parseLogLevel,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
} from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';

// ── Metrics ──
export { MetricsCollector, globalMetrics, createMetricsObserver } from './core/metrics.js';
export type { ClientObserver, CallInfo, MetricsSnapshot } from './core/metrics.js';

// ── Transport ──
export { SSELineDecoder, SSEReader } from './transport/sse.js';
export { EventQueue } from './transport/event-queue.js';
export { SSETransport } from './transport/sse-transport.js';
export type { MessageTransport, SSETransportOptions, StreamMode } from './transport/types.js';

// ── Dispatch ──
export {
  classifyEvent,
  classifyMessage,
  parseMessages,
  extractSessionId,
  parseJson,
} from './mcp/dispatch.js';
export type { DispatchOutcome, InboundMessage } from './mcp/dispatch.js';

// ── Client ──
export { MCPClient } from './mcp/client.js';
export type { MCPClientDeps, RequestOptions } from './mcp/client.js';
export type {
  Implementation,
  InitializeResult,
  Tool,
  ListToolsResult,
  ContentBlock,
  CallToolResult,
  Resource,
  ListResourcesResult,
  ResourceContents,
  ReadResourceResult,
  NotificationHandler,
} from './mcp/types.js';
