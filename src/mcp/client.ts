/**
 * MCP client: JSON-RPC request/response correlation over an SSE transport.
 *
 * Requests are POSTed one way; their answers come back on the event stream.
 * Each request is parked in a correlation map keyed by its id until a
 * matching response arrives, its timer fires, or the client is disposed.
 */

import type { ValidateFunction } from 'ajv';
import type {
  ClientState,
  FetchLike,
  IdGenerator,
  JsonObject,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  StreamEvent,
} from '../core/types.js';
import {
  ClientDisposedError,
  DuplicateRequestIdError,
  InvalidStateError,
  ProtocolError,
  RequestTimeoutError,
  RpcError,
} from '../core/errors.js';
import { LEGACY_PROTOCOL_VERSION, resolveConfig, type ClientConfig, type ClientConfigInput } from '../core/config.js';
import { createLogger, errorContext, type Logger } from '../core/logger.js';
import type { ClientObserver } from '../core/metrics.js';
import { randomIdGenerator } from '../core/ids.js';
import { SSETransport } from '../transport/sse-transport.js';
import type { MessageTransport } from '../transport/types.js';
import { classifyEvent, type InboundMessage } from './dispatch.js';
import {
  isCallToolResult,
  isInitializeResult,
  isListResourcesResult,
  isListToolsResult,
  isReadResourceResult,
  schemaErrors,
} from './schemas.js';
import type {
  CallToolResult,
  Implementation,
  InitializeResult,
  ListResourcesResult,
  ListToolsResult,
  NotificationHandler,
  ReadResourceResult,
} from './types.js';

export interface MCPClientDeps {
  /** Defaults to an {@link SSETransport} built from the configuration. */
  transport?: MessageTransport;
  idGenerator?: IdGenerator;
  observer?: ClientObserver;
  logger?: Logger;
  /** Passed to the default transport. */
  fetch?: FetchLike;
}

export interface RequestOptions {
  /** Overrides the configured `requestTimeoutMs` for this call. */
  timeoutMs?: number;
}

interface OutstandingCall {
  id: string;
  method: string;
  startedAt: number;
  timeoutMs: number;
  timer: ReturnType<typeof setTimeout>;
  resolve(result: unknown): void;
  reject(error: Error): void;
  /** The POST failed; the caller already holds that error. */
  deliveryFailed: boolean;
}

function expectResult<T>(value: unknown, validate: ValidateFunction<T>, method: string): T {
  if (validate(value)) return value;
  throw new ProtocolError(`Unexpected ${method} result`, schemaErrors(validate));
}

export class MCPClient {
  readonly config: ClientConfig;
  private transport: MessageTransport;
  private idGenerator: IdGenerator;
  private observer: ClientObserver;
  private logger: Logger;

  private pending = new Map<string, OutstandingCall>();
  private notificationHandlers = new Set<NotificationHandler>();
  private currentState: ClientState = 'disconnected';
  private currentSessionId: string | undefined;
  private negotiatedVersion: string | undefined;
  private initializeResult: InitializeResult | undefined;
  private consumer: Promise<void> | null = null;

  /** @throws ConfigError when `input` fails validation. */
  constructor(input: ClientConfigInput, deps: MCPClientDeps = {}) {
    const resolved = resolveConfig(input);
    if (!resolved.ok) throw resolved.error;
    this.config = resolved.value;

    this.logger = deps.logger ?? createLogger('MCPClient');
    this.idGenerator = deps.idGenerator ?? randomIdGenerator;
    this.observer = deps.observer ?? {};
    this.transport = deps.transport ?? new SSETransport({
      url: this.config.url,
      headers: this.config.headers,
      fetch: deps.fetch,
      logger: deps.logger?.child({ component: 'transport' }),
    });
  }

  // ── State ──

  get state(): ClientState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.currentState === 'connected';
  }

  get sessionId(): string | undefined {
    return this.currentSessionId;
  }

  /** Protocol version agreed during the handshake. */
  get protocolVersion(): string | undefined {
    return this.negotiatedVersion;
  }

  get serverInfo(): Implementation | undefined {
    return this.initializeResult?.serverInfo;
  }

  get serverCapabilities(): JsonObject | undefined {
    return this.initializeResult?.capabilities;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Settles when the event stream has ended and its last event was handled. */
  whenStreamClosed(): Promise<void> {
    return this.consumer ?? Promise.resolve();
  }

  // ── Lifecycle ──

  /**
   * Open the stream, give the server a moment to announce its endpoint and
   * session, then run the initialize handshake. A failed connect disposes
   * the client.
   */
  async connect(): Promise<void> {
    if (this.currentState !== 'disconnected') {
      throw this.currentState === 'disposed'
        ? new ClientDisposedError()
        : new InvalidStateError(`Cannot connect while ${this.currentState}`);
    }

    this.transition('connecting');
    this.logger.info('Connecting', { url: this.config.url });

    try {
      const events = await this.transport.connect();
      this.consumer = this.consume(events);

      if (this.config.connectGraceMs > 0) {
        await new Promise(r => setTimeout(r, this.config.connectGraceMs));
      }
      if (this.isDisposed()) throw new ClientDisposedError('Client disposed while connecting');

      await this.initializeWithFallback();
      if (this.isDisposed()) throw new ClientDisposedError('Client disposed while connecting');

      this.transition('connected');
      this.logger.info('Connected', { sessionId: this.currentSessionId, protocolVersion: this.negotiatedVersion });
    } catch (err) {
      this.logger.error('Connect failed', errorContext(err));
      this.dispose();
      throw err;
    }
  }

  /**
   * Fail every outstanding call, release the transport and enter the
   * terminal `disposed` state. Repeated calls do nothing.
   */
  dispose(): void {
    if (this.isDisposed()) return;

    const calls = Array.from(this.pending.values());
    this.pending.clear();
    this.transition('disposed');

    for (const call of calls) {
      clearTimeout(call.timer);
      if (call.deliveryFailed) continue;
      const error = new ClientDisposedError();
      this.observe(o => o.onCallFailed?.({ id: call.id, method: call.method, durationMs: Date.now() - call.startedAt, error }));
      call.reject(error);
    }

    this.transport.dispose();
    this.logger.info('Client disposed', { failedCalls: calls.length });
  }

  // ── Primitives ──

  /**
   * Send a request and wait for the matching response on the stream.
   *
   * Rejects with `RpcError` for an error response, `RequestTimeoutError`
   * when no response arrives in time, `ClientDisposedError` on teardown and
   * `DeliveryError` when the POST fails. A failed POST leaves the call in
   * the correlation map until its timer removes it.
   */
  sendRequest(method: string, params: JsonObject = {}, options: RequestOptions = {}): Promise<unknown> {
    const refused = this.refuseSend();
    if (refused) return Promise.reject(refused);

    const id = this.idGenerator(method);
    if (this.pending.has(id)) {
      return Promise.reject(new DuplicateRequestIdError(id));
    }

    const timeoutMs = options.timeoutMs ?? this.config.requestTimeoutMs;
    const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };

    return new Promise<unknown>((resolve, reject) => {
      const call: OutstandingCall = {
        id,
        method,
        startedAt: Date.now(),
        timeoutMs,
        timer: setTimeout(() => this.expire(id), timeoutMs),
        resolve,
        reject,
        deliveryFailed: false,
      };
      this.pending.set(id, call);
      this.observe(o => o.onCallSent?.({ id, method }));
      this.logger.debug('-> request', { method, id });

      void this.transport.deliver({ ...request }).catch((err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err));
        if (this.pending.get(id) === call) {
          call.deliveryFailed = true;
          this.observe(o => o.onCallFailed?.({ id, method, durationMs: Date.now() - call.startedAt, error }));
        }
        this.logger.warn('Request delivery failed', { method, id, ...errorContext(error) });
        reject(error);
      });
    });
  }

  /** Deliver a notification. Resolves once the POST is accepted. */
  async sendNotification(method: string, params: JsonObject = {}): Promise<void> {
    const refused = this.refuseSend();
    if (refused) throw refused;

    const notification: JsonRpcNotification = { jsonrpc: '2.0', method, params };
    this.logger.debug('-> notification', { method });
    await this.transport.deliver({ ...notification });
  }

  /** Register a handler for server-initiated notifications. Returns an unsubscribe function. */
  onNotification(handler: NotificationHandler): () => void {
    this.notificationHandlers.add(handler);
    return () => {
      this.notificationHandlers.delete(handler);
    };
  }

  // ── MCP Calls ──

  async initialize(protocolVersion: string = this.config.protocolVersion): Promise<InitializeResult> {
    const raw = await this.sendRequest('initialize', {
      protocolVersion,
      clientInfo: { name: this.config.clientName, version: this.config.clientVersion },
      capabilities: { ...this.config.capabilities },
    });

    let result: InitializeResult = {};
    if (isInitializeResult(raw)) {
      result = raw;
    } else {
      this.logger.warn('Unexpected initialize result shape', { details: schemaErrors(isInitializeResult) });
    }
    this.initializeResult = result;
    this.negotiatedVersion = result.protocolVersion ?? protocolVersion;

    if (!this.currentSessionId) {
      this.currentSessionId = result.session_id || result.sessionId || undefined;
    }
    if (this.currentSessionId) {
      this.transport.setSessionId(this.currentSessionId);
    }

    await this.sendNotification('notifications/initialized');
    return result;
  }

  async listTools(cursor?: string): Promise<ListToolsResult> {
    const result = await this.sendRequest('tools/list', cursor ? { cursor } : {});
    return expectResult(result, isListToolsResult, 'tools/list');
  }

  async callTool(name: string, args: JsonObject = {}): Promise<CallToolResult> {
    const result = await this.sendRequest('tools/call', { name, arguments: args });
    return expectResult(result, isCallToolResult, 'tools/call');
  }

  async listResources(cursor?: string): Promise<ListResourcesResult> {
    const result = await this.sendRequest('resources/list', cursor ? { cursor } : {});
    return expectResult(result, isListResourcesResult, 'resources/list');
  }

  async readResource(uri: string): Promise<ReadResourceResult> {
    const result = await this.sendRequest('resources/read', { uri });
    return expectResult(result, isReadResourceResult, 'resources/read');
  }

  // ── Internals ──

  private isDisposed(): boolean {
    return this.currentState === 'disposed';
  }

  private refuseSend(): Error | undefined {
    if (this.isDisposed()) return new ClientDisposedError();
    if (this.currentState === 'disconnected') return new InvalidStateError('Client is not connected');
    return undefined;
  }

  private transition(to: ClientState): void {
    const from = this.currentState;
    if (from === to) return;
    this.currentState = to;
    this.logger.debug('State change', { from, to });
    this.observe(o => o.onStateChange?.(from, to));
  }

  private observe(hook: (observer: ClientObserver) => void): void {
    try {
      hook(this.observer);
    } catch (err) {
      this.logger.warn('Observer hook threw', errorContext(err));
    }
  }

  /**
   * Fallback: a server that rejects the requested protocol version with
   * "invalid request parameters" gets one retry on the legacy version.
   */
  private async initializeWithFallback(): Promise<InitializeResult> {
    const requested = this.config.protocolVersion;
    try {
      return await this.initialize(requested);
    } catch (err) {
      if (
        requested !== LEGACY_PROTOCOL_VERSION &&
        err instanceof RpcError &&
        err.message.toLowerCase().includes('invalid request parameters')
      ) {
        this.logger.info('Initialize rejected, retrying with legacy protocol version', {
          requested,
          fallback: LEGACY_PROTOCOL_VERSION,
        });
        return this.initialize(LEGACY_PROTOCOL_VERSION);
      }
      throw err;
    }
  }

  private async consume(events: AsyncIterable<StreamEvent>): Promise<void> {
    try {
      for await (const event of events) {
        this.handleEvent(event);
      }
      this.logger.info('Event stream closed');
    } catch (err) {
      this.logger.error('Event stream failed', errorContext(err));
    }
  }

  private handleEvent(event: StreamEvent): void {
    const outcome = classifyEvent(event);
    switch (outcome.kind) {
      case 'endpoint': {
        const resolved = this.transport.setSubmissionEndpointFromEvent(outcome.value);
        if (!resolved.ok) {
          this.logger.warn('Ignoring endpoint event', { value: outcome.value, reason: resolved.error.message });
          return;
        }
        this.logger.info('Submission endpoint announced', { endpoint: resolved.value.toString() });
        if (!this.currentSessionId && this.transport.sessionId) {
          this.currentSessionId = this.transport.sessionId;
        }
        return;
      }
      case 'session':
        this.currentSessionId = outcome.sessionId;
        this.transport.setSessionId(outcome.sessionId);
        this.logger.info('Session announced', { sessionId: outcome.sessionId });
        return;
      case 'messages':
        if (outcome.discardedLines > 0) {
          this.logger.debug('Discarded non-JSON lines', { count: outcome.discardedLines });
        }
        for (const message of outcome.messages) {
          this.handleMessage(message);
        }
        return;
      case 'unparseable':
        this.logger.debug('Ignoring event', { eventType: event.eventType, reason: outcome.reason });
        return;
    }
  }

  private handleMessage(message: InboundMessage): void {
    switch (message.kind) {
      case 'response':
        this.settle(message.id, message.message);
        return;
      case 'notification':
        this.notify(message.message);
        return;
      case 'ignored':
        this.logger.debug('Ignoring message', { reason: message.reason });
        return;
    }
  }

  private settle(id: string, response: JsonRpcResponse): void {
    const call = this.pending.get(id);
    if (!call) {
      this.logger.debug('Discarding unmatched response', { id });
      return;
    }
    this.pending.delete(id);
    clearTimeout(call.timer);
    if (call.deliveryFailed) return;

    const durationMs = Date.now() - call.startedAt;
    if (response.error) {
      const { message, code, data } = response.error;
      const error = new RpcError(message ?? 'Unknown error', code, data);
      this.logger.warn('<- error', { method: call.method, id, code, message: error.message });
      this.observe(o => o.onCallFailed?.({ id, method: call.method, durationMs, error }));
      call.reject(error);
      return;
    }

    this.logger.debug('<- result', { method: call.method, id, durationMs });
    this.observe(o => o.onCallResolved?.({ id, method: call.method, durationMs }));
    call.resolve(response.result);
  }

  private expire(id: string): void {
    const call = this.pending.get(id);
    if (!call) return;
    this.pending.delete(id);
    if (call.deliveryFailed) {
      this.logger.debug('Dropped undelivered request', { method: call.method, id });
      return;
    }
    this.logger.warn('Request timed out', { method: call.method, id, timeoutMs: call.timeoutMs });
    this.observe(o => o.onCallTimedOut?.({ id, method: call.method, timeoutMs: call.timeoutMs }));
    call.reject(new RequestTimeoutError(id, call.method, call.timeoutMs));
  }

  private notify(notification: JsonRpcNotification): void {
    this.logger.debug('<- notification', { method: notification.method });
    this.observe(o => o.onNotification?.(notification.method));
    for (const handler of this.notificationHandlers) {
      try {
        handler(notification);
      } catch (err) {
        this.logger.warn('Notification handler threw', { method: notification.method, ...errorContext(err) });
      }
    }
  }
}
