/**
 * SSE transport. Reads the server's event stream and POSTs outbound
 * JSON-RPC messages to the submission endpoint it announces.
 */

import { EventSource } from 'eventsource';
import type { FetchLike, JsonObject, Result, Session, StreamEvent } from '../core/types.js';
import { ConnectionError, DeliveryError, InvalidEndpointError } from '../core/errors.js';
import { createLogger, errorContext, type Logger } from '../core/logger.js';
import { EventQueue } from './event-queue.js';
import { SSEReader } from './sse.js';
import type { MessageTransport, SSETransportOptions, StreamMode } from './types.js';

function toStreamEvent(eventType: string, event: object): StreamEvent {
  const data = 'data' in event && typeof event.data === 'string' ? event.data : '';
  const id = 'lastEventId' in event && typeof event.lastEventId === 'string' && event.lastEventId !== ''
    ? event.lastEventId
    : undefined;
  return { eventType, id, data };
}

function describeFailure(event: object): string {
  if ('message' in event && typeof event.message === 'string' && event.message !== '') {
    return event.message;
  }
  return 'connection error';
}

/**
 * `EventSource` that forwards every message event it dispatches, whatever
 * the event type, instead of needing a listener per type.
 */
class ForwardingEventSource extends EventSource {
  onStreamEvent: ((event: StreamEvent) => void) | undefined;

  override dispatchEvent(event: Event): boolean {
    if ('data' in event && typeof event.data === 'string') {
      this.onStreamEvent?.(toStreamEvent(event.type, event));
    }
    return super.dispatchEvent(event);
  }
}

/**
 * One logical connection to an SSE endpoint.
 *
 * `connect()` tries the `eventsource` decoder first and, if it cannot open
 * the stream, falls back once to a streaming GET decoded by {@link SSEReader}.
 * The stream is never reopened: when it ends or fails the event sequence
 * completes.
 */
export class SSETransport implements MessageTransport {
  readonly url: URL;
  private headers: Readonly<Record<string, string>>;
  private useEventSource: boolean;
  private fetchImpl: FetchLike;
  private logger: Logger;

  private session: Session = {};
  private abort = new AbortController();
  private source: ForwardingEventSource | null = null;
  private queue: EventQueue<StreamEvent> | null = null;
  private streamMode: StreamMode | undefined;
  private disposed = false;

  constructor(options: SSETransportOptions) {
    this.url = new URL(options.url);
    this.headers = options.headers ?? {};
    this.useEventSource = options.useEventSource ?? true;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger('SSETransport');
  }

  get sessionId(): string | undefined {
    return this.session.sessionId;
  }

  setSessionId(sessionId: string): void {
    this.session.sessionId = sessionId;
  }

  get submissionEndpoint(): URL | undefined {
    return this.session.submissionEndpoint;
  }

  get mode(): StreamMode | undefined {
    return this.streamMode;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async connect(): Promise<AsyncIterable<StreamEvent>> {
    if (this.disposed) throw new ConnectionError('Transport disposed');
    if (this.queue) throw new ConnectionError('Transport already connected');

    const queue = new EventQueue<StreamEvent>();
    this.queue = queue;

    try {
      if (this.useEventSource) {
        try {
          await this.openEventSource(queue);
          this.streamMode = 'eventsource';
          this.logger.info('Event stream open', { url: this.url.toString(), mode: this.streamMode });
          return queue;
        } catch (err) {
          if (this.disposed) throw err;
          this.logger.info('EventSource failed, falling back to streaming fetch', errorContext(err));
        }
      }

      await this.openFetchStream(queue);
      this.streamMode = 'fetch';
      this.logger.info('Event stream open', { url: this.url.toString(), mode: this.streamMode });
      return queue;
    } catch (err) {
      this.queue = null;
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`Could not open event stream ${this.url}`, { cause: err });
    }
  }

  /**
   * Resolve an `endpoint` event value. Absolute http(s) URLs are used as
   * they are; anything else is a path on the stream's base origin. A
   * `session_id` query parameter on the result becomes the session id.
   * The first endpoint of a connection sticks; later ones are refused.
   */
  setSubmissionEndpointFromEvent(rawValue: string): Result<URL, Error> {
    const trimmed = rawValue.trim();
    if (this.session.submissionEndpoint) {
      return {
        ok: false,
        error: new InvalidEndpointError(trimmed, `Submission endpoint already set to ${this.session.submissionEndpoint}`),
      };
    }
    if (trimmed === '') {
      return { ok: false, error: new InvalidEndpointError(trimmed, 'Empty endpoint value') };
    }

    let endpoint: URL;
    try {
      endpoint = /^https?:\/\//i.test(trimmed)
        ? new URL(trimmed)
        : new URL(this.baseOrigin() + (trimmed.startsWith('/') ? trimmed : `/${trimmed}`));
    } catch {
      return { ok: false, error: new InvalidEndpointError(trimmed, `Not a valid endpoint: ${trimmed}`) };
    }

    this.session.submissionEndpoint = endpoint;
    const sid = endpoint.searchParams.get('session_id');
    if (sid) {
      this.session.sessionId = sid;
    }
    this.logger.debug('Submission endpoint resolved', { endpoint: endpoint.toString(), sessionId: this.session.sessionId });
    return { ok: true, value: endpoint };
  }

  async deliver(payload: JsonObject): Promise<void> {
    const target = new URL(this.session.submissionEndpoint ?? `${this.baseOrigin()}/messages/`);
    const sessionId = this.session.sessionId;
    if (sessionId && !target.searchParams.has('session_id')) {
      target.searchParams.set('session_id', sessionId);
    }
    if (this.disposed) {
      throw new DeliveryError(target.toString(), undefined, 'transport disposed');
    }

    const body = JSON.stringify(Object.assign({ session_id: null }, payload, { session_id: sessionId ?? null }));

    let response: Response;
    try {
      response = await this.fetchImpl(target, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body,
        signal: this.abort.signal,
      });
    } catch (err) {
      throw new DeliveryError(target.toString(), undefined, undefined, { cause: err });
    }

    const text = await response.text();
    if (response.status >= 400) {
      throw new DeliveryError(target.toString(), response.status, text);
    }
  }

  /** Close the stream and abort in-flight requests. Safe to call repeatedly. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.source?.close();
    this.source = null;
    this.abort.abort();
    this.queue?.end();
    this.logger.debug('Transport disposed', { url: this.url.toString() });
  }

  // ── Internals ──

  /** Connection URL minus a trailing `/sse` path segment, without query. */
  private baseOrigin(): string {
    const path = this.url.pathname.replace(/\/sse\/?$/, '').replace(/\/+$/, '');
    return this.url.origin + path;
  }

  private openEventSource(queue: EventQueue<StreamEvent>): Promise<void> {
    return new Promise((resolve, reject) => {
      let opened = false;
      const source = new ForwardingEventSource(this.url.toString(), {
        fetch: (input, init) => this.fetchImpl(input, {
          method: 'GET',
          headers: { ...init?.headers, ...this.headers },
          signal: init?.signal instanceof AbortSignal ? init.signal : undefined,
        }),
      });
      this.source = source;
      source.onStreamEvent = (event) => queue.push(event);

      const onAbort = () => {
        source.close();
        reject(new ConnectionError('Transport disposed while connecting'));
      };
      this.abort.signal.addEventListener('abort', onAbort, { once: true });

      source.addEventListener('open', () => {
        opened = true;
        this.abort.signal.removeEventListener('abort', onAbort);
        resolve();
      });

      source.addEventListener('error', (event) => {
        // No automatic reconnection: the sequence ends with the stream
        source.close();
        if (!opened) {
          this.abort.signal.removeEventListener('abort', onAbort);
          this.source = null;
          reject(new ConnectionError(`EventSource could not open ${this.url}: ${describeFailure(event)}`));
          return;
        }
        this.logger.warn('Event stream closed', { reason: describeFailure(event) });
        queue.end();
      });
    });
  }

  private async openFetchStream(queue: EventQueue<StreamEvent>): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: 'GET',
      headers: { Accept: 'text/event-stream', ...this.headers },
      signal: this.abort.signal,
    });
    if (!response.ok || !response.body) {
      throw new ConnectionError(`Event stream request to ${this.url} failed: ${response.status}`);
    }
    // pump() settles every outcome itself
    void this.pump(new SSEReader(response.body), queue);
  }

  private async pump(reader: SSEReader, queue: EventQueue<StreamEvent>): Promise<void> {
    try {
      for await (const event of reader.events()) {
        queue.push(event);
      }
      this.logger.info('Event stream ended', { url: this.url.toString() });
      queue.end();
    } catch (err) {
      if (this.disposed) {
        queue.end();
        return;
      }
      this.logger.error('Event stream read failed', errorContext(err));
      queue.fail(new ConnectionError('Event stream interrupted', { cause: err }));
    }
  }
}
