/**
 * Transport types for the SSE + HTTP POST MCP transport.
 */

import type { FetchLike, JsonObject, Result, StreamEvent } from '../core/types.js';
import type { Logger } from '../core/logger.js';

/** Which decoder is reading the event stream. */
export type StreamMode = 'eventsource' | 'fetch';

/**
 * What the protocol client needs from a transport. `SSETransport` is the
 * network implementation; tests drive the client through in-memory fakes.
 */
export interface MessageTransport {
  readonly sessionId: string | undefined;
  setSessionId(sessionId: string): void;
  /** Open the stream. The returned sequence can be iterated once. */
  connect(): Promise<AsyncIterable<StreamEvent>>;
  /** Resolve the submission endpoint announced by an `endpoint` event. */
  setSubmissionEndpointFromEvent(rawValue: string): Result<URL, Error>;
  /** POST a JSON-RPC message; resolves once the HTTP layer accepted it. */
  deliver(payload: JsonObject): Promise<void>;
  dispose(): void;
}

export interface SSETransportOptions {
  /** Event stream URL, e.g. `https://host/sse`. */
  url: string;
  headers?: Readonly<Record<string, string>>;
  /** Set to false to go straight to the streaming-fetch decoder. */
  useEventSource?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
}
