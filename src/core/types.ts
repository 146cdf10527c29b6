/**
 * Core type definitions for the MCP SSE client.
 * Wire shapes, session state and client configuration.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── JSON ──

export type JsonObject = { [key: string]: unknown };

// ── Stream ──

/** One reassembled unit from the push stream. */
export interface StreamEvent {
  readonly eventType?: string;
  readonly id?: string;
  readonly data: string;
}

/** Session identity held by the transport. */
export interface Session {
  sessionId?: string;
  submissionEndpoint?: URL;
}

// ── JSON-RPC Envelopes ──

export type RequestId = string;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params: JsonObject;
}

/** Server notifications are only required to name a method. */
export interface JsonRpcNotification {
  jsonrpc?: unknown;
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code?: number;
  message?: string;
  data?: unknown;
}

/** Inbound response. `id` is echoed as the server sent it (string or number). */
export interface JsonRpcResponse {
  jsonrpc?: string;
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcErrorObject | null;
}

// ── Client Options ──

export interface ClientOptions {
  readonly clientName: string;
  readonly clientVersion: string;
  readonly protocolVersion: string;
  readonly capabilities: Readonly<JsonObject>;
  readonly headers: Readonly<Record<string, string>>;
}

export type ClientState = 'disconnected' | 'connecting' | 'connected' | 'disposed';

/** Produces a correlation id for a request of the given method. */
export type IdGenerator = (method: string) => RequestId;

/** The subset of the global fetch used by the transport. */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
