/**
 * Inbound event classification.
 *
 * `classifyEvent` is total: every stream event maps to exactly one outcome
 * and nothing throws. The client decides what to log and what to act on.
 */

import type {
  JsonRpcErrorObject,
  JsonRpcNotification,
  JsonRpcResponse,
  Result,
  StreamEvent,
} from '../core/types.js';
import { isJsonRpcNotification, isResponseEnvelope, isSessionPayload } from './schemas.js';

export type InboundMessage =
  | { kind: 'response'; id: string; message: JsonRpcResponse }
  | { kind: 'notification'; message: JsonRpcNotification }
  | { kind: 'ignored'; reason: string };

export type DispatchOutcome =
  | { kind: 'endpoint'; value: string }
  | { kind: 'session'; sessionId: string }
  | { kind: 'messages'; messages: InboundMessage[]; discardedLines: number }
  | { kind: 'unparseable'; reason: string };

const SESSION_ID_PATTERN = /session[_-]?id\s*[:=]\s*"?([A-Za-z0-9_.:\-]+)"?/i;

export function parseJson(text: string): Result<unknown, SyntaxError> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof SyntaxError ? err : new SyntaxError(String(err)) };
  }
}

/**
 * Session id carried by a `session` event: a JSON object with `session_id`
 * or `sessionId`, or text such as `session_id=abc` / `sessionId: "abc"`.
 */
export function extractSessionId(data: string): string | undefined {
  const parsed = parseJson(data);
  if (parsed.ok && isSessionPayload(parsed.value)) {
    const sid = parsed.value.session_id || parsed.value.sessionId;
    if (sid) return sid;
  }
  return SESSION_ID_PATTERN.exec(data)?.[1];
}

/**
 * Whatever the server put in `error`, keep only the members that have the
 * expected types. A present but unusable error still fails the call.
 */
function normalizeError(error: unknown): JsonRpcErrorObject | undefined {
  if (error === undefined || error === null) return undefined;
  if (typeof error !== 'object' || Array.isArray(error)) return {};
  const normalized: JsonRpcErrorObject = {};
  if ('code' in error && typeof error.code === 'number') normalized.code = error.code;
  if ('message' in error && typeof error.message === 'string') normalized.message = error.message;
  if ('data' in error) normalized.data = error.data;
  return normalized;
}

export function classifyMessage(value: unknown): InboundMessage {
  if (isResponseEnvelope(value)) {
    if (value.id === null) return { kind: 'ignored', reason: 'response with null id' };
    const message: JsonRpcResponse = { id: value.id };
    if (typeof value.jsonrpc === 'string') message.jsonrpc = value.jsonrpc;
    if ('result' in value) message.result = value.result;
    const error = normalizeError(value.error);
    if (error) message.error = error;
    return { kind: 'response', id: String(value.id), message };
  }
  if (typeof value === 'object' && value !== null && 'id' in value) {
    return { kind: 'ignored', reason: 'response id is not a string or number' };
  }
  if (isJsonRpcNotification(value)) {
    return { kind: 'notification', message: value };
  }
  return { kind: 'ignored', reason: 'not a JSON-RPC message' };
}

/**
 * Split `data` into lines and parse each as an independent JSON document.
 * Lines that fail to parse (keep-alives, partial frames) are counted and
 * dropped.
 */
export function parseMessages(data: string): { messages: InboundMessage[]; discardedLines: number } {
  const messages: InboundMessage[] = [];
  let discardedLines = 0;
  for (const line of data.split(/\r\n|\r|\n/)) {
    const trimmed = line.trim();
    if (trimmed === '') continue;
    const parsed = parseJson(trimmed);
    if (parsed.ok) {
      messages.push(classifyMessage(parsed.value));
    } else {
      discardedLines++;
    }
  }
  return { messages, discardedLines };
}

export function classifyEvent(event: StreamEvent): DispatchOutcome {
  const type = event.eventType?.toLowerCase();

  if (type === 'endpoint') {
    const value = event.data.trim();
    return value === ''
      ? { kind: 'unparseable', reason: 'empty endpoint event' }
      : { kind: 'endpoint', value };
  }

  if (type === 'session') {
    const sessionId = extractSessionId(event.data);
    return sessionId
      ? { kind: 'session', sessionId }
      : { kind: 'unparseable', reason: 'no session id in session event' };
  }

  const { messages, discardedLines } = parseMessages(event.data);
  if (messages.length === 0) {
    return { kind: 'unparseable', reason: discardedLines > 0 ? 'no JSON in event data' : 'empty event data' };
  }
  return { kind: 'messages', messages, discardedLines };
}
