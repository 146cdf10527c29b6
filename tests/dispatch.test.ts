import { describe, it, expect } from 'vitest';
import {
  classifyEvent,
  classifyMessage,
  extractSessionId,
  parseJson,
  parseMessages,
} from '../src/mcp/dispatch.js';

describe('parseJson', () => {
  it('returns the parsed value', () => {
    expect(parseJson('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('returns a SyntaxError for invalid text', () => {
    const result = parseJson('{oops');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(SyntaxError);
  });
});

describe('extractSessionId', () => {
  it('reads session_id from a JSON object', () => {
    expect(extractSessionId('{"session_id":"abc123"}')).toBe('abc123');
  });

  it('reads sessionId from a JSON object', () => {
    expect(extractSessionId('{"sessionId":"s-9"}')).toBe('s-9');
  });

  it('falls back to text patterns', () => {
    expect(extractSessionId('session_id=abc123')).toBe('abc123');
    expect(extractSessionId('sessionId: "x.y:z"')).toBe('x.y:z');
    expect(extractSessionId('Session-ID = 42')).toBe('42');
  });

  it('returns undefined when nothing matches', () => {
    expect(extractSessionId('hello')).toBeUndefined();
    expect(extractSessionId('{"other":"x"}')).toBeUndefined();
  });
});

describe('classifyMessage', () => {
  it('classifies a result response and stringifies numeric ids', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 7, result: {} })).toEqual({
      kind: 'response',
      id: '7',
      message: { jsonrpc: '2.0', id: 7, result: {} },
    });
  });

  it('classifies an error response', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 'a_1', error: { code: -32601, message: 'Method not found' } })).toEqual({
      kind: 'response',
      id: 'a_1',
      message: { jsonrpc: '2.0', id: 'a_1', error: { code: -32601, message: 'Method not found' } },
    });
  });

  it('keeps responses whose error has an unexpected shape', () => {
    expect(classifyMessage({ id: 'a_1', error: 'boom' })).toEqual({
      kind: 'response',
      id: 'a_1',
      message: { id: 'a_1', error: {} },
    });
    expect(classifyMessage({ id: 'a_2', error: { code: 'E1', message: 'bad' } })).toEqual({
      kind: 'response',
      id: 'a_2',
      message: { id: 'a_2', error: { message: 'bad' } },
    });
    expect(classifyMessage({ id: 3, error: { code: 5, message: 42, data: [1] } })).toEqual({
      kind: 'response',
      id: '3',
      message: { id: 3, error: { code: 5, data: [1] } },
    });
  });

  it('treats a null error as no error', () => {
    expect(classifyMessage({ id: 'a_1', result: 1, error: null })).toEqual({
      kind: 'response',
      id: 'a_1',
      message: { id: 'a_1', result: 1 },
    });
  });

  it('ignores responses with a null id', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } }))
      .toEqual({ kind: 'ignored', reason: 'response with null id' });
  });

  it('ignores objects with an id of the wrong type', () => {
    const message = classifyMessage({ id: { nested: true }, result: {} });
    expect(message).toEqual({ kind: 'ignored', reason: 'response id is not a string or number' });
  });

  it('classifies a notification', () => {
    expect(classifyMessage({ jsonrpc: '2.0', method: 'notifications/progress', params: { progress: 1 } })).toEqual({
      kind: 'notification',
      message: { jsonrpc: '2.0', method: 'notifications/progress', params: { progress: 1 } },
    });
  });

  it('classifies a notification whatever its params', () => {
    expect(classifyMessage({ jsonrpc: '2.0', method: 'notifications/list', params: [1] })).toEqual({
      kind: 'notification',
      message: { jsonrpc: '2.0', method: 'notifications/list', params: [1] },
    });
    expect(classifyMessage({ method: 'ping' })).toEqual({ kind: 'notification', message: { method: 'ping' } });
  });

  it('ignores values that are neither', () => {
    expect(classifyMessage([1, 2])).toEqual({ kind: 'ignored', reason: 'not a JSON-RPC message' });
    expect(classifyMessage('text')).toEqual({ kind: 'ignored', reason: 'not a JSON-RPC message' });
  });
});

describe('parseMessages', () => {
  it('parses each line independently and counts the rest', () => {
    const data = '{"id":"a_1","result":{}}\nping\n\n{"method":"notifications/message"}';
    const { messages, discardedLines } = parseMessages(data);
    expect(messages.map(m => m.kind)).toEqual(['response', 'notification']);
    expect(discardedLines).toBe(1);
  });
});

describe('classifyEvent', () => {
  it('classifies endpoint events case-insensitively', () => {
    expect(classifyEvent({ eventType: 'Endpoint', data: '  /messages/?session_id=abc123 ' }))
      .toEqual({ kind: 'endpoint', value: '/messages/?session_id=abc123' });
  });

  it('reports an empty endpoint event', () => {
    expect(classifyEvent({ eventType: 'endpoint', data: '   ' }))
      .toEqual({ kind: 'unparseable', reason: 'empty endpoint event' });
  });

  it('classifies session events', () => {
    expect(classifyEvent({ eventType: 'session', data: '{"session_id":"s1"}' }))
      .toEqual({ kind: 'session', sessionId: 's1' });
    expect(classifyEvent({ eventType: 'session', data: 'nothing here' }))
      .toEqual({ kind: 'unparseable', reason: 'no session id in session event' });
  });

  it('treats untyped and message events as JSON-RPC payloads', () => {
    const untyped = classifyEvent({ data: '{"id":"a_1","result":{"ok":true}}' });
    const typed = classifyEvent({ eventType: 'message', data: '{"id":"a_1","result":{"ok":true}}' });
    expect(untyped).toEqual(typed);
    expect(untyped.kind).toBe('messages');
  });

  it('reports keep-alive text as unparseable', () => {
    expect(classifyEvent({ data: 'ping' })).toEqual({ kind: 'unparseable', reason: 'no JSON in event data' });
    expect(classifyEvent({ data: '' })).toEqual({ kind: 'unparseable', reason: 'empty event data' });
  });
});
