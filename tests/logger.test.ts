import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  ConsoleLogger,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
  LogLevel,
  parseLogLevel,
  errorContext,
} from '../src/core/logger.js';
import type { LogEntry } from '../src/core/logger.js';

describe('Structured Logging', () => {
  let captured: LogEntry[];

  beforeEach(() => {
    captured = [];
    setLogOutput((entry) => captured.push(entry));
    setGlobalLogLevel(LogLevel.DEBUG);
  });

  afterEach(() => {
    resetLogOutput();
    setGlobalLogLevel(LogLevel.INFO);
  });

  it('writes JSON entries tagged with the module name', () => {
    const log = createLogger('MCPClient');
    log.info('Connected', { sessionId: 's1' });
    expect(captured).toHaveLength(1);
    expect(captured[0]).toMatchObject({
      level: 'INFO',
      module: 'MCPClient',
      message: 'Connected',
      context: { sessionId: 's1' },
    });
    expect(new Date(captured[0].timestamp).toISOString()).toBe(captured[0].timestamp);
  });

  it('omits a missing or empty context', () => {
    const log = createLogger('SSETransport');
    log.debug('Transport disposed');
    log.debug('Transport disposed', {});
    expect(captured.map(e => e.context)).toEqual([undefined, undefined]);
  });

  it('drops entries below the global level', () => {
    setGlobalLogLevel(LogLevel.WARN);
    const log = createLogger('SSETransport');
    log.debug('-> request');
    log.info('Event stream open');
    log.warn('Event stream closed');
    log.error('Event stream read failed');
    expect(captured.map(e => e.level)).toEqual(['WARN', 'ERROR']);
    expect(getGlobalLogLevel()).toBe(LogLevel.WARN);
  });

  it('lets a per-logger level override the global one', () => {
    const log = new ConsoleLogger('MCPClient', LogLevel.ERROR);
    log.warn('Request timed out');
    log.error('Connect failed');
    expect(captured.map(e => e.message)).toEqual(['Connect failed']);
  });

  it('writes nothing at SILENT', () => {
    setGlobalLogLevel(LogLevel.SILENT);
    createLogger('MCPClient').error('Connect failed');
    expect(captured).toHaveLength(0);
  });

  it('child logger binds context to every entry', () => {
    const log = createLogger('client').child({ component: 'transport' });
    log.info('open', { url: 'http://127.0.0.1/sse' });
    log.warn('closed');
    expect(captured[0].module).toBe('client');
    expect(captured[0].context).toEqual({ component: 'transport', url: 'http://127.0.0.1/sse' });
    expect(captured[1].context).toEqual({ component: 'transport' });
  });

  it('call context overrides bound context', () => {
    const log = createLogger('m').child({ attempt: 1 });
    log.info('retry', { attempt: 2 });
    expect(captured[0].context).toEqual({ attempt: 2 });
  });

  it('child keeps the parent level', () => {
    const log = createLogger('m', LogLevel.ERROR).child({ a: 1 });
    log.warn('w');
    log.error('e');
    expect(captured.map(e => e.level)).toEqual(['ERROR']);
  });
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Info')).toBe(LogLevel.INFO);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
    expect(parseLogLevel(' error ')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('off')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
  });
});

describe('errorContext', () => {
  it('extracts message and name from errors', () => {
    expect(errorContext(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
  });

  it('stringifies other thrown values', () => {
    expect(errorContext('boom')).toEqual({ error: 'boom' });
    expect(errorContext(42)).toEqual({ error: '42' });
  });
});
