/**
 * SSE line reassembly: a decoder for raw text and a reader for incoming byte streams.
 */

import type { StreamEvent } from '../core/types.js';

/**
 * Incremental line-oriented SSE decoder.
 *
 * Text may arrive in arbitrary chunks; a line is only processed once its
 * terminator (`\n`, `\r\n` or `\r`) has been seen, so re-chunking the same
 * input yields the same events.
 */
export class SSELineDecoder {
  private partial = '';
  private dataLines: string[] = [];
  private eventType: string | undefined;
  private eventId: string | undefined;

  /** Feed a chunk of text, returning the events completed by it. */
  push(chunk: string): StreamEvent[] {
    const events: StreamEvent[] = [];
    const text = this.partial + chunk;
    let start = 0;

    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      if (ch !== '\n' && ch !== '\r') continue;
      if (ch === '\r') {
        // A CR at the end may be the first half of a CRLF
        if (i + 1 === text.length) break;
        this.processLine(text.slice(start, i), events);
        if (text[i + 1] === '\n') i++;
      } else {
        this.processLine(text.slice(start, i), events);
      }
      start = i + 1;
    }

    this.partial = text.slice(start);
    return events;
  }

  /**
   * End of input. A held trailing `\r` still ends its line, so an event it
   * terminates is returned; an unterminated event is dropped, never flushed.
   */
  end(): StreamEvent[] {
    const events: StreamEvent[] = [];
    if (this.partial.endsWith('\r')) {
      this.processLine(this.partial.slice(0, -1), events);
    }
    this.partial = '';
    this.dataLines = [];
    this.eventType = undefined;
    this.eventId = undefined;
    return events;
  }

  private processLine(line: string, events: StreamEvent[]): void {
    if (line === '') {
      this.flush(events);
    } else if (line.startsWith('event:')) {
      this.eventType = line.slice(6).trim();
    } else if (line.startsWith('id:')) {
      this.eventId = line.slice(3).trim();
    } else if (line.startsWith('data:')) {
      this.dataLines.push(line.slice(5).trim());
    }
    // Comments (`:keep-alive`), `retry:` and unknown fields are ignored
  }

  private flush(events: StreamEvent[]): void {
    if (this.dataLines.length === 0) return;
    events.push({ eventType: this.eventType, id: this.eventId, data: this.dataLines.join('\n') });
    this.dataLines = [];
    this.eventType = undefined;
    this.eventId = undefined;
  }
}

/**
 * Parses SSE events from a readable byte stream (e.g. fetch response body).
 */
export class SSEReader {
  constructor(private stream: ReadableStream<Uint8Array>) {}

  async *events(): AsyncGenerator<StreamEvent> {
    const reader = this.stream.getReader();
    const decoder = new TextDecoder();
    const lines = new SSELineDecoder();

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        yield* lines.push(decoder.decode(value, { stream: true }));
      }
      yield* lines.push(decoder.decode());
      yield* lines.end();
    } finally {
      reader.releaseLock();
    }
  }
}
