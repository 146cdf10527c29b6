import { describe, it, expect } from 'vitest';
import { EventQueue } from '../src/transport/event-queue.js';

async function drain<T>(queue: EventQueue<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of queue) items.push(item);
  return items;
}

describe('EventQueue', () => {
  it('buffers items pushed before iteration', async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.end();
    expect(await drain(queue)).toEqual([1, 2]);
  });

  it('hands items to a waiting consumer', async () => {
    const queue = new EventQueue<string>();
    const drained = drain(queue);
    queue.push('a');
    await Promise.resolve();
    queue.push('b');
    queue.end();
    expect(await drained).toEqual(['a', 'b']);
  });

  it('drops pushes after end', async () => {
    const queue = new EventQueue<number>();
    queue.end();
    queue.push(1);
    expect(queue.isClosed).toBe(true);
    expect(await drain(queue)).toEqual([]);
  });

  it('delivers buffered items before the failure', async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.fail(new Error('stream broke'));
    const iterator = queue[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 1, done: false });
    await expect(iterator.next()).rejects.toThrow('stream broke');
  });

  it('rejects a waiting consumer on failure', async () => {
    const queue = new EventQueue<number>();
    const drained = drain(queue);
    queue.fail(new Error('stream broke'));
    await expect(drained).rejects.toThrow('stream broke');
  });

  it('can only be iterated once', async () => {
    const queue = new EventQueue<number>();
    queue.end();
    await drain(queue);
    expect(() => queue[Symbol.asyncIterator]()).toThrow('Event sequence is not restartable');
  });

  it('ends when the consumer breaks out', async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);
    for await (const item of queue) {
      expect(item).toBe(1);
      break;
    }
    expect(queue.isClosed).toBe(true);
  });
});
