import { describe, it, expect } from 'vitest';
import { AsyncQueue } from '../../utils/AsyncQueue.js';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe('AsyncQueue', () => {
  it('drains buffered items before ending on close', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.close();
    queue.push(3);

    expect(await collect(queue)).toEqual([1, 2]);
  });

  it('hands pushed items to a waiting reader', async () => {
    const queue = new AsyncQueue<string>();
    const result = collect(queue);

    queue.push('a');
    queue.push('b');
    queue.close();

    expect(await result).toEqual(['a', 'b']);
  });

  it('rejects after buffered items when failed', async () => {
    const queue = new AsyncQueue<number>();
    const seen: number[] = [];
    queue.push(1);
    queue.fail(new Error('connection lost'));

    await expect(
      (async () => {
        for await (const item of queue) seen.push(item);
      })()
    ).rejects.toThrow('connection lost');
    expect(seen).toEqual([1]);
  });

  it('closes when the signal aborts', async () => {
    const controller = new AbortController();
    const queue = new AsyncQueue<number>(controller.signal);
    const result = collect(queue);

    controller.abort();

    expect(await result).toEqual([]);
    expect(queue.isDone).toBe(true);
  });

  it('starts closed on an aborted signal', () => {
    const queue = new AsyncQueue<number>(AbortSignal.abort());
    queue.push(1);

    expect(queue.size).toBe(0);
  });
});
