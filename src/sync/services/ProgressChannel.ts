/**
 * ProgressChannel
 *
 * Single-consumer async queue. The producer pushes without waiting for the
 * consumer; the consumer iterates with `for await` until the channel closes.
 */

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(settle => {
    resolve = settle;
  });
  return { promise, resolve };
}

export class ProgressChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiter: Deferred<boolean> | null = null;
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    this.buffer.push(value);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      if (this.buffer.length > 0) {
        yield* this.buffer.splice(0);
        continue;
      }
      if (this.closed) return;

      this.waiter = createDeferred<boolean>();
      await this.waiter.promise;
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve(true);
  }
}
