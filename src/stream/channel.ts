/**
 * Bounded async event channel.
 *
 * One producer pushes, one consumer iterates. `push()` resolves once the
 * item is buffered; when the buffer is full it waits for the consumer.
 *
 * Two ways to end a channel:
 *   - close():  producer side. Buffered items are still delivered.
 *   - cancel(): consumer side. Buffered items are dropped, pending
 *               pushes resolve `false`, and `signal` aborts so the
 *               producer can stop its work.
 */

import { WorkflowError, validationError } from '../domain/errors';

interface PendingWrite<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly pendingWrites: PendingWrite<T>[] = [];
  private waitingReader?: (result: IteratorResult<T>) => void;
  private closed = false;
  private readonly controller = new AbortController();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new WorkflowError(validationError(`Channel capacity must be a positive integer, got ${capacity}`));
    }
  }

  /** Aborted when the consumer cancels. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Items buffered and not yet read. */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isCanceled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Enqueue an item. Resolves `true` once buffered or handed to the
   * reader, `false` if the channel was closed or canceled first.
   */
  push(item: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);

    if (this.waitingReader) {
      const reader = this.waitingReader;
      this.waitingReader = undefined;
      reader({ value: item, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pendingWrites.push({ item, resolve });
    });
  }

  /** Producer is done. Readers drain what is buffered, then finish. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.buffer.length === 0 && this.pendingWrites.length === 0) {
      this.releaseReader();
    }
  }

  /** Consumer is gone. Drops buffered items and stops the producer. */
  cancel(reason = 'consumer canceled'): void {
    if (this.isCanceled) return;
    this.closed = true;
    this.buffer.length = 0;
    for (const pending of this.pendingWrites.splice(0)) {
      pending.resolve(false);
    }
    this.controller.abort(reason);
    this.releaseReader();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel('consumer stopped reading');
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      this.admitPendingWrite();
      return Promise.resolve({ value: item, done: false });
    }

    const pending = this.pendingWrites.shift();
    if (pending) {
      pending.resolve(true);
      return Promise.resolve({ value: pending.item, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waitingReader = resolve;
    });
  }

  private admitPendingWrite(): void {
    const pending = this.pendingWrites.shift();
    if (!pending) return;
    this.buffer.push(pending.item);
    pending.resolve(true);
  }

  private releaseReader(): void {
    if (!this.waitingReader) return;
    const reader = this.waitingReader;
    this.waitingReader = undefined;
    reader({ value: undefined, done: true });
  }
}
