// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/runtime/async-queue`
 * Purpose: Async queue bridging synchronous graph run hooks to an async consumer.
 * Scope: Used by the runtime's streaming mode (run hooks push, HTTP writer iterates).
 * Invariants:
 *   - push() is synchronous; pushes after close() are dropped
 *   - Items are yielded in push order
 *   - close() ends iteration once buffered items are drained
 * Side-effects: none
 * @public
 */

/**
 * ```typescript
 * const queue = new AsyncQueue<ProgressEvent>();
 * graph.run(input, { context, onNodeStart: (id) => queue.push({ id }) })
 *   .finally(() => queue.close());
 * for await (const event of queue) write(event);
 * ```
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  /** Boxed so that `undefined` items survive the queue */
  private readonly buffer: { readonly value: T }[] = [];
  private closed = false;
  private waiter: ((result: IteratorResult<T, undefined>) => void) | undefined;

  push(item: T): void {
    if (this.closed) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: item, done: false });
      return;
    }
    this.buffer.push({ value: item });
  }

  close(): void {
    this.closed = true;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: undefined, done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) {
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return this;
  }
}
