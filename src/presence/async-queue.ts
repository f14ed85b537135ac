/** Async queue: push items, shift blocks until one is available. Supports AbortSignal. */
export class AsyncQueue<T> {
  private buffer: T[] = [];
  private waiting: Array<{ resolve: (item: T) => void; reject: (err: unknown) => void }> = [];

  /** Enqueue an item, or hand it straight to a waiting consumer. */
  push(item: T): void {
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.buffer.push(item);
    }
  }

  shift(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason ?? new DOMException('Aborted', 'AbortError'));
    }
    if (this.buffer.length > 0) {
      const [head] = this.buffer.splice(0, 1);
      return Promise.resolve(head);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiting.indexOf(entry);
        if (idx >= 0) this.waiting.splice(idx, 1);
        reject(signal?.reason ?? new DOMException('Aborted', 'AbortError'));
      };
      const entry = {
        resolve: (item: T) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject,
      };
      this.waiting.push(entry);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Remove and return everything buffered. */
  drain(): T[] {
    const items = this.buffer;
    this.buffer = [];
    return items;
  }
}
