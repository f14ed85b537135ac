/**
 * RegistryWatcher - bridge between file-change notifications and the engine.
 *
 * notify() only enqueues. A single consumer drains the queue, waits out the
 * debounce delay so the writer can finish, folds any notifications that
 * arrived meanwhile into one, and then runs the reload. Registry state is
 * never touched from the notifying side.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { watch, type FSWatcher } from 'chokidar';
import { AsyncQueue } from './async-queue.js';

export interface RegistryWatcherOptions {
  reload: () => Promise<unknown>;
  debounceMs: number;
  /** File to watch with chokidar. Omit to drive the bridge through notify() only. */
  watchPath?: string;
}

export class RegistryWatcher {
  private readonly queue = new AsyncQueue<number>();
  private abort: AbortController | null = null;
  private consumer: Promise<void> | null = null;
  private fileWatcher: FSWatcher | null = null;
  private reloads = 0;

  constructor(private readonly options: RegistryWatcherOptions) {}

  start(): void {
    if (this.abort) return;
    const abort = new AbortController();
    this.abort = abort;
    this.consumer = this.consume(abort.signal).catch((err) => {
      console.error('[Watcher] Consumer stopped unexpectedly:', err instanceof Error ? err.message : err);
    });

    const { watchPath } = this.options;
    if (watchPath) {
      this.fileWatcher = watch(watchPath, { ignoreInitial: true });
      for (const event of ['add', 'change', 'unlink'] as const) {
        this.fileWatcher.on(event, () => {
          console.log(`[Watcher] Detected ${event} on ${watchPath}`);
          this.notify();
        });
      }
      this.fileWatcher.on('error', (err) => {
        console.error('[Watcher] File watch error:', err instanceof Error ? err.message : err);
      });
      console.log(`[Watcher] Watching ${watchPath} for changes...`);
    }
  }

  /** Signal that the registry may have changed. Safe to call from any callback. */
  notify(): void {
    if (!this.abort) return;
    this.queue.push(Date.now());
  }

  async stop(): Promise<void> {
    if (!this.abort) return;
    this.abort.abort();
    this.abort = null;
    if (this.fileWatcher) {
      await this.fileWatcher.close();
      this.fileWatcher = null;
    }
    await this.consumer;
    this.consumer = null;
    this.queue.drain();
    console.log('[Watcher] Stopped');
  }

  /** Number of reloads run so far. */
  get reloadCount(): number {
    return this.reloads;
  }

  private async consume(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.queue.shift(signal);
        await sleep(this.options.debounceMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }

      this.queue.drain();
      this.reloads++;
      try {
        await this.options.reload();
      } catch (err) {
        console.error('[Watcher] Registry reload failed:', err instanceof Error ? err.message : err);
      }
    }
  }
}
