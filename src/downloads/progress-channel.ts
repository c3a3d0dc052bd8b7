import type { DownloadProgress, ProgressSink } from '../types/index.js';

export const DEFAULT_PROGRESS_CAPACITY = 8;

/**
 * Bounded single-consumer queue of progress updates.
 *
 * `trySend` never waits: when the buffer is full the update is dropped.
 * Updates that are kept are received in send order.
 */
export class ProgressChannel implements ProgressSink {
  private buffer: DownloadProgress[] = [];
  private closed = false;
  private waiter: ((update: DownloadProgress | null) => void) | null = null;
  private dropped = 0;

  constructor(private readonly capacity: number = DEFAULT_PROGRESS_CAPACITY) {}

  trySend(update: DownloadProgress): boolean {
    if (this.closed) {
      return false;
    }

    // A parked receiver takes the update directly
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(update);
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.dropped++;
      return false;
    }

    this.buffer.push(update);
    return true;
  }

  /**
   * Wait for the next update. Resolves to null once the channel is closed and drained.
   */
  recv(): Promise<DownloadProgress | null> {
    const next = this.buffer.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Stop accepting updates. Buffered updates can still be received.
   */
  close(): void {
    this.closed = true;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(null);
    }
  }

  get droppedCount(): number {
    return this.dropped;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<DownloadProgress> {
    for (;;) {
      const update = await this.recv();
      if (update === null) {
        return;
      }
      yield update;
    }
  }
}
