import { TransportAdapter } from '../../../core';

interface Waiter {
  resolve: (message: Buffer | null) => void;
  cleanup: () => void;
}

/**
 * Bounded in-process FIFO transport.
 *
 * Producers `push` raw message bytes; the ingestion loop `receive`s them in
 * arrival order. A receive resolves with null after its timeout, or early
 * when its abort signal fires.
 */
export class QueueTransportAdapter implements TransportAdapter {
  private readonly messages: Buffer[] = [];
  private readonly waiters: Waiter[] = [];

  constructor(private readonly capacity = 1000) {}

  /**
   * Enqueue a message; false when the queue is full
   */
  push(message: Buffer): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(Buffer.from(message));
      return true;
    }

    if (this.messages.length >= this.capacity) {
      return false;
    }

    this.messages.push(Buffer.from(message));
    return true;
  }

  receive(timeoutMs: number, signal?: AbortSignal): Promise<Buffer | null> {
    const next = this.messages.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      const settleEmpty = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        waiter.cleanup();
        resolve(null);
      };
      const onAbort = () => settleEmpty();
      const timer = setTimeout(settleEmpty, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  pending(): number {
    return this.messages.length;
  }

  getCapacity(): number {
    return this.capacity;
  }
}
