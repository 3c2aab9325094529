/**
 * @fileOverview: Promise helpers for per-call timeouts and index generation locking
 * @module: AsyncUtils
 * @keyFunctions:
 *   - withTimeout(): Reject a pending call after a deadline
 *   - AsyncRwLock: Readers-writer lock; queries share, rebuilds are exclusive
 */

import { ErrorCode, RepoQueryError } from './errorHandler';

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new RepoQueryError(ErrorCode.GENERATION_TIMEOUT, `${label} timed out after ${timeoutMs}ms`, {
          timeoutMs,
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

type Waiter = { kind: 'read' | 'write'; resolve: () => void };

/**
 * FIFO readers-writer lock; a queued writer blocks readers that arrive after it
 */
export class AsyncRwLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async withRead<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async withWrite<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  get state(): { readers: number; writing: boolean; waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.queue.length };
  }

  private acquire(kind: Waiter['kind']): Promise<void> {
    return new Promise(resolve => {
      this.queue.push({ kind, resolve });
      this.drain();
    });
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (next.kind === 'write') {
        if (this.writing || this.readers > 0) return;
        this.queue.shift();
        this.writing = true;
        next.resolve();
        return;
      }
      if (this.writing) return;
      this.queue.shift();
      this.readers++;
      next.resolve();
    }
  }
}
