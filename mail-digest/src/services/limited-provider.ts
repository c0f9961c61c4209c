/**
 * Limited Completion Provider
 * Caps the number of simultaneous requests sent to a completion provider.
 * Requests above the cap wait in FIFO order.
 */

import type { CompletionProvider, CompletionRequest } from './completion-provider.js';

class LimitedCompletionProvider implements CompletionProvider {
  private inner: CompletionProvider;
  private maxConcurrent: number;
  private active: number;
  private waiting: Array<() => void>;

  constructor(inner: CompletionProvider, maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.inner = inner;
    this.maxConcurrent = maxConcurrent;
    this.active = 0;
    this.waiting = [];
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  private async acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return;
    }
    // The releasing request hands its slot over, so `active` is unchanged
    await new Promise<void>(resolve => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }

  async send(request: CompletionRequest): Promise<string> {
    await this.acquire();
    try {
      return await this.inner.send(request);
    } finally {
      this.release();
    }
  }
}

export default LimitedCompletionProvider;
