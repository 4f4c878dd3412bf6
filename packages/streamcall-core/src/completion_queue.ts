// Completion queue and poller.
//
// Transports push finished operations here in the order they actually
// completed; the poller pulls them off one at a time and fires them. Neither
// looks inside a completion.

import type { Completion } from "./completion.ts";
import { createLogger, type Logger } from "./logging.ts";

/** A finished operation waiting to be fired. */
export interface QueuedCompletion {
  completion: Completion;
  ok: boolean;
}

/**
 * Unbounded multi-producer single-consumer queue of finished operations.
 */
export class CompletionQueue {
  private buffer: QueuedCompletion[] = [];
  private waiters: Array<(value: QueuedCompletion | null) => void> = [];
  private closed = false;

  /**
   * Push a finished operation.
   *
   * @returns false if the queue has been shut down
   */
  push(completion: Completion, ok: boolean): boolean {
    if (this.closed) {
      return false;
    }

    const entry = { completion, ok };

    // If there's a waiter, deliver directly
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(entry);
      return true;
    }

    this.buffer.push(entry);
    return true;
  }

  /**
   * Wait for the next finished operation.
   *
   * Returns null once the queue is shut down and everything pushed before
   * the shutdown has been taken.
   */
  async next(): Promise<QueuedCompletion | null> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return buffered;
    }

    if (this.closed) {
      return null;
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Stop accepting pushes and wake every waiter with null. */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter(null);
    }
    this.waiters.length = 0;
  }

  isShutdown(): boolean {
    return this.closed;
  }

  /** Number of finished operations not yet taken. */
  get size(): number {
    return this.buffer.length;
  }
}

export interface CompletionPollerOptions {
  logger?: Logger;
}

/**
 * Background loop firing completions as they come off a CompletionQueue.
 */
export class CompletionPoller {
  private loop: Promise<void> | null = null;
  private log: Logger;

  constructor(
    private readonly queue: CompletionQueue,
    options: CompletionPollerOptions = {},
  ) {
    this.log = options.logger ?? createLogger("streamcall:poller");
  }

  /** Start polling. Calling it again while running is a no-op. */
  start(): void {
    if (this.loop) return;
    this.loop = this.poll();
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Settles once the loop has exited, which happens after the queue is shut
   * down and drained. Settles immediately if polling never started.
   */
  stopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async poll(): Promise<void> {
    while (true) {
      const entry = await this.queue.next();
      if (entry === null) {
        this.log.debug("completion queue shut down");
        return;
      }
      this.log.debug("completion", { type: entry.completion.type, ok: entry.ok });
      entry.completion.complete(entry.ok);
    }
  }
}
