// Owning executor: a strictly serial FIFO task queue.
//
// Every reader method call and every completion handler runs as a task on
// one of these. Tasks run one at a time, each to completion, in the order
// they were enqueued, so reader state never needs any other synchronization.

import { hardAssert } from "./assert.ts";

/** A unit of work run on the queue. */
export type Operation = () => void;

export interface AsyncQueueOptions {
  /**
   * Called when a task queued with `enqueue` throws.
   *
   * Defaults to rethrowing the error outside the queue, where it surfaces as
   * an uncaught exception.
   */
  onError?: (error: unknown) => void;
}

function rethrowUncaught(error: unknown): void {
  setTimeout(() => {
    throw error;
  }, 0);
}

export class AsyncQueue {
  private tasks: Operation[] = [];
  private scheduled = false;
  private executing = false;
  private idleWaiters: Array<() => void> = [];
  private onError: (error: unknown) => void;

  constructor(options: AsyncQueueOptions = {}) {
    this.onError = options.onError ?? rethrowUncaught;
  }

  /** Schedule `operation` to run after every task already queued. */
  enqueue(operation: Operation): void {
    this.tasks.push(operation);
    this.schedule();
  }

  /**
   * Schedule `operation` and wait until it ran.
   *
   * Rejects with whatever `operation` threw. Must not be called from a task
   * on this queue: the task would wait on itself.
   */
  enqueueBlocking(operation: Operation): Promise<void> {
    hardAssert(!this.executing, "enqueueBlocking called from a task on the same queue");

    return new Promise<void>((resolve, reject) => {
      this.enqueue(() => {
        try {
          operation();
          resolve();
        } catch (e) {
          reject(e);
        }
      });
    });
  }

  /** Whether the caller is running inside a task of this queue. */
  isCurrentQueue(): boolean {
    return this.executing;
  }

  verifyIsCurrentQueue(): void {
    hardAssert(this.executing, "expected to be called from a task on the owning queue");
  }

  /** Number of tasks waiting to run. */
  get size(): number {
    return this.tasks.length;
  }

  /** Settles once no task is queued or running. */
  drain(): Promise<void> {
    if (this.tasks.length === 0 && !this.executing) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private schedule(): void {
    if (this.scheduled || this.executing) return;
    this.scheduled = true;
    queueMicrotask(() => this.run());
  }

  private run(): void {
    this.scheduled = false;
    this.executing = true;
    try {
      // Tasks enqueued by a running task are picked up by this same loop.
      let task = this.tasks.shift();
      while (task) {
        try {
          task();
        } catch (e) {
          this.onError(e);
        }
        task = this.tasks.shift();
      }
    } finally {
      this.executing = false;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
