// Completion tags: one per asynchronous operation issued on a call.
//
// The transport hands a completion back through the completion queue when
// its operation finishes; the poller fires it from there. Firing never runs
// the handler directly: the handler is moved onto the owning queue, which is
// what keeps all handler code on a single logical thread.

import type { AsyncQueue } from "./async_queue.ts";
import { hardAssert } from "./assert.ts";

/** Kind of operation a completion tracks. */
export const CompletionType = {
  Write: "write",
  Read: "read",
  Finish: "finish",
} as const;
export type CompletionType = (typeof CompletionType)[keyof typeof CompletionType];

/**
 * Runs on the owning queue once the completion is off the completion queue.
 *
 * @param ok - Whether the operation succeeded, as reported by the transport
 */
export type CompletionHandler = (ok: boolean, completion: Completion) => void;

type CompletionState = "pending" | "firing" | "retired";

function retiredSignal(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export class Completion {
  /**
   * Buffer slot: bytes to send for a write, bytes received for a successful
   * read. Filled by the transport.
   */
  message: Uint8Array | null;

  private state: CompletionState = "pending";
  private handler: CompletionHandler | null;
  private readonly signal = retiredSignal();

  constructor(
    readonly type: CompletionType,
    private readonly worker: AsyncQueue,
    handler: CompletionHandler,
    message: Uint8Array | null = null,
  ) {
    this.handler = handler;
    this.message = message;
  }

  /**
   * Report the operation's outcome. Called by the poller (or a test standing
   * in for it), exactly once.
   */
  complete(ok: boolean): void {
    hardAssert(this.state === "pending", `${this.type} completion fired more than once`);
    this.state = "firing";

    this.worker.enqueue(() => {
      this.state = "retired";
      const handler = this.handler;
      this.handler = null;
      try {
        handler?.(ok, this);
      } finally {
        this.signal.resolve();
      }
    });
  }

  /** Whether the completion has been fired (its handler may not have run yet). */
  isFired(): boolean {
    return this.state !== "pending";
  }

  /** Whether the handler has run on the owning queue. */
  isRetired(): boolean {
    return this.state === "retired";
  }

  /** Settles once the handler has run on the owning queue. */
  get retired(): Promise<void> {
    return this.signal.promise;
  }
}
