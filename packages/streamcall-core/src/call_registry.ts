// Registry of in-flight calls sharing one owning queue.

import { RpcError } from "@streamcall/status";
import type { AsyncQueue } from "./async_queue.ts";
import type { ConnectivityMonitor, NetworkStatus } from "./connectivity.ts";
import { createLogger, type Logger } from "./logging.ts";

/** What the registry needs from a call to abandon it. */
export interface RegisteredCall {
  /** Finish without notifying the call's owner. */
  finishImmediately(): void;
  /** Finish and notify the call's owner with `error`. */
  finishAndNotify(error?: RpcError): void;
}

export interface CallRegistryOptions {
  /** Monitor whose changes abandon every registered call. */
  connectivityMonitor?: ConnectivityMonitor;
  logger?: Logger;
}

/**
 * Tracks calls from the moment they start until they finish.
 *
 * All methods run on the owning queue. Connectivity callbacks may fire from
 * anywhere; they are moved onto the queue before touching any call.
 */
export class CallRegistry {
  private calls = new Set<RegisteredCall>();
  private log: Logger;

  constructor(
    private readonly worker: AsyncQueue,
    options: CallRegistryOptions = {},
  ) {
    this.log = options.logger ?? createLogger("streamcall:calls");
    options.connectivityMonitor?.addCallback((status) => {
      this.worker.enqueue(() => this.handleConnectivityChange(status));
    });
  }

  register(call: RegisteredCall): void {
    this.worker.verifyIsCurrentQueue();
    this.calls.add(call);
  }

  unregister(call: RegisteredCall): void {
    this.worker.verifyIsCurrentQueue();
    this.calls.delete(call);
  }

  has(call: RegisteredCall): boolean {
    return this.calls.has(call);
  }

  get size(): number {
    return this.calls.size;
  }

  /**
   * Abandon every registered call with an `unavailable` error.
   *
   * Iterates over a copy: finishing a call unregisters it.
   */
  handleConnectivityChange(status: NetworkStatus): void {
    this.worker.verifyIsCurrentQueue();
    this.log.debug("connectivity changed", { status, calls: this.calls.size });

    for (const call of [...this.calls]) {
      call.finishAndNotify(RpcError.unavailable("Network connectivity changed"));
    }
  }

  /** Finish every registered call without notifying anyone. */
  shutdown(): void {
    this.worker.verifyIsCurrentQueue();
    this.log.debug("shutdown", { calls: this.calls.size });

    for (const call of [...this.calls]) {
      call.finishImmediately();
    }
    this.calls.clear();
  }
}
