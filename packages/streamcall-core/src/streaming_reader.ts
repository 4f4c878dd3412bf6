// Streaming reader: drives one server-streaming call to completion.
//
// Sends a single request, then reads responses one at a time until a read
// fails, asks the transport for the final status and hands everything that
// was read to the caller's callback, exactly once.
//
// State machine:
//
//   created ──start──▶ started ──read/write fails──▶ finishing ──finish──▶ finished
//                         │                              ▲
//                         └──finishImmediately/──────────┘ (waits for pending
//                            finishAndNotify                completions to retire)
//
// Every method and every completion handler runs on the owning queue, so the
// reader never sees two of its own operations at once.

import {
  InvalidUsageError,
  errorFromTransportStatus,
  statusCodeName,
  type RpcError,
  type StreamResult,
} from "@streamcall/status";
import type { AsyncQueue } from "./async_queue.ts";
import { hardAssert } from "./assert.ts";
import type { ClientCall, ResponseHeaders } from "./call.ts";
import type { CallRegistry, RegisteredCall } from "./call_registry.ts";
import { Completion, CompletionType } from "./completion.ts";
import { createLogger, type Logger } from "./logging.ts";

export type ReaderState = "created" | "started" | "finishing" | "finished";

/** Receives every response in read order, or the error that ended the call. */
export type StreamingReaderCallback = (result: StreamResult<Uint8Array[]>) => void;

export interface StreamingReaderOptions {
  /** Registry the reader joins on start and leaves when finished. */
  registry?: CallRegistry;
  logger?: Logger;
}

/** Why the owner cut the call short. */
interface Abandonment {
  /** Delivered instead of the transport's final status; null delivers the responses. */
  error: RpcError | null;
}

export class StreamingReader implements RegisteredCall {
  private _state: ReaderState = "created";
  private responses: Uint8Array[] = [];
  private callback: StreamingReaderCallback | null = null;
  private pending = new Set<Completion>();
  private abandonment: Abandonment | null = null;
  private quiescentWaiters: Array<() => void> = [];
  private readonly registry: CallRegistry | null;
  private readonly log: Logger;

  constructor(
    private readonly worker: AsyncQueue,
    private readonly call: ClientCall,
    private readonly request: Uint8Array,
    options: StreamingReaderOptions = {},
  ) {
    this.registry = options.registry ?? null;
    this.log = options.logger ?? createLogger("streamcall:reader");
  }

  get state(): ReaderState {
    return this._state;
  }

  isFinished(): boolean {
    return this._state === "finished";
  }

  /** Completions issued to the transport and not yet retired. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Start the call and send the request.
   *
   * May be called once. Calling it again is a bug in the caller and fails
   * hard, even after the reader finished.
   */
  start(callback: StreamingReaderCallback): void {
    this.worker.verifyIsCurrentQueue();
    hardAssert(this._state === "created", "StreamingReader.start called more than once");

    this.callback = callback;
    this._state = "started";
    this.registry?.register(this);
    this.log.debug("start", { requestBytes: this.request.length });

    this.call.start();
    this.writeRequest();
  }

  /**
   * Cancel the call and drop the callback without invoking it.
   *
   * Safe in any state and idempotent. Before `start` it does nothing. The
   * reader only becomes `finished` once every completion already handed to
   * the transport has come back; await `whenQuiescent()` for that.
   */
  finishImmediately(): void {
    this.worker.verifyIsCurrentQueue();
    if (this._state === "created" || this._state === "finished") return;

    this.callback = null;
    if (this.abandonment) return;
    this.abandon(null);
  }

  /**
   * Cancel the call and notify the callback with `error` (or with the
   * responses read so far when no error is given), instead of the status the
   * transport would report.
   *
   * Delivery waits until every pending completion has retired.
   *
   * @throws InvalidUsageError if the reader was never started
   */
  finishAndNotify(error?: RpcError): void {
    this.worker.verifyIsCurrentQueue();
    if (this._state === "created") {
      throw new InvalidUsageError("finishAndNotify called before start: no callback to notify");
    }
    if (this._state === "finished" || this.abandonment) return;

    this.abandon(error ?? null);
  }

  /** Response headers received so far. Empty before they arrive. */
  getResponseHeaders(): ResponseHeaders {
    return this.call.responseHeaders();
  }

  /**
   * Settles once the reader is finished and no completion is pending.
   * Settles immediately for a reader that was never started.
   */
  whenQuiescent(): Promise<void> {
    if (this._state === "created" || this.isQuiescent()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.quiescentWaiters.push(resolve);
    });
  }

  /**
   * Release the reader. Only allowed before start, or once finished with
   * nothing pending: the transport may still write into pending buffers.
   */
  dispose(): void {
    hardAssert(
      this._state === "created" || this.isQuiescent(),
      `StreamingReader disposed while ${this._state} with ${this.pending.size} pending completion(s)`,
    );
    this.callback = null;
    this.responses = [];
  }

  private isQuiescent(): boolean {
    return this._state === "finished" && this.pending.size === 0;
  }

  // Operations

  private newCompletion(type: CompletionType, handler: (ok: boolean, completion: Completion) => void): Completion {
    const completion = new Completion(type, this.worker, (ok, c) => this.retire(ok, c, handler));
    this.pending.add(completion);
    return completion;
  }

  private writeRequest(): void {
    const completion = this.newCompletion(CompletionType.Write, (ok) => this.onWriteDone(ok));
    completion.message = this.request;
    this.call.write(this.request, completion);
  }

  private readNext(): void {
    const completion = this.newCompletion(CompletionType.Read, (ok, c) => this.onReadDone(ok, c));
    this.call.read(completion);
  }

  private finishCall(): void {
    const completion = this.newCompletion(CompletionType.Finish, () => this.onFinishDone());
    this.call.finish(completion);
  }

  // Completion handling

  private retire(ok: boolean, completion: Completion, handler: (ok: boolean, completion: Completion) => void): void {
    this.pending.delete(completion);
    this.log.debug("completion", { type: completion.type, ok, pending: this.pending.size });

    if (this.abandonment) {
      this.maybeFinishAbandoned();
      return;
    }
    handler(ok, completion);
  }

  private onWriteDone(ok: boolean): void {
    if (ok) {
      this.readNext();
    } else {
      // The error itself comes from the final status.
      this.startFinishing();
    }
  }

  private onReadDone(ok: boolean, completion: Completion): void {
    if (!ok) {
      // End of stream or a broken stream; finish tells which.
      this.startFinishing();
      return;
    }
    this.responses.push(completion.message ?? new Uint8Array(0));
    this.readNext();
  }

  private startFinishing(): void {
    if (this._state !== "started") return;
    this._state = "finishing";
    this.finishCall();
  }

  private onFinishDone(): void {
    const status = this.call.finalStatus();
    this.log.debug("final status", { code: statusCodeName(status.code), details: status.details });
    this.finishAndDeliver(errorFromTransportStatus(status));
  }

  private abandon(error: RpcError | null): void {
    this.abandonment = { error };
    this._state = "finishing";
    this.log.debug("abandon", { notify: this.callback !== null, pending: this.pending.size });

    this.call.cancel();
    this.maybeFinishAbandoned();
  }

  private maybeFinishAbandoned(): void {
    if (this.pending.size > 0 || !this.abandonment) return;
    this.finishAndDeliver(this.abandonment.error);
  }

  /**
   * Move to `finished` and hand the outcome to the callback, if any.
   *
   * The callback may dispose of the reader, so invoking it is the last thing
   * this does.
   */
  private finishAndDeliver(error: RpcError | null): void {
    hardAssert(this.pending.size === 0, "finished with completions still pending");
    this._state = "finished";
    this.registry?.unregister(this);

    const callback = this.callback;
    const responses = this.responses;
    this.callback = null;
    this.responses = [];

    const waiters = this.quiescentWaiters;
    this.quiescentWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }

    this.log.debug("finished", {
      ok: error === null,
      code: error?.code,
      responses: responses.length,
      notify: callback !== null,
    });

    if (!callback) return;
    callback(error ? { ok: false, error } : { ok: true, value: responses });
  }
}

/**
 * Start `reader` on its owning queue and collect the outcome as a promise.
 *
 * @returns every response in read order; rejects with the RpcError that
 * ended the call
 */
export function readStream(worker: AsyncQueue, reader: StreamingReader): Promise<Uint8Array[]> {
  return new Promise((resolve, reject) => {
    worker.enqueue(() => {
      try {
        reader.start((result) => {
          if (result.ok) {
            resolve(result.value);
          } else {
            reject(result.error);
          }
        });
      } catch (e) {
        reject(e);
      }
    });
  });
}
