/**
 * Call handle abstraction.
 *
 * A ClientCall is one live RPC on some transport. Each operation returns
 * immediately; when the operation finishes the transport pushes the given
 * completion onto its completion queue together with a success flag.
 *
 * Transports guarantee that every completion handed to them eventually comes
 * back, including after `cancel()` (cancelled operations report failure).
 */

import type { TransportStatus } from "@streamcall/status";
import type { Completion } from "./completion.ts";

/** Response headers (initial metadata) received from the server. */
export type ResponseHeaders = ReadonlyMap<string, string>;

export interface ClientCall {
  /** Start the call. Must precede every other operation. */
  start(): void;

  /** Send one message. */
  write(message: Uint8Array, completion: Completion): void;

  /**
   * Receive one message into `completion.message`.
   *
   * Fails both at the end of the stream and when the stream breaks; only
   * the final status tells the two apart.
   */
  read(completion: Completion): void;

  /** Ask for the final status; read it with `finalStatus()` once done. */
  finish(completion: Completion): void;

  /** Cancel the call. Pending operations complete with failure. */
  cancel(): void;

  /** Headers received so far; empty before they arrive. */
  responseHeaders(): ResponseHeaders;

  /** Final status, valid once the finish completion has come back. */
  finalStatus(): TransportStatus;
}
