// Domain error types for streaming calls.
//
// Transport failures never surface as thrown exceptions: the reader translates
// the final transport status into an RpcError and hands it to the caller's
// callback. Misuse by the caller is reported separately (InvalidUsageError).

import { StatusCode, type TransportStatus } from "./status.ts";

/** Domain error codes. */
export const ErrorCode = {
  Cancelled: "cancelled",
  Unknown: "unknown",
  InvalidArgument: "invalid-argument",
  DeadlineExceeded: "deadline-exceeded",
  NotFound: "not-found",
  AlreadyExists: "already-exists",
  PermissionDenied: "permission-denied",
  ResourceExhausted: "resource-exhausted",
  FailedPrecondition: "failed-precondition",
  Aborted: "aborted",
  OutOfRange: "out-of-range",
  Unimplemented: "unimplemented",
  Internal: "internal",
  Unavailable: "unavailable",
  DataLoss: "data-loss",
  Unauthenticated: "unauthenticated",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const CODE_BY_STATUS = new Map<number, ErrorCode>([
  [StatusCode.CANCELLED, ErrorCode.Cancelled],
  [StatusCode.UNKNOWN, ErrorCode.Unknown],
  [StatusCode.INVALID_ARGUMENT, ErrorCode.InvalidArgument],
  [StatusCode.DEADLINE_EXCEEDED, ErrorCode.DeadlineExceeded],
  [StatusCode.NOT_FOUND, ErrorCode.NotFound],
  [StatusCode.ALREADY_EXISTS, ErrorCode.AlreadyExists],
  [StatusCode.PERMISSION_DENIED, ErrorCode.PermissionDenied],
  [StatusCode.RESOURCE_EXHAUSTED, ErrorCode.ResourceExhausted],
  [StatusCode.FAILED_PRECONDITION, ErrorCode.FailedPrecondition],
  [StatusCode.ABORTED, ErrorCode.Aborted],
  [StatusCode.OUT_OF_RANGE, ErrorCode.OutOfRange],
  [StatusCode.UNIMPLEMENTED, ErrorCode.Unimplemented],
  [StatusCode.INTERNAL, ErrorCode.Internal],
  [StatusCode.UNAVAILABLE, ErrorCode.Unavailable],
  [StatusCode.DATA_LOSS, ErrorCode.DataLoss],
  [StatusCode.UNAUTHENTICATED, ErrorCode.Unauthenticated],
]);

/**
 * Error carried to a streaming call's callback when the call didn't succeed.
 */
export class RpcError extends Error {
  /** The domain error code */
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message = "") {
    super(message || RpcError.codeToMessage(code));
    this.name = "RpcError";
    this.code = code;
  }

  static cancelled(message = ""): RpcError {
    return new RpcError(ErrorCode.Cancelled, message);
  }

  static unavailable(message = ""): RpcError {
    return new RpcError(ErrorCode.Unavailable, message);
  }

  static internal(message = ""): RpcError {
    return new RpcError(ErrorCode.Internal, message);
  }

  /** Whether retrying the same call can never succeed. */
  isPermanent(): boolean {
    return isPermanentError(this.code);
  }

  private static codeToMessage(code: ErrorCode): string {
    switch (code) {
      case ErrorCode.Cancelled:
        return "Cancelled";
      case ErrorCode.DeadlineExceeded:
        return "Deadline exceeded";
      case ErrorCode.ResourceExhausted:
        return "Resource exhausted";
      case ErrorCode.Unavailable:
        return "Unavailable";
      case ErrorCode.DataLoss:
        return "Data loss";
      default:
        return `Call failed: ${code}`;
    }
  }
}

/**
 * Error thrown synchronously when the caller breaks a recoverable usage
 * contract (e.g. asking a reader that was never started to notify).
 */
export class InvalidUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidUsageError";
  }
}

/** Map a transport code to a domain code. Unrecognized codes map to `unknown`. */
export function errorCodeFromStatusCode(code: number): ErrorCode {
  return CODE_BY_STATUS.get(code) ?? ErrorCode.Unknown;
}

/**
 * Translate a final transport status.
 *
 * @returns null for OK, otherwise the error to deliver
 */
export function errorFromTransportStatus(status: TransportStatus): RpcError | null {
  if (status.code === StatusCode.OK) {
    return null;
  }
  return new RpcError(errorCodeFromStatusCode(status.code), status.details);
}

/**
 * Whether an error code is permanent, i.e. retrying won't help.
 *
 * Retry policy lives above the reader; this is only the classification it
 * builds on.
 */
export function isPermanentError(code: ErrorCode): boolean {
  switch (code) {
    case ErrorCode.Cancelled:
    case ErrorCode.Unknown:
    case ErrorCode.DeadlineExceeded:
    case ErrorCode.ResourceExhausted:
    case ErrorCode.Internal:
    case ErrorCode.Unavailable:
    case ErrorCode.Unauthenticated:
      // Unauthenticated means the token expired; a refreshed token may work.
      return false;
    default:
      return true;
  }
}

/**
 * Result handed to a reader's callback: all responses, or one error.
 */
export type StreamResult<T> = { ok: true; value: T } | { ok: false; error: RpcError };
