// Transport-level call status.
//
// Codes follow the numbering every HTTP/2 RPC transport reports in its
// trailers, so a transport adapter can hand its status through unchanged.

/** Transport status codes. */
export const StatusCode = {
  OK: 0,
  CANCELLED: 1,
  UNKNOWN: 2,
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  ALREADY_EXISTS: 6,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  FAILED_PRECONDITION: 9,
  ABORTED: 10,
  OUT_OF_RANGE: 11,
  UNIMPLEMENTED: 12,
  INTERNAL: 13,
  UNAVAILABLE: 14,
  DATA_LOSS: 15,
  UNAUTHENTICATED: 16,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

/**
 * Final status of a call as reported by the transport.
 *
 * `code` is a plain number: peers may send codes this package doesn't know.
 */
export interface TransportStatus {
  readonly code: number;
  readonly details: string;
}

/** The OK status. */
export const OK_STATUS: TransportStatus = Object.freeze({ code: StatusCode.OK, details: "" });

/** Build a transport status. */
export function transportStatus(code: number, details = ""): TransportStatus {
  return { code, details };
}

export function isOkStatus(status: TransportStatus): boolean {
  return status.code === StatusCode.OK;
}

/** Human-readable name of a transport code, e.g. `RESOURCE_EXHAUSTED`. */
export function statusCodeName(code: number): string {
  for (const [name, value] of Object.entries(StatusCode)) {
    if (value === code) return name;
  }
  return `STATUS_${code}`;
}
