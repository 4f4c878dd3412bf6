// Status and error types shared by streamcall packages.

export {
  StatusCode,
  OK_STATUS,
  transportStatus,
  isOkStatus,
  statusCodeName,
  type TransportStatus,
} from "./status.ts";

export {
  ErrorCode,
  RpcError,
  InvalidUsageError,
  errorCodeFromStatusCode,
  errorFromTransportStatus,
  isPermanentError,
  type StreamResult,
} from "./rpc_error.ts";
