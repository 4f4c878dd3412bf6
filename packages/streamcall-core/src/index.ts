// @streamcall/core - client engine for server-streaming calls
// This package provides the owning queue, completion plumbing and the
// StreamingReader state machine that drives a call to one exactly-once result.

// Status and error types (for callback result handling)
export {
  ErrorCode,
  RpcError,
  InvalidUsageError,
  StatusCode,
  errorFromTransportStatus,
  isPermanentError,
  type StreamResult,
  type TransportStatus,
} from "@streamcall/status";

// Owning executor
export { AsyncQueue, type AsyncQueueOptions, type Operation } from "./async_queue.ts";

// Completion tags and the poller that fires them
export { Completion, CompletionType, type CompletionHandler } from "./completion.ts";
export {
  CompletionQueue,
  CompletionPoller,
  type CompletionPollerOptions,
  type QueuedCompletion,
} from "./completion_queue.ts";

// Call handle abstraction
export { type ClientCall, type ResponseHeaders } from "./call.ts";

// Connectivity and in-flight call tracking
export {
  ConnectivityMonitor,
  NoOpConnectivityMonitor,
  ManualConnectivityMonitor,
  type NetworkStatus,
  type ConnectivityCallback,
} from "./connectivity.ts";
export { CallRegistry, type CallRegistryOptions, type RegisteredCall } from "./call_registry.ts";

// Streaming reader
export {
  StreamingReader,
  readStream,
  type ReaderState,
  type StreamingReaderCallback,
  type StreamingReaderOptions,
} from "./streaming_reader.ts";

// Assertions and logging
export { AssertionFailure, hardAssert } from "./assert.ts";
export { createLogger, isEnabled, type Logger, type LoggerOptions } from "./logging.ts";
