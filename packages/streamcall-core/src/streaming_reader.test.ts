// Tests for StreamingReader

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  ErrorCode,
  InvalidUsageError,
  OK_STATUS,
  RpcError,
  StatusCode,
  transportStatus,
  type StreamResult,
} from "@streamcall/status";
import { AsyncQueue } from "./async_queue.ts";
import { AssertionFailure } from "./assert.ts";
import { CompletionQueue } from "./completion_queue.ts";
import { readStream, StreamingReader } from "./streaming_reader.ts";
import { byteBufferToString, FakeCall, makeByteBuffer, StreamTester } from "./testing/index.ts";

describe("StreamingReader", () => {
  let worker: AsyncQueue;
  let tester: StreamTester;
  let call: FakeCall;
  let reader: StreamingReader | null;
  let result: StreamResult<Uint8Array[]> | null;
  let callbackCount: number;

  function current(): StreamingReader {
    if (!reader) throw new Error("reader was destroyed");
    return reader;
  }

  function startReader(): Promise<void> {
    const r = current();
    return worker.enqueueBlocking(() =>
      r.start((res) => {
        result = res;
        callbackCount++;
      }),
    );
  }

  function responses(): string[] {
    if (!result || !result.ok) throw new Error("expected a successful result");
    return result.value.map(byteBufferToString);
  }

  function errorCode(): ErrorCode {
    if (!result || result.ok) throw new Error("expected a failed result");
    return result.error.code;
  }

  beforeEach(() => {
    worker = new AsyncQueue();
    tester = new StreamTester(worker);
    ({ reader, call } = tester.createStreamingReader(makeByteBuffer("request")));
    result = null;
    callbackCount = 0;
  });

  afterEach(async () => {
    if (reader) {
      // It's okay to call finishImmediately more than once.
      const r = reader;
      tester.keepPolling(call);
      await worker.enqueueBlocking(() => r.finishImmediately());
      await r.whenQuiescent();
    }
    await tester.shutdown();
  });

  describe("API usage", () => {
    it("finishImmediately is idempotent", async () => {
      await expect(worker.enqueueBlocking(() => current().finishImmediately())).resolves.toBeUndefined();
      expect(current().state).toBe("created");

      await startReader();

      tester.keepPolling(call);
      await expect(
        worker.enqueueBlocking(() => {
          current().finishImmediately();
          current().finishAndNotify();
          current().finishImmediately();
        }),
      ).resolves.toBeUndefined();

      await current().whenQuiescent();
      expect(current().state).toBe("finished");
      expect(current().pendingCount).toBe(0);
      expect(result).toBeNull();
    });

    it("finishImmediately after natural completion is a no-op", async () => {
      await startReader();
      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", ok: false },
      ]);
      await tester.forceFinish(call, [{ type: "finish", status: OK_STATUS }]);

      await worker.enqueueBlocking(() => {
        current().finishImmediately();
        current().finishImmediately();
      });
      expect(callbackCount).toBe(1);
      expect(call.isCancelled()).toBe(false);
    });

    it("can get response headers after starting", async () => {
      await startReader();
      expect(current().getResponseHeaders().size).toBe(0);

      call.setResponseHeaders(new Map([["x-request-id", "abc"]]));
      expect(current().getResponseHeaders().get("x-request-id")).toBe("abc");
    });

    it("can get response headers after finishing", async () => {
      call.setResponseHeaders(new Map([["x-request-id", "abc"]]));
      await startReader();

      tester.keepPolling(call);
      let headers: ReadonlyMap<string, string> | null = null;
      await worker.enqueueBlocking(() => {
        current().finishImmediately();
        headers = current().getResponseHeaders();
      });
      expect(headers).toEqual(new Map([["x-request-id", "abc"]]));
    });

    it("writes the request once, after starting the call", async () => {
      await startReader();

      expect(call.operations).toEqual(["start", "write"]);
      expect(call.written.map(byteBufferToString)).toEqual(["request"]);
    });

    it("settles whenQuiescent immediately for a reader never started", async () => {
      await expect(current().whenQuiescent()).resolves.toBeUndefined();
    });
  });

  describe("incorrect usage", () => {
    it("cannot restart", async () => {
      await startReader();
      tester.keepPolling(call);
      await worker.enqueueBlocking(() => current().finishImmediately());
      await current().whenQuiescent();

      await expect(startReader()).rejects.toThrow(AssertionFailure);
    });

    it("cannot start twice while running", async () => {
      await startReader();
      await expect(startReader()).rejects.toThrow("StreamingReader.start called more than once");
    });

    it("cannot finishAndNotify before starting", async () => {
      // No callback has been assigned.
      await expect(worker.enqueueBlocking(() => current().finishAndNotify())).rejects.toThrow(
        InvalidUsageError,
      );

      expect(current().state).toBe("created");
      await startReader();
      expect(current().state).toBe("started");
    });

    it("must be started on the owning queue", () => {
      expect(() => current().start(() => {})).toThrow(AssertionFailure);
    });

    it("cannot be disposed while operations are pending", async () => {
      await startReader();
      expect(() => current().dispose()).toThrow(AssertionFailure);
    });
  });

  describe("normal operation", () => {
    it("delivers one successful read", async () => {
      await startReader();

      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
        /* read after last */ { type: "read", ok: false },
      ]);
      expect(result).toBeNull();

      await tester.forceFinish(call, [{ type: "finish", status: OK_STATUS }]);

      expect(callbackCount).toBe(1);
      expect(responses()).toEqual(["foo"]);
      expect(current().state).toBe("finished");
      expect(current().pendingCount).toBe(0);
    });

    it("delivers two successful reads in order", async () => {
      await startReader();

      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
        { type: "read", message: makeByteBuffer("bar") },
        /* read after last */ { type: "read", ok: false },
      ]);
      expect(result).toBeNull();

      await tester.forceFinish(call, [{ type: "finish", status: OK_STATUS }]);

      expect(callbackCount).toBe(1);
      expect(responses()).toEqual(["foo", "bar"]);
    });

    it("delivers an empty sequence when the stream has no messages", async () => {
      await startReader();
      await tester.forceFinish(call, [
        { type: "write", ok: true },
        { type: "read", ok: false },
        { type: "finish", status: OK_STATUS },
      ]);

      expect(responses()).toEqual([]);
    });

    it("keeps exactly one operation outstanding", async () => {
      await startReader();
      expect(call.pendingCount).toBe(1);

      await tester.forceFinish(call, [{ type: "write", ok: true }]);
      expect(call.pendingCount).toBe(1);
      expect(current().pendingCount).toBe(1);

      await tester.forceFinish(call, [{ type: "read", message: makeByteBuffer("foo") }]);
      expect(call.pendingCount).toBe(1);

      await tester.forceFinish(call, [{ type: "read", ok: false }]);
      expect(call.pendingCount).toBe(1);
      expect(current().state).toBe("finishing");

      expect(call.operations).toEqual(["start", "write", "read", "read", "finish"]);
    });

    it("never calls back when finished while reading", async () => {
      await startReader();

      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", ok: true },
      ]);
      expect(result).toBeNull();

      tester.keepPolling(call);
      await worker.enqueueBlocking(() => current().finishImmediately());
      await current().whenQuiescent();

      expect(result).toBeNull();
      expect(call.isCancelled()).toBe(true);
      expect(current().state).toBe("finished");
    });

    it("stays finishing until cancelled operations come back", async () => {
      // Nothing polls this queue: completions wait there until the test fires them.
      const unpolled = new CompletionQueue();
      const slowCall = new FakeCall(unpolled);
      const slowReader = new StreamingReader(worker, slowCall, makeByteBuffer("request"));
      await worker.enqueueBlocking(() => slowReader.start(() => callbackCount++));

      await worker.enqueueBlocking(() => slowReader.finishImmediately());
      expect(slowReader.state).toBe("finishing");
      expect(slowReader.pendingCount).toBe(1);
      expect(unpolled.size).toBe(1);

      const entry = await unpolled.next();
      if (!entry) throw new Error("expected a cancelled write");
      expect(entry.completion.type).toBe("write");
      expect(entry.ok).toBe(false);
      entry.completion.complete(entry.ok);
      await slowReader.whenQuiescent();

      expect(slowReader.state).toBe("finished");
      expect(slowReader.pendingCount).toBe(0);
      expect(callbackCount).toBe(0);
      expect(() => slowReader.dispose()).not.toThrow();
    });
  });

  describe("errors", () => {
    it("reports the finish status after a failed write", async () => {
      await startReader();

      let failedWrite = false;
      await tester.forceFinishWith(call, (operation) => {
        expect(operation.type).toBe("write");
        failedWrite = true;
        operation.complete(false);
        return failedWrite;
      });

      await tester.forceFinish(call, [
        { type: "finish", status: transportStatus(StatusCode.RESOURCE_EXHAUSTED, "") },
      ]);

      expect(errorCode()).toBe(ErrorCode.ResourceExhausted);
      expect(call.operations).toEqual(["start", "write", "finish"]);
    });

    it("reports an error on the first read", async () => {
      await startReader();

      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", ok: false },
      ]);

      await tester.forceFinish(call, [{ type: "finish", status: transportStatus(StatusCode.UNAVAILABLE, "") }]);
      expect(errorCode()).toBe(ErrorCode.Unavailable);
    });

    it("discards earlier responses on an error on the second read", async () => {
      await startReader();

      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
        { type: "read", ok: false },
      ]);

      await tester.forceFinish(call, [{ type: "finish", status: transportStatus(StatusCode.DATA_LOSS, "") }]);
      expect(errorCode()).toBe(ErrorCode.DataLoss);
      expect(result).toEqual({ ok: false, error: expect.any(RpcError) });
    });

    it.each([
      [StatusCode.CANCELLED, ErrorCode.Cancelled],
      [StatusCode.DEADLINE_EXCEEDED, ErrorCode.DeadlineExceeded],
      [StatusCode.INTERNAL, ErrorCode.Internal],
      [StatusCode.UNAUTHENTICATED, ErrorCode.Unauthenticated],
    ])("maps finish status %i to %s after responses were read", async (status, code) => {
      await startReader();
      await tester.forceFinish(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
        { type: "read", ok: false },
        { type: "finish", status: transportStatus(status, "boom") },
      ]);

      expect(callbackCount).toBe(1);
      expect(errorCode()).toBe(code);
      if (result && !result.ok) {
        expect(result.error.message).toBe("boom");
      }
    });
  });

  describe("finishAndNotify", () => {
    it("delivers the given error instead of the transport status", async () => {
      await startReader();
      await tester.forceFinish(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
      ]);

      await worker.enqueueBlocking(() => current().finishAndNotify(RpcError.unavailable("gone")));
      await current().whenQuiescent();

      expect(callbackCount).toBe(1);
      expect(errorCode()).toBe(ErrorCode.Unavailable);
      if (result && !result.ok) {
        expect(result.error.message).toBe("gone");
      }
      expect(call.isCancelled()).toBe(true);
    });

    it("delivers the responses read so far when no error is given", async () => {
      await startReader();
      await tester.forceFinish(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
      ]);

      await worker.enqueueBlocking(() => current().finishAndNotify());
      await current().whenQuiescent();

      expect(responses()).toEqual(["foo"]);
    });

    it("overrides a finish already in flight", async () => {
      await startReader();
      await tester.forceFinish(call, [
        { type: "write", ok: true },
        { type: "read", ok: false },
      ]);
      expect(current().state).toBe("finishing");

      await worker.enqueueBlocking(() => current().finishAndNotify(RpcError.cancelled()));
      await current().whenQuiescent();

      expect(callbackCount).toBe(1);
      expect(errorCode()).toBe(ErrorCode.Cancelled);
    });

    it("does nothing once the result was delivered", async () => {
      await startReader();
      await tester.forceFinish(call, [
        { type: "write", ok: true },
        { type: "read", ok: false },
        { type: "finish", status: OK_STATUS },
      ]);

      await worker.enqueueBlocking(() => current().finishAndNotify(RpcError.unavailable()));
      expect(callbackCount).toBe(1);
      expect(responses()).toEqual([]);
    });

    it("is overridden by a later finishImmediately", async () => {
      await startReader();
      await tester.forceFinish(call, [{ type: "write", ok: true }]);

      await worker.enqueueBlocking(() => {
        current().finishAndNotify(RpcError.unavailable());
        current().finishImmediately();
      });
      await current().whenQuiescent();

      expect(result).toBeNull();
    });
  });

  describe("callback destroys reader", () => {
    function startDestroyingReader(): Promise<void> {
      return worker.enqueueBlocking(() =>
        current().start((res) => {
          result = res;
          current().dispose();
          reader = null;
        }),
      );
    }

    it("on success", async () => {
      await startDestroyingReader();

      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
        /* read after last */ { type: "read", ok: false },
      ]);

      expect(reader).not.toBeNull();
      await expect(tester.forceFinish(call, [{ type: "finish", status: OK_STATUS }])).resolves.toBeUndefined();
      expect(reader).toBeNull();
      expect(responses()).toEqual(["foo"]);
    });

    it("on error", async () => {
      await startDestroyingReader();

      await tester.forceFinishAnyTypeOrder(call, [
        { type: "write", ok: true },
        { type: "read", ok: false },
      ]);

      expect(reader).not.toBeNull();
      await expect(
        tester.forceFinish(call, [{ type: "finish", status: transportStatus(StatusCode.DATA_LOSS, "") }]),
      ).resolves.toBeUndefined();
      expect(reader).toBeNull();
      expect(errorCode()).toBe(ErrorCode.DataLoss);
    });
  });

  describe("readStream", () => {
    it("resolves with every response", async () => {
      const pending = readStream(worker, current());
      await worker.drain();

      await tester.forceFinish(call, [
        { type: "write", ok: true },
        { type: "read", message: makeByteBuffer("foo") },
        { type: "read", message: makeByteBuffer("bar") },
        { type: "read", ok: false },
        { type: "finish", status: OK_STATUS },
      ]);

      const values = await pending;
      expect(values.map(byteBufferToString)).toEqual(["foo", "bar"]);
    });

    it("rejects with the RpcError that ended the call", async () => {
      const pending = readStream(worker, current());
      const rejected = expect(pending).rejects.toMatchObject({
        code: ErrorCode.PermissionDenied,
        message: "no access",
      });
      await worker.drain();

      await tester.forceFinish(call, [
        { type: "write", ok: false },
        { type: "finish", status: transportStatus(StatusCode.PERMISSION_DENIED, "no access") },
      ]);

      await rejected;
    });

    it("rejects when the reader was already started", async () => {
      await startReader();
      await expect(readStream(worker, current())).rejects.toThrow(AssertionFailure);
    });
  });
});
