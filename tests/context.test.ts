import { describe, it, expect, vi } from "vitest";
import * as grpc from "@grpc/grpc-js";
import { RpcAbortError } from "../src/domain/errors.js";
import { FakeCall, makeContext } from "./support/fakes.js";

describe("CallContext", () => {
  it("exposes method info and peer", () => {
    const context = makeContext(new FakeCall(), { mode: "unary_stream", name: "Watch" });
    expect(context.method).toEqual({ service: "greeter.Greeter", name: "Watch", mode: "unary_stream" });
    expect(context.peer()).toBe("ipv4:127.0.0.1:54321");
  });

  it("returns metadata as ordered pairs and first values per key", () => {
    const call = new FakeCall();
    call.metadata.add("x-user", "alice");
    call.metadata.add("x-user", "bob");
    call.metadata.add("trace-bin", Buffer.from("hi"));
    const context = makeContext(call);

    expect(context.invocationMetadata()).toEqual([
      ["x-user", "alice"],
      ["x-user", "bob"],
      ["trace-bin", Buffer.from("hi")],
    ]);
    expect(context.metadata).toEqual({ "x-user": "alice", "trace-bin": "aGk=" });
  });

  it("reads metadata from the call only once", () => {
    const call = new FakeCall();
    call.metadata.add("authorization", "Bearer test-secret");
    const spy = vi.spyOn(call.metadata, "toJSON");
    const context = makeContext(call);

    context.invocationMetadata();
    context.invocationMetadata();
    expect(context.metadata.authorization).toBe("Bearer test-secret");
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("reports Infinity without a deadline", () => {
    const context = makeContext();
    expect(context.timeRemaining()).toBe(Infinity);
    expect(context.isActive()).toBe(true);
  });

  it("counts down to the deadline", () => {
    const call = new FakeCall();
    call.deadline = new Date(Date.now() + 5000);
    const context = makeContext(call);
    const remaining = context.timeRemaining();
    expect(remaining).toBeGreaterThan(0);
    expect(remaining).toBeLessThanOrEqual(5000);

    call.deadline = Date.now() - 1;
    expect(context.timeRemaining()).toBe(0);
    expect(context.isActive()).toBe(false);
  });

  it("becomes inactive when the client cancels", () => {
    const call = new FakeCall();
    const context = makeContext(call);
    const onAbort = vi.fn();
    context.signal.addEventListener("abort", onAbort);

    call.cancel();
    expect(context.isActive()).toBe(false);
    expect(context.signal.aborted).toBe(true);
    expect(onAbort).toHaveBeenCalledTimes(1);
  });

  it("becomes inactive after cancel()", () => {
    const context = makeContext();
    context.cancel("done");
    expect(context.isActive()).toBe(false);
    expect(context.signal.reason).toBe("done");
  });

  it("aborts with a status", () => {
    const context = makeContext();
    expect(() => context.abort(grpc.status.NOT_FOUND, "no such user")).toThrow(RpcAbortError);
    expect(context.code).toBe(grpc.status.NOT_FOUND);
    expect(context.details).toBe("no such user");
  });

  it("records failures as INTERNAL unless aborted", () => {
    const context = makeContext();
    expect(context.code).toBe(grpc.status.OK);

    context.recordError(new Error("boom"));
    expect(context.code).toBe(grpc.status.INTERNAL);
    expect(context.details).toBe("boom");

    context.recordError(new RpcAbortError(grpc.status.PERMISSION_DENIED, "nope"));
    expect(context.code).toBe(grpc.status.PERMISSION_DENIED);
    expect(context.details).toBe("nope");
  });

  it("measures elapsed time in milliseconds", () => {
    const context = makeContext();
    expect(context.elapsedTime).toBeGreaterThanOrEqual(0);
    expect(Number.isInteger(context.elapsedTime)).toBe(true);
  });
});
