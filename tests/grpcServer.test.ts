import { describe, it, expect, vi, type Mock } from "vitest";
import * as grpc from "@grpc/grpc-js";
import { createPipelines } from "../src/domain/rpc/middleware.js";
import { Service } from "../src/domain/rpc/service.js";
import {
  bidiStreamingHandler,
  clientStreamingHandler,
  serverStreamingHandler,
  toServiceError,
  unaryHandler,
} from "../src/infrastructure/grpcServer.js";
import { FakeCall, HelloReply, HelloRequest, makeContext, silentLogger } from "./support/fakes.js";

const io = { request: HelloRequest, response: HelloReply };

function setup() {
  const service = new Service("Greeter", { proto: "greeter.proto", logger: silentLogger });
  return { service, pipelines: createPipelines(silentLogger) };
}

function firstArg(callback: Mock): unknown {
  return callback.mock.calls[0]?.[0];
}

describe("toServiceError", () => {
  it("falls back to INTERNAL", () => {
    const error = toServiceError(makeContext());
    expect(error).toMatchObject({ code: grpc.status.INTERNAL, details: "INTERNAL", name: "INTERNAL" });
  });

  it("uses the cause when the context has no details", () => {
    const error = toServiceError(makeContext(), new Error("boom"));
    expect(error).toMatchObject({ code: grpc.status.INTERNAL, details: "boom", message: "boom" });
  });
});

describe("unaryHandler", () => {
  it("answers through the callback", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryUnary(function sayHello(request) {
      return { message: `Hello, ${request.name}!` };
    }, io);
    const callback = vi.fn();

    await unaryHandler(method, service, pipelines)(new FakeCall({ name: "ada" }), callback);
    expect(callback).toHaveBeenCalledWith(null, { message: "Hello, ada!" });
  });

  it("sends failures as INTERNAL with the error message", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryUnary(function sayHello(_request): { message: string } {
      throw new Error("boom");
    }, io);
    const callback = vi.fn();

    await unaryHandler(method, service, pipelines)(new FakeCall({ name: "ada" }), callback);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(firstArg(callback)).toMatchObject({ code: grpc.status.INTERNAL, details: "boom" });
  });

  it("sends the aborted status", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryUnary(function sayHello(request, context) {
      return context.abort(grpc.status.NOT_FOUND, `no user ${request.name}`);
    }, io);
    const callback = vi.fn();

    await unaryHandler(method, service, pipelines)(new FakeCall({ name: "bob" }), callback);
    expect(firstArg(callback)).toMatchObject({ code: grpc.status.NOT_FOUND, details: "no user bob" });
  });

  it("sends a status set without raising", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryUnary(function sayHello(_request, context) {
      context.setCode(grpc.status.FAILED_PRECONDITION);
      context.setDetails("not ready");
      return { message: "" };
    }, io);
    const callback = vi.fn();

    await unaryHandler(method, service, pipelines)(new FakeCall({ name: "ada" }), callback);
    expect(firstArg(callback)).toMatchObject({ code: grpc.status.FAILED_PRECONDITION, details: "not ready" });
  });

  it("rejects invalid requests", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryUnary(function sayHello(request) {
      return { message: request.name };
    }, io);
    const callback = vi.fn();

    await unaryHandler(method, service, pipelines)(new FakeCall({ name: 1 }), callback);
    expect(firstArg(callback)).toMatchObject({
      code: grpc.status.INTERNAL,
      details: "HelloRequest validation failed: name: Expected string, received number",
    });
  });
});

describe("serverStreamingHandler", () => {
  it("writes every response and ends the call", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryStream(async function* countHello(request) {
      yield { message: `1 ${request.name}` };
      yield { message: `2 ${request.name}` };
    }, io);
    const call = new FakeCall({ name: "ada" });

    await serverStreamingHandler(method, service, pipelines)(call);
    expect(call.written).toEqual([{ message: "1 ada" }, { message: "2 ada" }]);
    expect(call.ended).toBe(true);
    expect(call.destroyedWith).toBeUndefined();
  });

  it("destroys the call with the status of a mid-stream failure", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryStream(async function* countHello(_request) {
      yield { message: "first" };
      throw new Error("lost");
    }, io);
    const call = new FakeCall({ name: "ada" });

    await serverStreamingHandler(method, service, pipelines)(call);
    expect(call.written).toEqual([{ message: "first" }]);
    expect(call.ended).toBe(false);
    expect(call.destroyedWith).toMatchObject({ code: grpc.status.INTERNAL, details: "lost" });
  });

  it("destroys the call when the handler set a status", async () => {
    const { service, pipelines } = setup();
    const method = service.unaryStream(function countHello(_request, context) {
      context.setCode(grpc.status.RESOURCE_EXHAUSTED);
      context.setDetails("quota");
      return [];
    }, io);
    const call = new FakeCall({ name: "ada" });

    await serverStreamingHandler(method, service, pipelines)(call);
    expect(call.written).toEqual([]);
    expect(call.destroyedWith).toMatchObject({ code: grpc.status.RESOURCE_EXHAUSTED, details: "quota" });
  });
});

describe("clientStreamingHandler", () => {
  it("reads the request stream from the call", async () => {
    const { service, pipelines } = setup();
    const method = service.streamUnary(async function greetAll(requests) {
      const names: string[] = [];
      for await (const request of requests) names.push(request.name);
      return { message: names.join(", ") };
    }, io);
    const callback = vi.fn();

    await clientStreamingHandler(method, service, pipelines)(new FakeCall({}, [{ name: "ada" }, { name: "bob" }]), callback);
    expect(callback).toHaveBeenCalledWith(null, { message: "ada, bob" });
  });
});

describe("bidiStreamingHandler", () => {
  it("writes a response per request", async () => {
    const { service, pipelines } = setup();
    const method = service.streamStream(async function* chat(requests) {
      for await (const request of requests) yield { message: `echo ${request.name}` };
    }, io);
    const call = new FakeCall({}, [{ name: "a" }, { name: "b" }]);

    await bidiStreamingHandler(method, service, pipelines)(call);
    expect(call.written).toEqual([{ message: "echo a" }, { message: "echo b" }]);
    expect(call.ended).toBe(true);
  });
});
