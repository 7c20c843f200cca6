import { describe, it, expect } from "vitest";
import * as grpc from "@grpc/grpc-js";
import { RpcAbortError, SchemaRpcError } from "../src/domain/errors.js";
import {
  MiddlewareManager,
  createPipelines,
  serverErrorMiddleware,
  serverStreamingErrorMiddleware,
  type UnaryMiddleware,
} from "../src/domain/rpc/middleware.js";
import { captureLogger, collect, makeContext, silentLogger } from "./support/fakes.js";

async function* stream(...items: unknown[]): AsyncGenerator<unknown> {
  for (const item of items) yield item;
}

describe("MiddlewareManager", () => {
  it("runs layers outermost first", async () => {
    const order: string[] = [];
    const layer =
      (label: string): UnaryMiddleware =>
      async (next, request, context) => {
        order.push(`${label} in`);
        const response = await next(request, context);
        order.push(`${label} out`);
        return response;
      };
    const manager = new MiddlewareManager<Promise<unknown>>();
    manager.add(layer("a"));
    manager.add(layer("b"));

    const response = await manager.dispatch(
      async request => {
        order.push("handler");
        return request;
      },
      "req",
      makeContext(),
    );
    expect(response).toBe("req");
    expect(order).toEqual(["a in", "b in", "handler", "b out", "a out"]);
  });

  it("lets a layer replace the request", async () => {
    const manager = new MiddlewareManager<Promise<unknown>>();
    manager.add((next, _request, context) => next({ name: "replaced" }, context));
    const seen = await manager.dispatch(async request => request, { name: "original" }, makeContext());
    expect(seen).toEqual({ name: "replaced" });
  });

  it("lets a layer short-circuit", async () => {
    const manager = new MiddlewareManager<Promise<unknown>>();
    manager.add(async () => ({ cached: true }));
    let called = false;
    const response = await manager.dispatch(
      async () => {
        called = true;
        return {};
      },
      {},
      makeContext(),
    );
    expect(response).toEqual({ cached: true });
    expect(called).toBe(false);
  });

  it("refuses new layers once sealed", () => {
    const manager = new MiddlewareManager<Promise<unknown>>();
    manager.seal();
    expect(manager.isSealed).toBe(true);
    expect(() => manager.add(async () => undefined)).toThrow(SchemaRpcError);
    expect(() => manager.add(async () => undefined)).toThrow("middleware cannot be added after the server is bound");
  });

  it("starts each pipeline with its error layer", () => {
    const pipelines = createPipelines(silentLogger);
    expect(pipelines.unary.size).toBe(1);
    expect(pipelines.streaming.size).toBe(1);
  });
});

describe("serverErrorMiddleware", () => {
  it("logs successful calls with their duration", async () => {
    const { lines, logger } = captureLogger();
    const manager = new MiddlewareManager([serverErrorMiddleware(logger)]);
    await manager.dispatch(async () => ({ message: "hi" }), { name: "ada" }, makeContext());
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\(info\) invoke greeter\.Greeter\.SayHello\(\{"name":"ada"\}\) \[OK\] \d+ms$/);
  });

  it("keeps an aborted status", async () => {
    const { lines, logger } = captureLogger();
    const manager = new MiddlewareManager([serverErrorMiddleware(logger)]);
    const context = makeContext();

    await expect(
      manager.dispatch(
        async () => {
          throw new RpcAbortError(grpc.status.NOT_FOUND, "gone");
        },
        { name: "ada" },
        context,
      ),
    ).rejects.toThrow(RpcAbortError);
    expect(context.code).toBe(grpc.status.NOT_FOUND);
    expect(context.details).toBe("gone");
    expect(lines).toEqual(['(error) invoke greeter.Greeter.SayHello({"name":"ada"}) [Err] -> RpcAbortError("gone")']);
  });

  it("sees failures through user middleware", async () => {
    const { lines, logger } = captureLogger();
    const pipelines = createPipelines(logger);
    const seen: string[] = [];
    pipelines.unary.add(async (next, request, context) => {
      seen.push("m1");
      return next(request, context);
    });
    pipelines.unary.add(async (next, request, context) => {
      try {
        return await next(request, context);
      } catch (error) {
        seen.push("m2 caught");
        throw error;
      }
    });
    const context = makeContext();

    await expect(
      pipelines.unary.dispatch(
        async () => {
          throw new Error("handler failed");
        },
        {},
        context,
      ),
    ).rejects.toThrow("handler failed");
    expect(seen).toEqual(["m1", "m2 caught"]);
    expect(context.code).toBe(grpc.status.INTERNAL);
    expect(lines).toEqual(['(error) invoke greeter.Greeter.SayHello({}) [Err] -> Error("handler failed")']);
  });

  it("maps other failures to INTERNAL", async () => {
    const { lines, logger } = captureLogger();
    const manager = new MiddlewareManager([serverErrorMiddleware(logger)]);
    const context = makeContext();

    await expect(
      manager.dispatch(
        async () => {
          throw new Error("boom");
        },
        {},
        context,
      ),
    ).rejects.toThrow("boom");
    expect(context.code).toBe(grpc.status.INTERNAL);
    expect(context.details).toBe("boom");
    expect(lines).toEqual(['(error) invoke greeter.Greeter.SayHello({}) [Err] -> Error("boom")']);
  });
});

describe("serverStreamingErrorMiddleware", () => {
  it("passes items through and logs once the stream ends", async () => {
    const { lines, logger } = captureLogger();
    const manager = new MiddlewareManager([serverStreamingErrorMiddleware(logger)]);
    const items = await collect(manager.dispatch(() => stream(1, 2), { name: "ada" }, makeContext()));
    expect(items).toEqual([1, 2]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\(info\) invoke greeter\.Greeter\.SayHello\(\{"name":"ada"\}\) \[OK\] \d+ms$/);
  });

  it("records failures raised while streaming", async () => {
    const { lines, logger } = captureLogger();
    const manager = new MiddlewareManager([serverStreamingErrorMiddleware(logger)]);
    const context = makeContext();
    async function* failing(): AsyncGenerator<unknown> {
      yield 1;
      throw new RpcAbortError(grpc.status.UNAVAILABLE, "backend gone");
    }

    await expect(collect(manager.dispatch(() => failing(), { name: "ada" }, context))).rejects.toThrow("backend gone");
    expect(context.code).toBe(grpc.status.UNAVAILABLE);
    expect(lines).toEqual(['(error) invoke greeter.Greeter.SayHello({"name":"ada"}) [Err] -> RpcAbortError("backend gone")']);
  });
});
