import * as grpc from "@grpc/grpc-js";
import { errorMessage } from "../domain/errors.js";
import { CallContext, type MethodInfo, type NativeCall } from "../domain/rpc/context.js";
import type {
  Method,
  StreamStreamMethod,
  StreamUnaryMethod,
  UnaryStreamMethod,
  UnaryUnaryMethod,
} from "../domain/rpc/method.js";
import type { Pipelines } from "../domain/rpc/middleware.js";
import type { Service } from "../domain/rpc/service.js";
import { isAsyncIterable } from "../utils/objectUtils.js";

// Narrow views of the grpc-js call objects; the real calls satisfy them.
export interface UnaryCallLike extends NativeCall {
  readonly request: unknown;
}

export interface WritableCallLike {
  write(message: unknown): unknown;
  end(): unknown;
  destroy(error?: Error): unknown;
}

export interface ServerStreamCallLike extends UnaryCallLike, WritableCallLike {}

export interface ClientStreamCallLike extends NativeCall, AsyncIterable<unknown> {}

export interface DuplexCallLike extends ClientStreamCallLike, WritableCallLike {}

function methodInfo(method: Method, service: Service): MethodInfo {
  return { service: service.fullName, name: method.name, mode: method.mode };
}

/** Status error for a failed call, taken from the context when it carries one. */
export function toServiceError(context: CallContext, cause?: unknown): grpc.ServiceError {
  const code = context.code === grpc.status.OK ? grpc.status.INTERNAL : context.code;
  const details = context.details || (cause === undefined ? grpc.status[code] : errorMessage(cause));
  return {
    name: grpc.status[code],
    message: details,
    code,
    details,
    metadata: new grpc.Metadata(),
  };
}

function requestStream(request: unknown): AsyncIterable<unknown> {
  if (!isAsyncIterable(request)) throw new TypeError("client-streaming call needs an async iterable of requests");
  return request;
}

async function writeAll(
  call: WritableCallLike & NativeCall,
  responses: () => AsyncIterable<unknown>,
  context: CallContext,
): Promise<void> {
  try {
    for await (const response of responses()) {
      if (call.cancelled) break;
      call.write(response);
    }
    if (context.code !== grpc.status.OK) {
      call.destroy(toServiceError(context));
      return;
    }
    call.end();
  } catch (error) {
    call.destroy(toServiceError(context, error));
  }
}

export function unaryHandler(method: UnaryUnaryMethod, service: Service, pipelines: Pipelines) {
  const info = methodInfo(method, service);
  return async (call: UnaryCallLike, callback: grpc.sendUnaryData<unknown>): Promise<void> => {
    const context = new CallContext(call, info);
    try {
      const response = await pipelines.unary.dispatch((req, ctx) => method.invoke(req, ctx), call.request, context);
      if (context.code !== grpc.status.OK) callback(toServiceError(context));
      else callback(null, response);
    } catch (error) {
      callback(toServiceError(context, error));
    }
  };
}

export function serverStreamingHandler(method: UnaryStreamMethod, service: Service, pipelines: Pipelines) {
  const info = methodInfo(method, service);
  return async (call: ServerStreamCallLike): Promise<void> => {
    const context = new CallContext(call, info);
    await writeAll(call, () => pipelines.streaming.dispatch((req, ctx) => method.invoke(req, ctx), call.request, context), context);
  };
}

export function clientStreamingHandler(method: StreamUnaryMethod, service: Service, pipelines: Pipelines) {
  const info = methodInfo(method, service);
  return async (call: ClientStreamCallLike, callback: grpc.sendUnaryData<unknown>): Promise<void> => {
    const context = new CallContext(call, info);
    try {
      const response = await pipelines.unary.dispatch((req, ctx) => method.invoke(requestStream(req), ctx), call, context);
      if (context.code !== grpc.status.OK) callback(toServiceError(context));
      else callback(null, response);
    } catch (error) {
      callback(toServiceError(context, error));
    }
  };
}

export function bidiStreamingHandler(method: StreamStreamMethod, service: Service, pipelines: Pipelines) {
  const info = methodInfo(method, service);
  return async (call: DuplexCallLike): Promise<void> => {
    const context = new CallContext(call, info);
    await writeAll(call, () => pipelines.streaming.dispatch((req, ctx) => method.invoke(requestStream(req), ctx), call, context), context);
  };
}

/** grpc-js handler for one method, running the chain that matches its mode. */
export function createCallHandler(method: Method, service: Service, pipelines: Pipelines): grpc.UntypedHandleCall {
  switch (method.mode) {
    case "unary_unary":
      return unaryHandler(method, service, pipelines);
    case "unary_stream":
      return serverStreamingHandler(method, service, pipelines);
    case "stream_unary":
      return clientStreamingHandler(method, service, pipelines);
    case "stream_stream":
      return bidiStreamingHandler(method, service, pipelines);
  }
}
