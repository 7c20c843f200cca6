import { z } from "zod";
import { defaultLogger, type Logger } from "../../logger.js";
import { formatMessage } from "../../utils/format.js";
import { toPascalCase } from "../../utils/naming.js";
import { isAsyncIterable, isIterable, isPlainObject } from "../../utils/objectUtils.js";
import type { CompilableMethod } from "../idl/protoBuilder.js";
import {
  HandlerError,
  SchemaRpcError,
  SignatureError,
  ValidationError,
  errorRepr,
} from "../errors.js";
import { defineMessage, Empty, getTypeMeta, type TypeDescriptor } from "../schema/descriptors.js";
import { typeName } from "../schema/typeNamer.js";
import { fromWire, toWire, toWireLoose } from "../schema/wireCodec.js";
import type { CallContext, MethodMode } from "./context.js";
import { isRawMapping, isWireNative, type TaggedResult } from "./results.js";

export type MaybePromise<T> = T | Promise<T>;
export type HandlerResult<T> = T | TaggedResult;
export type ResponseStream<T> = AsyncIterable<HandlerResult<T>> | Iterable<HandlerResult<T>>;

type In<S extends TypeDescriptor> = z.input<S>;
type Out<S extends TypeDescriptor> = z.output<S>;

export interface MethodOptions<Req extends TypeDescriptor, Res extends TypeDescriptor> {
  /** rpc name; defaults to the handler's function name in PascalCase */
  name?: string;
  /** defaults to Empty */
  request?: Req;
  /** when omitted, plain objects are sent without validation */
  response?: Res;
  /** pass the CallContext as second argument; defaults to `handler.length === 2` */
  context?: boolean;
  description?: string;
}

export type UnaryUnaryHandler<Req extends TypeDescriptor, Res extends TypeDescriptor> =
  (request: Out<Req>, context: CallContext) => MaybePromise<HandlerResult<In<Res>>>;

export type UnaryStreamHandler<Req extends TypeDescriptor, Res extends TypeDescriptor> =
  (request: Out<Req>, context: CallContext) => ResponseStream<In<Res>>;

export type StreamUnaryHandler<Req extends TypeDescriptor, Res extends TypeDescriptor> =
  (requests: AsyncIterable<Out<Req>>, context: CallContext) => MaybePromise<HandlerResult<In<Res>>>;

export type StreamStreamHandler<Req extends TypeDescriptor, Res extends TypeDescriptor> =
  (requests: AsyncIterable<Out<Req>>, context: CallContext) => ResponseStream<In<Res>>;

type AnyHandler = (...args: never[]) => unknown;

export interface MethodDefinition extends MethodOptions<TypeDescriptor, TypeDescriptor> {
  handler: AnyHandler;
}

export type CoercionStrategy = "validated" | "raw";

type Step = { kind: "item"; value: unknown } | { kind: "end" } | { kind: "error"; error: unknown };

async function pull(iterator: AsyncIterator<unknown>): Promise<Step> {
  try {
    const result = await iterator.next();
    return result.done ? { kind: "end" } : { kind: "item", value: result.value };
  } catch (error) {
    return { kind: "error", error };
  }
}

function toAsyncIterator(result: unknown, methodName: string): AsyncIterator<unknown> {
  if (isAsyncIterable(result)) return result[Symbol.asyncIterator]();
  if (isIterable(result)) {
    const iterable = result;
    return (async function* () {
      yield* iterable;
    })();
  }
  throw new TypeError(`${methodName} must return an iterable of responses`);
}

function namedRoot(schema: TypeDescriptor | undefined, fallback: string): TypeDescriptor | undefined {
  if (schema instanceof z.ZodObject && !getTypeMeta(schema)) return defineMessage(fallback, schema);
  return schema;
}

/**
 * One rpc: its handler, request/response types and call semantics.
 *
 * Construction checks the handler and fixes how requests are validated and
 * how results are turned into wire objects; `invoke` on the concrete classes
 * runs one call.
 */
export abstract class BaseMethod implements CompilableMethod {
  abstract readonly mode: MethodMode;
  readonly name: string;
  readonly requestType: TypeDescriptor;
  readonly responseType?: TypeDescriptor;
  readonly description?: string;
  readonly hasContext: boolean;
  readonly coercion: CoercionStrategy;
  protected readonly handler: AnyHandler;
  private readonly requestName: string;
  private readonly responseName: string;

  constructor(
    definition: MethodDefinition,
    protected readonly logger: Logger = defaultLogger,
  ) {
    const { handler } = definition;
    if (typeof handler !== "function") throw new SignatureError("handler must be a function");
    if (handler.length < 1 || handler.length > 2) {
      throw new SignatureError(
        `handler ${handler.name || "<anonymous>"} takes ${handler.length} parameters; expected (request) or (request, context)`,
      );
    }
    const name = definition.name ?? toPascalCase(handler.name);
    if (!name) throw new SignatureError("anonymous handler needs an explicit method name");

    this.name = name;
    this.handler = handler;
    this.hasContext = definition.context ?? handler.length === 2;
    this.description = definition.description;
    this.requestType = namedRoot(definition.request, `${name}Request`) ?? Empty;
    this.responseType = namedRoot(definition.response, `${name}Response`);
    this.coercion = this.responseType ? "validated" : "raw";
    this.requestName = typeName(this.requestType);
    this.responseName = this.responseType ? typeName(this.responseType) : "response";
  }

  get clientStreaming(): boolean {
    return this.mode === "stream_unary" || this.mode === "stream_stream";
  }

  get serverStreaming(): boolean {
    return this.mode === "unary_stream" || this.mode === "stream_stream";
  }

  /** Wire object to handler value. */
  bindRequest(wire: unknown): unknown {
    const parsed = this.requestType.safeParse(fromWire(this.requestType, wire));
    if (!parsed.success) throw new ValidationError(this.requestName, parsed.error.issues);
    return parsed.data;
  }

  /** Handler result to wire object. */
  coerceResponse(value: unknown): unknown {
    if (isWireNative(value)) return value.value;
    if (isRawMapping(value)) return toWireLoose(value.value);
    if (this.responseType) {
      const parsed = this.responseType.safeParse(value);
      if (!parsed.success) throw new ValidationError(this.responseName, parsed.error.issues);
      return toWire(this.responseType, parsed.data);
    }
    return isPlainObject(value) ? toWireLoose(value) : value;
  }

  protected callHandler(argument: unknown, context: CallContext): unknown {
    return Reflect.apply(this.handler, undefined, this.hasContext ? [argument, context] : [argument]);
  }

  /** Requests validated one at a time as the handler pulls them. */
  protected async *bindStream(requests: AsyncIterable<unknown>, context: CallContext): AsyncGenerator<unknown> {
    for await (const wire of requests) {
      if (!context.isActive()) return;
      yield this.bindRequest(wire);
    }
  }

  /**
   * Record the failure on the context, log it and return the error to raise.
   * Library errors pass through; anything else is wrapped in HandlerError.
   */
  protected fail(error: unknown, request: unknown, context: CallContext): SchemaRpcError {
    const failure = error instanceof SchemaRpcError ? error : new HandlerError(this.name, error);
    context.recordError(failure);
    this.logger.err(`(error) ${context.method.service}.${this.name}(${formatMessage(request)}) failed: ${errorRepr(failure)}`);
    return failure;
  }

  protected async *drain(iterator: AsyncIterator<unknown>, request: unknown, context: CallContext): AsyncGenerator<unknown> {
    try {
      while (context.isActive()) {
        const step = await pull(iterator);
        if (step.kind === "end") return;
        if (step.kind === "error") throw this.fail(step.error, request, context);
        let wire: unknown;
        try {
          wire = this.coerceResponse(step.value);
        } catch (error) {
          throw this.fail(error, request, context);
        }
        yield wire;
      }
      this.logger.log(`(info) ${context.method.service}.${this.name} stopped streaming: call no longer active`);
    } finally {
      await iterator.return?.();
    }
  }
}

export class UnaryUnaryMethod extends BaseMethod {
  readonly mode = "unary_unary" as const;

  async invoke(request: unknown, context: CallContext): Promise<unknown> {
    try {
      const result: unknown = await this.callHandler(this.bindRequest(request), context);
      return this.coerceResponse(result);
    } catch (error) {
      throw this.fail(error, request, context);
    }
  }
}

export class UnaryStreamMethod extends BaseMethod {
  readonly mode = "unary_stream" as const;

  async *invoke(request: unknown, context: CallContext): AsyncGenerator<unknown> {
    let iterator: AsyncIterator<unknown>;
    try {
      iterator = toAsyncIterator(this.callHandler(this.bindRequest(request), context), this.name);
    } catch (error) {
      throw this.fail(error, request, context);
    }
    yield* this.drain(iterator, request, context);
  }
}

export class StreamUnaryMethod extends BaseMethod {
  readonly mode = "stream_unary" as const;

  async invoke(requests: AsyncIterable<unknown>, context: CallContext): Promise<unknown> {
    try {
      const result: unknown = await this.callHandler(this.bindStream(requests, context), context);
      return this.coerceResponse(result);
    } catch (error) {
      throw this.fail(error, requests, context);
    }
  }
}

export class StreamStreamMethod extends BaseMethod {
  readonly mode = "stream_stream" as const;

  async *invoke(requests: AsyncIterable<unknown>, context: CallContext): AsyncGenerator<unknown> {
    let iterator: AsyncIterator<unknown>;
    try {
      iterator = toAsyncIterator(this.callHandler(this.bindStream(requests, context), context), this.name);
    } catch (error) {
      throw this.fail(error, requests, context);
    }
    yield* this.drain(iterator, requests, context);
  }
}

export type Method = UnaryUnaryMethod | UnaryStreamMethod | StreamUnaryMethod | StreamStreamMethod;

export function createMethod(mode: MethodMode, definition: MethodDefinition, logger?: Logger): Method {
  switch (mode) {
    case "unary_unary":
      return new UnaryUnaryMethod(definition, logger);
    case "unary_stream":
      return new UnaryStreamMethod(definition, logger);
    case "stream_unary":
      return new StreamUnaryMethod(definition, logger);
    case "stream_stream":
      return new StreamStreamMethod(definition, logger);
  }
}
