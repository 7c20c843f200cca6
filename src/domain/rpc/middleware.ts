import type { Logger } from "../../logger.js";
import { formatMessage } from "../../utils/format.js";
import { SchemaRpcError, errorRepr } from "../errors.js";
import type { CallContext } from "./context.js";

/** Continuation; may be called with a replaced request or context. */
export type Next<R> = (request: unknown, context: CallContext) => R;

/** One onion layer around a call. */
export type Middleware<R> = (next: Next<R>, request: unknown, context: CallContext) => R;

export type UnaryMiddleware = Middleware<Promise<unknown>>;
export type StreamingMiddleware = Middleware<AsyncIterable<unknown>>;

/**
 * Ordered middleware chain. The first entry is the outermost layer; entries
 * can only be added until the chain is sealed.
 */
export class MiddlewareManager<R> {
  private readonly middlewares: Middleware<R>[];
  private sealed = false;

  constructor(builtins: Middleware<R>[] = []) {
    this.middlewares = [...builtins];
  }

  get size(): number {
    return this.middlewares.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  add(middleware: Middleware<R>): void {
    if (this.sealed) throw new SchemaRpcError("middleware cannot be added after the server is bound");
    this.middlewares.push(middleware);
  }

  seal(): void {
    this.sealed = true;
  }

  dispatch(terminal: Next<R>, request: unknown, context: CallContext): R {
    const chain = this.middlewares;
    const step = (index: number, req: unknown, ctx: CallContext): R => {
      const middleware = chain[index];
      if (!middleware) return terminal(req, ctx);
      return middleware((nextReq, nextCtx) => step(index + 1, nextReq, nextCtx), req, ctx);
    };
    return step(0, request, context);
  }
}

function label(request: unknown, context: CallContext): string {
  return `${context.method.service}.${context.method.name}(${formatMessage(request)})`;
}

function since(start: number): number {
  return Math.round(performance.now() - start);
}

/** Outermost layer of the unary-response chain: timing, access log and error status. */
export function serverErrorMiddleware(logger: Logger): UnaryMiddleware {
  return async (next, request, context) => {
    const start = performance.now();
    try {
      const response = await next(request, context);
      logger.log(`(info) invoke ${label(request, context)} [OK] ${since(start)}ms`);
      return response;
    } catch (error) {
      context.recordError(error);
      logger.err(`(error) invoke ${label(request, context)} [Err] -> ${errorRepr(error)}`);
      throw error;
    }
  };
}

/** Same as serverErrorMiddleware for calls that answer with a stream. */
export function serverStreamingErrorMiddleware(logger: Logger): StreamingMiddleware {
  return (next, request, context) => {
    async function* run(): AsyncGenerator<unknown> {
      const start = performance.now();
      try {
        yield* next(request, context);
        logger.log(`(info) invoke ${label(request, context)} [OK] ${since(start)}ms`);
      } catch (error) {
        context.recordError(error);
        logger.err(`(error) invoke ${label(request, context)} [Err] -> ${errorRepr(error)}`);
        throw error;
      }
    }
    return run();
  };
}

/** The two chains calls run through, picked by whether the call answers with a stream. */
export interface Pipelines {
  unary: MiddlewareManager<Promise<unknown>>;
  streaming: MiddlewareManager<AsyncIterable<unknown>>;
}

export function createPipelines(logger: Logger): Pipelines {
  return {
    unary: new MiddlewareManager([serverErrorMiddleware(logger)]),
    streaming: new MiddlewareManager([serverStreamingErrorMiddleware(logger)]),
  };
}
