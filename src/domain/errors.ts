import * as grpc from "@grpc/grpc-js";
import type { ZodIssue } from "zod";

export class SchemaRpcError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A schema field type that cannot be reduced to a scalar, record, enum or collection. */
export class UnsupportedTypeError extends SchemaRpcError {
  constructor(message: string, readonly path?: string) {
    super(path ? `${message} (at ${path})` : message);
  }
}

/** Handler declares a parameter list the method binder cannot use. */
export class SignatureError extends SchemaRpcError {}

export class ValidationError extends SchemaRpcError {
  constructor(
    readonly typeName: string,
    readonly issues: ZodIssue[],
  ) {
    super(`${typeName} validation failed: ${issues.map(formatIssue).join("; ")}`);
  }
}

/** Business logic raised. The original error is kept as `cause` and its message is reused. */
export class HandlerError extends SchemaRpcError {
  constructor(
    readonly methodName: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

/** Generated bindings do not match the compiled document. */
export class IntegrationError extends SchemaRpcError {}

export class CompilationError extends SchemaRpcError {
  constructor(
    message: string,
    readonly exitCode?: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Raised by `CallContext.abort`; carries the status the call terminates with. */
export class RpcAbortError extends SchemaRpcError {
  constructor(
    readonly code: grpc.status,
    readonly details: string,
  ) {
    super(details || grpc.status[code]);
  }
}

function formatIssue(issue: ZodIssue): string {
  const at = issue.path.length ? issue.path.join(".") : "<root>";
  return `${at}: ${issue.message}`;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorRepr(error: unknown): string {
  if (error instanceof Error) return `${error.name}(${JSON.stringify(error.message)})`;
  return String(error);
}
