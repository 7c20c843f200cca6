import * as grpc from "@grpc/grpc-js";
import { RpcAbortError, errorMessage } from "../errors.js";

export type MethodMode = "unary_unary" | "unary_stream" | "stream_unary" | "stream_stream";

export interface MethodInfo {
  /** Fully qualified service name, e.g. "greeter.Greeter" */
  service: string;
  name: string;
  mode: MethodMode;
}

/**
 * The parts of a grpc-js server call the context reads. Every grpc-js call
 * object (unary, readable, writable, duplex) satisfies it.
 */
export interface NativeCall {
  readonly cancelled: boolean;
  readonly metadata: grpc.Metadata;
  getPeer(): string;
  getDeadline(): grpc.Deadline;
  getPath(): string;
  on(event: "cancelled", listener: () => void): unknown;
}

export type MetadataPair = readonly [key: string, value: grpc.MetadataValue];

export class CallContext {
  private readonly startTime = performance.now();
  private readonly controller = new AbortController();
  private invocationPairs?: MetadataPair[];
  private metadataMap?: Record<string, string>;
  private statusCode: grpc.status = grpc.status.OK;
  private statusDetails = "";

  constructor(
    readonly call: NativeCall,
    readonly method: MethodInfo,
  ) {
    call.on("cancelled", () => this.cancel("cancelled by client"));
  }

  /** Milliseconds since the context was created. */
  get elapsedTime(): number {
    return Math.round(performance.now() - this.startTime);
  }

  /** Fires when the transport cancels the call or `cancel()` is called. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get code(): grpc.status {
    return this.statusCode;
  }

  get details(): string {
    return this.statusDetails;
  }

  cancel(reason?: string): void {
    if (!this.controller.signal.aborted) this.controller.abort(reason);
  }

  isActive(): boolean {
    return !this.call.cancelled && !this.controller.signal.aborted && this.timeRemaining() > 0;
  }

  /** Milliseconds until the deadline; Infinity when the client set none. */
  timeRemaining(): number {
    const deadline = this.call.getDeadline();
    const at = deadline instanceof Date ? deadline.getTime() : deadline;
    if (!Number.isFinite(at)) return Infinity;
    return Math.max(0, at - Date.now());
  }

  peer(): string {
    return this.call.getPeer();
  }

  /** Metadata as ordered key/value pairs. Read from the call once, then cached. */
  invocationMetadata(): readonly MetadataPair[] {
    if (!this.invocationPairs) {
      const pairs: MetadataPair[] = [];
      for (const [key, values] of Object.entries(this.call.metadata.toJSON())) {
        for (const value of values) pairs.push([key, value]);
      }
      this.invocationPairs = pairs;
    }
    return this.invocationPairs;
  }

  /** First value per metadata key; binary values are base64 encoded. */
  get metadata(): Record<string, string> {
    if (!this.metadataMap) {
      const map: Record<string, string> = {};
      for (const [key, value] of this.invocationMetadata()) {
        if (key in map) continue;
        map[key] = typeof value === "string" ? value : value.toString("base64");
      }
      this.metadataMap = map;
    }
    return this.metadataMap;
  }

  setCode(code: grpc.status): void {
    this.statusCode = code;
  }

  setDetails(details: string): void {
    this.statusDetails = details;
  }

  /** Status for a failed call: the aborted status, otherwise INTERNAL with the error message. */
  recordError(error: unknown): void {
    if (error instanceof RpcAbortError) {
      this.setCode(error.code);
      this.setDetails(error.details);
    } else {
      this.setCode(grpc.status.INTERNAL);
      this.setDetails(errorMessage(error));
    }
  }

  /** Terminate the call with the given status. Never returns. */
  abort(code: grpc.status, details: string): never {
    this.setCode(code);
    this.setDetails(details);
    throw new RpcAbortError(code, details);
  }
}
