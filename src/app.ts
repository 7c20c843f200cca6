import { EventEmitter } from "events";
import * as grpc from "@grpc/grpc-js";
import { loadConfig, type Config } from "./config.js";
import { ProtoBuilder } from "./domain/idl/protoBuilder.js";
import { renderProto } from "./domain/idl/renderer.js";
import type {
  MethodOptions,
  StreamStreamHandler,
  StreamStreamMethod,
  StreamUnaryHandler,
  StreamUnaryMethod,
  UnaryStreamHandler,
  UnaryStreamMethod,
  UnaryUnaryHandler,
  UnaryUnaryMethod,
} from "./domain/rpc/method.js";
import {
  createPipelines,
  type Pipelines,
  type StreamingMiddleware,
  type UnaryMiddleware,
} from "./domain/rpc/middleware.js";
import { Service, type ServiceHost } from "./domain/rpc/service.js";
import type { Empty, TypeDescriptor } from "./domain/schema/descriptors.js";
import { SchemaRpcError } from "./domain/errors.js";
import { BindingsRegistry, loadBindingsFromFile } from "./infrastructure/bindings.js";
import { createCallHandler } from "./infrastructure/grpcServer.js";
import { runProtoc, writeProtoFile } from "./infrastructure/protoc.js";
import { ReflectionIndex } from "./infrastructure/reflection.js";
import { defaultLogger, type Logger } from "./logger.js";

export interface GrpcAppOptions extends Partial<Config> {
  /** name of the default service */
  name?: string;
  /** proto file the default service is compiled into */
  proto?: string;
  logger?: Logger;
}

/**
 * Application entry point: registers services, compiles them to .proto files,
 * loads the bindings and serves them with grpc-js.
 *
 * ```ts
 * const app = new GrpcApp({ name: "Greeter", proto: "greeter.proto" });
 * app.unaryUnary(sayHello, { request: HelloRequest, response: HelloReply });
 * await app.start();
 * ```
 *
 * Emits "startup" once the server listens and "shutdown" after it stopped.
 */
export class GrpcApp extends EventEmitter {
  readonly service: Service;
  readonly config: Config;
  private readonly logger: Logger;
  private readonly services = new Map<string, Service>();
  private readonly pipelines: Pipelines;
  private bindings?: BindingsRegistry;
  private server?: grpc.Server;
  private terminated?: Promise<void>;
  private resolveTermination?: () => void;

  constructor(options: GrpcAppOptions = {}) {
    super();
    const { name = "SchemaRpc", proto = "schemarpc.proto", logger = defaultLogger, ...overrides } = options;
    this.config = loadConfig({ overrides });
    this.logger = logger;
    this.pipelines = createPipelines(logger);
    this.service = new Service(name, { proto, logger });
    this.services.set(this.service.key, this.service);
  }

  unaryUnary<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: UnaryUnaryHandler<Req, Res>,
    options?: MethodOptions<Req, Res>,
  ): UnaryUnaryMethod {
    return this.service.unaryUnary(handler, options);
  }

  unaryStream<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: UnaryStreamHandler<Req, Res>,
    options?: MethodOptions<Req, Res>,
  ): UnaryStreamMethod {
    return this.service.unaryStream(handler, options);
  }

  streamUnary<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: StreamUnaryHandler<Req, Res>,
    options?: MethodOptions<Req, Res>,
  ): StreamUnaryMethod {
    return this.service.streamUnary(handler, options);
  }

  streamStream<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: StreamStreamHandler<Req, Res>,
    options?: MethodOptions<Req, Res>,
  ): StreamStreamMethod {
    return this.service.streamStream(handler, options);
  }

  /** Services with the same proto file and name are merged; later methods win. */
  addService(service: Service): void {
    const existing = this.services.get(service.key);
    if (existing) existing.merge(service);
    else this.services.set(service.key, service.copy());
  }

  getServices(): Service[] {
    return [...this.services.values()];
  }

  addMiddleware(middleware: UnaryMiddleware): void {
    this.pipelines.unary.add(middleware);
  }

  addStreamingMiddleware(middleware: StreamingMiddleware): void {
    this.pipelines.streaming.add(middleware);
  }

  /** Proto text per file for every service that has methods. */
  renderProtos(): Map<string, string> {
    const builders = new Map<string, ProtoBuilder>();
    for (const service of this.services.values()) {
      if (!service.methods.size) continue;
      let builder = builders.get(service.proto);
      if (!builder) {
        builder = new ProtoBuilder(service.packageName);
        builders.set(service.proto, builder);
      }
      builder.addService(service);
    }
    const out = new Map<string, string>();
    for (const [proto, builder] of builders) out.set(proto, renderProto(builder.getDocument()));
    return out;
  }

  /**
   * Write (when autoGenerateProto) and optionally compile every proto file,
   * then load the bindings. Throws UnsupportedTypeError or CompilationError.
   */
  setup(): BindingsRegistry {
    let bindings = new BindingsRegistry({});
    for (const [proto, text] of this.renderProtos()) {
      if (this.config.autoGenerateProto) writeProtoFile(proto, text, this.logger);
      if (this.config.compileProto) runProtoc(proto, this.config.protoc, this.logger);
      bindings = bindings.merge(loadBindingsFromFile(proto));
    }
    this.bindings = bindings;
    return bindings;
  }

  /**
   * Register every service (and reflection) on the host. Middleware is frozen from here on.
   * Each host gets its own copies of the services, so a stopped app can start again.
   */
  bind(host: ServiceHost): void {
    const bindings = this.bindings ?? this.setup();
    this.pipelines.unary.seal();
    this.pipelines.streaming.seal();
    for (const service of this.services.values()) {
      if (!service.methods.size) continue;
      service.copy().bind(host, {
        bindings,
        handlerFor: (method, owner) => createCallHandler(method, owner, this.pipelines),
      });
    }
    if (this.config.reflection) {
      const reflection = new ReflectionIndex(this.logger);
      reflection.addBindings(bindings);
      reflection.register(host);
    }
  }

  /** Bind to a new grpc-js server and listen. Resolves with the bound port. */
  async start(host = this.config.host, port = this.config.port): Promise<number> {
    if (this.server) throw new SchemaRpcError("server already started");
    const server = new grpc.Server();
    this.bind(server);
    const bound = await new Promise<number>((resolve, reject) => {
      server.bindAsync(`${host}:${port}`, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
        if (error) reject(error);
        else resolve(boundPort);
      });
    });
    this.server = server;
    this.terminated = new Promise<void>(resolve => {
      this.resolveTermination = resolve;
    });
    this.logger.log(`(info) Running grpc on ${host}:${bound}`);
    this.emit("startup", this);
    return bound;
  }

  /** Resolves once stop() has shut the server down. */
  awaitTermination(): Promise<void> {
    return this.terminated ?? Promise.resolve();
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.tryShutdown(error => (error ? reject(error) : resolve()));
    });
    this.server = undefined;
    this.logger.log("(info) server stopped");
    this.emit("shutdown", this);
    this.resolveTermination?.();
  }
}
