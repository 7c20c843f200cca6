import * as path from "node:path";
import type * as grpc from "@grpc/grpc-js";
import { defaultLogger, type Logger } from "../../logger.js";
import { camelToSnake, toPackageName } from "../../utils/naming.js";
import { IntegrationError } from "../errors.js";
import type { CompilableService } from "../idl/protoBuilder.js";
import type { Empty, TypeDescriptor } from "../schema/descriptors.js";
import {
  StreamStreamMethod,
  StreamUnaryMethod,
  UnaryStreamMethod,
  UnaryUnaryMethod,
  type Method,
  type MethodOptions,
  type StreamStreamHandler,
  type StreamUnaryHandler,
  type UnaryStreamHandler,
  type UnaryUnaryHandler,
} from "./method.js";

/** Anything services can be registered on; grpc.Server satisfies it. */
export interface ServiceHost {
  addService(service: grpc.ServiceDefinition, implementation: grpc.UntypedServiceImplementation): void;
}

/** Looks up generated service definitions by fully qualified name. */
export interface ServiceDefinitionSource {
  getServiceDefinition(fullName: string): grpc.ServiceDefinition | undefined;
}

export interface ServiceBindOptions {
  bindings: ServiceDefinitionSource;
  /** Builds the transport handler for one method. */
  handlerFor: (method: Method, service: Service) => grpc.UntypedHandleCall;
}

export interface ServiceOptions {
  /** .proto file the service is compiled into; defaults to "<snake_name>.proto" */
  proto?: string;
  logger?: Logger;
}

export class Service implements CompilableService {
  readonly name: string;
  readonly proto: string;
  readonly methods = new Map<string, Method>();
  private readonly logger: Logger;
  private bound = false;

  constructor(name: string, options: ServiceOptions = {}) {
    this.name = name;
    this.proto = options.proto ?? `${camelToSnake(name)}.proto`;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Proto package: the stem of the proto file. */
  get packageName(): string {
    return toPackageName(path.basename(this.proto, path.extname(this.proto)));
  }

  get fullName(): string {
    return `${this.packageName}.${this.name}`;
  }

  get key(): string {
    return `${this.proto}:${this.name}`;
  }

  get isBound(): boolean {
    return this.bound;
  }

  /** Later registrations under the same name replace earlier ones. */
  addMethod<M extends Method>(method: M): M {
    this.methods.set(method.name, method);
    return method;
  }

  unaryUnary<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: UnaryUnaryHandler<Req, Res>,
    options: MethodOptions<Req, Res> = {},
  ): UnaryUnaryMethod {
    return this.addMethod(new UnaryUnaryMethod({ ...options, handler }, this.logger));
  }

  unaryStream<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: UnaryStreamHandler<Req, Res>,
    options: MethodOptions<Req, Res> = {},
  ): UnaryStreamMethod {
    return this.addMethod(new UnaryStreamMethod({ ...options, handler }, this.logger));
  }

  streamUnary<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: StreamUnaryHandler<Req, Res>,
    options: MethodOptions<Req, Res> = {},
  ): StreamUnaryMethod {
    return this.addMethod(new StreamUnaryMethod({ ...options, handler }, this.logger));
  }

  streamStream<Req extends TypeDescriptor = typeof Empty, Res extends TypeDescriptor = typeof Empty>(
    handler: StreamStreamHandler<Req, Res>,
    options: MethodOptions<Req, Res> = {},
  ): StreamStreamMethod {
    return this.addMethod(new StreamStreamMethod({ ...options, handler }, this.logger));
  }

  /** Copy every method of `other` into this service. */
  merge(other: Service): this {
    for (const method of other.methods.values()) this.addMethod(method);
    return this;
  }

  copy(): Service {
    return new Service(this.name, { proto: this.proto, logger: this.logger }).merge(this);
  }

  /**
   * Register one transport handler per method on the host. Runs once; later
   * calls log a warning and do nothing.
   */
  bind(host: ServiceHost, options: ServiceBindOptions): void {
    if (this.bound) {
      this.logger.err(`(warn) service ${this.fullName} is already bound`);
      return;
    }
    const definition = options.bindings.getServiceDefinition(this.fullName);
    if (!definition) {
      throw new IntegrationError(`no generated definition for service ${this.fullName} (${this.proto})`);
    }
    const implementation: grpc.UntypedServiceImplementation = {};
    for (const method of this.methods.values()) {
      if (!(method.name in definition)) {
        throw new IntegrationError(`service ${this.fullName} has no rpc ${method.name} in its generated definition`);
      }
      implementation[method.name] = options.handlerFor(method, this);
    }
    host.addService(definition, implementation);
    this.bound = true;
    this.logger.log(`(info) bound ${this.fullName} with ${this.methods.size} method(s)`);
  }
}
