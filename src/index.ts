export { GrpcApp, type GrpcAppOptions } from "./app.js";
export { loadConfig, configSchema, ConfigError, type Config, type LoadConfigOptions } from "./config.js";
export { createLogger, defaultLogger, type Logger, type LogFn } from "./logger.js";
export * from "./domain/errors.js";
export {
  defineEnum,
  defineGeneric,
  defineMessage,
  defineScalar,
  Empty,
  getTypeMeta,
  types,
  wrappers,
  type TypeDescriptor,
  type TypeMeta,
} from "./domain/schema/descriptors.js";
export { typeName } from "./domain/schema/typeNamer.js";
export { fromWire, toWire, toWireLoose } from "./domain/schema/wireCodec.js";
export type * from "./domain/idl/document.js";
export { ProtoBuilder, type CompilableMethod, type CompilableService } from "./domain/idl/protoBuilder.js";
export { renderProto } from "./domain/idl/renderer.js";
export { CallContext, type MethodInfo, type MethodMode, type MetadataPair } from "./domain/rpc/context.js";
export {
  BaseMethod,
  createMethod,
  StreamStreamMethod,
  StreamUnaryMethod,
  UnaryStreamMethod,
  UnaryUnaryMethod,
  type HandlerResult,
  type Method,
  type MethodDefinition,
  type MethodOptions,
  type StreamStreamHandler,
  type StreamUnaryHandler,
  type UnaryStreamHandler,
  type UnaryUnaryHandler,
} from "./domain/rpc/method.js";
export {
  createPipelines,
  MiddlewareManager,
  serverErrorMiddleware,
  serverStreamingErrorMiddleware,
  type Middleware,
  type Next,
  type Pipelines,
  type StreamingMiddleware,
  type UnaryMiddleware,
} from "./domain/rpc/middleware.js";
export { rawMapping, wireNative, type RawMapping, type WireNative } from "./domain/rpc/results.js";
export { Service, type ServiceBindOptions, type ServiceHost, type ServiceOptions } from "./domain/rpc/service.js";
export { BindingsRegistry, loadBindingsFromFile, loadBindingsFromText } from "./infrastructure/bindings.js";
export { createCallHandler } from "./infrastructure/grpcServer.js";
export { runProtoc, writeProtoFile, type ProtocCommand } from "./infrastructure/protoc.js";
export { ReflectionIndex } from "./infrastructure/reflection.js";
