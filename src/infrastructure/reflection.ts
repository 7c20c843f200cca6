import { fileURLToPath } from "url";
import * as grpc from "@grpc/grpc-js";
import descriptorPb from "google-protobuf/google/protobuf/descriptor_pb.js";
import type { DescriptorProto, FileDescriptorProto } from "google-protobuf/google/protobuf/descriptor_pb.js";
import { z } from "zod";
import { IntegrationError, errorMessage } from "../domain/errors.js";
import type { ServiceHost } from "../domain/rpc/service.js";
import { defaultLogger, type Logger } from "../logger.js";
import { loadBindingsFromFile, type BindingsRegistry } from "./bindings.js";

export const REFLECTION_PROTO = fileURLToPath(
  new URL("../../protos/grpc/reflection/v1alpha/reflection.proto", import.meta.url),
);
export const REFLECTION_SERVICE = "grpc.reflection.v1alpha.ServerReflection";

// keepCase + oneofs: the set branch of the request oneof is named in message_request
const reflectionRequestSchema = z.object({
  host: z.string().default(""),
  message_request: z
    .enum([
      "file_by_filename",
      "file_containing_symbol",
      "file_containing_extension",
      "all_extension_numbers_of_type",
      "list_services",
    ])
    .optional(),
  file_by_filename: z.string().default(""),
  file_containing_symbol: z.string().default(""),
  list_services: z.string().default(""),
});

export type ReflectionRequest = z.infer<typeof reflectionRequestSchema>;

export interface ReflectionResponse {
  valid_host: string;
  original_request?: ReflectionRequest;
  file_descriptor_response?: { file_descriptor_proto: Uint8Array[] };
  list_services_response?: { service: Array<{ name: string }> };
  error_response?: { error_code: number; error_message: string };
}

interface ReflectionCallLike {
  on(event: "data", listener: (message: unknown) => void): unknown;
  on(event: "end", listener: () => void): unknown;
  write(message: ReflectionResponse): unknown;
  end(): unknown;
}

interface FileEntry {
  bytes: Uint8Array;
  dependencies: string[];
}

/**
 * Server reflection (v1alpha) over the descriptors proto-loader attaches to
 * every loaded type. Files are indexed by name and every service, method,
 * message and enum by fully qualified symbol.
 */
export class ReflectionIndex {
  private readonly files = new Map<string, FileEntry>();
  private readonly symbols = new Map<string, string>();
  private readonly services = new Set<string>();

  constructor(private readonly logger: Logger = defaultLogger) {}

  addBindings(bindings: BindingsRegistry): void {
    for (const bytes of bindings.fileDescriptorProtos()) this.addFileDescriptor(bytes);
    for (const name of bindings.serviceNames()) this.services.add(name);
  }

  addServiceName(name: string): void {
    this.services.add(name);
  }

  addFileDescriptor(bytes: Uint8Array): void {
    let file: FileDescriptorProto;
    try {
      file = descriptorPb.FileDescriptorProto.deserializeBinary(bytes);
    } catch (e) {
      this.logger.err(`(warn) reflection: skipping undecodable descriptor: ${errorMessage(e)}`);
      return;
    }
    const pkg = file.getPackage() ?? "";
    // descriptors built from in-memory text carry no file name
    const name = file.getName() || `${pkg.replace(/\./g, "/") || "default"}.proto`;
    if (this.files.has(name)) return;
    this.files.set(name, { bytes, dependencies: file.getDependencyList() });

    const prefix = pkg ? `${pkg}.` : "";
    for (const service of file.getServiceList()) {
      const serviceName = prefix + (service.getName() ?? "");
      this.symbols.set(serviceName, name);
      for (const method of service.getMethodList()) this.symbols.set(`${serviceName}.${method.getName() ?? ""}`, name);
    }
    this.indexMessages(file.getMessageTypeList(), prefix, name);
    for (const en of file.getEnumTypeList()) this.symbols.set(prefix + (en.getName() ?? ""), name);
  }

  private indexMessages(messages: DescriptorProto[], scope: string, file: string): void {
    for (const message of messages) {
      const full = scope + (message.getName() ?? "");
      this.symbols.set(full, file);
      for (const en of message.getEnumTypeList()) this.symbols.set(`${full}.${en.getName() ?? ""}`, file);
      this.indexMessages(message.getNestedTypeList(), `${full}.`, file);
    }
  }

  listServices(): string[] {
    return [...this.services].sort();
  }

  /** The named file followed by its transitive dependencies; undefined when unknown. */
  fileByFilename(name: string): Uint8Array[] | undefined {
    if (!this.files.has(name)) return undefined;
    const out: Uint8Array[] = [];
    const seen = new Set<string>();
    const queue = [name];
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      const entry = this.files.get(next);
      if (!entry || seen.has(next)) continue;
      seen.add(next);
      out.push(entry.bytes);
      queue.push(...entry.dependencies);
    }
    return out;
  }

  fileContainingSymbol(symbol: string): Uint8Array[] | undefined {
    const file = this.symbols.get(symbol.replace(/^\./, ""));
    return file === undefined ? undefined : this.fileByFilename(file);
  }

  handle(request: ReflectionRequest): ReflectionResponse {
    const base = { valid_host: request.host, original_request: request };
    const notFound = (what: string): ReflectionResponse => ({
      ...base,
      error_response: { error_code: grpc.status.NOT_FOUND, error_message: `${what} not found` },
    });
    switch (request.message_request) {
      case "list_services":
        return { ...base, list_services_response: { service: this.listServices().map(name => ({ name })) } };
      case "file_by_filename": {
        const files = this.fileByFilename(request.file_by_filename);
        return files ? { ...base, file_descriptor_response: { file_descriptor_proto: files } } : notFound(`file ${request.file_by_filename}`);
      }
      case "file_containing_symbol": {
        const files = this.fileContainingSymbol(request.file_containing_symbol);
        return files
          ? { ...base, file_descriptor_response: { file_descriptor_proto: files } }
          : notFound(`symbol ${request.file_containing_symbol}`);
      }
      default:
        return {
          ...base,
          error_response: { error_code: grpc.status.UNIMPLEMENTED, error_message: "extension queries are not supported" },
        };
    }
  }

  serveCall(call: ReflectionCallLike): void {
    call.on("data", (message: unknown) => {
      const parsed = reflectionRequestSchema.safeParse(message);
      if (parsed.success) {
        call.write(this.handle(parsed.data));
      } else {
        call.write({
          valid_host: "",
          error_response: { error_code: grpc.status.INVALID_ARGUMENT, error_message: parsed.error.message },
        });
      }
    });
    call.on("end", () => call.end());
  }

  /** Add the reflection service to a server. */
  register(host: ServiceHost): void {
    const bindings = loadBindingsFromFile(REFLECTION_PROTO);
    const definition = bindings.getServiceDefinition(REFLECTION_SERVICE);
    if (!definition) throw new IntegrationError(`${REFLECTION_PROTO} does not define ${REFLECTION_SERVICE}`);
    this.addBindings(bindings);
    const implementation: grpc.UntypedServiceImplementation = {
      ServerReflectionInfo: (call: grpc.ServerDuplexStream<unknown, ReflectionResponse>) => this.serveCall(call),
    };
    host.addService(definition, implementation);
    this.logger.log(`(info) reflection enabled for ${this.listServices().join(", ")}`);
  }
}
