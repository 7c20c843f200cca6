import type * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import protobuf from "protobufjs";
import { CompilationError, errorMessage } from "../domain/errors.js";
import type { ServiceDefinitionSource } from "../domain/rpc/service.js";

export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

function isTypeDefinition(
  definition: protoLoader.AnyDefinition,
): definition is protoLoader.MessageTypeDefinition | protoLoader.EnumTypeDefinition {
  return typeof definition.format === "string";
}

/**
 * Generated bindings for one or more .proto files: the proto-loader package
 * definition, keyed by fully qualified name.
 */
export class BindingsRegistry implements ServiceDefinitionSource {
  constructor(readonly packageDefinition: protoLoader.PackageDefinition) {}

  getServiceDefinition(fullName: string): grpc.ServiceDefinition | undefined {
    const definition = this.packageDefinition[fullName];
    if (!definition || isTypeDefinition(definition)) return undefined;
    return definition;
  }

  serviceNames(): string[] {
    return Object.keys(this.packageDefinition).filter(name => this.getServiceDefinition(name) !== undefined);
  }

  /** Serialized FileDescriptorProtos of every file the bindings were built from. */
  fileDescriptorProtos(): Buffer[] {
    const seen = new Set<string>();
    const out: Buffer[] = [];
    for (const definition of Object.values(this.packageDefinition)) {
      if (!isTypeDefinition(definition)) continue;
      for (const buf of definition.fileDescriptorProtos) {
        const key = buf.toString("base64");
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(buf);
      }
    }
    return out;
  }

  merge(other: BindingsRegistry): BindingsRegistry {
    return new BindingsRegistry({ ...this.packageDefinition, ...other.packageDefinition });
  }
}

export function loadBindingsFromFile(file: string, includeDirs: string[] = []): BindingsRegistry {
  try {
    return new BindingsRegistry(protoLoader.loadSync(file, { ...LOADER_OPTIONS, includeDirs }));
  } catch (e) {
    throw new CompilationError(`failed to load ${file}: ${errorMessage(e)}`, undefined, { cause: e });
  }
}

/** Build bindings straight from proto text without touching the filesystem. */
export function loadBindingsFromText(text: string, filename = "generated.proto"): BindingsRegistry {
  try {
    const root = new protobuf.Root();
    const parsed = protobuf.parse(text, root, { keepCase: true });
    for (const dependency of parsed.imports ?? []) {
      // only the bundled well-known files can be resolved in memory
      const common = protobuf.common.get(dependency);
      if (!common?.nested) {
        throw new Error(`cannot resolve import "${dependency}" from ${filename}`);
      }
      root.addJSON(common.nested);
    }
    return new BindingsRegistry(protoLoader.fromJSON(root.toJSON(), LOADER_OPTIONS));
  } catch (e) {
    throw new CompilationError(`failed to load ${filename}: ${errorMessage(e)}`, undefined, { cause: e });
  }
}
