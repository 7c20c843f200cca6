import { z } from "zod";
import { UnsupportedTypeError } from "../errors.js";
import {
  Empty,
  enumMembers,
  getTypeMeta,
  isEnumSchema,
  resolveDescriptor,
  scalarMeta,
  type TypeDescriptor,
} from "../schema/descriptors.js";
import { typeName } from "../schema/typeNamer.js";
import type { EnumEntry, MessageEntry, MethodEntry, ProtoDocument, ServiceEntry } from "./document.js";

export interface CompilableMethod {
  readonly name: string;
  readonly requestType?: TypeDescriptor;
  readonly responseType?: TypeDescriptor;
  readonly clientStreaming: boolean;
  readonly serverStreaming: boolean;
  readonly description?: string;
}

export interface CompilableService {
  readonly name: string;
  readonly methods: ReadonlyMap<string, CompilableMethod>;
}

const MAP_KEY_TYPES = new Set([
  "int32", "int64", "uint32", "uint64", "sint32", "sint64",
  "fixed32", "fixed64", "sfixed32", "sfixed64", "bool", "string",
]);

/**
 * Compiles services into a ProtoDocument.
 *
 * Services accumulate through addService; getDocument compiles from scratch
 * every time, so repeated calls give identical documents and a failure never
 * leaves a partial one behind.
 */
export class ProtoBuilder {
  private readonly services: CompilableService[] = [];

  constructor(readonly packageName: string) {}

  addService(service: CompilableService): void {
    if (!this.services.includes(service)) this.services.push(service);
  }

  getDocument(): ProtoDocument {
    return new Compilation(this.packageName).run(this.services);
  }
}

class Compilation {
  private readonly messages = new Map<TypeDescriptor, MessageEntry>();
  private readonly enums = new Map<TypeDescriptor, EnumEntry>();
  private readonly dependencies = new Set<string>();
  private readonly names = new Map<string, TypeDescriptor>();
  private readonly queue: TypeDescriptor[] = [];

  constructor(private readonly packageName: string) {}

  run(services: readonly CompilableService[]): ProtoDocument {
    const entries: ServiceEntry[] = [];
    for (const service of services) {
      const methods: MethodEntry[] = [];
      for (const method of service.methods.values()) {
        const where = `${service.name}.${method.name}`;
        methods.push({
          name: method.name,
          requestType: this.convertRoot(method.requestType ?? Empty, `${where} request`),
          responseType: this.convertRoot(method.responseType ?? Empty, `${where} response`),
          clientStreaming: method.clientStreaming,
          serverStreaming: method.serverStreaming,
          description: method.description || undefined,
        });
      }
      entries.push({ name: service.name, methods });
    }

    // nested types are emitted breadth-first, after every request/response type
    for (let next = this.queue.shift(); next; next = this.queue.shift()) {
      this.convertStruct(next);
    }

    return {
      package: this.packageName,
      services: entries,
      messages: this.messages,
      enums: this.enums,
      dependencies: this.dependencies,
    };
  }

  private convertRoot(descriptor: TypeDescriptor, where: string): string {
    const schema = resolveDescriptor(descriptor);
    const kind = getTypeMeta(schema)?.kind;
    if (!(schema instanceof z.ZodObject) || (kind !== "message" && kind !== "generic")) {
      throw new UnsupportedTypeError("rpc request and response types must be named messages", where);
    }
    this.convertStruct(schema);
    return typeName(schema);
  }

  private convertStruct(schema: TypeDescriptor): void {
    if (this.messages.has(schema) || this.enums.has(schema)) return;
    if (isEnumSchema(schema)) {
      this.convertEnum(schema);
      return;
    }
    if (schema instanceof z.ZodObject) {
      this.convertMessage(schema);
      return;
    }
    throw new UnsupportedTypeError(`cannot emit ${schema.constructor.name} as a message or enum`);
  }

  private claimName(name: string, schema: TypeDescriptor): void {
    const owner = this.names.get(name);
    if (owner && owner !== schema) {
      throw new UnsupportedTypeError(`two different types are both named ${name}`);
    }
    this.names.set(name, schema);
  }

  private convertEnum(schema: z.ZodEnum<[string, ...string[]]> | z.ZodNativeEnum<z.EnumLike>): void {
    const name = typeName(schema);
    this.claimName(name, schema);
    if (schema instanceof z.ZodNativeEnum) {
      const values: z.EnumLike = schema.enum;
      const named = Object.entries(values).filter(([key]) => !/^\d+$/.test(key));
      if (named.some(([, value]) => typeof value !== "number")) {
        throw new UnsupportedTypeError(`enum ${name} has string values; protobuf enum members must be numbers`);
      }
    }
    const members = enumMembers(schema).map(([memberName, index]) => ({ name: memberName, index }));
    if (!members.length) throw new UnsupportedTypeError(`enum ${name} has no members`);
    this.enums.set(schema, { name, members });
  }

  private convertMessage(schema: z.AnyZodObject): void {
    const name = typeName(schema);
    this.claimName(name, schema);
    const entry: MessageEntry = { name, fields: [] };
    // registered before walking fields so self references terminate
    this.messages.set(schema, entry);

    const shape: z.ZodRawShape = schema.shape;
    let index = 0;
    for (const [fieldName, field] of Object.entries(shape)) {
      index += 1;
      entry.fields.push({ name: fieldName, index, type: this.fieldType(field, `${name}.${fieldName}`) });
    }
  }

  private enqueue(schema: TypeDescriptor): void {
    if (this.messages.has(schema) || this.enums.has(schema) || this.queue.includes(schema)) return;
    this.queue.push(schema);
  }

  private fieldType(field: TypeDescriptor, path: string): string {
    const schema = resolveDescriptor(field);
    const meta = getTypeMeta(schema);

    if (meta?.kind === "message" || meta?.kind === "generic" || meta?.kind === "enum") {
      this.enqueue(schema);
      return typeName(schema);
    }

    const scalar = scalarMeta(schema);
    if (scalar) {
      if (scalar.dependency) this.dependencies.add(scalar.dependency);
      return scalar.tag;
    }

    if (schema instanceof z.ZodArray) return `repeated ${this.elementType(schema.element, path)}`;
    if (schema instanceof z.ZodSet) return `repeated ${this.elementType(schema._def.valueType, path)}`;

    if (schema instanceof z.ZodRecord || schema instanceof z.ZodMap) {
      const key = scalarMeta(resolveDescriptor(schema.keySchema));
      if (!key || !MAP_KEY_TYPES.has(key.tag)) {
        throw new UnsupportedTypeError("map keys must be integral, bool or string scalars", path);
      }
      return `map<${key.tag}, ${this.elementType(schema.valueSchema, path)}>`;
    }

    if (isEnumSchema(schema)) {
      throw new UnsupportedTypeError("anonymous enum; register it with defineEnum()", path);
    }
    if (schema instanceof z.ZodObject) {
      throw new UnsupportedTypeError("anonymous nested object; register it with defineMessage()", path);
    }
    throw new UnsupportedTypeError(`unsupported field type ${schema.constructor.name}`, path);
  }

  private elementType(element: TypeDescriptor, path: string): string {
    const schema = resolveDescriptor(element);
    const nested = schema instanceof z.ZodArray || schema instanceof z.ZodSet || schema instanceof z.ZodRecord || schema instanceof z.ZodMap;
    if (nested && !getTypeMeta(schema)) {
      throw new UnsupportedTypeError("nested collections need a named wrapper message", path);
    }
    return this.fieldType(schema, path);
  }
}
