/**
 * Type descriptors.
 *
 * Request and response structures are zod schemas. A schema becomes a named
 * protobuf type (message, enum, scalar or generic instance) by registering
 * metadata for its exact object identity; structural zod schemas that carry no
 * metadata are mapped by shape.
 */

import { z } from "zod";

export type TypeDescriptor = z.ZodTypeAny;

export interface ScalarMeta {
  kind: "scalar";
  /** Protobuf type written into the document, e.g. "int32" or "google.protobuf.StringValue" */
  tag: string;
  /** Import the scalar needs, e.g. "google/protobuf/wrappers.proto" */
  dependency?: string;
  /** Well-known wrapper message whose wire form is `{ value }` */
  wrapper?: boolean;
}

export interface MessageMeta {
  kind: "message";
  name: string;
}

export interface EnumMeta {
  kind: "enum";
  name: string;
}

export interface GenericMeta {
  kind: "generic";
  base: string;
  args: readonly TypeDescriptor[];
}

export type TypeMeta = ScalarMeta | MessageMeta | EnumMeta | GenericMeta;

const registry = new WeakMap<TypeDescriptor, TypeMeta>();

export function getTypeMeta(schema: TypeDescriptor): TypeMeta | undefined {
  return registry.get(schema);
}

export function isNamedRecord(schema: TypeDescriptor): boolean {
  const meta = registry.get(schema);
  return meta?.kind === "message" || meta?.kind === "generic";
}

export function defineMessage<T extends z.ZodRawShape>(name: string, shape: T | z.ZodObject<T>): z.ZodObject<T> {
  const schema = shape instanceof z.ZodObject ? shape : z.object(shape);
  registry.set(schema, { kind: "message", name });
  return schema;
}

export function defineEnum<const T extends readonly [string, ...string[]]>(name: string, values: T): z.ZodEnum<[T[number], ...T[number][]]>;
export function defineEnum<T extends z.EnumLike>(name: string, values: T): z.ZodNativeEnum<T>;
export function defineEnum<T extends [string, ...string[]]>(name: string, values: z.ZodEnum<T>): z.ZodEnum<T>;
export function defineEnum<T extends z.EnumLike>(name: string, values: z.ZodNativeEnum<T>): z.ZodNativeEnum<T>;
export function defineEnum(
  name: string,
  values: readonly [string, ...string[]] | z.EnumLike | z.ZodEnum<[string, ...string[]]> | z.ZodNativeEnum<z.EnumLike>,
): z.ZodEnum<[string, ...string[]]> | z.ZodNativeEnum<z.EnumLike> {
  let schema: z.ZodEnum<[string, ...string[]]> | z.ZodNativeEnum<z.EnumLike>;
  if (values instanceof z.ZodEnum || values instanceof z.ZodNativeEnum) {
    schema = values;
  } else if (isStringTuple(values)) {
    schema = z.enum([values[0], ...values.slice(1)]);
  } else {
    schema = z.nativeEnum(values);
  }
  registry.set(schema, { kind: "enum", name });
  return schema;
}

function isStringTuple(values: unknown): values is readonly [string, ...string[]] {
  return Array.isArray(values) && values.length > 0 && values.every(v => typeof v === "string");
}

export function defineScalar<T extends TypeDescriptor>(tag: string, schema: T, opts?: { dependency?: string }): T {
  registry.set(schema, { kind: "scalar", tag, dependency: opts?.dependency });
  return schema;
}

type ArgsCache<T> = { instance?: T; next: Map<TypeDescriptor, ArgsCache<T>> };

/**
 * Generic record constructor. Each distinct argument tuple yields one cached
 * schema, so repeated instantiations share identity and compile to one message.
 *
 * @example
 * const Pair = defineGeneric("Pair", (a, b) => z.object({ first: a, second: b }));
 * Pair(types.int32, z.string()); // named Int32StringPair
 */
export function defineGeneric<A extends TypeDescriptor[], T extends z.ZodRawShape>(
  base: string,
  factory: (...args: A) => z.ZodObject<T>,
): (...args: A) => z.ZodObject<T> {
  const cache: ArgsCache<z.ZodObject<T>> = { next: new Map() };
  return (...args: A) => {
    let node = cache;
    for (const arg of args) {
      let child = node.next.get(arg);
      if (!child) {
        child = { next: new Map() };
        node.next.set(arg, child);
      }
      node = child;
    }
    if (!node.instance) {
      const instance = factory(...args);
      registry.set(instance, { kind: "generic", base, args: [...args] });
      node.instance = instance;
    }
    return node.instance;
  };
}

function tagged<T extends TypeDescriptor>(tag: string, schema: T): T {
  registry.set(schema, { kind: "scalar", tag });
  return schema;
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const UINT32_MAX = 2 ** 32 - 1;

// Refining one of these (e.g. `types.int32.max(10)`) creates a new schema
// without the width tag; it then maps structurally (int -> int32).
export const types = {
  int32: tagged("int32", z.number().int().min(INT32_MIN).max(INT32_MAX)),
  sint32: tagged("sint32", z.number().int().min(INT32_MIN).max(INT32_MAX)),
  uint32: tagged("uint32", z.number().int().min(0).max(UINT32_MAX)),
  int64: tagged("int64", z.bigint()),
  sint64: tagged("sint64", z.bigint()),
  uint64: tagged("uint64", z.bigint().nonnegative()),
  double: tagged("double", z.number()),
  float: tagged("float", z.number()),
  bool: tagged("bool", z.boolean()),
  string: tagged("string", z.string()),
  bytes: tagged("bytes", z.instanceof(Uint8Array)),
  timestamp: z.date(),
};

const WRAPPERS_PROTO = "google/protobuf/wrappers.proto";

function wrapper<T extends TypeDescriptor>(name: string, inner: T): z.ZodNullable<T> {
  const schema = inner.nullable();
  registry.set(schema, { kind: "scalar", tag: `google.protobuf.${name}`, dependency: WRAPPERS_PROTO, wrapper: true });
  return schema;
}

export const wrappers = {
  BoolValue: wrapper("BoolValue", z.boolean()),
  BytesValue: wrapper("BytesValue", z.instanceof(Uint8Array)),
  DoubleValue: wrapper("DoubleValue", z.number()),
  FloatValue: wrapper("FloatValue", z.number()),
  Int32Value: wrapper("Int32Value", z.number().int().min(INT32_MIN).max(INT32_MAX)),
  Int64Value: wrapper("Int64Value", z.bigint()),
  StringValue: wrapper("StringValue", z.string()),
  UInt32Value: wrapper("UInt32Value", z.number().int().min(0).max(UINT32_MAX)),
  UInt64Value: wrapper("UInt64Value", z.bigint().nonnegative()),
};

export const Empty = defineMessage("Empty", {});

/**
 * Strip one layer of modifier around a schema (optional, nullable, default,
 * refinements, lazy, ...). Returns undefined when the schema is not a modifier.
 */
export function unwrapOnce(schema: TypeDescriptor): TypeDescriptor | undefined {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return schema.unwrap();
  if (schema instanceof z.ZodDefault) return schema.removeDefault();
  if (schema instanceof z.ZodCatch) return schema.removeCatch();
  if (schema instanceof z.ZodEffects) return schema.innerType();
  if (schema instanceof z.ZodLazy) return schema.schema;
  if (schema instanceof z.ZodBranded) return schema.unwrap();
  if (schema instanceof z.ZodReadonly) return schema._def.innerType;
  if (schema instanceof z.ZodPipeline) return schema._def.in;
  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    const options: TypeDescriptor[] = [...schema.options];
    return options.find(o => !(o instanceof z.ZodNull) && !(o instanceof z.ZodUndefined));
  }
  return undefined;
}

/**
 * Unwrap modifiers until reaching a schema with registered metadata or a
 * structural type. Metadata wins: a wrapper scalar (itself a ZodNullable) is
 * not unwrapped.
 */
export function resolveDescriptor(schema: TypeDescriptor): TypeDescriptor {
  let current = schema;
  for (let depth = 0; depth < 64; depth++) {
    if (registry.has(current)) return current;
    const inner = unwrapOnce(current);
    if (!inner) return current;
    current = inner;
  }
  return current;
}

/** Scalar proto tag for a structural or tagged scalar schema, if it is one. */
export function scalarMeta(schema: TypeDescriptor): ScalarMeta | undefined {
  const meta = registry.get(schema);
  if (meta) return meta.kind === "scalar" ? meta : undefined;
  if (schema instanceof z.ZodString) return { kind: "scalar", tag: "string" };
  if (schema instanceof z.ZodNumber) return { kind: "scalar", tag: schema.isInt ? "int32" : "double" };
  if (schema instanceof z.ZodBigInt) return { kind: "scalar", tag: "int64" };
  if (schema instanceof z.ZodBoolean) return { kind: "scalar", tag: "bool" };
  if (schema instanceof z.ZodDate) return { kind: "scalar", tag: "string" };
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    if (typeof value === "string") return { kind: "scalar", tag: "string" };
    if (typeof value === "boolean") return { kind: "scalar", tag: "bool" };
    if (typeof value === "number") return { kind: "scalar", tag: Number.isInteger(value) ? "int32" : "double" };
    if (typeof value === "bigint") return { kind: "scalar", tag: "int64" };
  }
  return undefined;
}

/** Enum members as (name, number) pairs in declaration order. */
export function enumMembers(schema: z.ZodEnum<[string, ...string[]]> | z.ZodNativeEnum<z.EnumLike>): Array<[string, number]> {
  if (schema instanceof z.ZodEnum) {
    const options: string[] = schema.options;
    return options.map((name, index) => [name, index]);
  }
  const members: Array<[string, number]> = [];
  const values: z.EnumLike = schema.enum;
  for (const [name, value] of Object.entries(values)) {
    // numeric TS enums carry a reverse mapping (1 -> "ONE"); skip it
    if (/^\d+$/.test(name)) continue;
    if (typeof value === "number") members.push([name, value]);
  }
  return members;
}

export function isEnumSchema(schema: TypeDescriptor): schema is z.ZodEnum<[string, ...string[]]> | z.ZodNativeEnum<z.EnumLike> {
  return schema instanceof z.ZodEnum || schema instanceof z.ZodNativeEnum;
}
