/**
 * Object-level marshaling between handler values and the plain objects
 * exchanged with @grpc/proto-loader (keepCase, longs and enums as strings,
 * defaults on).
 *
 * - int64 family: bigint <-> decimal string
 * - timestamps: Date <-> ISO-8601 string
 * - wrapper scalars: value <-> `{ value }`, null <-> null
 * - z.map / z.set: Map / Set <-> object / array
 *
 * Byte-level encoding stays with the codec.
 */

import { z } from "zod";
import { isPlainObject, isRecord } from "../../utils/objectUtils.js";
import { getTypeMeta, unwrapOnce, type TypeDescriptor } from "./descriptors.js";

export function fromWire(schema: TypeDescriptor, value: unknown): unknown {
  const meta = getTypeMeta(schema);
  if (meta?.kind === "scalar" && meta.wrapper) {
    if (value === null || value === undefined) return null;
    const inner = unwrapOnce(schema) ?? schema;
    return fromWire(inner, isRecord(value) && "value" in value ? value.value : value);
  }

  if (schema instanceof z.ZodOptional) {
    return value === null || value === undefined ? undefined : fromWire(schema.unwrap(), value);
  }
  if (schema instanceof z.ZodNullable) {
    return value === null || value === undefined ? null : fromWire(schema.unwrap(), value);
  }
  if (schema instanceof z.ZodDefault) {
    // let zod fill the default
    return value === null || value === undefined ? undefined : fromWire(schema.removeDefault(), value);
  }

  if (schema instanceof z.ZodObject) {
    if (!isRecord(value)) return value;
    const out: Record<string, unknown> = {};
    const shape: z.ZodRawShape = schema.shape;
    for (const [key, field] of Object.entries(shape)) {
      const converted = fromWire(field, value[key]);
      if (converted !== undefined) out[key] = converted;
    }
    return out;
  }
  if (schema instanceof z.ZodArray) {
    return Array.isArray(value) ? value.map(item => fromWire(schema.element, item)) : value;
  }
  if (schema instanceof z.ZodSet) {
    return Array.isArray(value) ? new Set(value.map(item => fromWire(schema._def.valueType, item))) : value;
  }
  if (schema instanceof z.ZodRecord) {
    if (!isRecord(value)) return value;
    const valueSchema: TypeDescriptor = schema.valueSchema;
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, fromWire(valueSchema, v)]));
  }
  if (schema instanceof z.ZodMap) {
    if (!isRecord(value)) return value;
    const keySchema: TypeDescriptor = schema.keySchema;
    const valueSchema: TypeDescriptor = schema.valueSchema;
    return new Map(Object.entries(value).map(([k, v]) => [mapKeyFromWire(keySchema, k), fromWire(valueSchema, v)]));
  }
  if (schema instanceof z.ZodBigInt) return toBigInt(value);
  if (schema instanceof z.ZodDate) {
    if (value === "") return undefined;
    return typeof value === "string" || typeof value === "number" ? new Date(value) : value;
  }
  if (schema instanceof z.ZodNativeEnum && typeof value === "string") {
    const members: z.EnumLike = schema.enum;
    return value in members ? members[value] : value;
  }

  const inner = unwrapOnce(schema);
  return inner ? fromWire(inner, value) : value;
}

export function toWire(schema: TypeDescriptor, value: unknown): unknown {
  const meta = getTypeMeta(schema);
  if (meta?.kind === "scalar" && meta.wrapper) {
    if (value === null || value === undefined) return null;
    const inner = unwrapOnce(schema) ?? schema;
    return { value: toWire(inner, value) };
  }

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return value === null || value === undefined ? value : toWire(schema.unwrap(), value);
  }

  if (schema instanceof z.ZodObject) {
    if (!isRecord(value)) return value;
    const out: Record<string, unknown> = {};
    const shape: z.ZodRawShape = schema.shape;
    for (const [key, field] of Object.entries(shape)) {
      const v = value[key];
      if (v !== undefined) out[key] = toWire(field, v);
    }
    return out;
  }
  if (schema instanceof z.ZodArray) {
    return Array.isArray(value) ? value.map(item => toWire(schema.element, item)) : value;
  }
  if (schema instanceof z.ZodSet) {
    return value instanceof Set ? [...value].map(item => toWire(schema._def.valueType, item)) : value;
  }
  if (schema instanceof z.ZodRecord) {
    if (!isRecord(value)) return value;
    const valueSchema: TypeDescriptor = schema.valueSchema;
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toWire(valueSchema, v)]));
  }
  if (schema instanceof z.ZodMap) {
    if (!(value instanceof Map)) return value;
    const valueSchema: TypeDescriptor = schema.valueSchema;
    const out: Record<string, unknown> = {};
    for (const [k, v] of value) out[String(k)] = toWire(valueSchema, v);
    return out;
  }
  if (schema instanceof z.ZodBigInt) return typeof value === "bigint" ? value.toString() : value;
  if (schema instanceof z.ZodDate) return value instanceof Date ? value.toISOString() : value;

  const inner = unwrapOnce(schema);
  return inner ? toWire(inner, value) : value;
}

/** Schema-less conversion used for plain mappings returned without a declared response type. */
export function toWireLoose(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return value;
  if (value instanceof Map) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of value) out[String(k)] = toWireLoose(v);
    return out;
  }
  if (value instanceof Set) return [...value].map(toWireLoose);
  if (Array.isArray(value)) return value.map(toWireLoose);
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) out[k] = toWireLoose(v);
    }
    return out;
  }
  return value;
}

function toBigInt(value: unknown): unknown {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^-?\d+$/.test(value)) return BigInt(value);
  return value;
}

function mapKeyFromWire(keySchema: TypeDescriptor, key: string): unknown {
  let schema = keySchema;
  for (let inner = unwrapOnce(schema); inner; inner = unwrapOnce(schema)) schema = inner;
  if (schema instanceof z.ZodNumber) return Number(key);
  if (schema instanceof z.ZodBigInt) return toBigInt(key);
  if (schema instanceof z.ZodBoolean) return key === "true";
  return key;
}
