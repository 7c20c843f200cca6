import { z } from "zod";
import { UnsupportedTypeError } from "../errors.js";
import { getTypeMeta, isEnumSchema, resolveDescriptor, scalarMeta, type TypeDescriptor } from "./descriptors.js";

function capitalize(s: string): string {
  return s ? s.charAt(0).toUpperCase() + s.slice(1) : s;
}

/**
 * Stable document name for a descriptor.
 *
 * Generic instances prefix their base name with the names of their arguments
 * (`Pair(int32, string)` -> `Int32StringPair`); arrays append `List` and
 * maps concatenate key and value names followed by `Dict`.
 */
export function typeName(descriptor: TypeDescriptor): string {
  const schema = resolveDescriptor(descriptor);
  const meta = getTypeMeta(schema);

  if (meta?.kind === "message" || meta?.kind === "enum") return meta.name;
  if (meta?.kind === "generic") return meta.args.map(typeName).join("") + meta.base;

  const scalar = scalarMeta(schema);
  if (scalar) {
    const lastSegment = scalar.tag.slice(scalar.tag.lastIndexOf(".") + 1);
    return capitalize(lastSegment);
  }

  if (schema instanceof z.ZodArray) return typeName(schema.element) + "List";
  if (schema instanceof z.ZodSet) return typeName(schema._def.valueType) + "List";
  if (schema instanceof z.ZodRecord || schema instanceof z.ZodMap) {
    return typeName(schema.keySchema) + typeName(schema.valueSchema) + "Dict";
  }

  if (schema instanceof z.ZodObject) {
    throw new UnsupportedTypeError("anonymous object has no name; register it with defineMessage()");
  }
  if (isEnumSchema(schema)) {
    throw new UnsupportedTypeError("anonymous enum has no name; register it with defineEnum()");
  }
  throw new UnsupportedTypeError(`cannot name type ${schema.constructor.name}`);
}
