/**
 * In-memory representation of a compiled .proto file.
 *
 * Built by ProtoBuilder, rendered to text by renderProto. Messages and enums
 * are keyed by descriptor identity; Map insertion order is emission order.
 */

import type { TypeDescriptor } from "../schema/descriptors.js";

export interface FieldEntry {
  name: string;
  /** 1-based, assigned in declaration order */
  index: number;
  /** Rendered type, e.g. "string", "repeated User", "map<string, int32>" */
  type: string;
}

export interface MessageEntry {
  name: string;
  fields: FieldEntry[];
}

export interface EnumMemberEntry {
  name: string;
  index: number;
}

export interface EnumEntry {
  name: string;
  members: EnumMemberEntry[];
}

export interface MethodEntry {
  name: string;
  requestType: string;
  responseType: string;
  clientStreaming: boolean;
  serverStreaming: boolean;
  description?: string;
}

export interface ServiceEntry {
  name: string;
  methods: MethodEntry[];
}

export interface ProtoDocument {
  package: string;
  services: ServiceEntry[];
  messages: Map<TypeDescriptor, MessageEntry>;
  enums: Map<TypeDescriptor, EnumEntry>;
  dependencies: Set<string>;
}
