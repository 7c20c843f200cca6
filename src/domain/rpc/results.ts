const TAG = Symbol("schemarpc.result");

/** Already in wire shape; sent as is. */
export interface WireNative {
  readonly [TAG]: "wire";
  readonly value: unknown;
}

/** A plain mapping converted without validation against the declared response type. */
export interface RawMapping {
  readonly [TAG]: "raw";
  readonly value: Record<string, unknown>;
}

export type TaggedResult = WireNative | RawMapping;

export function wireNative(value: unknown): WireNative {
  return { [TAG]: "wire", value };
}

export function rawMapping(value: Record<string, unknown>): RawMapping {
  return { [TAG]: "raw", value };
}

export function isTaggedResult(value: unknown): value is TaggedResult {
  return typeof value === "object" && value !== null && TAG in value;
}

export function isWireNative(value: unknown): value is WireNative {
  return isTaggedResult(value) && value[TAG] === "wire";
}

export function isRawMapping(value: unknown): value is RawMapping {
  return isTaggedResult(value) && value[TAG] === "raw";
}
