import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { SchemaRpcError, errorMessage } from "./domain/errors.js";
import { DEFAULT_PROTOC } from "./infrastructure/protoc.js";

export const DEFAULT_CONFIG_FILE = "schemarpc.yaml";

const protocSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
});

export const configSchema = z
  .object({
    autoGenerateProto: z.boolean().default(true),
    // protoc does not ship on npm; bindings are loaded with proto-loader instead
    compileProto: z.boolean().default(false),
    reflection: z.boolean().default(true),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(0).max(65535).default(50051),
    protoc: protocSchema.default(DEFAULT_PROTOC),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export class ConfigError extends SchemaRpcError {}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** YAML file; defaults to $SCHEMARPC_CONFIG, then ./schemarpc.yaml when present */
  file?: string;
  /** applied last */
  overrides?: ConfigInput;
}

function parseBool(value: string): boolean {
  return value === "true" || value === "1";
}

function fromEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const out: ConfigInput = {};
  if (env.SCHEMARPC_AUTO_GENERATE_PROTO !== undefined) out.autoGenerateProto = parseBool(env.SCHEMARPC_AUTO_GENERATE_PROTO);
  if (env.SCHEMARPC_COMPILE_PROTO !== undefined) out.compileProto = parseBool(env.SCHEMARPC_COMPILE_PROTO);
  if (env.SCHEMARPC_REFLECTION !== undefined) out.reflection = parseBool(env.SCHEMARPC_REFLECTION);
  if (env.SCHEMARPC_HOST) out.host = env.SCHEMARPC_HOST;
  if (env.SCHEMARPC_PORT) out.port = Number(env.SCHEMARPC_PORT);
  if (env.SCHEMARPC_PROTOC) {
    const [command = "", ...args] = env.SCHEMARPC_PROTOC.trim().split(/\s+/);
    out.protoc = { command, args: args.length ? args : DEFAULT_PROTOC.args };
  }
  return out;
}

function fromFile(file: string): ConfigInput {
  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new ConfigError(`cannot read ${file}: ${errorMessage(e)}`, { cause: e });
  }
  if (doc === undefined || doc === null) return {};
  const parsed = configSchema.partial().safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(`invalid ${file}: ${parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}

/** Defaults, then the YAML file, then environment variables, then overrides. */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  let file = options.file ?? env.SCHEMARPC_CONFIG;
  if (!file && fs.existsSync(path.resolve(DEFAULT_CONFIG_FILE))) file = DEFAULT_CONFIG_FILE;

  const merged: ConfigInput = {
    ...(file ? fromFile(file) : {}),
    ...fromEnv(env),
    ...options.overrides,
  };
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}
