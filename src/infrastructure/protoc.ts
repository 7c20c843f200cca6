import fs from "fs";
import path from "path";
import { spawnSync } from "child_process";
import { CompilationError } from "../domain/errors.js";
import type { Logger } from "../logger.js";

export interface ProtocCommand {
  command: string;
  /** `{proto}`, `{dir}` and `{stem}` are replaced per file */
  args: string[];
}

export const DEFAULT_PROTOC: ProtocCommand = {
  command: "protoc",
  args: ["-I", "{dir}", "--include_imports", "--descriptor_set_out={dir}/{stem}.pb", "{proto}"],
};

/** Write generated proto text, creating parent directories. */
export function writeProtoFile(file: string, content: string, logger?: Logger): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  fs.writeFileSync(file, content, "utf8");
  logger?.log(`(info) wrote ${file}`);
}

export function expandArgs(protoc: ProtocCommand, proto: string): string[] {
  const absolute = path.resolve(proto);
  const vars: Record<string, string> = {
    proto: absolute,
    dir: path.dirname(absolute),
    stem: path.basename(absolute, path.extname(absolute)),
  };
  return protoc.args.map(arg => arg.replace(/\{(proto|dir|stem)\}/g, (_m, key: string) => vars[key] ?? ""));
}

/** Run the external proto compiler on one file. */
export function runProtoc(proto: string, protoc: ProtocCommand = DEFAULT_PROTOC, logger?: Logger): void {
  const args = expandArgs(protoc, proto);
  const result = spawnSync(protoc.command, args, { encoding: "utf8" });
  if (result.error) {
    throw new CompilationError(`could not run ${protoc.command}: ${result.error.message}`, null, { cause: result.error });
  }
  if (result.status !== 0) {
    const output = (result.stderr || result.stdout || "").trim();
    throw new CompilationError(`${protoc.command} exited with ${result.status} for ${proto}${output ? `: ${output}` : ""}`, result.status);
  }
  logger?.log(`(info) compiled ${proto} with ${protoc.command}`);
}
