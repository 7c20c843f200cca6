import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";
import { DEFAULT_PROTOC } from "../src/infrastructure/protoc.js";

describe("loadConfig", () => {
  let dir: string;

  const writeYaml = (name: string, text: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, text);
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "schemarpc-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("uses defaults", () => {
    expect(loadConfig({ env: {} })).toEqual({
      autoGenerateProto: true,
      compileProto: false,
      reflection: true,
      host: "127.0.0.1",
      port: 50051,
      protoc: DEFAULT_PROTOC,
    });
  });

  it("reads environment variables", () => {
    const config = loadConfig({
      env: {
        SCHEMARPC_PORT: "6000",
        SCHEMARPC_HOST: "0.0.0.0",
        SCHEMARPC_REFLECTION: "false",
        SCHEMARPC_COMPILE_PROTO: "1",
        SCHEMARPC_AUTO_GENERATE_PROTO: "0",
        SCHEMARPC_PROTOC: "buf generate",
      },
    });
    expect(config).toEqual({
      autoGenerateProto: false,
      compileProto: true,
      reflection: false,
      host: "0.0.0.0",
      port: 6000,
      protoc: { command: "buf", args: ["generate"] },
    });
  });

  it("keeps the default arguments for a bare compiler path", () => {
    const config = loadConfig({ env: { SCHEMARPC_PROTOC: "/opt/protoc/bin/protoc" } });
    expect(config.protoc).toEqual({ command: "/opt/protoc/bin/protoc", args: DEFAULT_PROTOC.args });
  });

  it("layers file, environment and overrides", () => {
    const file = writeYaml("schemarpc.yaml", "port: 7000\nhost: 0.0.0.0\nreflection: false\n");
    expect(loadConfig({ env: {}, file })).toMatchObject({ port: 7000, host: "0.0.0.0", reflection: false });
    expect(loadConfig({ env: { SCHEMARPC_PORT: "8000" }, file })).toMatchObject({ port: 8000, host: "0.0.0.0" });
    expect(loadConfig({ env: { SCHEMARPC_PORT: "8000" }, file, overrides: { port: 9000 } }).port).toBe(9000);
  });

  it("finds the file through SCHEMARPC_CONFIG", () => {
    const file = writeYaml("custom.yaml", "compileProto: true\nprotoc:\n  command: protoc\n  args: [\"{proto}\"]\n");
    const config = loadConfig({ env: { SCHEMARPC_CONFIG: file } });
    expect(config.compileProto).toBe(true);
    expect(config.protoc).toEqual({ command: "protoc", args: ["{proto}"] });
  });

  it("treats an empty file as no settings", () => {
    const file = writeYaml("empty.yaml", "");
    expect(loadConfig({ env: {}, file }).port).toBe(50051);
  });

  it("rejects invalid files", () => {
    const file = writeYaml("bad.yaml", "port: high\n");
    expect(() => loadConfig({ env: {}, file })).toThrow(
      new ConfigError(`invalid ${file}: port: Expected number, received string`),
    );
  });

  it("rejects unknown keys", () => {
    const file = writeYaml("typo.yaml", "colour: blue\n");
    expect(() => loadConfig({ env: {}, file })).toThrow(/Unrecognized key\(s\) in object: 'colour'/);
  });

  it("rejects unreadable files", () => {
    const file = path.join(dir, "nope.yaml");
    expect(() => loadConfig({ env: {}, file })).toThrow(new RegExp(`^cannot read ${file.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}: `));
  });

  it("rejects invalid merged values", () => {
    expect(() => loadConfig({ env: { SCHEMARPC_PORT: "99999" } })).toThrow(/^invalid configuration: port: /);
  });
});
