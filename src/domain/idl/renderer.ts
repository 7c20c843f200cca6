import type { EnumEntry, MessageEntry, MethodEntry, ProtoDocument, ServiceEntry } from "./document.js";
import { renderEach, renderTemplate } from "./templateEngine.js";

const HEADER_TEMPLATE = `syntax = "proto3";

package {{package}};`;
const IMPORT_TEMPLATE = `import "{{path}}";`;
const ENUM_TEMPLATE = `enum {{name}} {
{{body}}}`;
const MEMBER_TEMPLATE = `    {{name}} = {{index}};\n`;
const MESSAGE_TEMPLATE = `message {{name}} {
{{body}}}`;
const FIELD_TEMPLATE = `    {{type}} {{name}} = {{index}};\n`;
const SERVICE_TEMPLATE = `service {{name}} {
{{body}}}`;
const COMMENT_TEMPLATE = `    // {{text}}\n`;
const RPC_TEMPLATE = `    rpc {{name}}({{request}}) returns ({{response}});\n`;

function renderEnum(entry: EnumEntry): string {
  return renderTemplate(ENUM_TEMPLATE, {
    name: entry.name,
    body: renderEach(MEMBER_TEMPLATE, entry.members.map(m => ({ ...m }))),
  });
}

function renderMessage(entry: MessageEntry): string {
  return renderTemplate(MESSAGE_TEMPLATE, {
    name: entry.name,
    body: renderEach(FIELD_TEMPLATE, entry.fields.map(f => ({ ...f }))),
  });
}

function renderMethod(method: MethodEntry): string {
  // one comment line per description line
  const lines = method.description ? method.description.split(/\r?\n/) : [];
  const comment = renderEach(COMMENT_TEMPLATE, lines.map(text => ({ text })));
  return comment + renderTemplate(RPC_TEMPLATE, {
    name: method.name,
    request: (method.clientStreaming ? "stream " : "") + method.requestType,
    response: (method.serverStreaming ? "stream " : "") + method.responseType,
  });
}

function renderService(entry: ServiceEntry): string {
  return renderTemplate(SERVICE_TEMPLATE, {
    name: entry.name,
    body: entry.methods.map(renderMethod).join(""),
  });
}

/**
 * Render a document as proto3 text. Blocks keep insertion order: header,
 * imports, enums, messages, services. The same document always renders to the
 * same text.
 */
export function renderProto(document: ProtoDocument): string {
  const blocks: string[] = [renderTemplate(HEADER_TEMPLATE, { package: document.package })];
  if (document.dependencies.size) {
    blocks.push(renderEach(IMPORT_TEMPLATE, [...document.dependencies].map(path => ({ path })), "\n"));
  }
  for (const entry of document.enums.values()) blocks.push(renderEnum(entry));
  for (const entry of document.messages.values()) blocks.push(renderMessage(entry));
  for (const entry of document.services) blocks.push(renderService(entry));
  return blocks.join("\n\n") + "\n";
}
