import { isAsyncIterable, isRecord } from "./objectUtils.js";

const MAX_LENGTH = 256;

function replacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  // Buffer#toJSON has already run by the time the replacer sees it
  if (isRecord(value) && value.type === "Buffer" && Array.isArray(value.data)) return `<${value.data.length} bytes>`;
  return value;
}

/** One-line rendering of a wire message for log lines. */
export function formatMessage(message: unknown, maxLength = MAX_LENGTH): string {
  if (isAsyncIterable(message)) return "<stream>";
  let text: string;
  try {
    text = JSON.stringify(message, replacer) ?? String(message);
  } catch {
    // circular structures
    text = String(message);
  }
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
