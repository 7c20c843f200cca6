export type LogFn = (...args: unknown[]) => void;

/** `log` for informational lines, `err` for warnings and failures. */
export interface Logger {
  log: LogFn;
  err: LogFn;
}

export function createLogger(prefix = "[schemarpc]"): Logger {
  return {
    log: (...a: unknown[]) => console.log(prefix, ...a),
    err: (...a: unknown[]) => console.error(prefix, ...a),
  };
}

export const defaultLogger: Logger = createLogger();
