import { getTraceId } from "./trace";

export type LogLevel = "info" | "warn" | "error";

export type Logger = {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type LogWriter = (line: string) => void;

export const createLogger = (
  service: string,
  write: LogWriter = (line) => console.log(line)
): Logger => {
  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    const entry = {
      level,
      service,
      message,
      traceId: getTraceId(),
      time: new Date().toISOString(),
      ...meta
    };
    write(JSON.stringify(entry));
  };

  return {
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta)
  };
};
