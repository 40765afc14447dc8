import { getTraceFields, getTraceId } from "./trace";

export type LogLevel = "info" | "warn" | "error";

export type Logger = {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type LoggerOptions = {
  level?: LogLevel;
  write?: (line: string) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 10,
  warn: 20,
  error: 30
};

export const createLogger = (service: string, options: LoggerOptions = {}): Logger => {
  const minimumRank = LEVEL_RANK[options.level ?? "info"];
  const write = options.write ?? ((line: string) => console.log(line));

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < minimumRank) {
      return;
    }
    const entry = {
      level,
      service,
      message,
      traceId: getTraceId(),
      time: new Date().toISOString(),
      ...getTraceFields(),
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
