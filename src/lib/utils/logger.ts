/* eslint-disable no-console */
import { logLevelSchema, type LogLevel } from "@/config/env";

type LogMetadata = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// An invalid LOG_LEVEL is reported by getServerEnv; logging keeps the default meanwhile.
function currentLevel(): LogLevel {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel()];
}

export const logger = {
  debug(message: string, metadata?: LogMetadata) {
    if (!shouldLog("debug")) {
      return;
    }
    console.debug(JSON.stringify({ level: "debug", message, ...metadata }));
  },
  info(message: string, metadata?: LogMetadata) {
    if (!shouldLog("info")) {
      return;
    }
    console.log(JSON.stringify({ level: "info", message, ...metadata }));
  },
  error(message: string, metadata?: LogMetadata) {
    if (!shouldLog("error")) {
      return;
    }
    console.error(JSON.stringify({ level: "error", message, ...metadata }));
  },
  warn(message: string, metadata?: LogMetadata) {
    if (!shouldLog("warn")) {
      return;
    }
    console.warn(JSON.stringify({ level: "warn", message, ...metadata }));
  }
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
