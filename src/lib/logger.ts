import { loadSettings, logLevelRank } from "@/lib/config";
import type { LogLevel } from "@/lib/config";

export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

type LogSink = Pick<Console, "log" | "warn" | "error">;

export function createLogger(
  level: LogLevel = loadSettings().logLevel,
  sink: LogSink = console,
): Logger {
  const enabled = (wanted: LogLevel) => logLevelRank(level) >= logLevelRank(wanted);

  return {
    info: (message, ...details) => {
      if (enabled("info")) sink.log(message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) sink.warn(message, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) sink.error(message, ...details);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
