export type LogLevel = "silent" | "error" | "warn" | "info";

export interface AnalysisSettings {
  logLevel: LogLevel;
  precision: number;
}

export const DEFAULT_SETTINGS: AnalysisSettings = {
  logLevel: "warn",
  precision: 3,
};

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info"];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): AnalysisSettings {
  const rawLevel = env.BENCH_LOG_LEVEL?.trim().toLowerCase() ?? "";
  const rawPrecision = env.BENCH_REPORT_PRECISION?.trim() ?? "";
  const precision = /^\d+$/.test(rawPrecision) ? Number(rawPrecision) : NaN;

  return {
    logLevel: isLogLevel(rawLevel) ? rawLevel : DEFAULT_SETTINGS.logLevel,
    // toFixed accepts 0..100
    precision:
      Number.isInteger(precision) && precision <= 100
        ? precision
        : DEFAULT_SETTINGS.precision,
  };
}

export function logLevelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}
