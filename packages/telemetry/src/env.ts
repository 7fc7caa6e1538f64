import type { LogLevel } from "@gatehouse/types";

export type LogFormat = "json" | "human" | "auto";

export type TelemetryConfig = {
  serviceName: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "human", "auto"];

function pick<T extends string>(allowed: readonly T[], raw: string | undefined, fallback: T): T {
  return allowed.find((value) => value === raw) ?? fallback;
}

export function readTelemetryEnv(): TelemetryConfig {
  return {
    serviceName: process.env.GATEHOUSE_SERVICE_NAME ?? "gatehouse",
    logLevel: pick(LOG_LEVELS, process.env.GATEHOUSE_LOG_LEVEL, "info"),
    logFormat: pick(LOG_FORMATS, process.env.GATEHOUSE_LOG_FORMAT, "auto"),
    logFilePath: process.env.GATEHOUSE_LOG_FILE_PATH ?? null,
  };
}
