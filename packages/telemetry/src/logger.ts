import pino from "pino";
import type { GatehouseLogger, LogLevel } from "@gatehouse/types";
import type { TelemetryConfig } from "./env";

/** Output format after "auto" has been settled against the deployment environment. */
export type ResolvedLogFormat = "json" | "human";

/**
 * GatehouseLogger backed by pino. Attributes become fields on the JSON line;
 * child loggers carry a `name` so container and subsystem output can be told apart.
 */
export class PinoLogger implements GatehouseLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.write("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.write("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.write("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.write("error", message, attributes);
  }

  child(name: string, attributes?: Record<string, unknown>): GatehouseLogger {
    return new PinoLogger(this.pinoLogger.child({ name, ...attributes }));
  }

  withContext(attributes: Record<string, unknown>): GatehouseLogger {
    return new PinoLogger(this.pinoLogger.child(attributes));
  }

  private write(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    if (attributes) this.pinoLogger[level](attributes, message);
    else this.pinoLogger[level](message);
  }
}

/**
 * "auto" picks the human format on a developer machine (GATEHOUSE_ENV unset
 * or "local") and JSON everywhere else.
 */
export function resolveLogFormat(
  config: TelemetryConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedLogFormat {
  if (config.logFormat !== "auto") return config.logFormat;
  const deployment = env.GATEHOUSE_ENV;
  return !deployment || deployment === "local" ? "human" : "json";
}

export function buildLoggerOptions(
  config: TelemetryConfig,
  env: NodeJS.ProcessEnv = process.env,
): pino.LoggerOptions {
  const redactPaths = resolveRedactPaths(env);
  return {
    level: config.logLevel,
    base: { service: config.serviceName },
    redact: redactPaths.length > 0 ? { paths: redactPaths, censor: "[REDACTED]" } : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export function createLogger(config: TelemetryConfig): PinoLogger {
  const streams: pino.StreamEntry[] = [];

  if (resolveLogFormat(config) === "human") {
    // pino-pretty runs in a worker thread
    streams.push({
      level: config.logLevel,
      stream: pino.transport({ target: "pino-pretty", options: { destination: 1 } }),
    });
  } else {
    streams.push({ level: config.logLevel, stream: pino.destination(1) });
  }

  if (config.logFilePath) {
    streams.push({ level: config.logLevel, stream: pino.destination(config.logFilePath) });
  }

  return new PinoLogger(pino(buildLoggerOptions(config), pino.multistream(streams)));
}

function resolveRedactPaths(env: NodeJS.ProcessEnv): string[] {
  const keys = env.GATEHOUSE_LOG_REDACT_KEYS;
  if (!keys) return [];
  return keys
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);
}
