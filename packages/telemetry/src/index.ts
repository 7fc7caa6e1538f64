export { PinoLogger, createLogger, resolveLogFormat, buildLoggerOptions } from "./logger";
export type { ResolvedLogFormat } from "./logger";
export { readTelemetryEnv } from "./env";
export type { TelemetryConfig, LogFormat } from "./env";
export { NoopLogger, NOOP_LOGGER } from "./noop";
