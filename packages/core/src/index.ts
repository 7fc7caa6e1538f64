// Container
export { GatehouseContainer } from "./container/container";
export { withContainer } from "./container/scoped";
export { closeInReverse } from "./container/teardown";

// Factory
export { GatehouseFactory } from "./application/factory";

// Errors
export {
  UninitializedAccessError,
  ContainerStateError,
  SubsystemTeardownError,
} from "./errors/container-errors";

// Configuration and logging, re-exported so callers need one import
export { createConfig, loadConfig, DEFAULT_CONFIG, ConfigError } from "@gatehouse/config";
export { createLogger, readTelemetryEnv, NoopLogger } from "@gatehouse/telemetry";

export type {
  SigningAlgorithm,
  GatehouseConfig,
  GatehouseConfigInput,
  IdentityConfig,
  AuthorizationConfig,
  AuthenticationConfig,
  Subsystem,
  IdentityReader,
  IdentitySubsystem,
  SubsystemName,
  SubsystemTypes,
  SubsystemFactory,
  SubsystemProviders,
  ContainerState,
  SubsystemContainer,
  GatehouseLogger,
  LogLevel,
} from "@gatehouse/types";

export type { ContainerOptions, TeardownMode } from "./container/container";
export type { TeardownEntry } from "./container/teardown";
export type { CreateOptions } from "./application/factory";
export type {
  LifecycleOperation,
  TeardownFailure,
} from "./errors/container-errors";
