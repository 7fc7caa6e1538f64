export type {
  SigningAlgorithm,
  GatehouseConfig,
  GatehouseConfigInput,
  IdentityConfig,
  AuthorizationConfig,
  AuthenticationConfig,
} from "./config";

export type {
  Subsystem,
  IdentityReader,
  IdentitySubsystem,
  SubsystemName,
  SubsystemTypes,
  IdentityReaderOf,
  SubsystemFactory,
  SubsystemProviders,
} from "./subsystem";

export type { ContainerState, SubsystemContainer } from "./container";

export type { LogLevel, GatehouseLogger } from "./telemetry";
