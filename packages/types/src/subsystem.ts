import type { AuthenticationConfig, AuthorizationConfig, IdentityConfig } from "./config";

// Lifecycle contract every wired subsystem implements.
export interface Subsystem {
  init(): Promise<void> | void;
  close(): Promise<void> | void;
}

/** Narrow read interface authentication uses to look identities up. */
export interface IdentityReader<TIdentity = unknown> {
  findById(id: string): Promise<TIdentity | null>;
}

export interface IdentitySubsystem<TReader extends IdentityReader = IdentityReader>
  extends Subsystem {
  readonly repository: TReader;
}

export type SubsystemName = "identity" | "authorization" | "authentication";

/** The concrete adapter types a container is wired with. */
export type SubsystemTypes = {
  identity: IdentitySubsystem;
  authorization: Subsystem;
  authentication: Subsystem;
};

export type IdentityReaderOf<S extends SubsystemTypes> = S["identity"]["repository"];

export type SubsystemFactory<TConfig, TSubsystem extends Subsystem> = (
  config: TConfig,
) => TSubsystem | Promise<TSubsystem>;

/** One factory per subsystem; each receives only its own configuration slice. */
export type SubsystemProviders<S extends SubsystemTypes = SubsystemTypes> = {
  identity: SubsystemFactory<IdentityConfig, S["identity"]>;
  authorization: SubsystemFactory<AuthorizationConfig, S["authorization"]>;
  authentication: SubsystemFactory<AuthenticationConfig<IdentityReaderOf<S>>, S["authentication"]>;
};
