import type { GatehouseConfig } from "./config";
import type { SubsystemTypes } from "./subsystem";

export type ContainerState = "uninitialized" | "initializing" | "ready" | "closing" | "closed";

/** What a subsystem container exposes to callers once constructed. */
export interface SubsystemContainer<S extends SubsystemTypes = SubsystemTypes> {
  readonly config: GatehouseConfig;
  readonly state: ContainerState;
  init(): Promise<void>;
  close(): Promise<void>;
  use<T>(fn: (container: this) => T | Promise<T>): Promise<T>;
  identity(): S["identity"];
  authorization(): S["authorization"];
  authentication(): S["authentication"];
}
