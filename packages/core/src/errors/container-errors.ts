import type { ContainerState, SubsystemName } from "@gatehouse/types";

export type LifecycleOperation = "init" | "close";

export type TeardownFailure = {
  subsystem: SubsystemName;
  error: unknown;
};

/** Thrown by an accessor when the container is not ready. */
export class UninitializedAccessError extends Error {
  constructor(
    public readonly subsystem: SubsystemName,
    public readonly state: ContainerState,
  ) {
    super(
      state === "closing" || state === "closed"
        ? `Cannot access ${subsystem}: container has been closed.`
        : `Cannot access ${subsystem}: container not initialized. Call await init() first.`,
    );
    this.name = "UninitializedAccessError";
  }
}

export class ContainerStateError extends Error {
  constructor(
    public readonly operation: LifecycleOperation,
    public readonly state: ContainerState,
  ) {
    super(`Cannot ${operation}() while container is ${state}`);
    this.name = "ContainerStateError";
  }
}

/** Aggregates every subsystem close() failure from one teardown pass. */
export class SubsystemTeardownError extends AggregateError {
  constructor(public readonly failures: readonly TeardownFailure[]) {
    super(
      failures.map((failure) => failure.error),
      `Failed to close ${failures.map((failure) => failure.subsystem).join(", ")}`,
    );
    this.name = "SubsystemTeardownError";
  }
}
