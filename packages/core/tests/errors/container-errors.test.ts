import { describe, it, expect } from "vitest";
import {
  ContainerStateError,
  SubsystemTeardownError,
  UninitializedAccessError,
} from "../../src/errors/container-errors";

describe("UninitializedAccessError", () => {
  it("should tell the caller to initialize first", () => {
    const error = new UninitializedAccessError("authorization", "uninitialized");

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("UninitializedAccessError");
    expect(error.subsystem).toBe("authorization");
    expect(error.message).toBe(
      "Cannot access authorization: container not initialized. Call await init() first.",
    );
  });

  it("should say the container was closed", () => {
    expect(new UninitializedAccessError("identity", "closed").message).toBe(
      "Cannot access identity: container has been closed.",
    );
    expect(new UninitializedAccessError("identity", "closing").message).toBe(
      "Cannot access identity: container has been closed.",
    );
  });
});

describe("ContainerStateError", () => {
  it("should name the operation and state", () => {
    const error = new ContainerStateError("close", "initializing");

    expect(error.name).toBe("ContainerStateError");
    expect(error.operation).toBe("close");
    expect(error.state).toBe("initializing");
    expect(error.message).toBe("Cannot close() while container is initializing");
  });
});

describe("SubsystemTeardownError", () => {
  it("should aggregate the underlying errors", () => {
    const first = new Error("pool drain timed out");
    const second = new Error("socket already closed");

    const error = new SubsystemTeardownError([
      { subsystem: "authentication", error: first },
      { subsystem: "identity", error: second },
    ]);

    expect(error).toBeInstanceOf(AggregateError);
    expect(error.name).toBe("SubsystemTeardownError");
    expect(error.message).toBe("Failed to close authentication, identity");
    expect(error.errors).toEqual([first, second]);
    expect(error.failures).toHaveLength(2);
  });
});
