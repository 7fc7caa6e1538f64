import type { GatehouseLogger } from "@gatehouse/types";

/** Discards every record. The container's default when no logger is supplied. */
export class NoopLogger implements GatehouseLogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}

  child(): GatehouseLogger {
    return this;
  }

  withContext(): GatehouseLogger {
    return this;
  }
}

export const NOOP_LOGGER: GatehouseLogger = new NoopLogger();
