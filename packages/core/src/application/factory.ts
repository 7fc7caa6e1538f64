import createDebug from "debug";
import type { GatehouseConfig, SubsystemProviders, SubsystemTypes } from "@gatehouse/types";
import { loadConfig } from "@gatehouse/config";
import { createLogger, readTelemetryEnv } from "@gatehouse/telemetry";
import { GatehouseContainer } from "../container/container";
import type { ContainerOptions } from "../container/container";

const debug = createDebug("gatehouse:core:factory");

export type CreateOptions = ContainerOptions & {
  /** Defaults to the configuration read from GATEHOUSE_* environment variables. */
  config?: GatehouseConfig;
};

export class GatehouseFactory {
  /**
   * Creates an uninitialized container. Configuration and logger default to
   * what the environment describes.
   */
  static create<S extends SubsystemTypes>(
    providers: SubsystemProviders<S>,
    options: CreateOptions = {},
  ): GatehouseContainer<S> {
    const config = options.config ?? loadConfig();
    debug("create: config from %s", options.config ? "options" : "environment");

    const logger = options.logger ?? createLogger(readTelemetryEnv());
    debug("create: %s logger", options.logger ? "caller-supplied" : "default");

    return new GatehouseContainer(config, providers, {
      logger,
      teardown: options.teardown,
    });
  }
}
