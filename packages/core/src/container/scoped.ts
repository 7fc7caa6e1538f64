import type { GatehouseConfig, SubsystemProviders, SubsystemTypes } from "@gatehouse/types";
import { GatehouseContainer } from "./container";
import type { ContainerOptions } from "./container";

/**
 * Builds a container, runs `fn` with it initialized, and closes it on every
 * exit path. The usual way to use a container outside long-lived processes.
 */
export async function withContainer<S extends SubsystemTypes, T>(
  config: GatehouseConfig,
  providers: SubsystemProviders<S>,
  fn: (container: GatehouseContainer<S>) => T | Promise<T>,
  options?: ContainerOptions,
): Promise<T> {
  const container = new GatehouseContainer(config, providers, options);
  return container.use(fn);
}
