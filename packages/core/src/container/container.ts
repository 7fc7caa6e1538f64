import createDebug from "debug";
import type {
  ContainerState,
  GatehouseConfig,
  GatehouseLogger,
  Subsystem,
  SubsystemContainer,
  SubsystemFactory,
  SubsystemName,
  SubsystemProviders,
  SubsystemTypes,
} from "@gatehouse/types";
import {
  authenticationConfigFrom,
  authorizationConfigFrom,
  identityConfigFrom,
} from "@gatehouse/config";
import { NOOP_LOGGER } from "@gatehouse/telemetry";
import {
  ContainerStateError,
  SubsystemTeardownError,
  UninitializedAccessError,
} from "../errors/container-errors";
import { closeInReverse } from "./teardown";
import type { TeardownEntry } from "./teardown";

const debug = createDebug("gatehouse:core:container");

/**
 * `log` reports teardown failures through the logger and resolves;
 * `throw` also rejects close() with a SubsystemTeardownError.
 */
export type TeardownMode = "log" | "throw";

export type ContainerOptions = {
  logger?: GatehouseLogger;
  teardown?: TeardownMode;
};

type Handles<S extends SubsystemTypes> = {
  identity: S["identity"];
  authorization: S["authorization"];
  authentication: S["authentication"];
};

/**
 * Owns the identity, authorization and authentication subsystems for its
 * lifetime. Brings them up in that order and tears them down in reverse.
 *
 * Lifecycle calls are not synchronized: callers must not overlap init()
 * and close() on the same instance. Overlaps that are detected reject with
 * ContainerStateError.
 */
export class GatehouseContainer<S extends SubsystemTypes = SubsystemTypes>
  implements SubsystemContainer<S>
{
  private currentState: ContainerState = "uninitialized";
  private handles: Handles<S> | null = null;
  private readonly logger: GatehouseLogger;
  private readonly teardownMode: TeardownMode;

  constructor(
    readonly config: GatehouseConfig,
    private readonly providers: SubsystemProviders<S>,
    options: ContainerOptions = {},
  ) {
    this.logger = (options.logger ?? NOOP_LOGGER).child("container");
    this.teardownMode = options.teardown ?? "log";
  }

  get state(): ContainerState {
    return this.currentState;
  }

  async init(): Promise<void> {
    if (this.currentState !== "uninitialized") {
      throw new ContainerStateError("init", this.currentState);
    }

    this.currentState = "initializing";
    this.logger.info("initializing subsystems");

    const constructed: TeardownEntry[] = [];
    let stage: SubsystemName = "identity";
    try {
      const identity = await this.bringUp(
        "identity",
        this.providers.identity,
        identityConfigFrom(this.config),
        constructed,
      );

      stage = "authorization";
      const authorization = await this.bringUp(
        "authorization",
        this.providers.authorization,
        authorizationConfigFrom(this.config),
        constructed,
      );

      // Authentication looks identities up through the live repository, so it
      // can only be configured once identity is up.
      stage = "authentication";
      const authentication = await this.bringUp(
        "authentication",
        this.providers.authentication,
        authenticationConfigFrom(this.config, identity.repository),
        constructed,
      );

      this.handles = { identity, authorization, authentication };
      this.currentState = "ready";
      this.logger.info("subsystems ready");
    } catch (error) {
      this.logger.error("subsystem bring-up failed", { subsystem: stage, err: error });
      const failures = await closeInReverse(constructed, this.logger);
      debug("init: rolled back %d subsystems, %d failed", constructed.length, failures.length);
      this.currentState = "uninitialized";
      throw error;
    }
  }

  identity(): S["identity"] {
    return this.handle("identity");
  }

  authorization(): S["authorization"] {
    return this.handle("authorization");
  }

  authentication(): S["authentication"] {
    return this.handle("authentication");
  }

  async close(): Promise<void> {
    if (this.currentState === "uninitialized" || this.currentState === "closed") {
      debug("close: nothing to close (%s)", this.currentState);
      return;
    }

    const handles = this.handles;
    if (this.currentState !== "ready" || handles === null) {
      throw new ContainerStateError("close", this.currentState);
    }

    this.currentState = "closing";
    this.handles = null;
    this.logger.info("closing subsystems");

    const failures = await closeInReverse(
      [
        { name: "identity", subsystem: handles.identity },
        { name: "authorization", subsystem: handles.authorization },
        { name: "authentication", subsystem: handles.authentication },
      ],
      this.logger,
    );
    this.currentState = "closed";

    if (failures.length === 0) {
      this.logger.info("subsystems closed");
      return;
    }

    this.logger.error("subsystems closed with failures", {
      failed: failures.map((failure) => failure.subsystem),
    });
    if (this.teardownMode === "throw") {
      throw new SubsystemTeardownError(failures);
    }
  }

  /**
   * Runs `fn` between init() and close(). close() runs exactly once on every
   * exit path, including a failed init(). When both `fn` and close() fail,
   * the error from `fn` is the one rethrown.
   */
  async use<T>(fn: (container: this) => T | Promise<T>): Promise<T> {
    try {
      await this.init();
    } catch (error) {
      if (!(error instanceof ContainerStateError)) {
        await this.close();
      }
      throw error;
    }

    let result: T;
    try {
      result = await fn(this);
    } catch (error) {
      await this.closeAfterScopeError();
      throw error;
    }

    await this.close();
    return result;
  }

  private async closeAfterScopeError(): Promise<void> {
    try {
      await this.close();
    } catch (teardownError) {
      this.logger.error("close failed after scope error", { err: teardownError });
    }
  }

  private async bringUp<TConfig, TSubsystem extends Subsystem>(
    name: SubsystemName,
    factory: SubsystemFactory<TConfig, TSubsystem>,
    config: TConfig,
    constructed: TeardownEntry[],
  ): Promise<TSubsystem> {
    debug("bringUp %s: constructing", name);
    const subsystem = await factory(config);
    constructed.push({ name, subsystem });

    debug("bringUp %s: init", name);
    await subsystem.init();
    this.logger.debug("subsystem initialized", { subsystem: name });
    return subsystem;
  }

  private handle<K extends SubsystemName>(name: K): Handles<S>[K] {
    if (this.currentState !== "ready" || this.handles === null) {
      throw new UninitializedAccessError(name, this.currentState);
    }
    return this.handles[name];
  }
}
