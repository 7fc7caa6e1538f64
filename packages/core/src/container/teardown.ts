import createDebug from "debug";
import type { GatehouseLogger, Subsystem, SubsystemName } from "@gatehouse/types";
import type { TeardownFailure } from "../errors/container-errors";

const debug = createDebug("gatehouse:core:teardown");

export type TeardownEntry = {
  name: SubsystemName;
  subsystem: Subsystem;
};

/**
 * Closes subsystems in reverse of the order given. A failing close() is
 * logged and collected; the remaining subsystems are still closed.
 */
export async function closeInReverse(
  entries: readonly TeardownEntry[],
  logger: GatehouseLogger,
): Promise<TeardownFailure[]> {
  const failures: TeardownFailure[] = [];
  for (const entry of [...entries].reverse()) {
    debug("closing %s", entry.name);
    try {
      await entry.subsystem.close();
      logger.debug("subsystem closed", { subsystem: entry.name });
    } catch (error) {
      logger.error("subsystem close failed", { subsystem: entry.name, err: error });
      failures.push({ subsystem: entry.name, error });
    }
  }
  return failures;
}
