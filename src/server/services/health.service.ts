/**
 * Health Service - one-shot reachability checks for both stores
 */

import { pingSource } from "../../db/connection.js";
import { pingGraph } from "../../graph/connection.js";

import type { AppConfig } from "../../config.js";
import type { Logger } from "../../logger.js";

export type StoreCheck = () => Promise<boolean>;

export interface StoreChecks {
  source: StoreCheck;
  graph: StoreCheck;
}

/**
 * Turn a probe into a check: resolves true when reachable, false otherwise.
 */
export function toCheck(
  store: string,
  probe: () => Promise<void>,
  logger: Logger
): StoreCheck {
  return async () => {
    try {
      await probe();
      return true;
    } catch (error) {
      logger.warn(
        {
          store,
          error: error instanceof Error ? error.message : String(error),
        },
        "Store unreachable"
      );
      return false;
    }
  };
}

/**
 * Checks against the configured stores. Every call opens a fresh connection.
 */
export function createStoreChecks(
  config: AppConfig,
  logger: Logger
): StoreChecks {
  const log = logger.child({ module: "health" });
  return {
    source: toCheck("source", () => pingSource(config.source), log),
    graph: toCheck("graph", () => pingGraph(config.graph), log),
  };
}

/**
 * Both stores reachable. The graph is not probed when the source is down.
 */
export async function isHealthy(checks: StoreChecks): Promise<boolean> {
  return (await checks.source()) && (await checks.graph());
}
