/**
 * Readiness Gate
 *
 * Polls a dependent store until it answers or the timeout elapses. The
 * interval is fixed: at startup the stores come up once and stay up, so a
 * plain poll is enough.
 */

import { ReadinessTimeoutError } from "../../errors.js";
import { silentLogger, type Logger } from "../../logger.js";

export type Probe = () => Promise<void>;

export interface ReadinessOptions {
  /** Store name for logs and errors */
  store: string;
  timeoutMs?: number;
  intervalMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const DEFAULT_READINESS_TIMEOUT_MS = 120_000;
export const DEFAULT_READINESS_INTERVAL_MS = 1000;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wait until `probe` resolves.
 *
 * @returns number of attempts it took
 * @throws ReadinessTimeoutError carrying the last probe failure as `cause`
 */
export async function awaitReady(
  probe: Probe,
  options: ReadinessOptions
): Promise<number> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_READINESS_TIMEOUT_MS;
  const intervalMs = options.intervalMs ?? DEFAULT_READINESS_INTERVAL_MS;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const log = (options.logger ?? silentLogger()).child({
    module: "readiness",
    store: options.store,
  });

  const start = now();
  let attempts = 0;

  for (;;) {
    attempts++;
    try {
      await probe();
      log.info({ attempts }, "Store is ready");
      return attempts;
    } catch (error) {
      const elapsed = now() - start;
      if (elapsed > timeoutMs) {
        log.error({ attempts, elapsed, error }, "Store never became ready");
        throw new ReadinessTimeoutError(
          options.store,
          timeoutMs,
          attempts,
          error
        );
      }
      log.debug(
        {
          attempts,
          elapsed,
          error: error instanceof Error ? error.message : String(error),
        },
        "Store not ready, retrying"
      );
      await sleep(intervalMs);
    }
  }
}
