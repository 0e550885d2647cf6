import "dotenv/config";

import { loadConfig, type AppConfig } from "../../config.js";
import { createLogger, type Logger } from "../../logger.js";

/**
 * Build the configuration and root logger for one CLI invocation.
 */
export function bootstrap(): { config: AppConfig; logger: Logger } {
  const config = loadConfig(process.env);
  const { logger } = createLogger(config.logging);
  return { config, logger };
}
