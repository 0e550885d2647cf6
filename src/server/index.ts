import "dotenv/config";

import { buildServer } from "./app.js";
import { createStoreChecks } from "./services/health.service.js";
import { loadConfig } from "../config.js";
import { createLogger } from "../logger.js";

const config = loadConfig(process.env);
const { logger, fastifyLoggerConfig } = createLogger(config.logging);

const app = await buildServer({
  logger: fastifyLoggerConfig,
  checks: createStoreChecks(config, logger),
});

// Start server
try {
  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { host: config.server.host, port: config.server.port },
    "Server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
