import "dotenv/config";
import { loadConfig } from "../config/index.js";
import { errorMessage } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import { createMonitor } from "../core/pipeline/monitor.js";
import { buildServer } from "./app.js";

const logger = createLogger("server");

async function main(): Promise<void> {
  const config = loadConfig();
  const monitor = await createMonitor(config);
  const server = buildServer(monitor);

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    monitor
      .stop()
      .then(() => server.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }

  monitor.start();
  logger.info(
    { url: `http://${config.host}:${config.port}`, tickIntervalMs: config.tickIntervalMs },
    "GEO monitor server running",
  );
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Server failed to start");
  process.exit(1);
});
