import { createServer } from "http";
import { createApp } from "./app";
import { config } from "./config/env";
import { logger } from "./lib/logger";

const app = createApp();
const server = createServer(app);

server.listen({ port: config.PORT, host: "0.0.0.0" }, () => {
  logger.info({ network: config.BITCOIN_NETWORK }, `serving on port ${config.PORT}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, "shutting down");
  server.close((err) => {
    if (err) {
      logger.error({ err }, "error while closing server");
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
