import { ConfigurationError, loadConfig } from "./config.js";
import { logger } from "./logging/index.js";
import { createApp } from "./server/app.js";
import { renderBanner } from "./server/banner.js";

import type { ProxyConfig } from "./config.js";
import type { Server } from "http";

function loadConfigOrExit(): ProxyConfig | null {
  try {
    return loadConfig();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      // validateConfig already logged the problems
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

function start(): void {
  const config = loadConfigOrExit();
  if (config === null) {
    return;
  }

  const { host, port } = config.server;
  const app = createApp({ config });

  const server: Server = app.listen(port, host, (error?: Error) => {
    if (error) {
      // reported by the "error" listener below
      return;
    }
    const address = server.address();
    const actualPort = address !== null && typeof address === "object" ? address.port : port;

    logger.info("");
    for (const line of renderBanner(config, actualPort, host)) {
      logger.info(line);
    }
    logger.info("");
  });

  server.on("error", (error: NodeJS.ErrnoException) => {
    if (error.syscall !== "listen") {
      throw error;
    }

    switch (error.code) {
      case "EACCES":
        logger.error(`[SERVER] Port ${port} requires elevated privileges.`);
        process.exitCode = 1;
        break;
      case "EADDRINUSE":
        logger.error(`[SERVER] Port ${port} is already in use.`);
        process.exitCode = 1;
        break;
      default:
        throw error;
    }
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`[SERVER] Received ${signal}, shutting down`);
    server.close((error?: Error) => {
      if (error) {
        logger.error("[SERVER] Error while closing:", error);
        process.exitCode = 1;
      }
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

start();
