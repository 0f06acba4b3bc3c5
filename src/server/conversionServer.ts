#!/usr/bin/env node

import { SERVER_HOST, SERVER_PORT, validateConfig } from "../config.js";
import { logger } from "../logging/index.js";

import { createConversionApp } from "./app.js";

import type { AddressInfo } from "net";

validateConfig();

const app = createConversionApp();

const server = app.listen(SERVER_PORT, SERVER_HOST, () => {
  const address = server.address() as AddressInfo | null;
  logger.info(`PairStream conversion server listening on ${SERVER_HOST}:${address?.port ?? SERVER_PORT}`);
  logger.info("  GET  /health");
  logger.info("  GET  /profiles");
  logger.info("  POST /convert/:profile   (XML body, text/plain records)");
});

const shutdown = (signal: string): void => {
  logger.info(`${signal} received, closing server`);
  server.close((error) => {
    if (error) {
      logger.error("Error while closing server:", error.message);
      process.exitCode = 1;
    }
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
