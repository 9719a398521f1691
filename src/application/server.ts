import "dotenv/config";
import "reflect-metadata";
import { createApp } from "./app";
import { CONFIG } from "../config/config";
import { container } from "../config/container";
import { TYPES } from "../config/Types";
import type { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import type { Pathfinder } from "../domain/simulation/systems/pathfinding/Pathfinder";
import { logger, LogCategory } from "../infrastructure/utils/logger";

/**
 * Main server entry point.
 *
 * Seeds the warehouse, starts the real-time tick loop and serves the HTTP
 * API. SIGINT and SIGTERM stop the loop, close the server and flush logs.
 *
 * @module application
 */

const simulationRunner = container.get<SimulationRunner>(
  TYPES.SimulationRunner,
);
const pathfinder = container.get<Pathfinder>(TYPES.Pathfinder);

simulationRunner.initialize();
simulationRunner.start();

const app = createApp({ runner: simulationRunner, pathfinder });
const server = app.listen(CONFIG.PORT, () => {
  logger.info(
    `Warehouse simulation listening on http://localhost:${CONFIG.PORT}`,
    LogCategory.HTTP,
  );
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`, LogCategory.GENERAL);
  simulationRunner.stop();
  server.close(() => {
    logger
      .flush()
      .catch((error: unknown) => {
        console.error(
          "Failed to flush logs on shutdown:",
          error instanceof Error ? error.message : String(error),
        );
      })
      .finally(() => {
        logger.destroy();
        process.exit(0);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
