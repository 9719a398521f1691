import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import { createSimulationRouter } from "./routes/simulationRoutes";
import { createMetricsRouter } from "./routes/metricsRoutes";
import { CONFIG } from "../config/config";
import type { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import type { Pathfinder } from "../domain/simulation/systems/pathfinding/Pathfinder";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../shared/constants/ResponseEnums";

export interface AppDependencies {
  runner: SimulationRunner;
  pathfinder: Pathfinder;
}

/**
 * Builds the Express application.
 *
 * Configures middleware, routes, and error handling for the simulation server.
 *
 * Routes:
 * - `/health` - Health check endpoint
 * - `/api/sim` - Simulation control, orders and state
 * - `/metrics` - Runtime counters (JSON and Prometheus)
 *
 * @module application
 */
export function createApp({ runner, pathfinder }: AppDependencies): Express {
  const app = express();

  app.use(
    cors({
      origin: CONFIG.ALLOWED_ORIGINS,
      credentials: true,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.HTTP);
      next();
    });
  }

  app.get("/health", (_req: Request, res: Response): void => {
    res.json({ status: ResponseStatus.OK });
  });

  app.use("/", createSimulationRouter(runner));
  app.use("/", createMetricsRouter(runner, pathfinder));

  app.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
      if ("type" in err && err.type === "entity.parse.failed") {
        res
          .status(HttpStatusCode.BAD_REQUEST)
          .json({ error: "Malformed JSON body" });
        return;
      }
      const errorMessage =
        process.env.NODE_ENV === "production"
          ? "Internal server error"
          : err.message;
      logger.error(`Unhandled error: ${err.message}`, LogCategory.HTTP);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: errorMessage });
    },
  );

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  return app;
}
