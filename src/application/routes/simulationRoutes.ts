import { Router, type Request, type Response } from "express";
import type { SimulationRunner } from "@/domain/simulation/core/SimulationRunner";
import type { SimulationCommand } from "@/shared/types/commands/SimulationCommand";
import { SimulationCommandType } from "@/shared/constants/CommandEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { HttpStatusCode } from "@/shared/constants/HttpStatusCodes";
import { ResponseStatus } from "@/shared/constants/ResponseEnums";

export const MAX_STEP_TICKS = 1000;

function nonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Validates a request body and narrows it to a SimulationCommand.
 *
 * @returns The command, or `null` when the type is unknown or a field is
 * missing
 */
export function parseSimulationCommand(body: unknown): SimulationCommand | null {
  if (!body || typeof body !== "object" || !("type" in body)) {
    return null;
  }

  switch (body.type) {
    case SimulationCommandType.PLACE_ORDER:
      if (!("sku" in body) || !nonEmptyString(body.sku)) return null;
      return { type: SimulationCommandType.PLACE_ORDER, sku: body.sku };
    case SimulationCommandType.ADD_ITEM:
      if (!("sku" in body) || !nonEmptyString(body.sku)) return null;
      if (!("name" in body) || !nonEmptyString(body.name)) return null;
      return {
        type: SimulationCommandType.ADD_ITEM,
        sku: body.sku,
        name: body.name,
      };
    case SimulationCommandType.SET_TIME_SCALE:
      if (
        !("multiplier" in body) ||
        typeof body.multiplier !== "number" ||
        !Number.isFinite(body.multiplier)
      ) {
        return null;
      }
      return {
        type: SimulationCommandType.SET_TIME_SCALE,
        multiplier: body.multiplier,
      };
    default:
      return null;
  }
}

function readSku(body: unknown): string | null {
  if (!body || typeof body !== "object" || !("sku" in body)) return null;
  return nonEmptyString(body.sku) ? body.sku : null;
}

function readTicks(body: unknown): number | null {
  if (!body || typeof body !== "object" || !("ticks" in body)) return 1;
  const { ticks } = body;
  if (
    typeof ticks !== "number" ||
    !Number.isInteger(ticks) ||
    ticks < 1 ||
    ticks > MAX_STEP_TICKS
  ) {
    return null;
  }
  return ticks;
}

function sendFailure(res: Response, what: string, error: unknown): void {
  const errorMessage = error instanceof Error ? error.message : "Unknown error";
  logger.error(`Error ${what}: ${errorMessage}`, LogCategory.HTTP);
  res
    .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
    .json({ error: `Failed ${what}` });
}

/**
 * Simulation control and inspection routes under `/api/sim`.
 */
export function createSimulationRouter(runner: SimulationRunner): Router {
  const router = Router();

  /**
   * Health check for the simulation runner.
   *
   * @returns JSON response with status OK and current tick number
   */
  router.get("/api/sim/health", (_req: Request, res: Response): void => {
    try {
      res.json({ status: ResponseStatus.OK, tick: runner.driver.now() });
    } catch (error) {
      sendFailure(res, "getting simulation health", error);
    }
  });

  /**
   * Current fleet, grid, queue and order snapshot.
   */
  router.get("/api/sim/state", (_req: Request, res: Response): void => {
    try {
      res.json(runner.getSnapshot());
    } catch (error) {
      sendFailure(res, "getting simulation state", error);
    }
  });

  /**
   * Places an order for one unit of `req.body.sku`. The order is scheduled
   * straight away so its event id can be returned.
   *
   * @returns 201 with the event id, 400 without a SKU, 404 for an unknown SKU
   */
  router.post("/api/sim/orders", (req: Request, res: Response): void => {
    try {
      const sku = readSku(req.body);
      if (!sku) {
        res
          .status(HttpStatusCode.BAD_REQUEST)
          .json({ error: "Missing sku" });
        return;
      }

      const eventId = runner.placeOrder(sku);
      if (!eventId) {
        res
          .status(HttpStatusCode.NOT_FOUND)
          .json({ error: `Unknown sku ${sku}` });
        return;
      }

      res
        .status(HttpStatusCode.CREATED)
        .json({ status: ResponseStatus.QUEUED, eventId });
    } catch (error) {
      sendFailure(res, "placing order", error);
    }
  });

  /**
   * Enqueues a simulation command for the next tick.
   * Returns 429 (Too Many Requests) if the command queue is full.
   */
  router.post("/api/sim/command", (req: Request, res: Response): void => {
    try {
      const command = parseSimulationCommand(req.body);
      if (!command) {
        res
          .status(HttpStatusCode.BAD_REQUEST)
          .json({ error: "Invalid command format" });
        return;
      }

      if (!runner.enqueueCommand(command)) {
        res
          .status(HttpStatusCode.TOO_MANY_REQUESTS)
          .json({ error: "Command queue full" });
        return;
      }

      res.json({ status: ResponseStatus.QUEUED });
    } catch (error) {
      sendFailure(res, "processing command", error);
    }
  });

  /**
   * Advances the simulation by `req.body.ticks` (default 1) and returns the
   * resulting snapshot.
   */
  router.post("/api/sim/step", (req: Request, res: Response): void => {
    try {
      const ticks = readTicks(req.body);
      if (ticks === null) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: `ticks must be an integer between 1 and ${MAX_STEP_TICKS}`,
        });
        return;
      }
      res.json(runner.step(ticks));
    } catch (error) {
      sendFailure(res, "stepping simulation", error);
    }
  });

  return router;
}
