import { Router } from "express";
import type { SimulationRunner } from "@/domain/simulation/core/SimulationRunner";
import type { EventDriverStats } from "@/domain/simulation/core/EventDriver";
import type {
  Pathfinder,
  PathfinderStats,
} from "@/domain/simulation/systems/pathfinding/Pathfinder";
import {
  logger,
  LogCategory,
  LogLevel,
  type LogFilter,
  type LogMetrics,
} from "@/infrastructure/utils/logger";

const MAX_LOG_LIMIT = 1000;

export interface RuntimeMetrics {
  tick: number;
  driver: EventDriverStats;
  pathfinder: PathfinderStats;
  fleet: { available: number; working: number; charging: number };
  picks: number;
  logs: LogMetrics;
  memory: NodeJS.MemoryUsage;
}

export function collectRuntimeMetrics(
  runner: SimulationRunner,
  pathfinder: Pathfinder,
): RuntimeMetrics {
  return {
    tick: runner.driver.now(),
    driver: runner.driver.getStats(),
    pathfinder: pathfinder.getStats(),
    fleet: {
      available: runner.pool.getAvailable().length,
      working: runner.pool.getWorking().length,
      charging: runner.pool.getCharging().length,
    },
    picks: runner.picker.getPickCount(),
    logs: logger.getMetrics(),
    memory: process.memoryUsage(),
  };
}

/**
 * Renders the counters in Prometheus text format (version 0.0.4).
 */
export function toPrometheus(metrics: RuntimeMetrics): string {
  const lines: string[] = [];
  const gauge = (name: string, help: string, value: number): void => {
    lines.push(`# HELP ${name} ${help}`, `# TYPE ${name} gauge`, `${name} ${value}`);
  };

  gauge("warehouse_tick", "Current simulated tick", metrics.tick);
  gauge("warehouse_events_pending", "Task events waiting in the driver", metrics.driver.pending);
  gauge("warehouse_dispatches_total", "Task steps dispatched", metrics.driver.dispatched);
  gauge("warehouse_events_completed_total", "Task events completed", metrics.driver.completed);
  gauge("warehouse_dispatch_failures_total", "Task events dropped after a recipient error", metrics.driver.failed);
  gauge("warehouse_route_searches_total", "Route searches run", metrics.pathfinder.searches);
  gauge("warehouse_route_failures_total", "Route searches without a route", metrics.pathfinder.noRoute);
  gauge("warehouse_robots_available", "Robots waiting for work", metrics.fleet.available);
  gauge("warehouse_robots_working", "Robots bound to an order", metrics.fleet.working);
  gauge("warehouse_robots_charging", "Robots charging", metrics.fleet.charging);
  gauge("warehouse_picks_total", "Items picked at the drop-off", metrics.picks);
  gauge("process_heap_used_bytes", "V8 heap in use", metrics.memory.heapUsed);

  return `${lines.join("\n")}\n`;
}

function readQueryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function readQueryInt(value: unknown): number | undefined {
  const raw = readQueryString(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

function isEnumValue<T extends string>(
  values: Record<string, T>,
  value: string,
): value is T {
  return Object.values<string>(values).includes(value);
}

/**
 * Builds a log filter from query parameters. Unknown levels, categories and
 * malformed numbers are ignored.
 */
export function parseLogFilter(query: Record<string, unknown>): LogFilter {
  const filter: LogFilter = {};

  const level = readQueryString(query.level);
  if (level && isEnumValue(LogLevel, level)) filter.levels = [level];

  const category = readQueryString(query.category);
  if (category && isEnumValue(LogCategory, category)) {
    filter.categories = [category];
  }

  filter.robotId = readQueryInt(query.robotId);
  filter.fromTick = readQueryInt(query.fromTick);
  filter.toTick = readQueryInt(query.toTick);
  filter.messageContains = readQueryString(query.contains);

  const limit = readQueryInt(query.limit);
  filter.limit = Math.min(limit || 100, MAX_LOG_LIMIT);
  return filter;
}

export function createMetricsRouter(
  runner: SimulationRunner,
  pathfinder: Pathfinder,
): Router {
  const router = Router();

  /**
   * Returns runtime metrics as JSON: driver and route search counters, fleet
   * occupancy and logger metrics.
   */
  router.get("/metrics/runtime", (_req, res) => {
    res.json(collectRuntimeMetrics(runner, pathfinder));
  });

  /**
   * Same counters in Prometheus format.
   */
  router.get("/metrics", (_req, res) => {
    res.set("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
    res.send(toPrometheus(collectRuntimeMetrics(runner, pathfinder)));
  });

  /**
   * Recent entries from the logger's memory buffer.
   *
   * Query: `level`, `category`, `robotId`, `fromTick`, `toTick`, `contains`,
   * `limit` (default 100)
   */
  router.get("/metrics/logs", (req, res) => {
    const entries = logger.queryLogs(parseLogFilter(req.query));
    res.json({ total: logger.getBufferSize(), count: entries.length, entries });
  });

  return router;
}
