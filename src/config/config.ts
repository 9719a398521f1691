import type { GridPoint } from "../shared/types/warehouse";

/**
 * Application configuration loaded from environment variables.
 *
 * The server entry loads `.env` through dotenv before this module is
 * evaluated. Invalid numeric values fail fast at startup.
 *
 * @module config
 */

function readInt(
  name: string,
  fallback: number,
  { min = Number.MIN_SAFE_INTEGER, max = Number.MAX_SAFE_INTEGER } = {},
): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(
      `Invalid value for ${name}: "${raw}" (expected an integer between ${min} and ${max})`,
    );
  }
  return value;
}

/**
 * Tunables of the warehouse model shared by the runner, the fleet and the
 * scheduler.
 */
export interface SimulationConfig {
  fleetSize: number;
  /** Seed cell of robot 0; robot i starts at `(origin.x + i, origin.y)` */
  fleetOrigin: GridPoint;
  gridWidth: number;
  gridHeight: number;
  dropoff: GridPoint;
  shelfCount: number;
  /** Home of shelf 0; shelf i sits at `(origin.x + spacing * i, origin.y)` */
  shelfOrigin: GridPoint;
  shelfSpacing: number;
  rechargeThreshold: number;
  chargeDrainPerMove: number;
  pickDurationTicks: number;
  /** Delay used whenever a blocked step is retried */
  retryDelayTicks: number;
  maxDispatchesPerTick: number;
  tickIntervalMs: number;
  maxCommandQueue: number;
  randomSeed: string;
}

/**
 * Checks that the drop-off, the fleet row and the shelf row all fall inside
 * the grid. Startup fails here rather than deep inside container resolution.
 */
export function assertLayoutFits(config: SimulationConfig): SimulationConfig {
  const { gridWidth, gridHeight, fleetOrigin, shelfOrigin } = config;
  const points: Array<[string, GridPoint]> = [
    ["drop-off", config.dropoff],
    ["robot 0", fleetOrigin],
    [
      `robot ${config.fleetSize - 1}`,
      { x: fleetOrigin.x + config.fleetSize - 1, y: fleetOrigin.y },
    ],
  ];
  if (config.shelfCount > 0) {
    points.push(
      ["shelf 0", shelfOrigin],
      [
        `shelf ${config.shelfCount - 1}`,
        {
          x: shelfOrigin.x + config.shelfSpacing * (config.shelfCount - 1),
          y: shelfOrigin.y,
        },
      ],
    );
  }

  for (const [label, point] of points) {
    if (
      point.x < 0 ||
      point.y < 0 ||
      point.x >= gridWidth ||
      point.y >= gridHeight
    ) {
      throw new Error(
        `Invalid layout: ${label} at [${point.x},${point.y}] is outside the ${gridWidth}x${gridHeight} grid (check GRID_WIDTH, GRID_HEIGHT, FLEET_SIZE and SHELF_COUNT)`,
      );
    }
  }
  return config;
}

/**
 * Application configuration object.
 *
 * @property PORT - HTTP server port (default: 8080)
 * @property ALLOWED_ORIGINS - CORS origins, comma separated ("*" when unset)
 * @property SIMULATION - warehouse model defaults
 */
export const CONFIG = {
  PORT: readInt("PORT", 8080, { min: 0, max: 65535 }),
  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS?.split(",") ?? "*",
  SIMULATION: assertLayoutFits({
    fleetSize: readInt("FLEET_SIZE", 10, { min: 1, max: 1000 }),
    fleetOrigin: { x: 20, y: 0 },
    gridWidth: readInt("GRID_WIDTH", 200, { min: 1, max: 2000 }),
    gridHeight: readInt("GRID_HEIGHT", 100, { min: 1, max: 2000 }),
    dropoff: { x: 10, y: 50 },
    shelfCount: readInt("SHELF_COUNT", 5, { min: 0, max: 1000 }),
    shelfOrigin: { x: 100, y: 70 },
    shelfSpacing: 20,
    rechargeThreshold: readInt("RECHARGE_THRESHOLD", 100, { min: 1, max: 100 }),
    chargeDrainPerMove: readInt("CHARGE_DRAIN_PER_MOVE", 1, {
      min: 0,
      max: 100,
    }),
    pickDurationTicks: readInt("PICK_DURATION_TICKS", 1, { min: 0 }),
    retryDelayTicks: 1,
    maxDispatchesPerTick: readInt("MAX_DISPATCHES_PER_TICK", 10000, {
      min: 1,
    }),
    tickIntervalMs: readInt("TICK_INTERVAL_MS", 100, { min: 1 }),
    maxCommandQueue: readInt("MAX_COMMAND_QUEUE", 200, { min: 1 }),
    randomSeed: process.env.RANDOM_SEED || "warehouse",
  } satisfies SimulationConfig),
};

/**
 * Builds a simulation config from the environment defaults and overrides.
 */
export function createSimulationConfig(
  overrides: Partial<SimulationConfig> = {},
): SimulationConfig {
  return { ...CONFIG.SIMULATION, ...overrides };
}
