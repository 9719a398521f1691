import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, type SimulationConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Every simulation component is a singleton so the runner, the HTTP routes
 * and the scheduler all see the same fleet, grid and clock.
 *
 * @module config
 */
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { EventDriver } from "../domain/simulation/core/EventDriver";
import {
  WarehouseGrid,
  Pathfinder,
  RobotPool,
  RobotScheduler,
  PickerStation,
  InventorySystem,
} from "../domain/simulation/systems";

/**
 * Builds a container around `config`. The server uses the module-level
 * {@link container}; tests build their own.
 */
export function createContainer(
  config: SimulationConfig = CONFIG.SIMULATION,
): Container {
  const container = new Container();

  container.bind<SimulationConfig>(TYPES.SimulationConfig).toConstantValue(config);

  container
    .bind<EventDriver>(TYPES.EventDriver)
    .to(EventDriver)
    .inSingletonScope();

  container
    .bind<WarehouseGrid>(TYPES.WarehouseGrid)
    .toDynamicValue(() => WarehouseGrid.fromConfig(config))
    .inSingletonScope();

  container
    .bind<Pathfinder>(TYPES.Pathfinder)
    .to(Pathfinder)
    .inSingletonScope();
  container.bind<RobotPool>(TYPES.RobotPool).to(RobotPool).inSingletonScope();
  container
    .bind<PickerStation>(TYPES.PickerStation)
    .to(PickerStation)
    .inSingletonScope();
  container
    .bind<RobotScheduler>(TYPES.RobotScheduler)
    .to(RobotScheduler)
    .inSingletonScope();
  container
    .bind<InventorySystem>(TYPES.InventorySystem)
    .to(InventorySystem)
    .inSingletonScope();

  container
    .bind<SimulationRunner>(TYPES.SimulationRunner)
    .to(SimulationRunner)
    .inSingletonScope();

  return container;
}

export const container = createContainer();
