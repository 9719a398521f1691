import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import type { SimulationCommand } from "../../../../shared/types/commands/SimulationCommand";
import { SimulationCommandType } from "../../../../shared/constants/CommandEnums";
import type { SimulationRunner } from "../SimulationRunner";

export const MIN_TIME_SCALE = 0.1;
export const MAX_TIME_SCALE = 10;

export class CommandProcessor {
  constructor(private runner: SimulationRunner) {}

  /**
   * Drains `commands` in arrival order. A failing command is logged and
   * does not stop the rest.
   *
   * @returns Number of commands applied successfully
   */
  public process(commands: SimulationCommand[]): number {
    if (commands.length > 0) {
      logger.debug(
        `Processing ${commands.length} command(s)`,
        LogCategory.SIMULATION,
      );
    }

    let applied = 0;
    while (commands.length > 0) {
      const command = commands.shift();
      if (!command) break;
      try {
        this.dispatchCommand(command);
        applied++;
      } catch (error) {
        logger.error(
          `Failed to process command ${command.type}`,
          LogCategory.SIMULATION,
          { error: error instanceof Error ? error.message : String(error) },
        );
      }
    }
    return applied;
  }

  private dispatchCommand(command: SimulationCommand): void {
    switch (command.type) {
      case SimulationCommandType.PLACE_ORDER:
        if (this.runner.placeOrder(command.sku) === null) {
          throw new Error(`Unknown SKU ${command.sku}`);
        }
        break;
      case SimulationCommandType.ADD_ITEM:
        this.runner.inventory.addItem({ sku: command.sku, name: command.name });
        break;
      case SimulationCommandType.SET_TIME_SCALE:
        this.runner.setTimeScale(
          Math.max(MIN_TIME_SCALE, Math.min(MAX_TIME_SCALE, command.multiplier)),
        );
        break;
    }
  }
}
