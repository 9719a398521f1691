import { randomUUID } from "node:crypto";
import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import type { SimulationConfig } from "../../../../config/config";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import { TaskEventKind, TaskType } from "../../../../shared/constants/TaskEnums";
import type {
  GridPoint,
  InventoryItem,
  Shelf,
} from "../../../../shared/types/warehouse";
import { samePoint } from "../../../../shared/types/warehouse";
import { RandomUtils } from "../../../../shared/utils/RandomUtils";
import { TaskEvent } from "../../core/TaskEvent";
import type { IEventScheduler, TaskRecipient } from "../../ports";
import type { WarehouseGrid } from "../warehouse/WarehouseGrid";

export interface StockedItem {
  item: InventoryItem;
  shelf: Shelf;
}

/**
 * Shelves, the items stocked on them and the orders raised for those items.
 *
 * Shelves are seeded from config along a row; every shelf home is also
 * registered on the grid so a parked shelf blocks robots that carry one.
 */
@injectable()
export class InventorySystem {
  private readonly shelves: Shelf[] = [];
  private readonly itemsBySku = new Map<string, InventoryItem>();
  private readonly shelfBySku = new Map<string, Shelf>();

  constructor(
    @inject(TYPES.WarehouseGrid) private readonly grid: WarehouseGrid,
    @inject(TYPES.EventDriver) private readonly driver: IEventScheduler,
    @inject(TYPES.RobotScheduler) private readonly scheduler: TaskRecipient,
    @inject(TYPES.SimulationConfig) config: SimulationConfig,
  ) {
    for (let i = 0; i < config.shelfCount; i++) {
      this.addShelf({
        x: config.shelfOrigin.x + config.shelfSpacing * i,
        y: config.shelfOrigin.y,
      });
    }
  }

  public addShelf(location: GridPoint): Shelf {
    this.grid.addShelfHome(location);
    const shelf: Shelf = { id: randomUUID(), location: { ...location } };
    this.shelves.push(shelf);
    logger.debug(
      `Shelf ${shelf.id} placed at [${location.x},${location.y}]`,
      LogCategory.INVENTORY,
    );
    return shelf;
  }

  /**
   * Stocks an item, on `shelf` or on a random shelf when omitted. Stocking a
   * known SKU again moves it.
   */
  public addItem(item: InventoryItem, shelf?: Shelf): Shelf {
    const target = shelf ?? RandomUtils.element(this.shelves);
    if (!target) {
      throw new Error(`Cannot stock ${item.sku}: the warehouse has no shelves`);
    }
    if (!this.shelves.includes(target)) {
      throw new Error(`Cannot stock ${item.sku}: unknown shelf ${target.id}`);
    }

    this.itemsBySku.set(item.sku, { ...item });
    this.shelfBySku.set(item.sku, target);
    logger.debug(
      `Stocked ${item.sku} on shelf at [${target.location.x},${target.location.y}]`,
      LogCategory.INVENTORY,
    );
    return target;
  }

  public getItemShelf(item: InventoryItem): Shelf | undefined {
    return this.shelfBySku.get(item.sku);
  }

  public getItemBySku(sku: string): InventoryItem | undefined {
    return this.itemsBySku.get(sku);
  }

  public getShelfByLocation(location: GridPoint): Shelf | undefined {
    return this.shelves.find((shelf) => samePoint(shelf.location, location));
  }

  public getShelves(): readonly Shelf[] {
    return [...this.shelves];
  }

  public getCurrentInventory(): StockedItem[] {
    const stocked: StockedItem[] = [];
    for (const [sku, shelf] of this.shelfBySku) {
      const item = this.itemsBySku.get(sku);
      if (item) stocked.push({ item, shelf });
    }
    return stocked;
  }

  /**
   * Raises an order for one unit of `sku`.
   *
   * @returns The order event, not yet scheduled, or `null` for an unknown SKU
   */
  public generateOrder(sku: string): TaskEvent | null {
    const item = this.itemsBySku.get(sku);
    const shelf = item ? this.shelfBySku.get(sku) : undefined;
    if (!item || !shelf) {
      logger.warn(`Order rejected: unknown SKU ${sku}`, LogCategory.INVENTORY);
      return null;
    }

    return TaskEvent.single(
      {
        type: TaskType.AVAILABLE_ROBOT_RETRIEVE_FROM_LOCATION,
        location: { ...shelf.location },
        item,
      },
      this.scheduler,
      { kind: TaskEventKind.ORDER, createdAt: this.driver.now(), item },
    );
  }
}
