import type { SimulationConfig } from "../../../../config/config";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import { CellKind } from "../../../../shared/constants/CellEnums";
import type {
  CellDescriptor,
  GridPoint,
  GridSnapshot,
} from "../../../../shared/types/warehouse";
import type { IGridModel } from "../../ports";

export interface WarehouseLayout {
  width: number;
  height: number;
  dropoff: GridPoint;
  obstacles?: GridPoint[];
  shelfHomes?: GridPoint[];
}

/**
 * Warehouse floor as an arena of cells addressed by `y * width + x`.
 *
 * Each cell has a static kind and a "shelf parked here" flag. Robots
 * without a shelf drive underneath parked shelves; a robot carrying a shelf
 * cannot enter a cell that already holds one. Obstacles block everyone.
 */
export class WarehouseGrid implements IGridModel {
  public readonly width: number;
  public readonly height: number;
  private readonly kinds: CellKind[];
  private readonly parked: Uint8Array;
  private readonly dropoff: GridPoint;

  constructor(layout: WarehouseLayout) {
    if (
      !Number.isInteger(layout.width) ||
      !Number.isInteger(layout.height) ||
      layout.width <= 0 ||
      layout.height <= 0
    ) {
      throw new Error(
        `Invalid grid dimensions ${layout.width}x${layout.height}`,
      );
    }

    this.width = layout.width;
    this.height = layout.height;
    this.kinds = new Array<CellKind>(this.width * this.height).fill(
      CellKind.FLOOR,
    );
    this.parked = new Uint8Array(this.width * this.height);

    this.dropoff = this.requireInBounds(layout.dropoff, "drop-off");
    this.kinds[this.toIndex(layout.dropoff)] = CellKind.DROPOFF;

    for (const obstacle of layout.obstacles ?? []) {
      this.addObstacle(obstacle);
    }
    for (const home of layout.shelfHomes ?? []) {
      this.addShelfHome(home);
    }
  }

  /**
   * Builds an empty floor sized from the simulation config.
   */
  public static fromConfig(config: SimulationConfig): WarehouseGrid {
    return new WarehouseGrid({
      width: config.gridWidth,
      height: config.gridHeight,
      dropoff: config.dropoff,
    });
  }

  public *cells(): IterableIterator<number> {
    for (let i = 0; i < this.width * this.height; i++) {
      yield i;
    }
  }

  public inBounds(point: GridPoint): boolean {
    return (
      Number.isInteger(point.x) &&
      Number.isInteger(point.y) &&
      point.x >= 0 &&
      point.y >= 0 &&
      point.x < this.width &&
      point.y < this.height
    );
  }

  public toIndex(point: GridPoint): number {
    return point.y * this.width + point.x;
  }

  public toPoint(index: number): GridPoint {
    return { x: index % this.width, y: Math.floor(index / this.width) };
  }

  public getCell(point: GridPoint): CellDescriptor | undefined {
    if (!this.inBounds(point)) return undefined;
    const index = this.toIndex(point);
    return { index, point: { ...point }, kind: this.kinds[index] };
  }

  public canTraverse(index: number, carryingShelf: boolean): boolean {
    const kind = this.kinds[index];
    if (kind === undefined || kind === CellKind.OBSTACLE) return false;
    return !(carryingShelf && this.parked[index] === 1);
  }

  public getDropoff(): GridPoint {
    return { ...this.dropoff };
  }

  public addObstacle(point: GridPoint): void {
    const index = this.toIndex(this.requireInBounds(point, "obstacle"));
    if (this.kinds[index] !== CellKind.FLOOR) {
      throw new Error(
        `Cannot place obstacle at [${point.x},${point.y}]: cell is ${this.kinds[index]}`,
      );
    }
    this.kinds[index] = CellKind.OBSTACLE;
  }

  /**
   * Marks a cell as a shelf home with its shelf parked.
   */
  public addShelfHome(point: GridPoint): void {
    const index = this.toIndex(this.requireInBounds(point, "shelf home"));
    if (this.kinds[index] !== CellKind.FLOOR) {
      throw new Error(
        `Cannot place shelf at [${point.x},${point.y}]: cell is ${this.kinds[index]}`,
      );
    }
    this.kinds[index] = CellKind.SHELF_HOME;
    this.parked[index] = 1;
  }

  public isShelfHome(point: GridPoint): boolean {
    return (
      this.inBounds(point) &&
      this.kinds[this.toIndex(point)] === CellKind.SHELF_HOME
    );
  }

  public isShelfParked(point: GridPoint): boolean {
    return this.inBounds(point) && this.parked[this.toIndex(point)] === 1;
  }

  /**
   * Removes the shelf parked at `point` (a robot picked it up).
   */
  public liftShelf(point: GridPoint): void {
    if (!this.isShelfParked(point)) {
      throw new Error(`No shelf parked at [${point.x},${point.y}]`);
    }
    this.parked[this.toIndex(point)] = 0;
  }

  /**
   * Parks a carried shelf at `point`.
   */
  public placeShelf(point: GridPoint): void {
    const index = this.toIndex(this.requireInBounds(point, "shelf"));
    if (this.parked[index] === 1) {
      throw new Error(`A shelf is already parked at [${point.x},${point.y}]`);
    }
    if (this.kinds[index] !== CellKind.SHELF_HOME) {
      logger.warn(
        `Shelf lowered outside a shelf home at [${point.x},${point.y}]`,
        LogCategory.FLEET,
      );
    }
    this.parked[index] = 1;
  }

  public getSnapshot(): GridSnapshot {
    const obstacles: GridPoint[] = [];
    const parkedShelves: GridPoint[] = [];
    for (const index of this.cells()) {
      if (this.kinds[index] === CellKind.OBSTACLE) {
        obstacles.push(this.toPoint(index));
      }
      if (this.parked[index] === 1) {
        parkedShelves.push(this.toPoint(index));
      }
    }
    return {
      width: this.width,
      height: this.height,
      dropoff: this.getDropoff(),
      obstacles,
      parkedShelves,
    };
  }

  private requireInBounds(point: GridPoint, what: string): GridPoint {
    if (!this.inBounds(point)) {
      throw new Error(
        `The ${what} at [${point.x},${point.y}] is outside the ${this.width}x${this.height} grid`,
      );
    }
    return point;
  }
}
