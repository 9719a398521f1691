import { injectable, inject } from "inversify";
import { performance } from "node:perf_hooks";
import { TYPES } from "../../../../config/Types";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import {
  manhattan,
  samePoint,
  type GridPoint,
} from "../../../../shared/types/warehouse";
import { IndexedMinHeap } from "../../core/IndexedMinHeap";
import type { IGridModel } from "../../ports";

export interface PathfinderStats {
  searches: number;
  routesFound: number;
  noRoute: number;
  expandedCells: number;
  totalSearchMs: number;
}

/**
 * Per-search scratch state, keyed by cell index. Nothing here outlives a
 * single {@link Pathfinder.findPath} call.
 */
interface SearchScratch {
  cost: Float64Array;
  parent: Int32Array;
  closed: Uint8Array;
  open: IndexedMinHeap;
}

/**
 * A* route planning over the warehouse grid.
 *
 * Four-neighbour moves with uniform edge weight. A neighbour's recorded cost
 * is its Manhattan distance to the goal plus the recorded cost of the cell it
 * was reached from plus one; the open set is an indexed heap ordered by that
 * cost. Which cells can be entered depends on whether the robot carries a
 * shelf.
 */
@injectable()
export class Pathfinder {
  private stats: PathfinderStats = {
    searches: 0,
    routesFound: 0,
    noRoute: 0,
    expandedCells: 0,
    totalSearchMs: 0,
  };

  constructor(@inject(TYPES.WarehouseGrid) private readonly grid: IGridModel) {}

  /**
   * Finds a route from `start` to `goal`.
   *
   * @returns Waypoints excluding `start` and including `goal`, or `null` when
   * the robot is already at `goal`, an endpoint is off the grid, or `goal`
   * cannot be reached
   */
  public findPath(
    start: GridPoint,
    goal: GridPoint,
    carryingShelf: boolean,
  ): GridPoint[] | null {
    this.stats.searches++;
    if (samePoint(start, goal)) {
      this.stats.noRoute++;
      return null;
    }
    if (!this.grid.inBounds(start) || !this.grid.inBounds(goal)) {
      logger.warn(
        `Route requested outside the grid: [${start.x},${start.y}] -> [${goal.x},${goal.y}]`,
        LogCategory.PATHFINDING,
      );
      this.stats.noRoute++;
      return null;
    }

    const startedAt = performance.now();
    const goalIndex = this.grid.toIndex(goal);
    const scratch = this.search(
      this.grid.toIndex(start),
      goalIndex,
      goal,
      carryingShelf,
    );
    this.stats.totalSearchMs += performance.now() - startedAt;

    if (scratch.closed[goalIndex] !== 1) {
      this.stats.noRoute++;
      logger.debug(
        `No route from [${start.x},${start.y}] to [${goal.x},${goal.y}] (carrying=${carryingShelf})`,
        LogCategory.PATHFINDING,
      );
      return null;
    }

    this.stats.routesFound++;
    return this.reconstruct(scratch.parent, goalIndex);
  }

  public getStats(): PathfinderStats {
    return { ...this.stats };
  }

  private search(
    startIndex: number,
    goalIndex: number,
    goal: GridPoint,
    carryingShelf: boolean,
  ): SearchScratch {
    const cellCount = this.grid.width * this.grid.height;
    const scratch: SearchScratch = {
      cost: new Float64Array(cellCount),
      parent: new Int32Array(cellCount).fill(-1),
      closed: new Uint8Array(cellCount),
      open: new IndexedMinHeap(cellCount),
    };

    scratch.open.push(startIndex, 0);

    for (
      let current = scratch.open.pop();
      current !== undefined;
      current = scratch.open.pop()
    ) {
      scratch.closed[current] = 1;
      this.stats.expandedCells++;
      if (current === goalIndex) break;

      const { x, y } = this.grid.toPoint(current);
      const neighbours: GridPoint[] = [
        { x: x - 1, y },
        { x, y: y - 1 },
        { x, y: y + 1 },
        { x: x + 1, y },
      ];

      for (const neighbour of neighbours) {
        if (!this.grid.inBounds(neighbour)) continue;
        this.relax(scratch, current, neighbour, goal, carryingShelf);
      }
    }

    return scratch;
  }

  private relax(
    scratch: SearchScratch,
    current: number,
    neighbour: GridPoint,
    goal: GridPoint,
    carryingShelf: boolean,
  ): void {
    const next = this.grid.toIndex(neighbour);
    if (scratch.closed[next] === 1) return;
    if (!this.grid.canTraverse(next, carryingShelf)) return;

    const candidate = manhattan(neighbour, goal) + scratch.cost[current] + 1;

    const inOpen = scratch.open.contains(next);
    if (inOpen && candidate >= scratch.cost[next]) return;

    scratch.cost[next] = candidate;
    scratch.parent[next] = current;
    if (inOpen) {
      scratch.open.decreaseKey(next, candidate);
    } else {
      scratch.open.push(next, candidate);
    }
  }

  private reconstruct(parent: Int32Array, goalIndex: number): GridPoint[] {
    const indices: number[] = [];
    for (let cell = goalIndex; cell !== -1; cell = parent[cell]) {
      indices.push(cell);
    }
    indices.reverse();
    indices.shift();
    return indices.map((index) => this.grid.toPoint(index));
  }
}
