import EasyStar from "easystarjs";
import { performance } from "node:perf_hooks";
import { inject, injectable } from "inversify";
import { TYPES } from "../../../config/Types";
import { logger } from "../../utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { PathUnavailableError } from "../../../shared/errors/SimulationErrors";
import type {
  GridService,
  PathResult,
  Pathfinder,
} from "../../../domain/types/simulation/collaborators";
import type {
  GridCell,
  TraversalPredicate,
} from "../../../domain/types/simulation/grid";

const OPEN_TILE = 0;
const BLOCKED_TILE = 1;

/**
 * Pathfinder backed by EasyStar.js in synchronous mode, cardinal moves only.
 *
 * The traversal predicate is rasterised into a fresh 0/1 grid for every
 * query, so species with different rules (water crossing) share one instance.
 */
@injectable()
export class EasyStarPathfinder implements Pathfinder {
  private readonly easystar: EasyStar.js;

  constructor(@inject(TYPES.GridService) private readonly grid: GridService) {
    this.easystar = new EasyStar.js();
    this.easystar.setAcceptableTiles([OPEN_TILE]);
    this.easystar.enableSync();
  }

  public findPath(
    start: GridCell,
    end: GridCell,
    canTraverse: TraversalPredicate,
  ): Promise<PathResult> {
    if (!this.grid.isValid(start) || !this.grid.isValid(end)) {
      return Promise.resolve(this.failure(start, end));
    }

    const matrix = this.buildMatrix(start, canTraverse);
    const startedAt = performance.now();

    return new Promise((resolve) => {
      this.easystar.setGrid(matrix);
      this.easystar.findPath(start.x, start.y, end.x, end.y, (path) => {
        logger.debug(
          `🧭 EasyStarPathfinder: (${start.x}, ${start.y}) -> (${end.x}, ${end.y}) in ${(performance.now() - startedAt).toFixed(2)}ms`,
          LogCategory.MOVEMENT,
        );
        if (!path) {
          resolve(this.failure(start, end));
          return;
        }
        const cells = path.map((point) => ({ x: point.x, y: point.y }));
        resolve({
          success: true,
          path: cells.length > 0 ? cells : [{ ...start }],
        });
      });
      this.easystar.calculate();
    });
  }

  /**
   * Row-major 0/1 matrix; the start cell is always open.
   */
  private buildMatrix(
    start: GridCell,
    canTraverse: TraversalPredicate,
  ): number[][] {
    const { width, height } = this.grid.gridSize();
    const matrix: number[][] = [];
    for (let y = 0; y < height; y++) {
      const row: number[] = [];
      for (let x = 0; x < width; x++) {
        const cell = { x, y };
        const open =
          (x === start.x && y === start.y) ||
          canTraverse(cell, this.grid.tileKind(cell));
        row.push(open ? OPEN_TILE : BLOCKED_TILE);
      }
      matrix.push(row);
    }
    return matrix;
  }

  private failure(start: GridCell, end: GridCell): PathResult {
    return { success: false, error: new PathUnavailableError(start, end) };
  }
}
